// src/services/upload/upload.cancel.ts

import crypto from "crypto";

import { ACTIVE_UPLOAD_STATES, type UploadSession } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";
import { sessionNotFound, updateSession } from "../../store/session.store.js";
import type { IngestDeps } from "./upload.deps.js";

/**
 * Releases everything the session holds in storage. Storage is always
 * cleaned before the session state changes.
 */
async function releaseStorage(deps: IngestDeps, session: UploadSession) {
  if (session.storageCompletedAt !== null) {
    await deps.storage.deleteObject(session.storageKey);
  } else if (session.storageUploadHandle) {
    await deps.storage.abort({ key: session.storageKey, uploadId: session.storageUploadHandle });
  }

  if (session.conversion && !session.catalogEntryId) {
    await deps.storage.deleteObject(session.conversion.storageKey);
  }
}

/**
 * Aborts a non-terminal session. The caller must hold the finalize lock
 * or otherwise know no finalize is running.
 */
export async function abortUploadSession(
  deps: IngestDeps,
  session: UploadSession,
  reason: string
): Promise<void> {
  await releaseStorage(deps, session);

  await updateSession(deps.sessions, session.uploadId, deps.settings.finalize.commitAttempts, (current) =>
    ACTIVE_UPLOAD_STATES.has(current.state)
      ? { patch: { state: "aborted", lastError: reason, lastActivityAt: Date.now() } }
      : null
  );
  await deps.sessions.archive(session.uploadId, deps.settings.upload.archiveRetentionSeconds);

  deps.log.warn({ uploadId: session.uploadId, reason }, "Upload aborted");
}

export async function cancelUpload(deps: IngestDeps, uploadId: string): Promise<void> {
  const { sessions, settings } = deps;

  const token = crypto.randomUUID();
  const locked = await sessions.acquireLock(uploadId, token, settings.finalize.lockTtlSeconds);
  if (!locked) {
    throw new UploadError(409, "UPLOAD_FINALIZATION_IN_PROGRESS", "Upload is being finalized", {
      retryable: true,
    });
  }

  try {
    const session = await sessions.get(uploadId);
    if (!session) throw sessionNotFound(uploadId);

    if (!ACTIVE_UPLOAD_STATES.has(session.state)) {
      throw new UploadError(409, "SESSION_CONFLICT", `Upload is already ${session.state}`, {
        details: { uploadId, state: session.state },
      });
    }

    await abortUploadSession(deps, session, "canceled by client");
  } finally {
    await sessions.releaseLock(uploadId, token);
  }
}
