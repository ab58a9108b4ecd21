// src/services/upload/upload.finalize.ts

import crypto from "crypto";

import type { CatalogEntry } from "../../types/catalog.js";
import type { UploadSession } from "../../types/upload.js";
import { UploadError, errorMessage, isUploadError } from "../../utils/apiError.js";
import { sessionNotFound, updateSession, type SessionCommit } from "../../store/session.store.js";
import { registerLayer } from "../catalog/catalog.registrar.js";
import { resolveDuplicate } from "../catalog/duplicate.resolver.js";
import { layerName } from "../metadata/layer.filename.js";
import { convertRaster } from "../raster/raster.convert.js";
import type { IngestDeps } from "./upload.deps.js";
import { coversUpload } from "./upload.parts.js";

export interface FinalizeOptions {
  // Request-level override; falls back to the session, then config.
  overwrite?: boolean;
}

export interface FinalizeResult {
  status: "finalized";
  entry: CatalogEntry;
}

// One object per upload: concurrent uploads of a layer never share a key.
const layerObjectKey = (prefix: string, name: string, uploadId: string) =>
  `${prefix}/${name}/${uploadId}.tif`;

const LOCK_LOST = "Finalize lock was lost";

function lockLost(uploadId: string): UploadError {
  return new UploadError(409, "UPLOAD_FINALIZATION_IN_PROGRESS", LOCK_LOST, {
    retryable: true,
    details: { uploadId },
  });
}

async function finalizedEntry(deps: IngestDeps, session: UploadSession): Promise<FinalizeResult> {
  const entry = session.catalogEntryId ? await deps.catalog.get(session.catalogEntryId) : null;
  if (!entry) {
    throw new UploadError(404, "UPLOAD_NOT_FOUND", "Catalog entry for this upload no longer exists", {
      details: { uploadId: session.uploadId, catalogEntryId: session.catalogEntryId },
    });
  }
  return { status: "finalized", entry };
}

/**
 * A multipart upload the backend no longer knows was completed by an earlier
 * attempt whose checkpoint never landed, provided the object exists.
 */
async function completeMultipart(deps: IngestDeps, session: UploadSession, handle: string) {
  try {
    await deps.storage.complete(
      { key: session.storageKey, uploadId: handle },
      session.parts.map((p) => ({ partNumber: p.partNumber, storageTag: p.storageTag }))
    );
  } catch (err) {
    const gone = isUploadError(err) && err.details?.outcome === "not_found";
    if (!gone || !(await deps.storage.objectExists(session.storageKey))) throw err;

    deps.log.warn(
      { uploadId: session.uploadId, key: session.storageKey },
      "Multipart upload already completed; resuming from the stored object"
    );
  }
}

/**
 * Completing → finalized. Every step records a checkpoint on the session so
 * a retry resumes after the last one that succeeded.
 */
export async function finalizeUpload(
  deps: IngestDeps,
  uploadId: string,
  options: FinalizeOptions = {}
): Promise<FinalizeResult> {
  const { sessions, storage, settings, log } = deps;
  const { commitAttempts, lockTtlSeconds, lockRefreshIntervalMs } = settings.finalize;

  // Fast-path idempotency.
  const pre = await sessions.get(uploadId);
  if (!pre || pre.state === "aborted") throw sessionNotFound(uploadId);
  if (pre.state === "finalized") return finalizedEntry(deps, pre);

  const lockToken = crypto.randomUUID();
  const locked = await sessions.acquireLock(uploadId, lockToken, lockTtlSeconds);
  if (!locked) {
    throw new UploadError(409, "UPLOAD_FINALIZATION_IN_PROGRESS", "Upload is already being finalized", {
      retryable: true,
      details: { uploadId },
    });
  }

  let lockError: UploadError | null = null;
  const refreshFinalizeLock = async () => {
    const ok = await sessions.refreshLock(uploadId, lockToken, lockTtlSeconds);
    if (!ok) throw lockLost(uploadId);
  };

  const lockRefreshTimer = setInterval(() => {
    void refreshFinalizeLock().catch((err) => {
      lockError = err instanceof UploadError ? err : lockLost(uploadId);
    });
  }, lockRefreshIntervalMs);
  lockRefreshTimer.unref();

  const assertFinalizeLockHealthy = () => {
    if (lockError) throw lockError;
  };

  const commit = (mutate: (current: UploadSession) => SessionCommit | null) =>
    updateSession(sessions, uploadId, commitAttempts, mutate);

  let completing = false;

  try {
    // Re-check inside the lock (race-safe).
    let session = await sessions.get(uploadId);
    if (!session || session.state === "aborted") throw sessionNotFound(uploadId);
    if (session.state === "finalized") return await finalizedEntry(deps, session);

    if (session.state !== "completing") {
      if (!coversUpload(session.parts, session.totalLength)) {
        throw new UploadError(409, "UPLOAD_INCOMPLETE", "Not all bytes of the upload were received", {
          retryable: true,
          details: { uploadId, partsReceived: session.parts.length },
        });
      }
      session = await commit(() => ({
        patch: { state: "completing", lastActivityAt: Date.now() },
      }));
    }
    completing = true;

    const metadata = session.metadata;
    const handle = session.storageUploadHandle;
    if (!metadata || !handle) {
      throw new UploadError(500, "INTERNAL_ERROR", "Completing session is missing metadata or storage handle");
    }

    if (session.storageCompletedAt === null) {
      assertFinalizeLockHealthy();
      await completeMultipart(deps, session, handle);

      // Checkpoint immediately; the multipart handle is gone after this.
      session = await commit(() => ({
        patch: { storageCompletedAt: Date.now(), lastActivityAt: Date.now() },
      }));
    }

    let catalogEntryId = session.catalogEntryId;
    let entry: CatalogEntry | null = null;

    if (!catalogEntryId) {
      assertFinalizeLockHealthy();
      await refreshFinalizeLock();

      const overwrite =
        options.overwrite ?? session.overwrite ?? settings.upload.overwriteDuplicates;

      const resolution = await resolveDuplicate(deps, {
        uploadId,
        metadata,
        overwrite,
      });

      if (resolution.kind === "own") {
        entry = resolution.entry;
      } else {
        let conversion = session.conversion;
        if (!conversion) {
          assertFinalizeLockHealthy();
          await refreshFinalizeLock();
          const converted = await convertRaster(deps, {
            uploadId,
            sourceKey: session.storageKey,
            targetKey: layerObjectKey(deps.storagePrefix, layerName(metadata), uploadId),
          });
          conversion = converted;

          session = await commit(() => ({
            patch: { conversion: converted, lastActivityAt: Date.now() },
          }));
        }

        assertFinalizeLockHealthy();
        entry = await registerLayer(deps, session, conversion);
      }

      const registeredId = entry.id;
      catalogEntryId = registeredId;
      session = await commit(() => ({
        patch: { catalogEntryId: registeredId, lastActivityAt: Date.now() },
      }));
    }

    assertFinalizeLockHealthy();
    await storage.deleteObject(session.storageKey);

    await commit(() => ({
      patch: { state: "finalized", lastError: null, lastActivityAt: Date.now() },
    }));
    await sessions.archive(uploadId, settings.upload.archiveRetentionSeconds);

    log.info({ uploadId, catalogEntryId }, "Upload finalized");

    if (!entry) {
      entry = await deps.catalog.get(catalogEntryId);
      if (!entry) throw sessionNotFound(uploadId);
    }
    return { status: "finalized", entry };
  } catch (err) {
    const message = errorMessage(err);
    log.error({ uploadId, err }, "Finalize failed");

    // If we no longer own the lock, leave the session to the new owner.
    const ownsLock = !(isUploadError(err) && err.message === LOCK_LOST);
    if (completing && ownsLock) {
      await commit((current) =>
        current.state === "completing" ? { patch: { lastError: message } } : null
      ).catch((recordErr) => {
        log.warn({ uploadId, err: recordErr }, "Failed to record finalize error");
      });
    }

    throw err;
  } finally {
    clearInterval(lockRefreshTimer);
    await sessions.releaseLock(uploadId, lockToken).catch((err) => {
      log.warn({ uploadId, err }, "Failed to release finalize lock");
    });
  }
}
