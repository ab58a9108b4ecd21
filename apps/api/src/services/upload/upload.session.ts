// src/services/upload/upload.session.ts

import crypto from "crypto";

import type { UploadSession } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";
import { updateSession } from "../../store/session.store.js";
import { parseLayerFilename } from "../metadata/layer.filename.js";
import type { IngestDeps } from "./upload.deps.js";

const DEFAULT_CONTENT_TYPE = "image/tiff";

export const rawObjectKey = (prefix: string, uploadId: string) => `${prefix}/inputs/${uploadId}`;

export interface CreateUploadInput {
  uploadLength: number;
  contentType?: string;
  filename?: string;
  overwrite?: boolean;
  owner: string | null;
}

export async function createUploadSession(
  deps: IngestDeps,
  input: CreateUploadInput
): Promise<UploadSession> {
  const { upload, finalize } = deps.settings;

  if (!Number.isSafeInteger(input.uploadLength) || input.uploadLength <= 0) {
    throw new UploadError(400, "INVALID_UPLOAD_LENGTH", "uploadLength must be a positive integer");
  }
  if (input.uploadLength > upload.maxFileSizeBytes) {
    throw new UploadError(413, "FILE_TOO_LARGE", "File exceeds the maximum upload size", {
      details: { maxFileSizeBytes: upload.maxFileSizeBytes },
    });
  }

  // Name is optional here; when present it is validated before any I/O.
  const metadata = input.filename ? parseLayerFilename(input.filename) : null;

  const active = await deps.sessions.countActive();
  if (active >= upload.maxActiveUploads) {
    throw new UploadError(429, "UPLOAD_CAPACITY_REACHED", "Too many active uploads", {
      retryable: true,
    });
  }

  const now = Date.now();
  const uploadId = crypto.randomUUID();
  const contentType = input.contentType?.trim() || DEFAULT_CONTENT_TYPE;

  const session: UploadSession = {
    uploadId,
    state: "created",
    totalLength: input.uploadLength,
    contentType,
    owner: input.owner,
    storageKey: rawObjectKey(deps.storagePrefix, uploadId),
    storageUploadHandle: null,
    chunkSize: null,
    parts: [],
    declaredName: metadata ? input.filename?.trim() ?? null : null,
    metadata,
    overwrite: input.overwrite ?? null,
    version: 0,
    createdAt: now,
    lastActivityAt: now,
    storageCompletedAt: null,
    conversion: null,
    catalogEntryId: null,
    lastError: null,
  };

  await deps.sessions.create(session);

  let handle: string;
  try {
    handle = await deps.storage.initiate(session.storageKey, contentType);
  } catch (err) {
    deps.log.error({ uploadId, err }, "Multipart initiation failed");
    await updateSession(deps.sessions, uploadId, finalize.commitAttempts, () => ({
      patch: { state: "aborted", lastError: "multipart initiation failed", lastActivityAt: Date.now() },
    }));
    await deps.sessions.archive(uploadId, upload.archiveRetentionSeconds);
    throw err;
  }

  const ready = await updateSession(deps.sessions, uploadId, finalize.commitAttempts, () => ({
    patch: { storageUploadHandle: handle, state: "receiving", lastActivityAt: Date.now() },
  }));

  deps.log.info(
    { uploadId, uploadLength: session.totalLength, layer: metadata ? input.filename : undefined },
    "Upload session created"
  );

  return ready;
}
