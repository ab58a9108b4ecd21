// src/store/session.store.ts

import type { SessionPatch, UploadPart, UploadSession } from "../types/upload.js";
import { UploadError } from "../utils/apiError.js";

export interface SessionCommit {
  patch: SessionPatch;
  // Upsert by partNumber.
  part?: UploadPart;
}

export interface UploadSessionStore {
  create(session: UploadSession): Promise<void>;
  get(uploadId: string): Promise<UploadSession | null>;

  /**
   * Applies `change` on top of `current` if the stored version still equals
   * `current.version`. Returns the new session, or null when another writer
   * committed first. Throws UPLOAD_NOT_FOUND if the record is gone.
   */
  commit(current: UploadSession, change: SessionCommit): Promise<UploadSession | null>;

  listActive(): Promise<string[]>;
  countActive(): Promise<number>;
  removeFromIndex(uploadId: string): Promise<void>;
  archive(uploadId: string, retentionSeconds: number): Promise<void>;

  acquireLock(uploadId: string, token: string, ttlSeconds: number): Promise<boolean>;
  refreshLock(uploadId: string, token: string, ttlSeconds: number): Promise<boolean>;
  releaseLock(uploadId: string, token: string): Promise<void>;
  isLocked(uploadId: string): Promise<boolean>;

  ping(): Promise<void>;
}

export function applyCommit(current: UploadSession, change: SessionCommit): UploadSession {
  let parts = current.parts;
  if (change.part) {
    const incoming = change.part;
    parts = current.parts
      .filter((p) => p.partNumber !== incoming.partNumber)
      .concat(incoming)
      .sort((a, b) => a.partNumber - b.partNumber);
  }

  return {
    ...current,
    ...change.patch,
    parts,
    version: current.version + 1,
  };
}

export function sessionNotFound(uploadId: string): UploadError {
  return new UploadError(404, "UPLOAD_NOT_FOUND", "Upload session not found", {
    details: { uploadId },
  });
}

/**
 * Read-modify-write loop over versioned commits. `mutate` sees the freshest
 * session and returns the change to apply, or null when nothing needs to
 * change. It may throw to reject the operation.
 */
export async function updateSession(
  store: UploadSessionStore,
  uploadId: string,
  attempts: number,
  mutate: (current: UploadSession) => SessionCommit | null
): Promise<UploadSession> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const current = await store.get(uploadId);
    if (!current) throw sessionNotFound(uploadId);

    const change = mutate(current);
    if (!change) return current;

    const next = await store.commit(current, change);
    if (next) return next;
  }

  throw new UploadError(409, "SESSION_CONFLICT", "Upload session is being modified concurrently", {
    retryable: true,
    details: { uploadId },
  });
}
