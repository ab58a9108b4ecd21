// src/services/upload/upload.chunk.ts

import type { CatalogEntry } from "../../types/catalog.js";
import type { LayerMetadata, UploadPart, UploadProgress, UploadSession } from "../../types/upload.js";
import { UploadError, isUploadError } from "../../utils/apiError.js";
import { sessionNotFound, updateSession } from "../../store/session.store.js";
import { parseLayerFilename } from "../metadata/layer.filename.js";
import { abortUploadSession } from "./upload.cancel.js";
import type { IngestDeps } from "./upload.deps.js";
import { finalizeUpload } from "./upload.finalize.js";
import { contiguousOffset, coversUpload, resolvePartNumber } from "./upload.parts.js";

export interface ChunkInput {
  uploadId: string;
  offset: number;
  // Declared Content-Length of the chunk.
  length: number;
  declaredTotal: number;
  name: string | null;
  body: Buffer;
  overwrite?: boolean;
}

export type ChunkResult =
  | { status: "receiving"; partNumber: number; nextExpectedOffset: number }
  | { status: "finalized"; partNumber: number; entry: CatalogEntry };

const sameName = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

function validateRange(session: UploadSession, input: ChunkInput, maxBytes: number) {
  if (input.declaredTotal !== session.totalLength) {
    throw new UploadError(400, "UPLOAD_LENGTH_MISMATCH", "Upload-Length differs from the session", {
      details: { expected: session.totalLength, received: input.declaredTotal },
    });
  }

  if (input.body.length !== input.length) {
    throw new UploadError(400, "INCOMPLETE_UPLOAD", "Chunk body is shorter or longer than Content-Length", {
      retryable: true,
      details: { expected: input.length, received: input.body.length },
    });
  }

  if (
    !Number.isSafeInteger(input.offset) ||
    input.offset < 0 ||
    input.length <= 0 ||
    input.offset + input.length > session.totalLength
  ) {
    throw new UploadError(400, "INVALID_CHUNK", "Chunk range is outside the upload", {
      details: { offset: input.offset, length: input.length, uploadLength: session.totalLength },
    });
  }

  if (input.length > maxBytes) {
    throw new UploadError(413, "INVALID_CHUNK", "Chunk exceeds the maximum chunk size", {
      details: { length: input.length, maxBytes },
    });
  }
}

/**
 * Metadata for this chunk: the stored one, or extracted from the name on
 * first contact. An unparseable name aborts the whole session.
 */
async function resolveMetadata(
  deps: IngestDeps,
  session: UploadSession,
  name: string | null
): Promise<{ metadata: LayerMetadata; declaredName: string }> {
  if (session.metadata && session.declaredName) {
    if (name !== null && !sameName(name, session.declaredName)) {
      throw new UploadError(400, "UPLOAD_NAME_MISMATCH", "Upload-Name differs from the session", {
        details: { expected: session.declaredName, received: name },
      });
    }
    return { metadata: session.metadata, declaredName: session.declaredName };
  }

  if (!name) {
    throw new UploadError(400, "INVALID_UPLOAD_HEADERS", "Upload-Name header is required");
  }

  try {
    return { metadata: parseLayerFilename(name), declaredName: name.trim() };
  } catch (err) {
    if (isUploadError(err) && err.code === "INVALID_FILENAME_FORMAT") {
      await abortUploadSession(deps, session, `invalid filename: ${name}`);
    }
    throw err;
  }
}

function partConflict(existing: UploadPart, offset: number, length: number): UploadError {
  return new UploadError(409, "PART_CONFLICT", "Part number already holds a different byte range", {
    details: {
      partNumber: existing.partNumber,
      existing: { offset: existing.offset, length: existing.length },
      received: { offset, length },
    },
  });
}

export async function receiveChunk(deps: IngestDeps, input: ChunkInput): Promise<ChunkResult> {
  const { sessions, storage, settings, log } = deps;
  const { uploadId, offset, length } = input;

  const session = await sessions.get(uploadId);
  if (!session || session.state === "finalized" || session.state === "aborted") {
    throw sessionNotFound(uploadId);
  }

  validateRange(session, input, settings.chunk.maxBytes);

  if (session.state === "completing") {
    // Same range again: the client is retrying a finalize it saw fail.
    const accepted = session.parts.find((p) => p.offset === offset && p.length === length);
    if (!accepted) {
      throw new UploadError(409, "UPLOAD_FINALIZATION_IN_PROGRESS", "Upload is already complete", {
        retryable: true,
      });
    }
    const result = await finalizeUpload(deps, uploadId, { overwrite: input.overwrite });
    return { status: "finalized", partNumber: accepted.partNumber, entry: result.entry };
  }

  if (session.state === "created" || !session.storageUploadHandle) {
    throw new UploadError(409, "SESSION_CONFLICT", "Upload is not ready to receive chunks", {
      retryable: true,
    });
  }

  const { metadata, declaredName } = await resolveMetadata(deps, session, input.name);

  const range = { offset, length, totalLength: session.totalLength };
  const assignment = resolvePartNumber(session.chunkSize, range, settings.chunk);

  const existing = session.parts.find((p) => p.partNumber === assignment.partNumber);
  if (existing && (existing.offset !== offset || existing.length !== length)) {
    throw partConflict(existing, offset, length);
  }

  // Re-sending a part replaces its tag; storage keeps the last write.
  const storageTag = await storage.uploadPart(
    { key: session.storageKey, uploadId: session.storageUploadHandle },
    assignment.partNumber,
    input.body
  );

  const part: UploadPart = {
    partNumber: assignment.partNumber,
    offset,
    length,
    storageTag,
    receivedAt: Date.now(),
  };

  const next = await updateSession(sessions, uploadId, settings.finalize.commitAttempts, (current) => {
    if (current.state !== "receiving") {
      throw new UploadError(409, "SESSION_CONFLICT", `Upload is ${current.state}`, {
        retryable: current.state === "completing",
        details: { uploadId, state: current.state },
      });
    }

    // Another chunk may have fixed the chunk size since we read the session.
    const recheck = resolvePartNumber(current.chunkSize, range, settings.chunk);
    if (recheck.partNumber !== part.partNumber) {
      throw new UploadError(409, "SESSION_CONFLICT", "Chunk size changed concurrently; resend the chunk", {
        retryable: true,
      });
    }

    const clash = current.parts.find((p) => p.partNumber === part.partNumber);
    if (clash && (clash.offset !== offset || clash.length !== length)) {
      throw partConflict(clash, offset, length);
    }

    return {
      patch: {
        lastActivityAt: Date.now(),
        chunkSize: current.chunkSize ?? recheck.chunkSize,
        metadata: current.metadata ?? metadata,
        declaredName: current.declaredName ?? declaredName,
      },
      part,
    };
  });

  log.debug({ uploadId, partNumber: part.partNumber, offset, length }, "Chunk accepted");

  if (coversUpload(next.parts, next.totalLength)) {
    const result = await finalizeUpload(deps, uploadId, { overwrite: input.overwrite });
    return { status: "finalized", partNumber: part.partNumber, entry: result.entry };
  }

  return {
    status: "receiving",
    partNumber: part.partNumber,
    nextExpectedOffset: contiguousOffset(next.parts),
  };
}

export async function getUploadProgress(deps: IngestDeps, uploadId: string): Promise<UploadProgress> {
  const session = await deps.sessions.get(uploadId);
  if (!session) throw sessionNotFound(uploadId);

  return {
    uploadId,
    state: session.state,
    uploadLength: session.totalLength,
    nextExpectedOffset: contiguousOffset(session.parts),
    chunkSize: session.chunkSize,
    partsReceived: session.parts.length,
    catalogEntryId: session.catalogEntryId,
    lastError: session.lastError,
  };
}
