// src/services/upload/upload.parts.ts

import type { ChunkConfig } from "../../config/uploads.config.js";
import type { UploadPart } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";

export interface PartAssignment {
  partNumber: number;
  // Uniform chunk size after this chunk; null only for a whole-file chunk.
  chunkSize: number | null;
}

function invalidChunk(message: string, details: Record<string, unknown>): UploadError {
  return new UploadError(400, "INVALID_CHUNK", message, { details });
}

/**
 * Maps a byte range onto a multipart part number.
 *
 * Every non-terminal chunk has the same length L (fixed by the first one
 * accepted), so part = offset / L + 1 regardless of arrival order. The
 * terminal chunk may be shorter than L.
 */
export function resolvePartNumber(
  chunkSize: number | null,
  range: { offset: number; length: number; totalLength: number },
  limits: Pick<typeof ChunkConfig, "minBytes" | "maxParts">
): PartAssignment {
  const { offset, length, totalLength } = range;
  const terminal = offset + length === totalLength;

  let size: number;
  if (chunkSize === null) {
    if (terminal) {
      if (offset === 0) return { partNumber: 1, chunkSize: null };
      throw new UploadError(
        409,
        "CHUNK_OUT_OF_ORDER",
        "The final chunk cannot be placed before any full-size chunk is accepted",
        { retryable: true, details: { offset, length } }
      );
    }
    size = length;
  } else {
    size = chunkSize;
    if (!terminal && length !== size) {
      throw new UploadError(400, "CHUNK_SIZE_MISMATCH", "Chunk length differs from the upload's chunk size", {
        details: { offset, length, chunkSize: size },
      });
    }
    if (terminal && length > size) {
      throw new UploadError(400, "CHUNK_SIZE_MISMATCH", "Final chunk is longer than the upload's chunk size", {
        details: { offset, length, chunkSize: size },
      });
    }
  }

  if (!terminal && length < limits.minBytes) {
    throw invalidChunk("Chunk is smaller than the minimum part size", {
      length,
      minBytes: limits.minBytes,
    });
  }

  if (offset % size !== 0) {
    throw invalidChunk("Chunk offset is not aligned to the chunk size", { offset, chunkSize: size });
  }

  const partNumber = offset / size + 1;
  if (partNumber > limits.maxParts) {
    throw invalidChunk("Too many parts for one upload", { partNumber, maxParts: limits.maxParts });
  }

  return { partNumber, chunkSize: size };
}

/**
 * End of the contiguous run of parts starting at offset 0.
 */
export function contiguousOffset(parts: readonly UploadPart[]): number {
  const sorted = [...parts].sort((a, b) => a.offset - b.offset);
  let end = 0;
  for (const part of sorted) {
    if (part.offset > end) break;
    end = Math.max(end, part.offset + part.length);
  }
  return end;
}

export function coversUpload(parts: readonly UploadPart[], totalLength: number): boolean {
  return contiguousOffset(parts) >= totalLength;
}
