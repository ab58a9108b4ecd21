import { receiveChunk, type ChunkResult } from "../../src/services/upload/upload.chunk.js";
import { createUploadSession } from "../../src/services/upload/upload.session.js";
import type { UploadSession } from "../../src/types/upload.js";
import { CLIMATE_FILENAME, type TestDeps } from "./deps.js";

export function startUpload(
  deps: TestDeps,
  uploadLength: number,
  options: { filename?: string; overwrite?: boolean } = {}
): Promise<UploadSession> {
  return createUploadSession(deps, { uploadLength, owner: "user-1", ...options });
}

export function sendChunk(
  deps: TestDeps,
  uploadId: string,
  file: Buffer,
  offset: number,
  length: number,
  options: { name?: string | null; overwrite?: boolean } = {}
): Promise<ChunkResult> {
  return receiveChunk(deps, {
    uploadId,
    offset,
    length,
    declaredTotal: file.length,
    name: options.name === undefined ? CLIMATE_FILENAME : options.name,
    body: file.subarray(offset, offset + length),
    overwrite: options.overwrite,
  });
}

/** Sends the whole file in order, `chunkSize` bytes at a time. */
export async function sendAll(
  deps: TestDeps,
  uploadId: string,
  file: Buffer,
  chunkSize: number,
  options: { name?: string | null; overwrite?: boolean } = {}
): Promise<ChunkResult> {
  let result: ChunkResult | null = null;
  for (let offset = 0; offset < file.length; offset += chunkSize) {
    const length = Math.min(chunkSize, file.length - offset);
    result = await sendChunk(deps, uploadId, file, offset, length, options);
  }
  if (!result) throw new Error("empty file");
  return result;
}
