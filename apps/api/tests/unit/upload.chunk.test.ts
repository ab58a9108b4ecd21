import { beforeEach, describe, expect, it } from "vitest";

import { getUploadProgress, receiveChunk } from "../../src/services/upload/upload.chunk.js";
import { UploadError } from "../../src/utils/apiError.js";
import { CLIMATE_FILENAME, CLIMATE_LAYER, fileBytes, makeDeps, type TestDeps } from "../helpers/deps.js";
import { sendAll, sendChunk, startUpload } from "../helpers/uploads.js";

describe("createUploadSession", () => {
  let deps: TestDeps;

  beforeEach(() => {
    deps = makeDeps();
  });

  it("initiates a multipart upload under the inputs prefix", async () => {
    const session = await startUpload(deps, 300);

    expect(session.state).toBe("receiving");
    expect(session.storageKey).toBe(`layers/inputs/${session.uploadId}`);
    expect(session.storageUploadHandle).toBe("mpu-1");
    expect(session.owner).toBe("user-1");
    expect(deps.storage.callsOf("initiate")).toEqual([
      { method: "initiate", key: `layers/inputs/${session.uploadId}`, partNumber: undefined },
    ]);
    expect(await deps.sessions.listActive()).toEqual([session.uploadId]);
  });

  it("validates a filename given at creation before touching storage", async () => {
    await expect(startUpload(deps, 300, { filename: "wheat_nothing.tif" })).rejects.toMatchObject({
      statusCode: 400,
      code: "INVALID_FILENAME_FORMAT",
    });
    expect(deps.storage.calls).toEqual([]);
    expect(deps.sessions.records.size).toBe(0);
  });

  it("rejects bad lengths", async () => {
    await expect(startUpload(deps, 0)).rejects.toMatchObject({ code: "INVALID_UPLOAD_LENGTH" });
    await expect(startUpload(deps, 1.5)).rejects.toMatchObject({ code: "INVALID_UPLOAD_LENGTH" });
    await expect(startUpload(deps, 1_000_001)).rejects.toMatchObject({
      statusCode: 413,
      code: "FILE_TOO_LARGE",
    });
  });

  it("enforces the active upload capacity", async () => {
    for (let i = 0; i < 5; i++) await startUpload(deps, 300);

    await expect(startUpload(deps, 300)).rejects.toMatchObject({
      statusCode: 429,
      code: "UPLOAD_CAPACITY_REACHED",
      retryable: true,
    });
  });

  it("aborts the session when initiation fails", async () => {
    deps.storage.failNext.set(
      "initiate",
      new UploadError(502, "STORAGE_UPLOAD_FAILURE", "storage down", { retryable: true })
    );

    await expect(startUpload(deps, 300)).rejects.toMatchObject({ code: "STORAGE_UPLOAD_FAILURE" });

    const [session] = [...deps.sessions.records.values()];
    expect(session.state).toBe("aborted");
    expect(deps.sessions.archived.get(session.uploadId)).toBe(60);
    expect(await deps.sessions.countActive()).toBe(0);
  });
});

describe("receiveChunk", () => {
  let deps: TestDeps;
  const file = fileBytes(300);

  beforeEach(() => {
    deps = makeDeps();
  });

  it("uploads three chunks and finalizes on the last one", async () => {
    const { uploadId } = await startUpload(deps, 300);

    expect(await sendChunk(deps, uploadId, file, 0, 100)).toEqual({
      status: "receiving",
      partNumber: 1,
      nextExpectedOffset: 100,
    });
    expect(await sendChunk(deps, uploadId, file, 100, 100)).toEqual({
      status: "receiving",
      partNumber: 2,
      nextExpectedOffset: 200,
    });

    const last = await sendChunk(deps, uploadId, file, 200, 100);
    if (last.status !== "finalized") throw new Error("expected finalized");

    expect(last.partNumber).toBe(3);
    expect(last.entry).toMatchObject({
      layerName: CLIMATE_LAYER,
      filename: `${CLIMATE_LAYER}.tif`,
      crop: "wheat",
      waterModel: "pcr-globwb",
      climateModel: "gfdl-esm2m",
      scenario: "rcp26",
      variable: "vwc",
      year: 2050,
      isCropSpecific: false,
      storageKey: `layers/${CLIMATE_LAYER}.tif`,
      byteSize: 300,
      minValue: 0,
      maxValue: 42.5,
      globalAverage: 7.25,
      enabled: false,
      uploadId,
      owner: "user-1",
    });

    expect(deps.storage.objects.get(`layers/${CLIMATE_LAYER}.tif`)).toEqual(file);
    expect(deps.storage.objects.has(`layers/inputs/${uploadId}`)).toBe(false);
    expect(deps.storage.callsOf("complete")).toHaveLength(1);

    const progress = await getUploadProgress(deps, uploadId);
    expect(progress).toEqual({
      uploadId,
      state: "finalized",
      uploadLength: 300,
      nextExpectedOffset: 300,
      chunkSize: 100,
      partsReceived: 3,
      catalogEntryId: last.entry.id,
      lastError: null,
    });
    expect(deps.sessions.archived.has(uploadId)).toBe(true);
    expect(deps.sessions.locks.size).toBe(0);
  });

  it("accepts chunks in any order once the chunk size is known", async () => {
    const { uploadId } = await startUpload(deps, 300);

    expect(await sendChunk(deps, uploadId, file, 100, 100)).toEqual({
      status: "receiving",
      partNumber: 2,
      nextExpectedOffset: 0,
    });
    expect(await sendChunk(deps, uploadId, file, 200, 100)).toEqual({
      status: "receiving",
      partNumber: 3,
      nextExpectedOffset: 0,
    });

    const last = await sendChunk(deps, uploadId, file, 0, 100);
    expect(last.status).toBe("finalized");
    expect(deps.storage.objects.get(`layers/${CLIMATE_LAYER}.tif`)).toEqual(file);
  });

  it("asks for a retry when the short final chunk arrives first", async () => {
    const short = fileBytes(250);
    const { uploadId } = await startUpload(deps, 250);

    await expect(sendChunk(deps, uploadId, short, 200, 50)).rejects.toMatchObject({
      statusCode: 409,
      code: "CHUNK_OUT_OF_ORDER",
      retryable: true,
    });
    expect(deps.storage.callsOf("uploadPart")).toHaveLength(0);

    await sendChunk(deps, uploadId, short, 0, 100);
    await sendChunk(deps, uploadId, short, 200, 50);
    const last = await sendChunk(deps, uploadId, short, 100, 100);
    expect(last.status).toBe("finalized");
    expect(deps.storage.objects.get(`layers/${CLIMATE_LAYER}.tif`)).toEqual(short);
  });

  it("treats a resent chunk as the same part", async () => {
    const { uploadId } = await startUpload(deps, 300);

    await sendChunk(deps, uploadId, file, 0, 100);
    const again = await sendChunk(deps, uploadId, file, 0, 100);

    expect(again).toEqual({ status: "receiving", partNumber: 1, nextExpectedOffset: 100 });
    expect(deps.storage.callsOf("uploadPart")).toHaveLength(2);

    const session = await deps.sessions.get(uploadId);
    expect(session?.parts.map((p) => p.partNumber)).toEqual([1]);
  });

  it("rejects a chunk whose size differs from the established chunk size", async () => {
    const big = fileBytes(500);
    const { uploadId } = await startUpload(deps, 500);

    await sendChunk(deps, uploadId, big, 0, 100);
    await expect(sendChunk(deps, uploadId, big, 100, 200)).rejects.toMatchObject({
      statusCode: 400,
      code: "CHUNK_SIZE_MISMATCH",
    });
    expect(deps.storage.callsOf("uploadPart")).toHaveLength(1);
  });

  it("aborts the session on an invalid name without uploading the part", async () => {
    const { uploadId } = await startUpload(deps, 300);

    await expect(
      sendChunk(deps, uploadId, file, 0, 100, { name: "wheat_yield_bogus.tif" })
    ).rejects.toMatchObject({ statusCode: 400, code: "INVALID_FILENAME_FORMAT" });

    expect(deps.storage.callsOf("uploadPart")).toHaveLength(0);
    expect(deps.storage.callsOf("abort")).toHaveLength(1);

    const session = await deps.sessions.get(uploadId);
    expect(session?.state).toBe("aborted");
    expect(session?.lastError).toBe("invalid filename: wheat_yield_bogus.tif");

    await expect(sendChunk(deps, uploadId, file, 0, 100)).rejects.toMatchObject({
      statusCode: 404,
      code: "UPLOAD_NOT_FOUND",
    });
  });

  it("requires later chunks to carry the same name", async () => {
    const { uploadId } = await startUpload(deps, 300);
    await sendChunk(deps, uploadId, file, 0, 100);

    await expect(
      sendChunk(deps, uploadId, file, 100, 100, { name: "rice_yield.tif" })
    ).rejects.toMatchObject({ statusCode: 400, code: "UPLOAD_NAME_MISMATCH" });

    // Case differences are not a different name.
    const ok = await sendChunk(deps, uploadId, file, 100, 100, { name: CLIMATE_FILENAME.toUpperCase() });
    expect(ok).toMatchObject({ status: "receiving", partNumber: 2 });
  });

  it("uses the name given at creation when chunks carry none", async () => {
    const { uploadId } = await startUpload(deps, 300, { filename: CLIMATE_FILENAME });
    const last = await sendAll(deps, uploadId, file, 100, { name: null });
    expect(last.status).toBe("finalized");
  });

  it("requires a name when none was given at creation", async () => {
    const { uploadId } = await startUpload(deps, 300);
    await expect(sendChunk(deps, uploadId, file, 0, 100, { name: null })).rejects.toMatchObject({
      code: "INVALID_UPLOAD_HEADERS",
    });
  });

  it("leaves the session untouched when storage rejects a part", async () => {
    const { uploadId } = await startUpload(deps, 300);
    await sendChunk(deps, uploadId, file, 0, 100);
    const before = await deps.sessions.get(uploadId);

    deps.storage.failNext.set(
      "uploadPart",
      new UploadError(502, "STORAGE_UPLOAD_FAILURE", "Storage upload_part failed", { retryable: true })
    );
    await expect(sendChunk(deps, uploadId, file, 100, 100)).rejects.toMatchObject({
      statusCode: 502,
      code: "STORAGE_UPLOAD_FAILURE",
      retryable: true,
    });

    const after = await deps.sessions.get(uploadId);
    expect(after).toEqual(before);

    expect(await sendChunk(deps, uploadId, file, 100, 100)).toEqual({
      status: "receiving",
      partNumber: 2,
      nextExpectedOffset: 200,
    });
  });

  it("rejects a body shorter than its Content-Length as retryable", async () => {
    const { uploadId } = await startUpload(deps, 300);

    await expect(
      receiveChunk(deps, {
        uploadId,
        offset: 0,
        length: 100,
        declaredTotal: 300,
        name: CLIMATE_FILENAME,
        body: file.subarray(0, 60),
      })
    ).rejects.toMatchObject({ statusCode: 400, code: "INCOMPLETE_UPLOAD", retryable: true });

    expect(deps.storage.callsOf("uploadPart")).toHaveLength(0);
    expect((await deps.sessions.get(uploadId))?.state).toBe("receiving");
  });

  it("rejects a declared total that differs from the session", async () => {
    const { uploadId } = await startUpload(deps, 300);
    const other = fileBytes(400);

    await expect(sendChunk(deps, uploadId, other, 0, 100)).rejects.toMatchObject({
      statusCode: 400,
      code: "UPLOAD_LENGTH_MISMATCH",
    });
  });

  it("returns not found for unknown sessions", async () => {
    await expect(
      sendChunk(deps, "00000000-0000-4000-8000-000000000000", file, 0, 100)
    ).rejects.toMatchObject({ statusCode: 404, code: "UPLOAD_NOT_FOUND" });
  });

  it("retries commits that lose a version race", async () => {
    const { uploadId } = await startUpload(deps, 300);
    deps.sessions.conflicts = 2;

    expect(await sendChunk(deps, uploadId, file, 0, 100)).toMatchObject({ partNumber: 1 });

    deps.sessions.conflicts = 5;
    await expect(sendChunk(deps, uploadId, file, 100, 100)).rejects.toMatchObject({
      statusCode: 409,
      code: "SESSION_CONFLICT",
      retryable: true,
    });
  });
});
