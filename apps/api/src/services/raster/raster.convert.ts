// src/services/raster/raster.convert.ts

import fs from "fs/promises";
import path from "path";
import { createReadStream, createWriteStream } from "fs";
import { pipeline } from "stream/promises";

import type { ConversionResult } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";
import type { IngestDeps } from "../upload/upload.deps.js";

const COG_CONTENT_TYPE = "image/tiff";

export const workDirFor = (tmpDir: string, uploadId: string) => path.join(tmpDir, uploadId);

/**
 * Downloads the raw object, converts it to a COG and uploads the result to
 * `targetKey`. Queued behind the conversion limiter.
 */
export async function convertRaster(
  deps: IngestDeps,
  input: { uploadId: string; sourceKey: string; targetKey: string }
): Promise<ConversionResult> {
  return deps.rasterQueue.add(() => runConversion(deps, input), { throwOnTimeout: true });
}

async function runConversion(
  deps: IngestDeps,
  input: { uploadId: string; sourceKey: string; targetKey: string }
): Promise<ConversionResult> {
  const { uploadId, sourceKey, targetKey } = input;
  const workDir = workDirFor(deps.settings.upload.tmpDir, uploadId);
  const inputPath = path.join(workDir, "input.tif");
  const outputPath = path.join(workDir, "output.tif");

  await fs.rm(workDir, { recursive: true, force: true });
  await fs.mkdir(workDir, { recursive: true });

  try {
    const source = await deps.storage.getObjectStream(sourceKey);
    await pipeline(source, createWriteStream(inputPath));

    const stats = await deps.raster.statistics(inputPath);
    if (!Number.isFinite(stats.minValue) || !Number.isFinite(stats.maxValue)) {
      throw new UploadError(422, "VALUE_RANGE_INVALID", "Raster value range is not finite", {
        details: { minValue: String(stats.minValue), maxValue: String(stats.maxValue) },
      });
    }

    await deps.raster.toCog(inputPath, outputPath);
    const { size } = await fs.stat(outputPath);

    await deps.storage.putObject(
      targetKey,
      () => createReadStream(outputPath),
      size,
      COG_CONTENT_TYPE
    );

    deps.log.info({ uploadId, targetKey, byteSize: size }, "Raster converted");

    return {
      storageKey: targetKey,
      byteSize: size,
      minValue: stats.minValue,
      maxValue: stats.maxValue,
      globalAverage: stats.mean,
    };
  } finally {
    await fs.rm(workDir, { recursive: true, force: true }).catch((err) => {
      deps.log.warn({ uploadId, err }, "Failed to remove conversion workdir");
    });
  }
}
