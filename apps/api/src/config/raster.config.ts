// src/config/raster.config.ts

import { parsePositiveIntEnv } from "./env.js";

export const RasterToolConfig = {
  gdalTranslateBin: process.env.GDAL_TRANSLATE_BIN?.trim() || "gdal_translate",
  gdalInfoBin: process.env.GDAL_INFO_BIN?.trim() || "gdalinfo",

  timeoutMs: parsePositiveIntEnv("GDAL_TIMEOUT_MS", 30 * 60_000),

  // Overviews stay off: tiles are rendered on demand from the full-resolution data.
  cogCreationOptions: [
    "OVERVIEWS=NONE",
    "COMPRESS=LZW",
    "BLOCKSIZE=512",
  ],
};

export const RasterQueueLimits = {
  /**
   * Max concurrent conversions (each holds a raw + converted copy on disk).
   */
  concurrency: parsePositiveIntEnv("CONVERSION_CONCURRENCY", 2),
};
