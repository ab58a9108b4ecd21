// src/services/raster/raster.limiter.ts

import PQueue from "p-queue";
import { RasterQueueLimits } from "../../config/raster.config.js";

export function createRasterQueue(concurrency = RasterQueueLimits.concurrency): PQueue {
  return new PQueue({ concurrency });
}
