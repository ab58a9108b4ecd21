import fs from "fs";
import os from "os";
import path from "path";
import Fastify from "fastify";
import PQueue from "p-queue";

import type { UploadSettings } from "../../src/config/uploads.config.js";
import type { IngestDeps } from "../../src/services/upload/upload.deps.js";
import { FakeRasterToolkit } from "./fake.raster.js";
import { MemoryCatalogStore } from "./memory.catalog.store.js";
import { MemorySessionStore } from "./memory.session.store.js";
import { MemoryMultipartStorage } from "./memory.storage.js";

export const CLIMATE_FILENAME = "wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_2050.tif";
export const CLIMATE_LAYER = "wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_2050";

export function testSettings(tmpDir: string): UploadSettings {
  return {
    upload: {
      tmpDir,
      maxFileSizeBytes: 1_000_000,
      maxActiveUploads: 5,
      sessionTtlMs: 60_000,
      archiveRetentionSeconds: 60,
      overwriteDuplicates: false,
    },
    chunk: { minBytes: 100, maxBytes: 1_000, maxParts: 10_000 },
    finalize: { lockTtlSeconds: 60, lockRefreshIntervalMs: 60_000, commitAttempts: 5 },
    reaper: { intervalMs: 1_000 },
  };
}

export interface TestDeps extends IngestDeps {
  sessions: MemorySessionStore;
  catalog: MemoryCatalogStore;
  storage: MemoryMultipartStorage;
  raster: FakeRasterToolkit;
}

export function makeDeps(): TestDeps {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ingest-test-"));
  return {
    sessions: new MemorySessionStore(),
    catalog: new MemoryCatalogStore(),
    storage: new MemoryMultipartStorage(),
    raster: new FakeRasterToolkit(),
    rasterQueue: new PQueue({ concurrency: 1 }),
    settings: testSettings(tmpDir),
    registration: {
      enableOnUpload: false,
      retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    },
    storagePrefix: "layers",
    log: Fastify({ logger: false }).log,
  };
}

/** Deterministic bytes: byte i of the file is i % 251. */
export function fileBytes(length: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => i % 251));
}
