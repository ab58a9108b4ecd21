// src/services/upload/upload.deps.ts

import type { FastifyBaseLogger } from "fastify";
import type PQueue from "p-queue";

import type { UploadSettings } from "../../config/uploads.config.js";
import type { CatalogStore } from "../../store/catalog.store.js";
import type { UploadSessionStore } from "../../store/session.store.js";
import type { RetryPolicy } from "../../utils/retry.js";
import type { RasterToolkit } from "../raster/raster.toolkit.js";
import type { MultipartStorage } from "../storage/multipart.storage.js";

export interface RegistrationSettings {
  enableOnUpload: boolean;
  retry: RetryPolicy;
}

/**
 * Everything the ingest pipeline talks to. Built once in server.ts; tests
 * pass in-process stand-ins.
 */
export interface IngestDeps {
  sessions: UploadSessionStore;
  catalog: CatalogStore;
  storage: MultipartStorage;
  raster: RasterToolkit;
  rasterQueue: PQueue;
  settings: UploadSettings;
  registration: RegistrationSettings;
  storagePrefix: string;
  log: FastifyBaseLogger;
}
