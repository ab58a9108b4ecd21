// src/server.ts

import fs from "fs/promises";
import type { Redis } from "@upstash/redis";
import os from "os";
import path from "path";

import { buildApp } from "./app.js";
import { CatalogConfig, CatalogRetryLimits } from "./config/catalog.config.js";
import { readStorageEnv, type StorageEnv } from "./config/storage.config.js";
import { uploadSettings, UploadConfig } from "./config/uploads.config.js";
import { createRasterQueue } from "./services/raster/raster.limiter.js";
import { GdalRasterToolkit } from "./services/raster/raster.toolkit.js";
import { createS3Client, S3MultipartStorage } from "./services/storage/s3.multipart.storage.js";
import { initRedis } from "./state/client.js";
import { reconcileUploads } from "./state/gc/upload.gc.reconcile.js";
import { startUploadReaper, stopUploadReaper } from "./state/gc/upload.gc.scheduler.js";
import { RedisCatalogStore, RedisSessionStore } from "./store/index.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

async function validateUploadTmpDir() {
  const dir = UploadConfig.tmpDir;
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error("UPLOAD_TMP_DIR must be an absolute path");
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_TMP_DIR is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Conversions fail late on an unwritable dir; probe it before listening.
  const probe = path.join(dir, `.ingest_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

let storageEnv: StorageEnv;
let redis: Redis;
try {
  storageEnv = readStorageEnv();
} catch (err) {
  console.error("Invalid storage configuration:", err);
  process.exit(1);
}

try {
  redis = await initRedis();
} catch (err) {
  console.error("Failed to initialize Redis:", err);
  process.exit(1);
}

const { app, deps } = buildApp(
  (log) => ({
    sessions: new RedisSessionStore(redis),
    catalog: new RedisCatalogStore(redis),
    storage: new S3MultipartStorage(createS3Client(storageEnv), storageEnv.bucket, log),
    raster: new GdalRasterToolkit(),
    rasterQueue: createRasterQueue(),
    settings: uploadSettings,
    registration: { enableOnUpload: CatalogConfig.enableOnUpload, retry: CatalogRetryLimits },
    storagePrefix: storageEnv.prefix,
  }),
  {
    logger: {
      level: process.env.NODE_ENV === "production" ? "info" : "debug",
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
  }
);

try {
  await validateUploadTmpDir();
  await deps.storage.ping();
  app.log.info({ bucket: storageEnv.bucket }, "Redis and storage initialized");
} catch (err) {
  app.log.error({ err }, "Startup checks failed");
  process.exit(1);
}

await reconcileUploads(deps);
startUploadReaper(deps);

const PORT = Number(process.env.PORT ?? 3000);

try {
  await app.listen({
    port: PORT,
    host: "0.0.0.0",
  });

  app.log.info(
    { port: PORT, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error({ err }, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadReaper();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
