// src/config/uploads.config.ts
import os from "os";
import path from "path";

import { parseBooleanEnv, parsePositiveIntEnv } from "./env.js";

export const UploadConfig = {
  tmpDir: path.resolve(
    process.env.UPLOAD_TMP_DIR ?? path.join(os.tmpdir(), "layer-ingest")
  ),

  maxFileSizeBytes: 15 * 1024 * 1024 * 1024, // 15 GB
  maxActiveUploads: parsePositiveIntEnv("MAX_ACTIVE_UPLOADS", 100),
  sessionTtlMs: parsePositiveIntEnv("UPLOAD_SESSION_TTL_MS", 6 * 60 * 60 * 1000), // 6 hours

  // Finalized/aborted sessions stay readable for STATUS this long.
  archiveRetentionSeconds: parsePositiveIntEnv("UPLOAD_ARCHIVE_RETENTION_SECONDS", 24 * 60 * 60),

  overwriteDuplicates: parseBooleanEnv("OVERWRITE_DUPLICATES", false),
};

export const ChunkConfig = {
  // S3 rejects non-final parts under 5 MiB at completion time.
  minBytes: parsePositiveIntEnv("CHUNK_MIN_BYTES", 5 * 1024 * 1024),
  maxBytes: parsePositiveIntEnv("CHUNK_MAX_BYTES", 100 * 1024 * 1024),
  maxParts: 10_000,
};

export const FinalizeConfig = {
  lockTtlSeconds: 15 * 60,
  lockRefreshIntervalMs: 60_000,

  // Version-conflict retries for a single session commit.
  commitAttempts: 8,
};

export const ReaperConfig = {
  intervalMs: parsePositiveIntEnv("REAPER_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
};

export type UploadSettings = {
  upload: typeof UploadConfig;
  chunk: typeof ChunkConfig;
  finalize: typeof FinalizeConfig;
  reaper: typeof ReaperConfig;
};

export const uploadSettings: UploadSettings = {
  upload: UploadConfig,
  chunk: ChunkConfig,
  finalize: FinalizeConfig,
  reaper: ReaperConfig,
};
