// src/config/storage.config.ts

import type { RetryPolicy } from "../utils/retry.js";
import { assertHttpUrl, parseBooleanEnv, parsePositiveIntEnv, requireEnv } from "./env.js";

export interface StorageEnv {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
  prefix: string;
}

/**
 * Read at startup only; tests build storage stand-ins and never touch S3 env.
 */
export function readStorageEnv(): StorageEnv {
  const endpoint = process.env.S3_ENDPOINT?.trim() || undefined;
  if (endpoint) assertHttpUrl("S3_ENDPOINT", endpoint);

  return {
    bucket: requireEnv("S3_BUCKET_ID"),
    region: process.env.S3_REGION?.trim() || "eu-central-1",
    endpoint,
    accessKeyId: requireEnv("S3_ACCESS_KEY"),
    secretAccessKey: requireEnv("S3_SECRET_KEY"),
    // S3-compatible services (MinIO, Ceph) need path-style addressing.
    forcePathStyle: parseBooleanEnv("S3_FORCE_PATH_STYLE", true),
    prefix: (process.env.S3_PREFIX?.trim() || "layers").replace(/\/+$/, ""),
  };
}

export const StorageRetryLimits: Record<
  "uploadPart" | "complete" | "abort" | "object",
  RetryPolicy
> = {
  // The client owns chunk retries; one attempt keeps a failed chunk cheap.
  uploadPart: {
    maxAttempts: parsePositiveIntEnv("S3_UPLOAD_PART_ATTEMPTS", 1),
    baseDelayMs: 250,
    maxDelayMs: 2_000,
  },
  complete: {
    maxAttempts: parsePositiveIntEnv("S3_COMPLETE_ATTEMPTS", 3),
    baseDelayMs: 500,
    maxDelayMs: 5_000,
  },
  abort: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 5_000,
  },
  object: {
    maxAttempts: 3,
    baseDelayMs: 250,
    maxDelayMs: 4_000,
  },
};
