// src/types/storage.metrics.ts

import type { FastifyBaseLogger } from "fastify";

export type StorageCallOutcome =
  | "success"
  | "auth_failed"
  | "not_found"
  | "throttled"
  | "network_error"
  | "timeout"
  | "client_error"
  | "server_error"
  | "unknown_error";

export type StorageOperation =
  | "initiate"
  | "upload_part"
  | "complete"
  | "abort"
  | "get_object"
  | "head_object"
  | "put_object"
  | "delete_object"
  | "head_bucket";

export interface StorageCallMetric {
  operation: StorageOperation;
  key: string;
  attempt: number;
  durationMs: number;
  outcome: StorageCallOutcome;
  sizeBytes?: number;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

export function recordStorageCallMetric(
  log: FastifyBaseLogger,
  metric: StorageCallMetric
) {
  if (metric.outcome === "success") {
    log.debug({ metric }, "storage.call.metric");
  } else {
    log.warn({ metric }, "storage.call.metric");
  }
}

/**
 * AWS SDK v3 errors carry `name` (the S3 error code) and
 * `$metadata.httpStatusCode`.
 */
export function extractStorageHttpStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const meta = err.$metadata;
  if (!meta || typeof meta !== "object" || !("httpStatusCode" in meta)) return undefined;
  const status = meta.httpStatusCode;
  return typeof status === "number" && Number.isFinite(status) ? status : undefined;
}

export function classifyStorageError(err: Error): StorageCallOutcome {
  const name = err.name ?? "";
  const msg = (err.message ?? "").toUpperCase();

  if (name === "AbortError" || name === "TimeoutError") return "timeout";
  if (name === "NoSuchUpload" || name === "NoSuchKey" || name === "NotFound") return "not_found";
  if (name === "SlowDown" || name === "Throttling") return "throttled";

  const status = extractStorageHttpStatus(err);
  if (status !== undefined) {
    if (status === 401 || status === 403) return "auth_failed";
    if (status === 404) return "not_found";
    if (status === 429 || status === 503) return "throttled";
    if (status >= 400 && status <= 499) return "client_error";
    if (status >= 500 && status <= 599) return "server_error";
  }

  if (
    msg.includes("ECONN") ||
    msg.includes("ENOTFOUND") ||
    msg.includes("EAI_AGAIN") ||
    msg.includes("ETIMEDOUT") ||
    msg.includes("SOCKET")
  )
    return "network_error";
  if (msg.includes("ACCESS DENIED") || msg.includes("SIGNATURE")) return "auth_failed";

  return "unknown_error";
}

/**
 * Outcomes worth another attempt under a retry policy.
 */
export function isTransientStorageOutcome(outcome: StorageCallOutcome): boolean {
  return (
    outcome === "throttled" ||
    outcome === "network_error" ||
    outcome === "timeout" ||
    outcome === "server_error" ||
    outcome === "unknown_error"
  );
}
