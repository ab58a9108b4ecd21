// src/config/catalog.config.ts

import type { RetryPolicy } from "../utils/retry.js";
import { parseBooleanEnv, parsePositiveIntEnv } from "./env.js";

export const CatalogConfig = {
  enableOnUpload: parseBooleanEnv("CATALOG_ENABLE_ON_UPLOAD", false),
};

export const CatalogRetryLimits: RetryPolicy = {
  maxAttempts: parsePositiveIntEnv("CATALOG_ATTEMPTS", 3),
  baseDelayMs: 200,
  maxDelayMs: 2_000,
};
