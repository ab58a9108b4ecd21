// src/state/client.ts

import { Redis } from "@upstash/redis";

import { assertHttpUrl, requireEnv } from "../config/env.js";

let redis: Redis | null = null;

export async function initRedis(): Promise<Redis> {
  if (redis) return redis;

  const url = requireEnv("UPSTASH_REDIS_REST_URL");
  const token = requireEnv("UPSTASH_REDIS_REST_TOKEN");
  assertHttpUrl("UPSTASH_REDIS_REST_URL", url);

  const client = new Redis({
    url,
    token,
    // Stores parse their own records with zod.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  redis = client;
  return redis;
}

export function getRedis(): Redis {
  if (!redis) {
    throw new Error(
      "Redis not initialized. initRedis() must be awaited during startup."
    );
  }
  return redis;
}
