// src/store/redis.session.store.ts

import type { Redis } from "@upstash/redis";
import { z } from "zod";

import { uploadKeys } from "../state/keys.js";
import type { UploadSession } from "../types/upload.js";
import {
  applyCommit,
  sessionNotFound,
  type SessionCommit,
  type UploadSessionStore,
} from "./session.store.js";

// Returns -1 when missing, 0 on version mismatch, 1 when written.
const COMPARE_AND_SET = `
local cur = redis.call('GET', KEYS[1])
if not cur then return -1 end
local doc = cjson.decode(cur)
if tonumber(doc.version) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2], 'KEEPTTL')
return 1
`;

const REFRESH_LOCK = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('EXPIRE', KEYS[1], tonumber(ARGV[2]))
end
return 0
`;

const RELEASE_LOCK = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const LayerMetadataSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("climate"),
    crop: z.string(),
    waterModel: z.string(),
    climateModel: z.string(),
    scenario: z.string(),
    variable: z.string(),
    year: z.number().int(),
  }),
  z.object({
    kind: z.literal("crop"),
    crop: z.string(),
    variable: z.string(),
  }),
]);

const UploadPartSchema = z.object({
  partNumber: z.number().int().positive(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().positive(),
  storageTag: z.string(),
  receivedAt: z.number(),
});

const UploadSessionSchema = z.object({
  uploadId: z.string(),
  state: z.enum(["created", "receiving", "completing", "finalized", "aborted"]),
  totalLength: z.number().int().positive(),
  contentType: z.string(),
  owner: z.string().nullable(),
  storageKey: z.string(),
  storageUploadHandle: z.string().nullable(),
  chunkSize: z.number().int().positive().nullable(),
  parts: z.array(UploadPartSchema),
  declaredName: z.string().nullable(),
  metadata: LayerMetadataSchema.nullable(),
  overwrite: z.boolean().nullable(),
  version: z.number().int().nonnegative(),
  createdAt: z.number(),
  lastActivityAt: z.number(),
  storageCompletedAt: z.number().nullable(),
  conversion: z
    .object({
      storageKey: z.string(),
      byteSize: z.number().int().nonnegative(),
      minValue: z.number(),
      maxValue: z.number(),
      globalAverage: z.number().nullable(),
    })
    .nullable(),
  catalogEntryId: z.string().nullable(),
  lastError: z.string().nullable(),
}) satisfies z.ZodType<UploadSession>;

const ScriptResult = z.coerce.number().int();

function parseSession(uploadId: string, raw: string): UploadSession {
  const parsed = UploadSessionSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`CORRUPT_UPLOAD_SESSION: ${uploadId}`);
  }
  return parsed.data;
}

/**
 * One JSON document per session; `version` inside the document is the
 * compare-and-set token for every mutation.
 */
export class RedisSessionStore implements UploadSessionStore {
  constructor(private readonly redis: Redis) {}

  async create(session: UploadSession): Promise<void> {
    const tx = await this.redis
      .multi()
      .set(uploadKeys.session(session.uploadId), JSON.stringify(session), { nx: true })
      .sadd(uploadKeys.gcIndex(), session.uploadId)
      .exec();

    if (!tx) {
      throw new Error("REDIS_TRANSACTION_FAILED");
    }
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const raw = await this.redis.get<string>(uploadKeys.session(uploadId));
    if (raw === null || raw === undefined) return null;
    return parseSession(uploadId, raw);
  }

  async commit(current: UploadSession, change: SessionCommit): Promise<UploadSession | null> {
    const next = applyCommit(current, change);

    const result = ScriptResult.parse(
      await this.redis.eval(
        COMPARE_AND_SET,
        [uploadKeys.session(current.uploadId)],
        [String(current.version), JSON.stringify(next)]
      )
    );

    if (result === -1) throw sessionNotFound(current.uploadId);
    return result === 1 ? next : null;
  }

  async listActive(): Promise<string[]> {
    return this.redis.smembers(uploadKeys.gcIndex());
  }

  async countActive(): Promise<number> {
    return this.redis.scard(uploadKeys.gcIndex());
  }

  async removeFromIndex(uploadId: string): Promise<void> {
    await this.redis.srem(uploadKeys.gcIndex(), uploadId);
  }

  async archive(uploadId: string, retentionSeconds: number): Promise<void> {
    const tx = await this.redis
      .multi()
      .expire(uploadKeys.session(uploadId), retentionSeconds)
      .srem(uploadKeys.gcIndex(), uploadId)
      .exec();

    if (!tx) {
      throw new Error("REDIS_TRANSACTION_FAILED");
    }
  }

  async acquireLock(uploadId: string, token: string, ttlSeconds: number): Promise<boolean> {
    const ok = await this.redis.set(uploadKeys.lock(uploadId), token, {
      nx: true,
      ex: ttlSeconds,
    });
    return ok !== null;
  }

  async refreshLock(uploadId: string, token: string, ttlSeconds: number): Promise<boolean> {
    const result = ScriptResult.parse(
      await this.redis.eval(REFRESH_LOCK, [uploadKeys.lock(uploadId)], [token, String(ttlSeconds)])
    );
    return result === 1;
  }

  async releaseLock(uploadId: string, token: string): Promise<void> {
    await this.redis.eval(RELEASE_LOCK, [uploadKeys.lock(uploadId)], [token]);
  }

  async isLocked(uploadId: string): Promise<boolean> {
    return (await this.redis.exists(uploadKeys.lock(uploadId))) === 1;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
