// src/store/redis.catalog.store.ts

import crypto from "crypto";
import type { Redis } from "@upstash/redis";
import { z } from "zod";

import { catalogKeys } from "../state/keys.js";
import type { CatalogEntry, NewCatalogEntry } from "../types/catalog.js";
import { UploadError } from "../utils/apiError.js";
import type { CatalogStore } from "./catalog.store.js";

const RELEASE_CLAIM = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const CatalogEntrySchema = z.object({
  id: z.string(),
  layerName: z.string(),
  filename: z.string(),
  crop: z.string(),
  waterModel: z.string().nullable(),
  climateModel: z.string().nullable(),
  scenario: z.string().nullable(),
  variable: z.string(),
  year: z.number().int().nullable(),
  isCropSpecific: z.boolean(),
  storageKey: z.string(),
  byteSize: z.number().int().nonnegative(),
  minValue: z.number(),
  maxValue: z.number(),
  globalAverage: z.number().nullable(),
  enabled: z.boolean(),
  uploadedAt: z.number(),
  uploadId: z.string(),
  owner: z.string().nullable(),
}) satisfies z.ZodType<CatalogEntry>;

export class RedisCatalogStore implements CatalogStore {
  constructor(private readonly redis: Redis) {}

  async get(entryId: string): Promise<CatalogEntry | null> {
    const raw = await this.redis.get<string>(catalogKeys.entry(entryId));
    if (raw === null || raw === undefined) return null;

    const parsed = CatalogEntrySchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`CORRUPT_CATALOG_ENTRY: ${entryId}`);
    }
    return parsed.data;
  }

  async findByMetadataKey(metadataKey: string): Promise<CatalogEntry | null> {
    const entryId = await this.redis.get<string>(catalogKeys.byMetadata(metadataKey));
    if (!entryId) return null;
    return this.get(entryId);
  }

  async create(metadataKey: string, input: NewCatalogEntry): Promise<CatalogEntry> {
    const entry: CatalogEntry = {
      ...input,
      id: crypto.randomUUID(),
      uploadedAt: Date.now(),
    };

    const claimed = await this.redis.set(catalogKeys.byMetadata(metadataKey), entry.id, {
      nx: true,
    });
    if (claimed === null) {
      const holder = await this.redis.get<string>(catalogKeys.byMetadata(metadataKey));
      throw new UploadError(409, "DUPLICATE_ENTRY", "A layer with this metadata already exists", {
        details: { layerName: entry.layerName, existingEntryId: holder },
      });
    }

    try {
      const tx = await this.redis
        .multi()
        .set(catalogKeys.entry(entry.id), JSON.stringify(entry))
        .sadd(catalogKeys.all(), entry.id)
        .exec();

      if (!tx) {
        throw new Error("REDIS_CATALOG_CREATE_FAILED");
      }
    } catch (err) {
      await this.redis.eval(RELEASE_CLAIM, [catalogKeys.byMetadata(metadataKey)], [entry.id]);
      throw err;
    }

    return entry;
  }

  async delete(entryId: string, metadataKey: string): Promise<CatalogEntry | null> {
    const entry = await this.get(entryId);

    await this.redis
      .multi()
      .del(catalogKeys.entry(entryId))
      .srem(catalogKeys.all(), entryId)
      .exec();
    await this.redis.eval(RELEASE_CLAIM, [catalogKeys.byMetadata(metadataKey)], [entryId]);

    return entry;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
