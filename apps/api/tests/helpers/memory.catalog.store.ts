import crypto from "crypto";

import type { CatalogStore } from "../../src/store/catalog.store.js";
import type { CatalogEntry, NewCatalogEntry } from "../../src/types/catalog.js";
import { UploadError } from "../../src/utils/apiError.js";

export class MemoryCatalogStore implements CatalogStore {
  readonly entries = new Map<string, CatalogEntry>();
  readonly claims = new Map<string, string>();
  // Errors thrown by the next create() calls, in order.
  readonly createFailures: Error[] = [];
  createCalls = 0;

  async findByMetadataKey(metadataKey: string): Promise<CatalogEntry | null> {
    const id = this.claims.get(metadataKey);
    return id ? this.entries.get(id) ?? null : null;
  }

  async get(entryId: string): Promise<CatalogEntry | null> {
    return this.entries.get(entryId) ?? null;
  }

  async create(metadataKey: string, input: NewCatalogEntry): Promise<CatalogEntry> {
    this.createCalls++;
    const failure = this.createFailures.shift();
    if (failure) throw failure;

    if (this.claims.has(metadataKey)) {
      throw new UploadError(409, "DUPLICATE_ENTRY", "A layer with this metadata already exists");
    }

    const entry: CatalogEntry = { ...input, id: crypto.randomUUID(), uploadedAt: Date.now() };
    this.claims.set(metadataKey, entry.id);
    this.entries.set(entry.id, entry);
    return entry;
  }

  async delete(entryId: string, metadataKey: string): Promise<CatalogEntry | null> {
    const entry = this.entries.get(entryId) ?? null;
    this.entries.delete(entryId);
    if (this.claims.get(metadataKey) === entryId) this.claims.delete(metadataKey);
    return entry;
  }

  async ping(): Promise<void> {}
}
