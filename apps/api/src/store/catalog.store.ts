// src/store/catalog.store.ts

import type { CatalogEntry, NewCatalogEntry } from "../types/catalog.js";

export interface CatalogStore {
  findByMetadataKey(metadataKey: string): Promise<CatalogEntry | null>;
  get(entryId: string): Promise<CatalogEntry | null>;

  /**
   * Claims `metadataKey` atomically; throws DUPLICATE_ENTRY when another
   * entry already holds it.
   */
  create(metadataKey: string, input: NewCatalogEntry): Promise<CatalogEntry>;

  /**
   * Removes the entry and releases its metadata key. Returns the removed
   * entry, or null if it was already gone.
   */
  delete(entryId: string, metadataKey: string): Promise<CatalogEntry | null>;

  ping(): Promise<void>;
}
