// src/services/catalog/duplicate.resolver.ts

import type { CatalogEntry } from "../../types/catalog.js";
import type { LayerMetadata } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";
import { layerName, metadataKey } from "../metadata/layer.filename.js";
import type { IngestDeps } from "../upload/upload.deps.js";

export type DuplicateResolution =
  | { kind: "none" }
  // Registered by this same upload on an earlier finalize attempt.
  | { kind: "own"; entry: CatalogEntry }
  | { kind: "replaced"; entry: CatalogEntry };

export async function resolveDuplicate(
  deps: IngestDeps,
  input: {
    uploadId: string;
    metadata: LayerMetadata;
    overwrite: boolean;
  }
): Promise<DuplicateResolution> {
  const key = metadataKey(input.metadata);
  const existing = await deps.catalog.findByMetadataKey(key);
  if (!existing) return { kind: "none" };

  if (existing.uploadId === input.uploadId) {
    return { kind: "own", entry: existing };
  }

  if (!input.overwrite) {
    throw new UploadError(409, "DUPLICATE_ENTRY", "A layer with this metadata already exists", {
      details: {
        layerName: layerName(input.metadata),
        existingEntryId: existing.id,
      },
    });
  }

  deps.log.warn(
    { uploadId: input.uploadId, replacedEntryId: existing.id, layerName: existing.layerName },
    "Overwriting existing catalog entry"
  );

  await deps.catalog.delete(existing.id, key);
  await deps.storage.deleteObject(existing.storageKey);

  return { kind: "replaced", entry: existing };
}
