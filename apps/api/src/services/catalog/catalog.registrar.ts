// src/services/catalog/catalog.registrar.ts

import type { CatalogEntry, NewCatalogEntry } from "../../types/catalog.js";
import type { ConversionResult, LayerMetadata, UploadSession } from "../../types/upload.js";
import { UploadError, errorMessage, isUploadError } from "../../utils/apiError.js";
import { withRetry } from "../../utils/retry.js";
import { layerName, metadataKey } from "../metadata/layer.filename.js";
import type { IngestDeps } from "../upload/upload.deps.js";

export function buildCatalogEntry(
  session: UploadSession,
  meta: LayerMetadata,
  conversion: ConversionResult,
  enabled: boolean
): NewCatalogEntry {
  const name = layerName(meta);
  const common = {
    layerName: name,
    filename: `${name}.tif`,
    crop: meta.crop,
    variable: meta.variable,
    storageKey: conversion.storageKey,
    byteSize: conversion.byteSize,
    minValue: conversion.minValue,
    maxValue: conversion.maxValue,
    globalAverage: conversion.globalAverage,
    enabled,
    uploadId: session.uploadId,
    owner: session.owner,
  };

  if (meta.kind === "crop") {
    return {
      ...common,
      waterModel: null,
      climateModel: null,
      scenario: null,
      year: null,
      isCropSpecific: true,
    };
  }

  return {
    ...common,
    waterModel: meta.waterModel,
    climateModel: meta.climateModel,
    scenario: meta.scenario,
    year: meta.year,
    isCropSpecific: false,
  };
}

/**
 * Creates the catalog entry under the metadata-key claim. Transient store
 * errors are retried; a lost claim is not.
 */
export async function registerLayer(
  deps: IngestDeps,
  session: UploadSession,
  conversion: ConversionResult
): Promise<CatalogEntry> {
  const meta = session.metadata;
  if (!meta) {
    throw new UploadError(500, "INTERNAL_ERROR", "Session has no layer metadata");
  }

  const input = buildCatalogEntry(session, meta, conversion, deps.registration.enableOnUpload);
  const key = metadataKey(meta);

  try {
    return await withRetry(
      deps.registration.retry,
      () => deps.catalog.create(key, input),
      {
        shouldRetry: (err) => !isUploadError(err),
        onRetry: (err, attempt, delayMs) =>
          deps.log.warn(
            { uploadId: session.uploadId, attempt, delayMs, err: errorMessage(err) },
            "Catalog registration failed; retrying"
          ),
      }
    );
  } catch (err) {
    if (isUploadError(err)) throw err;
    throw new UploadError(503, "CATALOG_UNAVAILABLE", "Catalog registration failed", {
      retryable: true,
      details: { reason: errorMessage(err) },
      cause: err,
    });
  }
}
