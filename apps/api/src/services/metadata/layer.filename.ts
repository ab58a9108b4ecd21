// src/services/metadata/layer.filename.ts

import { vocabularies as defaultVocabularies, type Vocabularies } from "../../config/vocabularies.js";
import type { LayerMetadata } from "../../types/upload.js";
import { UploadError } from "../../utils/apiError.js";

const DELIMITER = "_";
const RASTER_EXTENSIONS = [".tif", ".tiff"];

const CLIMATE_ARITY = 6;
const CLIMATE_WITH_UNIT_ARITY = 7;
const CROP_MIN_ARITY = 2;
const CROP_MAX_ARITY = 5;

const EXPECTED_FORMATS =
  "{crop}_{watermodel}_{climatemodel}_{scenario}_{variable}_{year}.tif, " +
  "{crop}_{watermodel}_{climatemodel}_{scenario}_{variable}_perc_{year}.tif " +
  "or {crop}_{crop_variable}.tif";

function invalid(message: string, details?: Record<string, unknown>): UploadError {
  return new UploadError(400, "INVALID_FILENAME_FORMAT", message, { details });
}

function requireTerm(
  set: ReadonlySet<string>,
  field: string,
  value: string
) {
  if (!set.has(value)) {
    throw invalid(`Invalid ${field} '${value}' in filename`, {
      field,
      value,
      allowed: [...set],
    });
  }
}

function parseYear(token: string): number {
  if (!/^\d{4}$/.test(token)) {
    throw invalid(`Invalid year '${token}' in filename`, { field: "year", value: token });
  }
  return Number(token);
}

/**
 * Lower-cases the name, requires a GeoTIFF extension and returns the stem.
 */
export function filenameStem(filename: string): string {
  const lower = filename.trim().toLowerCase();
  const ext = RASTER_EXTENSIONS.find((e) => lower.endsWith(e));
  if (!ext) {
    throw invalid("Filename must end with .tif", { filename });
  }

  const stem = lower.slice(0, -ext.length);
  if (!stem || stem.includes("/") || stem.includes("\\")) {
    throw invalid("Filename stem is empty or contains a path", { filename });
  }
  return stem;
}

export function parseLayerFilename(
  filename: string,
  vocab: Vocabularies = defaultVocabularies
): LayerMetadata {
  const tokens = filenameStem(filename).split(DELIMITER);

  if (tokens.some((t) => t.length === 0)) {
    throw invalid(`Invalid filename format. Expected ${EXPECTED_FORMATS}`, { filename });
  }

  if (tokens.length === CLIMATE_ARITY || tokens.length === CLIMATE_WITH_UNIT_ARITY) {
    const [crop, waterModel, climateModel, scenario, baseVariable] = tokens;

    let variable = baseVariable;
    if (tokens.length === CLIMATE_WITH_UNIT_ARITY) {
      const unit = tokens[5];
      if (!vocab.variableUnits.has(unit)) {
        throw invalid(`Unsupported unit '${unit}' in filename`, { field: "unit", value: unit });
      }
      variable = `${baseVariable}_${unit}`;
    }

    requireTerm(vocab.crops, "crop", crop);
    requireTerm(vocab.waterModels, "water model", waterModel);
    requireTerm(vocab.climateModels, "climate model", climateModel);
    requireTerm(vocab.scenarios, "scenario", scenario);
    requireTerm(vocab.variables, "variable", variable);

    return {
      kind: "climate",
      crop,
      waterModel,
      climateModel,
      scenario,
      variable,
      year: parseYear(tokens[tokens.length - 1]),
    };
  }

  if (tokens.length >= CROP_MIN_ARITY && tokens.length <= CROP_MAX_ARITY) {
    const [crop, ...rest] = tokens;
    const variable = rest.join(DELIMITER);

    requireTerm(vocab.crops, "crop", crop);
    requireTerm(vocab.cropVariables, "crop variable", variable);

    return { kind: "crop", crop, variable };
  }

  throw invalid(`Invalid filename format. Expected ${EXPECTED_FORMATS}`, {
    filename,
    tokens: tokens.length,
  });
}

export function layerName(meta: LayerMetadata): string {
  if (meta.kind === "crop") {
    return [meta.crop, meta.variable].join(DELIMITER);
  }
  return [
    meta.crop,
    meta.waterModel,
    meta.climateModel,
    meta.scenario,
    meta.variable,
    String(meta.year),
  ].join(DELIMITER);
}

/**
 * Exact-match identity of a logical dataset. Every enumerated field takes
 * part, so two uploads collide only when all of them agree.
 */
export function metadataKey(meta: LayerMetadata): string {
  if (meta.kind === "crop") {
    return `crop:${meta.crop}:${meta.variable}`;
  }
  return [
    "climate",
    meta.crop,
    meta.waterModel,
    meta.climateModel,
    meta.scenario,
    meta.variable,
    meta.year,
  ].join(":");
}
