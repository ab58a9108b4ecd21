import { describe, expect, it } from "vitest";

import { buildVocabularies } from "../../src/config/vocabularies.js";
import {
  filenameStem,
  layerName,
  metadataKey,
  parseLayerFilename,
} from "../../src/services/metadata/layer.filename.js";
import { UploadError } from "../../src/utils/apiError.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof UploadError ? err.code : "NOT_AN_UPLOAD_ERROR";
  }
  return undefined;
}

describe("filenameStem", () => {
  it("lower-cases and strips .tif and .tiff", () => {
    expect(filenameStem("Wheat_Yield.TIF")).toBe("wheat_yield");
    expect(filenameStem("maize_production.tiff")).toBe("maize_production");
  });

  it("rejects other extensions and path-like names", () => {
    expect(codeOf(() => filenameStem("wheat_yield.png"))).toBe("INVALID_FILENAME_FORMAT");
    expect(codeOf(() => filenameStem(".tif"))).toBe("INVALID_FILENAME_FORMAT");
    expect(codeOf(() => filenameStem("dir/wheat_yield.tif"))).toBe("INVALID_FILENAME_FORMAT");
  });
});

describe("parseLayerFilename", () => {
  it("parses a six-token climate layer", () => {
    expect(parseLayerFilename("wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_2050.tif")).toEqual({
      kind: "climate",
      crop: "wheat",
      waterModel: "pcr-globwb",
      climateModel: "gfdl-esm2m",
      scenario: "rcp26",
      variable: "vwc",
      year: 2050,
    });
  });

  it("merges the perc unit into the variable", () => {
    const meta = parseLayerFilename("maize_lpjml_miroc5_rcp85_vwcb_perc_2085.tif");
    expect(meta).toEqual({
      kind: "climate",
      crop: "maize",
      waterModel: "lpjml",
      climateModel: "miroc5",
      scenario: "rcp85",
      variable: "vwcb_perc",
      year: 2085,
    });
  });

  it("accepts percentage yields", () => {
    expect(parseLayerFilename("rice_lpjml_gfdl-esm4_historical_yield_perc_2020.tif")).toEqual({
      kind: "climate",
      crop: "rice",
      waterModel: "lpjml",
      climateModel: "gfdl-esm4",
      scenario: "historical",
      variable: "yield_perc",
      year: 2020,
    });
  });

  it("rejects an unknown unit", () => {
    expect(codeOf(() => parseLayerFilename("maize_lpjml_miroc5_rcp85_vwcb_pct_2085.tif"))).toBe(
      "INVALID_FILENAME_FORMAT"
    );
  });

  it("parses crop-specific layers whose variable spans several tokens", () => {
    expect(parseLayerFilename("rice_mirca_area_irrigated.tif")).toEqual({
      kind: "crop",
      crop: "rice",
      variable: "mirca_area_irrigated",
    });
    expect(parseLayerFilename("Soy_Yield.tif")).toEqual({ kind: "crop", crop: "soy", variable: "yield" });
  });

  it("rejects values outside the vocabularies", () => {
    expect(codeOf(() => parseLayerFilename("oats_yield.tif"))).toBe("INVALID_FILENAME_FORMAT");
    expect(codeOf(() => parseLayerFilename("wheat_pcr-globwb_gfdl-esm2m_rcp45_vwc_2050.tif"))).toBe(
      "INVALID_FILENAME_FORMAT"
    );
    expect(codeOf(() => parseLayerFilename("wheat_vwc.tif"))).toBe("INVALID_FILENAME_FORMAT");
  });

  it("requires a four-digit year", () => {
    expect(codeOf(() => parseLayerFilename("wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_205.tif"))).toBe(
      "INVALID_FILENAME_FORMAT"
    );
    expect(codeOf(() => parseLayerFilename("wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_20x0.tif"))).toBe(
      "INVALID_FILENAME_FORMAT"
    );
  });

  it("rejects single tokens, empty tokens and too many tokens", () => {
    expect(codeOf(() => parseLayerFilename("wheat.tif"))).toBe("INVALID_FILENAME_FORMAT");
    expect(codeOf(() => parseLayerFilename("wheat__yield.tif"))).toBe("INVALID_FILENAME_FORMAT");
    expect(codeOf(() => parseLayerFilename("a_b_c_d_e_f_g_h.tif"))).toBe("INVALID_FILENAME_FORMAT");
  });

  it("reports the offending field", () => {
    try {
      parseLayerFilename("wheat_pcr-globwb_unknown-gcm_rcp26_vwc_2050.tif");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UploadError);
      if (err instanceof UploadError) {
        expect(err.statusCode).toBe(400);
        expect(err.details?.field).toBe("climate model");
        expect(err.details?.value).toBe("unknown-gcm");
      }
    }
  });

  it("validates against injected vocabularies", () => {
    const vocab = buildVocabularies({
      crops: ["Millet"],
      waterModels: [],
      climateModels: [],
      scenarios: [],
      variables: [],
      variableUnits: [],
      cropVariables: ["yield"],
    });
    expect(parseLayerFilename("millet_yield.tif", vocab)).toEqual({
      kind: "crop",
      crop: "millet",
      variable: "yield",
    });
    expect(codeOf(() => parseLayerFilename("wheat_yield.tif", vocab))).toBe("INVALID_FILENAME_FORMAT");
  });
});

describe("layer identity", () => {
  it("derives layer names and metadata keys from every field", () => {
    const climate = parseLayerFilename("wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_perc_2050.tif");
    expect(layerName(climate)).toBe("wheat_pcr-globwb_gfdl-esm2m_rcp26_vwc_perc_2050");
    expect(metadataKey(climate)).toBe("climate:wheat:pcr-globwb:gfdl-esm2m:rcp26:vwc_perc:2050");

    const crop = parseLayerFilename("rice_mirca_rainfed.tif");
    expect(layerName(crop)).toBe("rice_mirca_rainfed");
    expect(metadataKey(crop)).toBe("crop:rice:mirca_rainfed");
  });
});
