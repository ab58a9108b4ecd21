// src/services/raster/raster.toolkit.ts

import { execa } from "execa";
import { z } from "zod";

import { RasterToolConfig } from "../../config/raster.config.js";
import { UploadError, errorMessage } from "../../utils/apiError.js";

export interface RasterStatistics {
  minValue: number;
  maxValue: number;
  mean: number | null;
}

export interface RasterToolkit {
  toCog(inputPath: string, outputPath: string): Promise<void>;
  /** Exact band-1 statistics, no approximation. */
  statistics(path: string): Promise<RasterStatistics>;
}

const NON_FINITE: Record<string, number> = {
  nan: Number.NaN,
  inf: Number.POSITIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  "+inf": Number.POSITIVE_INFINITY,
  "-inf": Number.NEGATIVE_INFINITY,
  "-infinity": Number.NEGATIVE_INFINITY,
};

// GDAL writes non-finite doubles as strings.
const GdalNumber = z.union([
  z.number(),
  z
    .string()
    .transform((s, ctx) => {
      const value = NON_FINITE[s.trim().toLowerCase()] ?? Number(s);
      if (Number.isNaN(value) && s.trim().toLowerCase() !== "nan") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${s}` });
        return z.NEVER;
      }
      return value;
    }),
]);

const GdalInfoSchema = z.object({
  bands: z
    .array(
      z.object({
        band: z.number().int(),
        computedMin: GdalNumber.optional(),
        computedMax: GdalNumber.optional(),
        minimum: GdalNumber.optional(),
        maximum: GdalNumber.optional(),
        mean: GdalNumber.optional(),
      })
    )
    .min(1),
});

/**
 * Reads band-1 min/max/mean out of `gdalinfo -json -mm -stats` output.
 * Computed (-mm) values win over the -stats ones.
 */
export function parseBandStatistics(stdout: string): RasterStatistics {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (err) {
    throw conversionFailed("gdalinfo returned invalid JSON", err);
  }

  const parsed = GdalInfoSchema.safeParse(json);
  if (!parsed.success) {
    throw conversionFailed("gdalinfo output has no usable band", parsed.error);
  }

  const band = parsed.data.bands.find((b) => b.band === 1) ?? parsed.data.bands[0];
  const minValue = band.computedMin ?? band.minimum;
  const maxValue = band.computedMax ?? band.maximum;

  if (minValue === undefined || maxValue === undefined) {
    throw conversionFailed("gdalinfo reported no band statistics");
  }

  const mean = band.mean !== undefined && Number.isFinite(band.mean) ? band.mean : null;
  return { minValue, maxValue, mean };
}

function conversionFailed(message: string, cause?: unknown): UploadError {
  return new UploadError(500, "CONVERSION_FAILED", message, {
    details: cause === undefined ? undefined : { reason: errorMessage(cause) },
    cause,
  });
}

export class GdalRasterToolkit implements RasterToolkit {
  constructor(private readonly config: typeof RasterToolConfig = RasterToolConfig) {}

  async toCog(inputPath: string, outputPath: string): Promise<void> {
    const creationOptions = this.config.cogCreationOptions.flatMap((opt) => ["-co", opt]);
    try {
      await execa(
        this.config.gdalTranslateBin,
        ["-of", "COG", ...creationOptions, inputPath, outputPath],
        { timeout: this.config.timeoutMs }
      );
    } catch (err) {
      throw conversionFailed("Cloud-optimized conversion failed", err);
    }
  }

  async statistics(path: string): Promise<RasterStatistics> {
    let stdout: string;
    try {
      const result = await execa(this.config.gdalInfoBin, ["-json", "-mm", "-stats", path], {
        timeout: this.config.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
      });
      stdout = result.stdout;
    } catch (err) {
      throw conversionFailed("Raster statistics failed", err);
    }

    return parseBandStatistics(stdout);
  }
}
