// src/types/upload.ts

export type UploadState =
  | "created"
  | "receiving"
  | "completing"
  | "finalized"
  | "aborted";

export const ACTIVE_UPLOAD_STATES: ReadonlySet<UploadState> = new Set([
  "created",
  "receiving",
  "completing",
]);

export interface ClimateLayerMetadata {
  kind: "climate";
  crop: string;
  waterModel: string;
  climateModel: string;
  scenario: string;
  variable: string;
  year: number;
}

export interface CropLayerMetadata {
  kind: "crop";
  crop: string;
  variable: string;
}

export type LayerMetadata = ClimateLayerMetadata | CropLayerMetadata;

export interface UploadPart {
  partNumber: number;
  offset: number;
  length: number;
  storageTag: string;
  receivedAt: number;
}

export interface ConversionResult {
  storageKey: string;
  byteSize: number;
  minValue: number;
  maxValue: number;
  globalAverage: number | null;
}

export interface UploadSession {
  uploadId: string;
  state: UploadState;
  totalLength: number;
  contentType: string;
  owner: string | null;

  storageKey: string;
  storageUploadHandle: string | null;

  chunkSize: number | null;
  parts: UploadPart[];

  declaredName: string | null;
  metadata: LayerMetadata | null;
  overwrite: boolean | null;

  version: number;
  createdAt: number;
  lastActivityAt: number;

  // Finalize checkpoints
  storageCompletedAt: number | null;
  conversion: ConversionResult | null;
  catalogEntryId: string | null;
  lastError: string | null;
}

/**
 * Fields a commit may change. `parts` is never patched wholesale; a commit
 * carries at most one part upsert.
 */
export type SessionPatch = Partial<
  Omit<UploadSession, "uploadId" | "parts" | "version" | "createdAt" | "totalLength" | "storageKey">
>;

export interface UploadProgress {
  uploadId: string;
  state: UploadState;
  uploadLength: number;
  nextExpectedOffset: number;
  chunkSize: number | null;
  partsReceived: number;
  catalogEntryId: string | null;
  lastError: string | null;
}
