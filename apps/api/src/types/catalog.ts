// src/types/catalog.ts

export interface CatalogEntry {
  id: string;
  layerName: string;
  filename: string;

  crop: string;
  waterModel: string | null;
  climateModel: string | null;
  scenario: string | null;
  variable: string;
  year: number | null;
  isCropSpecific: boolean;

  storageKey: string;
  byteSize: number;
  minValue: number;
  maxValue: number;
  globalAverage: number | null;

  enabled: boolean;
  uploadedAt: number;
  uploadId: string;
  owner: string | null;
}

export type NewCatalogEntry = Omit<CatalogEntry, "id" | "uploadedAt">;
