// src/services/storage/multipart.storage.ts

import type { Readable } from "stream";

export interface MultipartTarget {
  key: string;
  uploadId: string;
}

export interface CompletedPart {
  partNumber: number;
  storageTag: string;
}

export interface StoredObject {
  key: string;
  etag: string | null;
}

/**
 * Object storage as the ingest pipeline sees it. Implementations do not
 * retry beyond their configured policy and throw UploadError
 * (STORAGE_UPLOAD_FAILURE) on failure.
 */
export interface MultipartStorage {
  initiate(key: string, contentType: string): Promise<string>;

  /**
   * Uploading the same part number again replaces the previous tag.
   */
  uploadPart(target: MultipartTarget, partNumber: number, body: Buffer): Promise<string>;

  complete(target: MultipartTarget, parts: CompletedPart[]): Promise<StoredObject>;

  /**
   * Succeeds when the backend no longer knows the upload.
   */
  abort(target: MultipartTarget): Promise<void>;

  getObjectStream(key: string): Promise<Readable>;

  objectExists(key: string): Promise<boolean>;

  /**
   * `streamFactory` is called once per attempt.
   */
  putObject(
    key: string,
    streamFactory: () => Readable,
    sizeBytes: number,
    contentType: string
  ): Promise<void>;

  deleteObject(key: string): Promise<void>;

  ping(): Promise<void>;
}
