// src/services/storage/s3.multipart.storage.ts

import { Readable } from "stream";
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import type { FastifyBaseLogger } from "fastify";

import type { StorageEnv } from "../../config/storage.config.js";
import { StorageRetryLimits } from "../../config/storage.config.js";
import {
  classifyStorageError,
  extractStorageHttpStatus,
  isTransientStorageOutcome,
  recordStorageCallMetric,
  type StorageOperation,
} from "../../types/storage.metrics.js";
import { UploadError, errorMessage } from "../../utils/apiError.js";
import { withRetry, type RetryPolicy } from "../../utils/retry.js";
import type {
  CompletedPart,
  MultipartStorage,
  MultipartTarget,
  StoredObject,
} from "./multipart.storage.js";

export function createS3Client(env: StorageEnv): S3Client {
  return new S3Client({
    region: env.region,
    endpoint: env.endpoint,
    forcePathStyle: env.forcePathStyle,
    credentials: {
      accessKeyId: env.accessKeyId,
      secretAccessKey: env.secretAccessKey,
    },
  });
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class S3MultipartStorage implements MultipartStorage {
  constructor(
    private readonly s3: S3Client,
    private readonly bucket: string,
    private readonly log: FastifyBaseLogger,
    private readonly limits: typeof StorageRetryLimits = StorageRetryLimits
  ) {}

  /**
   * Runs one storage call under its retry policy, recording a metric per
   * attempt. Non-transient failures stop retrying immediately.
   */
  private async call<T>(
    operation: StorageOperation,
    key: string,
    policy: RetryPolicy,
    fn: () => Promise<T>,
    sizeBytes?: number
  ): Promise<T> {
    try {
      return await withRetry(
        policy,
        async (attempt) => {
          const start = Date.now();
          try {
            const res = await fn();
            recordStorageCallMetric(this.log, {
              operation,
              key,
              attempt,
              durationMs: Date.now() - start,
              outcome: "success",
              sizeBytes,
              timestamp: Date.now(),
            });
            return res;
          } catch (err) {
            const e = asError(err);
            recordStorageCallMetric(this.log, {
              operation,
              key,
              attempt,
              durationMs: Date.now() - start,
              outcome: classifyStorageError(e),
              sizeBytes,
              error: e.message,
              httpStatus: extractStorageHttpStatus(e),
              timestamp: Date.now(),
            });
            throw e;
          }
        },
        {
          shouldRetry: (err) => isTransientStorageOutcome(classifyStorageError(asError(err))),
        }
      );
    } catch (err) {
      if (err instanceof UploadError) throw err;
      const outcome = classifyStorageError(asError(err));
      throw new UploadError(
        502,
        "STORAGE_UPLOAD_FAILURE",
        `Storage ${operation} failed: ${errorMessage(err)}`,
        {
          retryable: isTransientStorageOutcome(outcome),
          details: { operation, outcome },
          cause: err,
        }
      );
    }
  }

  async initiate(key: string, contentType: string): Promise<string> {
    const res = await this.call("initiate", key, this.limits.complete, () =>
      this.s3.send(
        new CreateMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          ContentType: contentType,
        })
      )
    );

    if (!res.UploadId) {
      throw new UploadError(502, "STORAGE_UPLOAD_FAILURE", "Storage did not return an UploadId", {
        retryable: true,
      });
    }
    return res.UploadId;
  }

  async uploadPart(target: MultipartTarget, partNumber: number, body: Buffer): Promise<string> {
    const res = await this.call(
      "upload_part",
      target.key,
      this.limits.uploadPart,
      () =>
        this.s3.send(
          new UploadPartCommand({
            Bucket: this.bucket,
            Key: target.key,
            UploadId: target.uploadId,
            PartNumber: partNumber,
            Body: body,
            ContentLength: body.length,
          })
        ),
      body.length
    );

    if (!res.ETag) {
      throw new UploadError(502, "STORAGE_UPLOAD_FAILURE", "Storage did not return a part ETag", {
        retryable: true,
        details: { partNumber },
      });
    }
    return res.ETag;
  }

  async complete(target: MultipartTarget, parts: CompletedPart[]): Promise<StoredObject> {
    const res = await this.call("complete", target.key, this.limits.complete, () =>
      this.s3.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: target.key,
          UploadId: target.uploadId,
          MultipartUpload: {
            Parts: parts.map((p) => ({ PartNumber: p.partNumber, ETag: p.storageTag })),
          },
        })
      )
    );

    return { key: res.Key ?? target.key, etag: res.ETag ?? null };
  }

  async abort(target: MultipartTarget): Promise<void> {
    try {
      await this.call("abort", target.key, this.limits.abort, () =>
        this.s3.send(
          new AbortMultipartUploadCommand({
            Bucket: this.bucket,
            Key: target.key,
            UploadId: target.uploadId,
          })
        )
      );
    } catch (err) {
      if (err instanceof UploadError && err.details?.outcome === "not_found") {
        this.log.info({ key: target.key }, "Multipart upload already gone; abort is a no-op");
        return;
      }
      throw err;
    }
  }

  async getObjectStream(key: string): Promise<Readable> {
    const res = await this.call("get_object", key, this.limits.object, () =>
      this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
    );

    if (!(res.Body instanceof Readable)) {
      throw new UploadError(502, "STORAGE_UPLOAD_FAILURE", "Storage returned no readable body", {
        retryable: true,
        details: { key },
      });
    }
    return res.Body;
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      await this.call("head_object", key, this.limits.object, () =>
        this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }))
      );
      return true;
    } catch (err) {
      if (err instanceof UploadError && err.details?.outcome === "not_found") return false;
      throw err;
    }
  }

  async putObject(
    key: string,
    streamFactory: () => Readable,
    sizeBytes: number,
    contentType: string
  ): Promise<void> {
    await this.call(
      "put_object",
      key,
      this.limits.object,
      () =>
        this.s3.send(
          new PutObjectCommand({
            Bucket: this.bucket,
            Key: key,
            Body: streamFactory(),
            ContentLength: sizeBytes,
            ContentType: contentType,
          })
        ),
      sizeBytes
    );
  }

  async deleteObject(key: string): Promise<void> {
    await this.call("delete_object", key, this.limits.object, () =>
      this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }))
    );
  }

  async ping(): Promise<void> {
    await this.call("head_bucket", this.bucket, { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }, () =>
      this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }))
    );
  }
}
