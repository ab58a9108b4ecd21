// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST_BODY"
  | "INVALID_UPLOAD_ID"
  | "INVALID_UPLOAD_LENGTH"
  | "INVALID_UPLOAD_HEADERS"
  | "INVALID_QUERY"
  | "FILE_TOO_LARGE"
  | "INVALID_FILENAME_FORMAT"
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_LENGTH_MISMATCH"
  | "UPLOAD_NAME_MISMATCH"
  | "UPLOAD_CAPACITY_REACHED"
  | "INVALID_CHUNK"
  | "INCOMPLETE_UPLOAD"
  | "CHUNK_SIZE_MISMATCH"
  | "CHUNK_OUT_OF_ORDER"
  | "PART_CONFLICT"
  | "SESSION_CONFLICT"
  | "UPLOAD_INCOMPLETE"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "DUPLICATE_ENTRY"
  | "STORAGE_UPLOAD_FAILURE"
  | "CONVERSION_FAILED"
  | "VALUE_RANGE_INVALID"
  | "CATALOG_UNAVAILABLE"
  | "REQUEST_ERROR"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

/**
 * Thrown by services; the server error handler turns it into an
 * ApiErrorResponse with `statusCode`.
 */
export class UploadError extends Error {
  readonly statusCode: number;
  readonly code: ApiErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    code: ApiErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "UploadError";
    this.statusCode = statusCode;
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }
}

export function isUploadError(err: unknown): err is UploadError {
  return err instanceof UploadError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}
