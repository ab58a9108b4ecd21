// src/app.ts

import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from "fastify";

import type { IngestDeps } from "./services/upload/upload.deps.js";
import uploadRoutes, { CHUNK_CONTENT_TYPES } from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import { isUploadError, sendApiError } from "./utils/apiError.js";

export type AppDeps = Omit<IngestDeps, "log">;

function statusCodeOf(err: unknown): number {
  if (err && typeof err === "object" && "statusCode" in err) {
    const status = err.statusCode;
    if (typeof status === "number" && Number.isInteger(status)) return status;
  }
  return 500;
}

function fastifyCodeOf(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Builds the HTTP app. `createDeps` receives the app logger so every
 * service logs through it; the returned `deps` is the one to hand to the
 * reaper.
 */
export function buildApp(
  createDeps: (log: FastifyBaseLogger) => AppDeps,
  options: { logger?: FastifyServerOptions["logger"] } = {}
) {
  const app = Fastify({ logger: options.logger ?? false });
  const ingest: IngestDeps = { ...createDeps(app.log), log: app.log };

  app.addContentTypeParser(
    CHUNK_CONTENT_TYPES,
    // One chunk per request.
    { parseAs: "buffer", bodyLimit: ingest.settings.chunk.maxBytes },
    (_req, body, done) => done(null, body)
  );

  app.setErrorHandler((err, req, reply) => {
    if (isUploadError(err)) {
      const context = { err, code: err.code, url: req.url, method: req.method };
      if (err.statusCode >= 500) {
        req.log.error(context, "Upload request failed");
      } else {
        req.log.info(context, "Upload request rejected");
      }

      return sendApiError(reply, err.statusCode, err.code, err.message, {
        retryable: err.retryable,
        details: err.details,
      });
    }

    // Fastify reads the body itself and rejects a short one before our handler runs.
    if (fastifyCodeOf(err) === "FST_ERR_CTP_INVALID_CONTENT_LENGTH") {
      return sendApiError(reply, 400, "INCOMPLETE_UPLOAD", "Request body size did not match Content-Length", {
        retryable: true,
      });
    }

    const statusCode = statusCodeOf(err);

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return sendApiError(
      reply,
      statusCode,
      statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
      statusCode < 500 ? err.message : "Unexpected server error"
    );
  });

  void app.register(uploadRoutes, { deps: ingest });
  void app.register(healthRoute, { deps: ingest });

  return { app, deps: ingest };
}
