// src/routes/uploads.routes.ts

import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import { z } from "zod";

import type { IngestDeps } from "../services/upload/upload.deps.js";
import { createUploadSession } from "../services/upload/upload.session.js";
import { getUploadProgress, receiveChunk } from "../services/upload/upload.chunk.js";
import { finalizeUpload } from "../services/upload/upload.finalize.js";
import { cancelUpload } from "../services/upload/upload.cancel.js";
import { sendApiError } from "../utils/apiError.js";

export const CHUNK_CONTENT_TYPES = ["application/offset+octet-stream", "application/octet-stream"];

function isUuid(value: unknown): value is string {
  return (
    typeof value === "string" &&
    /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
      value
    )
  );
}

const CreateUploadBody = z.object({
  uploadLength: z.number().int().positive(),
  contentType: z.string().min(1).max(128).optional(),
  filename: z.string().min(1).max(512).optional(),
  overwrite: z.boolean().optional(),
});

const UploadParams = z.object({ uploadId: z.string() });

const OverwriteQuery = z.object({
  overwrite: z.enum(["true", "false", "1", "0"]).optional(),
});

function header(req: FastifyRequest, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() || undefined;
}

function intHeader(req: FastifyRequest, name: string): number | null {
  const value = header(req, name);
  if (!value || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : null;
}

function ownerOf(req: FastifyRequest): string | null {
  const owner = header(req, "x-user-id");
  return owner && owner.length <= 256 ? owner : null;
}

export interface UploadRoutesOptions {
  deps: IngestDeps;
}

const uploadRoutes: FastifyPluginAsync<UploadRoutesOptions> = async (app, { deps }) => {
  const parseUploadId = (req: FastifyRequest): string | null => {
    const params = UploadParams.safeParse(req.params);
    return params.success && isUuid(params.data.uploadId) ? params.data.uploadId : null;
  };

  const parseOverwrite = (req: FastifyRequest): boolean | undefined | null => {
    const query = OverwriteQuery.safeParse(req.query ?? {});
    if (!query.success) return null;
    const raw = query.data.overwrite;
    return raw === undefined ? undefined : raw === "true" || raw === "1";
  };

  app.post("/v1/uploads", async (req, reply) => {
    const body = CreateUploadBody.safeParse(req.body);
    if (!body.success) {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Invalid create-upload request", {
        details: { issues: body.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      });
    }

    const session = await createUploadSession(deps, { ...body.data, owner: ownerOf(req) });

    return reply
      .code(201)
      .header("Location", `/v1/uploads/${session.uploadId}`)
      .send({
        uploadId: session.uploadId,
        state: session.state,
        uploadLength: session.totalLength,
        expiresAt: session.lastActivityAt + deps.settings.upload.sessionTtlMs,
      });
  });

  app.patch("/v1/uploads/:uploadId", async (req, reply) => {
    const uploadId = parseUploadId(req);
    if (!uploadId) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    const overwrite = parseOverwrite(req);
    if (overwrite === null) {
      return sendApiError(reply, 400, "INVALID_QUERY", "overwrite must be true or false");
    }

    const offset = intHeader(req, "upload-offset");
    const declaredTotal = intHeader(req, "upload-length");
    const length = intHeader(req, "content-length");
    if (offset === null || declaredTotal === null || length === null) {
      return sendApiError(
        reply,
        400,
        "INVALID_UPLOAD_HEADERS",
        "Upload-Offset, Upload-Length and Content-Length must be non-negative integers"
      );
    }

    if (!Buffer.isBuffer(req.body)) {
      return sendApiError(reply, 400, "INVALID_CHUNK", "Chunk body must be application/offset+octet-stream");
    }

    const result = await receiveChunk(deps, {
      uploadId,
      offset,
      length,
      declaredTotal,
      name: header(req, "upload-name") ?? null,
      body: req.body,
      overwrite,
    });

    if (result.status === "receiving") {
      reply.header("Upload-Offset", String(result.nextExpectedOffset));
    }
    return reply.code(200).send(result);
  });

  app.head("/v1/uploads/:uploadId", async (req, reply) => {
    const uploadId = parseUploadId(req);
    if (!uploadId) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    const progress = await getUploadProgress(deps, uploadId);

    return reply
      .code(200)
      .header("Upload-Offset", String(progress.nextExpectedOffset))
      .header("Upload-Length", String(progress.uploadLength))
      .header("Cache-Control", "no-store")
      .send();
  });

  app.get("/v1/uploads/:uploadId/status", async (req, reply) => {
    const uploadId = parseUploadId(req);
    if (!uploadId) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    const progress = await getUploadProgress(deps, uploadId);
    return reply.header("Cache-Control", "no-store").send(progress);
  });

  app.post("/v1/uploads/:uploadId/finalize", async (req, reply) => {
    const uploadId = parseUploadId(req);
    if (!uploadId) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    const overwrite = parseOverwrite(req);
    if (overwrite === null) {
      return sendApiError(reply, 400, "INVALID_QUERY", "overwrite must be true or false");
    }

    const result = await finalizeUpload(deps, uploadId, { overwrite });
    return reply.code(200).send(result);
  });

  app.delete("/v1/uploads/:uploadId", async (req, reply) => {
    const uploadId = parseUploadId(req);
    if (!uploadId) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    await cancelUpload(deps, uploadId);
    req.log.info({ uploadId }, "Upload canceled");

    return reply.code(200).send({ ok: true, uploadId, status: "aborted" });
  });
};

export default uploadRoutes;
