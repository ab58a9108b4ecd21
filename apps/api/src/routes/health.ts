// src/routes/health.ts

import type { FastifyPluginAsync } from "fastify";

import type { IngestDeps } from "../services/upload/upload.deps.js";

type Check = { ok: boolean; latencyMs: number | null };

async function probe(fn: () => Promise<void>, onError: (err: unknown) => void): Promise<Check> {
  const start = Date.now();
  try {
    await fn();
    return { ok: true, latencyMs: Date.now() - start };
  } catch (err) {
    onError(err);
    return { ok: false, latencyMs: null };
  }
}

const healthRoute: FastifyPluginAsync<{ deps: IngestDeps }> = async (app, { deps }) => {
  app.get("/health", async (req, reply) => {
    const timestamp = new Date().toISOString();

    const [redis, storage] = await Promise.all([
      probe(
        () => deps.sessions.ping(),
        (err) => req.log.error({ err }, "Redis Health Check Failed")
      ),
      probe(
        () => deps.storage.ping(),
        (err) => req.log.error({ err }, "Storage Health Check Failed")
      ),
    ]);

    const ready = redis.ok && storage.ok;

    return reply.status(ready ? 200 : 503).send({
      status: ready ? "UP" : "DOWN",
      service: "layer-ingest-api-v1",
      ready,
      timestamp,
      checks: { redis, storage },
    });
  });
};

export default healthRoute;
