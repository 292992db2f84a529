// src/routes/health.ts

import type { FastifyPluginAsync } from "fastify";
import type { UploadDeps } from "../services/upload/upload.session.js";

export type HealthRouteOptions = {
  deps: UploadDeps;
};

const healthRoute: FastifyPluginAsync<HealthRouteOptions> = async (app, { deps }) => {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let storeOk = false;
    let latencyMs: number | null = null;

    try {
      await deps.sessions.ping();
      storeOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "Session store health check failed");
    }

    return reply.status(storeOk ? 200 : 503).send({
      status: storeOk ? "UP" : "DOWN",
      service: "chunkline-api-v1",
      ready: storeOk,
      timestamp,
      checks: {
        sessionStore: {
          ok: storeOk,
          latencyMs,
          timestamp,
        },
        finalize: {
          inProgress: deps.finalizeLock.activeKeys().length,
        },
      },
    });
  });
};

export default healthRoute;
