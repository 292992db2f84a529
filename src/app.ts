// src/app.ts

import Fastify from "fastify";
import type { FastifyInstance, FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import uploadRoutes from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import type { UploadDeps } from "./services/upload/upload.session.js";

function statusCodeOf(err: unknown): number {
  if (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    Number.isInteger(err.statusCode) &&
    err.statusCode >= 400 &&
    err.statusCode <= 599
  ) {
    return err.statusCode;
  }
  return 500;
}

export interface BuildAppOptions {
  deps: UploadDeps;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp({ deps, logger = false }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger,
    // Requests should be chunk-sized (multipart) or small JSON.
    bodyLimit: deps.chunkConfig.maxBytes + 1024 * 1024,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    throwFileSizeLimit: false,
    limits: {
      // One byte over the largest chunk: a truncated part still exceeds its
      // expected size and fails the store's CHUNK_TOO_LARGE check.
      fileSize: deps.chunkConfig.maxBytes + 1,
      files: 1,
    },
  });

  await app.register(uploadRoutes, { deps });
  await app.register(healthRoute, { deps });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = statusCodeOf(err);

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message:
          statusCode < 500 && err instanceof Error
            ? err.message
            : "Unexpected server error",
        retryable: statusCode >= 500,
      },
    });
  });

  return app;
}
