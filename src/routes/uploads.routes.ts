// src/routes/uploads.routes.ts

import type { FastifyPluginAsync, FastifyReply } from "fastify";

import { sendApiError } from "../utils/apiError.js";
import { isUuid } from "../utils/isUuid.js";
import { UploadError } from "../types/upload.js";
import {
  CHUNK_SHA256_HEADER,
  InitiateUploadRequest,
  isSha256Hex,
} from "../protocol/uploads.protocol.js";
import type {
  CancelUploadResponse,
  CompleteUploadResponse,
  InitiateUploadResponse,
  PutChunkResponse,
  UploadStatusResponse,
} from "../protocol/uploads.protocol.js";

import {
  acceptChunk,
  cancelSession,
  createSession,
  listAccepted,
  lookupSession,
} from "../services/upload/upload.session.js";
import type { UploadDeps } from "../services/upload/upload.session.js";
import { finalizeUpload } from "../services/upload/upload.finalize.js";

type UploadIdParams = { uploadId: string };
type ChunkParams = { uploadId: string; index: string };

function parseChunkIndex(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const idx = Number(raw);
  return Number.isSafeInteger(idx) ? idx : null;
}

function rejectInvalidUploadId(reply: FastifyReply) {
  return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
}

export type UploadRoutesOptions = {
  deps: UploadDeps;
};

const uploadRoutes: FastifyPluginAsync<UploadRoutesOptions> = async (app, { deps }) => {
  app.post("/v1/uploads", async (req, reply) => {
    const log = req.log;

    if (!req.body || typeof req.body !== "object") {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Request body must be JSON"
      );
    }

    const parsed = InitiateUploadRequest.safeParse(req.body);
    if (!parsed.success) {
      return sendApiError(
        reply,
        400,
        "INVALID_CREATE_UPLOAD_REQUEST",
        "filename (1-512 chars) and a non-negative integer sizeBytes are required",
        { details: { issues: parsed.error.issues } }
      );
    }

    try {
      const session = await createSession(deps, parsed.data);

      log.info(
        { uploadId: session.uploadId, totalChunks: session.totalChunks, chunkSize: session.chunkSize },
        "Upload session created"
      );

      const body: InitiateUploadResponse = {
        uploadId: session.uploadId,
        chunkSize: session.chunkSize,
        totalChunks: session.totalChunks,
      };
      return reply.code(201).send(body);
    } catch (err) {
      if (err instanceof UploadError && (err.code === "FILE_TOO_LARGE" || err.code === "TOO_MANY_CHUNKS")) {
        return sendApiError(reply, 413, err.code, err.message);
      }

      log.error({ err }, "Session creation failed");
      return sendApiError(
        reply,
        500,
        "SESSION_CREATE_FAILED",
        "Failed to create upload session",
        { retryable: true }
      );
    }
  });

  app.get<{ Params: UploadIdParams }>("/v1/uploads/:uploadId/status", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return rejectInvalidUploadId(reply);
    }

    const found = await lookupSession(deps, uploadId);

    if (found.kind === "missing") {
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid uploadId");
    }

    if (found.kind === "completed") {
      const body: UploadStatusResponse = {
        status: "completed",
        uploadId,
        filename: found.record.filename,
        artifact: found.record.artifact,
      };
      return body;
    }

    const { session } = found;
    const body: UploadStatusResponse = {
      status: "open",
      uploadId,
      filename: session.filename,
      sizeBytes: session.sizeBytes,
      chunkSize: session.chunkSize,
      totalChunks: session.totalChunks,
      receivedChunks: await listAccepted(deps, session),
    };
    return body;
  });

  app.put<{ Params: ChunkParams }>("/v1/uploads/:uploadId/chunk/:index", async (req, reply) => {
    const log = req.log;
    const { uploadId, index } = req.params;

    if (!isUuid(uploadId)) {
      return rejectInvalidUploadId(reply);
    }

    const found = await lookupSession(deps, uploadId);
    if (found.kind === "missing") {
      return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid uploadId");
    }
    if (found.kind === "completed") {
      return sendApiError(reply, 409, "UPLOAD_ALREADY_COMPLETED", "Upload is already finalized");
    }

    const { session } = found;
    const idx = parseChunkIndex(index);

    if (idx === null || idx >= session.totalChunks) {
      return sendApiError(reply, 400, "INVALID_CHUNK", `Chunk index must be in [0, ${session.totalChunks})`);
    }

    const rawHash = req.headers[CHUNK_SHA256_HEADER];
    let expectedHash: string | undefined;
    if (rawHash !== undefined) {
      if (!isSha256Hex(rawHash)) {
        return sendApiError(reply, 400, "INVALID_CHUNK", `${CHUNK_SHA256_HEADER} must be a lowercase hex SHA-256`);
      }
      expectedHash = rawHash;
    }

    let part;
    try {
      part = await req.file();
    } catch (err) {
      log.debug({ uploadId, idx, err }, "Chunk multipart parse failed");
      return sendApiError(reply, 400, "CHUNK_STREAM_ERROR", "Failed to read chunk stream", {
        retryable: true,
      });
    }

    if (!part || part.type !== "file") {
      return sendApiError(reply, 400, "INVALID_CHUNK", "Multipart file field required");
    }

    try {
      const stored = await acceptChunk(deps, session, idx, part.file, expectedHash);

      log.debug({ uploadId, idx, sizeBytes: stored.sizeBytes }, "Chunk stored");

      const body: PutChunkResponse = {
        ok: true,
        uploadId,
        chunkIndex: idx,
        sizeBytes: stored.sizeBytes,
      };
      return body;
    } catch (err) {
      if (err instanceof UploadError) {
        // Canceled or finalized while this chunk was streaming.
        if (err.code === "UPLOAD_NOT_FOUND") {
          return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid uploadId");
        }

        if (err.code === "HASH_MISMATCH") {
          // Most likely corrupted in transit; a resend can succeed.
          return sendApiError(reply, 400, "INVALID_CHUNK", err.message, { retryable: true });
        }

        if (
          err.code === "CHUNK_TOO_LARGE" ||
          err.code === "CHUNK_SIZE_MISMATCH" ||
          err.code === "INVALID_CHUNK_INDEX"
        ) {
          return sendApiError(reply, 400, "INVALID_CHUNK", err.message);
        }
      }

      log.warn({ uploadId, idx, err }, "Chunk upload failed");
      return sendApiError(
        reply,
        500,
        "CHUNK_UPLOAD_FAILED",
        err instanceof Error ? err.message : "Chunk upload failed",
        { retryable: true }
      );
    }
  });

  app.post<{ Params: UploadIdParams }>("/v1/uploads/:uploadId/complete", async (req, reply) => {
    const log = req.log;
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return rejectInvalidUploadId(reply);
    }

    try {
      const record = await finalizeUpload(deps, uploadId, log);

      log.info(
        { uploadId, artifact: record.artifact.name, sizeBytes: record.artifact.sizeBytes },
        "Upload finalized"
      );

      const body: CompleteUploadResponse = {
        status: "completed",
        uploadId,
        artifact: record.artifact,
      };
      return reply.code(200).send(body);
    } catch (err) {
      if (err instanceof UploadError) {
        if (err.code === "UPLOAD_NOT_FOUND") {
          return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid uploadId");
        }

        if (err.code === "UPLOAD_INCOMPLETE") {
          return sendApiError(reply, 400, "UPLOAD_INCOMPLETE", err.message, {
            details: err.details,
          });
        }
      }

      log.error({ uploadId, err }, "Upload finalization failed");

      return sendApiError(
        reply,
        500,
        "ASSEMBLY_FAILED",
        err instanceof Error ? err.message : "Upload finalization failed",
        { retryable: true }
      );
    }
  });

  // Cancel an open upload and drop its chunks. Completed uploads are immutable.
  app.delete<{ Params: UploadIdParams }>("/v1/uploads/:uploadId", async (req, reply) => {
    const log = req.log;
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return rejectInvalidUploadId(reply);
    }

    try {
      await cancelSession(deps, uploadId);
    } catch (err) {
      if (err instanceof UploadError && err.code === "UPLOAD_NOT_FOUND") {
        return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", "Invalid uploadId");
      }
      if (err instanceof UploadError && err.code === "UPLOAD_ALREADY_COMPLETED") {
        return sendApiError(reply, 409, "UPLOAD_ALREADY_COMPLETED", "Upload is already finalized");
      }
      throw err;
    }

    log.info({ uploadId }, "Upload canceled");

    const body: CancelUploadResponse = { ok: true, uploadId, status: "canceled" };
    return reply.code(200).send(body);
  });
};

export default uploadRoutes;
