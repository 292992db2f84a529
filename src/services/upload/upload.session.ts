// src/services/upload/upload.session.ts

import crypto from "crypto";
import type { Readable } from "stream";

import type { ChunkConfig, UploadConfig } from "../../config/uploads.config.js";
import type { SessionStore } from "../../state/session.store.js";
import type { ChunkStore, StoredChunk } from "../../store/chunk.store.js";
import { UploadError } from "../../types/upload.js";
import type { CompletedUpload, UploadSession } from "../../types/upload.js";
import { KeyedLock } from "./finalize.lock.js";

export type UploadDeps = {
  sessions: SessionStore;
  chunks: ChunkStore;
  uploadConfig: UploadConfig;
  chunkConfig: ChunkConfig;
  finalizeLock: KeyedLock;
};

export function createUploadDeps(input: Omit<UploadDeps, "finalizeLock">): UploadDeps {
  return { ...input, finalizeLock: new KeyedLock() };
}

/** A zero-byte file still has one (empty) chunk. */
export function computeTotalChunks(sizeBytes: number, chunkSize: number): number {
  return Math.max(1, Math.ceil(sizeBytes / chunkSize));
}

export function resolveChunkSize(config: ChunkConfig, requested?: number): number {
  return Math.min(
    config.maxBytes,
    Math.max(config.minBytes, requested ?? config.defaultBytes)
  );
}

export function expectedChunkSize(session: UploadSession, index: number): number {
  const isLastChunk = index === session.totalChunks - 1;
  return isLastChunk
    ? session.sizeBytes - session.chunkSize * (session.totalChunks - 1)
    : session.chunkSize;
}

export async function createSession(
  deps: UploadDeps,
  input: {
    filename: string;
    sizeBytes: number;
    chunkSize?: number;
  }
): Promise<UploadSession> {
  const { uploadConfig, chunkConfig } = deps;

  if (input.sizeBytes > uploadConfig.maxFileSizeBytes) {
    throw new UploadError(
      "FILE_TOO_LARGE",
      `File exceeds maxFileSizeBytes (${uploadConfig.maxFileSizeBytes})`
    );
  }

  const chunkSize = resolveChunkSize(chunkConfig, input.chunkSize);
  const totalChunks = computeTotalChunks(input.sizeBytes, chunkSize);

  if (totalChunks > uploadConfig.maxTotalChunks) {
    throw new UploadError(
      "TOO_MANY_CHUNKS",
      `totalChunks exceeds maxTotalChunks (${uploadConfig.maxTotalChunks})`
    );
  }

  const session: UploadSession = {
    uploadId: crypto.randomUUID(),
    filename: input.filename,
    sizeBytes: input.sizeBytes,
    chunkSize,
    totalChunks,
    status: "open",
    createdAt: Date.now(),
  };

  await deps.chunks.prepare(session.uploadId);
  await deps.sessions.create(session);

  return session;
}

export type SessionLookup =
  | { kind: "open"; session: UploadSession }
  | { kind: "completed"; record: CompletedUpload }
  | { kind: "missing" };

export async function lookupSession(
  deps: UploadDeps,
  uploadId: string
): Promise<SessionLookup> {
  const session = await deps.sessions.get(uploadId);
  if (session) return { kind: "open", session };

  const record = await deps.sessions.getCompleted(uploadId);
  if (record) return { kind: "completed", record };

  return { kind: "missing" };
}

export async function acceptChunk(
  deps: UploadDeps,
  session: UploadSession,
  index: number,
  stream: Readable,
  sha256?: string
): Promise<StoredChunk> {
  if (!Number.isInteger(index) || index < 0 || index >= session.totalChunks) {
    throw new UploadError(
      "INVALID_CHUNK_INDEX",
      `Chunk index must be in [0, ${session.totalChunks})`
    );
  }

  return deps.chunks.writeChunk(session.uploadId, index, stream, {
    sizeBytes: expectedChunkSize(session, index),
    sha256,
  });
}

export async function listAccepted(
  deps: UploadDeps,
  session: UploadSession
): Promise<number[]> {
  const indices = await deps.chunks.listChunks(session.uploadId);
  return indices.filter(i => i < session.totalChunks);
}

export async function cancelSession(
  deps: UploadDeps,
  uploadId: string
): Promise<void> {
  await deps.finalizeLock.run(uploadId, async () => {
    const found = await lookupSession(deps, uploadId);
    if (found.kind === "missing") {
      throw new UploadError("UPLOAD_NOT_FOUND", `Unknown upload ${uploadId}`);
    }
    if (found.kind === "completed") {
      throw new UploadError("UPLOAD_ALREADY_COMPLETED", "Upload is already finalized");
    }

    await deps.sessions.remove(uploadId);
    await deps.chunks.cleanup(uploadId);
  });
}
