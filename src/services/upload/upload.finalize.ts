// src/services/upload/upload.finalize.ts

import fs from "fs/promises";
import path from "path";
import { createWriteStream } from "fs";
import { once } from "events";
import crypto from "crypto";
import type { FastifyBaseLogger } from "fastify";

import { UploadError } from "../../types/upload.js";
import type { CompletedUpload, UploadArtifact, UploadSession } from "../../types/upload.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { UploadDeps } from "./upload.session.js";

const FALLBACK_ARTIFACT_NAME = "assembled.bin";

export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, "/"));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "");
  return cleaned || FALLBACK_ARTIFACT_NAME;
}

/** `<uploadId>__<filename>`: unique per session, so unrelated uploads never collide. */
export function artifactName(session: Pick<UploadSession, "uploadId" | "filename">): string {
  return `${session.uploadId}__${sanitizeFilename(session.filename)}`;
}

export function findMissingChunks(accepted: Iterable<number>, totalChunks: number): number[] {
  const set = new Set(accepted);
  const missing: number[] = [];
  for (let i = 0; i < totalChunks; i++) {
    if (!set.has(i)) missing.push(i);
  }
  return missing;
}

async function assembleChunksToFile(params: {
  chunks: ChunkStore;
  uploadId: string;
  totalChunks: number;
  outPath: string;
}): Promise<{ sizeBytes: number; sha256: string }> {
  const ws = createWriteStream(params.outPath, { flags: "wx" });
  const finished = once(ws, "finish");
  const failed = once(ws, "error").then(([err]) => {
    throw err;
  });
  // Keep an early stream error from surfacing as an unhandled rejection.
  failed.catch(() => undefined);

  const hash = crypto.createHash("sha256");
  let sizeBytes = 0;

  try {
    // The file must exist before any failure path removes it.
    await Promise.race([once(ws, "ready"), failed]);

    for (let i = 0; i < params.totalChunks; i++) {
      const rs = params.chunks.openChunk(params.uploadId, i);
      for await (const buf of rs) {
        hash.update(buf);
        sizeBytes += buf.length;
        if (!ws.write(buf)) {
          await Promise.race([once(ws, "drain"), failed]);
        }
      }
    }

    ws.end();
    await Promise.race([finished, failed]);
  } catch (err) {
    ws.destroy();
    throw err;
  }

  return { sizeBytes, sha256: hash.digest("hex") };
}

/**
 * Assemble a fully uploaded session into its artifact.
 *
 * Serialized per upload id. The artifact is written under a temporary name and
 * renamed into place only after every byte is on disk, then the session is
 * marked completed and its chunks are dropped. Repeated calls after success
 * return the same completion record.
 */
export async function finalizeUpload(
  deps: UploadDeps,
  uploadId: string,
  log: FastifyBaseLogger
): Promise<CompletedUpload> {
  return deps.finalizeLock.run(uploadId, async () => {
    const done = await deps.sessions.getCompleted(uploadId);
    if (done) return done;

    const session = await deps.sessions.get(uploadId);
    if (!session) {
      throw new UploadError("UPLOAD_NOT_FOUND", `Unknown upload ${uploadId}`);
    }

    const accepted = await deps.chunks.listChunks(uploadId);
    const missing = findMissingChunks(accepted, session.totalChunks);
    if (missing.length > 0) {
      throw new UploadError(
        "UPLOAD_INCOMPLETE",
        `Only ${session.totalChunks - missing.length}/${session.totalChunks} chunks uploaded`,
        { missingChunks: missing.slice(0, 50), missingCount: missing.length }
      );
    }

    await fs.mkdir(deps.uploadConfig.artifactDir, { recursive: true });

    const name = artifactName(session);
    const finalPath = path.join(deps.uploadConfig.artifactDir, name);
    const partialPath = `${finalPath}.${crypto.randomUUID()}.partial`;

    let artifact: UploadArtifact;
    try {
      const written = await assembleChunksToFile({
        chunks: deps.chunks,
        uploadId,
        totalChunks: session.totalChunks,
        outPath: partialPath,
      });

      if (written.sizeBytes !== session.sizeBytes) {
        throw new UploadError(
          "ASSEMBLY_SIZE_MISMATCH",
          `Assembled ${written.sizeBytes} bytes, expected ${session.sizeBytes}`
        );
      }

      await fs.rename(partialPath, finalPath);
      artifact = { name, path: finalPath, ...written };
    } catch (err) {
      await fs.rm(partialPath, { force: true });
      throw err;
    }

    const record: CompletedUpload = {
      uploadId,
      filename: session.filename,
      status: "completed",
      artifact,
      completedAt: Date.now(),
    };

    await deps.sessions.markCompleted(record);

    try {
      await deps.chunks.cleanup(uploadId);
    } catch (err) {
      // The upload is complete; leftover chunk files only cost disk space.
      log.warn({ uploadId, err }, "Chunk cleanup after finalize failed");
    }

    return record;
  });
}
