// src/store/disk.chunk.store.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import { Transform } from "stream";
import { once } from "events";
import type { Readable } from "stream";

import { UploadError } from "../types/upload.js";
import type { ChunkExpectation, ChunkStore, StoredChunk } from "./chunk.store.js";

function createValidationStream(
  expectedSize: number,
  hash: crypto.Hash
) {
  let written = 0;

  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      written += chunk.length;

      if (written > expectedSize) {
        cb(new UploadError("CHUNK_TOO_LARGE", `Chunk exceeds ${expectedSize} bytes`));
        return;
      }

      hash.update(chunk);
      cb(null, chunk);
    },
  });
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Layout: `<baseDir>/<uploadId>/<index>` for committed chunks and
 * `<baseDir>/<uploadId>/<index>.<uuid>.tmp` while a write is in flight.
 */
export class DiskChunkStore implements ChunkStore {
  constructor(private readonly baseDir: string) {}

  private dir(uploadId: string) {
    return path.join(this.baseDir, uploadId);
  }

  private chunkPath(uploadId: string, index: number) {
    return path.join(this.dir(uploadId), String(index));
  }

  async prepare(uploadId: string): Promise<void> {
    await fsp.mkdir(this.dir(uploadId), { recursive: true });
  }

  async writeChunk(
    uploadId: string,
    index: number,
    stream: Readable,
    expected: ChunkExpectation
  ): Promise<StoredChunk> {
    // The upload directory comes from prepare(); once cleanup() removed it, late writes fail.
    const finalPath = this.chunkPath(uploadId, index);
    // Unique per request: concurrent writers of the same index never share a temp file.
    const tempPath = `${finalPath}.${crypto.randomUUID()}.tmp`;

    const hash = crypto.createHash("sha256");
    const validator = createValidationStream(expected.sizeBytes, hash);

    try {
      const out = fs.createWriteStream(tempPath, { flags: "wx" });
      // Opened before streaming, so the cleanup below never races the open.
      await once(out, "ready");
      await pipeline(stream, validator, out);

      const stat = await fsp.stat(tempPath);
      if (stat.size !== expected.sizeBytes) {
        throw new UploadError(
          "CHUNK_SIZE_MISMATCH",
          `Chunk ${index} must be ${expected.sizeBytes} bytes, got ${stat.size}`
        );
      }

      const actualHash = hash.digest("hex");
      if (expected.sha256 && actualHash !== expected.sha256.toLowerCase()) {
        throw new UploadError("HASH_MISMATCH", `Chunk ${index} content hash mismatch`);
      }

      // rename(2) replaces an existing chunk atomically, so a re-sent index is idempotent.
      await fsp.rename(tempPath, finalPath);

      return { index, sizeBytes: stat.size, sha256: actualHash };
    } catch (err) {
      stream.destroy();
      await fsp.rm(tempPath, { force: true });
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new UploadError("UPLOAD_NOT_FOUND", `Upload ${uploadId} has no chunk storage`);
      }
      throw err;
    }
  }

  async listChunks(uploadId: string): Promise<number[]> {
    let names: string[];
    try {
      names = await fsp.readdir(this.dir(uploadId));
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }

    return names
      .filter(name => /^\d+$/.test(name))
      .map(Number)
      .sort((a, b) => a - b);
  }

  openChunk(uploadId: string, index: number): Readable {
    return fs.createReadStream(this.chunkPath(uploadId, index));
  }

  async cleanup(uploadId: string): Promise<void> {
    await fsp.rm(this.dir(uploadId), { recursive: true, force: true });
  }
}
