import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pino } from "pino";

import {
  artifactName,
  finalizeUpload,
  findMissingChunks,
  sanitizeFilename,
} from "../src/services/upload/upload.finalize.js";
import {
  acceptChunk,
  cancelSession,
  computeTotalChunks,
  createSession,
  expectedChunkSize,
  listAccepted,
  lookupSession,
  resolveChunkSize,
} from "../src/services/upload/upload.session.js";
import type { UploadDeps } from "../src/services/upload/upload.session.js";
import { DiskChunkStore } from "../src/store/disk.chunk.store.js";
import type { ChunkExpectation, ChunkStore, StoredChunk } from "../src/store/chunk.store.js";
import type { UploadSession } from "../src/types/upload.js";
import { createTestApp } from "./utils/test-setup.js";
import type { TestApp } from "./utils/test-setup.js";
import { EMPTY_SHA256, patternBytes, sha256 } from "./utils/test-factories.js";

const log = pino({ level: "silent" });

/** Disk store whose reads can be made to fail partway through assembly. */
class FlakyChunkStore implements ChunkStore {
  failOpenAt: number | null = null;
  private readonly inner: DiskChunkStore;

  constructor(baseDir: string) {
    this.inner = new DiskChunkStore(baseDir);
  }

  prepare(uploadId: string): Promise<void> {
    return this.inner.prepare(uploadId);
  }

  writeChunk(uploadId: string, index: number, stream: Readable, expected: ChunkExpectation): Promise<StoredChunk> {
    return this.inner.writeChunk(uploadId, index, stream, expected);
  }

  listChunks(uploadId: string): Promise<number[]> {
    return this.inner.listChunks(uploadId);
  }

  openChunk(uploadId: string, index: number): Readable {
    if (index === this.failOpenAt) {
      return new Readable({
        read() {
          this.destroy(new Error("disk read failed"));
        },
      });
    }
    return this.inner.openChunk(uploadId, index);
  }

  cleanup(uploadId: string): Promise<void> {
    return this.inner.cleanup(uploadId);
  }
}

async function sendAll(deps: UploadDeps, session: UploadSession, source: Buffer, order: number[]) {
  for (const index of order) {
    const start = index * session.chunkSize;
    const bytes = source.subarray(start, start + expectedChunkSize(session, index));
    await acceptChunk(deps, session, index, Readable.from([bytes]), sha256(bytes));
  }
}

describe("upload sessions", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({ chunkConfig: { minBytes: 4, maxBytes: 64, defaultBytes: 10 } });
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe("chunk arithmetic", () => {
    it("should count one chunk for an empty file", () => {
      expect(computeTotalChunks(0, 10)).toBe(1);
    });

    it("should round the chunk count up", () => {
      expect(computeTotalChunks(25, 10)).toBe(3);
      expect(computeTotalChunks(30, 10)).toBe(3);
    });

    it("should clamp the requested chunk size to the configured bounds", () => {
      const config = { minBytes: 4, maxBytes: 64, defaultBytes: 10 };
      expect(resolveChunkSize(config)).toBe(10);
      expect(resolveChunkSize(config, 1)).toBe(4);
      expect(resolveChunkSize(config, 1000)).toBe(64);
      expect(resolveChunkSize(config, 32)).toBe(32);
    });
  });

  describe("createSession", () => {
    it("should derive the chunk layout from the file size", async () => {
      const session = await createSession(ctx.deps, { filename: "report.pdf", sizeBytes: 25 });

      expect(session).toMatchObject({
        filename: "report.pdf",
        sizeBytes: 25,
        chunkSize: 10,
        totalChunks: 3,
        status: "open",
      });
      expect(expectedChunkSize(session, 0)).toBe(10);
      expect(expectedChunkSize(session, 2)).toBe(5);
    });

    it("should reject a file above the size limit", async () => {
      const limited = await createTestApp({ uploadConfig: { maxFileSizeBytes: 100 } });
      try {
        await expect(
          createSession(limited.deps, { filename: "big.bin", sizeBytes: 101 })
        ).rejects.toMatchObject({ code: "FILE_TOO_LARGE" });
      } finally {
        await limited.close();
      }
    });

    it("should reject a layout with too many chunks", async () => {
      const limited = await createTestApp({
        chunkConfig: { minBytes: 1, maxBytes: 10, defaultBytes: 10 },
        uploadConfig: { maxTotalChunks: 2 },
      });
      try {
        await expect(
          createSession(limited.deps, { filename: "three.bin", sizeBytes: 21 })
        ).rejects.toMatchObject({ code: "TOO_MANY_CHUNKS" });
      } finally {
        await limited.close();
      }
    });
  });

  describe("acceptChunk", () => {
    it("should reject an index outside the session", async () => {
      const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });

      await expect(
        acceptChunk(ctx.deps, session, 3, Readable.from([patternBytes(5)]))
      ).rejects.toMatchObject({ code: "INVALID_CHUNK_INDEX" });
    });

    it("should require the short final chunk to have its exact size", async () => {
      const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });

      await expect(
        acceptChunk(ctx.deps, session, 2, Readable.from([patternBytes(10)]))
      ).rejects.toMatchObject({ code: "CHUNK_TOO_LARGE" });
    });

    it("should report accepted chunks in ascending order", async () => {
      const source = patternBytes(25);
      const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });

      await sendAll(ctx.deps, session, source, [2, 0]);

      expect(await listAccepted(ctx.deps, session)).toEqual([0, 2]);
    });
  });

  describe("cancelSession", () => {
    it("should forget the session and its chunks", async () => {
      const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });
      await sendAll(ctx.deps, session, patternBytes(25), [0]);

      await cancelSession(ctx.deps, session.uploadId);

      expect(await lookupSession(ctx.deps, session.uploadId)).toEqual({ kind: "missing" });
      expect(await ctx.deps.chunks.listChunks(session.uploadId)).toEqual([]);
    });

    it("should refuse to cancel an unknown upload", async () => {
      await expect(
        cancelSession(ctx.deps, "6a0d8a55-8f1e-4d7c-9a2b-3c4d5e6f7a8b")
      ).rejects.toMatchObject({ code: "UPLOAD_NOT_FOUND" });
    });
  });
});

describe("finalizeUpload", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp({ chunkConfig: { minBytes: 4, maxBytes: 64, defaultBytes: 10 } });
  });

  afterEach(async () => {
    await ctx.close();
  });

  it("should assemble chunks in index order regardless of arrival order", async () => {
    const source = patternBytes(25);
    const session = await createSession(ctx.deps, { filename: "movie.mp4", sizeBytes: 25 });
    await sendAll(ctx.deps, session, source, [2, 0, 1]);

    const record = await finalizeUpload(ctx.deps, session.uploadId, log);

    expect(record.status).toBe("completed");
    expect(record.artifact).toEqual({
      name: `${session.uploadId}__movie.mp4`,
      path: path.join(ctx.deps.uploadConfig.artifactDir, `${session.uploadId}__movie.mp4`),
      sizeBytes: 25,
      sha256: sha256(source),
    });
    const assembled = await fs.readFile(record.artifact.path);
    expect(assembled.equals(source)).toBe(true);
  });

  it("should drop the chunks and the open session after success", async () => {
    const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });
    await sendAll(ctx.deps, session, patternBytes(25), [0, 1, 2]);

    await finalizeUpload(ctx.deps, session.uploadId, log);

    expect(await ctx.deps.chunks.listChunks(session.uploadId)).toEqual([]);
    expect(await ctx.deps.sessions.get(session.uploadId)).toBeNull();
    expect((await lookupSession(ctx.deps, session.uploadId)).kind).toBe("completed");
  });

  it("should refuse to assemble while chunks are missing", async () => {
    const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });
    await sendAll(ctx.deps, session, patternBytes(25), [1]);

    await expect(finalizeUpload(ctx.deps, session.uploadId, log)).rejects.toMatchObject({
      code: "UPLOAD_INCOMPLETE",
      message: "Only 1/3 chunks uploaded",
      details: { missingChunks: [0, 2], missingCount: 2 },
    });
    expect(await fs.readdir(ctx.deps.uploadConfig.artifactDir).catch(() => [])).toEqual([]);
  });

  it("should refuse to assemble a single-chunk upload with no chunks", async () => {
    const session = await createSession(ctx.deps, { filename: "small.bin", sizeBytes: 8 });
    expect(session.totalChunks).toBe(1);

    await expect(finalizeUpload(ctx.deps, session.uploadId, log)).rejects.toMatchObject({
      code: "UPLOAD_INCOMPLETE",
      message: "Only 0/1 chunks uploaded",
      details: { missingChunks: [0], missingCount: 1 },
    });
    expect((await lookupSession(ctx.deps, session.uploadId)).kind).toBe("open");
  });

  it("should fail for an unknown upload", async () => {
    await expect(
      finalizeUpload(ctx.deps, "6a0d8a55-8f1e-4d7c-9a2b-3c4d5e6f7a8b", log)
    ).rejects.toMatchObject({ code: "UPLOAD_NOT_FOUND" });
  });

  it("should return the same record when called again", async () => {
    const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });
    await sendAll(ctx.deps, session, patternBytes(25), [0, 1, 2]);

    const first = await finalizeUpload(ctx.deps, session.uploadId, log);
    const second = await finalizeUpload(ctx.deps, session.uploadId, log);

    expect(second).toEqual(first);
    expect(await fs.readdir(ctx.deps.uploadConfig.artifactDir)).toEqual([first.artifact.name]);
  });

  it("should assemble once when completion requests race", async () => {
    const source = patternBytes(25);
    const session = await createSession(ctx.deps, { filename: "a.bin", sizeBytes: 25 });
    await sendAll(ctx.deps, session, source, [0, 1, 2]);

    const [a, b] = await Promise.all([
      finalizeUpload(ctx.deps, session.uploadId, log),
      finalizeUpload(ctx.deps, session.uploadId, log),
    ]);

    expect(a).toEqual(b);
    expect(await fs.readdir(ctx.deps.uploadConfig.artifactDir)).toEqual([a.artifact.name]);
    expect((await fs.readFile(a.artifact.path)).equals(source)).toBe(true);
    expect(ctx.deps.finalizeLock.activeKeys()).toEqual([]);
  });

  it("should produce a zero-byte artifact for an empty file", async () => {
    const session = await createSession(ctx.deps, { filename: "empty.txt", sizeBytes: 0 });
    await acceptChunk(ctx.deps, session, 0, Readable.from([Buffer.alloc(0)]), EMPTY_SHA256);

    const record = await finalizeUpload(ctx.deps, session.uploadId, log);

    expect(record.artifact.sizeBytes).toBe(0);
    expect(record.artifact.sha256).toBe(EMPTY_SHA256);
    expect((await fs.stat(record.artifact.path)).size).toBe(0);
  });

  it("should leave no artifact and keep the session when assembly fails", async () => {
    const failing = await createTestApp({
      chunkConfig: { minBytes: 4, maxBytes: 64, defaultBytes: 10 },
      chunks: (tmpDir) => new FlakyChunkStore(tmpDir),
    });

    try {
      const flaky = failing.deps.chunks;
      if (!(flaky instanceof FlakyChunkStore)) throw new Error("expected the flaky chunk store");
      const source = patternBytes(25);
      const session = await createSession(failing.deps, { filename: "a.bin", sizeBytes: 25 });
      await sendAll(failing.deps, session, source, [0, 1, 2]);

      flaky.failOpenAt = 1;
      await expect(finalizeUpload(failing.deps, session.uploadId, log)).rejects.toThrow("disk read failed");

      expect(await fs.readdir(failing.deps.uploadConfig.artifactDir)).toEqual([]);
      expect((await lookupSession(failing.deps, session.uploadId)).kind).toBe("open");
      expect(await failing.deps.chunks.listChunks(session.uploadId)).toEqual([0, 1, 2]);

      flaky.failOpenAt = null;
      const record = await finalizeUpload(failing.deps, session.uploadId, log);
      expect((await fs.readFile(record.artifact.path)).equals(source)).toBe(true);
    } finally {
      await failing.close();
    }
  });
});

describe("artifact naming", () => {
  it("should keep safe filenames as they are", () => {
    expect(sanitizeFilename("report-2024_v2.pdf")).toBe("report-2024_v2.pdf");
  });

  it("should strip directory components", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\Users\\me\\notes.txt")).toBe("notes.txt");
  });

  it("should replace unsafe characters", () => {
    expect(sanitizeFilename("my file (1).txt")).toBe("my_file__1_.txt");
  });

  it("should drop leading dots", () => {
    expect(sanitizeFilename(".env")).toBe("env");
  });

  it("should fall back when nothing usable is left", () => {
    expect(sanitizeFilename("..")).toBe("assembled.bin");
    expect(sanitizeFilename("")).toBe("assembled.bin");
  });

  it("should prefix the upload id", () => {
    expect(artifactName({ uploadId: "abc", filename: "x y.bin" })).toBe("abc__x_y.bin");
  });

  it("should list missing indices", () => {
    expect(findMissingChunks([0, 2], 4)).toEqual([1, 3]);
    expect(findMissingChunks([], 1)).toEqual([0]);
  });
});
