import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { text } from "stream/consumers";

import { DiskChunkStore } from "../src/store/disk.chunk.store.js";
import { makeTempDir } from "./utils/test-setup.js";
import { exists, patternBytes, sha256 } from "./utils/test-factories.js";

const UPLOAD_ID = "0b6f2f9e-3c1d-4d2a-9a55-2f1c0e7b8a10";

function streamOf(bytes: Uint8Array): Readable {
  return Readable.from([Buffer.from(bytes)]);
}

describe("DiskChunkStore", () => {
  let baseDir: string;
  let store: DiskChunkStore;

  beforeEach(async () => {
    baseDir = await makeTempDir();
    store = new DiskChunkStore(baseDir);
    await store.prepare(UPLOAD_ID);
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  describe("writeChunk", () => {
    it("should store a chunk and report its size and hash", async () => {
      const bytes = patternBytes(100);

      const stored = await store.writeChunk(UPLOAD_ID, 0, streamOf(bytes), {
        sizeBytes: 100,
        sha256: sha256(bytes),
      });

      expect(stored).toEqual({ index: 0, sizeBytes: 100, sha256: sha256(bytes) });
      const onDisk = await fs.readFile(path.join(baseDir, UPLOAD_ID, "0"));
      expect(onDisk.equals(bytes)).toBe(true);
    });

    it("should accept an uppercase expected hash", async () => {
      const bytes = patternBytes(16);

      const stored = await store.writeChunk(UPLOAD_ID, 1, streamOf(bytes), {
        sizeBytes: 16,
        sha256: sha256(bytes).toUpperCase(),
      });

      expect(stored.sha256).toBe(sha256(bytes));
    });

    it("should replace an existing chunk when the index is re-sent", async () => {
      await store.writeChunk(UPLOAD_ID, 2, streamOf(patternBytes(8, 1)), { sizeBytes: 8 });
      await store.writeChunk(UPLOAD_ID, 2, streamOf(patternBytes(8, 2)), { sizeBytes: 8 });

      const onDisk = await fs.readFile(path.join(baseDir, UPLOAD_ID, "2"));
      expect(onDisk.equals(patternBytes(8, 2))).toBe(true);
      expect(await store.listChunks(UPLOAD_ID)).toEqual([2]);
    });

    it("should reject a chunk longer than expected", async () => {
      await expect(
        store.writeChunk(UPLOAD_ID, 0, streamOf(patternBytes(12)), { sizeBytes: 10 })
      ).rejects.toMatchObject({ code: "CHUNK_TOO_LARGE" });

      expect(await store.listChunks(UPLOAD_ID)).toEqual([]);
    });

    it("should reject a chunk shorter than expected", async () => {
      await expect(
        store.writeChunk(UPLOAD_ID, 0, streamOf(patternBytes(9)), { sizeBytes: 10 })
      ).rejects.toMatchObject({
        code: "CHUNK_SIZE_MISMATCH",
        message: "Chunk 0 must be 10 bytes, got 9",
      });

      expect(await store.listChunks(UPLOAD_ID)).toEqual([]);
    });

    it("should reject content that does not match the expected hash", async () => {
      const bytes = patternBytes(32);

      await expect(
        store.writeChunk(UPLOAD_ID, 3, streamOf(bytes), {
          sizeBytes: 32,
          sha256: sha256(patternBytes(32, 99)),
        })
      ).rejects.toMatchObject({ code: "HASH_MISMATCH" });

      expect(await fs.readdir(path.join(baseDir, UPLOAD_ID))).toEqual([]);
    });

    it("should keep the previous chunk when a replacement is rejected", async () => {
      const original = patternBytes(8, 3);
      await store.writeChunk(UPLOAD_ID, 0, streamOf(original), { sizeBytes: 8 });

      await expect(
        store.writeChunk(UPLOAD_ID, 0, streamOf(patternBytes(5)), { sizeBytes: 8 })
      ).rejects.toMatchObject({ code: "CHUNK_SIZE_MISMATCH" });

      const onDisk = await fs.readFile(path.join(baseDir, UPLOAD_ID, "0"));
      expect(onDisk.equals(original)).toBe(true);
    });

    it("should store an empty chunk", async () => {
      const stored = await store.writeChunk(UPLOAD_ID, 0, streamOf(new Uint8Array(0)), { sizeBytes: 0 });

      expect(stored.sizeBytes).toBe(0);
      expect(await store.listChunks(UPLOAD_ID)).toEqual([0]);
    });
  });

  describe("listChunks", () => {
    it("should list committed indices in numeric order", async () => {
      for (const index of [10, 2, 0]) {
        await store.writeChunk(UPLOAD_ID, index, streamOf(patternBytes(4)), { sizeBytes: 4 });
      }

      expect(await store.listChunks(UPLOAD_ID)).toEqual([0, 2, 10]);
    });

    it("should ignore in-flight temp files", async () => {
      await store.writeChunk(UPLOAD_ID, 1, streamOf(patternBytes(4)), { sizeBytes: 4 });
      await fs.writeFile(path.join(baseDir, UPLOAD_ID, "0.5d1c.tmp"), "partial");

      expect(await store.listChunks(UPLOAD_ID)).toEqual([1]);
    });

    it("should return an empty list for an unknown upload", async () => {
      expect(await store.listChunks("6a0d8a55-8f1e-4d7c-9a2b-3c4d5e6f7a8b")).toEqual([]);
    });
  });

  describe("openChunk", () => {
    it("should stream back the stored bytes", async () => {
      await store.writeChunk(UPLOAD_ID, 0, Readable.from([Buffer.from("hello chunk")]), { sizeBytes: 11 });

      expect(await text(store.openChunk(UPLOAD_ID, 0))).toBe("hello chunk");
    });
  });

  describe("cleanup", () => {
    it("should remove every chunk of the upload", async () => {
      await store.writeChunk(UPLOAD_ID, 0, streamOf(patternBytes(4)), { sizeBytes: 4 });

      await store.cleanup(UPLOAD_ID);

      expect(await store.listChunks(UPLOAD_ID)).toEqual([]);
    });

    it("should refuse a late write instead of recreating the upload directory", async () => {
      await store.cleanup(UPLOAD_ID);

      await expect(
        store.writeChunk(UPLOAD_ID, 0, streamOf(patternBytes(4)), { sizeBytes: 4 })
      ).rejects.toMatchObject({ code: "UPLOAD_NOT_FOUND" });

      expect(await exists(path.join(baseDir, UPLOAD_ID))).toBe(false);
    });

    it("should not fail for an upload with no directory", async () => {
      await expect(store.cleanup("6a0d8a55-8f1e-4d7c-9a2b-3c4d5e6f7a8b")).resolves.toBeUndefined();
    });
  });
});
