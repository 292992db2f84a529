// src/store/chunk.store.ts

import type { Readable } from "stream";

export interface ChunkExpectation {
  /** Exact byte length the chunk must have. */
  sizeBytes: number;
  /** Lowercase hex SHA-256 the content must match, when the client sent one. */
  sha256?: string;
}

export interface StoredChunk {
  index: number;
  sizeBytes: number;
  sha256: string;
}

export interface ChunkStore {
  prepare(uploadId: string): Promise<void>;

  /**
   * Write (or atomically replace) the chunk at `index`. Readers never observe
   * a partially written chunk.
   */
  writeChunk(
    uploadId: string,
    index: number,
    stream: Readable,
    expected: ChunkExpectation
  ): Promise<StoredChunk>;

  /** Fully written chunk indices, ascending. */
  listChunks(uploadId: string): Promise<number[]>;

  openChunk(uploadId: string, index: number): Readable;

  cleanup(uploadId: string): Promise<void>;
}
