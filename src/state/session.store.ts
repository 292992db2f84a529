// src/state/session.store.ts

import type { CompletedUpload, UploadSession } from "../types/upload.js";

/**
 * Durable session metadata. Chunk bytes live in the ChunkStore; this only
 * tracks which sessions exist and how they ended.
 */
export interface SessionStore {
  create(session: UploadSession): Promise<void>;

  get(uploadId: string): Promise<UploadSession | null>;

  getCompleted(uploadId: string): Promise<CompletedUpload | null>;

  /** Record the completion tombstone and drop the open session in one step. */
  markCompleted(record: CompletedUpload): Promise<void>;

  remove(uploadId: string): Promise<void>;

  ping(): Promise<void>;
}
