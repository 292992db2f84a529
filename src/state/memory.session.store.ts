// src/state/memory.session.store.ts

import type { CompletedUpload, UploadSession } from "../types/upload.js";
import type { SessionStore } from "./session.store.js";

/**
 * Process-local SessionStore for tests and single-node development runs
 * (`SESSION_STORE=memory`). Nothing survives a restart.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, UploadSession>();
  private readonly completed = new Map<string, CompletedUpload>();

  async create(session: UploadSession): Promise<void> {
    this.sessions.set(session.uploadId, { ...session });
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const session = this.sessions.get(uploadId);
    return session ? { ...session } : null;
  }

  async getCompleted(uploadId: string): Promise<CompletedUpload | null> {
    const record = this.completed.get(uploadId);
    return record ? { ...record, artifact: { ...record.artifact } } : null;
  }

  async markCompleted(record: CompletedUpload): Promise<void> {
    this.completed.set(record.uploadId, { ...record, artifact: { ...record.artifact } });
    this.sessions.delete(record.uploadId);
  }

  async remove(uploadId: string): Promise<void> {
    this.sessions.delete(uploadId);
  }

  async ping(): Promise<void> {}
}
