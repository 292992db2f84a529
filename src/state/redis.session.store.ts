// src/state/redis.session.store.ts

import { z } from "zod";

import { UploadArtifact } from "../protocol/uploads.protocol.js";
import { UploadError } from "../types/upload.js";
import type { CompletedUpload, UploadSession } from "../types/upload.js";
import type { SessionStore } from "./session.store.js";
import { uploadKeys } from "./keys.js";

const CompletedUploadRecord = z.object({
  uploadId: z.string(),
  filename: z.string(),
  status: z.literal("completed"),
  artifact: UploadArtifact,
  completedAt: z.number(),
});

/**
 * The Upstash commands the store issues. `Redis` from @upstash/redis satisfies
 * it; with `automaticDeserialization: false` every value comes back as a string.
 */
export interface SessionRedis {
  hset(key: string, kv: Record<string, string>): Promise<number>;
  hgetall(key: string): Promise<Record<string, unknown> | null>;
  get(key: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  multi(): SessionRedisTransaction;
  ping(): Promise<string>;
}

export interface SessionRedisTransaction {
  set(key: string, value: string, opts: { ex: number }): SessionRedisTransaction;
  del(...keys: string[]): SessionRedisTransaction;
  exec(): Promise<unknown>;
}

function numberField(value: unknown): number {
  return typeof value === "string" && value !== "" ? Number(value) : NaN;
}

function parseSessionHash(
  uploadId: string,
  data: Record<string, unknown>
): UploadSession {
  const sizeBytes = numberField(data.sizeBytes);
  const chunkSize = numberField(data.chunkSize);
  const totalChunks = numberField(data.totalChunks);
  const createdAt = numberField(data.createdAt);

  if (
    typeof data.filename !== "string" ||
    !Number.isInteger(sizeBytes) ||
    !Number.isInteger(chunkSize) ||
    !Number.isInteger(totalChunks) ||
    !Number.isFinite(createdAt) ||
    data.status !== "open"
  ) {
    throw new UploadError("CORRUPT_UPLOAD_SESSION", `Session ${uploadId} is corrupt`);
  }

  return {
    uploadId,
    filename: data.filename,
    sizeBytes,
    chunkSize,
    totalChunks,
    status: "open",
    createdAt,
  };
}

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: SessionRedis,
    private readonly completedTtlSeconds: number
  ) {}

  async create(session: UploadSession): Promise<void> {
    const written = await this.redis.hset(uploadKeys.session(session.uploadId), {
      uploadId: session.uploadId,
      filename: session.filename,
      sizeBytes: String(session.sizeBytes),
      chunkSize: String(session.chunkSize),
      totalChunks: String(session.totalChunks),
      status: session.status,
      createdAt: String(session.createdAt),
    });

    if (!written) {
      throw new Error("REDIS_SESSION_CREATE_FAILED");
    }
  }

  async get(uploadId: string): Promise<UploadSession | null> {
    const data = await this.redis.hgetall(uploadKeys.session(uploadId));

    if (!data || Object.keys(data).length === 0) {
      return null;
    }

    return parseSessionHash(uploadId, data);
  }

  async getCompleted(uploadId: string): Promise<CompletedUpload | null> {
    const raw = await this.redis.get(uploadKeys.completed(uploadId));
    if (raw === null || raw === undefined) return null;
    if (typeof raw !== "string") {
      throw new UploadError("CORRUPT_UPLOAD_SESSION", `Completion record for ${uploadId} is corrupt`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new UploadError(
        "CORRUPT_UPLOAD_SESSION",
        `Completion record for ${uploadId} is not JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const parsed = CompletedUploadRecord.safeParse(json);
    if (!parsed.success) {
      throw new UploadError("CORRUPT_UPLOAD_SESSION", `Completion record for ${uploadId} is corrupt`);
    }
    return parsed.data;
  }

  async markCompleted(record: CompletedUpload): Promise<void> {
    const tx = await this.redis
      .multi()
      .set(uploadKeys.completed(record.uploadId), JSON.stringify(record), {
        ex: this.completedTtlSeconds,
      })
      .del(uploadKeys.session(record.uploadId))
      .exec();

    if (!tx) {
      throw new Error("REDIS_FINALIZE_TRANSACTION_FAILED");
    }
  }

  async remove(uploadId: string): Promise<void> {
    await this.redis.del(uploadKeys.session(uploadId));
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
