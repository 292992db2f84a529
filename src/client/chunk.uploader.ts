// src/client/chunk.uploader.ts

import type { Logger } from "pino";

import { sha256Hex } from "../utils/hash.js";
import { ChunkUploadFailedError, RetriesExhaustedError, describeError } from "./errors.js";
import { DEFAULT_RETRY_POLICY, sleep as realSleep, withRetry } from "./retry.js";
import type { RetryPolicy, Sleep } from "./retry.js";
import type { UploadTransport } from "./transport.js";

export interface ChunkUploaderOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
  log?: Logger;
}

export interface ChunkUploadResult {
  index: number;
  sizeBytes: number;
  attempts: number;
}

/**
 * Delivers one chunk. Every attempt is a full resend of the same bytes, which
 * the server stores idempotently per index. Non-retryable errors (unknown
 * session, rejected chunk) propagate untouched; an exhausted schedule becomes
 * ChunkUploadFailedError.
 */
export class ChunkUploader {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    private readonly transport: UploadTransport,
    private readonly options: ChunkUploaderOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? realSleep;
  }

  async upload(uploadId: string, index: number, bytes: Buffer): Promise<ChunkUploadResult> {
    const sha256 = sha256Hex(bytes);
    let attempts = 0;

    try {
      const ack = await withRetry(
        async (attempt) => {
          attempts = attempt;
          return this.transport.putChunk(uploadId, index, bytes, sha256);
        },
        {
          policy: this.policy,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.options.log?.warn(
              { uploadId, index, attempt, delayMs, err: describeError(error) },
              `Chunk ${index} upload attempt ${attempt} failed; retrying in ${delayMs}ms`
            );
          },
        }
      );

      return { index, sizeBytes: ack.sizeBytes, attempts };
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        throw new ChunkUploadFailedError(index, err.attempts, { cause: err.cause });
      }
      throw err;
    }
  }
}
