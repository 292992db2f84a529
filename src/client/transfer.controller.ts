// src/client/transfer.controller.ts

import fs from "fs/promises";
import path from "path";
import type { Logger } from "pino";

import type { UploadArtifact } from "../protocol/uploads.protocol.js";
import { sha256File } from "../utils/hash.js";
import { ChunkUploader } from "./chunk.uploader.js";
import {
  ArtifactIntegrityError,
  ChunkUploadFailedError,
  InvalidSourceError,
  RetriesExhaustedError,
  UploadNotFoundError,
  describeError,
  isRetryable,
} from "./errors.js";
import { ClientProgress } from "./progress.js";
import type { ProgressRecord } from "./progress.js";
import { DEFAULT_RETRY_POLICY, sleep as realSleep, withRetry } from "./retry.js";
import type { RetryPolicy, Sleep } from "./retry.js";
import type { UploadTransport } from "./transport.js";

export type TransferState =
  | "start"
  | "fresh"
  | "resumed"
  | "transferring"
  | "completing"
  | "done"
  | "aborted";

export type TransferOutcome =
  | {
      state: "done";
      uploadId: string;
      artifact: UploadArtifact;
      resumed: boolean;
      chunksSent: number;
      totalChunks: number;
    }
  | {
      state: "aborted";
      reason: "chunk-limit" | "chunk-failed" | "session-lost" | "server-unavailable";
      uploadId: string | null;
      chunksSent: number;
      totalChunks: number | null;
      missingChunks: number[];
      error?: Error;
    }
  | {
      // Every chunk is on the server but completion did not succeed; rerun to retry it.
      state: "transferring";
      reason: "completion-failed";
      uploadId: string;
      chunksSent: number;
      totalChunks: number;
      missingChunks: number[];
      error: Error;
    };

export interface TransferOptions {
  /** Stop after this many newly sent chunks in this run. */
  maxNewChunks?: number;
  /** Chunk size to request when a new session is created; the server may clamp it. */
  chunkSize?: number;
}

export interface TransferControllerOptions {
  transport: UploadTransport;
  progress?: ClientProgress;
  uploader?: ChunkUploader;
  policy?: RetryPolicy;
  sleep?: Sleep;
  log?: Logger;
  onStateChange?: (state: TransferState, uploadId: string | null) => void;
  onChunk?: (info: { index: number; accepted: number; totalChunks: number; attempts: number }) => void;
}

/** `max(1, ceil(fileSize / chunkSize))`: an empty file is still one (empty) chunk. */
export function computeTotalChunks(fileSize: number, chunkSize: number): number {
  return Math.max(1, Math.ceil(fileSize / chunkSize));
}

export function chunkRange(index: number, chunkSize: number, fileSize: number): { start: number; end: number } {
  const start = index * chunkSize;
  return { start, end: Math.min(fileSize, start + chunkSize) };
}

interface ActiveSession {
  record: ProgressRecord;
  accepted: Set<number>;
  resumed: boolean;
}

type ResumeResult =
  | { kind: "open"; session: ActiveSession }
  | { kind: "completed"; outcome: TransferOutcome }
  | { kind: "discarded" };

function missingIndices(accepted: Set<number>, totalChunks: number): number[] {
  const missing: number[] = [];
  for (let i = 0; i < totalChunks; i++) {
    if (!accepted.has(i)) missing.push(i);
  }
  return missing;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Client-side state machine for one source file:
 * start → fresh | resumed → transferring → completing → done, with `aborted`
 * as a resumable pause. Progress is persisted after every accepted chunk, so
 * killing the process at any point and running again converges.
 */
export class TransferController {
  private readonly transport: UploadTransport;
  private readonly progress: ClientProgress;
  private readonly uploader: ChunkUploader;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly log?: Logger;

  constructor(private readonly options: TransferControllerOptions) {
    this.transport = options.transport;
    this.log = options.log;
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? realSleep;
    this.progress = options.progress ?? new ClientProgress(options.log);
    this.uploader =
      options.uploader ??
      new ChunkUploader(options.transport, {
        policy: this.policy,
        sleep: this.sleep,
        log: options.log,
      });
  }

  async run(sourcePath: string, runOptions: TransferOptions = {}): Promise<TransferOutcome> {
    const { maxNewChunks } = runOptions;
    if (maxNewChunks !== undefined && (!Number.isInteger(maxNewChunks) || maxNewChunks < 0)) {
      throw new RangeError("maxNewChunks must be a non-negative integer");
    }

    this.transition("start", null);

    const fileSize = await this.statSource(sourcePath);
    const checksum = await sha256File(sourcePath);
    const filename = path.basename(sourcePath);

    let session: ActiveSession | null = null;

    const existing = await this.progress.load(sourcePath);
    if (existing && !this.progress.validate(existing, checksum)) {
      this.log?.info(
        { uploadId: existing.uploadId },
        "File changed since previous upload; discarding progress and starting new session"
      );
      await this.progress.clear(sourcePath);
    } else if (existing) {
      let resumed: ResumeResult;
      try {
        resumed = await this.resume(sourcePath, existing, checksum);
      } catch (err) {
        return this.unavailable(err, existing.uploadId);
      }

      if (resumed.kind === "completed") return resumed.outcome;
      if (resumed.kind === "open") session = resumed.session;
    }

    if (!session) {
      try {
        session = await this.startFresh(sourcePath, { filename, fileSize, checksum, chunkSize: runOptions.chunkSize });
      } catch (err) {
        return this.unavailable(err, null);
      }
    }

    return this.transfer(sourcePath, session, checksum, maxNewChunks);
  }

  private transition(state: TransferState, uploadId: string | null) {
    this.log?.debug({ state, uploadId }, "Transfer state");
    this.options.onStateChange?.(state, uploadId);
  }

  private async statSource(sourcePath: string): Promise<number> {
    let stat;
    try {
      stat = await fs.stat(sourcePath);
    } catch (err) {
      throw new InvalidSourceError(`Cannot read ${sourcePath}: ${describeError(err)}`);
    }
    if (!stat.isFile()) {
      throw new InvalidSourceError(`${sourcePath} is not a file`);
    }
    return stat.size;
  }

  private retry<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, {
      policy: this.policy,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this.log?.warn(
          { attempt, delayMs, err: describeError(error) },
          `Request attempt ${attempt} failed; retrying in ${delayMs}ms`
        );
      },
    });
  }

  /** Transport trouble outside chunk upload: pause, keep progress. Anything else propagates. */
  private unavailable(err: unknown, uploadId: string | null): TransferOutcome {
    if (!(err instanceof RetriesExhaustedError) && !isRetryable(err)) {
      throw err;
    }
    this.log?.warn({ uploadId, err: describeError(err) }, "Upload server unavailable; run again to resume");
    this.transition("aborted", uploadId);
    return {
      state: "aborted",
      reason: "server-unavailable",
      uploadId,
      chunksSent: 0,
      totalChunks: null,
      missingChunks: [],
      error: asError(err),
    };
  }

  private async resume(
    sourcePath: string,
    record: ProgressRecord,
    checksum: string
  ): Promise<ResumeResult> {
    let status;
    try {
      status = await this.retry(() => this.transport.status(record.uploadId));
    } catch (err) {
      if (err instanceof UploadNotFoundError) {
        this.log?.info({ uploadId: record.uploadId }, "Server no longer knows this upload; starting new session");
        await this.progress.clear(sourcePath);
        return { kind: "discarded" };
      }
      throw err;
    }

    if (status.status === "completed") {
      // A previous run completed server-side but stopped before clearing progress.
      this.transition("completing", record.uploadId);
      const totalChunks = computeTotalChunks(record.fileSize, record.chunkSize);
      const outcome = await this.finish(sourcePath, record.uploadId, status.artifact, checksum, {
        resumed: true,
        chunksSent: 0,
        totalChunks,
      });
      return { kind: "completed", outcome };
    }

    if (status.chunkSize !== record.chunkSize || status.sizeBytes !== record.fileSize) {
      this.log?.warn(
        { uploadId: record.uploadId, local: record.chunkSize, remote: status.chunkSize },
        "Remote session does not match local progress; starting new session"
      );
      await this.progress.clear(sourcePath);
      return { kind: "discarded" };
    }

    this.log?.info(
      { uploadId: record.uploadId, accepted: status.receivedChunks.length, totalChunks: status.totalChunks },
      "Resuming upload"
    );
    this.transition("resumed", record.uploadId);

    return {
      kind: "open",
      session: {
        record,
        accepted: new Set(status.receivedChunks),
        resumed: true,
      },
    };
  }

  private async startFresh(
    sourcePath: string,
    input: { filename: string; fileSize: number; checksum: string; chunkSize?: number }
  ): Promise<ActiveSession> {
    const info = await this.retry(() =>
      this.transport.initiate({
        filename: input.filename,
        sizeBytes: input.fileSize,
        ...(input.chunkSize !== undefined && { chunkSize: input.chunkSize }),
      })
    );

    const record: ProgressRecord = {
      version: 1,
      uploadId: info.uploadId,
      chunkSize: info.chunkSize,
      fileSize: input.fileSize,
      filename: input.filename,
      sha256: input.checksum,
      acceptedChunks: [],
      updatedAt: Date.now(),
    };
    await this.progress.persist(sourcePath, record);

    this.log?.info({ uploadId: info.uploadId, chunkSize: info.chunkSize }, "Initiated upload");
    this.transition("fresh", info.uploadId);

    return { record, accepted: new Set(), resumed: false };
  }

  private async transfer(
    sourcePath: string,
    session: ActiveSession,
    checksum: string,
    maxNewChunks: number | undefined
  ): Promise<TransferOutcome> {
    const { record, accepted } = session;
    const { uploadId, chunkSize, fileSize } = record;
    const totalChunks = computeTotalChunks(fileSize, chunkSize);

    this.transition("transferring", uploadId);

    let chunksSent = 0;
    const handle = await fs.open(sourcePath, "r");

    try {
      for (let index = 0; index < totalChunks; index++) {
        if (accepted.has(index)) continue;

        if (maxNewChunks !== undefined && chunksSent >= maxNewChunks) {
          this.log?.info({ uploadId, maxNewChunks }, `Reached max new chunks (${maxNewChunks}); stopping`);
          this.transition("aborted", uploadId);
          return {
            state: "aborted",
            reason: "chunk-limit",
            uploadId,
            chunksSent,
            totalChunks,
            missingChunks: missingIndices(accepted, totalChunks),
          };
        }

        const { start, end } = chunkRange(index, chunkSize, fileSize);
        const bytes = Buffer.alloc(end - start);
        const { bytesRead } = await handle.read(bytes, 0, bytes.length, start);
        if (bytesRead !== bytes.length) {
          throw new Error(`Short read of chunk ${index}: ${bytesRead}/${bytes.length} bytes`);
        }

        let attempts: number;
        try {
          ({ attempts } = await this.uploader.upload(uploadId, index, bytes));
        } catch (err) {
          if (err instanceof ChunkUploadFailedError) {
            this.log?.warn({ uploadId, index, err: err.message }, "Chunk failed after retries; run again to resume");
            this.transition("aborted", uploadId);
            return {
              state: "aborted",
              reason: "chunk-failed",
              uploadId,
              chunksSent,
              totalChunks,
              missingChunks: missingIndices(accepted, totalChunks),
              error: err,
            };
          }
          if (err instanceof UploadNotFoundError) {
            this.log?.warn({ uploadId }, "Server lost the upload session; progress cleared");
            await this.progress.clear(sourcePath);
            this.transition("aborted", uploadId);
            return {
              state: "aborted",
              reason: "session-lost",
              uploadId,
              chunksSent,
              totalChunks,
              missingChunks: missingIndices(accepted, totalChunks),
              error: err,
            };
          }
          throw err;
        }

        accepted.add(index);
        chunksSent++;
        record.acceptedChunks = [...accepted].sort((a, b) => a - b);
        record.updatedAt = Date.now();
        await this.progress.persist(sourcePath, record);

        this.options.onChunk?.({ index, accepted: accepted.size, totalChunks, attempts });
      }
    } finally {
      await handle.close();
    }

    this.transition("completing", uploadId);

    let artifact: UploadArtifact;
    try {
      ({ artifact } = await this.retry(() => this.transport.complete(uploadId)));
    } catch (err) {
      if (err instanceof UploadNotFoundError) {
        await this.progress.clear(sourcePath);
        this.transition("aborted", uploadId);
        return {
          state: "aborted",
          reason: "session-lost",
          uploadId,
          chunksSent,
          totalChunks,
          missingChunks: missingIndices(accepted, totalChunks),
          error: err,
        };
      }

      this.log?.warn({ uploadId, err: describeError(err) }, "Completion failed; progress kept for retry");
      this.transition("transferring", uploadId);
      return {
        state: "transferring",
        reason: "completion-failed",
        uploadId,
        chunksSent,
        totalChunks,
        missingChunks: [],
        error: asError(err),
      };
    }

    return this.finish(sourcePath, uploadId, artifact, checksum, {
      resumed: session.resumed,
      chunksSent,
      totalChunks,
    });
  }

  private async finish(
    sourcePath: string,
    uploadId: string,
    artifact: UploadArtifact,
    checksum: string,
    stats: { resumed: boolean; chunksSent: number; totalChunks: number }
  ): Promise<TransferOutcome> {
    // The session is spent either way; a new run must start from scratch.
    await this.progress.clear(sourcePath);

    if (artifact.sha256 !== checksum) {
      throw new ArtifactIntegrityError(uploadId, checksum, artifact.sha256);
    }

    this.log?.info({ uploadId, artifact: artifact.path, sizeBytes: artifact.sizeBytes }, "Upload complete");
    this.transition("done", uploadId);

    return { state: "done", uploadId, artifact, ...stats };
  }
}
