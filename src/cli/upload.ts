// src/cli/upload.ts

import minimist from "minimist";
import { pino, destination } from "pino";
import type { Logger } from "pino";

import { ArtifactIntegrityError, InvalidSourceError, describeError } from "../client/errors.js";
import { TransferController } from "../client/transfer.controller.js";
import type { TransferOutcome } from "../client/transfer.controller.js";
import { HttpUploadTransport } from "../client/transport.js";
import type { FetchLike } from "../client/transport.js";
import type { RetryPolicy, Sleep } from "../client/retry.js";

export const EXIT_COMPLETED = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_RESUMABLE = 3;

const DEFAULT_SERVER = "http://localhost:9000";

export const USAGE = `Usage: chunk-upload <file> [options]

Uploads <file> in chunks and resumes from where a previous run stopped.

Options:
  --server <url>        Upload server base URL (default: $UPLOAD_SERVER_URL or ${DEFAULT_SERVER})
  --max-chunks <n>      Stop after sending n new chunks (simulates a dropped link)
  --chunk-size <bytes>  Chunk size to request for a new session
  --timeout-ms <ms>     Per-request timeout
  --verbose             Debug logging
  --quiet               Errors only
  -h, --help            Show this help

Exit status: 0 completed, 3 incomplete (run again to resume), 2 usage or input error, 1 other failure.`;

export interface UploadCliArgs {
  file: string;
  server: string;
  maxNewChunks?: number;
  chunkSize?: number;
  timeoutMs?: number;
  logLevel: "debug" | "info" | "error";
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseIntegerOption(name: string, raw: unknown, min: number): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    throw new UsageError(`--${name} must be an integer >= ${min}`);
  }
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new UsageError(`--${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseUploadArgs(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): UploadCliArgs | "help" {
  const args = minimist(argv, {
    string: ["server", "max-chunks", "chunk-size", "timeout-ms"],
    boolean: ["verbose", "quiet", "help"],
    alias: { h: "help" },
    unknown: (arg) => {
      if (arg.startsWith("-")) {
        throw new UsageError(`Unknown option: ${arg}`);
      }
      return true;
    },
  });

  if (args.help) return "help";

  const positional = args._.map(String);
  if (positional.length !== 1) {
    throw new UsageError(positional.length === 0 ? "Missing <file>" : "Expected exactly one <file>");
  }

  const serverArg: unknown = args.server;
  const server =
    typeof serverArg === "string" && serverArg !== ""
      ? serverArg
      : env.UPLOAD_SERVER_URL || DEFAULT_SERVER;
  if (!/^https?:\/\//.test(server)) {
    throw new UsageError("--server must start with http:// or https://");
  }

  const verbose = args.verbose === true;
  const quiet = args.quiet === true;

  return {
    file: positional[0],
    server,
    maxNewChunks: parseIntegerOption("max-chunks", args["max-chunks"], 0),
    chunkSize: parseIntegerOption("chunk-size", args["chunk-size"], 1),
    timeoutMs: parseIntegerOption("timeout-ms", args["timeout-ms"], 1),
    logLevel: verbose ? "debug" : quiet ? "error" : "info",
  };
}

export function exitCodeFor(outcome: TransferOutcome): number {
  return outcome.state === "done" ? EXIT_COMPLETED : EXIT_RESUMABLE;
}

export interface UploadCliDeps {
  fetch?: FetchLike;
  sleep?: Sleep;
  policy?: RetryPolicy;
  log?: Logger;
  env?: Record<string, string | undefined>;
  stdout?: (line: string) => void;
}

/** Runs one upload invocation and returns the process exit status. */
export async function runUploadCli(argv: string[], deps: UploadCliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => void process.stdout.write(`${line}\n`));

  let args: UploadCliArgs | "help";
  try {
    args = parseUploadArgs(argv, deps.env);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (args === "help") {
    stdout(USAGE);
    return EXIT_COMPLETED;
  }

  const log =
    deps.log ??
    pino({ name: "chunk-upload", level: args.logLevel }, destination(2));

  let transport: HttpUploadTransport;
  try {
    transport = new HttpUploadTransport({
      baseUrl: args.server,
      timeoutMs: args.timeoutMs,
      fetch: deps.fetch,
    });
  } catch (err) {
    log.error(describeError(err));
    return EXIT_USAGE;
  }

  const controller = new TransferController({
    transport,
    policy: deps.policy,
    sleep: deps.sleep,
    log,
    onChunk: ({ index, accepted, totalChunks, attempts }) => {
      log.info({ index, attempts }, `Chunk ${index} accepted (${accepted}/${totalChunks})`);
    },
  });

  try {
    const outcome = await controller.run(args.file, {
      maxNewChunks: args.maxNewChunks,
      chunkSize: args.chunkSize,
    });

    if (outcome.state === "done") {
      stdout(`Upload succeeded: ${outcome.artifact.path}`);
    } else {
      stdout(
        `Upload incomplete (${outcome.reason}); ${outcome.missingChunks.length} chunk(s) outstanding. Run again to resume.`
      );
    }
    return exitCodeFor(outcome);
  } catch (err) {
    if (err instanceof InvalidSourceError) {
      log.error(err.message);
      return EXIT_USAGE;
    }
    if (err instanceof ArtifactIntegrityError) {
      log.error({ uploadId: err.uploadId, expected: err.expected, actual: err.actual }, err.message);
      return EXIT_FAILURE;
    }
    log.error({ err }, `Upload failed: ${describeError(err)}`);
    return EXIT_FAILURE;
  }
}
