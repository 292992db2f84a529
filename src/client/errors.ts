// src/client/errors.ts

/** Network failure, timeout, or a response that never arrived. Always retryable. */
export class TransportError extends Error {
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** The server answered with an error envelope (or a bare non-2xx status). */
export class ApiRequestError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(params: {
    statusCode: number;
    code: string;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  }) {
    super(`${params.code} (${params.statusCode}): ${params.message}`);
    this.name = "ApiRequestError";
    this.statusCode = params.statusCode;
    this.code = params.code;
    this.retryable = params.retryable;
    this.details = params.details;
  }
}

/** The server does not know the upload id. Never retried. */
export class UploadNotFoundError extends ApiRequestError {
  constructor(readonly uploadId: string, message = "Invalid uploadId") {
    super({ statusCode: 404, code: "UPLOAD_NOT_FOUND", message, retryable: false });
    this.name = "UploadNotFoundError";
  }
}

/** A 2xx response whose body does not match the protocol schema. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class RetriesExhaustedError extends Error {
  constructor(readonly attempts: number, options: { cause: unknown }) {
    super(`Gave up after ${attempts} attempts: ${describeError(options.cause)}`, options);
    this.name = "RetriesExhaustedError";
  }
}

export class ChunkUploadFailedError extends Error {
  constructor(
    readonly index: number,
    readonly attempts: number,
    options: { cause: unknown }
  ) {
    super(`Chunk ${index} failed after ${attempts} attempts: ${describeError(options.cause)}`, options);
    this.name = "ChunkUploadFailedError";
  }
}

/** The assembled artifact does not hash to the source file's checksum. */
export class ArtifactIntegrityError extends Error {
  constructor(
    readonly uploadId: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Artifact for upload ${uploadId} has sha256 ${actual}, expected ${expected}`);
    this.name = "ArtifactIntegrityError";
  }
}

/** The source path is missing or not a regular file. */
export class InvalidSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSourceError";
  }
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof TransportError) return true;
  if (err instanceof ApiRequestError) return err.retryable;
  return false;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
