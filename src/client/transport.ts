// src/client/transport.ts

import type { z } from "zod";

import {
  ApiErrorResponse,
  CHUNK_SHA256_HEADER,
  CompleteUploadResponse,
  InitiateUploadResponse,
  PutChunkResponse,
  UploadStatusResponse,
} from "../protocol/uploads.protocol.js";
import type { InitiateUploadRequest } from "../protocol/uploads.protocol.js";
import {
  ApiRequestError,
  ProtocolError,
  TransportError,
  UploadNotFoundError,
  describeError,
} from "./errors.js";

/** The four wire operations the transfer client needs. */
export interface UploadTransport {
  initiate(request: InitiateUploadRequest): Promise<InitiateUploadResponse>;
  status(uploadId: string): Promise<UploadStatusResponse>;
  putChunk(uploadId: string, index: number, bytes: Buffer, sha256: string): Promise<PutChunkResponse>;
  complete(uploadId: string): Promise<CompleteUploadResponse>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpUploadTransportOptions {
  /** Server base URL, e.g. `http://localhost:9000`. */
  baseUrl: string;
  /** Per-request deadline; an expired request fails as a retryable TransportError. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

// Chunks can be large and links slow; a request is only abandoned well after
// a healthy transfer would have finished.
const DEFAULT_TIMEOUT_MS = 120_000;

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class HttpUploadTransport implements UploadTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpUploadTransportOptions) {
    if (!/^https?:\/\//.test(options.baseUrl)) {
      throw new Error("Server URL must start with http:// or https://");
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  initiate(request: InitiateUploadRequest): Promise<InitiateUploadResponse> {
    return this.request(InitiateUploadResponse, "/v1/uploads", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(request),
    });
  }

  status(uploadId: string): Promise<UploadStatusResponse> {
    return this.request(
      UploadStatusResponse,
      `/v1/uploads/${encodeURIComponent(uploadId)}/status`,
      { method: "GET" },
      uploadId
    );
  }

  putChunk(uploadId: string, index: number, bytes: Buffer, sha256: string): Promise<PutChunkResponse> {
    const form = new FormData();
    form.append("file", new Blob([bytes]), "chunk");

    return this.request(
      PutChunkResponse,
      `/v1/uploads/${encodeURIComponent(uploadId)}/chunk/${index}`,
      {
        method: "PUT",
        headers: { [CHUNK_SHA256_HEADER]: sha256 },
        body: form,
      },
      uploadId
    );
  }

  complete(uploadId: string): Promise<CompleteUploadResponse> {
    return this.request(
      CompleteUploadResponse,
      `/v1/uploads/${encodeURIComponent(uploadId)}/complete`,
      { method: "POST" },
      uploadId
    );
  }

  private async request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    path: string,
    init: RequestInit,
    uploadId?: string
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: controller.signal,
      });
      text = await res.text();
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(err);
      throw new TransportError(`${init.method ?? "GET"} ${path} failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    const json = parseJson(text);

    if (!res.ok) {
      const envelope = ApiErrorResponse.safeParse(json);
      const error = envelope.success ? envelope.data.error : null;

      if (res.status === 404 && uploadId && error?.code === "UPLOAD_NOT_FOUND") {
        throw new UploadNotFoundError(uploadId, error.message);
      }

      throw new ApiRequestError({
        statusCode: res.status,
        code: error?.code ?? `HTTP_${res.status}`,
        message: error?.message ?? (text.slice(0, 200) || res.statusText),
        // 5xx and 429 are transient whatever the body says.
        retryable: res.status >= 500 || res.status === 429 || (error?.retryable ?? false),
        details: error?.details,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ProtocolError(`Unexpected response from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
