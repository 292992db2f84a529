// src/protocol/uploads.protocol.ts
//
// Wire schemas shared by the API routes and the upload client.

import { z } from "zod";

const uploadId = z.string().uuid();
const chunkIndex = z.number().int().nonnegative();
const sha256Hex = z.string().regex(/^[0-9a-f]{64}$/);

export const InitiateUploadRequest = z.object({
  filename: z.string().min(1).max(512),
  sizeBytes: z.number().int().nonnegative(),
  chunkSize: z.number().int().positive().optional(),
});
export type InitiateUploadRequest = z.infer<typeof InitiateUploadRequest>;

export const InitiateUploadResponse = z.object({
  uploadId,
  chunkSize: z.number().int().positive(),
  totalChunks: z.number().int().positive(),
});
export type InitiateUploadResponse = z.infer<typeof InitiateUploadResponse>;

export const UploadArtifact = z.object({
  name: z.string(),
  path: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  sha256: sha256Hex,
});
export type UploadArtifact = z.infer<typeof UploadArtifact>;

export const UploadStatusResponse = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("open"),
    uploadId,
    filename: z.string(),
    sizeBytes: z.number().int().nonnegative(),
    chunkSize: z.number().int().positive(),
    totalChunks: z.number().int().positive(),
    receivedChunks: z.array(chunkIndex),
  }),
  z.object({
    status: z.literal("completed"),
    uploadId,
    filename: z.string(),
    artifact: UploadArtifact,
  }),
]);
export type UploadStatusResponse = z.infer<typeof UploadStatusResponse>;

export const PutChunkResponse = z.object({
  ok: z.literal(true),
  uploadId,
  chunkIndex,
  sizeBytes: z.number().int().nonnegative(),
});
export type PutChunkResponse = z.infer<typeof PutChunkResponse>;

export const CompleteUploadResponse = z.object({
  status: z.literal("completed"),
  uploadId,
  artifact: UploadArtifact,
});
export type CompleteUploadResponse = z.infer<typeof CompleteUploadResponse>;

export const CancelUploadResponse = z.object({
  ok: z.literal(true),
  uploadId,
  status: z.literal("canceled"),
});
export type CancelUploadResponse = z.infer<typeof CancelUploadResponse>;

export const ApiErrorResponse = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    retryable: z.boolean(),
    details: z.record(z.unknown()).optional(),
  }),
});
export type ApiErrorResponse = z.infer<typeof ApiErrorResponse>;

export const CHUNK_SHA256_HEADER = "x-chunk-sha256";

export function isSha256Hex(value: unknown): value is string {
  return sha256Hex.safeParse(value).success;
}
