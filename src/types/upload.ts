// src/types/upload.ts

export interface UploadSession {
  uploadId: string;
  filename: string;
  sizeBytes: number;
  chunkSize: number;
  totalChunks: number;
  status: "open";
  createdAt: number;
}

export interface UploadArtifact {
  name: string;
  path: string;
  sizeBytes: number;
  sha256: string;
}

export interface CompletedUpload {
  uploadId: string;
  filename: string;
  status: "completed";
  artifact: UploadArtifact;
  completedAt: number;
}

export type UploadErrorCode =
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_ALREADY_COMPLETED"
  | "UPLOAD_INCOMPLETE"
  | "INVALID_CHUNK_INDEX"
  | "CHUNK_TOO_LARGE"
  | "CHUNK_SIZE_MISMATCH"
  | "HASH_MISMATCH"
  | "FILE_TOO_LARGE"
  | "TOO_MANY_CHUNKS"
  | "ASSEMBLY_SIZE_MISMATCH"
  | "CORRUPT_UPLOAD_SESSION";

export class UploadError extends Error {
  readonly code: UploadErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: UploadErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? code);
    this.name = "UploadError";
    this.code = code;
    this.details = details;
  }
}
