// src/config/uploads.config.ts

import os from "os";
import path from "path";

export interface UploadConfig {
  /** Chunk staging area: one directory per upload id. */
  tmpDir: string;
  /** Where assembled artifacts are published. */
  artifactDir: string;
  maxFileSizeBytes: number;
  maxTotalChunks: number;
  /** How long a completion tombstone is kept for repeated complete/status calls. */
  completedTtlSeconds: number;
}

export interface ChunkConfig {
  minBytes: number;
  maxBytes: number;
  defaultBytes: number;
}

type Env = Record<string, string | undefined>;

export function parsePositiveIntEnv(
  env: Env,
  name: string,
  fallback: number,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function resolveTmpDir(raw: string | undefined): string {
  if (!raw) {
    throw new Error("Missing required env: UPLOAD_TMP_DIR");
  }
  if (!path.isAbsolute(raw)) {
    throw new Error("UPLOAD_TMP_DIR must be an absolute path");
  }

  const dir = path.resolve(raw);
  const home = os.homedir();
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_TMP_DIR is unsafe: ${dir}`);
  }
  return dir;
}

export function loadChunkConfig(env: Env = process.env): ChunkConfig {
  const minBytes = parsePositiveIntEnv(env, "UPLOAD_CHUNK_MIN_BYTES", 256 * 1024); // 256 KB
  const maxBytes = parsePositiveIntEnv(env, "UPLOAD_CHUNK_MAX_BYTES", 64 * 1024 * 1024); // 64 MB
  const defaultBytes = parsePositiveIntEnv(env, "UPLOAD_CHUNK_DEFAULT_BYTES", 10 * 1024 * 1024); // 10 MB

  if (minBytes > maxBytes) {
    throw new Error("UPLOAD_CHUNK_MIN_BYTES must not exceed UPLOAD_CHUNK_MAX_BYTES");
  }
  if (defaultBytes < minBytes || defaultBytes > maxBytes) {
    throw new Error("UPLOAD_CHUNK_DEFAULT_BYTES must lie within the min/max chunk bounds");
  }

  return { minBytes, maxBytes, defaultBytes };
}

export function loadUploadConfig(env: Env = process.env): UploadConfig {
  const tmpDir = resolveTmpDir(env.UPLOAD_TMP_DIR);

  const artifactDir = env.UPLOAD_ARTIFACT_DIR
    ? path.resolve(env.UPLOAD_ARTIFACT_DIR)
    : path.join(tmpDir, "artifacts");

  if (artifactDir === tmpDir) {
    throw new Error("UPLOAD_ARTIFACT_DIR must differ from UPLOAD_TMP_DIR");
  }

  return {
    tmpDir,
    artifactDir,
    maxFileSizeBytes: parsePositiveIntEnv(env, "UPLOAD_MAX_FILE_BYTES", 15 * 1024 * 1024 * 1024), // 15 GB
    maxTotalChunks: parsePositiveIntEnv(env, "UPLOAD_MAX_TOTAL_CHUNKS", 100_000),
    completedTtlSeconds: parsePositiveIntEnv(env, "UPLOAD_COMPLETED_TTL_SECONDS", 24 * 60 * 60),
  };
}
