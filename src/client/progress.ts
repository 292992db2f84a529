// src/client/progress.ts

import fs from "fs/promises";
import { z } from "zod";
import type { Logger } from "pino";

import { writeFileAtomic } from "../utils/writeFileAtomic.js";

export const PROGRESS_FILE_SUFFIX = ".uploadmeta.json";

export const ProgressRecord = z.object({
  version: z.literal(1),
  uploadId: z.string().uuid(),
  chunkSize: z.number().int().positive(),
  fileSize: z.number().int().nonnegative(),
  filename: z.string().min(1),
  /** SHA-256 of the whole source file when the session was created. */
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  /** Last known accepted indices; informational, the server stays authoritative. */
  acceptedChunks: z.array(z.number().int().nonnegative()),
  updatedAt: z.number(),
});
export type ProgressRecord = z.infer<typeof ProgressRecord>;

export function progressPathFor(sourcePath: string): string {
  return `${sourcePath}${PROGRESS_FILE_SUFFIX}`;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * The on-disk progress record that ties a source file to a remote session.
 * One record per source path, stored beside the file.
 */
export class ClientProgress {
  constructor(private readonly log?: Logger) {}

  /**
   * Missing, unparseable or malformed records all read as `null`: a torn write
   * means "start over", never a fatal error. Other read errors propagate.
   */
  async load(sourcePath: string): Promise<ProgressRecord | null> {
    const file = progressPathFor(sourcePath);

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log?.warn({ file, err }, "Progress file is not valid JSON; ignoring it");
      return null;
    }

    const parsed = ProgressRecord.safeParse(json);
    if (!parsed.success) {
      this.log?.warn({ file, issues: parsed.error.issues }, "Progress file is malformed; ignoring it");
      return null;
    }
    return parsed.data;
  }

  /** `false` means the file changed since the session began and the record must be discarded. */
  validate(record: ProgressRecord, currentChecksum: string): boolean {
    return record.sha256 === currentChecksum;
  }

  async persist(sourcePath: string, record: ProgressRecord): Promise<void> {
    await writeFileAtomic(progressPathFor(sourcePath), JSON.stringify(record));
  }

  async clear(sourcePath: string): Promise<void> {
    await fs.rm(progressPathFor(sourcePath), { force: true });
  }
}
