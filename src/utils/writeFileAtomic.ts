// src/utils/writeFileAtomic.ts

import fs from "fs/promises";
import crypto from "crypto";

/**
 * Write to a sibling temp file and rename it over the target, so readers see
 * either the previous content or the new content and never a torn write.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;

  try {
    await fs.writeFile(tempPath, data, { flag: "wx" });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
