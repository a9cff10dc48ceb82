/**
 * @fileoverview Write-then-rename file replacement
 */

import { randomUUID } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';

/**
 * Replace `path` with `content` through a sibling temp file. Readers see
 * either the old file or the new one. On failure the temp file is removed
 * and the error rethrown.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmpPath, content, 'utf8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
