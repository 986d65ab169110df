/**
 * Atomic file write utilities.
 * A reader of the target path sees either the old content or the new, never a
 * partial write.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { err, ok, type Result } from 'neverthrow';

/**
 * Write `content` to a temp file beside `path`, then rename it into place.
 * The temp file is removed if any step fails.
 */
export async function writeFileAtomically(path: string, content: string): Promise<Result<string, Error>> {
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    return ok(path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
