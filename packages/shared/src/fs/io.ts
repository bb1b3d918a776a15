// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, ensureFile as fseEnsureFile } from 'fs-extra';

export async function ensureDir(dir: string): Promise<void> {
  await fseEnsureDir(dir);
}

/** Creates an empty file at `file` unless one exists, along with its directory. */
export async function ensureFile(file: string): Promise<void> {
  await fseEnsureFile(file);
}

/**
 * Writes `content` to a temporary file beside `path` and renames it into place,
 * so readers see either the previous file or the complete new one.
 */
export async function atomicWrite(path: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(path);
  await ensureDir(dir);
  const tempPath = await tmpName({ dir, prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
