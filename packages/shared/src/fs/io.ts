import { promises as fs, createWriteStream } from 'fs';
import { randomUUID } from 'crypto';
import { dirname } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import fse from 'fs-extra';

function tmpSibling(path: string): string {
  return `${path}.${randomUUID()}.partial`;
}

export async function ensureDir(path: string): Promise<void> {
  await fse.ensureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = tmpSibling(path);
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

/**
 * Streams `source` into a temporary sibling of `path`, then renames it over
 * `path`. The parent directory must already exist. On failure the partial file
 * is removed and the error rethrown.
 */
export async function atomicWriteStream(path: string, source: Readable): Promise<void> {
  const tempPath = tmpSibling(path);
  try {
    await pipeline(source, createWriteStream(tempPath));
    await fs.rename(tempPath, path);
  } catch (error) {
    await fse.remove(tempPath);
    throw error;
  }
}
