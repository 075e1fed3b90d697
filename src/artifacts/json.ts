import { readFile, writeFile, appendFile, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ensureDir } from './paths.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write JSON through a temp file and rename, so readers never see a half-written file.
 */
export async function writeJsonAtomic<T>(path: string, data: T): Promise<void> {
  await ensureDir(dirname(path));
  const tmpPath = `${path}.${process.pid}.tmp`;
  await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  await rename(tmpPath, path);
}

export async function readText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function appendJsonLine<T>(path: string, entry: T): Promise<void> {
  await ensureDir(dirname(path));
  await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf-8');
}
