import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError } from './errors.js';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Reads a UTF-8 file, or returns null when it does not exist. Other errors propagate. */
export async function readTextOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await fs.stat(filePath)).size;
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Replaces `filePath` with `content` through a sibling temp file and a rename,
 * so readers see either the old or the new file, never a partial one.
 */
export async function writeFileAtomic(filePath: string, content: string, opts?: { mode?: number }): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await ensureDir(path.dirname(filePath));
    await fs.writeFile(tmpPath, content, { encoding: 'utf8', mode: opts?.mode ?? 0o644 });
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw new PersistenceError(filePath, { cause: err });
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
