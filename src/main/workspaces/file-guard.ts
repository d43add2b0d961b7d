/**
 * Write discipline shared by the workspace JSON stores:
 * - content is written to a temp file beside the target and renamed over it;
 * - writers serialize through a `<file>.lck` lock file;
 * - a version token (mtime + size) lets a writer detect that someone
 *   else changed the file between its read and its write.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { delay } from '../actions/cancellation';

export const MISSING_FILE_VERSION = 'missing';

const LOCK_RETRY_DELAY_MS = 25;
const LOCK_MAX_ATTEMPTS = 80;
const STALE_LOCK_MS = 10_000;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export async function readFileVersion(filePath: string): Promise<string> {
  try {
    const stat = await fs.promises.stat(filePath);
    return `${stat.mtimeMs}:${stat.size}`;
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') return MISSING_FILE_VERSION;
    throw e;
  }
}

/** Reads the file, or returns null when it does not exist. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') return null;
    throw e;
  }
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${crypto.randomUUID().replace(/-/g, '')}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, content, 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  } catch (e) {
    await fs.promises.rm(tempPath, { force: true });
    throw e;
  }
}

async function removeStaleLock(lockPath: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(lockPath);
    if (Date.now() - stat.mtimeMs > STALE_LOCK_MS) {
      console.warn(`[Workspaces] Removing stale lock ${lockPath}`);
      await fs.promises.rm(lockPath, { force: true });
    }
  } catch (e) {
    if (!isErrnoException(e) || e.code !== 'ENOENT') throw e;
  }
}

/**
 * Runs `work` while holding `<filePath>.lck`. The lock is always released,
 * including when `work` throws.
 */
export async function withWriteLock<T>(filePath: string, work: () => Promise<T>): Promise<T> {
  const lockPath = `${filePath}.lck`;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  for (let attempt = 1; ; attempt++) {
    try {
      const handle = await fs.promises.open(lockPath, 'wx');
      await handle.close();
      break;
    } catch (e) {
      if (!isErrnoException(e) || e.code !== 'EEXIST') throw e;
      if (attempt >= LOCK_MAX_ATTEMPTS) {
        throw new Error(`Timed out waiting for ${path.basename(lockPath)}`);
      }
      await removeStaleLock(lockPath);
      await delay(LOCK_RETRY_DELAY_MS);
    }
  }

  try {
    return await work();
  } finally {
    await fs.promises.rm(lockPath, { force: true });
  }
}
