import { writeFile, readFile, unlink, stat, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getErrorCode } from '../errors.js';
import { logger } from './logger.js';

const STALE_THRESHOLD_MS = 2 * 60 * 1000; // 2 minutes
const POLL_INTERVAL_MS = 1000; // 1 second
const MAX_WAIT_MS = 30 * 1000; // 30 seconds

const lockDataSchema = z.object({
  pid: z.number(),
  acquiredAt: z.string(),
});

type LockData = z.infer<typeof lockDataSchema>;

export interface LockOptions {
  maxWaitMs?: number;
  pollIntervalMs?: number;
  staleThresholdMs?: number;
}

/**
 * Acquire an exclusive lock file using `wx` (exclusive create) flag.
 * If the lock already exists, check if it's stale. If stale, remove and retry.
 * Otherwise, poll until the deadline.
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<void> {
  const maxWaitMs = options.maxWaitMs ?? MAX_WAIT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  const staleThresholdMs = options.staleThresholdMs ?? STALE_THRESHOLD_MS;

  const lockData: LockData = {
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
  };

  await mkdir(dirname(lockPath), { recursive: true });
  const deadline = Date.now() + maxWaitMs;

  while (true) {
    try {
      await writeFile(lockPath, JSON.stringify(lockData), { flag: 'wx' });
      return; // lock acquired
    } catch (err: unknown) {
      if (getErrorCode(err) !== 'EEXIST') throw err;

      // Lock file exists, check if stale
      const isStale = await checkStale(lockPath, staleThresholdMs);
      if (isStale) {
        try {
          await unlink(lockPath);
          logger.debug('Removed stale lock file, retrying...');
          continue; // retry immediately
        } catch {
          // Another process may have removed it already
        }
      }

      if (Date.now() >= deadline) {
        throw new Error(
          `Could not acquire lock at ${lockPath} after ${maxWaitMs / 1000}s. ` +
          'Another sync may be running against this vault. Remove the lock file manually if this is an error.',
        );
      }

      await sleep(pollIntervalMs);
    }
  }
}

/**
 * Release the lock file.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err: unknown) {
    if (getErrorCode(err) !== 'ENOENT') throw err;
    // Already removed
  }
}

/**
 * Execute `fn` while holding an exclusive lock.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>, options?: LockOptions): Promise<T> {
  await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}

async function checkStale(lockPath: string, staleThresholdMs: number): Promise<boolean> {
  try {
    const content = await readFile(lockPath, 'utf-8');
    const data = lockDataSchema.parse(JSON.parse(content));
    const age = Date.now() - new Date(data.acquiredAt).getTime();
    return age > staleThresholdMs;
  } catch {
    // If we can't read/parse, check file mtime as fallback
    try {
      const st = await stat(lockPath);
      const age = Date.now() - st.mtimeMs;
      return age > staleThresholdMs;
    } catch {
      return true; // Can't stat either, treat as stale
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
