import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError, errorMessage } from './errors.js';
import { logWarn } from './fault-logger.js';

export const LOCK_FILE = 'mailrecall.lock';
const LOCK_RETRY_MS = 100; // Retry every 100ms
const LOCK_WAIT_MS = 30000; // 30 seconds total wait time

const LockInfoSchema = z.object({
  pid: z.number().int(),
  timestamp: z.number(),
  operation: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface LockOptions {
  /** Give up after this long; default 30 s */
  waitMs?: number;
  retryMs?: number;
}

export function getLockPath(dir: string): string {
  return path.join(dir, LOCK_FILE);
}

/**
 * Check if a process is still running
 */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * A lock is stale only when its holder has exited. A live holder keeps the
 * lock however long its run takes.
 */
export function isLockStale(lockInfo: LockInfo): boolean {
  return !isProcessAlive(lockInfo.pid);
}

/** Lock file contents; null when missing or unreadable. */
function readLock(lockPath: string): LockInfo | null {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
  } catch {
    return null;
  }
  const parsed = LockInfoSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Acquire the data directory lock.
 * Returns a release function to call when done
 */
export async function acquireLock(
  dir: string,
  operation: string,
  options: LockOptions = {}
): Promise<() => void> {
  const waitMs = options.waitMs ?? LOCK_WAIT_MS;
  const retryMs = options.retryMs ?? LOCK_RETRY_MS;
  const lockPath = getLockPath(dir);
  const deadline = Date.now() + waitMs;

  fs.mkdirSync(dir, { recursive: true });

  for (;;) {
    if (fs.existsSync(lockPath)) {
      const existing = readLock(lockPath);
      // Unreadable lock files count as stale
      if (!existing || isLockStale(existing)) {
        fs.rmSync(lockPath, { force: true });
      }
    }

    try {
      // 'wx': exclusive create, fails if the file exists
      const info: LockInfo = { pid: process.pid, timestamp: Date.now(), operation };
      fs.writeFileSync(lockPath, JSON.stringify(info), { flag: 'wx' });
      return () => releaseLock(lockPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
    }

    if (Date.now() >= deadline) {
      const holder = readLock(lockPath);
      throw new StorageError(
        `Could not acquire lock for ${operation} after ${waitMs / 1000}s` +
          (holder ? ` (held by pid ${holder.pid} for ${holder.operation})` : ''),
        { lockPath, holder: holder ?? undefined }
      );
    }
    await sleep(retryMs);
  }
}

function releaseLock(lockPath: string): void {
  try {
    // Only remove if it's our lock
    const current = readLock(lockPath);
    if (current && current.pid === process.pid) {
      fs.unlinkSync(lockPath);
    }
  } catch (err) {
    logWarn('lock', 'Could not release lock', { lockPath, error: errorMessage(err) });
  }
}

/**
 * Execute a function with lock protection
 */
export async function withLock<T>(
  dir: string,
  operation: string,
  fn: () => Promise<T>,
  options?: LockOptions
): Promise<T> {
  const release = await acquireLock(dir, operation, options);
  try {
    return await fn();
  } finally {
    release();
  }
}

/**
 * Check if lock is currently held (for status display)
 */
export function getLockStatus(dir: string): { locked: boolean; info?: LockInfo } {
  const info = readLock(getLockPath(dir));
  if (!info) return { locked: false };
  return { locked: !isLockStale(info), info };
}
