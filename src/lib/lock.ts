/**
 * Process lock for mutating commands.
 *
 * The lock is a file created with O_EXCL holding the owner's PID. A lock
 * whose owner is no longer running is treated as stale and replaced.
 */

import fs from 'fs';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { LOCK_RETRY_INTERVAL_MS, LOCK_TIMEOUT_MS } from './constants.js';
import { LockError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface LockOptions {
  timeoutMs?: number;
  retryMs?: number;
}

export type ReleaseLock = () => void;

export function readLockOwner(lockPath: string): number | undefined {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  } catch {
    return undefined;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function tryLock(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx');
    fs.writeSync(fd, `${process.pid}\n`);
    fs.closeSync(fd);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw new LockError(`Failed to create lock ${lockPath}: ${errorMessage(error)}`, { lockPath });
  }
}

/**
 * Acquire the lock, retrying until the timeout elapses.
 * A timeout of zero fails immediately when the lock is held.
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<ReleaseLock> {
  const timeoutMs = options.timeoutMs ?? LOCK_TIMEOUT_MS;
  const retryMs = options.retryMs ?? LOCK_RETRY_INTERVAL_MS;
  const start = Date.now();

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  for (;;) {
    if (tryLock(lockPath)) {
      logger.debug(`Acquired lock at ${lockPath}`);
      return () => {
        if (readLockOwner(lockPath) === process.pid) {
          fs.rmSync(lockPath, { force: true });
          logger.debug(`Released lock at ${lockPath}`);
        }
      };
    }

    const owner = readLockOwner(lockPath);
    if (owner !== undefined && owner !== process.pid && !isProcessAlive(owner)) {
      logger.debug(`Removing stale lock at ${lockPath} (PID ${owner} is not running)`);
      fs.rmSync(lockPath, { force: true });
      continue;
    }

    const elapsed = Date.now() - start;
    if (elapsed >= timeoutMs) {
      const who =
        owner !== undefined
          ? `Another dotloop process (PID: ${owner}) may be running.`
          : 'Another dotloop process may be running.';
      throw new LockError(
        `Could not acquire lock at ${lockPath} within ${Math.round(timeoutMs / 1000)}s.\n${who}\n` +
          'If no other process is running, delete the lock file and retry.',
        { lockPath, ownerPid: owner }
      );
    }

    logger.trace(`Lock busy, retrying (${elapsed}ms / ${timeoutMs}ms)`);
    await sleep(retryMs);
  }
}

/**
 * Run fn while holding the lock
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const release = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    release();
  }
}
