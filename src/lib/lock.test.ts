import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { acquireLock, readLockOwner, withLock } from './lock.js';
import { LockError } from './errors.js';

describe('lock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dotloop-lock-test-'));
    lockPath = path.join(tempDir, '.dotloop.lock');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the owner PID and remove the lock on release', async () => {
    const release = await acquireLock(lockPath);
    expect(readLockOwner(lockPath)).toBe(process.pid);

    release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should fail when a live process holds the lock', async () => {
    const release = await acquireLock(lockPath);

    await expect(acquireLock(lockPath, { timeoutMs: 0 })).rejects.toThrow(LockError);
    await expect(acquireLock(lockPath, { timeoutMs: 0 })).rejects.toThrow(
      `Another dotloop process (PID: ${process.pid}) may be running.`
    );

    release();
  });

  it('should replace a stale lock', async () => {
    // PIDs are capped well below this value on Linux
    fs.writeFileSync(lockPath, '99999999\n');

    const release = await acquireLock(lockPath, { timeoutMs: 0 });
    expect(readLockOwner(lockPath)).toBe(process.pid);
    release();
  });

  it('should retry until the lock is released', async () => {
    const release = await acquireLock(lockPath);
    setTimeout(release, 30);

    const second = await acquireLock(lockPath, { timeoutMs: 2000, retryMs: 10 });
    expect(readLockOwner(lockPath)).toBe(process.pid);
    second();
  });

  it('should release after the callback rejects', async () => {
    await expect(
      withLock(lockPath, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should return the callback result', async () => {
    await expect(withLock(lockPath, async () => 'done')).resolves.toBe('done');
  });

  it('should ignore garbage in the lock file', () => {
    fs.writeFileSync(lockPath, 'not-a-pid');
    expect(readLockOwner(lockPath)).toBeUndefined();
  });
});
