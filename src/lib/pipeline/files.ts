/**
 * Filesystem helpers shared by the pipeline stages
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import writeFileAtomic from 'write-file-atomic';
import { FsError, errorMessage } from '../errors.js';
import { filePaths, type FilePaths } from '../paths.js';
import { inspectDisk, reconcileStatus, type PipelineStatus } from '../state/index.js';
import type { PipelineContext } from './types.js';

export function sha256(content: Buffer | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export function readIfExists(p: string): Buffer | undefined {
  try {
    return fs.readFileSync(p);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new FsError(`Failed to read ${p}: ${errorMessage(error)}`, { path: p, operation: 'read' });
  }
}

export function fileMode(p: string): number {
  try {
    return fs.statSync(p).mode & 0o7777;
  } catch (error) {
    throw new FsError(`Failed to stat ${p}: ${errorMessage(error)}`, { path: p, operation: 'stat' });
  }
}

/**
 * Atomically write content with the given mode, creating parent directories
 */
export function writeWithMode(p: string, content: Buffer | string, mode: number): void {
  try {
    fs.mkdirSync(path.dirname(p), { recursive: true });
    writeFileAtomic.sync(p, content, { mode });
    // a mode passed at creation is still masked by the umask
    fs.chmodSync(p, mode);
  } catch (error) {
    throw new FsError(`Failed to write ${p}: ${errorMessage(error)}`, { path: p, operation: 'write' });
  }
}

/**
 * Whether p already holds exactly this content and mode
 */
export function isUpToDate(p: string, content: Buffer, mode: number): boolean {
  const existing = readIfExists(p);
  return existing !== undefined && existing.equals(content) && fileMode(p) === mode;
}

export function pathsFor(ctx: PipelineContext, src: string): FilePaths {
  return filePaths(ctx.loaded.layout, src);
}

/**
 * Status of a file as the next action should see it
 */
export function currentStatus(ctx: PipelineContext, src: string, target: string): PipelineStatus {
  const simulated = ctx.simulated.get(src);
  if (simulated !== undefined) {
    return simulated;
  }
  return reconcileStatus(src, ctx.store.get(src), inspectDisk(pathsFor(ctx, src), target));
}

/**
 * Record a status reached by this run. In a dry run only the simulation
 * advances; otherwise the state store is updated immediately.
 */
export function recordStatus(
  ctx: PipelineContext,
  src: string,
  status: PipelineStatus,
  changes: { target?: string; drift?: boolean; stagedDigest?: string } = {}
): void {
  if (ctx.dryRun) {
    ctx.simulated.set(src, status);
    return;
  }
  ctx.store.update(src, { ...changes, status });
}

/**
 * Regular files under dir, as paths relative to it
 */
export function listFiles(dir: string): string[] {
  const out: string[] = [];
  const walk = (current: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(current, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else {
        out.push(path.relative(dir, full));
      }
    }
  };
  walk(dir);
  return out.sort();
}

/**
 * Remove empty directories from start upwards, stopping below stopAt
 */
export function pruneEmptyDirs(start: string, stopAt: string): void {
  let current = start;
  while (current !== stopAt && current.startsWith(stopAt + path.sep)) {
    try {
      if (fs.readdirSync(current).length > 0) return;
      fs.rmdirSync(current);
    } catch {
      return;
    }
    current = path.dirname(current);
  }
}
