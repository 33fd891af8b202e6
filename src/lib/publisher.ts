/**
 * Atomic Publisher
 *
 * Links a staged file to its target and reverses it. In atomic mode the
 * new link is created beside the target and renamed over it, so the target
 * path is never observed missing: only old link, then new link.
 */

import fs from 'fs';
import path from 'path';
import { BACKUP_SUFFIX, TEMP_SUFFIX } from './constants.js';
import { FsError, errorMessage } from './errors.js';
import { collapseTilde } from './paths.js';
import { logger } from './logger.js';

export interface PublishOptions {
  /** Temp-link + rename swap instead of remove + link */
  atomic: boolean;
  /** Replace a foreign target without keeping a backup */
  force: boolean;
  dryRun: boolean;
}

export interface PublishResult {
  /** False when the target already pointed at the staged file */
  changed: boolean;
  /** Where a foreign target was moved aside */
  backupPath?: string;
}

export interface UnpublishOptions {
  /** Delete the link instead of leaving a plain copy */
  removeFile: boolean;
  dryRun: boolean;
}

function lstatOrUndefined(p: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(p);
  } catch {
    return undefined;
  }
}

/**
 * Whether target is a symlink whose destination is the staged file
 */
export function isManagedSymlink(target: string, stagedPath: string): boolean {
  const stats = lstatOrUndefined(target);
  if (!stats?.isSymbolicLink()) {
    return false;
  }
  try {
    const link = fs.readlinkSync(target);
    return path.resolve(path.dirname(target), link) === path.resolve(stagedPath);
  } catch {
    return false;
  }
}

/**
 * First free backup path for a target
 */
export function backupPathFor(target: string): string {
  let candidate = `${target}${BACKUP_SUFFIX}`;
  for (let i = 1; lstatOrUndefined(candidate); i++) {
    candidate = `${target}${BACKUP_SUFFIX}.${i}`;
  }
  return candidate;
}

function fsStep<T>(operation: string, p: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new FsError(`Failed to ${operation} ${p}: ${errorMessage(error)}`, {
      path: p,
      operation,
    });
  }
}

/**
 * Copy a foreign target aside without removing it
 */
function copyAside(target: string, stats: fs.Stats): string {
  const backup = backupPathFor(target);
  if (stats.isSymbolicLink()) {
    const link = fsStep('read link', target, () => fs.readlinkSync(target));
    fsStep('back up', target, () => fs.symlinkSync(link, backup));
  } else {
    fsStep('back up', target, () => fs.copyFileSync(target, backup));
    fsStep('back up', target, () => fs.chmodSync(backup, stats.mode & 0o7777));
  }
  return backup;
}

/**
 * Symlink target -> stagedPath.
 */
export function publishSymlink(
  target: string,
  stagedPath: string,
  options: PublishOptions
): PublishResult {
  if (isManagedSymlink(target, stagedPath)) {
    logger.debug(`${collapseTilde(target)} already links to ${stagedPath}`);
    return { changed: false };
  }

  const existing = lstatOrUndefined(target);
  if (existing?.isDirectory()) {
    throw new FsError(`Target is a directory: ${target}`, { path: target, operation: 'deploy' });
  }

  if (options.dryRun) {
    if (existing && !options.force) {
      logger.info(`[DRY RUN] Would back up ${collapseTilde(target)} to ${backupPathFor(target)}`);
    }
    logger.info(`[DRY RUN] Would link ${collapseTilde(target)} -> ${stagedPath}`);
    return { changed: true };
  }

  fsStep('create directory', path.dirname(target), () =>
    fs.mkdirSync(path.dirname(target), { recursive: true })
  );

  let backupPath: string | undefined;

  if (options.atomic) {
    if (existing && !options.force) {
      backupPath = copyAside(target, existing);
    }
    const temp = `${target}${TEMP_SUFFIX}`;
    fsStep('remove stale temp link', temp, () => fs.rmSync(temp, { force: true }));
    fsStep('create symlink', temp, () => fs.symlinkSync(stagedPath, temp));
    try {
      fs.renameSync(temp, target);
    } catch (error) {
      fs.rmSync(temp, { force: true });
      throw new FsError(`Failed to replace ${target}: ${errorMessage(error)}`, {
        path: target,
        operation: 'rename',
      });
    }
  } else {
    if (existing) {
      if (options.force) {
        fsStep('remove', target, () => fs.unlinkSync(target));
      } else {
        backupPath = backupPathFor(target);
        const dest = backupPath;
        fsStep('back up', target, () => fs.renameSync(target, dest));
      }
    }
    fsStep('create symlink', target, () => fs.symlinkSync(stagedPath, target));
  }

  if (backupPath) {
    logger.info(`Backed up ${collapseTilde(target)} to ${collapseTilde(backupPath)}`);
  }
  return { changed: true, backupPath };
}

/**
 * Replace the link at target with a plain copy of its content,
 * or delete it when removeFile is set.
 */
export function unpublishSymlink(target: string, options: UnpublishOptions): void {
  if (options.dryRun) {
    const verb = options.removeFile ? 'remove' : 'replace with a plain copy:';
    logger.info(`[DRY RUN] Would ${verb} ${collapseTilde(target)}`);
    return;
  }

  if (options.removeFile) {
    fsStep('remove', target, () => fs.unlinkSync(target));
    return;
  }

  const content = fsStep('read', target, () => fs.readFileSync(target));
  const mode = fsStep('stat', target, () => fs.statSync(target).mode & 0o7777);
  const temp = `${target}${TEMP_SUFFIX}`;
  fsStep('write', temp, () => fs.writeFileSync(temp, content, { mode }));
  fsStep('chmod', temp, () => fs.chmodSync(temp, mode));
  try {
    fs.renameSync(temp, target);
  } catch (error) {
    fs.rmSync(temp, { force: true });
    throw new FsError(`Failed to replace ${target}: ${errorMessage(error)}`, {
      path: target,
      operation: 'rename',
    });
  }
}
