/**
 * Reconcile recorded status with what is actually on disk.
 *
 * The state file records what the last action did; the filesystem is the
 * truth at use. A crash between a filesystem write and the state update,
 * or a manual change, is detected here so replaying a command is safe.
 */

import fs from 'fs';
import { isManagedSymlink } from '../publisher.js';
import { logger } from '../logger.js';
import type { FilePaths } from '../paths.js';
import type { FileRecord, PipelineStatus } from './types.js';

export interface DiskFacts {
  generated: boolean;
  staged: boolean;
  /** Target is a symlink to the staged file */
  linked: boolean;
}

export function inspectDisk(paths: FilePaths, target: string): DiskFacts {
  return {
    generated: fs.existsSync(paths.generated),
    staged: fs.existsSync(paths.staged),
    linked: isManagedSymlink(target, paths.staged),
  };
}

/**
 * Highest pipeline status the files on disk support
 */
export function statusFromDisk(facts: DiskFacts): PipelineStatus {
  if (facts.linked) return 'deployed';
  if (facts.staged && facts.generated) return 'staged';
  if (facts.generated) return 'generated';
  return 'unmanaged';
}

/**
 * Effective status of a file, logging when the record disagrees with disk
 */
export function reconcileStatus(src: string, record: FileRecord, facts: DiskFacts): PipelineStatus {
  const actual = statusFromDisk(facts);
  if (actual !== record.status) {
    logger.debug(`${src}: state records ${record.status} but disk shows ${actual}`);
  }
  return actual;
}
