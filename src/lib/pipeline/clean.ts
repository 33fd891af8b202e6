/**
 * Clean: remove generated output and orphaned stage files
 */

import fs from 'fs';
import path from 'path';
import { ConfigError, FsError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { assertTransition } from '../state/index.js';
import { listFiles, pruneEmptyDirs } from './files.js';
import type { CleanOptions, PipelineContext } from './types.js';

export interface CleanResult {
  /** Absolute paths removed (or that would be, in a dry run) */
  removed: string[];
  /** Sources whose record regressed to unmanaged */
  regressed: string[];
}

function removePath(ctx: PipelineContext, p: string, result: CleanResult): void {
  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would remove ${p}`);
  } else {
    try {
      fs.rmSync(p, { recursive: true, force: true });
    } catch (error) {
      throw new FsError(`Failed to remove ${p}: ${errorMessage(error)}`, { path: p, operation: 'clean' });
    }
    logger.debug(`Removed ${p}`);
  }
  result.removed.push(p);
}

/**
 * Regress a record whose generated output is gone
 */
function regress(ctx: PipelineContext, src: string, result: CleanResult): void {
  const record = ctx.store.get(src);
  if (record.status !== 'generated' && record.status !== 'staged') {
    return;
  }
  const to = assertTransition(src, record.status, 'clean');
  if (!ctx.dryRun) {
    ctx.store.update(src, { status: to });
  }
  result.regressed.push(src);
}

export function runClean(ctx: PipelineContext, options: CleanOptions): CleanResult {
  if (!options.generated && !options.orphans) {
    throw new ConfigError('Specify --generated, --orphans, or both');
  }

  const { layout, config } = ctx.loaded;
  const result: CleanResult = { removed: [], regressed: [] };

  if (options.generated) {
    if (fs.existsSync(layout.generatedDir)) {
      removePath(ctx, layout.generatedDir, result);
    }
    for (const src of ctx.store.sources()) {
      regress(ctx, src, result);
    }
  }

  if (options.orphans) {
    const configured = new Set(config.files.map((f) => f.src));

    if (!options.generated) {
      for (const src of listFiles(layout.generatedDir)) {
        if (configured.has(src)) continue;
        const p = path.join(layout.generatedDir, src);
        removePath(ctx, p, result);
        if (!ctx.dryRun) pruneEmptyDirs(path.dirname(p), layout.generatedDir);
        regress(ctx, src, result);
      }
    }

    for (const src of listFiles(layout.stagedDir)) {
      if (configured.has(src)) continue;
      if (ctx.store.get(src).status === 'deployed') {
        logger.warn(`Keeping orphaned ${src}: it is still recorded as deployed`);
        continue;
      }
      const p = path.join(layout.stagedDir, src);
      removePath(ctx, p, result);
      if (!ctx.dryRun) pruneEmptyDirs(path.dirname(p), layout.stagedDir);
    }
  }

  return result;
}
