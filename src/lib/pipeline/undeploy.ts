/**
 * Undeploy: turn managed links back into plain files, or remove them
 */

import type { FileEntry } from '../config.js';
import { logger } from '../logger.js';
import { collapseTilde } from '../paths.js';
import { isManagedSymlink, unpublishSymlink } from '../publisher.js';
import type { EffectiveConfig } from '../resolver.js';
import { assertTransition } from '../state/index.js';
import { currentStatus, pathsFor, recordStatus } from './files.js';
import { resolveAll } from './generate.js';
import { runForFile } from './outcome.js';
import type { FileOutcome, PipelineContext, UndeployOptions } from './types.js';

export async function undeployFile(
  ctx: PipelineContext,
  eff: EffectiveConfig,
  options: UndeployOptions
): Promise<FileOutcome> {
  const { src } = eff;
  const paths = pathsFor(ctx, src);
  const target = collapseTilde(eff.target);

  if (!isManagedSymlink(eff.target, paths.staged)) {
    logger.info(`${src}: ${target} is not a managed symlink, skipping`);
    return { src, result: 'skipped', message: 'not deployed' };
  }

  const to = assertTransition(src, currentStatus(ctx, src, eff.target), 'undeploy');
  unpublishSymlink(eff.target, { removeFile: options.removeFile, dryRun: ctx.dryRun });
  recordStatus(ctx, src, to, { target: undefined });

  if (!ctx.dryRun) {
    logger.info(options.removeFile ? `Removed ${target}` : `Undeployed ${src}, ${target} is now a plain file`);
  }
  return { src, result: 'changed' };
}

export async function runUndeploy(
  ctx: PipelineContext,
  entries: FileEntry[],
  options: UndeployOptions
): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  for (const eff of resolveAll(ctx, entries)) {
    outcomes.push(await runForFile(ctx, eff.src, 'undeploy', () => undeployFile(ctx, eff, options)));
  }
  return outcomes;
}
