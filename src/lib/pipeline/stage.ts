/**
 * Stage: copy generated output into `.staged/`, the symlink's backing file.
 *
 * A staged copy whose digest no longer matches what was last staged has
 * been edited through the deployed link. It is only overwritten after an
 * explicit confirmation.
 */

import type { FileEntry } from '../config.js';
import { FsError } from '../errors.js';
import { logger } from '../logger.js';
import type { EffectiveConfig } from '../resolver.js';
import { assertTransition } from '../state/index.js';
import {
  currentStatus,
  fileMode,
  pathsFor,
  readIfExists,
  recordStatus,
  sha256,
  writeWithMode,
} from './files.js';
import { resolveAll } from './generate.js';
import { runForFile } from './outcome.js';
import type { FileOutcome, PipelineContext } from './types.js';

export const DRIFT_SKIP_MESSAGE = 'staged copy has drifted; run `sync` first';

export async function stageFile(ctx: PipelineContext, eff: EffectiveConfig): Promise<FileOutcome> {
  const { src } = eff;
  const paths = pathsFor(ctx, src);
  const generated = readIfExists(paths.generated);

  if (generated === undefined) {
    if (ctx.dryRun && ctx.simulated.has(src)) {
      const to = assertTransition(src, currentStatus(ctx, src, eff.target), 'stage');
      logger.info(`[DRY RUN] Would stage ${paths.staged}`);
      recordStatus(ctx, src, to);
      return { src, result: 'changed' };
    }
    throw new FsError(`Generated file not found: ${paths.generated} (run \`generate\` first)`, {
      path: paths.generated,
      operation: 'stage',
    });
  }

  const to = assertTransition(src, currentStatus(ctx, src, eff.target), 'stage');
  const digest = sha256(generated);
  const staged = readIfExists(paths.staged);

  if (staged !== undefined && staged.equals(generated)) {
    logger.debug(`${src}: staged copy is up to date`);
    recordStatus(ctx, src, to, { drift: false, stagedDigest: digest });
    return { src, result: 'unchanged' };
  }

  if (staged !== undefined && sha256(staged) !== ctx.store.get(src).stagedDigest) {
    logger.warn(`${src}: staged copy has drifted from the last staged content`);
    if (ctx.dryRun) {
      logger.info(`[DRY RUN] Would ask before overwriting the drifted ${paths.staged}`);
    } else {
      ctx.store.update(src, { drift: true });
      if (!(await ctx.prompter.confirmOverwrite(src))) {
        return { src, result: 'skipped', message: DRIFT_SKIP_MESSAGE };
      }
    }
  }

  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would stage ${paths.staged}`);
    recordStatus(ctx, src, to);
    return { src, result: 'changed' };
  }

  writeWithMode(paths.staged, generated, fileMode(paths.generated));
  logger.info(`Staged ${src}`);
  recordStatus(ctx, src, to, { drift: false, stagedDigest: digest });
  return { src, result: 'changed' };
}

export async function runStage(ctx: PipelineContext, entries: FileEntry[]): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  for (const eff of resolveAll(ctx, entries)) {
    outcomes.push(await runForFile(ctx, eff.src, 'stage', () => stageFile(ctx, eff)));
  }
  return outcomes;
}
