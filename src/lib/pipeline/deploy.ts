/**
 * Deploy: link each target to its staged file
 */

import type { FileEntry } from '../config.js';
import { logger } from '../logger.js';
import { collapseTilde } from '../paths.js';
import { publishSymlink } from '../publisher.js';
import type { EffectiveConfig } from '../resolver.js';
import { assertTransition, withRecovery } from '../state/index.js';
import { currentStatus, pathsFor, recordStatus } from './files.js';
import { resolveAll } from './generate.js';
import { runForFile } from './outcome.js';
import type { DeployOptions, FileOutcome, PipelineContext } from './types.js';

export async function deployFile(
  ctx: PipelineContext,
  eff: EffectiveConfig,
  options: DeployOptions
): Promise<FileOutcome> {
  const { src } = eff;
  const paths = pathsFor(ctx, src);
  const to = assertTransition(src, currentStatus(ctx, src, eff.target), 'deploy');
  const target = collapseTilde(eff.target);

  const result = publishSymlink(eff.target, paths.staged, {
    atomic: ctx.loaded.config.atomicDeploy,
    force: options.force,
    dryRun: ctx.dryRun,
  });

  const instructions = [
    `Re-run \`dotloop deploy ${src}\` once the state file is writable; the existing link is kept`,
  ];
  if (result.backupPath) {
    instructions.push(`Your previous ${target} was saved as ${collapseTilde(result.backupPath)}`);
  }

  withRecovery(() => recordStatus(ctx, src, to, { target }), {
    situation: [`Linked ${target} -> ${paths.staged}`],
    consequence: [`The state file does not record ${src} as deployed`],
    instructions,
  });

  if (!result.changed) {
    logger.debug(`${src}: ${target} is already linked`);
    return { src, result: 'unchanged' };
  }
  if (!ctx.dryRun) {
    logger.info(`Deployed ${src} -> ${target}`);
  }
  return { src, result: 'changed' };
}

export async function runDeploy(
  ctx: PipelineContext,
  entries: FileEntry[],
  options: DeployOptions
): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  for (const eff of resolveAll(ctx, entries)) {
    outcomes.push(await runForFile(ctx, eff.src, 'deploy', () => deployFile(ctx, eff, options)));
  }
  return outcomes;
}
