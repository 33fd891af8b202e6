/**
 * Generate: render or copy each source into `.generated/`
 */

import type { FileEntry } from '../config.js';
import { FsError, SecretConflictError } from '../errors.js';
import { logger } from '../logger.js';
import { renderTemplate } from '../render.js';
import { collectCollisions, resolveEffectiveConfig, type EffectiveConfig } from '../resolver.js';
import { assertTransition } from '../state/index.js';
import {
  currentStatus,
  fileMode,
  isUpToDate,
  pathsFor,
  readIfExists,
  recordStatus,
  writeWithMode,
} from './files.js';
import { runForFile } from './outcome.js';
import type { FileOutcome, PipelineContext } from './types.js';

export function resolveAll(ctx: PipelineContext, entries: FileEntry[]): EffectiveConfig[] {
  return entries.map((entry) => resolveEffectiveConfig(ctx.loaded, entry));
}

/**
 * Fail the whole run when any variable name is also a secret name
 */
export function preflightCollisions(effective: EffectiveConfig[]): void {
  const names = collectCollisions(effective);
  if (names.length > 0) {
    throw new SecretConflictError(names);
  }
}

export async function generateFile(ctx: PipelineContext, eff: EffectiveConfig): Promise<FileOutcome> {
  const paths = pathsFor(ctx, eff.src);
  const source = readIfExists(paths.source);
  if (source === undefined) {
    throw new FsError(`Source file not found: ${paths.source}`, {
      path: paths.source,
      operation: 'generate',
    });
  }

  const to = assertTransition(eff.src, currentStatus(ctx, eff.src, eff.target), 'generate');
  const mode = fileMode(paths.source);

  let content = source;
  if (eff.template) {
    const secrets = await ctx.secrets.resolve(eff.secretRefs);
    const rendered = renderTemplate(source.toString('utf8'), { ...eff.variables, ...secrets }, eff.src);
    content = Buffer.from(rendered, 'utf8');
  }

  if (isUpToDate(paths.generated, content, mode)) {
    logger.debug(`${eff.src}: generated output is up to date`);
    recordStatus(ctx, eff.src, to);
    return { src: eff.src, result: 'unchanged' };
  }

  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would generate ${paths.generated}`);
  } else {
    writeWithMode(paths.generated, content, mode);
    logger.info(`Generated ${eff.src}`);
  }
  recordStatus(ctx, eff.src, to);
  return { src: eff.src, result: 'changed' };
}

export async function runGenerate(ctx: PipelineContext, entries: FileEntry[]): Promise<FileOutcome[]> {
  const effective = resolveAll(ctx, entries);
  preflightCollisions(effective);

  const outcomes: FileOutcome[] = [];
  for (const eff of effective) {
    outcomes.push(await runForFile(ctx, eff.src, 'generate', () => generateFile(ctx, eff)));
  }
  return outcomes;
}

