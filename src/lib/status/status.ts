/**
 * Per-file status: where each file sits in the pipeline and which stages
 * differ from the one before.
 */

import * as diff from 'diff';
import type { FileEntry } from '../config.js';
import { ConfigError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { pathsFor, readIfExists } from '../pipeline/files.js';
import { resolveAll, type PipelineContext } from '../pipeline/index.js';
import { isManagedSymlink } from '../publisher.js';
import { renderTemplate } from '../render.js';
import type { EffectiveConfig } from '../resolver.js';
import type { PipelineStatus } from '../state/index.js';
import { splitLines } from '../sync/hunks.js';

export interface FileStatus {
  src: string;
  deployed: boolean;
  detail: string;
  /** Status as recorded in the state file */
  recorded: PipelineStatus;
  drift: boolean;
  /** Changed lines between rendered source and generated output */
  sourceChanges: number;
  /** Changed lines between generated output and the staged copy */
  stagedChanges: number;
  filesets: string[];
}

export interface StatusFilters {
  onlyDiffs?: boolean;
  deployed?: boolean;
  undeployed?: boolean;
}

export interface FilesetSummary {
  name: string;
  files: number;
  lines: number;
}

/**
 * Lines added plus lines removed between two texts
 */
export function countChangedLines(before: string, after: string): number {
  let count = 0;
  for (const part of diff.diffArrays(splitLines(before), splitLines(after))) {
    if (part.added || part.removed) {
      count += part.value.length;
    }
  }
  return count;
}

export function hasDiffs(status: FileStatus): boolean {
  return status.sourceChanges > 0 || status.stagedChanges > 0;
}

/**
 * What generate would write now, or an error message
 */
async function expectedOutput(
  ctx: PipelineContext,
  eff: EffectiveConfig,
  source: Buffer
): Promise<{ text: string } | { error: string }> {
  if (!eff.template) {
    return { text: source.toString('utf8') };
  }
  try {
    const secrets = await ctx.secrets.resolve(eff.secretRefs);
    return { text: renderTemplate(source.toString('utf8'), { ...eff.variables, ...secrets }, eff.src) };
  } catch (error) {
    logger.debug(`${eff.src}: cannot render for status: ${errorMessage(error)}`);
    return { error: errorMessage(error) };
  }
}

export async function fileStatus(ctx: PipelineContext, eff: EffectiveConfig): Promise<FileStatus> {
  const paths = pathsFor(ctx, eff.src);
  const record = ctx.store.get(eff.src);
  const status: FileStatus = {
    src: eff.src,
    deployed: isManagedSymlink(eff.target, paths.staged),
    detail: '',
    recorded: record.status,
    drift: record.drift,
    sourceChanges: 0,
    stagedChanges: 0,
    filesets: eff.filesets,
  };

  const source = readIfExists(paths.source);
  if (source === undefined) {
    status.detail = 'source missing';
    return status;
  }
  const generated = readIfExists(paths.generated);
  if (generated === undefined) {
    status.detail = 'not yet generated';
    return status;
  }

  const diffs: string[] = [];
  const expected = await expectedOutput(ctx, eff, source);
  if ('error' in expected) {
    diffs.push(`cannot render (${expected.error})`);
  } else {
    status.sourceChanges = countChangedLines(expected.text, generated.toString('utf8'));
    if (status.sourceChanges > 0) diffs.push('source -> generated diff');
  }

  const staged = readIfExists(paths.staged);
  if (staged === undefined) {
    status.detail = diffs.length > 0 ? `${diffs.join(', ')}, not yet staged` : 'not yet staged';
    return status;
  }

  status.stagedChanges = countChangedLines(generated.toString('utf8'), staged.toString('utf8'));
  if (status.stagedChanges > 0) {
    diffs.push('generated -> staged diff');
    status.drift = true;
  }

  if (diffs.length > 0) {
    status.detail = diffs.join(', ');
  } else {
    status.detail = status.deployed ? 'up to date' : 'ready to deploy';
  }
  return status;
}

export async function collectStatus(
  ctx: PipelineContext,
  entries: FileEntry[],
  filters: StatusFilters = {}
): Promise<FileStatus[]> {
  if (filters.deployed && filters.undeployed) {
    throw new ConfigError('Cannot combine --deployed and --undeployed');
  }

  const statuses: FileStatus[] = [];
  for (const eff of resolveAll(ctx, entries)) {
    const status = await fileStatus(ctx, eff);
    if (filters.onlyDiffs && !hasDiffs(status)) continue;
    if (filters.deployed && !status.deployed) continue;
    if (filters.undeployed && status.deployed) continue;
    statuses.push(status);
  }
  return statuses;
}

/**
 * Filesets with changed files, by changed lines descending
 */
export function summarizeFilesets(filesetNames: string[], statuses: FileStatus[]): FilesetSummary[] {
  const summaries: FilesetSummary[] = [];
  for (const name of filesetNames) {
    const changed = statuses.filter((s) => s.filesets.includes(name) && hasDiffs(s));
    if (changed.length === 0) continue;
    summaries.push({
      name,
      files: changed.length,
      lines: changed.reduce((sum, s) => sum + s.sourceChanges + s.stagedChanges, 0),
    });
  }
  return summaries.sort((a, b) => b.lines - a.lines || a.name.localeCompare(b.name));
}
