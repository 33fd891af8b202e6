/**
 * Sync drift in the staged copy back into source files, hunk by hunk.
 *
 * The source is written at most once per file. Afterwards the generated
 * snapshot is refreshed to the staged content, so drift that was skipped is
 * not offered again.
 */

import { added, dim, header, removed, yellow } from '../colors.js';
import type { FileEntry } from '../config.js';
import { FsError, SyncConflictError } from '../errors.js';
import { logger } from '../logger.js';
import {
  resolveAll,
  runForFile,
  sha256,
  type FileOutcome,
  type PipelineContext,
} from '../pipeline/index.js';
import { fileMode, pathsFor, readIfExists, writeWithMode } from '../pipeline/files.js';
import type { EffectiveConfig } from '../resolver.js';
import { print } from '../ui/index.js';
import { computeHunks, splitLines } from './hunks.js';
import { allowedDecisions, classifyHunks, defaultDecision, mergeHunks } from './merge.js';
import type { HunkDecider, HunkDecision, HunkRequest } from './types.js';

export interface SyncFileOutcome extends FileOutcome {
  /** The source file was rewritten */
  sourceModified: boolean;
}

function stripNewline(line: string): string {
  return line.endsWith('\n') ? line.slice(0, -1) : line;
}

/**
 * Display lines for a hunk: header, context, removed and added lines
 */
export function formatHunk(request: HunkRequest): string[] {
  const { hunk } = request;
  const out = [
    header(
      `@@ ${request.src} hunk ${request.index}/${request.total} (line ${hunk.oldStart + 1}) [${request.classification}] @@`
    ),
  ];
  if (request.annotation) {
    out.push(yellow(request.annotation));
  }
  out.push(...hunk.contextBefore.map((l) => dim(` ${stripNewline(l)}`)));
  out.push(...hunk.oldLines.map((l) => removed(stripNewline(l))));
  out.push(...hunk.newLines.map((l) => added(stripNewline(l))));
  out.push(...hunk.contextAfter.map((l) => dim(` ${stripNewline(l)}`)));
  return out;
}

/**
 * Takes each hunk's default: clean hunks are applied, the rest skipped
 */
export const defaultHunkDecider: HunkDecider = {
  decide: async (request) =>
    request.defaultDecision === 'accept' ? { kind: 'accept' } : { kind: 'skip' },
};

export async function syncFile(
  ctx: PipelineContext,
  eff: EffectiveConfig,
  decider: HunkDecider
): Promise<SyncFileOutcome> {
  const { src } = eff;
  const paths = pathsFor(ctx, src);

  const staged = readIfExists(paths.staged);
  if (staged === undefined) {
    logger.info(`${src}: not staged, nothing to sync`);
    return { src, result: 'skipped', message: 'not staged', sourceModified: false };
  }
  const generated = readIfExists(paths.generated);
  if (generated === undefined) {
    throw new FsError(`Generated file not found: ${paths.generated} (run \`generate\` first)`, {
      path: paths.generated,
      operation: 'sync',
    });
  }
  const source = readIfExists(paths.source);
  if (source === undefined) {
    throw new FsError(`Source file not found: ${paths.source}`, {
      path: paths.source,
      operation: 'sync',
    });
  }

  if (staged.equals(generated)) {
    logger.debug(`${src}: no drift`);
    return { src, result: 'unchanged', sourceModified: false };
  }

  const generatedLines = splitLines(generated.toString('utf8'));
  const sourceLines = splitLines(source.toString('utf8'));
  const hunks = classifyHunks(
    sourceLines,
    generatedLines,
    computeHunks(generatedLines, splitLines(staged.toString('utf8'))),
    eff.template
  );

  const decisions: HunkDecision[] = [];
  for (const [i, classified] of hunks.entries()) {
    const allowed = allowedDecisions(classified);
    const request: HunkRequest = {
      src,
      index: i + 1,
      total: hunks.length,
      hunk: classified.hunk,
      classification: classified.classification,
      annotation: classified.annotation,
      allowAccept: allowed.accept,
      allowEdit: allowed.edit,
      defaultDecision: defaultDecision(classified.classification),
    };

    print('');
    for (const line of formatHunk(request)) {
      print(line);
    }

    if (ctx.dryRun) {
      print(dim(`[DRY RUN] Default: ${request.defaultDecision}`));
      decisions.push(await defaultHunkDecider.decide(request));
    } else {
      decisions.push(await decider.decide(request));
    }
  }

  const merged = mergeHunks(sourceLines, hunks, decisions);
  if (merged.unresolved.length > 0) {
    throw new SyncConflictError(
      `Unresolved conflicts in ${src} (hunk ${merged.unresolved.join(', ')}); edit the source by hand, then run \`generate\``,
      { src, hunks: merged.unresolved }
    );
  }

  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would apply ${merged.applied} of ${hunks.length} hunk(s) to ${paths.source}`);
    return { src, result: 'changed', sourceModified: false };
  }

  const sourceModified = merged.applied > 0;
  if (sourceModified) {
    writeWithMode(paths.source, merged.lines.join(''), fileMode(paths.source));
    logger.info(`Applied ${merged.applied} of ${hunks.length} hunk(s) to ${src}`);
  }

  writeWithMode(paths.generated, staged, fileMode(paths.generated));
  ctx.store.update(src, { drift: false, stagedDigest: sha256(staged) });
  return { src, result: 'changed', sourceModified };
}

export async function runSync(
  ctx: PipelineContext,
  entries: FileEntry[],
  decider: HunkDecider
): Promise<SyncFileOutcome[]> {
  const outcomes: SyncFileOutcome[] = [];
  for (const eff of resolveAll(ctx, entries)) {
    let sourceModified = false;
    const outcome = await runForFile(ctx, eff.src, 'sync', async () => {
      const result = await syncFile(ctx, eff, decider);
      sourceModified = result.sourceModified;
      return result;
    });
    outcomes.push({ ...outcome, sourceModified });
  }
  return outcomes;
}
