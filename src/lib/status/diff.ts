import * as diff from 'diff';
import type { FileEntry } from '../config.js';
import { DIFF_CONTEXT_LINES } from '../constants.js';
import { pathsFor, readIfExists } from '../pipeline/files.js';
import type { PipelineContext } from '../pipeline/index.js';

export type FileDiff =
  | { src: string; kind: 'patch'; patch: string }
  | { src: string; kind: 'missing'; missing: 'generated' | 'staged' };

/**
 * Unified diffs from generated to staged for every file with drift.
 * Files without drift are left out.
 */
export function collectDiffs(ctx: PipelineContext, entries: FileEntry[]): FileDiff[] {
  const diffs: FileDiff[] = [];
  for (const entry of entries) {
    const paths = pathsFor(ctx, entry.src);
    const generated = readIfExists(paths.generated);
    if (generated === undefined) {
      diffs.push({ src: entry.src, kind: 'missing', missing: 'generated' });
      continue;
    }
    const staged = readIfExists(paths.staged);
    if (staged === undefined) {
      diffs.push({ src: entry.src, kind: 'missing', missing: 'staged' });
      continue;
    }
    if (generated.equals(staged)) {
      continue;
    }
    const patch = diff.createTwoFilesPatch(
      `generated/${entry.src}`,
      `staged/${entry.src}`,
      generated.toString('utf8'),
      staged.toString('utf8'),
      undefined,
      undefined,
      { context: DIFF_CONTEXT_LINES }
    );
    diffs.push({ src: entry.src, kind: 'patch', patch });
  }
  return diffs;
}
