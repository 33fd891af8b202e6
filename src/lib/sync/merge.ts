/**
 * Pure hunk classification and merge into source lines.
 *
 * Generated line numbers map to source line numbers 1:1 before any hunk is
 * applied. Each applied hunk shifts the range of every later hunk by the
 * number of lines it added or removed.
 */

import { hasTemplateSyntax } from '../render.js';
import { splitLines } from './hunks.js';
import type {
  ClassifiedHunk,
  HunkClass,
  HunkDecision,
  MergeResult,
  SyncHunk,
} from './types.js';

export const TEMPLATE_ANNOTATION = '(!) Template syntax: applying would replace template expressions';
export const CONFLICT_ANNOTATION = '(!) Source was independently edited';
export const LINE_COUNT_ANNOTATION =
  '(!) Template output changes the line count; lines cannot be mapped to the source';

function sameLines(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Source lines around the mapped range must still read as the generated
 * context. A source line carrying template syntax renders to something
 * else and is not compared.
 */
function contextMatches(source: string[], hunk: SyncHunk, template: boolean): boolean {
  const end = hunk.oldStart + hunk.oldLines.length;
  const before = source.slice(hunk.oldStart - hunk.contextBefore.length, hunk.oldStart);
  const after = source.slice(end, end + hunk.contextAfter.length);
  const matches = (actual: string[], expected: string[]): boolean =>
    actual.length === expected.length &&
    actual.every((line, i) => line === expected[i] || (template && hasTemplateSyntax(line)));
  return matches(before, hunk.contextBefore) && matches(after, hunk.contextAfter);
}

/**
 * A plain file is copied to generated verbatim, so any difference between
 * the two means the source was edited since the last generate and every
 * hunk is a conflict.
 */
export function classifyHunks(
  source: string[],
  generated: string[],
  hunks: SyncHunk[],
  template: boolean
): ClassifiedHunk[] {
  const lineCountDiffers = template && source.length !== generated.length;
  const plainSourceEdited = !template && !sameLines(source, generated);

  return hunks.map((hunk) => {
    const sourceLines = source.slice(hunk.oldStart, hunk.oldStart + hunk.oldLines.length);
    if (lineCountDiffers) {
      return { hunk, classification: 'conflict', annotation: LINE_COUNT_ANNOTATION, sourceLines };
    }
    if (plainSourceEdited || !contextMatches(source, hunk, template)) {
      return { hunk, classification: 'conflict', annotation: CONFLICT_ANNOTATION, sourceLines };
    }
    if (template && sourceLines.some(hasTemplateSyntax)) {
      return { hunk, classification: 'template', annotation: TEMPLATE_ANNOTATION, sourceLines };
    }
    if (!sameLines(sourceLines, hunk.oldLines)) {
      return { hunk, classification: 'conflict', annotation: CONFLICT_ANNOTATION, sourceLines };
    }
    return { hunk, classification: 'clean', sourceLines };
  });
}

export function defaultDecision(classification: HunkClass): HunkDecision['kind'] {
  return classification === 'clean' ? 'accept' : 'skip';
}

/**
 * Conflicts are never applied from the staged side. A conflict whose lines
 * could not be mapped can only be skipped.
 */
export function allowedDecisions(hunk: ClassifiedHunk): { accept: boolean; edit: boolean } {
  return {
    accept: hunk.classification !== 'conflict',
    edit: hunk.annotation !== LINE_COUNT_ANNOTATION,
  };
}

/**
 * Text supplied by an edit, as lines. A trailing newline is added when the
 * replaced range ended with one.
 */
export function editLines(text: string, replaced: string[]): string[] {
  const endsWithNewline = replaced.length === 0 || replaced[replaced.length - 1].endsWith('\n');
  const normalized = endsWithNewline && text !== '' && !text.endsWith('\n') ? `${text}\n` : text;
  return splitLines(normalized);
}

/**
 * Apply decisions to source lines. Decisions a hunk does not allow count
 * as skips; a skipped conflict is reported as unresolved.
 */
export function mergeHunks(
  source: string[],
  hunks: ClassifiedHunk[],
  decisions: HunkDecision[]
): MergeResult {
  const lines = [...source];
  const unresolved: number[] = [];
  let applied = 0;
  let offset = 0;

  hunks.forEach((classified, i) => {
    const decision: HunkDecision = decisions[i] ?? { kind: 'skip' };
    const allowed = allowedDecisions(classified);

    let replacement: string[] | undefined;
    if (decision.kind === 'accept' && allowed.accept) {
      replacement = classified.hunk.newLines;
    } else if (decision.kind === 'edit' && allowed.edit) {
      replacement = editLines(decision.text, classified.sourceLines);
    }

    if (!replacement) {
      if (classified.classification === 'conflict') {
        unresolved.push(i + 1);
      }
      return;
    }

    const start = classified.hunk.oldStart + offset;
    lines.splice(start, classified.hunk.oldLines.length, ...replacement);
    offset += replacement.length - classified.hunk.oldLines.length;
    applied++;
  });

  return { lines, applied, unresolved };
}
