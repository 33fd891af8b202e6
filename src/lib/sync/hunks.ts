import * as diff from 'diff';
import { DIFF_CONTEXT_LINES } from '../constants.js';
import type { SyncHunk } from './types.js';

/**
 * Split text into lines that keep their trailing newline.
 * The last line has none when the text does not end with one.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n').map((line) => `${line}\n`);
  const last = lines.length - 1;
  if (lines[last] === '\n') {
    lines.pop();
  } else {
    lines[last] = lines[last].slice(0, -1);
  }
  return lines;
}

/**
 * Line-level hunks turning generated into staged, in order
 */
export function computeHunks(
  generated: string[],
  staged: string[],
  context: number = DIFF_CONTEXT_LINES
): SyncHunk[] {
  const hunks: SyncHunk[] = [];
  let oldIdx = 0;
  let newIdx = 0;
  let pending: SyncHunk | undefined;

  const flush = (): void => {
    if (!pending) return;
    const end = pending.oldStart + pending.oldLines.length;
    pending.contextBefore = generated.slice(Math.max(0, pending.oldStart - context), pending.oldStart);
    pending.contextAfter = generated.slice(end, end + context);
    hunks.push(pending);
    pending = undefined;
  };

  for (const part of diff.diffArrays(generated, staged)) {
    if (part.added || part.removed) {
      pending ??= {
        oldStart: oldIdx,
        oldLines: [],
        newStart: newIdx,
        newLines: [],
        contextBefore: [],
        contextAfter: [],
      };
      if (part.added) {
        pending.newLines.push(...part.value);
        newIdx += part.value.length;
      } else {
        pending.oldLines.push(...part.value);
        oldIdx += part.value.length;
      }
    } else {
      flush();
      oldIdx += part.value.length;
      newIdx += part.value.length;
    }
  }
  flush();

  return hunks;
}
