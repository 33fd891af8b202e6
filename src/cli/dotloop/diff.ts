/**
 * dotloop diff - Unified diff from generated output to the staged copy
 */

import type { CommandModule } from 'yargs';
import { added, header, removed } from '../../lib/colors.js';
import { collectDiffs } from '../../lib/status/index.js';
import { print, printDim, printStatus } from '../../lib/ui/index.js';
import { runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

/**
 * Color a unified patch line by line
 */
export function colorizePatch(patch: string): string[] {
  return patch
    .split('\n')
    .filter((line) => line !== '' && !line.startsWith('====='))
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---') || line.startsWith('@@')) return header(line);
      if (line.startsWith('+')) return added(line.slice(1));
      if (line.startsWith('-')) return removed(line.slice(1));
      return line;
    });
}

export const diffCommand: CommandModule<object, SelectionArgs> = {
  command: 'diff [files..]',
  describe: 'Show drift between generated output and the staged copy',
  builder: (yargs) => withSelection(yargs).example('$0 diff --all', 'Show all drift'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: false }, async (ctx) => {
      const diffs = collectDiffs(ctx, selectedEntries(ctx, argv));
      if (diffs.length === 0) {
        printDim('No drift.');
      }
      for (const d of diffs) {
        if (d.kind === 'missing') {
          printStatus('warning', `${d.src}: no ${d.missing} copy`);
          continue;
        }
        for (const line of colorizePatch(d.patch)) {
          print(line);
        }
      }
      return true;
    });
  },
};
