/**
 * dotloop sync - Merge drift from staged copies back into sources
 */

import type { CommandModule } from 'yargs';
import { InquirerHunkDecider, isInteractive } from '../../lib/prompts.js';
import { defaultHunkDecider, runSync } from '../../lib/sync/index.js';
import { printStatus } from '../../lib/ui/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

export const SYNC_NEXT_STEP = 'Run `dotloop generate` to re-render updated templates.';

export const syncCommand: CommandModule<object, SelectionArgs> = {
  command: 'sync [files..]',
  describe: 'Review staged drift hunk by hunk and write it back into the sources',
  builder: (yargs) =>
    withSelection(yargs)
      .example('$0 sync --all', 'Review drift in every file')
      .example('$0 --dry-run sync --all', 'Show hunks and their default choices'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const decider = isInteractive() ? new InquirerHunkDecider() : defaultHunkDecider;
      const outcomes = await runSync(ctx, selectedEntries(ctx, argv), decider);
      const ok = reportOutcomes('sync', 'Synced', outcomes);
      if (outcomes.some((o) => o.sourceModified)) {
        printStatus('info', SYNC_NEXT_STEP);
      }
      return ok;
    });
  },
};
