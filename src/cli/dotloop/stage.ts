/**
 * dotloop stage - Copy generated output into the staging area
 */

import type { CommandModule } from 'yargs';
import { runStage } from '../../lib/pipeline/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

export const stageCommand: CommandModule<object, SelectionArgs> = {
  command: 'stage [files..]',
  describe: 'Copy generated output into the staging area',
  builder: (yargs) =>
    withSelection(yargs).example('$0 stage --filesets shell', 'Stage the files of one fileset'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const outcomes = await runStage(ctx, selectedEntries(ctx, argv));
      return reportOutcomes('stage', 'Staged', outcomes);
    });
  },
};
