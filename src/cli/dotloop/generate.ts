/**
 * dotloop generate - Render or copy sources into .generated/
 */

import type { CommandModule } from 'yargs';
import { runGenerate } from '../../lib/pipeline/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

export const generateCommand: CommandModule<object, SelectionArgs> = {
  command: 'generate [files..]',
  describe: 'Render templates (or copy plain files) into the generated area',
  builder: (yargs) =>
    withSelection(yargs)
      .example('$0 generate --all', 'Render every configured file')
      .example('$0 generate "kitty/*"', 'Render files matching a glob'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const outcomes = await runGenerate(ctx, selectedEntries(ctx, argv));
      return reportOutcomes('generate', 'Generated', outcomes);
    });
  },
};
