/**
 * dotloop apply - Generate, stage and deploy in one pass
 */

import type { CommandModule } from 'yargs';
import { runApply } from '../../lib/pipeline/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection } from './shared.js';
import type { DeployArgs } from './deploy.js';

export const applyCommand: CommandModule<object, DeployArgs> = {
  command: 'apply [files..]',
  describe: 'Generate, stage and deploy the selected files',
  builder: (yargs) =>
    withSelection(yargs)
      .option('force', {
        type: 'boolean',
        default: false,
        description: 'Replace existing targets without keeping a backup',
      })
      .example('$0 apply --all', 'Bring every file up to date')
      .example('$0 --dry-run apply --all', 'Show what apply would do'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const outcomes = await runApply(ctx, selectedEntries(ctx, argv), { force: argv.force === true });
      return reportOutcomes('apply', 'Applied', outcomes);
    });
  },
};
