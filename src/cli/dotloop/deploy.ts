/**
 * dotloop deploy - Link targets to their staged files
 */

import type { CommandModule } from 'yargs';
import { runDeploy } from '../../lib/pipeline/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

export interface DeployArgs extends SelectionArgs {
  force?: boolean;
}

export const deployCommand: CommandModule<object, DeployArgs> = {
  command: 'deploy [files..]',
  describe: 'Symlink each target to its staged file',
  builder: (yargs) =>
    withSelection(yargs)
      .option('force', {
        type: 'boolean',
        default: false,
        description: 'Replace existing targets without keeping a backup',
      })
      .example('$0 deploy --all', 'Deploy every staged file'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const outcomes = await runDeploy(ctx, selectedEntries(ctx, argv), { force: argv.force === true });
      return reportOutcomes('deploy', 'Deployed', outcomes);
    });
  },
};
