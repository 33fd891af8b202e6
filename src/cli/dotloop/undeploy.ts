/**
 * dotloop undeploy - Replace managed links with plain files
 */

import type { CommandModule } from 'yargs';
import { runUndeploy } from '../../lib/pipeline/index.js';
import { reportOutcomes, runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

export interface UndeployArgs extends SelectionArgs {
  'remove-file'?: boolean;
}

export const undeployCommand: CommandModule<object, UndeployArgs> = {
  command: 'undeploy [files..]',
  describe: 'Replace managed symlinks with a plain copy of their content',
  builder: (yargs) =>
    withSelection(yargs)
      .option('remove-file', {
        type: 'boolean',
        default: false,
        description: 'Delete the target instead of leaving a plain copy',
      })
      .example('$0 undeploy kitty/kitty.conf', 'Keep the current config as a plain file'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const outcomes = await runUndeploy(ctx, selectedEntries(ctx, argv), {
        removeFile: argv['remove-file'] === true,
      });
      return reportOutcomes('undeploy', 'Undeployed', outcomes);
    });
  },
};
