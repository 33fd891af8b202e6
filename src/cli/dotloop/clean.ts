/**
 * dotloop clean - Remove generated output and orphaned files
 */

import type { CommandModule } from 'yargs';
import { runClean } from '../../lib/pipeline/index.js';
import { collapseTilde } from '../../lib/paths.js';
import { printDim, printStatus } from '../../lib/ui/index.js';
import { runWithContext, type GlobalArgs } from './shared.js';

interface CleanArgs extends GlobalArgs {
  generated?: boolean;
  orphans?: boolean;
}

export const cleanCommand: CommandModule<object, CleanArgs> = {
  command: 'clean',
  describe: 'Delete generated output and files no longer in the config',
  builder: (yargs) =>
    yargs
      .option('generated', {
        type: 'boolean',
        default: false,
        description: 'Delete the whole generated area',
      })
      .option('orphans', {
        type: 'boolean',
        default: false,
        description: 'Delete generated and staged files whose source is not configured',
      })
      .example('$0 clean --orphans', 'Remove leftovers of files dropped from the config'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const result = runClean(ctx, {
        generated: argv.generated === true,
        orphans: argv.orphans === true,
      });
      for (const p of result.removed) {
        printStatus('success', `Removed ${collapseTilde(p)}`);
      }
      for (const src of result.regressed) {
        printDim(`${src} is now unmanaged`, 2);
      }
      if (result.removed.length === 0) {
        printDim('Nothing to clean.');
      }
      return true;
    });
  },
};
