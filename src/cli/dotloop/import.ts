/**
 * dotloop import - Bring existing config files under management
 */

import type { CommandModule } from 'yargs';
import { DEFAULT_IMPORT_MAX_DEPTH } from '../../lib/constants.js';
import { runImport } from '../../lib/import/index.js';
import { printDim } from '../../lib/ui/index.js';
import { reportOutcomes, runWithContext, type GlobalArgs } from './shared.js';

interface ImportArgs extends GlobalArgs {
  path: string;
  all?: boolean;
  'max-depth'?: number;
}

export const importCommand: CommandModule<object, ImportArgs> = {
  command: 'import <path>',
  describe: 'Copy a file (or a directory of files) into the dotfiles root and deploy it',
  builder: (yargs) =>
    yargs
      .positional('path', {
        type: 'string',
        demandOption: true,
        description: 'File or directory to import',
      })
      .option('all', {
        type: 'boolean',
        default: false,
        description: 'Import every file of a directory without prompting',
      })
      .option('max-depth', {
        type: 'number',
        default: DEFAULT_IMPORT_MAX_DEPTH,
        description: 'How many directory levels to walk',
      })
      .example('$0 import ~/.config/kitty', 'Choose which kitty files to import')
      .example('$0 import ~/.zshrc', 'Import a single file'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const result = await runImport(ctx, argv.path, {
        all: argv.all === true,
        maxDepth: argv['max-depth'],
      });
      for (const ignored of result.ignored) {
        printDim(`Ignoring ${ignored} from now on`, 2);
      }
      return reportOutcomes('import', 'Imported', result.outcomes);
    });
  },
};
