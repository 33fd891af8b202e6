/**
 * dotloop unimport - Stop managing files and remove them from the dotfiles root
 */

import type { CommandModule } from 'yargs';
import { runUnimport } from '../../lib/import/index.js';
import { parseSelection, selectEntries } from '../../lib/selection.js';
import { reportOutcomes, runWithContext, type GlobalArgs } from './shared.js';

interface UnimportArgs extends GlobalArgs {
  files?: string[];
  filesets?: string[];
  'remove-file'?: boolean;
}

export const unimportCommand: CommandModule<object, UnimportArgs> = {
  command: 'unimport [files..]',
  describe: 'Undeploy files and remove them from the config and dotfiles root',
  builder: (yargs) =>
    yargs
      .positional('files', {
        type: 'string',
        array: true,
        description: 'Source paths or glob patterns',
      })
      .option('filesets', {
        type: 'string',
        array: true,
        description: 'Unimport the files of these filesets (comma-separated)',
      })
      .option('remove-file', {
        type: 'boolean',
        default: false,
        description: 'Delete the target instead of leaving a plain copy',
      })
      .example('$0 unimport zshrc', 'Stop managing ~/.zshrc, keeping its content in place'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: true }, async (ctx) => {
      const selection = parseSelection({ files: argv.files, filesets: argv.filesets });
      const outcomes = await runUnimport(ctx, selectEntries(ctx.loaded.config, selection), {
        removeFile: argv['remove-file'] === true,
      });
      return reportOutcomes('unimport', 'Unimported', outcomes);
    });
  },
};
