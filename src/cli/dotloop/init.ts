/**
 * dotloop init - Create a dotfiles root and a starter config
 */

import type { CommandModule } from 'yargs';
import { DEFAULT_DOTFILES_DIR } from '../../lib/constants.js';
import { ConfigError } from '../../lib/errors.js';
import { runInit } from '../../lib/init.js';
import { collapseTilde } from '../../lib/paths.js';
import { errorToDisplay, printDim, printError, printSummaryBox } from '../../lib/ui/index.js';
import type { GlobalArgs } from './shared.js';

interface InitArgs extends GlobalArgs {
  'dotfiles-dir'?: string;
}

export const initCommand: CommandModule<object, InitArgs> = {
  command: 'init',
  describe: 'Create the dotfiles directory layout and config file',
  builder: (yargs) =>
    yargs
      .option('dotfiles-dir', {
        type: 'string',
        default: DEFAULT_DOTFILES_DIR,
        description: 'Where sources, generated output and staged files live',
      })
      .example('$0 init', `Set up ${DEFAULT_DOTFILES_DIR}`)
      .example('$0 init --dotfiles-dir ~/src/dotfiles', 'Use another directory'),
  handler: (argv) => {
    try {
      if (argv.config !== undefined) {
        throw new ConfigError('--config cannot be used with init (init creates the config)');
      }
      const result = runInit({
        dotfilesDir: argv['dotfiles-dir'],
        dryRun: argv['dry-run'] === true,
      });

      for (const p of result.existing) {
        printDim(`Exists: ${collapseTilde(p)}`, 2);
      }
      printSummaryBox(
        argv['dry-run'] ? 'dotloop init (dry run)' : 'dotloop initialized',
        [
          { label: 'Dotfiles', value: collapseTilde(result.root) },
          { label: 'Config', value: collapseTilde(result.configPath) },
          { label: 'Created', value: `${result.created.length} path(s)` },
        ],
        [
          { command: 'dotloop import ~/.config/<app>', description: 'Start managing a config' },
          { command: 'dotloop apply --all', description: 'Generate, stage and deploy' },
        ]
      );
    } catch (error) {
      printError(errorToDisplay(error));
      process.exitCode = 1;
    }
  },
};
