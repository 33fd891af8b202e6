#!/usr/bin/env node
/**
 * dotloop - Two-way dotfiles manager
 *
 * Commands:
 *   dotloop init                 Create the dotfiles layout and config
 *   dotloop import <path>        Start managing existing config files
 *   dotloop generate|stage|deploy [files..]
 *                                Run one pipeline stage
 *   dotloop apply [files..]      Generate, stage and deploy
 *   dotloop undeploy [files..]   Replace links with plain files
 *   dotloop unimport [files..]   Stop managing files
 *   dotloop status [files..]     Pipeline status per file
 *   dotloop diff [files..]       Drift between generated and staged
 *   dotloop sync [files..]       Merge drift back into sources
 *   dotloop clean                Remove generated and orphaned files
 *
 * File-consuming commands take explicit files, --all, or --filesets.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { initCommand } from './dotloop/init.js';
import { importCommand } from './dotloop/import.js';
import { generateCommand } from './dotloop/generate.js';
import { stageCommand } from './dotloop/stage.js';
import { deployCommand } from './dotloop/deploy.js';
import { applyCommand } from './dotloop/apply.js';
import { undeployCommand } from './dotloop/undeploy.js';
import { unimportCommand } from './dotloop/unimport.js';
import { statusCommand } from './dotloop/status.js';
import { diffCommand } from './dotloop/diff.js';
import { syncCommand } from './dotloop/sync.js';
import { cleanCommand } from './dotloop/clean.js';
import { initializeLogger } from '../lib/logger.js';
import { setQuietMode } from '../lib/ui/index.js';

yargs(hideBin(process.argv))
  .scriptName('dotloop')
  .usage('$0 <command> [options]')
  .option('config', {
    type: 'string',
    description: 'Config file (default: ~/.config/dotloop/config.toml)',
    global: true,
  })
  .option('dry-run', {
    type: 'boolean',
    description: 'Describe every change without making it',
    global: true,
  })
  .option('verbose', {
    alias: 'v',
    type: 'count',
    description: 'Increase verbosity (-v debug, -vv trace)',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'count',
    description: 'Decrease verbosity (-q warn, -qq error, -qqq silent)',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    default: true,
    description: 'Colorize output (--no-color to disable)',
    global: true,
  })
  .middleware((argv) => {
    initializeLogger({ verbose: argv.verbose, quiet: argv.quiet, noColor: argv.color === false });
    setQuietMode(argv.quiet - argv.verbose >= 3);
  })
  .command(initCommand)
  .command(importCommand)
  .command(generateCommand)
  .command(stageCommand)
  .command(deployCommand)
  .command(applyCommand)
  .command(undeployCommand)
  .command(unimportCommand)
  .command(statusCommand)
  .command(diffCommand)
  .command(syncCommand)
  .command(cleanCommand)
  .demandCommand(1, 'Specify a command')
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .example('$0 init', 'Create ~/dotfiles and the config file')
  .example('$0 import ~/.config/kitty/kitty.conf', 'Manage an existing file')
  .example('$0 apply --all', 'Bring every file up to date')
  .example('$0 status --all --only-diffs', 'Files with pending changes')
  .example('$0 sync --all', 'Merge live edits back into sources')
  .strict()
  .fail((msg, err) => {
    if (err) {
      console.error(err.message);
    } else {
      console.error(msg);
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
