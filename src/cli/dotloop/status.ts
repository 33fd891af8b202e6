/**
 * dotloop status - Show where each file sits in the pipeline
 */

import type { CommandModule } from 'yargs';
import { bold, green, yellow } from '../../lib/colors.js';
import { collectStatus, summarizeFilesets, type FileStatus } from '../../lib/status/index.js';
import { driftIndicator, print, printDim, printTable } from '../../lib/ui/index.js';
import { runWithContext, selectedEntries, withSelection, type SelectionArgs } from './shared.js';

interface StatusArgs extends SelectionArgs {
  'only-diffs'?: boolean;
  deployed?: boolean;
  undeployed?: boolean;
}

export function statusRows(statuses: FileStatus[]): string[][] {
  return statuses.map((s) => [
    s.src,
    s.deployed ? 'deployed' : 'undeployed',
    s.detail,
    `[${s.recorded}]${driftIndicator(s.drift)}`,
  ]);
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status [files..]',
  describe: 'Show pipeline status and pending differences per file',
  builder: (yargs) =>
    withSelection(yargs)
      .option('only-diffs', {
        type: 'boolean',
        default: false,
        description: 'Only show files with pending differences',
      })
      .option('deployed', {
        type: 'boolean',
        default: false,
        description: 'Only show deployed files',
      })
      .option('undeployed', {
        type: 'boolean',
        default: false,
        description: 'Only show files that are not deployed',
      })
      .example('$0 status --all', 'Status of every file')
      .example('$0 status --all --only-diffs', 'Files that need attention'),
  handler: async (argv) => {
    await runWithContext(argv, { mutating: false }, async (ctx) => {
      const statuses = await collectStatus(ctx, selectedEntries(ctx, argv), {
        onlyDiffs: argv['only-diffs'],
        deployed: argv.deployed,
        undeployed: argv.undeployed,
      });

      if (statuses.length === 0) {
        printDim('No files to show.');
      }
      printTable({
        rows: statusRows(statuses),
        styles: [undefined, (t) => (t.trim() === 'deployed' ? green(t) : yellow(t))],
      });

      const filesets = ctx.loaded.config.filesets.map((f) => f.name);
      if (filesets.length > 0) {
        print('');
        print(bold('Filesets needing sync:'));
        const summaries = summarizeFilesets(filesets, statuses);
        if (summaries.length === 0) {
          printDim('none', 2);
        }
        for (const s of summaries) {
          print(`  ${s.name}: ${s.files} file(s), ${s.lines} line(s)`);
        }
      }
      return true;
    });
  },
};
