/**
 * Plumbing shared by the dotloop subcommands: selection flags, context
 * setup, locking and result reporting.
 */

import type { Argv } from 'yargs';
import { loadConfig, type FileEntry } from '../../lib/config.js';
import { withLock } from '../../lib/lock.js';
import {
  createPipelineContext,
  failedOutcomes,
  summarizeFailures,
  type FileOutcome,
  type PipelineContext,
} from '../../lib/pipeline/index.js';
import {
  InquirerPrompter,
  isInteractive,
  nonInteractivePrompter,
  type Prompter,
} from '../../lib/prompts.js';
import { parseSelection, selectEntries } from '../../lib/selection.js';
import {
  errorToDisplay,
  printDim,
  printError,
  printStatus,
} from '../../lib/ui/index.js';

export interface GlobalArgs {
  config?: string;
  'dry-run'?: boolean;
  verbose?: number;
  quiet?: number;
  color?: boolean;
}

export interface SelectionArgs extends GlobalArgs {
  files?: string[];
  all?: boolean;
  filesets?: string[];
}

/**
 * Positional files plus --all and --filesets
 */
export function withSelection<T>(yargs: Argv<T>) {
  return yargs
    .positional('files', {
      type: 'string',
      array: true,
      description: 'Source paths or glob patterns',
    })
    .option('all', {
      type: 'boolean',
      description: 'Process every configured file',
    })
    .option('filesets', {
      type: 'string',
      array: true,
      description: 'Process the files of these filesets (comma-separated)',
    });
}

export interface RunOptions {
  /** Take the process lock (skipped in dry runs) */
  mutating: boolean;
  prompter?: Prompter;
}

export function defaultPrompter(): Prompter {
  return isInteractive() ? new InquirerPrompter() : nonInteractivePrompter;
}

/**
 * Load config and state, run fn, and map failures to the exit code.
 * fn returns false when any file failed.
 */
export async function runWithContext(
  args: GlobalArgs,
  options: RunOptions,
  fn: (ctx: PipelineContext) => Promise<boolean>
): Promise<void> {
  try {
    const loaded = loadConfig(args.config);
    const dryRun = args['dry-run'] === true;
    const run = async (): Promise<boolean> => {
      const ctx = createPipelineContext(loaded, {
        dryRun,
        prompter: options.prompter ?? defaultPrompter(),
      });
      return fn(ctx);
    };

    const ok =
      options.mutating && !dryRun ? await withLock(loaded.layout.lockPath, run) : await run();
    if (!ok) {
      process.exitCode = 1;
    }
  } catch (error) {
    printError(errorToDisplay(error));
    process.exitCode = 1;
  }
}

/**
 * Entries named by the selection flags
 */
export function selectedEntries(ctx: PipelineContext, args: SelectionArgs): FileEntry[] {
  return selectEntries(ctx.loaded.config, parseSelection(args));
}

/**
 * Print one line per file and a failure block. Returns false when any
 * file failed.
 */
export function reportOutcomes(action: string, done: string, outcomes: FileOutcome[]): boolean {
  let changed = 0;
  let unchanged = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    switch (outcome.result) {
      case 'changed':
        changed++;
        printStatus('success', `${done} ${outcome.src}`);
        break;
      case 'unchanged':
        unchanged++;
        printDim(`${outcome.src}: up to date`, 2);
        break;
      case 'skipped':
        skipped++;
        printStatus('warning', `${outcome.src}: skipped (${outcome.message ?? 'no reason given'})`);
        break;
      case 'failed':
        break;
    }
  }

  const failed = failedOutcomes(outcomes);
  const summary = summarizeFailures(action, outcomes);
  if (summary) {
    const [title, ...lines] = summary.split('\n');
    printError({ title, detail: lines.map((l) => l.trim()).join('\n  ') });
  }

  if (outcomes.length === 0) {
    printDim('No files selected.');
  } else {
    const parts = [`${changed} ${done.toLowerCase()}`, `${unchanged} unchanged`];
    if (skipped > 0) parts.push(`${skipped} skipped`);
    if (failed.length > 0) parts.push(`${failed.length} failed`);
    printDim(parts.join(', '));
  }

  return failed.length === 0;
}
