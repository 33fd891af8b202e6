/**
 * Interactive prompts.
 *
 * Pipeline code depends on the Prompter and HunkDecider interfaces only;
 * the inquirer-backed implementations here are wired in by the CLI, and
 * tests pass scripted ones.
 */

import inquirer from 'inquirer';
import { yellow, dim } from './colors.js';
import { UserCancelledError } from './errors.js';
import type { HunkDecider, HunkDecision, HunkRequest } from './sync/types.js';

export type ImportChoice = 'import' | 'ignore' | 'skip';

/**
 * Decisions the pipeline asks the user for
 */
export interface Prompter {
  /** Overwrite a staged copy that has drifted? */
  confirmOverwrite(src: string): Promise<boolean>;
  /** What to do with a file found during a directory import */
  chooseImport(displayPath: string): Promise<ImportChoice>;
}

/**
 * Prompter for non-interactive runs: never overwrites drift, never imports
 */
export const nonInteractivePrompter: Prompter = {
  confirmOverwrite: async () => false,
  chooseImport: async () => 'skip',
};

/** Errors inquirer rejects with when the user presses Ctrl+C */
const CANCEL_ERROR_NAMES = new Set(['ExitPromptError', 'AbortPromptError']);

/**
 * Await a prompt, turning a cancelled prompt into UserCancelledError
 */
export async function cancellable<T>(pending: Promise<T>): Promise<T> {
  try {
    return await pending;
  } catch (error) {
    if (error instanceof Error && CANCEL_ERROR_NAMES.has(error.name)) {
      throw new UserCancelledError();
    }
    throw error;
  }
}

export class InquirerPrompter implements Prompter {
  async confirmOverwrite(src: string): Promise<boolean> {
    const { overwrite } = await cancellable(inquirer.prompt<{ overwrite: boolean }>([
      {
        type: 'confirm',
        name: 'overwrite',
        message: `${yellow(src)}: staged copy has drifted from the last generate. Overwrite it?`,
        default: false,
      },
    ]));
    return overwrite;
  }

  async chooseImport(displayPath: string): Promise<ImportChoice> {
    const { choice } = await cancellable(inquirer.prompt<{ choice: ImportChoice }>([
      {
        type: 'list',
        name: 'choice',
        message: `Import ${displayPath}?`,
        choices: [
          { name: 'Import', value: 'import' },
          { name: `Ignore ${dim('(do not ask again)')}`, value: 'ignore' },
          { name: 'Skip', value: 'skip' },
        ],
        default: 'import',
      },
    ]));
    return choice;
  }
}

/**
 * Per-hunk sync decisions through inquirer list + editor prompts
 */
export class InquirerHunkDecider implements HunkDecider {
  async decide(request: HunkRequest): Promise<HunkDecision> {
    const choices: Array<{ name: string; value: HunkDecision['kind'] }> = [];
    if (request.allowAccept) {
      choices.push({ name: 'Apply (take staged)', value: 'accept' });
    }
    choices.push({ name: 'Skip (keep source)', value: 'skip' });
    if (request.allowEdit) {
      choices.push({ name: 'Edit (write replacement text)', value: 'edit' });
    }

    const { action } = await cancellable(inquirer.prompt<{ action: HunkDecision['kind'] }>([
      {
        type: 'list',
        name: 'action',
        message: 'Action',
        choices,
        default: request.defaultDecision,
      },
    ]));

    if (action === 'edit') {
      const { text } = await cancellable(inquirer.prompt<{ text: string }>([
        {
          type: 'editor',
          name: 'text',
          message: 'Replacement lines for the source',
          default: request.hunk.newLines.join(''),
        },
      ]));
      return { kind: 'edit', text };
    }
    return { kind: action };
  }
}

/**
 * Whether prompts can be shown
 */
export function isInteractive(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}
