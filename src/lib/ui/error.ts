/**
 * Structured error display.
 *
 * Centralizes the error -> title/detail/hint mapping used by every
 * command's top-level catch block.
 */

import * as colors from '../colors.js';
import {
  ConfigError,
  FsError,
  LockError,
  RenderError,
  SecretConflictError,
  SecretResolutionError,
  StateStoreError,
  SyncConflictError,
  InvalidTransitionError,
  errorMessage,
} from '../errors.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

/**
 * Display a structured error to stderr.
 *
 * Output format:
 * ```
 * ✗ {title}                    <- via colors.error()
 *   {detail}                   <- plain text, only if provided
 *   Hint: {hint}               <- via colors.dim(), only if provided
 * ```
 */
export function printError(options: ErrorDisplayOptions): void {
  printErr(colors.error(options.title));
  if (options.detail) {
    printErr(`  ${options.detail}`);
  }
  if (options.hint) {
    printErr(`  ${colors.dim(`Hint: ${options.hint}`)}`);
  }
}

/**
 * Suggest a next step for a given error.
 */
export function getErrorHint(error: unknown): string | undefined {
  if (error instanceof ConfigError) {
    return error.configFile
      ? `Check ${error.configFile}, or run \`dotloop init\` to create one.`
      : 'Check your config file.';
  }
  if (error instanceof StateStoreError) {
    return `Repair or remove ${error.statePath}; it is never reset automatically.`;
  }
  if (error instanceof LockError) {
    return 'If no other dotloop process is running, delete the lock file and retry.';
  }
  if (error instanceof SecretConflictError) {
    return 'Rename the variable or the secret so each name is unique.';
  }
  if (error instanceof SecretResolutionError) {
    return 'Check that the secret engine CLI is installed and signed in.';
  }
  if (error instanceof RenderError) {
    return 'Fix the template syntax or define the missing variable.';
  }
  if (error instanceof SyncConflictError) {
    return 'Edit the source by hand, or re-run `sync` and choose Edit for the conflicting hunk.';
  }
  if (error instanceof InvalidTransitionError) {
    return 'Run the earlier pipeline stage first, or use `apply`.';
  }
  if (error instanceof FsError) {
    return 'Check that the path exists and is writable.';
  }
  return undefined;
}

/**
 * Extract display info from an error object.
 *
 * ConfigError issues become the detail block so every validation
 * problem is shown at once.
 */
export function errorToDisplay(error: unknown): ErrorDisplayOptions {
  let detail: string | undefined;
  if (error instanceof ConfigError && error.issues && error.issues.length > 0) {
    detail = error.issues.join('\n  ');
  }

  return { title: errorMessage(error), detail, hint: getErrorHint(error) };
}
