/**
 * Helpers for collecting and summarizing per-file outcomes
 */

import { errorMessage, isFatalError } from '../errors.js';
import { logger } from '../logger.js';
import type { FileOutcome, PipelineContext } from './types.js';

/**
 * Run one file's action, turning per-file errors into a failed outcome.
 * Fatal errors, and any error under failFast, propagate.
 */
export async function runForFile(
  ctx: PipelineContext,
  src: string,
  action: string,
  fn: () => Promise<FileOutcome>
): Promise<FileOutcome> {
  try {
    return await fn();
  } catch (error) {
    if (isFatalError(error) || ctx.failFast) {
      throw error;
    }
    logger.debug(`${action} failed for ${src}: ${errorMessage(error)}`);
    return { src, result: 'failed', message: errorMessage(error), error };
  }
}

export function failedOutcomes(outcomes: FileOutcome[]): FileOutcome[] {
  return outcomes.filter((o) => o.result === 'failed');
}

export function hasFailures(outcomes: FileOutcome[]): boolean {
  return outcomes.some((o) => o.result === 'failed');
}

/**
 * `Failed to <action> N file(s):` followed by one `  src: message` line each,
 * or undefined when nothing failed
 */
export function summarizeFailures(action: string, outcomes: FileOutcome[]): string | undefined {
  const failed = failedOutcomes(outcomes);
  if (failed.length === 0) {
    return undefined;
  }
  const lines = failed.map((o) => `  ${o.src}: ${o.message ?? 'unknown error'}`);
  return `Failed to ${action} ${failed.length} file(s):\n${lines.join('\n')}`;
}
