/**
 * Result lines for command handlers. All output goes through print, so
 * quiet mode mutes it.
 */

import * as colors from '../colors.js';
import { box } from './theme.js';
import { print } from './output.js';

type StatusType = 'success' | 'error' | 'warning' | 'info';

const statusFn: Record<StatusType, (msg: string) => string> = {
  success: colors.success,
  error: colors.error,
  warning: colors.warning,
  info: colors.info,
};

export interface NextStep {
  command: string;
  description?: string;
}

/**
 * Example: printStatus('success', 'Deployed kitty/kitty.conf')
 */
export function printStatus(type: StatusType, message: string): void {
  print(statusFn[type](message));
}

export function printDim(message: string, indent: number = 0): void {
  print(`${' '.repeat(indent)}${colors.dim(message)}`);
}

export function printNextSteps(steps: NextStep[]): void {
  print(colors.dim('  Next steps:'));
  for (const step of steps) {
    const desc = step.description ? `     # ${step.description}` : '';
    print(colors.dim(`    ${step.command}${desc}`));
  }
}

/**
 * Titled block of aligned `label  value` lines between two rules,
 * followed by next steps when given
 */
export function printSummaryBox(
  title: string,
  fields: Array<{ label: string; value: string }>,
  nextSteps: NextStep[] = []
): void {
  const rule = colors.green(box.horizontal.repeat(58));
  const labelWidth = Math.max(0, ...fields.map((f) => f.label.length)) + 4;

  print('');
  print(rule);
  print(colors.green(`  ${title}`));
  print(rule);
  print('');
  for (const field of fields) {
    print(`  ${field.label.padEnd(labelWidth)}${field.value}`);
  }
  if (nextSteps.length > 0) {
    print('');
    printNextSteps(nextSteps);
  }
  print('');
}
