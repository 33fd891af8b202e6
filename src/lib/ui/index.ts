/**
 * Shared UI primitives for CLI output.
 *
 * Provides quiet-mode-aware, themed output functions used by
 * the command handlers.
 */

// Theme constants
export { icons, box, driftIndicator } from './theme.js';

// Output gating
export { setQuietMode, print, printErr } from './output.js';

// Status output
export { printStatus, printDim, printNextSteps, printSummaryBox } from './status.js';
export type { NextStep } from './status.js';

// Table output
export { printTable, columnWidths } from './table.js';
export type { TableOptions } from './table.js';

// Error output
export { printError, errorToDisplay, getErrorHint } from './error.js';
export type { ErrorDisplayOptions } from './error.js';
