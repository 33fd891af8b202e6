/**
 * Column-aligned table output for per-file listings (status, clean).
 */

import * as colors from '../colors.js';
import { print } from './output.js';

export interface TableOptions {
  /** Bold title printed above the table */
  title?: string;
  /** Cell text per row; columns are padded to the widest cell */
  rows: string[][];
  /** Optional per-column styling applied after padding */
  styles?: Array<((text: string) => string) | undefined>;
  /** Dim summary line printed below the table */
  summary?: string;
}

/**
 * Width of each column: the longest cell in that column.
 */
export function columnWidths(rows: string[][]): number[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return widths;
}

/**
 * Print a structured table.
 *
 * Output format per row:
 * ```
 *   {col1}  {col2}  {col3}
 * ```
 */
export function printTable(options: TableOptions): void {
  if (options.rows.length === 0) {
    return;
  }

  if (options.title) {
    print('');
    print(colors.bold(options.title));
  }

  const widths = columnWidths(options.rows);

  for (const row of options.rows) {
    const cells = row.map((cell, i) => {
      const padded = i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0);
      const style = options.styles?.[i];
      return style ? style(padded) : padded;
    });
    print(`  ${cells.join('  ')}`);
  }

  if (options.summary) {
    print('');
    print(colors.dim(options.summary));
  }
}
