/**
 * Glyphs shared by the UI helpers. The status markers themselves live in
 * colors.ts.
 */

import * as colors from '../colors.js';

export const icons = {
  drift: '~',
} as const;

export const box = {
  horizontal: '═',
} as const;

/**
 * Yellow " ~" after a file whose staged copy has drifted, else empty
 */
export function driftIndicator(hasDrift: boolean): string {
  return hasDrift ? colors.yellow(` ${icons.drift}`) : '';
}
