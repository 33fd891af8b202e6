/**
 * Quiet-mode-aware output gate.
 *
 * All ui/ print functions call print() / printErr() instead of
 * console.log / console.error directly. A single setQuietMode(true)
 * call in CLI init (-qqq) silences all command output.
 */

let quietMode = false;

export function setQuietMode(enabled: boolean): void {
  quietMode = enabled;
}

/**
 * Write to stdout, suppressed when quiet mode is active.
 */
export function print(...args: unknown[]): void {
  if (!quietMode) {
    console.log(...args);
  }
}

/**
 * Write to stderr, suppressed when quiet mode is active.
 */
export function printErr(...args: unknown[]): void {
  if (!quietMode) {
    console.error(...args);
  }
}
