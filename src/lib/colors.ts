/**
 * ANSI styling for terminal output. Every helper returns plain text when
 * color is off (NO_COLOR, --no-color, or stdout is not a TTY).
 */
export const codes = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

function shouldUseColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.FORCE_COLOR !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

let colorEnabled = shouldUseColors();

/**
 * Set by the --no-color flag
 */
export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

export function isColorEnabled(): boolean {
  return colorEnabled;
}

function colorize(text: string, code: string): string {
  return colorEnabled ? `${code}${text}${codes.reset}` : text;
}

export const red = (text: string): string => colorize(text, codes.red);
export const green = (text: string): string => colorize(text, codes.green);
export const yellow = (text: string): string => colorize(text, codes.yellow);
export const blue = (text: string): string => colorize(text, codes.blue);
export const cyan = (text: string): string => colorize(text, codes.cyan);
export const bold = (text: string): string => colorize(text, codes.bold);
export const dim = (text: string): string => colorize(text, codes.dim);

// Status markers: an icon with color, a bracketed word without
const markers = {
  success: { icon: '✓', plain: '[OK]' },
  warning: { icon: '⚠', plain: '[WARN]' },
  error: { icon: '✗', plain: '[ERROR]' },
  info: { icon: 'ℹ', plain: '[INFO]' },
} as const;

function marker(kind: keyof typeof markers): string {
  return colorEnabled ? markers[kind].icon : markers[kind].plain;
}

export function success(text: string): string {
  return `${green(marker('success'))} ${text}`;
}

export function warning(text: string): string {
  return `${yellow(marker('warning'))} ${yellow(text)}`;
}

export function error(text: string): string {
  return `${red(marker('error'))} ${red(text)}`;
}

export function info(text: string): string {
  return `${blue(marker('info'))} ${text}`;
}

// Diff lines
export function added(line: string): string {
  return green(`+${line}`);
}

export function removed(line: string): string {
  return red(`-${line}`);
}

export function header(text: string): string {
  return bold(cyan(text));
}
