/**
 * Logging system for dotloop
 *
 * Consola-based singleton logger with a StderrReporter that prefixes each
 * line with its level. Progress messages from the pipeline go through this
 * logger; command results go through ui/ print helpers.
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (-v / -q counts, --no-color)
 * 2. Environment variable (DOTLOOP_LOG_LEVEL)
 * 3. Default (INFO)
 */

import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LogLevel, LOG_LEVEL_ENV } from './constants.js';
import { codes, setColorEnabled } from './colors.js';

export { LogLevel };

// ---------------------------------------------------------------------------
// StderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes every log entry that passes the logger level to stderr.
 */
class StderrReporter implements ConsolaReporter {
  private useColors: boolean;

  constructor(useColors: boolean) {
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);

    const prefix = this.useColors ? colorizeLevel(levelName, logObj.level) : `[${levelName}]`;

    process.stderr.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function levelToName(level: number): string {
  if (level <= 0) {
    // 0 = error/fatal, negative = silent (shouldn't log)
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  switch (true) {
    case level <= 0:
      return `${codes.red}[${name}]${codes.reset}`;
    case level === 1:
      return `${codes.yellow}[${name}]${codes.reset}`;
    case level <= 3:
      return `${codes.cyan}[${name}]${codes.reset}`;
    default:
      return `${codes.brightBlack}[${name}]${codes.reset}`;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.message;
      return typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a);
    })
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with no reporters until initializeLogger() runs.
 */
export const logger = createConsola({
  level: LogLevel.INFO,
  reporters: [],
});

// ---------------------------------------------------------------------------
// initializeLogger
// ---------------------------------------------------------------------------

export interface LoggerOptions {
  /** Number of -v flags */
  verbose?: number;
  /** Number of -q flags */
  quiet?: number;
  noColor?: boolean;
}

/**
 * Map a signed verbosity (verbose count minus quiet count) to a consola level.
 */
export function verbosityToLevel(verbosity: number): LogLevel {
  if (verbosity <= -3) return LogLevel.SILENT;
  if (verbosity === -2) return LogLevel.ERROR;
  if (verbosity === -1) return LogLevel.WARN;
  if (verbosity === 0) return LogLevel.INFO;
  if (verbosity === 1) return LogLevel.DEBUG;
  return LogLevel.TRACE;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  const verbose = options.verbose ?? 0;
  const quiet = options.quiet ?? 0;

  let level: number;
  if (verbose > 0 || quiet > 0) {
    level = verbosityToLevel(verbose - quiet);
  } else if (process.env[LOG_LEVEL_ENV]) {
    level = parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LogLevel.INFO;
  } else {
    level = LogLevel.INFO;
  }

  logger.level = level;

  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  logger.setReporters([new StderrReporter(useColors)]);
}

// ---------------------------------------------------------------------------
// parseLogLevel
// ---------------------------------------------------------------------------

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    off: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
    verbose: LogLevel.DEBUG,
  };
  return mapping[normalized];
}

// ---------------------------------------------------------------------------
// _resetForTesting
// ---------------------------------------------------------------------------

/**
 * Reset all module-level state for test isolation.
 * Prefixed with _ to signal internal-only use.
 */
export function _resetForTesting(): void {
  logger.setReporters([]);
  logger.level = LogLevel.INFO;
}
