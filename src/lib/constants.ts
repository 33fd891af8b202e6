/**
 * Centralized constants and defaults for dotloop
 */

/**
 * Name used for the CLI, config directory, and on-disk markers
 */
export const APP_NAME = 'dotloop';

/**
 * Config file location relative to the user's config directory
 */
export const CONFIG_DIR_NAME = APP_NAME;
export const CONFIG_FILE_NAME = 'config.toml';

/**
 * Default dotfiles root created by `init`
 */
export const DEFAULT_DOTFILES_DIR = '~/dotfiles';

/**
 * Pipeline stage directories inside the dotfiles root
 */
export const GENERATED_DIR_NAME = '.generated';
export const STAGED_DIR_NAME = '.staged';

/**
 * Persistent state and lock files inside the dotfiles root
 */
export const STATE_FILE_NAME = '.dotloop_state.toml';
export const LOCK_FILE_NAME = '.dotloop.lock';

/**
 * Variables file seeded by `init`
 */
export const DEFAULT_VARS_FILE = 'vars.toml';

/**
 * Suffix for the sibling path used by atomic symlink swaps and undeploy copies
 */
export const TEMP_SUFFIX = '.dotloop.tmp';

/**
 * Suffix for foreign files moved aside by deploy
 */
export const BACKUP_SUFFIX = '.dotloop-backup';

/**
 * Default traversal depth for `import <dir>`
 */
export const DEFAULT_IMPORT_MAX_DEPTH = 10;

/**
 * Reason recorded for import paths the user chose to ignore
 */
export const IGNORE_REASON_DECLINED = 'user_declined';

/**
 * Lock acquisition timing (milliseconds)
 */
export const LOCK_RETRY_INTERVAL_MS = 200;
export const LOCK_TIMEOUT_MS = 5000;

/**
 * Secret engine invocation timeout (milliseconds)
 */
export const SECRET_ENGINE_TIMEOUT_MS = 30_000;

/**
 * Context lines shown around diff and sync hunks
 */
export const DIFF_CONTEXT_LINES = 3;

/**
 * Environment variable that sets the log level when no CLI flag is given
 */
export const LOG_LEVEL_ENV = 'DOTLOOP_LOG_LEVEL';

/**
 * Log level values for consola (numeric)
 */
export const LogLevel = {
  SILENT: -999,
  ERROR: 0,
  WARN: 1,
  INFO: 3,
  DEBUG: 4,
  TRACE: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];
