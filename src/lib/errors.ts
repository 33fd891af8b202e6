/**
 * Custom error classes for dotloop
 *
 * These provide structured error handling with specific error types
 * that can be caught and handled differently based on the error kind.
 * Per-file errors (render, secret lookup, filesystem, sync) are collected
 * by the pipeline; config, state store and lock errors abort the run.
 */

/**
 * Base error class for all dotloop errors
 */
export class DotloopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DotloopError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when configuration is missing, malformed, or references
 * something that does not exist
 */
export class ConfigError extends DotloopError {
  public readonly configFile?: string;
  public readonly field?: string;
  public readonly issues?: string[];

  constructor(
    message: string,
    options: { configFile?: string; field?: string; issues?: string[] } = {}
  ) {
    super(message);
    this.name = 'ConfigError';
    this.configFile = options.configFile;
    this.field = options.field;
    this.issues = options.issues;
  }
}

/**
 * Error thrown when variable names collide with secret names.
 * Carries every colliding name found across the run.
 */
export class SecretConflictError extends DotloopError {
  public readonly names: string[];

  constructor(names: string[]) {
    super(
      `Variable/secret name collision: ${names.join(', ')}. ` +
        'Each name must be unique across vars and secrets.'
    );
    this.name = 'SecretConflictError';
    this.names = names;
  }
}

/**
 * Error thrown when a secret engine lookup fails
 */
export class SecretResolutionError extends DotloopError {
  public readonly engine: string;
  public readonly reference: string;
  public readonly reason: string;

  constructor(options: { engine: string; reference: string; reason: string }) {
    super(`Failed to resolve secret ${options.reference} via ${options.engine}: ${options.reason}`);
    this.name = 'SecretResolutionError';
    this.engine = options.engine;
    this.reference = options.reference;
    this.reason = options.reason;
  }
}

/**
 * Error thrown when the template engine rejects a source file
 */
export class RenderError extends DotloopError {
  public readonly src: string;

  constructor(message: string, options: { src: string }) {
    super(message);
    this.name = 'RenderError';
    this.src = options.src;
  }
}

/**
 * Error thrown when a filesystem operation fails
 */
export class FsError extends DotloopError {
  public readonly path: string;
  public readonly operation: string;

  constructor(message: string, options: { path: string; operation: string }) {
    super(message);
    this.name = 'FsError';
    this.path = options.path;
    this.operation = options.operation;
  }
}

/**
 * Error thrown when the persisted state cannot be read or parsed.
 * The state file is never reset automatically.
 */
export class StateStoreError extends DotloopError {
  public readonly statePath: string;

  constructor(message: string, options: { statePath: string }) {
    super(message);
    this.name = 'StateStoreError';
    this.statePath = options.statePath;
  }
}

/**
 * Error thrown when staged drift cannot be mapped onto the source
 */
export class SyncConflictError extends DotloopError {
  public readonly src: string;
  public readonly hunks: number[];

  constructor(message: string, options: { src: string; hunks: number[] }) {
    super(message);
    this.name = 'SyncConflictError';
    this.src = options.src;
    this.hunks = options.hunks;
  }
}

/**
 * Error thrown when an action is not allowed from a file's current status
 */
export class InvalidTransitionError extends DotloopError {
  public readonly src: string;
  public readonly from: string;
  public readonly action: string;

  constructor(options: { src: string; from: string; action: string; hint?: string }) {
    const suffix = options.hint ? ` (${options.hint})` : '';
    super(`Cannot ${options.action} ${options.src}: file is ${options.from}${suffix}`);
    this.name = 'InvalidTransitionError';
    this.src = options.src;
    this.from = options.from;
    this.action = options.action;
  }
}

/**
 * Error thrown when another process holds the dotfiles lock
 */
export class LockError extends DotloopError {
  public readonly lockPath: string;
  public readonly ownerPid?: number;

  constructor(message: string, options: { lockPath: string; ownerPid?: number }) {
    super(message);
    this.name = 'LockError';
    this.lockPath = options.lockPath;
    this.ownerPid = options.ownerPid;
  }
}

/**
 * Error thrown when user cancels an operation
 */
export class UserCancelledError extends DotloopError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Type guard to check if error is a DotloopError
 */
export function isDotloopError(error: unknown): error is DotloopError {
  return error instanceof DotloopError;
}

/**
 * Type guard to check if error is a ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Type guard to check if error is a StateStoreError
 */
export function isStateStoreError(error: unknown): error is StateStoreError {
  return error instanceof StateStoreError;
}

/**
 * Whether an error must abort the whole invocation instead of a single file
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof StateStoreError ||
    error instanceof LockError ||
    error instanceof SecretConflictError ||
    error instanceof UserCancelledError
  );
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
