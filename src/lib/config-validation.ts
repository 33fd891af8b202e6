/**
 * Config Validation Module
 *
 * Validates a parsed config.toml document before it is normalized.
 * Every problem is collected so the user can fix them in one pass.
 */

import { minimatch } from 'minimatch';

/**
 * Validation error with path and message
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Result of config validation
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Known top-level config keys
 */
const KNOWN_TOP_LEVEL_KEYS = ['dotfiles_dir', 'vars', 'secrets', 'atomic_deploy', 'files', 'filesets'];

/**
 * Known keys of a [[files]] table
 */
const KNOWN_FILE_KEYS = ['src', 'target', 'template', 'vars', 'secrets'];

/**
 * Known keys of a [filesets.<name>] table
 */
const KNOWN_FILESET_KEYS = ['patterns', 'vars', 'secrets'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether a glob pattern is well formed: brackets and braces close, and no
 * escape is left dangling at the end. minimatch itself reads such patterns
 * as literal text.
 */
export function isValidGlob(pattern: string): boolean {
  if (pattern === '') return false;

  let braces = 0;
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '\\') {
      if (i + 1 >= pattern.length) return false;
      i += 2;
      continue;
    }
    if (ch === '[') {
      const close = classEnd(pattern, i);
      if (close === -1) return false;
      i = close + 1;
      continue;
    }
    if (ch === '{') braces++;
    if (ch === '}' && --braces < 0) return false;
    i++;
  }
  if (braces !== 0) return false;

  return minimatch.makeRe(pattern) !== false;
}

/**
 * Index of the `]` closing the character class opened at `open`, or -1.
 * A `]` first in the class (after an optional `!` or `^`) is literal.
 */
function classEnd(pattern: string, open: number): number {
  let i = open + 1;
  if (pattern[i] === '!' || pattern[i] === '^') i++;
  if (pattern[i] === ']') i++;
  while (i < pattern.length) {
    if (pattern[i] === '\\') {
      i += 2;
      continue;
    }
    if (pattern[i] === ']') return i;
    i++;
  }
  return -1;
}

function validateStringArray(value: unknown, path: string, errors: ValidationError[]): void {
  if (value === undefined) return;
  if (!Array.isArray(value)) {
    errors.push({ path, message: `${path} must be an array` });
    return;
  }
  value.forEach((item, i) => {
    if (typeof item !== 'string') {
      errors.push({ path: `${path}[${i}]`, message: `${path} items must be strings` });
    }
  });
}

function checkUnknownKeys(
  obj: Record<string, unknown>,
  known: string[],
  prefix: string,
  errors: ValidationError[]
): void {
  for (const key of Object.keys(obj)) {
    if (!known.includes(key)) {
      const path = prefix ? `${prefix}.${key}` : key;
      errors.push({ path, message: `Unknown config property: ${key}` });
    }
  }
}

/**
 * Validate a parsed config document
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    return { valid: false, errors: [{ path: '', message: 'Config must be a table' }] };
  }

  checkUnknownKeys(config, KNOWN_TOP_LEVEL_KEYS, '', errors);

  if (config.dotfiles_dir === undefined) {
    errors.push({ path: 'dotfiles_dir', message: 'dotfiles_dir is required' });
  } else if (typeof config.dotfiles_dir !== 'string' || config.dotfiles_dir.trim() === '') {
    errors.push({ path: 'dotfiles_dir', message: 'dotfiles_dir must be a non-empty string' });
  }

  validateStringArray(config.vars, 'vars', errors);
  validateStringArray(config.secrets, 'secrets', errors);

  if (config.atomic_deploy !== undefined && typeof config.atomic_deploy !== 'boolean') {
    errors.push({ path: 'atomic_deploy', message: 'atomic_deploy must be a boolean' });
  }

  if (config.files !== undefined) {
    validateFiles(config.files, errors);
  }

  if (config.filesets !== undefined) {
    validateFilesets(config.filesets, errors);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate the [[files]] array
 */
function validateFiles(files: unknown, errors: ValidationError[]): void {
  if (!Array.isArray(files)) {
    errors.push({ path: 'files', message: 'files must be an array of tables' });
    return;
  }

  const seen = new Set<string>();
  files.forEach((entry, i) => {
    const prefix = `files[${i}]`;
    if (!isRecord(entry)) {
      errors.push({ path: prefix, message: 'file entry must be a table' });
      return;
    }

    checkUnknownKeys(entry, KNOWN_FILE_KEYS, prefix, errors);

    if (typeof entry.src !== 'string' || entry.src.trim() === '') {
      errors.push({ path: `${prefix}.src`, message: 'src is required and must be a string' });
    } else if (entry.src.startsWith('/') || entry.src.split('/').includes('..')) {
      errors.push({
        path: `${prefix}.src`,
        message: 'src must be a relative path inside the dotfiles directory',
      });
    } else if (seen.has(entry.src)) {
      errors.push({ path: `${prefix}.src`, message: `Duplicate src: ${entry.src}` });
    } else {
      seen.add(entry.src);
    }

    if (entry.target !== undefined && typeof entry.target !== 'string') {
      errors.push({ path: `${prefix}.target`, message: 'target must be a string' });
    }
    if (entry.template !== undefined && typeof entry.template !== 'boolean') {
      errors.push({ path: `${prefix}.template`, message: 'template must be a boolean' });
    }
    validateStringArray(entry.vars, `${prefix}.vars`, errors);
    validateStringArray(entry.secrets, `${prefix}.secrets`, errors);
  });
}

/**
 * Validate the [filesets.<name>] tables
 */
function validateFilesets(filesets: unknown, errors: ValidationError[]): void {
  if (!isRecord(filesets)) {
    errors.push({ path: 'filesets', message: 'filesets must be a table' });
    return;
  }

  for (const [name, fileset] of Object.entries(filesets)) {
    const prefix = `filesets.${name}`;
    if (!isRecord(fileset)) {
      errors.push({ path: prefix, message: 'fileset must be a table' });
      continue;
    }

    checkUnknownKeys(fileset, KNOWN_FILESET_KEYS, prefix, errors);

    if (fileset.patterns === undefined) {
      errors.push({ path: `${prefix}.patterns`, message: 'patterns is required' });
    } else {
      validateStringArray(fileset.patterns, `${prefix}.patterns`, errors);
      if (Array.isArray(fileset.patterns)) {
        fileset.patterns.forEach((pattern, i) => {
          if (typeof pattern === 'string' && !isValidGlob(pattern)) {
            errors.push({
              path: `${prefix}.patterns[${i}]`,
              message: `Invalid glob pattern: ${pattern}`,
            });
          }
        });
      }
    }
    validateStringArray(fileset.vars, `${prefix}.vars`, errors);
    validateStringArray(fileset.secrets, `${prefix}.secrets`, errors);
  }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
}
