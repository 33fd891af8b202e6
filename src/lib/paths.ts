/**
 * Path utilities for tilde expansion and contraction, plus the
 * on-disk layout of a dotfiles root.
 *
 * Use expandTilde() before any filesystem operation on user-provided paths
 * and collapseTilde() when displaying or persisting them.
 */

import os from 'os';
import path from 'path';
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  GENERATED_DIR_NAME,
  LOCK_FILE_NAME,
  STAGED_DIR_NAME,
  STATE_FILE_NAME,
} from './constants.js';

export function homeDir(): string {
  return os.homedir();
}

/**
 * Expand `~` or `~/...` at the start of a path to the home directory.
 */
export function expandTilde(p: string): string {
  if (p === '~') {
    return homeDir();
  }
  if (p.startsWith('~/')) {
    return path.join(homeDir(), p.slice(2));
  }
  return p;
}

/**
 * Collapse the home directory prefix back to `~/...`.
 */
export function collapseTilde(p: string): string {
  const home = homeDir();
  if (p === home) {
    return '~';
  }
  if (p.startsWith(home + path.sep)) {
    return `~/${p.slice(home.length + 1)}`;
  }
  return p;
}

/**
 * Whether `child` is `parent` itself or lies beneath it.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * XDG config directory (honours XDG_CONFIG_HOME).
 */
export function configHome(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg && path.isAbsolute(xdg) ? xdg : path.join(homeDir(), '.config');
}

/**
 * Default location of the config file.
 */
export function defaultConfigPath(): string {
  return path.join(configHome(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Absolute locations derived from a dotfiles root.
 */
export interface DotfilesLayout {
  root: string;
  generatedDir: string;
  stagedDir: string;
  statePath: string;
  lockPath: string;
}

export function dotfilesLayout(dotfilesDir: string): DotfilesLayout {
  const root = path.resolve(expandTilde(dotfilesDir));
  return {
    root,
    generatedDir: path.join(root, GENERATED_DIR_NAME),
    stagedDir: path.join(root, STAGED_DIR_NAME),
    statePath: path.join(root, STATE_FILE_NAME),
    lockPath: path.join(root, LOCK_FILE_NAME),
  };
}

/**
 * Per-file paths through the pipeline stages.
 */
export interface FilePaths {
  source: string;
  generated: string;
  staged: string;
}

export function filePaths(layout: DotfilesLayout, src: string): FilePaths {
  return {
    source: path.join(layout.root, src),
    generated: path.join(layout.generatedDir, src),
    staged: path.join(layout.stagedDir, src),
  };
}
