/**
 * Init: lay out a new dotfiles root and write a starter config.
 * Existing files are never overwritten.
 */

import fs from 'fs';
import path from 'path';
import * as TOML from 'smol-toml';
import writeFileAtomic from 'write-file-atomic';
import { DEFAULT_DOTFILES_DIR, DEFAULT_VARS_FILE } from './constants.js';
import { FsError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { defaultConfigPath, dotfilesLayout } from './paths.js';

export interface InitOptions {
  /** May contain `~`; stored in the config as given */
  dotfilesDir?: string;
  /** Defaults to the standard config location */
  configPath?: string;
  dryRun?: boolean;
}

export interface InitResult {
  configPath: string;
  root: string;
  created: string[];
  existing: string[];
}

export function starterConfig(dotfilesDir: string): string {
  return TOML.stringify({ dotfiles_dir: dotfilesDir, vars: [DEFAULT_VARS_FILE] });
}

export function runInit(options: InitOptions = {}): InitResult {
  const dotfilesDir = options.dotfilesDir ?? DEFAULT_DOTFILES_DIR;
  const configPath = path.resolve(options.configPath ?? defaultConfigPath());
  const layout = dotfilesLayout(dotfilesDir);
  const result: InitResult = { configPath, root: layout.root, created: [], existing: [] };

  const ensure = (p: string, create: () => void): void => {
    if (fs.existsSync(p)) {
      result.existing.push(p);
      return;
    }
    if (options.dryRun) {
      logger.info(`[DRY RUN] Would create ${p}`);
    } else {
      try {
        create();
      } catch (error) {
        throw new FsError(`Failed to create ${p}: ${errorMessage(error)}`, { path: p, operation: 'init' });
      }
      logger.debug(`Created ${p}`);
    }
    result.created.push(p);
  };

  const mkdir = (p: string): void => ensure(p, () => fs.mkdirSync(p, { recursive: true }));
  const writeFile = (p: string, content: string): void =>
    ensure(p, () => {
      fs.mkdirSync(path.dirname(p), { recursive: true });
      writeFileAtomic.sync(p, content);
    });

  mkdir(layout.root);
  mkdir(layout.generatedDir);
  mkdir(layout.stagedDir);
  writeFile(path.join(layout.root, DEFAULT_VARS_FILE), '');
  writeFile(layout.statePath, '');
  writeFile(configPath, starterConfig(dotfilesDir));

  return result;
}
