/**
 * Config Resolver
 *
 * Merges global, fileset and per-file variable and secret layers into the
 * effective configuration of one file.
 */

import fs from 'fs';
import path from 'path';
import * as TOML from 'smol-toml';
import { ConfigError, errorMessage } from './errors.js';
import { entryTarget, type FileEntry, type LoadedConfig } from './config.js';
import { matchingFilesets } from './selection.js';
import { expandTilde } from './paths.js';
import { logger } from './logger.js';
import {
  findCollisions,
  loadSecretFiles,
  mergeSecretDefinitions,
  type SecretDefinition,
} from './secrets/index.js';

export type VariableSet = Record<string, unknown>;

/**
 * Fully merged configuration of a single file
 */
export interface EffectiveConfig {
  entry: FileEntry;
  src: string;
  /** Absolute, tilde-expanded target */
  target: string;
  template: boolean;
  /** Names of the filesets matching src, in declaration order */
  filesets: string[];
  variables: VariableSet;
  secretRefs: SecretDefinition[];
}

/**
 * Load variable files relative to the dotfiles root, later files winning.
 * Missing files are skipped.
 */
export function loadVarFiles(root: string, files: string[]): VariableSet {
  const vars: VariableSet = {};
  for (const file of files) {
    const filePath = path.join(root, file);
    if (!fs.existsSync(filePath)) {
      logger.debug(`Vars file not found, skipping: ${filePath}`);
      continue;
    }
    logger.debug(`Loading vars from ${filePath}`);
    try {
      Object.assign(vars, TOML.parse(fs.readFileSync(filePath, 'utf8')));
    } catch (error) {
      throw new ConfigError(`Failed to parse vars file: ${filePath}`, {
        configFile: filePath,
        issues: [errorMessage(error)],
      });
    }
  }
  return vars;
}

/**
 * Merge global -> filesets (declaration order) -> per-file layers
 * into one EffectiveConfig
 */
export function resolveEffectiveConfig(loaded: LoadedConfig, entry: FileEntry): EffectiveConfig {
  const { config, layout } = loaded;
  const filesets = matchingFilesets(config, entry.src);

  const variables: VariableSet = {
    ...loadVarFiles(layout.root, config.vars),
    ...filesets.reduce<VariableSet>(
      (acc, fs) => ({ ...acc, ...loadVarFiles(layout.root, fs.vars) }),
      {}
    ),
    ...loadVarFiles(layout.root, entry.vars),
  };

  const secretRefs = mergeSecretDefinitions(
    loadSecretFiles(layout.root, config.secrets),
    ...filesets.map((fs) => loadSecretFiles(layout.root, fs.secrets)),
    loadSecretFiles(layout.root, entry.secrets)
  );

  return {
    entry,
    src: entry.src,
    target: path.resolve(expandTilde(entryTarget(entry))),
    template: entry.template,
    filesets: filesets.map((fs) => fs.name),
    variables,
    secretRefs,
  };
}

/**
 * Collision names across every effective config, deduplicated and sorted
 */
export function collectCollisions(effective: EffectiveConfig[]): string[] {
  const names = new Set<string>();
  for (const eff of effective) {
    for (const name of findCollisions(eff.variables, eff.secretRefs)) {
      names.add(name);
    }
  }
  return [...names].sort();
}
