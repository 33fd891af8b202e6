import fs from 'fs';
import path from 'path';
import * as TOML from 'smol-toml';
import { ConfigError } from './errors.js';
import { formatValidationErrors, isRecord, validateConfig } from './config-validation.js';
import { defaultConfigPath, dotfilesLayout, type DotfilesLayout } from './paths.js';
import { logger } from './logger.js';

/**
 * A single managed file
 */
export interface FileEntry {
  /** Path relative to the dotfiles directory (e.g. `kitty/kitty.conf`) */
  src: string;
  /** Deployment target, may contain `~`. Defaults to `~/.config/{src}` */
  target?: string;
  /** Render through the template engine (default: true) */
  template: boolean;
  /** Per-file variable files, relative to the dotfiles directory */
  vars: string[];
  /** Per-file secret files, relative to the dotfiles directory */
  secrets: string[];
}

/**
 * A named group of files selected by glob patterns
 */
export interface FilesetEntry {
  name: string;
  patterns: string[];
  vars: string[];
  secrets: string[];
}

/**
 * Configuration for dotloop (config.toml)
 */
export interface DotloopConfig {
  /** Dotfiles root, may contain `~` */
  dotfilesDir: string;
  /** Global variable files */
  vars: string[];
  /** Global secret files */
  secrets: string[];
  /**
   * Publish symlinks with a temp-link + rename swap.
   * Default: true
   */
  atomicDeploy: boolean;
  files: FileEntry[];
  /** Filesets in declaration order */
  filesets: FilesetEntry[];
}

/**
 * A config bound to the file it was read from
 */
export interface LoadedConfig {
  configPath: string;
  config: DotloopConfig;
  layout: DotfilesLayout;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(dotfilesDir: string): DotloopConfig {
  return {
    dotfilesDir,
    vars: [],
    secrets: [],
    atomicDeploy: true,
    files: [],
    filesets: [],
  };
}

/**
 * Deployment target for an entry, before tilde expansion
 */
export function entryTarget(entry: Pick<FileEntry, 'src' | 'target'>): string {
  return entry.target ?? `~/.config/${entry.src}`;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Parse and validate config.toml content.
 * Throws ConfigError listing every validation problem.
 */
export function parseConfig(content: string, configFile: string): DotloopConfig {
  let raw: unknown;
  try {
    raw = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse config file: ${configFile}`, {
      configFile,
      issues: [message],
    });
  }

  const result = validateConfig(raw);
  if (!result.valid || !isRecord(raw)) {
    throw new ConfigError(`Invalid config file: ${configFile}`, {
      configFile,
      issues: formatValidationErrors(result.errors),
    });
  }

  const dotfilesDir = typeof raw.dotfiles_dir === 'string' ? raw.dotfiles_dir : '';
  const config = getDefaultConfig(dotfilesDir);
  config.vars = stringList(raw.vars);
  config.secrets = stringList(raw.secrets);
  if (typeof raw.atomic_deploy === 'boolean') {
    config.atomicDeploy = raw.atomic_deploy;
  }

  const files = Array.isArray(raw.files) ? raw.files : [];
  for (const entry of files) {
    if (!isRecord(entry) || typeof entry.src !== 'string') continue;
    config.files.push({
      src: entry.src,
      target: typeof entry.target === 'string' ? entry.target : undefined,
      template: typeof entry.template === 'boolean' ? entry.template : true,
      vars: stringList(entry.vars),
      secrets: stringList(entry.secrets),
    });
  }

  if (isRecord(raw.filesets)) {
    for (const [name, fileset] of Object.entries(raw.filesets)) {
      if (!isRecord(fileset)) continue;
      config.filesets.push({
        name,
        patterns: stringList(fileset.patterns),
        vars: stringList(fileset.vars),
        secrets: stringList(fileset.secrets),
      });
    }
  }

  return config;
}

/**
 * Load configuration from disk.
 * Falls back to the default location when no path is given.
 */
export function loadConfig(configPath?: string): LoadedConfig {
  const resolved = path.resolve(configPath ?? defaultConfigPath());

  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found: ${resolved}`, { configFile: resolved });
  }

  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config file: ${resolved}: ${message}`, {
      configFile: resolved,
    });
  }

  const config = parseConfig(content, resolved);
  logger.debug(`Loaded config from ${resolved} (${config.files.length} file(s))`);

  return { configPath: resolved, config, layout: dotfilesLayout(config.dotfilesDir) };
}

/**
 * Look up an entry by src
 */
export function findEntry(config: DotloopConfig, src: string): FileEntry | undefined {
  return config.files.find((f) => f.src === src);
}
