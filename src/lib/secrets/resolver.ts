/**
 * Secret Resolver
 *
 * Parses secret files, detects variable/secret name collisions, and
 * resolves definitions through an injected engine with a run-scoped cache.
 */

import fs from 'fs';
import path from 'path';
import * as TOML from 'smol-toml';
import { ConfigError, SecretResolutionError, errorMessage } from '../errors.js';
import { isRecord } from '../config-validation.js';
import { logger } from '../logger.js';
import { SecretCache } from './cache.js';
import { referenceKey, type SecretDefinition, type SecretEngine } from './types.js';

/**
 * Parse the [[secret]] tables of a secret file
 */
export function parseSecretFile(content: string, file: string): SecretDefinition[] {
  let raw: unknown;
  try {
    raw = TOML.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse secrets file: ${file}`, {
      configFile: file,
      issues: [errorMessage(error)],
    });
  }

  const tables = isRecord(raw) ? raw.secret : undefined;
  if (tables === undefined) {
    return [];
  }
  if (!Array.isArray(tables)) {
    throw new ConfigError(`Invalid secrets file: ${file}`, {
      configFile: file,
      issues: ['secret must be an array of tables'],
    });
  }

  const issues: string[] = [];
  const definitions: SecretDefinition[] = [];
  tables.forEach((table, i) => {
    if (
      !isRecord(table) ||
      typeof table.name !== 'string' ||
      typeof table.engine !== 'string' ||
      typeof table.reference !== 'string'
    ) {
      issues.push(`secret[${i}]: name, engine and reference must be strings`);
      return;
    }
    definitions.push({ name: table.name, engine: table.engine, reference: table.reference });
  });

  if (issues.length > 0) {
    throw new ConfigError(`Invalid secrets file: ${file}`, { configFile: file, issues });
  }
  return definitions;
}

/**
 * Load secret files relative to the dotfiles root, in order.
 * Missing files are skipped.
 */
export function loadSecretFiles(root: string, files: string[]): SecretDefinition[] {
  const definitions: SecretDefinition[] = [];
  for (const file of files) {
    const filePath = path.join(root, file);
    if (!fs.existsSync(filePath)) {
      logger.debug(`Secrets file not found, skipping: ${filePath}`);
      continue;
    }
    logger.debug(`Loading secrets from ${filePath}`);
    definitions.push(...parseSecretFile(fs.readFileSync(filePath, 'utf8'), filePath));
  }
  return definitions;
}

/**
 * Merge definition layers by name, later layers winning
 */
export function mergeSecretDefinitions(...layers: SecretDefinition[][]): SecretDefinition[] {
  const merged = new Map<string, SecretDefinition>();
  for (const layer of layers) {
    for (const def of layer) {
      merged.set(def.name, def);
    }
  }
  return [...merged.values()];
}

/**
 * Names defined both as a variable and as a secret, sorted
 */
export function findCollisions(
  variables: Record<string, unknown>,
  secrets: SecretDefinition[]
): string[] {
  const names = new Set(secrets.map((s) => s.name).filter((n) => Object.hasOwn(variables, n)));
  return [...names].sort();
}

/**
 * Resolves secret definitions, looking each reference up at most once.
 */
export class SecretResolver {
  private engine: SecretEngine;
  private cache: SecretCache;

  constructor(engine: SecretEngine, cache: SecretCache = new SecretCache()) {
    this.engine = engine;
    this.cache = cache;
  }

  /**
   * Resolve every definition to its value.
   * Throws SecretResolutionError for the first reference that failed.
   */
  async resolve(definitions: SecretDefinition[]): Promise<Record<string, string>> {
    const values: Record<string, string> = {};

    for (const def of definitions) {
      const key = referenceKey(def);
      let lookup = this.cache.get(key);

      if (!lookup) {
        try {
          const value = await this.engine.resolve(def.engine, def.reference);
          lookup = { ok: true, value };
        } catch (error) {
          lookup = { ok: false, reason: errorMessage(error) };
        }
        this.cache.set(key, lookup);
      } else {
        logger.trace(`Secret cache hit for ${def.name}`);
      }

      if (!lookup.ok) {
        throw new SecretResolutionError({
          engine: def.engine,
          reference: def.reference,
          reason: lookup.reason,
        });
      }
      values[def.name] = lookup.value;
    }

    return values;
  }
}
