/**
 * Secret definitions and the engine boundary
 */

/**
 * One [[secret]] table from a secret file
 */
export interface SecretDefinition {
  /** Template variable name the value is exposed as */
  name: string;
  /** Engine identifier, e.g. "1password" */
  engine: string;
  /** Engine-specific locator, e.g. "op://vault/item/field" */
  reference: string;
}

/**
 * External secret backend. Rejects when the lookup fails.
 */
export interface SecretEngine {
  resolve(engine: string, reference: string): Promise<string>;
}

/**
 * Cache key for a definition: engine plus locator, never the name,
 * since two names may share one reference
 */
export function referenceKey(def: Pick<SecretDefinition, 'engine' | 'reference'>): string {
  return `${def.engine}:${def.reference}`;
}
