export type { SecretDefinition, SecretEngine } from './types.js';
export { referenceKey } from './types.js';
export { SecretCache } from './cache.js';
export type { CachedLookup } from './cache.js';
export {
  SecretResolver,
  parseSecretFile,
  loadSecretFiles,
  mergeSecretDefinitions,
  findCollisions,
} from './resolver.js';
export { CliSecretEngine, runCommand, ONEPASSWORD_ENGINE } from './onepassword.js';
export type { CommandResult, CommandRunner } from './onepassword.js';
