/**
 * dotloop - Two-way dotfiles manager
 *
 * @packageDocumentation
 */

// Export all library modules
export * as colors from './lib/colors.js';
export * as config from './lib/config.js';
export * as prompts from './lib/prompts.js';
export * as pipeline from './lib/pipeline/index.js';
export * as sync from './lib/sync/index.js';
export * as secrets from './lib/secrets/index.js';
export * as state from './lib/state/index.js';
export * as status from './lib/status/index.js';
export * as importer from './lib/import/index.js';

// Export key types
export type { DotloopConfig, FileEntry, FilesetEntry, LoadedConfig } from './lib/config.js';
export type { EffectiveConfig, VariableSet } from './lib/resolver.js';
export type { FileSelection } from './lib/selection.js';
export type { PipelineStatus, FileRecord } from './lib/state/index.js';
export type { FileOutcome, PipelineContext } from './lib/pipeline/index.js';
export type { HunkDecider, HunkDecision, SyncHunk } from './lib/sync/index.js';
export type { SecretEngine, SecretDefinition } from './lib/secrets/index.js';
export type { Prompter } from './lib/prompts.js';

export { loadConfig, parseConfig } from './lib/config.js';
export { resolveEffectiveConfig } from './lib/resolver.js';
export { parseSelection, selectEntries } from './lib/selection.js';
export { publishSymlink, unpublishSymlink, isManagedSymlink } from './lib/publisher.js';
export { runInit } from './lib/init.js';
export { withLock } from './lib/lock.js';
export * from './lib/errors.js';
