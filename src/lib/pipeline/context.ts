import type { LoadedConfig } from '../config.js';
import { nonInteractivePrompter, type Prompter } from '../prompts.js';
import { CliSecretEngine, SecretResolver, type SecretEngine } from '../secrets/index.js';
import { StateStore } from '../state/index.js';
import type { PipelineContext } from './types.js';

export interface ContextOptions {
  dryRun?: boolean;
  failFast?: boolean;
  prompter?: Prompter;
  /** Secret backend; defaults to the `op` CLI */
  engine?: SecretEngine;
}

/**
 * Load the state store and wire the run-scoped collaborators
 */
export function createPipelineContext(loaded: LoadedConfig, options: ContextOptions = {}): PipelineContext {
  const dryRun = options.dryRun ?? false;
  return {
    loaded,
    store: StateStore.load(loaded.layout.statePath, { dryRun }),
    secrets: new SecretResolver(options.engine ?? new CliSecretEngine()),
    prompter: options.prompter ?? nonInteractivePrompter,
    dryRun,
    failFast: options.failFast,
    simulated: new Map(),
  };
}
