/**
 * Pipeline orchestrator types
 */

import type { LoadedConfig } from '../config.js';
import type { Prompter } from '../prompts.js';
import type { SecretResolver } from '../secrets/index.js';
import type { PipelineStatus, StateStore } from '../state/index.js';

/**
 * Result of one file through one pipeline action
 */
export interface FileOutcome {
  src: string;
  /** `unchanged` means the action had nothing to write */
  result: 'changed' | 'unchanged' | 'skipped' | 'failed';
  message?: string;
  error?: unknown;
}

/**
 * Everything an operation needs, passed explicitly
 */
export interface PipelineContext {
  loaded: LoadedConfig;
  store: StateStore;
  secrets: SecretResolver;
  prompter: Prompter;
  dryRun: boolean;
  /** Rethrow the first per-file failure instead of continuing */
  failFast?: boolean;
  /**
   * Statuses reached during a dry run. Nothing lands on disk in that mode,
   * so later stages of the same run read their starting point from here.
   */
  simulated: Map<string, PipelineStatus>;
}

export interface DeployOptions {
  force: boolean;
}

export interface UndeployOptions {
  removeFile: boolean;
}

export interface CleanOptions {
  generated: boolean;
  orphans: boolean;
}
