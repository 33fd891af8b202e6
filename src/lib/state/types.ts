/**
 * Pipeline state types
 */

export const PIPELINE_STATUSES = ['unmanaged', 'generated', 'staged', 'deployed'] as const;

/**
 * Where a file sits in the generate -> stage -> deploy pipeline
 */
export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

export type PipelineAction = 'generate' | 'stage' | 'deploy' | 'undeploy' | 'clean';

export function isPipelineStatus(value: unknown): value is PipelineStatus {
  return typeof value === 'string' && (PIPELINE_STATUSES as readonly string[]).includes(value);
}

/**
 * Persisted record of one managed file
 */
export interface FileRecord {
  status: PipelineStatus;
  /** Last deployed target (tilde-collapsed) */
  target?: string;
  /** Staged content was seen to differ from what dotloop last staged */
  drift: boolean;
  /** sha256 of the content dotloop last wrote to the staging area */
  stagedDigest?: string;
  /** Fields written by newer versions, kept verbatim on rewrite */
  extra: Record<string, unknown>;
}

/**
 * An import path the user chose to ignore
 */
export interface IgnoredEntry {
  path: string;
  reason: string;
}

export function emptyRecord(): FileRecord {
  return { status: 'unmanaged', drift: false, extra: {} };
}
