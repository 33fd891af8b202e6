/**
 * Sync/merge types
 */

/**
 * A contiguous run of line differences between generated and staged
 * content. Lines keep their trailing newline.
 */
export interface SyncHunk {
  /** 0-based index of the first generated line replaced */
  oldStart: number;
  /** Generated lines removed */
  oldLines: string[];
  /** 0-based index of the first staged line inserted */
  newStart: number;
  /** Staged lines inserted */
  newLines: string[];
  contextBefore: string[];
  contextAfter: string[];
}

export type HunkClass = 'clean' | 'template' | 'conflict';

export interface ClassifiedHunk {
  hunk: SyncHunk;
  classification: HunkClass;
  annotation?: string;
  /** Source lines at the mapped range before any hunk is applied */
  sourceLines: string[];
}

export type HunkDecision = { kind: 'accept' } | { kind: 'skip' } | { kind: 'edit'; text: string };

/**
 * What a HunkDecider is asked about
 */
export interface HunkRequest {
  src: string;
  /** 1-based */
  index: number;
  total: number;
  hunk: SyncHunk;
  classification: HunkClass;
  annotation?: string;
  allowAccept: boolean;
  allowEdit: boolean;
  defaultDecision: HunkDecision['kind'];
}

export interface HunkDecider {
  decide(request: HunkRequest): Promise<HunkDecision>;
}

export interface MergeResult {
  lines: string[];
  /** Hunks written into the source */
  applied: number;
  /** 1-based indices of conflicts left unresolved */
  unresolved: number[];
}
