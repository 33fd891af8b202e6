export type {
  SyncHunk,
  HunkClass,
  ClassifiedHunk,
  HunkDecision,
  HunkRequest,
  HunkDecider,
  MergeResult,
} from './types.js';
export { splitLines, computeHunks } from './hunks.js';
export {
  classifyHunks,
  mergeHunks,
  defaultDecision,
  allowedDecisions,
  editLines,
  TEMPLATE_ANNOTATION,
  CONFLICT_ANNOTATION,
  LINE_COUNT_ANNOTATION,
} from './merge.js';
export { syncFile, runSync, formatHunk, defaultHunkDecider } from './sync.js';
export type { SyncFileOutcome } from './sync.js';
