export {
  collectStatus,
  fileStatus,
  countChangedLines,
  hasDiffs,
  summarizeFilesets,
} from './status.js';
export type { FileStatus, StatusFilters, FilesetSummary } from './status.js';
export { collectDiffs } from './diff.js';
export type { FileDiff } from './diff.js';
