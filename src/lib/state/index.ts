export type { PipelineStatus, PipelineAction, FileRecord, IgnoredEntry } from './types.js';
export { PIPELINE_STATUSES, isPipelineStatus, emptyRecord } from './types.js';
export { TRANSITIONS, nextStatus, canTransition, assertTransition } from './transitions.js';
export { StateStore, withRecovery } from './state-store.js';
export type { StateStoreOptions, RecoveryInfo } from './state-store.js';
export { inspectDisk, statusFromDisk, reconcileStatus } from './reconcile.js';
export type { DiskFacts } from './reconcile.js';
