export type {
  FileOutcome,
  PipelineContext,
  DeployOptions,
  UndeployOptions,
  CleanOptions,
} from './types.js';
export { createPipelineContext } from './context.js';
export type { ContextOptions } from './context.js';
export { runForFile, failedOutcomes, hasFailures, summarizeFailures } from './outcome.js';
export { sha256, listFiles, pruneEmptyDirs } from './files.js';
export { generateFile, runGenerate, resolveAll, preflightCollisions } from './generate.js';
export { stageFile, runStage, DRIFT_SKIP_MESSAGE } from './stage.js';
export { deployFile, runDeploy } from './deploy.js';
export { runApply } from './apply.js';
export { undeployFile, runUndeploy } from './undeploy.js';
export { runClean } from './clean.js';
export type { CleanResult } from './clean.js';
