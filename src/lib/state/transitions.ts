/**
 * Allowed pipeline transitions.
 *
 * Every status change made by the orchestrator is checked against this
 * table. Re-running an earlier stage on a file that is further along
 * keeps its status.
 */

import { InvalidTransitionError } from '../errors.js';
import type { PipelineAction, PipelineStatus } from './types.js';

export const TRANSITIONS: Record<PipelineStatus, Partial<Record<PipelineAction, PipelineStatus>>> = {
  unmanaged: { generate: 'generated' },
  generated: { generate: 'generated', stage: 'staged', clean: 'unmanaged' },
  staged: { generate: 'staged', stage: 'staged', deploy: 'deployed', clean: 'unmanaged' },
  deployed: { generate: 'deployed', stage: 'deployed', deploy: 'deployed', undeploy: 'staged' },
};

const PREREQUISITE_HINT: Partial<Record<PipelineAction, string>> = {
  stage: 'run `generate` first',
  deploy: 'run `stage` first',
  undeploy: 'it is not deployed',
};

export function nextStatus(from: PipelineStatus, action: PipelineAction): PipelineStatus | undefined {
  return TRANSITIONS[from][action];
}

export function canTransition(from: PipelineStatus, action: PipelineAction): boolean {
  return nextStatus(from, action) !== undefined;
}

/**
 * Resolve the status after an action or throw InvalidTransitionError
 */
export function assertTransition(
  src: string,
  from: PipelineStatus,
  action: PipelineAction
): PipelineStatus {
  const to = nextStatus(from, action);
  if (to === undefined) {
    throw new InvalidTransitionError({ src, from, action, hint: PREREQUISITE_HINT[action] });
  }
  return to;
}
