/**
 * Apply: generate, stage and deploy each file in turn.
 * A file stops at its first failure or skip; the others carry on.
 */

import type { FileEntry } from '../config.js';
import { deployFile } from './deploy.js';
import { generateFile, preflightCollisions, resolveAll } from './generate.js';
import { runForFile } from './outcome.js';
import { stageFile } from './stage.js';
import type { DeployOptions, FileOutcome, PipelineContext } from './types.js';

export async function runApply(
  ctx: PipelineContext,
  entries: FileEntry[],
  options: DeployOptions
): Promise<FileOutcome[]> {
  const effective = resolveAll(ctx, entries);
  preflightCollisions(effective);

  const outcomes: FileOutcome[] = [];
  for (const eff of effective) {
    outcomes.push(
      await runForFile(ctx, eff.src, 'apply', async () => {
        const generated = await generateFile(ctx, eff);
        const staged = await stageFile(ctx, eff);
        if (staged.result === 'skipped') {
          return staged;
        }
        const deployed = await deployFile(ctx, eff, options);
        const changed = [generated, staged, deployed].some((o) => o.result === 'changed');
        return { src: eff.src, result: changed ? 'changed' : 'unchanged' };
      })
    );
  }
  return outcomes;
}
