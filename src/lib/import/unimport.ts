/**
 * Unimport: stop managing files and remove every trace from the dotfiles root
 */

import fs from 'fs';
import path from 'path';
import { removeFileEntry } from '../config-editor.js';
import type { FileEntry } from '../config.js';
import { FsError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { filePaths } from '../paths.js';
import {
  pruneEmptyDirs,
  runForFile,
  undeployFile,
  type FileOutcome,
  type PipelineContext,
  type UndeployOptions,
} from '../pipeline/index.js';
import { isManagedSymlink } from '../publisher.js';
import { resolveEffectiveConfig } from '../resolver.js';

async function unimportFile(
  ctx: PipelineContext,
  entry: FileEntry,
  options: UndeployOptions
): Promise<FileOutcome> {
  const { layout, configPath, config } = ctx.loaded;
  const eff = resolveEffectiveConfig(ctx.loaded, entry);
  const paths = filePaths(layout, entry.src);

  if (isManagedSymlink(eff.target, paths.staged)) {
    await undeployFile(ctx, eff, options);
  }

  const copies: Array<[string, string]> = [
    [paths.source, layout.root],
    [paths.generated, layout.generatedDir],
    [paths.staged, layout.stagedDir],
  ];

  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would remove ${entry.src} from ${configPath}`);
    for (const [p] of copies) {
      if (fs.existsSync(p)) logger.info(`[DRY RUN] Would remove ${p}`);
    }
    return { src: entry.src, result: 'changed' };
  }

  if (!removeFileEntry(configPath, entry.src)) {
    logger.warn(`No [[files]] block for ${entry.src} found in ${configPath}`);
  }
  config.files = config.files.filter((f) => f.src !== entry.src);

  for (const [p, stopAt] of copies) {
    try {
      fs.rmSync(p, { force: true });
    } catch (error) {
      throw new FsError(`Failed to remove ${p}: ${errorMessage(error)}`, {
        path: p,
        operation: 'unimport',
      });
    }
    pruneEmptyDirs(path.dirname(p), stopAt);
  }

  ctx.store.remove(entry.src);
  logger.info(`Unimported ${entry.src}`);
  return { src: entry.src, result: 'changed' };
}

export async function runUnimport(
  ctx: PipelineContext,
  entries: FileEntry[],
  options: UndeployOptions
): Promise<FileOutcome[]> {
  const outcomes: FileOutcome[] = [];
  for (const entry of entries) {
    outcomes.push(await runForFile(ctx, entry.src, 'unimport', () => unimportFile(ctx, entry, options)));
  }
  return outcomes;
}
