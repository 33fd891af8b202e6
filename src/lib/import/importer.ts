/**
 * Import existing config files into the dotfiles root.
 *
 * Each imported file is copied in as a source, appended to the config file
 * and applied with force, so the original is replaced by the managed link.
 */

import fs from 'fs';
import path from 'path';
import { appendFileEntry } from '../config-editor.js';
import { entryTarget, findEntry } from '../config.js';
import { DEFAULT_IMPORT_MAX_DEPTH, IGNORE_REASON_DECLINED } from '../constants.js';
import { FsError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { collapseTilde, expandTilde, isWithin } from '../paths.js';
import { runApply, runForFile, type FileOutcome, type PipelineContext } from '../pipeline/index.js';
import { importEntry } from './path-mapper.js';

export interface ImportOptions {
  /** Import every file of a directory without prompting */
  all: boolean;
  maxDepth?: number;
}

export interface ImportResult {
  outcomes: FileOutcome[];
  /** Paths recorded as ignored during this run */
  ignored: string[];
}

function lstatOrUndefined(p: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(p);
  } catch {
    return undefined;
  }
}

/**
 * Files under dir down to maxDepth directory levels
 */
export function walkFiles(dir: string, maxDepth: number): string[] {
  const out: string[] = [];
  const walk = (current: string, depth: number): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(current, { withFileTypes: true });
    } catch (error) {
      logger.warn(`Cannot read ${current}: ${errorMessage(error)}`);
      return;
    }
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (depth < maxDepth) {
          walk(full, depth + 1);
        } else {
          logger.debug(`Max depth reached, not descending into ${full}`);
        }
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        out.push(full);
      }
    }
  };
  walk(dir, 1);
  return out;
}

/**
 * Why a candidate path is not offered for import, or undefined
 */
export function skipReason(ctx: PipelineContext, p: string): string | undefined {
  const { layout, config } = ctx.loaded;

  if (isWithin(layout.root, p)) {
    return 'inside the dotfiles directory';
  }

  const stats = lstatOrUndefined(p);
  if (stats?.isSymbolicLink()) {
    const link = path.resolve(path.dirname(p), fs.readlinkSync(p));
    if (isWithin(layout.stagedDir, link)) {
      return 'already managed';
    }
  }

  const configuredTargets = new Set(
    config.files.map((f) => path.resolve(expandTilde(entryTarget(f))))
  );
  if (configuredTargets.has(p)) {
    return 'already configured';
  }

  if (ctx.store.isIgnored(collapseTilde(p))) {
    return 'previously ignored';
  }
  return undefined;
}

async function importFile(ctx: PipelineContext, p: string): Promise<FileOutcome> {
  const entry = importEntry(p);
  const dest = path.join(ctx.loaded.layout.root, entry.src);

  if (findEntry(ctx.loaded.config, entry.src)) {
    throw new FsError(`${entry.src} is already configured`, { path: dest, operation: 'import' });
  }
  if (fs.existsSync(dest)) {
    throw new FsError(`Destination already exists: ${dest}`, { path: dest, operation: 'import' });
  }

  if (ctx.dryRun) {
    logger.info(`[DRY RUN] Would import ${collapseTilde(p)} as ${entry.src}`);
    return { src: entry.src, result: 'changed' };
  }

  try {
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.copyFileSync(p, dest);
    fs.chmodSync(dest, fs.statSync(p).mode & 0o7777);
  } catch (error) {
    throw new FsError(`Failed to copy ${p} to ${dest}: ${errorMessage(error)}`, {
      path: dest,
      operation: 'import',
    });
  }

  appendFileEntry(ctx.loaded.configPath, entry);
  ctx.loaded.config.files.push(entry);
  logger.info(`Imported ${collapseTilde(p)} as ${entry.src}`);

  const [applied] = await runApply(ctx, [entry], { force: true });
  return applied ?? { src: entry.src, result: 'changed' };
}

export async function runImport(
  ctx: PipelineContext,
  input: string,
  options: ImportOptions
): Promise<ImportResult> {
  const root = path.resolve(expandTilde(input));
  const stats = lstatOrUndefined(root);
  if (!stats) {
    throw new FsError(`Path not found: ${root}`, { path: root, operation: 'import' });
  }

  const isDirectory = stats.isDirectory();
  const candidates = isDirectory ? walkFiles(root, options.maxDepth ?? DEFAULT_IMPORT_MAX_DEPTH) : [root];
  const result: ImportResult = { outcomes: [], ignored: [] };

  for (const p of candidates) {
    const reason = skipReason(ctx, p);
    if (reason) {
      logger.debug(`Skipping ${collapseTilde(p)}: ${reason}`);
      if (!isDirectory) {
        result.outcomes.push({ src: collapseTilde(p), result: 'skipped', message: reason });
      }
      continue;
    }

    if (isDirectory && !options.all) {
      const choice = await ctx.prompter.chooseImport(collapseTilde(p));
      if (choice === 'ignore') {
        if (!ctx.dryRun) {
          ctx.store.addIgnored(collapseTilde(p), IGNORE_REASON_DECLINED);
        }
        result.ignored.push(collapseTilde(p));
        continue;
      }
      if (choice === 'skip') {
        continue;
      }
    }

    result.outcomes.push(await runForFile(ctx, collapseTilde(p), 'import', () => importFile(ctx, p)));
  }

  return result;
}
