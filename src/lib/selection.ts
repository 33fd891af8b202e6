/**
 * File selection: explicit files, --all, or --filesets
 *
 * Every file-consuming command goes through parseSelection() so that
 * exactly one selection source is always given and nothing defaults to
 * "all files".
 */

import { minimatch } from 'minimatch';
import { ConfigError } from './errors.js';
import { isValidGlob } from './config-validation.js';
import { suggest, suggestAll } from './suggest.js';
import type { DotloopConfig, FileEntry, FilesetEntry } from './config.js';

export type FileSelection =
  | { kind: 'files'; patterns: string[] }
  | { kind: 'all' }
  | { kind: 'filesets'; names: string[] };

export interface SelectionArgs {
  files?: string[];
  all?: boolean;
  filesets?: string[];
}

/**
 * Split comma-separated --filesets values ("a,b" or repeated flags)
 */
export function splitFilesetNames(values: string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

/**
 * Build a selection from CLI arguments.
 * Exactly one of files, --all, --filesets must be given.
 */
export function parseSelection(args: SelectionArgs): FileSelection {
  const files = args.files ?? [];
  const filesets = splitFilesetNames(args.filesets);
  const sources = [files.length > 0, args.all === true, filesets.length > 0].filter(Boolean).length;

  if (sources > 1) {
    throw new ConfigError('Cannot combine explicit files, --all, and --filesets');
  }
  if (sources === 0) {
    throw new ConfigError('Specify files to process, --all, or --filesets');
  }

  if (args.all) {
    return { kind: 'all' };
  }
  if (filesets.length > 0) {
    return { kind: 'filesets', names: filesets };
  }
  return { kind: 'files', patterns: files };
}

/**
 * Shell-glob match against a src path; invalid globs compare literally
 */
export function matchesPattern(pattern: string, src: string): boolean {
  if (pattern === src) {
    return true;
  }
  if (!isValidGlob(pattern)) {
    return false;
  }
  return minimatch(src, pattern, { dot: true });
}

/**
 * Filesets whose patterns match src, in declaration order
 */
export function matchingFilesets(config: DotloopConfig, src: string): FilesetEntry[] {
  return config.filesets.filter((fs) => fs.patterns.some((p) => matchesPattern(p, src)));
}

/**
 * Expand fileset names to their patterns
 */
export function resolveFilesets(config: DotloopConfig, names: string[]): string[] {
  const patterns: string[] = [];
  for (const name of names) {
    const fileset = config.filesets.find((f) => f.name === name);
    if (!fileset) {
      const suggestion = suggest(
        name,
        config.filesets.map((f) => f.name)
      );
      const hint = suggestion ? `. Did you mean: ${suggestion}?` : '';
      throw new ConfigError(`Unknown fileset: ${name}${hint}`, { field: 'filesets' });
    }
    patterns.push(...fileset.patterns);
  }
  return patterns;
}

/**
 * Entries whose src matches any of the patterns, in config order
 */
export function filterEntries(config: DotloopConfig, patterns: string[]): FileEntry[] {
  return config.files.filter((entry) => patterns.some((p) => matchesPattern(p, entry.src)));
}

/**
 * Resolve a selection to config entries.
 * Explicit patterns that match nothing raise a ConfigError with suggestions;
 * --all on an empty config returns an empty list.
 */
export function selectEntries(config: DotloopConfig, selection: FileSelection): FileEntry[] {
  if (selection.kind === 'all') {
    return [...config.files];
  }

  const patterns =
    selection.kind === 'filesets'
      ? resolveFilesets(config, selection.names)
      : selection.patterns;

  const entries = filterEntries(config, patterns);
  if (entries.length === 0) {
    const suggestions = suggestAll(
      patterns,
      config.files.map((f) => f.src)
    );
    const message =
      suggestions.length > 0
        ? `No matching files found in config. Did you mean: ${suggestions.join(', ')}?`
        : 'No matching files found in config';
    throw new ConfigError(message);
  }
  return entries;
}
