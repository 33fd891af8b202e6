/**
 * Text-level edits to the config file.
 *
 * `[[files]]` blocks are appended or cut out line by line so the rest of
 * the file keeps its formatting and comments. The edited text is parsed
 * before it is written.
 */

import fs from 'fs';
import * as TOML from 'smol-toml';
import writeFileAtomic from 'write-file-atomic';
import { ConfigError, errorMessage } from './errors.js';
import { parseConfig, type FileEntry } from './config.js';
import { isRecord } from './config-validation.js';

const FILES_HEADER = /^\s*\[\[\s*files\s*\]\]\s*(#.*)?$/;
const ANY_HEADER = /^\s*\[/;
const SRC_LINE = /^\s*src\s*=/;

/**
 * A `[[files]]` block for an entry. Only non-default fields are written.
 */
export function formatFileEntry(entry: Pick<FileEntry, 'src' | 'target' | 'template'>): string {
  const fields: Record<string, unknown> = { src: entry.src };
  if (entry.target !== undefined) fields.target = entry.target;
  if (!entry.template) fields.template = false;
  return `[[files]]\n${TOML.stringify(fields)}`;
}

/**
 * Append an entry block to config text
 */
export function appendFileEntryText(
  content: string,
  entry: Pick<FileEntry, 'src' | 'target' | 'template'>
): string {
  let out = content;
  if (out !== '' && !out.endsWith('\n')) out += '\n';
  if (out !== '') out += '\n';
  out += formatFileEntry(entry);
  if (!out.endsWith('\n')) out += '\n';
  return out;
}

function srcOfLine(line: string): string | undefined {
  try {
    const parsed = TOML.parse(line.replace(/^\s+/, ''));
    return isRecord(parsed) && typeof parsed.src === 'string' ? parsed.src : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Cut the `[[files]]` block whose src matches out of config text.
 * Returns undefined when no such block exists.
 */
export function removeFileEntryText(content: string, src: string): string | undefined {
  const lines = content.split('\n');

  for (let start = 0; start < lines.length; start++) {
    if (!FILES_HEADER.test(lines[start])) continue;

    let end = start + 1;
    while (end < lines.length && !ANY_HEADER.test(lines[end])) end++;

    const matches = lines
      .slice(start + 1, end)
      .some((line) => SRC_LINE.test(line) && srcOfLine(line) === src);
    if (!matches) {
      start = end - 1;
      continue;
    }

    // blank lines after the block stay as separators for the next one
    while (end > start + 1 && lines[end - 1].trim() === '' && end < lines.length) end--;
    // the blank line before the block goes with it
    if (start > 0 && lines[start - 1].trim() === '' && end < lines.length) start--;

    lines.splice(start, end - start);
    const out = lines.join('\n');
    return content.endsWith('\n') && out !== '' && !out.endsWith('\n') ? `${out}\n` : out;
  }

  return undefined;
}

function readConfigText(configPath: string): string {
  try {
    return fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${configPath}`, {
      configFile: configPath,
      issues: [errorMessage(error)],
    });
  }
}

function writeConfigText(configPath: string, content: string): void {
  parseConfig(content, configPath);
  writeFileAtomic.sync(configPath, content);
}

export function appendFileEntry(
  configPath: string,
  entry: Pick<FileEntry, 'src' | 'target' | 'template'>
): void {
  writeConfigText(configPath, appendFileEntryText(readConfigText(configPath), entry));
}

/**
 * Remove an entry's block from the config file; false when it was not found
 */
export function removeFileEntry(configPath: string, src: string): boolean {
  const updated = removeFileEntryText(readConfigText(configPath), src);
  if (updated === undefined) {
    return false;
  }
  writeConfigText(configPath, updated);
  return true;
}
