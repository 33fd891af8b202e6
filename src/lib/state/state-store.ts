/**
 * Durable per-file pipeline state, persisted to `.dotloop_state.toml`.
 *
 * Every mutation is written immediately with an atomic write-replace, one
 * file at a time, so a crash mid-batch leaves the store consistent with
 * exactly the files that completed. A file that cannot be parsed raises
 * StateStoreError and is never reset.
 *
 * Layout:
 * ```toml
 * [files."kitty/kitty.conf"]
 * status = "deployed"
 * target = "~/.config/kitty/kitty.conf"
 * drift = false
 * staged_digest = "…"
 *
 * [[ignored]]
 * path = "~/.config/foo/cache.db"
 * reason = "user_declined"
 * ```
 */

import fs from 'fs';
import path from 'path';
import * as TOML from 'smol-toml';
import writeFileAtomic from 'write-file-atomic';
import { StateStoreError, errorMessage } from '../errors.js';
import { isRecord } from '../config-validation.js';
import { logger } from '../logger.js';
import {
  emptyRecord,
  isPipelineStatus,
  type FileRecord,
  type IgnoredEntry,
} from './types.js';

const KNOWN_RECORD_KEYS = ['status', 'target', 'drift', 'staged_digest'];
const KNOWN_TOP_LEVEL_KEYS = ['files', 'ignored'];

export interface StateStoreOptions {
  /** Keep all changes in memory; nothing is written */
  dryRun?: boolean;
}

function parseRecord(src: string, raw: unknown, statePath: string): FileRecord {
  if (!isRecord(raw)) {
    throw new StateStoreError(`Corrupt state file ${statePath}: files."${src}" is not a table`, {
      statePath,
    });
  }
  if (!isPipelineStatus(raw.status)) {
    throw new StateStoreError(
      `Corrupt state file ${statePath}: files."${src}" has unknown status ${JSON.stringify(raw.status)}`,
      { statePath }
    );
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_RECORD_KEYS.includes(key)) {
      extra[key] = value;
    }
  }

  return {
    status: raw.status,
    target: typeof raw.target === 'string' ? raw.target : undefined,
    drift: raw.drift === true,
    stagedDigest: typeof raw.staged_digest === 'string' ? raw.staged_digest : undefined,
    extra,
  };
}

function serializeRecord(record: FileRecord): Record<string, unknown> {
  const out: Record<string, unknown> = { ...record.extra, status: record.status };
  if (record.target !== undefined) out.target = record.target;
  out.drift = record.drift;
  if (record.stagedDigest !== undefined) out.staged_digest = record.stagedDigest;
  return out;
}

function recordsEqual(a: FileRecord, b: FileRecord): boolean {
  return JSON.stringify(serializeRecord(a)) === JSON.stringify(serializeRecord(b));
}

export class StateStore {
  readonly statePath: string;
  private readonly dryRun: boolean;
  private records = new Map<string, FileRecord>();
  private ignored: IgnoredEntry[] = [];
  private extra: Record<string, unknown> = {};

  private constructor(statePath: string, options: StateStoreOptions) {
    this.statePath = statePath;
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Load the store. A missing file yields an empty store.
   */
  static load(statePath: string, options: StateStoreOptions = {}): StateStore {
    const store = new StateStore(statePath, options);
    if (!fs.existsSync(statePath)) {
      logger.debug(`No state file at ${statePath}, starting empty`);
      return store;
    }

    let raw: unknown;
    try {
      raw = TOML.parse(fs.readFileSync(statePath, 'utf8'));
    } catch (error) {
      throw new StateStoreError(`Failed to read state file ${statePath}: ${errorMessage(error)}`, {
        statePath,
      });
    }
    if (!isRecord(raw)) {
      throw new StateStoreError(`Corrupt state file ${statePath}`, { statePath });
    }

    for (const [key, value] of Object.entries(raw)) {
      if (!KNOWN_TOP_LEVEL_KEYS.includes(key)) {
        store.extra[key] = value;
      }
    }

    if (raw.files !== undefined) {
      if (!isRecord(raw.files)) {
        throw new StateStoreError(`Corrupt state file ${statePath}: files is not a table`, {
          statePath,
        });
      }
      for (const [src, value] of Object.entries(raw.files)) {
        store.records.set(src, parseRecord(src, value, statePath));
      }
    }

    if (raw.ignored !== undefined) {
      if (!Array.isArray(raw.ignored)) {
        throw new StateStoreError(`Corrupt state file ${statePath}: ignored is not an array`, {
          statePath,
        });
      }
      for (const entry of raw.ignored) {
        if (isRecord(entry) && typeof entry.path === 'string') {
          store.ignored.push({
            path: entry.path,
            reason: typeof entry.reason === 'string' ? entry.reason : 'unknown',
          });
        }
      }
    }

    return store;
  }

  /**
   * Recorded state of a file, or an unmanaged default
   */
  get(src: string): FileRecord {
    const record = this.records.get(src);
    return record ? { ...record, extra: { ...record.extra } } : emptyRecord();
  }

  has(src: string): boolean {
    return this.records.has(src);
  }

  sources(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Replace a file's record and persist immediately.
   * Returns false when the record was unchanged and nothing was written.
   */
  set(src: string, record: FileRecord): boolean {
    const current = this.records.get(src);
    if (current && recordsEqual(current, record)) {
      return false;
    }
    this.records.set(src, { ...record, extra: { ...record.extra } });
    this.save();
    return true;
  }

  /**
   * Apply a partial update to a file's record and persist immediately
   */
  update(src: string, changes: Partial<Omit<FileRecord, 'extra'>>): boolean {
    return this.set(src, { ...this.get(src), ...changes });
  }

  /**
   * Drop a file's record and persist immediately
   */
  remove(src: string): void {
    if (this.records.delete(src)) {
      this.save();
    }
  }

  isIgnored(p: string): boolean {
    return this.ignored.some((e) => e.path === p);
  }

  ignoredEntries(): IgnoredEntry[] {
    return this.ignored.map((e) => ({ ...e }));
  }

  addIgnored(p: string, reason: string): void {
    if (this.isIgnored(p)) return;
    this.ignored.push({ path: p, reason });
    this.save();
  }

  removeIgnored(p: string): void {
    const before = this.ignored.length;
    this.ignored = this.ignored.filter((e) => e.path !== p);
    if (this.ignored.length !== before) {
      this.save();
    }
  }

  serialize(): string {
    const doc: Record<string, unknown> = { ...this.extra };
    const files: Record<string, unknown> = {};
    for (const [src, record] of this.records) {
      files[src] = serializeRecord(record);
    }
    doc.files = files;
    if (this.ignored.length > 0) {
      doc.ignored = this.ignored.map((e) => ({ path: e.path, reason: e.reason }));
    }
    return TOML.stringify(doc);
  }

  /**
   * Atomically replace the state file with the current contents
   */
  save(): void {
    if (this.dryRun) {
      return;
    }
    try {
      fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
      writeFileAtomic.sync(this.statePath, this.serialize());
    } catch (error) {
      throw new StateStoreError(
        `Failed to write state file ${this.statePath}: ${errorMessage(error)}`,
        { statePath: this.statePath }
      );
    }
    logger.trace(`Saved state to ${this.statePath}`);
  }
}

/**
 * Structured instructions logged when a state save fails after the
 * filesystem was already changed
 */
export interface RecoveryInfo {
  situation: string[];
  consequence: string[];
  instructions: string[];
}

/**
 * Run a state mutation; on failure log recovery steps and rethrow
 */
export function withRecovery<T>(mutate: () => T, recovery: RecoveryInfo): T {
  try {
    return mutate();
  } catch (error) {
    logger.warn('Situation:');
    for (const line of recovery.situation) logger.warn(`  - ${line}`);
    logger.warn(`  - Update to state file failed: ${errorMessage(error)}`);
    logger.warn('Result:');
    for (const line of recovery.consequence) logger.warn(`  - ${line}`);
    logger.warn('Instructions to fix:');
    for (const line of recovery.instructions) logger.warn(`  - ${line}`);
    throw error;
  }
}
