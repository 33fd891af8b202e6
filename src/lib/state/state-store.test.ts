import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { StateStore, withRecovery } from './state-store.js';
import { StateStoreError } from '../errors.js';
import { logger } from '../logger.js';

describe('StateStore', () => {
  let tempDir: string;
  let statePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dotloop-state-test-'));
    statePath = path.join(tempDir, '.dotloop_state.toml');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty when the file is missing', () => {
      const store = StateStore.load(statePath);
      expect(store.sources()).toEqual([]);
      expect(store.get('a')).toEqual({ status: 'unmanaged', drift: false, extra: {} });
    });

    it('should read records and ignored paths', () => {
      fs.writeFileSync(
        statePath,
        [
          '[files."kitty/kitty.conf"]',
          'status = "deployed"',
          'target = "~/.config/kitty/kitty.conf"',
          'drift = true',
          'staged_digest = "abc"',
          '',
          '[[ignored]]',
          'path = "~/.config/app/cache.db"',
          'reason = "user_declined"',
          '',
        ].join('\n')
      );

      const store = StateStore.load(statePath);

      expect(store.get('kitty/kitty.conf')).toEqual({
        status: 'deployed',
        target: '~/.config/kitty/kitty.conf',
        drift: true,
        stagedDigest: 'abc',
        extra: {},
      });
      expect(store.isIgnored('~/.config/app/cache.db')).toBe(true);
      expect(store.ignoredEntries()).toEqual([
        { path: '~/.config/app/cache.db', reason: 'user_declined' },
      ]);
    });

    it('should treat an empty file as an empty store', () => {
      fs.writeFileSync(statePath, '');
      expect(StateStore.load(statePath).sources()).toEqual([]);
    });

    it('should refuse unparseable files and leave them untouched', () => {
      fs.writeFileSync(statePath, 'files = [');
      expect(() => StateStore.load(statePath)).toThrow(StateStoreError);
      expect(fs.readFileSync(statePath, 'utf8')).toBe('files = [');
    });

    it('should reject unknown statuses', () => {
      fs.writeFileSync(statePath, '[files.a]\nstatus = "published"\n');
      expect(() => StateStore.load(statePath)).toThrow(
        `Corrupt state file ${statePath}: files."a" has unknown status "published"`
      );
    });
  });

  describe('mutations', () => {
    it('should persist every set immediately', () => {
      const store = StateStore.load(statePath);
      store.set('a', { status: 'generated', drift: false, extra: {} });

      const reloaded = StateStore.load(statePath);
      expect(reloaded.get('a').status).toBe('generated');
    });

    it('should report unchanged records without writing', () => {
      const store = StateStore.load(statePath);
      expect(store.set('a', { status: 'generated', drift: false, extra: {} })).toBe(true);
      fs.rmSync(statePath);

      expect(store.set('a', { status: 'generated', drift: false, extra: {} })).toBe(false);
      expect(fs.existsSync(statePath)).toBe(false);
    });

    it('should merge partial updates', () => {
      const store = StateStore.load(statePath);
      store.set('a', { status: 'staged', drift: false, stagedDigest: 'd1', extra: {} });
      store.update('a', { drift: true });

      expect(store.get('a')).toEqual({ status: 'staged', drift: true, stagedDigest: 'd1', extra: {} });
    });

    it('should remove records', () => {
      const store = StateStore.load(statePath);
      store.set('a', { status: 'generated', drift: false, extra: {} });
      store.remove('a');

      expect(store.has('a')).toBe(false);
      expect(StateStore.load(statePath).has('a')).toBe(false);
    });

    it('should not let callers mutate stored records', () => {
      const store = StateStore.load(statePath);
      store.set('a', { status: 'generated', drift: false, extra: {} });
      const record = store.get('a');
      record.status = 'deployed';

      expect(store.get('a').status).toBe('generated');
    });

    it('should add and remove ignored paths once', () => {
      const store = StateStore.load(statePath);
      store.addIgnored('~/x', 'user_declined');
      store.addIgnored('~/x', 'user_declined');
      expect(store.ignoredEntries()).toHaveLength(1);

      store.removeIgnored('~/x');
      expect(StateStore.load(statePath).isIgnored('~/x')).toBe(false);
    });

    it('should write nothing in dry-run mode', () => {
      const store = StateStore.load(statePath, { dryRun: true });
      store.set('a', { status: 'generated', drift: false, extra: {} });

      expect(store.get('a').status).toBe('generated');
      expect(fs.existsSync(statePath)).toBe(false);
    });
  });

  describe('forward compatibility', () => {
    it('should keep unknown fields on rewrite', () => {
      fs.writeFileSync(
        statePath,
        ['schema = 2', '', '[files.a]', 'status = "generated"', 'checksum_algo = "blake3"', ''].join('\n')
      );

      const store = StateStore.load(statePath);
      store.update('a', { status: 'staged' });

      const reloaded = StateStore.load(statePath);
      expect(reloaded.get('a')).toEqual({
        status: 'staged',
        drift: false,
        extra: { checksum_algo: 'blake3' },
      });
      expect(reloaded.serialize()).toContain('schema = 2');
    });
  });
});

describe('withRecovery', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the mutation result', () => {
    expect(withRecovery(() => 42, { situation: [], consequence: [], instructions: [] })).toBe(42);
  });

  it('should log recovery steps and rethrow', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const failure = new Error('disk full');

    expect(() =>
      withRecovery(
        () => {
          throw failure;
        },
        {
          situation: ['Linked ~/.zshrc'],
          consequence: ['State still records zshrc as staged'],
          instructions: ['Run `dotloop deploy zshrc` again'],
        }
      )
    ).toThrow(failure);

    expect(warn.mock.calls.map((c) => c[0])).toEqual([
      'Situation:',
      '  - Linked ~/.zshrc',
      '  - Update to state file failed: disk full',
      'Result:',
      '  - State still records zshrc as staged',
      'Instructions to fix:',
      '  - Run `dotloop deploy zshrc` again',
    ]);
  });
});
