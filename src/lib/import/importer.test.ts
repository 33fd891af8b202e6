import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { runImport, walkFiles } from './importer.js';
import { loadConfig } from '../config.js';
import { isManagedSymlink } from '../publisher.js';
import { DotfilesFixture, snapshotTree } from '../../test-helpers/dotfiles-fixture.js';

describe('runImport', () => {
  let fx: DotfilesFixture;

  beforeEach(() => {
    fx = new DotfilesFixture();
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should import a single file and replace it with a link', async () => {
    const original = path.join(fx.home, '.zshrc');
    fx.write(original, 'export EDITOR=vi\n', 0o600);

    const result = await runImport(fx.context(), '~/.zshrc', { all: false });

    expect(result.outcomes).toEqual([{ src: 'zshrc', result: 'changed' }]);
    expect(fx.read(path.join(fx.root, 'zshrc'))).toBe('export EDITOR=vi\n');
    expect(fs.statSync(path.join(fx.root, 'zshrc')).mode & 0o777).toBe(0o600);
    expect(isManagedSymlink(original, fx.paths('zshrc').staged)).toBe(true);
    expect(fx.read(original)).toBe('export EDITOR=vi\n');

    const files = loadConfig(fx.configPath).config.files;
    expect(files).toEqual([
      { src: 'zshrc', target: '~/.zshrc', template: true, vars: [], secrets: [] },
    ]);
  });

  it('should map files under ~/.config to the default target', async () => {
    fx.write(fx.defaultTarget('kitty/kitty.conf'), 'font_size 12\n');

    const result = await runImport(fx.context(), fx.defaultTarget('kitty/kitty.conf'), { all: false });

    expect(result.outcomes[0].src).toBe('kitty/kitty.conf');
    expect(loadConfig(fx.configPath).config.files[0].target).toBeUndefined();
  });

  it('should skip a file that is already managed', async () => {
    fx.write(path.join(fx.home, '.zshrc'), 'x\n');
    await runImport(fx.context(), '~/.zshrc', { all: false });

    const result = await runImport(fx.context(), '~/.zshrc', { all: false });

    expect(result.outcomes).toEqual([{ src: '~/.zshrc', result: 'skipped', message: 'already managed' }]);
  });

  it('should fail for a missing path', async () => {
    await expect(runImport(fx.context(), '~/.nothing', { all: false })).rejects.toThrow(
      `Path not found: ${path.join(fx.home, '.nothing')}`
    );
  });

  it('should fail a file whose source already exists', async () => {
    fx.write(path.join(fx.home, '.zshrc'), 'x\n');
    fx.writeSource('zshrc', 'already here\n');

    const result = await runImport(fx.context(), '~/.zshrc', { all: false });

    expect(result.outcomes[0]).toMatchObject({
      src: '~/.zshrc',
      result: 'failed',
      message: `Destination already exists: ${path.join(fx.root, 'zshrc')}`,
    });
    expect(fs.lstatSync(path.join(fx.home, '.zshrc')).isSymbolicLink()).toBe(false);
  });

  describe('directories', () => {
    let dir: string;

    beforeEach(() => {
      dir = path.join(fx.home, '.config', 'app');
      fx.write(path.join(dir, 'a.conf'), 'a\n');
      fx.write(path.join(dir, 'b.conf'), 'b\n');
      fx.write(path.join(dir, 'nested', 'c.conf'), 'c\n');
    });

    it('should import every file with --all', async () => {
      const result = await runImport(fx.context(), dir, { all: true });

      expect(result.outcomes.map((o) => o.src)).toEqual(['app/a.conf', 'app/b.conf', 'app/nested/c.conf']);
      expect(fx.prompter.asked).toEqual([]);
    });

    it('should ask about each file otherwise', async () => {
      fx.prompter.importAnswers.push('import', 'ignore', 'skip');
      const ctx = fx.context();

      const result = await runImport(ctx, dir, { all: false });

      expect(fx.prompter.asked).toEqual([
        'import ~/.config/app/a.conf',
        'import ~/.config/app/b.conf',
        'import ~/.config/app/nested/c.conf',
      ]);
      expect(result.outcomes.map((o) => o.src)).toEqual(['app/a.conf']);
      expect(result.ignored).toEqual(['~/.config/app/b.conf']);
      expect(ctx.store.isIgnored('~/.config/app/b.conf')).toBe(true);
    });

    it('should not ask again about ignored files', async () => {
      fx.prompter.importAnswers.push('skip', 'ignore', 'skip');
      await runImport(fx.context(), dir, { all: false });
      fx.prompter.asked = [];

      await runImport(fx.context(), dir, { all: false });

      expect(fx.prompter.asked).toEqual(['import ~/.config/app/a.conf', 'import ~/.config/app/nested/c.conf']);
    });

    it('should respect the depth limit', async () => {
      const result = await runImport(fx.context(), dir, { all: true, maxDepth: 1 });
      expect(result.outcomes.map((o) => o.src)).toEqual(['app/a.conf', 'app/b.conf']);
    });

    it('should change nothing in dry-run mode', async () => {
      const before = snapshotTree(fx.tempDir);

      const result = await runImport(fx.context({ dryRun: true }), dir, { all: true });

      expect(result.outcomes.map((o) => o.result)).toEqual(['changed', 'changed', 'changed']);
      expect(snapshotTree(fx.tempDir)).toEqual(before);
    });
  });
});

describe('walkFiles', () => {
  let fx: DotfilesFixture;

  beforeEach(() => {
    fx = new DotfilesFixture();
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should list files sorted by name, depth first', () => {
    const dir = path.join(fx.tempDir, 'tree');
    fx.write(path.join(dir, 'z'), '');
    fx.write(path.join(dir, 'a', 'b', 'c'), '');

    expect(walkFiles(dir, 10)).toEqual([path.join(dir, 'a', 'b', 'c'), path.join(dir, 'z')]);
    expect(walkFiles(dir, 2)).toEqual([path.join(dir, 'z')]);
  });
});
