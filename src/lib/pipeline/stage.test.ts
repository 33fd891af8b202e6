import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { runGenerate } from './generate.js';
import { DRIFT_SKIP_MESSAGE, runStage } from './stage.js';
import { sha256 } from './files.js';
import { DotfilesFixture } from '../../test-helpers/dotfiles-fixture.js';

describe('runStage', () => {
  let fx: DotfilesFixture;

  beforeEach(async () => {
    fx = new DotfilesFixture();
    fx.addFile({ src: 'kitty/kitty.conf' }, 'font_size 12\n', 0o640);
    await runGenerate(fx.context(), fx.entries());
  });

  afterEach(() => {
    fx.cleanup();
  });

  it('should copy generated output into the staging area', async () => {
    const ctx = fx.context();

    const outcomes = await runStage(ctx, fx.entries());

    const staged = fx.paths('kitty/kitty.conf').staged;
    expect(outcomes).toEqual([{ src: 'kitty/kitty.conf', result: 'changed' }]);
    expect(fx.read(staged)).toBe('font_size 12\n');
    expect(fs.statSync(staged).mode & 0o777).toBe(0o640);
    expect(ctx.store.get('kitty/kitty.conf')).toEqual({
      status: 'staged',
      drift: false,
      stagedDigest: sha256('font_size 12\n'),
      extra: {},
    });
  });

  it('should report unchanged when the staged copy matches', async () => {
    await runStage(fx.context(), fx.entries());

    const outcomes = await runStage(fx.context(), fx.entries());

    expect(outcomes).toEqual([{ src: 'kitty/kitty.conf', result: 'unchanged' }]);
  });

  it('should fail when nothing was generated', async () => {
    fx.addFile({ src: 'new.conf' }, 'x\n');

    const outcomes = await runStage(fx.context(), fx.entries());

    expect(outcomes[1]).toMatchObject({
      src: 'new.conf',
      result: 'failed',
      message: `Generated file not found: ${fx.paths('new.conf').generated} (run \`generate\` first)`,
    });
  });

  describe('drift', () => {
    beforeEach(async () => {
      await runStage(fx.context(), fx.entries());
      fx.write(fx.paths('kitty/kitty.conf').staged, 'font_size 14\n');
      fx.writeSource('kitty/kitty.conf', 'font_size 13\n');
      await runGenerate(fx.context(), fx.entries());
    });

    it('should skip a drifted copy unless confirmed', async () => {
      const ctx = fx.context();

      const outcomes = await runStage(ctx, fx.entries());

      expect(outcomes).toEqual([
        { src: 'kitty/kitty.conf', result: 'skipped', message: DRIFT_SKIP_MESSAGE },
      ]);
      expect(fx.read(fx.paths('kitty/kitty.conf').staged)).toBe('font_size 14\n');
      expect(ctx.store.get('kitty/kitty.conf').drift).toBe(true);
      expect(fx.prompter.asked).toEqual(['overwrite kitty/kitty.conf']);
    });

    it('should overwrite a drifted copy once confirmed', async () => {
      fx.prompter.overwriteAnswers.push(true);
      const ctx = fx.context();

      const outcomes = await runStage(ctx, fx.entries());

      expect(outcomes[0].result).toBe('changed');
      expect(fx.read(fx.paths('kitty/kitty.conf').staged)).toBe('font_size 13\n');
      expect(ctx.store.get('kitty/kitty.conf').drift).toBe(false);
      expect(ctx.store.get('kitty/kitty.conf').stagedDigest).toBe(sha256('font_size 13\n'));
    });

    it('should describe the overwrite without asking in dry-run mode', async () => {
      const before = fx.read(fx.loaded.layout.statePath);

      const outcomes = await runStage(fx.context({ dryRun: true }), fx.entries());

      expect(outcomes).toEqual([{ src: 'kitty/kitty.conf', result: 'changed' }]);
      expect(fx.prompter.asked).toEqual([]);
      expect(fx.read(fx.paths('kitty/kitty.conf').staged)).toBe('font_size 14\n');
      expect(fx.read(fx.loaded.layout.statePath)).toBe(before);
    });
  });
});
