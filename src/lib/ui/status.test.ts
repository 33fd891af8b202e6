import { describe, it, expect, vi, afterEach, beforeEach, type MockInstance } from 'vitest';
import {
  printStatus,
  printDim,
  printNextSteps,
  printSummaryBox,
} from './status.js';
import { setQuietMode } from './output.js';
import { setColorEnabled } from '../colors.js';
import { box } from './theme.js';

describe('ui/status', () => {
  let logSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    setQuietMode(false);
    vi.restoreAllMocks();
  });

  describe('printStatus', () => {
    it('prints success message with plain icon when colors are off', () => {
      printStatus('success', 'Generated 2 file(s)');
      expect(logSpy).toHaveBeenCalledWith('[OK] Generated 2 file(s)');
    });

    it('prints warning message', () => {
      printStatus('warning', 'Skipped zshrc');
      expect(logSpy).toHaveBeenCalledWith('[WARN] Skipped zshrc');
    });

    it('is silent in quiet mode', () => {
      setQuietMode(true);
      printStatus('info', 'hidden');
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('printDim', () => {
    it('prints indented text', () => {
      printDim('note', 2);
      expect(logSpy).toHaveBeenCalledWith('  note');
    });
  });

  describe('printNextSteps', () => {
    it('prints each command with its description', () => {
      printNextSteps([{ command: 'dotloop generate --all', description: 're-render' }]);
      expect(logSpy.mock.calls.map((c) => c[0])).toEqual([
        '  Next steps:',
        '    dotloop generate --all     # re-render',
      ]);
    });
  });

  describe('printSummaryBox', () => {
    it('aligns labels and draws borders', () => {
      printSummaryBox('Initialized', [
        { label: 'Dotfiles', value: '/tmp/d' },
        { label: 'Config', value: '/tmp/c.toml' },
      ]);
      const lines = logSpy.mock.calls.map((c) => c[0]);
      expect(lines[1]).toBe(box.horizontal.repeat(58));
      expect(lines[2]).toBe('  Initialized');
      expect(lines[5]).toBe('  Dotfiles    /tmp/d');
      expect(lines[6]).toBe('  Config      /tmp/c.toml');
      expect(lines).toHaveLength(8);
    });

    it('appends next steps after a blank line', () => {
      printSummaryBox('Initialized', [{ label: 'Config', value: '/tmp/c.toml' }], [
        { command: 'dotloop apply --all' },
      ]);
      const lines = logSpy.mock.calls.map((c) => c[0]);
      expect(lines.slice(5)).toEqual(['  Config    /tmp/c.toml', '', '  Next steps:', '    dotloop apply --all', '']);
    });
  });
});
