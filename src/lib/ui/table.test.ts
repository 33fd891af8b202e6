import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { printTable, columnWidths } from './table.js';
import { setQuietMode } from './output.js';
import { setColorEnabled } from '../colors.js';

describe('ui/table', () => {
  let logSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    setQuietMode(false);
    vi.restoreAllMocks();
  });

  describe('columnWidths', () => {
    it('returns the longest cell per column', () => {
      expect(
        columnWidths([
          ['a', 'bbb', 'c'],
          ['dddd', 'e'],
        ])
      ).toEqual([4, 3, 1]);
    });
  });

  describe('printTable', () => {
    it('prints nothing for empty rows', () => {
      printTable({ rows: [] });
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('pads every column except the last', () => {
      printTable({
        rows: [
          ['kitty/kitty.conf', 'deployed', '(up to date)'],
          ['zshrc', 'undeployed', '(not yet staged)'],
        ],
      });
      expect(logSpy.mock.calls.map((c) => c[0])).toEqual([
        '  kitty/kitty.conf  deployed    (up to date)',
        '  zshrc             undeployed  (not yet staged)',
      ]);
    });

    it('prints title and summary around the rows', () => {
      printTable({ title: 'Files', rows: [['a']], summary: '1 file' });
      expect(logSpy.mock.calls.map((c) => c[0])).toEqual(['', 'Files', '  a', '', '1 file']);
    });

    it('applies column styles after padding', () => {
      printTable({
        rows: [['x', 'y']],
        styles: [(t) => `[${t}]`],
      });
      expect(logSpy).toHaveBeenCalledWith('  [x]  y');
    });

    it('is silent in quiet mode', () => {
      setQuietMode(true);
      printTable({ rows: [['a']] });
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
