import { describe, it, expect } from 'vitest';
import { computeHunks, splitLines } from './hunks.js';

describe('splitLines', () => {
  it('should keep trailing newlines', () => {
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n']);
  });

  it('should leave the last line bare without a final newline', () => {
    expect(splitLines('a\nb')).toEqual(['a\n', 'b']);
  });

  it('should handle empty text and blank lines', () => {
    expect(splitLines('')).toEqual([]);
    expect(splitLines('\n')).toEqual(['\n']);
    expect(splitLines('a\n\nb\n')).toEqual(['a\n', '\n', 'b\n']);
  });
});

describe('computeHunks', () => {
  it('should return nothing for equal content', () => {
    expect(computeHunks(['a\n', 'b\n'], ['a\n', 'b\n'])).toEqual([]);
  });

  it('should describe a replaced line with context', () => {
    const generated = ['a\n', 'b\n', 'c\n', 'd\n', 'e\n'];
    const staged = ['a\n', 'b\n', 'X\n', 'd\n', 'e\n'];

    expect(computeHunks(generated, staged)).toEqual([
      {
        oldStart: 2,
        oldLines: ['c\n'],
        newStart: 2,
        newLines: ['X\n'],
        contextBefore: ['a\n', 'b\n'],
        contextAfter: ['d\n', 'e\n'],
      },
    ]);
  });

  it('should describe an insertion', () => {
    expect(computeHunks(['a\n', 'b\n'], ['a\n', 'new\n', 'b\n'])).toEqual([
      {
        oldStart: 1,
        oldLines: [],
        newStart: 1,
        newLines: ['new\n'],
        contextBefore: ['a\n'],
        contextAfter: ['b\n'],
      },
    ]);
  });

  it('should describe a deletion at the end', () => {
    expect(computeHunks(['a\n', 'b\n'], ['a\n'])).toEqual([
      {
        oldStart: 1,
        oldLines: ['b\n'],
        newStart: 1,
        newLines: [],
        contextBefore: ['a\n'],
        contextAfter: [],
      },
    ]);
  });

  it('should split separate changes and limit context', () => {
    const hunks = computeHunks(
      ['a\n', 'b\n', 'c\n', 'd\n', 'e\n'],
      ['A\n', 'b\n', 'c\n', 'd\n', 'E\n'],
      1
    );

    expect(hunks.map((h) => [h.oldStart, h.oldLines, h.newLines])).toEqual([
      [0, ['a\n'], ['A\n']],
      [4, ['e\n'], ['E\n']],
    ]);
    expect(hunks[0].contextBefore).toEqual([]);
    expect(hunks[0].contextAfter).toEqual(['b\n']);
    expect(hunks[1].contextBefore).toEqual(['d\n']);
  });
});
