import { describe, it, expect } from 'vitest';
import { fuzzyScore, suggest, suggestAll } from './suggest.js';

describe('fuzzyScore', () => {
  it('should score prefix matches above other substrings', () => {
    expect(fuzzyScore('kitty', 'kitty/kitty.conf')).toBe(1100);
    expect(fuzzyScore('conf', 'kitty/kitty.conf')).toBe(1000 - 12);
  });

  it('should return -1 when characters are out of order', () => {
    expect(fuzzyScore('ab', 'ba')).toBe(-1);
  });

  it('should return -1 for empty or over-long patterns', () => {
    expect(fuzzyScore('', 'abc')).toBe(-1);
    expect(fuzzyScore('abcd', 'abc')).toBe(-1);
  });

  it('should be case-insensitive', () => {
    expect(fuzzyScore('KITTY', 'kitty')).toBe(1100);
  });

  it('should give a positive score to in-order subsequences', () => {
    expect(fuzzyScore('kc', 'kitty.conf')).toBeGreaterThan(0);
  });
});

describe('suggest', () => {
  const candidates = ['kitty/kitty.conf', 'zsh/.zshrc', 'git/config'];

  it('should find a mistyped path', () => {
    expect(suggest('kity/kitty.conf', candidates)).toBe('kitty/kitty.conf');
  });

  it('should find a candidate contained in an over-long guess', () => {
    expect(suggest('git/config.bak', candidates)).toBe('git/config');
  });

  it('should return undefined when nothing is close', () => {
    expect(suggest('xyzzy', candidates)).toBeUndefined();
  });

  it('should not suggest the input itself', () => {
    expect(suggest('git/config', ['git/config'])).toBeUndefined();
  });
});

describe('suggestAll', () => {
  it('should deduplicate suggestions in input order', () => {
    expect(suggestAll(['zshrc', 'kity', 'zsh/.zshr'], ['kitty/kitty.conf', 'zsh/.zshrc'])).toEqual([
      'zsh/.zshrc',
      'kitty/kitty.conf',
    ]);
  });
});
