import { describe, it, expect } from 'vitest';
import { resolve, rankCandidates, similarity } from '../../../src/core/fuzzy.js';

describe('fuzzy', () => {
  describe('similarity', () => {
    it('is 1 for identical strings, including two empty ones', () => {
      expect(similarity('firefox', 'firefox')).toBe(1);
      expect(similarity('', '')).toBe(1);
    });

    it('is 0 when no character matches', () => {
      expect(similarity('abc', 'xyz')).toBe(0);
      expect(similarity('', 'abc')).toBe(0);
    });

    it('counts the longest block then recurses on both sides', () => {
      // one block "bcd": 2 * 3 / 8
      expect(similarity('abcd', 'bcde')).toBe(0.75);
      // "firefox" fully inside "firefox-esr": 2 * 7 / 18
      expect(similarity('firefox-esr', 'firefox')).toBeCloseTo(14 / 18, 10);
    });

    it('matches the classic sequence-matcher ratio on a transposition', () => {
      // blocks "r" then "o": 2 * 2 / 15
      expect(similarity('chromium', 'firefox')).toBeCloseTo(4 / 15, 10);
    });

    it('lets popular characters in long queries extend a block but not start one', () => {
      // every character is popular: the empty block at 0,0 grows by one
      expect(similarity('a', 'a'.repeat(200))).toBeCloseTo(2 / 201, 10);
      expect(similarity('b'.repeat(3), 'bbb')).toBe(1);
    });

    it('scores a long repetitive query against itself as 1', () => {
      const query = 'ab'.repeat(100);
      expect(similarity(query, query)).toBe(1);
      expect(resolve(query, [query])).toEqual([query]);
    });

    it('extends a seeded block over popular characters', () => {
      // "x" is the only non-popular character; the block grows to "axa"
      const query = `${'a'.repeat(150)}x${'a'.repeat(50)}`;
      expect(similarity('axa', query)).toBeCloseTo(6 / 204, 10);
    });
  });

  describe('resolve', () => {
    it('puts the exact name first, then closer names', () => {
      expect(resolve('firefox', ['firefox', 'firefox-esr', 'chromium'], 10, 0.3)).toEqual([
        'firefox',
        'firefox-esr',
      ]);
      expect(resolve('firefox', ['firefox', 'firefox-esr', 'chromium'], 10, 0.2)).toEqual([
        'firefox',
        'firefox-esr',
        'chromium',
      ]);
    });

    it('uses cutoff 0.3 and 10 results by default', () => {
      const names = Array.from({ length: 15 }, (_, i) => `pkg${i}`);
      expect(resolve('pkg', names)).toHaveLength(10);
      expect(resolve('firefox', ['chromium'])).toEqual([]);
    });

    it('de-duplicates candidates keeping the first occurrence', () => {
      expect(resolve('vim', ['vim', 'vim', 'gvim'])).toEqual(['vim', 'gvim']);
    });

    it('breaks ties by original candidate order', () => {
      // "vim" vs "vima" and "avim": both 6/7
      expect(resolve('vim', ['vima', 'avim'])).toEqual(['vima', 'avim']);
      expect(resolve('vim', ['avim', 'vima'])).toEqual(['avim', 'vima']);
    });

    it('truncates to maxResults and returns nothing for maxResults 0', () => {
      expect(resolve('vim', ['vim', 'gvim', 'neovim'], 2)).toEqual(['vim', 'gvim']);
      expect(resolve('vim', ['vim'], 0)).toEqual([]);
    });

    it('rejects a cutoff outside [0, 1]', () => {
      expect(() => resolve('vim', ['vim'], 10, 1.5)).toThrow(RangeError);
    });

    it('is deterministic', () => {
      const names = ['python', 'python2', 'python-pip', 'cython', 'pypy3'];
      expect(resolve('pyton', names)).toEqual(resolve('pyton', names));
    });
  });

  describe('rankCandidates', () => {
    it('returns scores at or above the cutoff in descending order', () => {
      const ranked = rankCandidates('neovim', ['vim', 'neovim-qt', 'neovim', 'bash'], 10, 0.3);
      expect(ranked.map((c) => c.name)).toEqual(['neovim', 'neovim-qt', 'vim']);
      for (const candidate of ranked) {
        expect(candidate.score).toBeGreaterThanOrEqual(0.3);
      }
      const scores = ranked.map((c) => c.score);
      expect([...scores].sort((a, b) => b - a)).toEqual(scores);
    });
  });
});
