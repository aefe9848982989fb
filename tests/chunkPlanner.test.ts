import { describe, it, expect } from '@jest/globals';
import {
  chunkCoverage,
  chunkCutoff,
  splitWords,
  takeChunk,
} from '../src/extraction/chunkPlanner';

describe('chunkCutoff', () => {
  it('grows by chunkStep per step', () => {
    expect(chunkCutoff(1, 10000, 300)).toBe(300);
    expect(chunkCutoff(5, 10000, 300)).toBe(1500);
    expect(chunkCutoff(20, 10000, 300)).toBe(6000);
  });

  it('saturates at the total word count', () => {
    expect(chunkCutoff(1, 50, 300)).toBe(50);
    expect(chunkCutoff(7, 50, 300)).toBe(50);
    expect(chunkCutoff(3, 0, 300)).toBe(0);
  });

  it('is non-decreasing and bounded', () => {
    for (const totalWords of [0, 1, 299, 300, 301, 4321]) {
      let previous = 0;
      for (let step = 1; step <= 25; step++) {
        const cutoff = chunkCutoff(step, totalWords, 300);
        expect(cutoff).toBeGreaterThanOrEqual(previous);
        expect(cutoff).toBeLessThanOrEqual(totalWords);
        previous = cutoff;
      }
    }
  });

  it('rejects invalid arguments', () => {
    expect(() => chunkCutoff(0, 100, 300)).toThrow(RangeError);
    expect(() => chunkCutoff(1, -1, 300)).toThrow(RangeError);
    expect(() => chunkCutoff(1, 100, 0)).toThrow(RangeError);
    expect(() => chunkCutoff(1.5, 100, 300)).toThrow(RangeError);
  });
});

describe('splitWords / takeChunk', () => {
  it('splits on any whitespace and drops empties', () => {
    expect(splitWords('  Deep\tlearning\n\nfor  cattle ')).toEqual(['Deep', 'learning', 'for', 'cattle']);
    expect(splitWords('   ')).toEqual([]);
  });

  it('joins the leading words with single spaces', () => {
    const words = splitWords('a b\nc   d e');
    expect(takeChunk(words, 3)).toBe('a b c');
    expect(takeChunk(words, 10)).toBe('a b c d e');
    expect(takeChunk(words, 0)).toBe('');
  });
});

describe('chunkCoverage', () => {
  it('flags documents whose tail is never read', () => {
    expect(chunkCoverage(10000, 300, 20)).toEqual({ maxWords: 6000, truncated: true });
    expect(chunkCoverage(6000, 300, 20)).toEqual({ maxWords: 6000, truncated: false });
    expect(chunkCoverage(50, 300, 20)).toEqual({ maxWords: 50, truncated: false });
  });
});
