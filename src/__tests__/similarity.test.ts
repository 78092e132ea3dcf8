import { describe, it, expect } from '@jest/globals';
import { levenshteinRatio, nameSimilarity, sizeCloseness, tokenOverlap } from '../matching/similarity.js';

describe('levenshteinRatio', () => {
  it('should be 1 for identical strings and 0 for an empty side', () => {
    expect(levenshteinRatio('marina', 'marina')).toBe(1);
    expect(levenshteinRatio('', 'marina')).toBe(0);
  });

  it('should scale edit distance by the longer string', () => {
    expect(levenshteinRatio('kitten', 'sitting')).toBeCloseTo(4 / 7, 10);
  });
});

describe('tokenOverlap', () => {
  it('should compute the dice coefficient over distinct tokens', () => {
    expect(tokenOverlap(['a', 'b'], ['b', 'c'])).toBe(0.5);
    expect(tokenOverlap(['a', 'a'], ['a'])).toBe(1);
    expect(tokenOverlap([], ['a'])).toBe(0);
  });
});

describe('nameSimilarity', () => {
  it('should ignore word order', () => {
    expect(nameSimilarity(['marina', 'heights'], ['heights', 'marina'])).toBe(1);
  });

  it('should be 0 when either side is empty', () => {
    expect(nameSimilarity([], ['marina'])).toBe(0);
  });
});

describe('sizeCloseness', () => {
  it('should be 1 within tolerance', () => {
    expect(sizeCloseness(1000, 1100, 0.15, 0.15)).toBe(1);
  });

  it('should decay linearly past tolerance', () => {
    expect(sizeCloseness(1000, 1225, 0.15, 0.15)).toBeCloseTo(0.5, 10);
    expect(sizeCloseness(1000, 1400, 0.15, 0.15)).toBe(0);
  });

  it('should be 0 for non-positive sizes', () => {
    expect(sizeCloseness(0, 100, 0.15, 0.15)).toBe(0);
  });
});
