import { describe, it, expect } from 'vitest';
import { cosineSimilarity, rankBySimilarity } from '../src/vector/similarity.js';

describe('cosineSimilarity', () => {
  it('should score direction, not magnitude', () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBeCloseTo(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1);
  });

  it('should return 0 for zero vectors and mismatched lengths', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
  });
});

describe('cosineSimilarity with extreme values', () => {
  it('should not overflow on very large components', () => {
    expect(cosineSimilarity([1e200, 0], [1e200, 0])).toBe(1);
    expect(cosineSimilarity([1e200, 1e200], [1e-200, 1e-200])).toBeCloseTo(1);
    expect(cosineSimilarity([1e200, 0], [0, 1e200])).toBe(0);
  });

  it('should return 0 for non-finite components', () => {
    expect(cosineSimilarity([Number.POSITIVE_INFINITY, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([Number.NaN, 1], [1, 1])).toBe(0);
  });

  it('should rank large vectors by direction', () => {
    const ranked = rankBySimilarity([1e200, 0], [{ id: 's', vector: [0, 1] }, { id: 'b', vector: [1e200, 0] }], 2);
    expect(ranked.map(r => [r.item.id, r.score])).toEqual([['b', 1], ['s', 0]]);
  });
});

describe('rankBySimilarity', () => {
  const candidates = [
    { id: 'a', vector: [1, 0] },
    { id: 'b', vector: [0, 1] },
    { id: 'c', vector: [1, 0] },
  ];

  it('should order by descending score and keep ties in input order', () => {
    const ranked = rankBySimilarity([1, 0], candidates, 3);
    expect(ranked.map(r => r.item.id)).toEqual(['a', 'c', 'b']);
    expect(ranked.map(r => r.score)).toEqual([1, 1, 0]);
  });

  it('should keep at most limit results', () => {
    expect(rankBySimilarity([1, 0], candidates, 2).map(r => r.item.id)).toEqual(['a', 'c']);
    expect(rankBySimilarity([1, 0], candidates, 0)).toEqual([]);
    expect(rankBySimilarity([1, 0], candidates, -1)).toEqual([]);
  });
});
