import { describe, it, expect } from 'vitest';
import { cosineSimilarity, topK } from '@/utils/vector';

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('should return 0 for zero, empty or mismatched vectors', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [1, 2])).toBe(0);
  });
});

describe('topK', () => {
  const scored = [
    { item: 'a', score: 0.2, order: 0 },
    { item: 'b', score: 0.9, order: 1 },
    { item: 'c', score: 0.2, order: 2 },
    { item: 'd', score: 0.5, order: 3 },
  ];

  it('should keep the k highest scores, ties in source order', () => {
    expect(topK(scored, 3).map((s) => s.item)).toEqual(['b', 'd', 'a']);
    expect(topK(scored, 10).map((s) => s.item)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('should not reorder its input', () => {
    topK(scored, 2);
    expect(scored.map((s) => s.item)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should return nothing for k <= 0', () => {
    expect(topK(scored, 0)).toEqual([]);
  });
});
