import { describe, test, expect } from '@jest/globals';
import {
  compareScored,
  cosineSimilarity,
  innerProduct,
  similarityFunction,
} from '@/domains/rag/vectorstore/similarity.js';
import type { ScoredChunk } from '@/domains/rag/core/models.js';

function scored(documentId: string, index: number, score: number): ScoredChunk {
  return {
    score,
    chunk: {
      id: `${documentId}#${index}`,
      documentId,
      index,
      text: '',
      startOffset: 0,
      endOffset: 0,
      vector: [],
      embeddingModel: 'm',
    },
  };
}

describe('similarity', () => {
  test('cosine of parallel, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
  });

  test('cosine with a zero vector is 0', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  test('inner product is the plain dot product', () => {
    expect(innerProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(similarityFunction('inner_product')([2, 0], [3, 7])).toBe(6);
    expect(similarityFunction('cosine')).toBe(cosineSimilarity);
  });

  test('orders by score, then document id, then chunk index', () => {
    const items = [
      scored('b.md', 0, 0.5),
      scored('a.md', 2, 0.5),
      scored('c.md', 0, 0.9),
      scored('a.md', 1, 0.5),
    ];

    const ordered = [...items].sort(compareScored).map((item) => item.chunk.id);

    expect(ordered).toEqual(['c.md#0', 'a.md#1', 'a.md#2', 'b.md#0']);
  });
});
