import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  emptyVector,
  sparseDot,
  sparseFromJson,
  sparseToJson,
  termId,
  tfidfVectors,
  tokenize,
} from '../../src/utils/sparse.js';

describe('sparse vectors', () => {
  it('tokenizes on letters and digits, lowercased', () => {
    expect(tokenize('Invoice #42, Northwind-Logistics!')).toEqual(['invoice', '42', 'northwind', 'logistics']);
    expect(tokenize('   ')).toEqual([]);
  });

  it('derives stable 32-bit term ids', () => {
    expect(termId('invoice')).toBe(termId('invoice'));
    expect(termId('invoice')).not.toBe(termId('receipt'));
    expect(termId('invoice')).toBeLessThanOrEqual(0xffffffff);
  });

  it('weights rarer terms higher', () => {
    const [first, second] = tfidfVectors(['apple banana', 'apple']);

    expect(first?.size).toBe(2);
    const apple = first?.get(termId('apple')) ?? 0;
    const banana = first?.get(termId('banana')) ?? 0;
    expect(apple).toBeCloseTo(0.5, 6);
    expect(banana).toBeCloseTo(0.5 * (Math.log(3 / 2) + 1), 5);
    expect(second?.get(termId('apple'))).toBeCloseTo(1, 6);
  });

  it('gives texts without tokens the placeholder vector', () => {
    const [vector] = tfidfVectors(['!!!']);
    expect(vector).toEqual(emptyVector());
    expect(emptyVector().size).toBe(1);
  });

  it('computes dot products over shared ids only', () => {
    const a = new Map([[1, 0.5], [2, 2]]);
    const b = new Map([[2, 3], [7, 10]]);
    expect(sparseDot(a, b)).toBe(6);
    expect(sparseDot(a, new Map())).toBe(0);
  });

  it('serializes to a JSON object keyed by term id', () => {
    const vector = new Map([[12, 0.25], [3456, 1.5]]);
    const json = sparseToJson(vector);
    expect(json).toBe('{"12":0.25,"3456":1.5}');
    expect(sparseFromJson(json)).toEqual(vector);
    expect(sparseFromJson('null').size).toBe(0);
  });

  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});
