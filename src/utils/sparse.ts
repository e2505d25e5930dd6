import crypto from 'crypto';
import { SparseVector } from '../types/provider.js';

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;
const MAX_TERMS = 256;
const MIN_WEIGHT = 1e-6;
const EMPTY_TERM = '__empty__';
const EMPTY_WEIGHT = 0.01;

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []);
}

/**
 * Stable 32-bit term id: first 8 hex chars of md5(term)
 */
export function termId(term: string): number {
  return parseInt(crypto.createHash('md5').update(term).digest('hex').slice(0, 8), 16);
}

/**
 * TF-IDF vectors computed over the given batch of texts
 */
export function tfidfVectors(texts: string[]): SparseVector[] {
  const tokenized = texts.map(tokenize);
  const documentFrequency = new Map<string, number>();

  for (const tokens of tokenized) {
    for (const term of new Set(tokens)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const total = texts.length;
  return tokenized.map((tokens) => {
    if (tokens.length === 0) {
      return emptyVector();
    }

    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const weighted: Array<[number, number]> = [];
    for (const [term, count] of counts) {
      const tf = count / tokens.length;
      const idf = Math.log((total + 1) / ((documentFrequency.get(term) ?? 0) + 1)) + 1;
      const weight = tf * idf;
      if (weight > MIN_WEIGHT) {
        weighted.push([termId(term), Math.round(weight * 1e6) / 1e6]);
      }
    }

    weighted.sort((a, b) => b[1] - a[1]);
    const vector: SparseVector = new Map();
    for (const [id, weight] of weighted.slice(0, MAX_TERMS)) {
      // md5 prefix collisions fold into one dimension
      vector.set(id, (vector.get(id) ?? 0) + weight);
    }
    return vector.size > 0 ? vector : emptyVector();
  });
}

export function emptyVector(): SparseVector {
  return new Map([[termId(EMPTY_TERM), EMPTY_WEIGHT]]);
}

export function sparseDot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [id, weight] of small) {
    const other = large.get(id);
    if (other !== undefined) sum += weight * other;
  }
  return sum;
}

export function sparseToJson(vector: SparseVector): string {
  return JSON.stringify(Object.fromEntries(vector));
}

export function sparseFromJson(json: string): SparseVector {
  const parsed: unknown = JSON.parse(json);
  const vector: SparseVector = new Map();
  if (typeof parsed !== 'object' || parsed === null) return vector;
  for (const [key, value] of Object.entries(parsed)) {
    const id = Number(key);
    if (Number.isFinite(id) && typeof value === 'number') {
      vector.set(id, value);
    }
  }
  return vector;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
