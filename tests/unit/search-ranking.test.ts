import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rrfFuse, roundScore } from '../../src/services/search.js';
import { Reranker, RerankCandidate, selectTop } from '../../src/services/reranker.js';
import { EmbeddingService } from '../../src/services/embedding.js';
import { EmbeddingProvider } from '../../src/types/provider.js';
import { RecallCandidate, RecallSource } from '../../src/types/search.js';
import { setSilent } from '../../src/utils/logger.js';

function list(source: RecallSource, ids: string[]): RecallCandidate[] {
  return ids.map((chunkId, rank) => ({ chunkId, score: 1 - rank * 0.1, source }));
}

/** Maps the query to [1, 0] and everything else to [0, 1] */
class AxisProvider implements EmbeddingProvider {
  name = 'axis';
  dimension = 2;
  embedded: string[] = [];

  async batchGenerateEmbeddings(texts: string[]): Promise<number[][]> {
    this.embedded.push(...texts);
    return texts.map((text) => (text === 'shipping rates' ? [1, 0] : [0, 1]));
  }
}

describe('rrfFuse', () => {
  it('sums reciprocal ranks across recall paths', () => {
    const fused = rrfFuse([list('exact', ['a', 'b']), list('sparse', ['b', 'c']), list('dense', ['c', 'b', 'a'])]);

    expect(fused.map((candidate) => candidate.chunkId)).toEqual(['b', 'c', 'a']);
    expect(fused[0]?.score).toBeCloseTo(1 / 61 + 2 / 62, 12);
    expect(fused[0]?.sources).toEqual(['exact', 'sparse', 'dense']);
    expect(fused[1]?.sources).toEqual(['sparse', 'dense']);
    expect(fused[2]?.sources).toEqual(['exact', 'dense']);
  });

  it('uses the given k', () => {
    const [only] = rrfFuse([list('dense', ['a'])], 10);
    expect(only?.score).toBeCloseTo(1 / 11, 12);
  });

  it('returns nothing for empty lists', () => {
    expect(rrfFuse([[], []])).toEqual([]);
  });

  it('rounds scores to six decimals', () => {
    expect(roundScore(0.1234567)).toBe(0.123457);
  });
});

describe('selectTop', () => {
  it('keeps scores at or above the threshold, best first', () => {
    const scores = [
      { chunkId: 'a', score: 0.2 },
      { chunkId: 'b', score: 0.9 },
      { chunkId: 'c', score: 0.1 },
      { chunkId: 'd', score: 0.5 },
    ];
    expect(selectTop(scores, 0.2, 2)).toEqual([
      { chunkId: 'b', score: 0.9 },
      { chunkId: 'd', score: 0.5 },
    ]);
    expect(selectTop(scores, 0.95, 5)).toEqual([]);
  });
});

describe('Reranker', () => {
  const candidates: RerankCandidate[] = [
    { chunkId: 'c1', content: 'stored one', chunkType: 'TEXT', dense: [1, 0] },
    { chunkId: 'c2', content: 'stored two', chunkType: 'TABLE', dense: [0.6, 0.8] },
    { chunkId: 'c3', content: 'needs embedding', chunkType: 'TEXT', dense: null },
  ];
  const params = { topK: 5, threshold: 0.2, fallbackThreshold: 0.5 };

  let provider: AxisProvider;
  let embeddings: EmbeddingService;

  beforeEach(() => {
    setSilent(true);
    provider = new AxisProvider();
    embeddings = new EmbeddingService(provider);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    setSilent(false);
  });

  it('scores by cosine similarity when no cross-encoder is configured', async () => {
    const reranker = new Reranker({ url: 'http://rerank.local', model: 'test-model', timeoutMs: 1000 }, embeddings);

    const outcome = await reranker.rerank('shipping rates', candidates, params);

    expect(outcome.method).toBe('cosine');
    expect(outcome.scores.map((score) => score.chunkId)).toEqual(['c1', 'c2']);
    expect(outcome.scores[1]?.score).toBeCloseTo(0.6, 10);
    expect(provider.embedded).toEqual(['shipping rates', 'needs embedding']);
  });

  it('calls the cross-encoder and maps results back to candidates', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(
        JSON.stringify({ results: [{ index: 1, relevance_score: 0.9 }, { index: 0, relevance_score: 0.1 }] }),
        { status: 200, headers: { 'Content-Type': 'application/json' } }
      )
    );
    vi.stubGlobal('fetch', fetchMock);
    const reranker = new Reranker(
      { url: 'http://rerank.local/v1/rerank', apiKey: 'test-secret', model: 'test-model', timeoutMs: 1000 },
      embeddings
    );

    const outcome = await reranker.rerank('shipping rates', candidates, params);

    expect(outcome).toEqual({ method: 'cross-encoder', scores: [{ chunkId: 'c2', score: 0.9 }] });
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://rerank.local/v1/rerank');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      query: 'shipping rates',
      documents: ['stored one', 'stored two', 'needs embedding'],
      top_n: 3,
      return_documents: false,
    });
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('falls back to cosine similarity when the cross-encoder fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('unavailable', { status: 503 })));
    const reranker = new Reranker(
      { url: 'http://rerank.local/v1/rerank', apiKey: 'test-secret', model: 'test-model', timeoutMs: 1000 },
      embeddings
    );

    const outcome = await reranker.rerank('shipping rates', candidates, params);

    expect(outcome.method).toBe('cosine');
    expect(outcome.scores.map((score) => score.chunkId)).toEqual(['c1', 'c2']);
  });

  it('returns no scores for no candidates', async () => {
    const reranker = new Reranker({ url: 'http://rerank.local', model: 'test-model', timeoutMs: 1000 }, embeddings);
    expect(await reranker.rerank('shipping rates', [], params)).toEqual({ method: 'cosine', scores: [] });
  });
});
