import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { KnowledgeBase } from '../../src/services/knowledge-base.js';
import { roundScore } from '../../src/services/search.js';
import { Document } from '../../src/types/document.js';
import { ValidationError } from '../../src/utils/errors.js';
import { setSilent } from '../../src/utils/logger.js';
import { FakeEmbeddingProvider, StaticParser, createTestKnowledgeBase } from '../helpers/fakes.js';
import { POLICY_BYTES, POLICY_PARENT, POLICY_TABLE, policyBlocks } from '../helpers/fixtures.js';

/** Embeds normally until stalled, then never answers */
class StallingEmbeddingProvider extends FakeEmbeddingProvider {
  stalled = false;

  override async batchGenerateEmbeddings(texts: string[]): Promise<number[][]> {
    if (this.stalled) return new Promise<number[][]>(() => undefined);
    return super.batchGenerateEmbeddings(texts);
  }
}

describe('hybrid search', () => {
  let kb: KnowledgeBase;
  let document: Document;

  beforeEach(async () => {
    setSilent(true);
    ({ kb } = createTestKnowledgeBase({ parser: new StaticParser(policyBlocks()) }));
    document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(document.id);
  });

  afterEach(async () => {
    await kb.close();
    setSilent(false);
  });

  it('fuses exact, sparse and dense recall', async () => {
    const response = await kb.search({ collectionId: 'col-a', query: 'Northwind Logistics', enableRerank: false });

    expect(response.query).toBe('Northwind Logistics');
    expect(response.pathStats).toEqual({ exact: 1, sparse: 1, dense: 3, rrf_top: 3 });
    expect(response.total).toBe(3);

    const [top] = response.hits;
    expect(top?.content).toBe('Northwind Logistics ships parcels within three business days.');
    expect(top?.sources).toEqual(['exact', 'sparse', 'dense']);
    expect(top?.score).toBe(roundScore(3 / 61));
    expect(top?.rerankScore).toBeNull();
    expect(top?.pageNumbers).toEqual([0]);
    expect(top?.parentContent).toBe(POLICY_PARENT);
    expect(top?.documentId).toBe(document.id);
  });

  it('never returns parent chunks as hits', async () => {
    const response = await kb.search({ collectionId: 'col-a', query: 'Shipping Policy', enableRerank: false });
    expect(response.hits.every((hit) => hit.content !== POLICY_PARENT)).toBe(true);
  });

  it('restricts results to the requested chunk types', async () => {
    const response = await kb.search({
      collectionId: 'col-a',
      query: 'zone price',
      chunkTypes: ['TABLE'],
      enableRerank: false,
    });

    expect(response.hits).toHaveLength(1);
    expect(response.hits[0]?.chunkType).toBe('TABLE');
    expect(response.hits[0]?.content).toBe(POLICY_TABLE);
    expect(response.hits[0]?.pageNumbers).toEqual([1]);
    expect(response.hits[0]?.parentContent).toBe(POLICY_PARENT);
  });

  it('omits parent context when asked', async () => {
    const response = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      enableRerank: false,
      useParent: false,
    });
    expect(response.hits[0]?.parentContent).toBeNull();
  });

  it('caps results at topK', async () => {
    const response = await kb.search({ collectionId: 'col-a', query: 'Northwind Logistics', enableRerank: false, topK: 1 });
    expect(response.hits).toHaveLength(1);
    expect(response.pathStats.rrf_top).toBe(3);
  });

  it('returns nothing for an empty document selection', async () => {
    const response = await kb.search({ collectionId: 'col-a', query: 'Northwind Logistics', documentIds: [] });
    expect(response.hits).toEqual([]);
    expect(response.total).toBe(0);
  });

  it('scopes results to a collection', async () => {
    const response = await kb.search({ collectionId: 'col-other', query: 'Northwind Logistics', enableRerank: false });
    expect(response.hits).toEqual([]);
    expect(response.pathStats).toEqual({ exact: 0, sparse: 0, dense: 0, rrf_top: 0 });
  });

  it('scopes results to selected documents', async () => {
    const other = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      documentIds: ['another-document'],
      enableRerank: false,
    });
    const own = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      documentIds: [document.id],
      enableRerank: false,
    });

    expect(other.hits).toEqual([]);
    expect(own.total).toBe(3);
  });

  it('reranks by embedding similarity without a cross-encoder', async () => {
    const response = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      fallbackCosineThreshold: 0.3,
    });

    expect(response.hits[0]?.content).toBe('Northwind Logistics ships parcels within three business days.');
    expect(response.hits[0]?.rerankScore).toBeGreaterThanOrEqual(0.3);
    expect(response.hits[0]?.score).toBe(response.hits[0]?.rerankScore);
    expect(response.pathStats.rerank_top).toBe(response.hits.length);
  });

  it('drops everything below the rerank threshold', async () => {
    const response = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      fallbackCosineThreshold: 0.9999,
    });
    expect(response.hits).toEqual([]);
    expect(response.pathStats.rerank_top).toBe(0);
  });

  it('uses the cross-encoder when one is configured', async () => {
    await kb.close();
    ({ kb } = createTestKnowledgeBase(
      { parser: new StaticParser(policyBlocks()) },
      { reranker: { url: 'http://rerank.local/v1/rerank', apiKey: 'test-secret' } }
    ));
    document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(document.id);

    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      const body: unknown = JSON.parse(String(init?.body));
      const count = typeof body === 'object' && body !== null && 'documents' in body && Array.isArray(body.documents)
        ? body.documents.length
        : 0;
      return new Response(
        JSON.stringify({
          results: Array.from({ length: count }, (_, index) => ({ index, relevance_score: index === count - 1 ? 0.95 : 0.05 })),
        }),
        { status: 200, headers: { 'Content-Type': 'application/json' } }
      );
    });
    vi.stubGlobal('fetch', fetchMock);
    try {
      const response = await kb.search({ collectionId: 'col-a', query: 'Northwind Logistics' });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(response.hits).toHaveLength(1);
      expect(response.hits[0]?.rerankScore).toBe(0.95);
      expect(response.hits[0]?.score).toBe(0.95);
    } finally {
      vi.unstubAllGlobals();
    }
  });

  it('rejects invalid requests', async () => {
    await expect(kb.search({ collectionId: 'col-a', query: '   ' })).rejects.toBeInstanceOf(ValidationError);
    await expect(kb.search({ collectionId: '', query: 'rates' })).rejects.toBeInstanceOf(ValidationError);
    await expect(kb.search({ collectionId: 'col-a', query: 'rates', topK: 0 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('search deadlines', () => {
  let kb: KnowledgeBase;
  let embedding: StallingEmbeddingProvider;

  beforeEach(async () => {
    setSilent(true);
    embedding = new StallingEmbeddingProvider();
    ({ kb } = createTestKnowledgeBase({ parser: new StaticParser(policyBlocks()), embedding }));
    const document = await kb.upload('col-a', 'policy.pdf', POLICY_BYTES);
    await kb.processNow(document.id);
    embedding.stalled = true;
  });

  afterEach(async () => {
    await kb.close();
    setSilent(false);
  });

  it('drops a recall path that misses the deadline and keeps the others', async () => {
    const response = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      enableRerank: false,
      timeoutMs: 50,
    });

    expect(response.pathStats).toEqual({ exact: 1, sparse: 1, dense: 0, rrf_top: 1 });
    expect(response.hits).toHaveLength(1);
    expect(response.hits[0]?.content).toBe('Northwind Logistics ships parcels within three business days.');
    expect(response.hits[0]?.sources).toEqual(['exact', 'sparse']);
  });

  it('returns nothing when the caller has already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const response = await kb.search({
      collectionId: 'col-a',
      query: 'Northwind Logistics',
      enableRerank: false,
      signal: controller.signal,
    });

    expect(response.hits).toEqual([]);
    expect(response.pathStats).toEqual({ exact: 0, sparse: 0, dense: 0, rrf_top: 0 });
  });
});
