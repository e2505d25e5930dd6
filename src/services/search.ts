import { ChunkRepository } from './chunk-repository.js';
import { VectorStore } from './vector-store.js';
import { EmbeddingService } from './embedding.js';
import { RerankCandidate, Reranker } from './reranker.js';
import { RetrievalConfig } from '../types/config.js';
import { Chunk } from '../types/document.js';
import {
  FusedCandidate,
  PathStats,
  RecallCandidate,
  RecallFilter,
  RecallSource,
  SearchHit,
  SearchRequest,
  SearchResponse,
} from '../types/search.js';
import { ValidationError, describeError } from '../utils/errors.js';
import { withTimeout } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

const SOURCE_ORDER: readonly RecallSource[] = ['exact', 'sparse', 'dense'];

const logger = createLogger('search');

/**
 * Reciprocal rank fusion: each list contributes 1 / (k + rank + 1) per candidate
 */
export function rrfFuse(lists: RecallCandidate[][], k = 60): FusedCandidate[] {
  const fused = new Map<string, { score: number; sources: Set<RecallSource> }>();

  for (const list of lists) {
    list.forEach((candidate, rank) => {
      const entry = fused.get(candidate.chunkId) ?? { score: 0, sources: new Set<RecallSource>() };
      entry.score += 1 / (k + rank + 1);
      entry.sources.add(candidate.source);
      fused.set(candidate.chunkId, entry);
    });
  }

  return [...fused.entries()]
    .map(([chunkId, entry]) => ({
      chunkId,
      score: entry.score,
      sources: SOURCE_ORDER.filter((source) => entry.sources.has(source)),
    }))
    .sort((a, b) => b.score - a.score);
}

export function roundScore(score: number): number {
  return Math.round(score * 1e6) / 1e6;
}

function abortable<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return operation();
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    operation().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function emptyResponse(query: string, startTime: number, pathStats: PathStats = {}): SearchResponse {
  return { query, hits: [], total: 0, pathStats, processingTimeMs: Date.now() - startTime };
}

/**
 * Hybrid retrieval: exact, sparse and dense recall fused by RRF, then reranked
 */
export class SearchService {
  constructor(
    private chunks: ChunkRepository,
    private vectors: VectorStore,
    private embeddings: EmbeddingService,
    private reranker: Reranker,
    private config: RetrievalConfig
  ) {}

  async search(request: SearchRequest): Promise<SearchResponse> {
    const startTime = Date.now();
    const query = request.query.trim();

    if (!query) {
      throw new ValidationError('Search query cannot be empty');
    }
    if (!request.collectionId) {
      throw new ValidationError('collectionId is required');
    }
    if (request.topK !== undefined && (!Number.isInteger(request.topK) || request.topK < 1)) {
      throw new ValidationError('topK must be a positive integer');
    }

    if (request.documentIds && request.documentIds.length === 0) {
      return emptyResponse(query, startTime);
    }

    const pathStats: PathStats = {};
    try {
      const hits = await this.run(query, request, pathStats);
      return { query, hits, total: hits.length, pathStats, processingTimeMs: Date.now() - startTime };
    } catch (error) {
      logger.error(`Search failed for "${query}"`, describeError(error));
      return emptyResponse(query, startTime, pathStats);
    }
  }

  private async run(query: string, request: SearchRequest, pathStats: PathStats): Promise<SearchHit[]> {
    const signal = withTimeout(request.timeoutMs ?? this.config.timeoutMs, request.signal);
    const filter: RecallFilter = {
      collectionId: request.collectionId,
      ...(request.documentIds ? { documentIds: request.documentIds } : {}),
      ...(request.chunkTypes && request.chunkTypes.length > 0 ? { chunkTypes: request.chunkTypes } : {}),
    };

    const lists = await this.recall(query, filter, request, pathStats, signal);
    const fused = rrfFuse(lists, this.config.rrfK).slice(0, this.config.rrfTop);
    pathStats.rrf_top = fused.length;
    if (fused.length === 0) return [];

    const chunks = this.chunks.getActiveByIds(fused.map((candidate) => candidate.chunkId));
    const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
    const present = fused.filter((candidate) => byId.has(candidate.chunkId));

    const ordered = await this.order(query, present, byId, request, pathStats, signal);

    const useParent = request.useParent ?? true;
    const parents = useParent
      ? this.chunks.getParentContents(
          ordered.flatMap((item) => {
            const parentId = byId.get(item.candidate.chunkId)?.parent_chunk_id;
            return parentId ? [parentId] : [];
          })
        )
      : new Map<string, string>();

    return ordered.flatMap(({ candidate, rerankScore }) => {
      const chunk = byId.get(candidate.chunkId);
      if (!chunk) return [];
      return [{
        chunkId: chunk.id,
        documentId: chunk.document_id,
        content: chunk.content,
        chunkType: chunk.chunk_type,
        pageNumbers: chunk.page_numbers,
        score: roundScore(rerankScore ?? candidate.score),
        rerankScore: rerankScore === null ? null : roundScore(rerankScore),
        sources: candidate.sources,
        parentContent: chunk.parent_chunk_id ? parents.get(chunk.parent_chunk_id) ?? null : null,
      }];
    });
  }

  /**
   * Run the enabled recall paths together; a failing path contributes nothing
   */
  private async recall(
    query: string,
    filter: RecallFilter,
    request: SearchRequest,
    pathStats: PathStats,
    signal?: AbortSignal
  ): Promise<RecallCandidate[][]> {
    const paths: Array<{ name: RecallSource; run: () => Promise<RecallCandidate[]> }> = [];

    if (request.enableExact ?? true) {
      paths.push({
        name: 'exact',
        run: async () => this.chunks.fulltextSearch(query, filter, this.config.recallExact),
      });
    }
    if (request.enableSparse ?? true) {
      paths.push({
        name: 'sparse',
        run: async () => {
          const vector = await this.embeddings.embedQuerySparse(query, signal);
          return this.vectors.searchSparse(vector, filter, this.config.recallSparse);
        },
      });
    }
    if (request.enableDense ?? true) {
      paths.push({
        name: 'dense',
        run: async () => {
          const vector = await this.embeddings.embedQueryDense(query, signal);
          return this.vectors.searchDense(vector, filter, this.config.recallDense);
        },
      });
    }

    return Promise.all(
      paths.map(async (path) => {
        try {
          const results = await abortable(path.run, signal);
          pathStats[path.name] = results.length;
          return results;
        } catch (error) {
          logger.warn(`${path.name} recall failed`, describeError(error));
          pathStats[path.name] = 0;
          return [];
        }
      })
    );
  }

  private async order(
    query: string,
    fused: FusedCandidate[],
    byId: Map<string, Chunk>,
    request: SearchRequest,
    pathStats: PathStats,
    signal?: AbortSignal
  ): Promise<Array<{ candidate: FusedCandidate; rerankScore: number | null }>> {
    const topK = request.topK ?? this.config.rrfTop;
    const rrfOrder = fused.slice(0, topK).map((candidate) => ({ candidate, rerankScore: null }));

    if (!(request.enableRerank ?? true)) {
      return rrfOrder;
    }

    try {
      const stored = new Map(
        this.vectors.getByChunkIds(fused.map((candidate) => candidate.chunkId)).map((record) => [record.chunkId, record.dense])
      );
      const candidates: RerankCandidate[] = fused.flatMap((candidate) => {
        const chunk = byId.get(candidate.chunkId);
        return chunk
          ? [{ chunkId: chunk.id, content: chunk.content, chunkType: chunk.chunk_type, dense: stored.get(chunk.id) ?? null }]
          : [];
      });

      const outcome = await this.reranker.rerank(query, candidates, {
        topK,
        threshold: request.rerankThreshold ?? this.config.rerankThreshold,
        fallbackThreshold: request.fallbackCosineThreshold ?? this.config.fallbackCosineThreshold,
        ...(signal ? { signal } : {}),
      });
      pathStats.rerank_top = outcome.scores.length;
      logger.debug(`Reranked ${candidates.length} candidates with ${outcome.method}, kept ${outcome.scores.length}`);

      const fusedById = new Map(fused.map((candidate) => [candidate.chunkId, candidate]));
      return outcome.scores.flatMap((scored) => {
        const candidate = fusedById.get(scored.chunkId);
        return candidate ? [{ candidate, rerankScore: scored.score }] : [];
      });
    } catch (error) {
      logger.warn('Reranking failed, keeping fusion order', describeError(error));
      return rrfOrder;
    }
  }
}
