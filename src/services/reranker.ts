import { z } from 'zod';
import { EmbeddingService } from './embedding.js';
import { ChunkType } from '../types/document.js';
import { TextProcessor } from '../utils/text-processing.js';
import { cosineSimilarity } from '../utils/sparse.js';
import { describeError } from '../utils/errors.js';
import { requestJson } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

export interface RerankerOptions {
  url: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export interface RerankCandidate {
  chunkId: string;
  content: string;
  chunkType: ChunkType;
  /** Stored dense vector, used by the cosine fallback when present */
  dense?: number[] | null;
}

export interface RerankScore {
  chunkId: string;
  score: number;
}

export interface RerankParams {
  topK: number;
  threshold: number;
  fallbackThreshold: number;
  signal?: AbortSignal;
}

export type RerankMethod = 'cross-encoder' | 'cosine';

export interface RerankOutcome {
  method: RerankMethod;
  scores: RerankScore[];
}

const RerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

const logger = createLogger('reranker');

/**
 * Keep scores at or above the threshold, best first, at most topK
 */
export function selectTop(scores: RerankScore[], threshold: number, topK: number): RerankScore[] {
  return scores
    .filter((item) => item.score >= threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK));
}

/**
 * Second-stage scoring: a cross-encoder over HTTP, falling back to embedding cosine similarity
 */
export class Reranker {
  constructor(
    private options: RerankerOptions,
    private embeddings: EmbeddingService
  ) {}

  hasCrossEncoder(): boolean {
    return Boolean(this.options.apiKey);
  }

  async rerank(query: string, candidates: RerankCandidate[], params: RerankParams): Promise<RerankOutcome> {
    if (candidates.length === 0) {
      return { method: this.hasCrossEncoder() ? 'cross-encoder' : 'cosine', scores: [] };
    }

    if (this.hasCrossEncoder()) {
      try {
        const scores = await this.crossEncode(query, candidates, params.signal);
        return { method: 'cross-encoder', scores: selectTop(scores, params.threshold, params.topK) };
      } catch (error) {
        logger.warn('Cross-encoder rerank failed, using embedding similarity', describeError(error));
      }
    }

    const scores = await this.cosineScores(query, candidates, params.signal);
    return { method: 'cosine', scores: selectTop(scores, params.fallbackThreshold, params.topK) };
  }

  async crossEncode(query: string, candidates: RerankCandidate[], signal?: AbortSignal): Promise<RerankScore[]> {
    const data = await requestJson(this.options.url, 'reranker', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey ?? ''}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        query,
        documents: candidates.map((candidate) => candidate.content),
        top_n: candidates.length,
        return_documents: false,
      }),
      timeoutMs: this.options.timeoutMs,
      ...(signal ? { signal } : {}),
    });

    const parsed = RerankResponseSchema.parse(data);
    return parsed.results.flatMap((result) => {
      const candidate = candidates[result.index];
      return candidate ? [{ chunkId: candidate.chunkId, score: result.relevance_score }] : [];
    });
  }

  async cosineScores(query: string, candidates: RerankCandidate[], signal?: AbortSignal): Promise<RerankScore[]> {
    const queryVector = await this.embeddings.embedQueryDense(query, signal);

    const missing = candidates.filter((candidate) => !candidate.dense || candidate.dense.length === 0);
    const embedded = new Map<string, number[]>();
    if (missing.length > 0) {
      const vectors = await this.embeddings.embedDense(
        missing.map((candidate) => TextProcessor.getContentForEmbedding({
          chunk_type: candidate.chunkType,
          content: candidate.content,
        })),
        signal
      );
      missing.forEach((candidate, i) => {
        const vector = vectors[i];
        if (vector) embedded.set(candidate.chunkId, vector);
      });
    }

    return candidates.map((candidate) => {
      const vector = candidate.dense && candidate.dense.length > 0 ? candidate.dense : embedded.get(candidate.chunkId);
      return { chunkId: candidate.chunkId, score: vector ? cosineSimilarity(queryVector, vector) : 0 };
    });
  }
}
