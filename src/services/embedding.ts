import { EmbeddingProvider, SparseVector } from '../types/provider.js';
import { ApiError, describeError } from '../utils/errors.js';
import { requestJson } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { emptyVector, tfidfVectors } from '../utils/sparse.js';
import { isRecord } from '../parsers/normalize.js';

export interface EmbeddingOptions {
  batchSize: number;
  maxParallel: number;
}

export interface SparseEncoder {
  readonly name: string;
  encode(texts: string[], signal?: AbortSignal): Promise<SparseVector[]>;
}

const MAX_SPARSE_TERMS = 256;

const logger = createLogger('embedding');

export class TfidfSparseEncoder implements SparseEncoder {
  readonly name = 'tfidf';

  async encode(texts: string[]): Promise<SparseVector[]> {
    return tfidfVectors(texts);
  }
}

function topTerms(vector: SparseVector): SparseVector {
  if (vector.size === 0) return emptyVector();
  if (vector.size <= MAX_SPARSE_TERMS) return vector;
  return new Map([...vector].sort((a, b) => b[1] - a[1]).slice(0, MAX_SPARSE_TERMS));
}

/**
 * Accepts `{indices, values}` objects, `{ "<id>": weight }` maps and `[[id, weight], ...]` pairs
 */
export function parseSparseItem(item: unknown): SparseVector {
  const vector: SparseVector = new Map();

  if (isRecord(item) && Array.isArray(item['indices']) && Array.isArray(item['values'])) {
    const values = item['values'];
    item['indices'].forEach((id: unknown, i: number) => {
      const weight: unknown = values[i];
      if (typeof id === 'number' && typeof weight === 'number') vector.set(id, weight);
    });
  } else if (isRecord(item)) {
    for (const [key, weight] of Object.entries(item)) {
      if (/^\d+$/.test(key) && typeof weight === 'number') vector.set(Number(key), weight);
    }
  } else if (Array.isArray(item)) {
    for (const entry of item) {
      if (Array.isArray(entry) && typeof entry[0] === 'number' && typeof entry[1] === 'number') {
        vector.set(entry[0], entry[1]);
      } else if (isRecord(entry)) {
        parseSparseItem(entry).forEach((weight, id) => vector.set(id, weight));
      }
    }
  }

  return topTerms(vector);
}

/**
 * Neural sparse encoder behind an HTTP endpoint (`/encode` takes `{texts, return_sparse}`,
 * `/embeddings` takes `{input}`)
 */
export class HttpSparseEncoder implements SparseEncoder {
  readonly name = 'http';
  private url: string;

  constructor(url: string, private apiKey?: string, private timeoutMs = 60_000) {
    const trimmed = url.trim().replace(/\/+$/, '');
    this.url = trimmed.includes('/encode') || trimmed.includes('/embeddings') ? trimmed : `${trimmed}/encode`;
  }

  async encode(texts: string[], signal?: AbortSignal): Promise<SparseVector[]> {
    const body = this.url.includes('/embeddings') ? { input: texts } : { texts, return_sparse: true };
    const data = await requestJson(this.url, 'sparse-encoder', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify(body),
      timeoutMs: this.timeoutMs,
      ...(signal ? { signal } : {}),
    });

    const items = isRecord(data) ? data['data'] ?? data['sparse'] ?? data['results'] : data;
    if (!Array.isArray(items) || items.length !== texts.length) {
      throw new ApiError('Sparse encoder returned an unexpected payload', 'sparse-encoder');
    }
    return items.map(parseSparseItem);
  }
}

/**
 * Dense and sparse vectors for chunk texts and queries
 */
export class EmbeddingService {
  private options: EmbeddingOptions;
  private fallbackSparse = new TfidfSparseEncoder();

  constructor(
    private provider: EmbeddingProvider,
    private sparseEncoder: SparseEncoder = new TfidfSparseEncoder(),
    options?: Partial<EmbeddingOptions>
  ) {
    this.options = {
      batchSize: 10,
      maxParallel: 4,
      ...options,
    };
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  /**
   * Dense vectors in input order. Empty texts get a zero vector without an API call.
   */
  async embedDense(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: number[][] = texts.map(() => new Array<number>(this.provider.dimension).fill(0));
    const pending = texts
      .map((text, index) => ({ text, index }))
      .filter((item) => item.text.trim().length > 0);

    const batches: Array<typeof pending> = [];
    for (let i = 0; i < pending.length; i += this.options.batchSize) {
      batches.push(pending.slice(i, i + this.options.batchSize));
    }

    const semaphore = new Semaphore(this.options.maxParallel);
    await Promise.all(
      batches.map((batch) =>
        semaphore.run(async () => {
          const vectors = await this.provider.batchGenerateEmbeddings(
            batch.map((item) => item.text),
            signal
          );
          if (vectors.length !== batch.length) {
            throw new ApiError(
              `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`,
              this.provider.name
            );
          }
          batch.forEach((item, i) => {
            const vector = vectors[i];
            if (vector) results[item.index] = vector;
          });
        })
      )
    );

    return results;
  }

  /**
   * Sparse vectors; a failing remote encoder falls back to TF-IDF over the same batch
   */
  async embedSparse(texts: string[], signal?: AbortSignal): Promise<SparseVector[]> {
    if (texts.length === 0) return [];
    try {
      return await this.sparseEncoder.encode(texts, signal);
    } catch (error) {
      if (this.sparseEncoder === this.fallbackSparse) throw error;
      logger.warn(`Sparse encoder ${this.sparseEncoder.name} failed, using TF-IDF`, describeError(error));
      return this.fallbackSparse.encode(texts);
    }
  }

  async embedQueryDense(query: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedDense([query], signal);
    return vector ?? [];
  }

  async embedQuerySparse(query: string, signal?: AbortSignal): Promise<SparseVector> {
    const [vector] = await this.embedSparse([query], signal);
    return vector ?? emptyVector();
  }
}
