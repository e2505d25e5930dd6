import { DatabaseService } from './database.js';
import { ChunkRepository } from './chunk-repository.js';
import { CONTENT_PREVIEW_CHARS, VectorRecord, VectorStore } from './vector-store.js';
import { EmbeddingService } from './embedding.js';
import { Chunk, Document, NewChunk } from '../types/document.js';
import { TextProcessor } from '../utils/text-processing.js';
import { EmbeddingError, describeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface IndexResult {
  chunkCount: number;
  vectorCount: number;
}

type IndexTarget = Pick<Document, 'id' | 'collection_id'>;
type IndexableChunk = NewChunk | Chunk;

const logger = createLogger('indexer');

/**
 * Chunks that are not a parent of any other chunk in the set: children and standalone leaves
 */
export function searchableChunks<T extends IndexableChunk>(chunks: T[]): T[] {
  const parentIds = new Set(
    chunks.flatMap((chunk) => (chunk.parent_chunk_id ? [chunk.parent_chunk_id] : []))
  );
  return chunks.filter((chunk) => !parentIds.has(chunk.id));
}

/**
 * Writes chunks to the relational store and their vectors to the vector store
 */
export class Indexer {
  constructor(
    private db: DatabaseService,
    private chunks: ChunkRepository,
    private vectors: VectorStore,
    private embeddings: EmbeddingService,
    private maxEmbeddingTokens = 2048
  ) {}

  /**
   * Replace the active chunk set of a document and embed its searchable chunks.
   * On embedding failure the document's vectors are removed and its chunks retired before rethrowing.
   */
  async index(chunks: NewChunk[], document: IndexTarget, signal?: AbortSignal): Promise<IndexResult> {
    this.db.transaction(() => {
      this.chunks.deactivateByDocument(document.id);
      this.chunks.bulkCreate(chunks);
    });

    const searchable = searchableChunks(chunks);
    this.vectors.deleteByDocument(document.id);

    try {
      const records = await this.embedChunks(searchable, document, signal);
      this.vectors.upsert(records);
      logger.debug(`Indexed ${chunks.length} chunks (${records.length} vectors) for ${document.id}`);
      return { chunkCount: chunks.length, vectorCount: records.length };
    } catch (error) {
      this.vectors.deleteByDocument(document.id);
      this.chunks.deactivateByDocument(document.id);
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingError(
        `Embedding failed for document ${document.id}: ${describeError(error)}`,
        searchable.map((chunk) => chunk.id)
      );
    }
  }

  /**
   * Dense and sparse vectors for the given chunks, computed concurrently
   */
  async embedChunks(chunks: IndexableChunk[], document: IndexTarget, signal?: AbortSignal): Promise<VectorRecord[]> {
    if (chunks.length === 0) return [];

    const texts = chunks.map((chunk) => TextProcessor.getContentForEmbedding(chunk, this.maxEmbeddingTokens));
    let dense: number[][];
    let sparse: Awaited<ReturnType<EmbeddingService['embedSparse']>>;
    try {
      [dense, sparse] = await Promise.all([
        this.embeddings.embedDense(texts, signal),
        this.embeddings.embedSparse(texts, signal),
      ]);
    } catch (error) {
      throw new EmbeddingError(
        `Failed to embed ${chunks.length} chunks: ${describeError(error)}`,
        chunks.map((chunk) => chunk.id)
      );
    }

    return chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      collectionId: document.collection_id,
      documentId: document.id,
      chunkType: chunk.chunk_type,
      dense: dense[i] ?? null,
      sparse: sparse[i] ?? null,
      metadata: {
        pageNumbers: chunk.page_numbers,
        chunkIndex: chunk.chunk_index,
        hasParent: chunk.parent_chunk_id !== null,
        contentPreview: chunk.content.slice(0, CONTENT_PREVIEW_CHARS),
      },
    }));
  }
}
