import { DatabaseService } from './database.js';
import { ChunkType, isChunkType } from '../types/document.js';
import { RecallCandidate, RecallFilter } from '../types/search.js';
import { SparseVector } from '../types/provider.js';
import { DatabaseError } from '../utils/errors.js';
import { cosineSimilarity, sparseDot, sparseFromJson, sparseToJson } from '../utils/sparse.js';

export const CONTENT_PREVIEW_CHARS = 2000;

export interface VectorMetadata {
  pageNumbers: number[];
  chunkIndex: number;
  hasParent: boolean;
  contentPreview: string;
}

export interface VectorRecord {
  chunkId: string;
  collectionId: string;
  documentId: string;
  chunkType: ChunkType;
  dense: number[] | null;
  sparse: SparseVector | null;
  metadata: VectorMetadata;
}

/**
 * Vector index keyed by chunk id. Only searchable chunks are stored.
 */
export interface VectorStore {
  upsert(records: VectorRecord[]): void;
  getByChunkIds(chunkIds: string[]): VectorRecord[];
  deleteByDocument(documentId: string): number;
  countByDocument(documentId: string): number;
  searchDense(query: number[], filter: RecallFilter, limit: number): RecallCandidate[];
  searchSparse(query: SparseVector, filter: RecallFilter, limit: number): RecallCandidate[];
}

interface VectorRow {
  chunk_id: string;
  collection_id: string;
  document_id: string;
  chunk_type: string;
  metadata: string;
  dense: Buffer | null;
  sparse: string | null;
}

/**
 * SQLite-backed vector store with exhaustive scoring
 */
export class SqliteVectorStore implements VectorStore {
  constructor(private db: DatabaseService) {}

  upsert(records: VectorRecord[]): void {
    if (records.length === 0) return;
    try {
      const stmt = this.db.getDb().prepare(
        `INSERT INTO chunk_vectors (chunk_id, collection_id, document_id, chunk_type, metadata, dense, sparse)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(chunk_id) DO UPDATE SET
           collection_id = excluded.collection_id,
           document_id = excluded.document_id,
           chunk_type = excluded.chunk_type,
           metadata = excluded.metadata,
           dense = excluded.dense,
           sparse = excluded.sparse`
      );
      this.db.transaction(() => {
        for (const record of records) {
          stmt.run(
            record.chunkId,
            record.collectionId,
            record.documentId,
            record.chunkType,
            JSON.stringify(record.metadata),
            record.dense ? encodeDense(record.dense) : null,
            record.sparse ? sparseToJson(record.sparse) : null
          );
        }
      });
    } catch (error) {
      throw new DatabaseError(`Failed to upsert vectors: ${String(error)}`);
    }
  }

  getByChunkIds(chunkIds: string[]): VectorRecord[] {
    if (chunkIds.length === 0) return [];
    try {
      const placeholders = chunkIds.map(() => '?').join(', ');
      return this.db
        .getDb()
        .prepare<string[], VectorRow>(`SELECT * FROM chunk_vectors WHERE chunk_id IN (${placeholders})`)
        .all(...chunkIds)
        .map(toRecord);
    } catch (error) {
      throw new DatabaseError(`Failed to load vectors: ${String(error)}`);
    }
  }

  deleteByDocument(documentId: string): number {
    try {
      return this.db.getDb().prepare('DELETE FROM chunk_vectors WHERE document_id = ?').run(documentId).changes;
    } catch (error) {
      throw new DatabaseError(`Failed to delete vectors: ${String(error)}`);
    }
  }

  countByDocument(documentId: string): number {
    try {
      return (
        this.db
          .getDb()
          .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM chunk_vectors WHERE document_id = ?')
          .get(documentId)?.count ?? 0
      );
    } catch (error) {
      throw new DatabaseError(`Failed to count vectors: ${String(error)}`);
    }
  }

  searchDense(query: number[], filter: RecallFilter, limit: number): RecallCandidate[] {
    return this.scan(filter, 'dense')
      .flatMap((row) => (row.dense ? [{ chunkId: row.chunk_id, score: cosineSimilarity(query, decodeDense(row.dense)) }] : []))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((hit) => ({ ...hit, source: 'dense' as const }));
  }

  searchSparse(query: SparseVector, filter: RecallFilter, limit: number): RecallCandidate[] {
    return this.scan(filter, 'sparse')
      .flatMap((row) => (row.sparse ? [{ chunkId: row.chunk_id, score: sparseDot(query, sparseFromJson(row.sparse)) }] : []))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((hit) => ({ ...hit, source: 'sparse' as const }));
  }

  /**
   * Rows in scope whose chunk is still active
   */
  private scan(filter: RecallFilter, column: 'dense' | 'sparse'): VectorRow[] {
    const clauses = [
      'v.collection_id = ?',
      `v.${column} IS NOT NULL`,
      'EXISTS (SELECT 1 FROM document_chunks c WHERE c.id = v.chunk_id AND c.is_active = 1)',
    ];
    const params: unknown[] = [filter.collectionId];
    if (filter.documentIds && filter.documentIds.length > 0) {
      clauses.push(`v.document_id IN (${filter.documentIds.map(() => '?').join(', ')})`);
      params.push(...filter.documentIds);
    }
    if (filter.chunkTypes && filter.chunkTypes.length > 0) {
      clauses.push(`v.chunk_type IN (${filter.chunkTypes.map(() => '?').join(', ')})`);
      params.push(...filter.chunkTypes);
    }

    try {
      return this.db
        .getDb()
        .prepare<unknown[], VectorRow>(`SELECT v.* FROM chunk_vectors v WHERE ${clauses.join(' AND ')}`)
        .all(...params);
    } catch (error) {
      throw new DatabaseError(`Failed to scan vectors: ${String(error)}`);
    }
  }
}

function encodeDense(vector: number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

function decodeDense(blob: Buffer): Float32Array {
  // Copy out: the Buffer may sit at an offset that is not 4-byte aligned
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}

function parseMetadata(raw: string): VectorMetadata {
  const parsed: unknown = JSON.parse(raw);
  const fallback: VectorMetadata = { pageNumbers: [], chunkIndex: 0, hasParent: false, contentPreview: '' };
  if (typeof parsed !== 'object' || parsed === null) return fallback;
  const pageNumbers = 'pageNumbers' in parsed && Array.isArray(parsed.pageNumbers)
    ? parsed.pageNumbers.filter((page): page is number => typeof page === 'number')
    : [];
  return {
    pageNumbers,
    chunkIndex: 'chunkIndex' in parsed && typeof parsed.chunkIndex === 'number' ? parsed.chunkIndex : 0,
    hasParent: 'hasParent' in parsed && parsed.hasParent === true,
    contentPreview: 'contentPreview' in parsed && typeof parsed.contentPreview === 'string' ? parsed.contentPreview : '',
  };
}

function toRecord(row: VectorRow): VectorRecord {
  return {
    chunkId: row.chunk_id,
    collectionId: row.collection_id,
    documentId: row.document_id,
    chunkType: isChunkType(row.chunk_type) ? row.chunk_type : 'TEXT',
    dense: row.dense ? Array.from(decodeDense(row.dense)) : null,
    sparse: row.sparse ? sparseFromJson(row.sparse) : null,
    metadata: parseMetadata(row.metadata),
  };
}
