import { DatabaseService } from './database.js';
import { Chunk, ChunkType, NewChunk, isChunkType } from '../types/document.js';
import { RecallCandidate, RecallFilter } from '../types/search.js';
import { DatabaseError } from '../utils/errors.js';

interface ChunkRow {
  id: string;
  document_id: string;
  collection_id: string;
  parent_chunk_id: string | null;
  chunk_index: number;
  page_numbers: string;
  chunk_type: string;
  content: string;
  token_count: number;
  is_active: number;
  created_at: string;
}

const LIKE_MATCH_SCORE = 0.5;

export class ChunkRepository {
  constructor(private db: DatabaseService) {}

  /**
   * Insert chunks in one transaction; the FTS index follows through triggers
   */
  bulkCreate(chunks: NewChunk[]): void {
    if (chunks.length === 0) return;

    try {
      const stmt = this.db.getDb().prepare(
        `INSERT INTO document_chunks (
          id, document_id, collection_id, parent_chunk_id, chunk_index,
          page_numbers, chunk_type, content, token_count, is_active
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 1)`
      );
      this.db.transaction(() => {
        for (const chunk of chunks) {
          stmt.run(
            chunk.id,
            chunk.document_id,
            chunk.collection_id,
            chunk.parent_chunk_id,
            chunk.chunk_index,
            JSON.stringify(chunk.page_numbers),
            chunk.chunk_type,
            chunk.content,
            chunk.token_count
          );
        }
      });
    } catch (error) {
      throw new DatabaseError(`Failed to insert chunks: ${String(error)}`);
    }
  }

  /**
   * Retire every active chunk of a document
   */
  deactivateByDocument(documentId: string): number {
    try {
      return this.db
        .getDb()
        .prepare('UPDATE document_chunks SET is_active = 0 WHERE document_id = ? AND is_active = 1')
        .run(documentId).changes;
    } catch (error) {
      throw new DatabaseError(`Failed to deactivate chunks: ${String(error)}`);
    }
  }

  listByDocument(documentId: string, options: { includeInactive?: boolean } = {}): Chunk[] {
    try {
      const sql = options.includeInactive
        ? 'SELECT * FROM document_chunks WHERE document_id = ? ORDER BY is_active DESC, chunk_index'
        : 'SELECT * FROM document_chunks WHERE document_id = ? AND is_active = 1 ORDER BY chunk_index';
      return this.db.getDb().prepare<[string], ChunkRow>(sql).all(documentId).map(toChunk);
    } catch (error) {
      throw new DatabaseError(`Failed to list chunks: ${String(error)}`);
    }
  }

  /**
   * Active chunks by id, in the order of the ids given; unknown ids are skipped
   */
  getActiveByIds(ids: string[]): Chunk[] {
    if (ids.length === 0) return [];
    try {
      const placeholders = ids.map(() => '?').join(', ');
      const rows = this.db
        .getDb()
        .prepare<string[], ChunkRow>(
          `SELECT * FROM document_chunks WHERE is_active = 1 AND id IN (${placeholders})`
        )
        .all(...ids);
      const byId = new Map(rows.map((row) => [row.id, toChunk(row)]));
      return ids.flatMap((id) => {
        const chunk = byId.get(id);
        return chunk ? [chunk] : [];
      });
    } catch (error) {
      throw new DatabaseError(`Failed to get chunks: ${String(error)}`);
    }
  }

  /**
   * Parent content for many children in one query
   */
  getParentContents(parentIds: string[]): Map<string, string> {
    const unique = [...new Set(parentIds)];
    if (unique.length === 0) return new Map();
    try {
      const placeholders = unique.map(() => '?').join(', ');
      const rows = this.db
        .getDb()
        .prepare<string[], { id: string; content: string }>(
          `SELECT id, content FROM document_chunks WHERE id IN (${placeholders})`
        )
        .all(...unique);
      return new Map(rows.map((row) => [row.id, row.content]));
    } catch (error) {
      throw new DatabaseError(`Failed to get parent chunks: ${String(error)}`);
    }
  }

  countActive(documentId: string): number {
    try {
      return (
        this.db
          .getDb()
          .prepare<[string], { count: number }>(
            'SELECT COUNT(*) as count FROM document_chunks WHERE document_id = ? AND is_active = 1'
          )
          .get(documentId)?.count ?? 0
      );
    } catch (error) {
      throw new DatabaseError(`Failed to count chunks: ${String(error)}`);
    }
  }

  /**
   * Exact recall: FTS5 phrase match ranked by bm25, topped up by substring matches at a flat score.
   * Only searchable (non-parent) active chunks are returned.
   */
  fulltextSearch(query: string, filter: RecallFilter, limit: number): RecallCandidate[] {
    const trimmed = query.trim();
    if (!trimmed || limit <= 0) return [];

    const scope = buildScope(filter);
    const db = this.db.getDb();
    const candidates: RecallCandidate[] = [];

    try {
      const match = toFtsQuery(trimmed);
      if (match) {
        const rows = db
          .prepare<unknown[], { id: string; score: number }>(
            `SELECT c.id as id, -bm25(chunks_fts) as score
             FROM chunks_fts
             JOIN document_chunks c ON c.id = chunks_fts.chunk_id
             WHERE chunks_fts MATCH ? AND ${scope.sql}
             ORDER BY bm25(chunks_fts)
             LIMIT ?`
          )
          .all(match, ...scope.params, limit);
        for (const row of rows) {
          candidates.push({ chunkId: row.id, score: row.score, source: 'exact' });
        }
      }

      if (candidates.length < limit) {
        const seen = new Set(candidates.map((candidate) => candidate.chunkId));
        const rows = db
          .prepare<unknown[], { id: string }>(
            `SELECT c.id as id FROM document_chunks c
             WHERE c.content LIKE ? ESCAPE '\\' AND ${scope.sql}
             ORDER BY c.document_id, c.chunk_index
             LIMIT ?`
          )
          .all(`%${escapeLike(trimmed)}%`, ...scope.params, limit + seen.size);
        for (const row of rows) {
          if (candidates.length >= limit) break;
          if (seen.has(row.id)) continue;
          seen.add(row.id);
          candidates.push({ chunkId: row.id, score: LIKE_MATCH_SCORE, source: 'exact' });
        }
      }
    } catch (error) {
      throw new DatabaseError(`Failed to run full-text search: ${String(error)}`);
    }

    return candidates;
  }
}

function buildScope(filter: RecallFilter): { sql: string; params: unknown[] } {
  const clauses = [
    'c.is_active = 1',
    'c.collection_id = ?',
    'NOT EXISTS (SELECT 1 FROM document_chunks p WHERE p.parent_chunk_id = c.id)',
  ];
  const params: unknown[] = [filter.collectionId];

  if (filter.documentIds && filter.documentIds.length > 0) {
    clauses.push(`c.document_id IN (${filter.documentIds.map(() => '?').join(', ')})`);
    params.push(...filter.documentIds);
  }
  if (filter.chunkTypes && filter.chunkTypes.length > 0) {
    clauses.push(`c.chunk_type IN (${filter.chunkTypes.map(() => '?').join(', ')})`);
    params.push(...filter.chunkTypes);
  }

  return { sql: clauses.join(' AND '), params };
}

/**
 * Quote each term so user punctuation never reaches the FTS5 query grammar
 */
export function toFtsQuery(query: string): string {
  return query
    .split(/\s+/)
    .map((term) => term.replace(/"/g, '""'))
    .filter((term) => term.length > 0)
    .map((term) => `"${term}"`)
    .join(' ');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function parsePages(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((page): page is number => typeof page === 'number') : [];
}

function toChunk(row: ChunkRow): Chunk {
  const chunkType: ChunkType = isChunkType(row.chunk_type) ? row.chunk_type : 'TEXT';
  return {
    id: row.id,
    document_id: row.document_id,
    collection_id: row.collection_id,
    parent_chunk_id: row.parent_chunk_id,
    chunk_index: row.chunk_index,
    page_numbers: parsePages(row.page_numbers),
    chunk_type: chunkType,
    content: row.content,
    token_count: row.token_count,
    is_active: row.is_active === 1,
    created_at: row.created_at,
  };
}
