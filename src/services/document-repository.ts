import { DatabaseService } from './database.js';
import { Document, DocumentStatus, isDocumentStatus } from '../types/document.js';
import { DatabaseError, InvalidStatusTransitionError } from '../utils/errors.js';

/** Statuses a document may leave when moving to the key status */
export const STATUS_TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  UPLOADED: ['READY', 'FAILED', 'UPLOADED'],
  PARSING: ['UPLOADED'],
  PARSED: ['PARSING'],
  EMBEDDING: ['PARSED'],
  READY: ['EMBEDDING'],
  FAILED: ['UPLOADED', 'PARSING', 'PARSED', 'EMBEDDING', 'READY', 'FAILED'],
};

export const MAX_ERROR_LOG_LENGTH = 4000;

export interface NewDocument {
  id: string;
  collection_id: string;
  filename: string;
  content_hash: string;
  byte_size: number;
  storage_path: string;
  parser_engine?: string;
  parser_version?: string;
  chunking_strategy?: string;
  metadata?: Record<string, unknown> | null;
}

interface DocumentRow {
  id: string;
  collection_id: string;
  filename: string;
  content_hash: string;
  byte_size: number;
  storage_path: string;
  parser_engine: string;
  parser_version: string;
  chunking_strategy: string;
  status: string;
  error_log: string | null;
  metadata: string | null;
  summary: string | null;
  created_at: string;
  updated_at: string;
}

export class DocumentRepository {
  constructor(private db: DatabaseService) {}

  /**
   * Insert a new document in UPLOADED
   */
  create(doc: NewDocument): Document {
    try {
      this.db
        .getDb()
        .prepare(
          `INSERT INTO documents (
            id, collection_id, filename, content_hash, byte_size, storage_path,
            parser_engine, parser_version, chunking_strategy, status, metadata
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'UPLOADED', ?)`
        )
        .run(
          doc.id,
          doc.collection_id,
          doc.filename,
          doc.content_hash,
          doc.byte_size,
          doc.storage_path,
          doc.parser_engine ?? 'layout-parser',
          doc.parser_version ?? 'v1.0.0',
          doc.chunking_strategy ?? 'layout_parent_child',
          doc.metadata ? JSON.stringify(doc.metadata) : null
        );
    } catch (error) {
      throw new DatabaseError(`Failed to insert document: ${String(error)}`);
    }

    const created = this.getById(doc.id);
    if (!created) {
      throw new DatabaseError(`Failed to read back document ${doc.id}`);
    }
    return created;
  }

  getById(id: string): Document | null {
    try {
      const row = this.db
        .getDb()
        .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?')
        .get(id);
      return row ? toDocument(row) : null;
    } catch (error) {
      throw new DatabaseError(`Failed to get document: ${String(error)}`);
    }
  }

  findByHash(collectionId: string, contentHash: string): Document | null {
    try {
      const row = this.db
        .getDb()
        .prepare<[string, string], DocumentRow>(
          'SELECT * FROM documents WHERE collection_id = ? AND content_hash = ?'
        )
        .get(collectionId, contentHash);
      return row ? toDocument(row) : null;
    } catch (error) {
      throw new DatabaseError(`Failed to find document by hash: ${String(error)}`);
    }
  }

  /**
   * A READY document with the same content in any collection
   */
  findReadyDonor(contentHash: string, excludeId: string): Document | null {
    try {
      const row = this.db
        .getDb()
        .prepare<[string, string], DocumentRow>(
          `SELECT * FROM documents
           WHERE content_hash = ? AND status = 'READY' AND id != ?
           ORDER BY updated_at DESC LIMIT 1`
        )
        .get(contentHash, excludeId);
      return row ? toDocument(row) : null;
    } catch (error) {
      throw new DatabaseError(`Failed to find donor document: ${String(error)}`);
    }
  }

  list(collectionId?: string): Document[] {
    try {
      const db = this.db.getDb();
      const rows = collectionId
        ? db
            .prepare<[string], DocumentRow>(
              'SELECT * FROM documents WHERE collection_id = ? ORDER BY created_at DESC, id'
            )
            .all(collectionId)
        : db.prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY created_at DESC, id').all();
      return rows.map(toDocument);
    } catch (error) {
      throw new DatabaseError(`Failed to list documents: ${String(error)}`);
    }
  }

  /**
   * Guarded single-writer status update. Throws when the current status does not allow it.
   */
  transition(id: string, to: DocumentStatus, errorLog?: string | null): Document {
    const allowed = STATUS_TRANSITIONS[to];
    const placeholders = allowed.map(() => '?').join(', ');
    const log = errorLog === undefined ? null : truncateLog(errorLog);

    let changes: number;
    try {
      const result = this.db
        .getDb()
        .prepare(
          `UPDATE documents
           SET status = ?, error_log = ?, updated_at = CURRENT_TIMESTAMP
           WHERE id = ? AND status IN (${placeholders})`
        )
        .run(to, log, id, ...allowed);
      changes = result.changes;
    } catch (error) {
      throw new DatabaseError(`Failed to update document status: ${String(error)}`);
    }

    const current = this.getById(id);
    if (!current) {
      throw new DatabaseError(`Document ${id} disappeared during status update`);
    }
    if (changes === 0) {
      throw new InvalidStatusTransitionError(id, current.status, to);
    }
    return current;
  }

  setSummary(id: string, summary: string): void {
    try {
      this.db
        .getDb()
        .prepare('UPDATE documents SET summary = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
        .run(summary, id);
    } catch (error) {
      throw new DatabaseError(`Failed to save summary: ${String(error)}`);
    }
  }

  setParserEngine(id: string, engine: string): void {
    try {
      this.db
        .getDb()
        .prepare('UPDATE documents SET parser_engine = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
        .run(engine, id);
    } catch (error) {
      throw new DatabaseError(`Failed to save parser engine: ${String(error)}`);
    }
  }

  /**
   * Delete the row; chunks go with it through the foreign key cascade
   */
  delete(id: string): boolean {
    try {
      return this.db.getDb().prepare('DELETE FROM documents WHERE id = ?').run(id).changes > 0;
    } catch (error) {
      throw new DatabaseError(`Failed to delete document: ${String(error)}`);
    }
  }
}

function truncateLog(log: string | null): string | null {
  if (log === null) return null;
  return log.length > MAX_ERROR_LOG_LENGTH ? log.slice(0, MAX_ERROR_LOG_LENGTH) : log;
}

function parseMetadata(raw: string | null): Record<string, unknown> | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

function toDocument(row: DocumentRow): Document {
  if (!isDocumentStatus(row.status)) {
    throw new DatabaseError(`Document ${row.id} has unknown status ${row.status}`);
  }
  return {
    ...row,
    status: row.status,
    metadata: parseMetadata(row.metadata),
  };
}
