import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { DatabaseError } from '../utils/errors.js';

export class DatabaseService {
  private db: Database.Database | null = null;
  private dbPath: string;

  /**
   * @param dbPath file path, or ':memory:' for a throwaway database
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Open the connection and create the schema
   */
  initialize(): void {
    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.createTables();
    } catch (error) {
      throw new DatabaseError(`Failed to initialize database: ${String(error)}`);
    }
  }

  private createTables(): void {
    const db = this.getDb();

    try {
      db.exec(`
        CREATE TABLE IF NOT EXISTS documents (
          id TEXT PRIMARY KEY,
          collection_id TEXT NOT NULL,
          filename TEXT NOT NULL,
          content_hash TEXT NOT NULL,
          byte_size INTEGER NOT NULL,
          storage_path TEXT NOT NULL,
          parser_engine TEXT NOT NULL DEFAULT 'layout-parser',
          parser_version TEXT NOT NULL DEFAULT 'v1.0.0',
          chunking_strategy TEXT NOT NULL DEFAULT 'layout_parent_child',
          status TEXT NOT NULL DEFAULT 'UPLOADED',
          error_log TEXT,
          metadata TEXT,
          summary TEXT,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          UNIQUE (collection_id, content_hash)
        )
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS document_chunks (
          id TEXT PRIMARY KEY,
          document_id TEXT NOT NULL,
          collection_id TEXT NOT NULL,
          parent_chunk_id TEXT,
          chunk_index INTEGER NOT NULL,
          page_numbers TEXT NOT NULL DEFAULT '[]',
          chunk_type TEXT NOT NULL DEFAULT 'TEXT',
          content TEXT NOT NULL,
          token_count INTEGER NOT NULL DEFAULT 0,
          is_active INTEGER NOT NULL DEFAULT 1,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
        )
      `);

      db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
          chunk_id UNINDEXED,
          content,
          tokenize = 'unicode61'
        )
      `);

      // FTS rows follow the chunk rows, including cascaded deletes
      db.exec(`
        CREATE TRIGGER IF NOT EXISTS document_chunks_ai AFTER INSERT ON document_chunks BEGIN
          INSERT INTO chunks_fts (chunk_id, content) VALUES (new.id, new.content);
        END;
        CREATE TRIGGER IF NOT EXISTS document_chunks_ad AFTER DELETE ON document_chunks BEGIN
          DELETE FROM chunks_fts WHERE chunk_id = old.id;
        END;
      `);

      db.exec(`
        CREATE TABLE IF NOT EXISTS chunk_vectors (
          chunk_id TEXT PRIMARY KEY,
          collection_id TEXT NOT NULL,
          document_id TEXT NOT NULL,
          chunk_type TEXT NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          dense BLOB,
          sparse TEXT
        )
      `);

      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status);
        CREATE INDEX IF NOT EXISTS idx_documents_hash ON documents(content_hash);
        CREATE INDEX IF NOT EXISTS idx_chunks_document_active ON document_chunks(document_id, is_active);
        CREATE INDEX IF NOT EXISTS idx_chunks_document_index ON document_chunks(document_id, chunk_index);
        CREATE INDEX IF NOT EXISTS idx_chunks_parent ON document_chunks(parent_chunk_id);
        CREATE INDEX IF NOT EXISTS idx_chunks_collection ON document_chunks(collection_id);
        CREATE INDEX IF NOT EXISTS idx_vectors_collection ON chunk_vectors(collection_id);
        CREATE INDEX IF NOT EXISTS idx_vectors_document ON chunk_vectors(document_id);
      `);
    } catch (error) {
      throw new DatabaseError(`Failed to create tables: ${String(error)}`);
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get database instance
   */
  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Execute in transaction
   */
  transaction<T>(fn: () => T): T {
    const db = this.getDb();
    return db.transaction(fn)();
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  /**
   * Row counts used by `db-init --status`
   */
  getStats(): { documents: number; chunks: number; activeChunks: number; vectors: number } {
    const db = this.getDb();
    try {
      const count = (sql: string): number => db.prepare<[], { count: number }>(sql).get()?.count ?? 0;
      return {
        documents: count('SELECT COUNT(*) as count FROM documents'),
        chunks: count('SELECT COUNT(*) as count FROM document_chunks'),
        activeChunks: count('SELECT COUNT(*) as count FROM document_chunks WHERE is_active = 1'),
        vectors: count('SELECT COUNT(*) as count FROM chunk_vectors'),
      };
    } catch (error) {
      throw new DatabaseError(`Failed to get database stats: ${String(error)}`);
    }
  }
}
