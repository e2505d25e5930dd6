import { DatabaseService } from '../services/database.js';
import { DatabaseError } from './errors.js';
import { createLogger } from './logger.js';

interface Migration {
  version: number;
  name: string;
  up: (db: DatabaseService) => void;
}

interface ColumnInfo {
  name: string;
}

const logger = createLogger('migrations');

export class MigrationManager {
  private db: DatabaseService;
  private migrations: Migration[] = [];

  constructor(db: DatabaseService) {
    this.db = db;
    this.initializeMigrations();
  }

  private initializeMigrations(): void {
    // Tables come from DatabaseService.initialize(); v1 only records the baseline
    this.migrations.push({
      version: 1,
      name: 'initial_schema',
      up: () => undefined,
    });

    this.migrations.push({
      version: 2,
      name: 'add_document_summary',
      up: (db: DatabaseService) => {
        const dbInstance = db.getDb();
        const columns = dbInstance.prepare<[], ColumnInfo>('PRAGMA table_info(documents)').all();
        if (!columns.some((column) => column.name === 'summary')) {
          dbInstance.exec('ALTER TABLE documents ADD COLUMN summary TEXT');
        }
      },
    });
  }

  private ensureMigrationsTable(): void {
    this.db.getDb().exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  /**
   * Get current schema version
   */
  getCurrentVersion(): number {
    try {
      this.ensureMigrationsTable();
      const row = this.db
        .getDb()
        .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM migrations')
        .get();
      return row?.version ?? 0;
    } catch (error) {
      throw new DatabaseError(`Failed to get current version: ${String(error)}`);
    }
  }

  getLatestVersion(): number {
    return Math.max(...this.migrations.map((m) => m.version), 0);
  }

  needsMigration(): boolean {
    return this.getCurrentVersion() < this.getLatestVersion();
  }

  /**
   * Run pending migrations
   */
  migrate(): number {
    const currentVersion = this.getCurrentVersion();
    const pending = this.migrations
      .filter((m) => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return currentVersion;
    }

    try {
      this.db.transaction(() => {
        const record = this.db.getDb().prepare('INSERT INTO migrations (version, name) VALUES (?, ?)');
        for (const migration of pending) {
          logger.debug(`Running migration ${migration.version}: ${migration.name}`);
          migration.up(this.db);
          record.run(migration.version, migration.name);
        }
      });
    } catch (error) {
      throw new DatabaseError(`Migration failed: ${String(error)}`);
    }

    const version = this.getCurrentVersion();
    logger.debug(`Database migrated to version ${version}`);
    return version;
  }
}
