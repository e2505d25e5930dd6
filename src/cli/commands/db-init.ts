import { Command } from 'commander';
import { existsSync, promises as fs } from 'fs';
import { ConfigManager } from '../../utils/config.js';
import { DatabaseService } from '../../services/database.js';
import { MigrationManager } from '../../utils/migrations.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptConfirm } from '../utils/input.js';
import { formatValidationError } from '../utils/validation.js';

export function createDbInitCommand(): Command {
  return new Command('db-init')
    .description('Create the database schema and apply migrations')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Delete and recreate an existing database')
    .action(async (options: { configPath?: string; force?: boolean }) => {
      try {
        await initializeDatabase(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function initializeDatabase(options: { configPath?: string; force?: boolean }): Promise<void> {
  console.log('💾 Database initialization');
  console.log('');

  const config = await new ConfigManager(options.configPath).load();
  const dbPath = config.database.path;
  console.log('📁 Database path:', dbPath);
  console.log('');

  if (existsSync(dbPath)) {
    const recreate = options.force
      || (await promptConfirm('Database already exists. Delete all data and recreate it?', false));
    if (recreate) {
      console.log('🗑️  Removing existing database...');
      for (const suffix of ['', '-wal', '-shm']) {
        await fs.rm(`${dbPath}${suffix}`, { force: true });
      }
    } else {
      console.log('Keeping the existing database; applying pending migrations only.');
    }
  }

  const dbService = new DatabaseService(dbPath);
  const progress = new ProgressIndicator('Creating schema...');
  progress.start();
  try {
    dbService.initialize();
    const migrations = new MigrationManager(dbService);
    const applied = migrations.migrate();
    progress.stop(`Schema ready at version ${migrations.getCurrentVersion()} (${applied} migration(s) applied)`);
  } catch (error) {
    progress.fail('Database initialization failed');
    dbService.close();
    throw error;
  }

  console.log('');
  console.log('📋 Database structure:');
  for (const table of listTables(dbService)) {
    console.log(`  ✅ Table: ${table.name} (${table.columns} columns)`);
  }
  for (const index of listIndexes(dbService)) {
    console.log(`  📊 Index: ${index}`);
  }

  dbService.close();
  console.log('');
  console.log('✅ Database initialization complete!');
}

function listTables(dbService: DatabaseService): Array<{ name: string; columns: number }> {
  const db = dbService.getDb();
  return db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name NOT LIKE 'chunks_fts_%'
       ORDER BY name`
    )
    .all()
    .map((table) => ({
      name: table.name,
      columns: db.prepare(`PRAGMA table_info(${table.name})`).all().length,
    }));
}

function listIndexes(dbService: DatabaseService): string[] {
  return dbService
    .getDb()
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'index' AND name NOT LIKE 'sqlite_%' ORDER BY name`
    )
    .all()
    .map((index) => index.name);
}
