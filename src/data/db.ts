/**
 * SQLite handle for local snapshots (better-sqlite3, synchronous)
 *
 * TICKER_RESOLVER_DB overrides the file location; ':memory:' keeps nothing on disk.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

function resolveDbPath(): string {
  const override = process.env.TICKER_RESOLVER_DB?.trim();
  return override || join(process.cwd(), 'data', 'ticker_resolver.db');
}

function migrationsDir(): string {
  return join(process.cwd(), 'src', 'data', 'migrations');
}

/** Applies each .sql file once, in name order, recording it in schema_migrations */
function migrate(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const dir = migrationsDir();
  if (!existsSync(dir)) {
    logger.warn({ dir }, 'Migrations directory not found');
    return;
  }

  const applied = new Set(
    database
      .prepare<[], { name: string }>('SELECT name FROM schema_migrations')
      .all()
      .map((row) => row.name)
  );
  const pending = readdirSync(dir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  const record = database.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)');
  for (const file of pending) {
    const sql = readFileSync(join(dir, file), 'utf-8');
    database.transaction(() => {
      database.exec(sql);
      record.run(file, Date.now());
    })();
    logger.info({ migration: file }, 'Applied migration');
  }
}

export function getDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = resolveDbPath();
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }
  migrate(database);

  logger.debug({ dbPath }, 'Database opened');
  db = database;
  return database;
}

export function closeDatabase(): void {
  if (!db) {
    return;
  }
  db.close();
  db = null;
  logger.debug('Database closed');
}
