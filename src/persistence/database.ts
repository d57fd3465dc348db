import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';
import { config } from '../config/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

export const DEFAULT_DATABASE_PATH = join(__dirname, '../../data', 'companion.db');

const IN_MEMORY = ':memory:';

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

/** Shared connection, opened and migrated on first use. */
export function getDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(config.databasePath || DEFAULT_DATABASE_PATH);
  }
  return db;
}

export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Opening database');

  if (dbPath !== IN_MEMORY) {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const connection = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    connection.pragma('journal_mode = WAL');
  }

  runMigrations(connection);
  return connection;
}

export function runMigrations(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS interactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      input TEXT NOT NULL,
      category TEXT NOT NULL,
      confidence REAL NOT NULL,
      resolution TEXT NOT NULL,
      matched_rule_count INTEGER NOT NULL DEFAULT 0,
      entities TEXT NOT NULL,
      foreground_app TEXT,
      activity_type TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_interactions_created ON interactions(created_at);
    CREATE INDEX IF NOT EXISTS idx_interactions_category ON interactions(category);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
