/**
 * SQLite connection for the settings override store.
 *
 * The schema is created on open; there is a single table so migrations are a
 * list of idempotent statements.
 */
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type Db = Database.Database;

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS settings_overrides (
     key        TEXT PRIMARY KEY,
     value      TEXT NOT NULL,
     updated_at TEXT NOT NULL
   )`,
];

function migrate(db: Db): void {
  for (const sql of MIGRATIONS) db.exec(sql);
}

export function openDb(dbPath: string): Db {
  if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  migrate(db);
  return db;
}

let _db: Db | null = null;

/** Process-wide connection at SETTINGS_DB_PATH, opened on first use. */
export function getDb(): Db {
  if (!_db) {
    _db = openDb(env.SETTINGS_DB_PATH);
    logger.info('Settings database opened', { path: env.SETTINGS_DB_PATH });
  }
  return _db;
}

export function closeDb(): void {
  _db?.close();
  _db = null;
}

/** Fresh in-memory database with the schema applied. */
export function openTestDb(): Db {
  return openDb(':memory:');
}
