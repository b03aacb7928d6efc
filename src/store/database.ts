import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { Logger } from '../utils/logger';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS packages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tracking_number TEXT UNIQUE NOT NULL,
    carrier TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    last_update TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_packages_status ON packages(status);
  CREATE INDEX IF NOT EXISTS idx_packages_created_at ON packages(created_at);

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    package_id INTEGER NOT NULL REFERENCES packages(id) ON DELETE CASCADE,
    timestamp TEXT,
    location TEXT,
    description TEXT NOT NULL DEFAULT ''
  );

  CREATE INDEX IF NOT EXISTS idx_events_package ON events(package_id, timestamp);
`;

export function initializeSchema(db: Database.Database): void {
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
}

/**
 * Opens (creating if needed) the package database file and applies the schema.
 * Pass ':memory:' for a throwaway store.
 */
export function openDatabase(dbPath: string, logger?: Logger): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger?.info({ dir }, 'Created database directory');
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  db.pragma('synchronous = NORMAL');
  initializeSchema(db);

  logger?.debug({ dbPath }, 'Package database ready');
  return db;
}
