import Database from 'better-sqlite3';
import { openDatabase } from '../store/database';
import { SqlitePackageStore } from '../store/sqlite-package.store';
import { Clock } from '../types/domain.types';
import { createSilentLogger } from '../utils/logger';

/**
 * Clock that starts at `start` and advances one second per call.
 */
export function steppingClock(start = '2024-03-01T00:00:00.000Z'): Clock {
  let next = new Date(start).getTime();
  return () => {
    const now = new Date(next);
    next += 1000;
    return now;
  };
}

export interface TestStore {
  db: Database.Database;
  store: SqlitePackageStore;
}

export function createTestStore(clock: Clock = steppingClock()): TestStore {
  const db = openDatabase(':memory:');
  const store = new SqlitePackageStore(db, createSilentLogger(), clock);
  return { db, store };
}

export function countEvents(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM events').get();
  return row?.count ?? 0;
}
