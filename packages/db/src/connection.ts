import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type StepwiseDatabase = ReturnType<typeof createDatabase>;

export type CreateDatabaseOptions = {
  busyTimeoutMs?: number;
};

export const DEFAULT_BUSY_TIMEOUT_MS = 5_000;

export function createDatabase(path = ':memory:', options: CreateDatabaseOptions = {}) {
  const sqlite = new Database(path, { timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS });
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  return drizzle(sqlite, { schema });
}

export function closeDatabase(db: StepwiseDatabase): void {
  if (db.$client.open) {
    db.$client.close();
  }
}
