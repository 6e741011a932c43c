import { sql, type SQL } from 'drizzle-orm';
import type { StepwiseDatabase } from './connection.js';

const alreadyExistsPattern = /already exists/i;

export function isAlreadyExistsError(error: unknown): boolean {
  return error instanceof Error && alreadyExistsPattern.test(error.message);
}

function runIdempotent(db: StepwiseDatabase, statement: SQL): void {
  try {
    db.run(statement);
  } catch (error) {
    // Another process created the object between our check and our create.
    if (!isAlreadyExistsError(error)) {
      throw error;
    }
  }
}

export function migrateDatabase(db: StepwiseDatabase): void {
  runIdempotent(db, sql`CREATE TABLE IF NOT EXISTS checkpoints (
    run_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    state TEXT NOT NULL,
    produced_by TEXT NOT NULL,
    writer_id TEXT,
    written_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT checkpoints_run_id_sequence_pk
      PRIMARY KEY (run_id, sequence),
    CONSTRAINT checkpoints_sequence_ck
      CHECK (sequence >= 0),
    CONSTRAINT checkpoints_run_id_ck
      CHECK (length(run_id) > 0)
  )`);
  runIdempotent(db, sql`CREATE INDEX IF NOT EXISTS checkpoints_written_at_idx
    ON checkpoints(written_at)`);
}
