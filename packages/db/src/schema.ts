import { sql } from 'drizzle-orm';
import { check, index, integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { JsonObject } from '@stepwise/shared';

const utcNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

export const checkpoints = sqliteTable(
  'checkpoints',
  {
    runId: text('run_id').notNull(),
    sequence: integer('sequence').notNull(),
    state: text('state', { mode: 'json' }).$type<JsonObject>().notNull(),
    producedBy: text('produced_by').notNull(),
    writerId: text('writer_id'),
    writtenAt: text('written_at').notNull().default(utcNow),
  },
  table => ({
    runSequencePk: primaryKey({ name: 'checkpoints_run_id_sequence_pk', columns: [table.runId, table.sequence] }),
    sequenceCheck: check('checkpoints_sequence_ck', sql`${table.sequence} >= 0`),
    runIdCheck: check('checkpoints_run_id_ck', sql`length(${table.runId}) > 0`),
    writtenAtIdx: index('checkpoints_written_at_idx').on(table.writtenAt),
  }),
);

export type CheckpointRow = typeof checkpoints.$inferSelect;
export type CheckpointInsert = typeof checkpoints.$inferInsert;
