import { and, asc, count, desc, eq, gte, max } from 'drizzle-orm';
import { makeLogger, type JsonObject, type Logger } from '@stepwise/shared';
import type { StepwiseDatabase } from './connection.js';
import {
  CheckpointConflictError,
  CheckpointSequenceGapError,
  StorageError,
  isUniqueConstraintViolation,
} from './errors.js';
import { migrateDatabase } from './migrate.js';
import { withStorageRetry, type RetryOptions } from './retry.js';
import { checkpoints, type CheckpointRow } from './schema.js';

export type Checkpoint = {
  runId: string;
  sequence: number;
  state: JsonObject;
  producedBy: string;
  writerId: string | null;
  writtenAt: string;
};

export type AppendCheckpointParams = {
  runId: string;
  sequence: number;
  state: JsonObject;
  producedBy: string;
  writtenAt?: string;
};

export type ListCheckpointsOptions = {
  fromSequence?: number;
  pageSize?: number;
};

export type RunSummary = {
  runId: string;
  checkpointCount: number;
  latestSequence: number;
  latestProducedBy: string;
  latestWrittenAt: string;
};

export type CheckpointStore = {
  ensureSchema(): Promise<void>;
  loadLatest(runId: string): Promise<Checkpoint | null>;
  append(params: AppendCheckpointParams): Promise<Checkpoint>;
  /** Ascending by sequence; every iteration starts over from `fromSequence`. */
  listCheckpoints(runId: string, options?: ListCheckpointsOptions): AsyncIterable<Checkpoint>;
  listRuns(): Promise<RunSummary[]>;
};

export type ConnectionSource = {
  withConnection<T>(operation: (db: StepwiseDatabase) => T | Promise<T>): Promise<T>;
};

export type CheckpointStoreOptions = {
  writerId?: string | null;
  retry?: Omit<RetryOptions, 'logger'>;
  logger?: Logger;
};

export const DEFAULT_CHECKPOINT_PAGE_SIZE = 100;

function assertRunId(runId: string): void {
  if (runId.length === 0) {
    throw new Error('Run id must be a non-empty string.');
  }
}

function assertSequence(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${value}.`);
  }
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    runId: row.runId,
    sequence: row.sequence,
    state: row.state,
    producedBy: row.producedBy,
    writerId: row.writerId,
    writtenAt: row.writtenAt,
  };
}

export function createCheckpointStore(pool: ConnectionSource, options: CheckpointStoreOptions = {}): CheckpointStore {
  const logger = options.logger ?? makeLogger('checkpoint-store');
  const writerId = options.writerId ?? null;
  const retryOptions: RetryOptions = { ...options.retry, logger };

  const withRetry = <T>(operation: string, run: (db: StepwiseDatabase) => T): Promise<T> =>
    withStorageRetry(operation, () => pool.withConnection(run), retryOptions);

  function appendInTransaction(db: StepwiseDatabase, params: AppendCheckpointParams, writtenAt: string): Checkpoint {
    return db.transaction(
      tx => {
        const latest = tx
          .select({ sequence: max(checkpoints.sequence) })
          .from(checkpoints)
          .where(eq(checkpoints.runId, params.runId))
          .get();
        const latestSequence = latest?.sequence ?? null;
        const expectedSequence = latestSequence === null ? 0 : latestSequence + 1;

        if (params.sequence < expectedSequence) {
          throw new CheckpointConflictError({ runId: params.runId, sequence: params.sequence });
        }
        if (params.sequence > expectedSequence) {
          throw new CheckpointSequenceGapError({
            runId: params.runId,
            sequence: params.sequence,
            expectedSequence,
          });
        }

        tx.insert(checkpoints)
          .values({
            runId: params.runId,
            sequence: params.sequence,
            state: params.state,
            producedBy: params.producedBy,
            writerId,
            writtenAt,
          })
          .run();

        return {
          runId: params.runId,
          sequence: params.sequence,
          state: params.state,
          producedBy: params.producedBy,
          writerId,
          writtenAt,
        };
      },
      { behavior: 'immediate' },
    );
  }

  return {
    async ensureSchema(): Promise<void> {
      try {
        await withRetry('ensureSchema', db => migrateDatabase(db));
      } catch (error) {
        if (error instanceof StorageError && error.code === 'QUERY_FAILED') {
          throw new StorageError('SCHEMA_FAILED', error.message, { operation: 'ensureSchema', cause: error.cause });
        }
        throw error;
      }
      logger.debug('checkpoint schema ready');
    },

    async loadLatest(runId: string): Promise<Checkpoint | null> {
      assertRunId(runId);
      const row = await withRetry('loadLatest', db =>
        db
          .select()
          .from(checkpoints)
          .where(eq(checkpoints.runId, runId))
          .orderBy(desc(checkpoints.sequence))
          .limit(1)
          .get(),
      );

      return row ? toCheckpoint(row) : null;
    },

    async append(params: AppendCheckpointParams): Promise<Checkpoint> {
      assertRunId(params.runId);
      assertSequence('Checkpoint sequence', params.sequence);
      if (params.producedBy.length === 0) {
        throw new Error('Checkpoint producer must be a non-empty step name.');
      }

      const writtenAt = params.writtenAt ?? new Date().toISOString();
      const checkpoint = await withRetry('append', db => {
        try {
          return appendInTransaction(db, params, writtenAt);
        } catch (error) {
          if (isUniqueConstraintViolation(error)) {
            throw new CheckpointConflictError({ runId: params.runId, sequence: params.sequence, cause: error });
          }
          throw error;
        }
      });

      logger.debug('checkpoint appended', {
        runId: checkpoint.runId,
        sequence: checkpoint.sequence,
        producedBy: checkpoint.producedBy,
      });
      return checkpoint;
    },

    listCheckpoints(runId: string, listOptions: ListCheckpointsOptions = {}): AsyncIterable<Checkpoint> {
      assertRunId(runId);
      const pageSize = listOptions.pageSize ?? DEFAULT_CHECKPOINT_PAGE_SIZE;
      const fromSequence = listOptions.fromSequence ?? 0;
      if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
        throw new Error(`Page size must be a positive integer, got ${pageSize}.`);
      }
      assertSequence('Starting sequence', fromSequence);

      const fetchPage = (startAt: number) =>
        withRetry('listCheckpoints', db =>
          db
            .select()
            .from(checkpoints)
            .where(and(eq(checkpoints.runId, runId), gte(checkpoints.sequence, startAt)))
            .orderBy(asc(checkpoints.sequence))
            .limit(pageSize)
            .all(),
        );

      return {
        async *[Symbol.asyncIterator]() {
          let startAt = fromSequence;
          while (true) {
            const rows = await fetchPage(startAt);
            for (const row of rows) {
              yield toCheckpoint(row);
            }
            if (rows.length < pageSize) {
              return;
            }
            startAt = rows[rows.length - 1].sequence + 1;
          }
        },
      };
    },

    async listRuns(): Promise<RunSummary[]> {
      const rows = await withRetry('listRuns', db => {
        const latest = db
          .select({
            runId: checkpoints.runId,
            checkpointCount: count().as('checkpoint_count'),
            latestSequence: max(checkpoints.sequence).as('latest_sequence'),
          })
          .from(checkpoints)
          .groupBy(checkpoints.runId)
          .as('latest');

        return db
          .select({
            runId: latest.runId,
            checkpointCount: latest.checkpointCount,
            latestSequence: checkpoints.sequence,
            latestProducedBy: checkpoints.producedBy,
            latestWrittenAt: checkpoints.writtenAt,
          })
          .from(latest)
          .innerJoin(
            checkpoints,
            and(eq(checkpoints.runId, latest.runId), eq(checkpoints.sequence, latest.latestSequence)),
          )
          .orderBy(asc(latest.runId))
          .all();
      });

      return rows.map(row => ({
        runId: row.runId,
        checkpointCount: row.checkpointCount,
        latestSequence: row.latestSequence,
        latestProducedBy: row.latestProducedBy,
        latestWrittenAt: row.latestWrittenAt,
      }));
    },
  };
}
