import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createCheckpointStore, type Checkpoint, type CheckpointStore, type ConnectionSource } from './checkpointStore.js';
import { createDatabase, type StepwiseDatabase } from './connection.js';
import { CheckpointConflictError, CheckpointSequenceGapError } from './errors.js';
import { createConnectionPool, type ConnectionPool } from './pool.js';

const openPools: ConnectionPool[] = [];
const tempDirs: string[] = [];

function createMemoryPool(): ConnectionPool {
  const pool = createConnectionPool({ path: ':memory:', poolSize: 1, busyTimeoutMs: 100 });
  openPools.push(pool);
  return pool;
}

async function createMemoryStore(writerId = 'worker-a'): Promise<CheckpointStore> {
  const store = createCheckpointStore(createMemoryPool(), { writerId });
  await store.ensureSchema();
  return store;
}

async function collect(iterable: AsyncIterable<Checkpoint>): Promise<number[]> {
  const sequences: number[] = [];
  for await (const checkpoint of iterable) {
    sequences.push(checkpoint.sequence);
  }
  return sequences;
}

async function appendSteps(store: CheckpointStore, runId: string, count: number): Promise<void> {
  for (let sequence = 0; sequence < count; sequence += 1) {
    await store.append({ runId, sequence, state: { count: sequence + 1 }, producedBy: `step-${sequence}` });
  }
}

afterEach(async () => {
  await Promise.all(openPools.splice(0).map(pool => pool.close()));
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('checkpoint store', () => {
  it('creates its schema idempotently', async () => {
    const store = createCheckpointStore(createMemoryPool());
    await store.ensureSchema();
    await expect(store.ensureSchema()).resolves.toBeUndefined();
    await expect(store.loadLatest('unknown-run')).resolves.toBeNull();
  });

  it('appends checkpoints and loads the one with the highest sequence', async () => {
    const store = await createMemoryStore();
    await store.append({
      runId: 'run-1',
      sequence: 0,
      state: { messages: ['hello'], nested: { ok: true, ratio: 0.5, missing: null } },
      producedBy: 'intake',
      writtenAt: '2026-01-01T00:00:00.000Z',
    });
    const second = await store.append({
      runId: 'run-1',
      sequence: 1,
      state: { messages: ['hello', 'world'], nested: { ok: false, ratio: 1, missing: null } },
      producedBy: 'enrich',
      writtenAt: '2026-01-01T00:00:01.000Z',
    });

    expect(second).toEqual({
      runId: 'run-1',
      sequence: 1,
      state: { messages: ['hello', 'world'], nested: { ok: false, ratio: 1, missing: null } },
      producedBy: 'enrich',
      writerId: 'worker-a',
      writtenAt: '2026-01-01T00:00:01.000Z',
    });
    await expect(store.loadLatest('run-1')).resolves.toEqual(second);
  });

  it('rejects a sequence that another writer already appended', async () => {
    const store = await createMemoryStore();
    await appendSteps(store, 'run-1', 2);

    const duplicate = store.append({ runId: 'run-1', sequence: 1, state: { count: 99 }, producedBy: 'enrich' });
    await expect(duplicate).rejects.toBeInstanceOf(CheckpointConflictError);
    await expect(duplicate).rejects.toMatchObject({ runId: 'run-1', sequence: 1, code: 'CHECKPOINT_CONFLICT' });
    await expect(store.loadLatest('run-1')).resolves.toMatchObject({ sequence: 1, state: { count: 2 } });
  });

  it('rejects sequences that would leave a gap', async () => {
    const store = await createMemoryStore();

    await expect(store.append({ runId: 'run-1', sequence: 1, state: {}, producedBy: 'intake' })).rejects.toMatchObject({
      code: 'SEQUENCE_GAP',
      expectedSequence: 0,
    });

    await appendSteps(store, 'run-1', 1);
    const gap = store.append({ runId: 'run-1', sequence: 3, state: {}, producedBy: 'finalize' });
    await expect(gap).rejects.toBeInstanceOf(CheckpointSequenceGapError);
    await expect(gap).rejects.toMatchObject({ sequence: 3, expectedSequence: 1 });
  });

  it('validates arguments before touching storage', async () => {
    const store = await createMemoryStore();

    await expect(store.append({ runId: '', sequence: 0, state: {}, producedBy: 'intake' })).rejects.toThrow(
      'Run id must be a non-empty string.',
    );
    await expect(store.append({ runId: 'run-1', sequence: -1, state: {}, producedBy: 'intake' })).rejects.toThrow(
      'Checkpoint sequence must be a non-negative integer, got -1.',
    );
    expect(() => store.listCheckpoints('run-1', { pageSize: 0 })).toThrow('Page size must be a positive integer, got 0.');
  });

  it('lists checkpoints in pages and restarts on every iteration', async () => {
    const store = await createMemoryStore();
    await appendSteps(store, 'run-1', 5);
    await appendSteps(store, 'run-2', 1);

    const listing = store.listCheckpoints('run-1', { pageSize: 2 });
    await expect(collect(listing)).resolves.toEqual([0, 1, 2, 3, 4]);
    await expect(collect(listing)).resolves.toEqual([0, 1, 2, 3, 4]);
    await expect(collect(store.listCheckpoints('run-1', { fromSequence: 3, pageSize: 2 }))).resolves.toEqual([3, 4]);
    await expect(collect(store.listCheckpoints('run-1', { pageSize: 5 }))).resolves.toEqual([0, 1, 2, 3, 4]);
    await expect(collect(store.listCheckpoints('missing-run'))).resolves.toEqual([]);
  });

  it('summarizes every run by its latest checkpoint', async () => {
    const store = await createMemoryStore();
    await appendSteps(store, 'run-b', 3);
    await appendSteps(store, 'run-a', 1);

    const runs = await store.listRuns();
    expect(runs.map(run => ({ ...run, latestWrittenAt: typeof run.latestWrittenAt }))).toEqual([
      { runId: 'run-a', checkpointCount: 1, latestSequence: 0, latestProducedBy: 'step-0', latestWrittenAt: 'string' },
      { runId: 'run-b', checkpointCount: 3, latestSequence: 2, latestProducedBy: 'step-2', latestWrittenAt: 'string' },
    ]);
  });

  it('retries appends that hit a busy database', async () => {
    const pool = createMemoryPool();
    let busyFailures = 1;
    const flakySource: ConnectionSource = {
      withConnection<T>(operation: (db: StepwiseDatabase) => T | Promise<T>): Promise<T> {
        if (busyFailures > 0) {
          busyFailures -= 1;
          return Promise.reject(Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' }));
        }
        return pool.withConnection(operation);
      },
    };
    const sleep = vi.fn(async (_ms: number) => undefined);
    const store = createCheckpointStore(flakySource, { retry: { sleep } });
    await createCheckpointStore(pool).ensureSchema();

    await expect(store.append({ runId: 'run-1', sequence: 0, state: {}, producedBy: 'intake' })).resolves.toMatchObject({
      sequence: 0,
      writerId: null,
    });
    expect(sleep).toHaveBeenCalledWith(25);
  });

  it('retries a database file that fails to open', async () => {
    let failures = 1;
    const pool = createConnectionPool({
      path: 'flaky.db',
      poolSize: 1,
      busyTimeoutMs: 100,
      openDatabase: () => {
        if (failures > 0) {
          failures -= 1;
          throw Object.assign(new Error('unable to open database file'), { code: 'SQLITE_CANTOPEN' });
        }
        return createDatabase(':memory:');
      },
    });
    openPools.push(pool);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const store = createCheckpointStore(pool, { retry: { sleep } });

    await expect(store.ensureSchema()).resolves.toBeUndefined();
    await expect(store.loadLatest('run-1')).resolves.toBeNull();
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('reports schema failures with a dedicated code', async () => {
    const brokenSource: ConnectionSource = {
      withConnection: () => Promise.reject(new Error('disk I/O error')),
    };

    await expect(createCheckpointStore(brokenSource).ensureSchema()).rejects.toMatchObject({
      code: 'SCHEMA_FAILED',
      operation: 'ensureSchema',
    });
  });

  it('lets exactly one of two processes append the same sequence', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'stepwise-store-'));
    tempDirs.push(dir);
    const path = join(dir, 'checkpoints.db');
    const poolA = createConnectionPool({ path, poolSize: 2, busyTimeoutMs: 1000 });
    const poolB = createConnectionPool({ path, poolSize: 2, busyTimeoutMs: 1000 });
    openPools.push(poolA, poolB);
    const storeA = createCheckpointStore(poolA, { writerId: 'worker-a' });
    const storeB = createCheckpointStore(poolB, { writerId: 'worker-b' });

    await Promise.all([storeA.ensureSchema(), storeB.ensureSchema()]);
    const results = await Promise.allSettled([
      storeA.append({ runId: 'shared', sequence: 0, state: { by: 'a' }, producedBy: 'intake' }),
      storeB.append({ runId: 'shared', sequence: 0, state: { by: 'b' }, producedBy: 'intake' }),
    ]);

    expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter(result => result.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ reason: expect.any(CheckpointConflictError) });
    await expect(collect(storeB.listCheckpoints('shared'))).resolves.toEqual([0]);
  });
});
