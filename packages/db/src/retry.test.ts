import { describe, expect, it, vi } from 'vitest';
import { CheckpointConflictError, StorageError } from './errors.js';
import { computeRetryDelay, defaultRetryPolicy, isTransientSqliteError, withStorageRetry } from './retry.js';

function sqliteError(code: string): Error {
  return Object.assign(new Error(`sqlite failure ${code}`), { code });
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = vi.fn(async (ms: number) => {
    delays.push(ms);
  });
  return { delays, sleep };
}

describe('storage retry', () => {
  it('doubles the delay per attempt up to the cap', () => {
    expect(computeRetryDelay(defaultRetryPolicy, 1)).toBe(25);
    expect(computeRetryDelay(defaultRetryPolicy, 2)).toBe(50);
    expect(computeRetryDelay(defaultRetryPolicy, 3)).toBe(100);
    expect(computeRetryDelay(defaultRetryPolicy, 7)).toBe(1000);
  });

  it('classifies busy and locked sqlite errors as transient', () => {
    expect(isTransientSqliteError(sqliteError('SQLITE_BUSY'))).toBe(true);
    expect(isTransientSqliteError(sqliteError('SQLITE_BUSY_SNAPSHOT'))).toBe(true);
    expect(isTransientSqliteError(sqliteError('SQLITE_LOCKED'))).toBe(true);
    expect(isTransientSqliteError(new Error('wrapped', { cause: sqliteError('SQLITE_BUSY') }))).toBe(true);
    expect(isTransientSqliteError(sqliteError('SQLITE_CONSTRAINT_PRIMARYKEY'))).toBe(false);
    expect(isTransientSqliteError(new Error('plain'))).toBe(false);
  });

  it('retries transient failures and returns the eventual result', async () => {
    const { delays, sleep } = recordingSleep();
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(sqliteError('SQLITE_BUSY'))
      .mockRejectedValueOnce(sqliteError('SQLITE_BUSY'))
      .mockResolvedValueOnce('stored');

    await expect(withStorageRetry('append', run, { sleep })).resolves.toBe('stored');
    expect(run).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([25, 50]);
  });

  it('gives up after the configured attempts', async () => {
    const { delays, sleep } = recordingSleep();
    const run = vi.fn(async () => {
      throw sqliteError('SQLITE_BUSY');
    });

    const failure = withStorageRetry('loadLatest', run, {
      sleep,
      policy: { attempts: 3, baseDelayMs: 10, maxDelayMs: 15 },
    });

    await expect(failure).rejects.toMatchObject({
      name: 'StorageError',
      code: 'RETRIES_EXHAUSTED',
      operation: 'loadLatest',
      attempts: 3,
    });
    expect(delays).toEqual([10, 15]);
  });

  it('wraps non-transient failures without retrying', async () => {
    const { sleep } = recordingSleep();
    const failure = withStorageRetry(
      'listRuns',
      async () => {
        throw new Error('no such table: checkpoints');
      },
      { sleep },
    );

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toMatchObject({
      code: 'QUERY_FAILED',
      attempts: 1,
      message: 'Storage operation "listRuns" failed: no such table: checkpoints',
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('passes checkpoint conflicts through untouched', async () => {
    const conflict = new CheckpointConflictError({ runId: 'run-1', sequence: 2 });
    const run = vi.fn(async () => {
      throw conflict;
    });

    await expect(withStorageRetry('append', run)).rejects.toBe(conflict);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('retries disk IO errors and failed connection opens', async () => {
    const { delays, sleep } = recordingSleep();
    const connectionFailure = new StorageError('CONNECTION_FAILED', 'Could not open database at "runs.db".', {
      operation: 'acquire',
      cause: sqliteError('SQLITE_CANTOPEN'),
    });
    const run = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(sqliteError('SQLITE_IOERR_WRITE'))
      .mockRejectedValueOnce(connectionFailure)
      .mockResolvedValueOnce('loaded');

    await expect(withStorageRetry('loadLatest', run, { sleep })).resolves.toBe('loaded');
    expect(run).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([25, 50]);
    expect(isTransientSqliteError(sqliteError('SQLITE_CANTOPEN'))).toBe(true);
  });

  it('surfaces a connection that never opens once the attempts run out', async () => {
    const { sleep } = recordingSleep();
    const run = vi.fn(async () => {
      throw new StorageError('CONNECTION_FAILED', 'Could not open database at "runs.db".', { operation: 'acquire' });
    });

    await expect(
      withStorageRetry('append', run, { sleep, policy: { attempts: 2, baseDelayMs: 1, maxDelayMs: 1 } }),
    ).rejects.toMatchObject({
      code: 'RETRIES_EXHAUSTED',
      attempts: 2,
      message: 'Storage operation "append" failed after 2 attempts: Could not open database at "runs.db".',
    });
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('does not retry a closed pool', async () => {
    const closed = new StorageError('POOL_CLOSED', 'Connection pool is closed.', { operation: 'acquire' });
    const run = vi.fn(async () => {
      throw closed;
    });

    await expect(withStorageRetry('append', run)).rejects.toBe(closed);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
