import { describe, expect, it, vi } from 'vitest';
import { createDatabase } from './connection.js';
import { StorageError } from './errors.js';
import { createConnectionPool } from './pool.js';

function createTestPool(poolSize: number) {
  const openDatabase = vi.fn(() => createDatabase(':memory:'));
  const pool = createConnectionPool({ path: 'pool-test.db', poolSize, busyTimeoutMs: 100, openDatabase });
  return { pool, openDatabase };
}

describe('connection pool', () => {
  it('opens connections lazily up to the pool size', async () => {
    const { pool, openDatabase } = createTestPool(2);
    expect(pool.stats.opened).toBe(0);

    const first = await pool.acquire();
    pool.release(first);
    const again = await pool.acquire();

    expect(again).toBe(first);
    expect(openDatabase).toHaveBeenCalledTimes(1);
    expect(pool.stats).toEqual({ size: 2, opened: 1, idle: 0, inUse: 1, waiting: 0, closed: false });

    pool.release(again);
    await pool.close();
  });

  it('queues acquisitions beyond the pool size and hands connections over in order', async () => {
    const { pool } = createTestPool(1);
    const held = await pool.acquire();

    const order: string[] = [];
    const firstWaiter = pool.acquire().then(db => {
      order.push('first');
      return db;
    });
    const secondWaiter = pool.acquire().then(db => {
      order.push('second');
      return db;
    });
    expect(pool.stats.waiting).toBe(2);

    pool.release(held);
    const handedOver = await firstWaiter;
    expect(handedOver).toBe(held);
    pool.release(handedOver);
    pool.release(await secondWaiter);

    expect(order).toEqual(['first', 'second']);
    expect(pool.stats).toMatchObject({ opened: 1, idle: 1, inUse: 0, waiting: 0 });
    await pool.close();
  });

  it('releases connections after withConnection even when the operation throws', async () => {
    const { pool } = createTestPool(1);

    await expect(
      pool.withConnection(() => {
        throw new Error('operation failed');
      }),
    ).rejects.toThrow('operation failed');
    expect(pool.stats.inUse).toBe(0);
    await expect(pool.withConnection(() => 'ok')).resolves.toBe('ok');
    await pool.close();
  });

  it('rejects waiters on close and waits for connections in use', async () => {
    const { pool } = createTestPool(1);
    const held = await pool.acquire();
    const waiter = pool.acquire();

    const closing = pool.close();
    await expect(waiter).rejects.toMatchObject({ code: 'POOL_CLOSED' });

    let closed = false;
    void closing.then(() => {
      closed = true;
    });
    await Promise.resolve();
    expect(closed).toBe(false);

    pool.release(held);
    await closing;
    expect(closed).toBe(true);
    expect(held.$client.open).toBe(false);
    await expect(pool.acquire()).rejects.toMatchObject({ code: 'POOL_CLOSED' });
    await expect(pool.close()).resolves.toBeUndefined();
  });

  it('uses a single connection for in-memory databases', () => {
    const pool = createConnectionPool({ path: ':memory:', poolSize: 4, busyTimeoutMs: 100 });
    expect(pool.size).toBe(1);
  });

  it('rejects invalid sizes, foreign connections and failed opens', async () => {
    expect(() => createConnectionPool({ path: 'a.db', poolSize: 0, busyTimeoutMs: 100 })).toThrow(StorageError);

    const { pool } = createTestPool(1);
    const foreign = createDatabase(':memory:');
    expect(() => pool.release(foreign)).toThrow('Released connection does not belong to this pool.');
    foreign.$client.close();

    const failing = createConnectionPool({
      path: 'broken.db',
      poolSize: 1,
      busyTimeoutMs: 100,
      openDatabase: () => {
        throw new Error('unable to open database file');
      },
    });
    await expect(failing.acquire()).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'Could not open database at "broken.db".',
    });
  });

  it('opens a fresh connection after a failed open', async () => {
    let failures = 1;
    const openDatabase = vi.fn(() => {
      if (failures > 0) {
        failures -= 1;
        throw Object.assign(new Error('unable to open database file'), { code: 'SQLITE_CANTOPEN' });
      }
      return createDatabase(':memory:');
    });
    const pool = createConnectionPool({ path: 'flaky.db', poolSize: 1, busyTimeoutMs: 100, openDatabase });

    await expect(pool.acquire()).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
    expect(pool.stats).toMatchObject({ opened: 0, inUse: 0 });

    await expect(pool.withConnection(() => 'opened')).resolves.toBe('opened');
    expect(openDatabase).toHaveBeenCalledTimes(2);
    await pool.close();
  });
});
