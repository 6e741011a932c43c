import { makeLogger, type Logger } from '@stepwise/shared';
import { closeDatabase, createDatabase, type CreateDatabaseOptions, type StepwiseDatabase } from './connection.js';
import { StorageError } from './errors.js';
import type { StoreConnectionConfig } from './storeConfig.js';

export type ConnectionPoolOptions = StoreConnectionConfig & {
  openDatabase?: (path: string, options: CreateDatabaseOptions) => StepwiseDatabase;
  logger?: Logger;
};

export type ConnectionPoolStats = {
  size: number;
  opened: number;
  idle: number;
  inUse: number;
  waiting: number;
  closed: boolean;
};

type Waiter = {
  resolve: (db: StepwiseDatabase) => void;
  reject: (error: unknown) => void;
};

/**
 * A bounded set of connections to one database file. Connections are opened
 * lazily, handed out in FIFO order and only closed by `close()`.
 */
export class ConnectionPool {
  readonly path: string;
  readonly size: number;

  private readonly busyTimeoutMs: number;
  private readonly openDatabase: (path: string, options: CreateDatabaseOptions) => StepwiseDatabase;
  private readonly logger: Logger;
  private readonly all: StepwiseDatabase[] = [];
  private readonly idle: StepwiseDatabase[] = [];
  private readonly waiters: Waiter[] = [];
  private inUse = 0;
  private closed = false;
  private closing: Promise<void> | null = null;
  private notifyDrained: (() => void) | null = null;

  constructor(options: ConnectionPoolOptions) {
    if (!Number.isSafeInteger(options.poolSize) || options.poolSize < 1) {
      throw new StorageError('CONNECTION_FAILED', `Pool size must be a positive integer, got ${options.poolSize}.`, {
        operation: 'createPool',
      });
    }

    this.path = options.path;
    this.size = options.path === ':memory:' ? 1 : options.poolSize;
    this.busyTimeoutMs = options.busyTimeoutMs;
    this.openDatabase = options.openDatabase ?? createDatabase;
    this.logger = options.logger ?? makeLogger('connection-pool', { path: options.path });
  }

  get stats(): ConnectionPoolStats {
    return {
      size: this.size,
      opened: this.all.length,
      idle: this.idle.length,
      inUse: this.inUse,
      waiting: this.waiters.length,
      closed: this.closed,
    };
  }

  async acquire(): Promise<StepwiseDatabase> {
    if (this.closed) {
      throw new StorageError('POOL_CLOSED', 'Connection pool is closed.', { operation: 'acquire' });
    }

    const idleConnection = this.idle.pop();
    if (idleConnection) {
      this.inUse += 1;
      return idleConnection;
    }

    if (this.all.length < this.size) {
      const opened = this.open();
      this.inUse += 1;
      return opened;
    }

    return new Promise<StepwiseDatabase>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  release(db: StepwiseDatabase): void {
    if (!this.all.includes(db)) {
      throw new StorageError('CONNECTION_FAILED', 'Released connection does not belong to this pool.', {
        operation: 'release',
      });
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(db);
      return;
    }

    this.inUse -= 1;
    this.idle.push(db);
    if (this.inUse === 0 && this.notifyDrained) {
      this.notifyDrained();
    }
  }

  async withConnection<T>(operation: (db: StepwiseDatabase) => T | Promise<T>): Promise<T> {
    const db = await this.acquire();
    try {
      return await operation(db);
    } finally {
      this.release(db);
    }
  }

  /** Rejects queued acquisitions, waits for connections in use, then closes every handle. */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    this.closed = true;
    const rejected = this.waiters.splice(0);
    for (const waiter of rejected) {
      waiter.reject(new StorageError('POOL_CLOSED', 'Connection pool closed while waiting for a connection.', {
        operation: 'acquire',
      }));
    }

    this.closing = this.waitForDrain().then(() => {
      for (const db of this.all.splice(0)) {
        closeDatabase(db);
      }
      this.idle.splice(0);
      this.logger.info('connection pool closed');
    });

    return this.closing;
  }

  private waitForDrain(): Promise<void> {
    if (this.inUse === 0) {
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      this.notifyDrained = () => {
        this.notifyDrained = null;
        resolve();
      };
    });
  }

  private open(): StepwiseDatabase {
    try {
      const db = this.openDatabase(this.path, { busyTimeoutMs: this.busyTimeoutMs });
      this.all.push(db);
      this.logger.debug('connection opened', { opened: this.all.length, size: this.size });
      return db;
    } catch (error) {
      throw new StorageError('CONNECTION_FAILED', `Could not open database at "${this.path}".`, {
        operation: 'acquire',
        cause: error,
      });
    }
  }
}

export function createConnectionPool(options: ConnectionPoolOptions): ConnectionPool {
  return new ConnectionPool(options);
}
