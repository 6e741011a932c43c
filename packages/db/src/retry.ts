import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '@stepwise/shared';
import { CheckpointConflictError, StorageError, readSqliteErrorCode } from './errors.js';

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 5,
  baseDelayMs: 25,
  maxDelayMs: 1_000,
};

export type RetryOptions = {
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  isTransient?: (error: unknown) => boolean;
};

// Contention, disk IO and failures to open the database file.
const transientSqliteCodes = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN']);

export function isTransientSqliteError(error: unknown): boolean {
  if (error instanceof StorageError && error.code === 'CONNECTION_FAILED') {
    return true;
  }

  const code = readSqliteErrorCode(error);
  if (code === null) {
    return false;
  }

  // Extended codes such as SQLITE_BUSY_SNAPSHOT keep the primary code as prefix.
  const primaryCode = code.split('_').slice(0, 2).join('_');
  return transientSqliteCodes.has(primaryCode);
}

export function computeRetryDelay(policy: RetryPolicy, failedAttempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (failedAttempt - 1));
}

function isPassThroughError(error: unknown): boolean {
  if (error instanceof CheckpointConflictError) {
    return true;
  }
  // Connection failures fall through to the transient check.
  return error instanceof StorageError && error.code !== 'CONNECTION_FAILED';
}

export async function withStorageRetry<T>(
  operation: string,
  run: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? defaultRetryPolicy;
  const sleep: (ms: number) => Promise<void> = options.sleep ?? (ms => delay(ms));
  const isTransient = options.isTransient ?? isTransientSqliteError;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await run();
    } catch (error) {
      if (isPassThroughError(error)) {
        throw error;
      }

      if (!isTransient(error)) {
        throw new StorageError('QUERY_FAILED', `Storage operation "${operation}" failed: ${describeError(error)}`, {
          operation,
          attempts: attempt,
          cause: error,
        });
      }

      if (attempt >= attempts) {
        throw new StorageError(
          'RETRIES_EXHAUSTED',
          `Storage operation "${operation}" failed after ${attempt} attempts: ${describeError(error)}`,
          { operation, attempts: attempt, cause: error },
        );
      }

      const waitMs = computeRetryDelay(policy, attempt);
      options.logger?.warn('transient storage failure, retrying', { operation, attempt, waitMs });
      await sleep(waitMs);
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
