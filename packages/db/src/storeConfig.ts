import { StorageError } from './errors.js';

export type StoreConnectionConfig = {
  path: string;
  poolSize: number;
  busyTimeoutMs: number;
};

export const DEFAULT_POOL_SIZE = 5;
export const DEFAULT_STORE_BUSY_TIMEOUT_MS = 5_000;

const schemePattern = /^sqlite(?:\+[\w-]+)?:/i;
const knownParameters = new Set(['pool_size', 'busy_timeout_ms']);

function invalidConnectionString(message: string): StorageError {
  return new StorageError('INVALID_CONNECTION_STRING', message, { operation: 'parseConnectionString' });
}

function parsePositiveInteger(name: string, value: string): number {
  if (!/^[1-9]\d*$/.test(value)) {
    throw invalidConnectionString(`Connection parameter "${name}" must be a positive integer, got "${value}".`);
  }

  return Number(value);
}

function stripScheme(connectionString: string): string {
  const schemeMatch = schemePattern.exec(connectionString);
  if (!schemeMatch) {
    if (/^[a-z][\w+.-]*:\/\//i.test(connectionString)) {
      throw invalidConnectionString(`Unsupported connection scheme in "${redactConnectionString(connectionString)}".`);
    }
    return connectionString;
  }

  const remainder = connectionString.slice(schemeMatch[0].length);
  // sqlite:///abs/path keeps its leading slash, sqlite://rel/path does not
  return remainder.startsWith('//') ? remainder.slice(2) : remainder;
}

/**
 * Parses `sqlite:<path>?pool_size=<n>&busy_timeout_ms=<ms>`. A driver suffix such
 * as `sqlite+better-sqlite3:` is accepted and ignored; a bare path works too.
 */
export function parseStoreConnectionString(
  connectionString: string,
  overrides: Partial<Pick<StoreConnectionConfig, 'poolSize' | 'busyTimeoutMs'>> = {},
): StoreConnectionConfig {
  const trimmed = connectionString.trim();
  if (trimmed.length === 0) {
    throw invalidConnectionString('Connection string must not be empty.');
  }

  const withoutScheme = stripScheme(trimmed);
  const queryIndex = withoutScheme.indexOf('?');
  const path = queryIndex >= 0 ? withoutScheme.slice(0, queryIndex) : withoutScheme;
  const query = new URLSearchParams(queryIndex >= 0 ? withoutScheme.slice(queryIndex + 1) : '');

  if (path.length === 0) {
    throw invalidConnectionString('Connection string must name a database path or ":memory:".');
  }

  for (const name of query.keys()) {
    if (!knownParameters.has(name)) {
      throw invalidConnectionString(`Unknown connection parameter "${name}".`);
    }
  }

  const poolSizeRaw = query.get('pool_size');
  const busyTimeoutRaw = query.get('busy_timeout_ms');
  let poolSize = overrides.poolSize ?? (poolSizeRaw === null ? DEFAULT_POOL_SIZE : parsePositiveInteger('pool_size', poolSizeRaw));
  const busyTimeoutMs =
    overrides.busyTimeoutMs ??
    (busyTimeoutRaw === null ? DEFAULT_STORE_BUSY_TIMEOUT_MS : parsePositiveInteger('busy_timeout_ms', busyTimeoutRaw));

  // Every in-memory connection is its own database.
  if (path === ':memory:') {
    poolSize = 1;
  }

  return { path, poolSize, busyTimeoutMs };
}

/** Drops query parameters and any `user:password@` section before a string reaches a log line. */
export function redactConnectionString(connectionString: string): string {
  const queryIndex = connectionString.indexOf('?');
  const withoutQuery = queryIndex >= 0 ? connectionString.slice(0, queryIndex) : connectionString;
  return withoutQuery.replace(/\/\/[^/@]*@/, '//***@');
}
