import { EventEmitter } from 'node:events';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough, Readable } from 'node:stream';
import {
  createCheckpointStore,
  createConnectionPool,
  type CheckpointStore,
  type ConnectionPool,
} from '@stepwise/db';
import { createLogger } from '@stepwise/shared';
import { parseWorkerConfig, type WorkerConfig } from './config.js';
import { createDefaultGraphRegistry } from './graphs/index.js';
import { defaultOpenPool } from './shell.js';
import type { CliDependencies, CliIo } from './types.js';

export type CapturedIo = {
  stdout: string[];
  stderr: string[];
  io: CliIo;
};

export function createCapturedIo(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    stdin?: NodeJS.ReadableStream | string;
  } = {},
): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const stdin = typeof options.stdin === 'string' ? Readable.from([options.stdin]) : options.stdin ?? Readable.from([]);

  return {
    stdout,
    stderr,
    io: {
      stdout: message => stdout.push(message),
      stderr: message => stderr.push(message),
      cwd: options.cwd ?? '/work/stepwise',
      env: options.env ?? {},
      stdin,
    },
  };
}

/** An input that stays open until the test ends it. */
export function createOpenStdin(): PassThrough {
  return new PassThrough();
}

export type TempDatabase = {
  dir: string;
  path: string;
  env: NodeJS.ProcessEnv;
  cleanup: () => void;
};

export function createTempDatabase(env: NodeJS.ProcessEnv = {}): TempDatabase {
  const dir = mkdtempSync(join(tmpdir(), 'stepwise-worker-'));
  const path = join(dir, 'checkpoints.db');
  return {
    dir,
    path,
    env: { DATABASE_URL: `sqlite:${path}`, WORKER_NAME: 'test-worker', ...env },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function createTestConfig(env: NodeJS.ProcessEnv, cwd = '/work/stepwise'): WorkerConfig {
  return parseWorkerConfig(env, cwd);
}

export function createTestDependencies(overrides: Partial<CliDependencies> = {}): CliDependencies {
  let nextRunId = 0;
  return {
    loadConfig: (env, cwd) => parseWorkerConfig(env, cwd),
    openPool: defaultOpenPool,
    createLogger: () => createLogger({ level: 'silent' }),
    graphs: createDefaultGraphRegistry(),
    createRunId: () => {
      nextRunId += 1;
      return `generated-${nextRunId}`;
    },
    signals: null,
    ...overrides,
  };
}

export function createSignalSource(): EventEmitter {
  return new EventEmitter();
}

export async function createMemoryStore(writerId = 'test-worker'): Promise<{ pool: ConnectionPool; store: CheckpointStore }> {
  const pool = createConnectionPool({ path: ':memory:', poolSize: 1, busyTimeoutMs: 100 });
  const store = createCheckpointStore(pool, { writerId });
  await store.ensureSchema();
  return { pool, store };
}
