import { isAbsolute, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import {
  StorageError,
  defaultRetryPolicy,
  parseStoreConnectionString,
  type RetryPolicy,
  type StoreConnectionConfig,
} from '@stepwise/db';
import type { LogLevel } from '@stepwise/shared';

export type WorkerConfig = {
  workerName: string;
  debug: boolean;
  logLevel: LogLevel;
  databaseUrl: string;
  store: StoreConnectionConfig;
  maxSteps: number | undefined;
  concurrency: number;
  retryPolicy: RetryPolicy;
};

export class WorkerConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string, options: { cause?: unknown } = {}) {
    super(`Invalid ${variable}: ${message}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'WorkerConfigError';
    this.variable = variable;
  }
}

const truthyValues = new Set(['true', '1', 'yes', 'on']);
const falsyValues = new Set(['false', '0', 'no', 'off']);

function emptyToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value;
}

const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) {
      return false;
    }
    const normalized = value.trim().toLowerCase();
    if (truthyValues.has(normalized)) {
      return true;
    }
    if (falsyValues.has(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected one of true, false, 1, 0, yes, no, on, off' });
    return z.NEVER;
  });

const positiveInteger = z.coerce.number().int().positive();

const envSchema = z.object({
  WORKER_NAME: z.preprocess(emptyToUndefined, z.string().trim().default('stepwise-worker')),
  DEBUG: z.preprocess(emptyToUndefined, booleanFlag),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().trim().default('sqlite:./stepwise.db')),
  CHECKPOINT_POOL_SIZE: z.preprocess(emptyToUndefined, positiveInteger.optional()),
  WORKER_MAX_STEPS: z.preprocess(emptyToUndefined, positiveInteger.optional()),
  WORKER_CONCURRENCY: z.preprocess(emptyToUndefined, positiveInteger.default(1)),
  STORE_RETRY_ATTEMPTS: z.preprocess(emptyToUndefined, positiveInteger.default(defaultRetryPolicy.attempts)),
  STORE_RETRY_BASE_DELAY_MS: z.preprocess(emptyToUndefined, positiveInteger.default(defaultRetryPolicy.baseDelayMs)),
});

function resolveStorePath(path: string, cwd: string): string {
  return path === ':memory:' || isAbsolute(path) ? path : resolve(cwd, path);
}

/** Validates worker settings from environment variables; relative database paths resolve against `cwd`. */
export function parseWorkerConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const variable = issue?.path.join('.') || 'environment';
    throw new WorkerConfigError(variable, issue?.message ?? 'unknown validation error', { cause: parsed.error });
  }

  const values = parsed.data;
  let store: StoreConnectionConfig;
  try {
    store = parseStoreConnectionString(values.DATABASE_URL, { poolSize: values.CHECKPOINT_POOL_SIZE });
  } catch (error) {
    if (error instanceof StorageError) {
      throw new WorkerConfigError('DATABASE_URL', error.message, { cause: error });
    }
    throw error;
  }

  return {
    workerName: values.WORKER_NAME,
    debug: values.DEBUG,
    logLevel: values.LOG_LEVEL ?? (values.DEBUG ? 'debug' : 'info'),
    databaseUrl: values.DATABASE_URL,
    store: { ...store, path: resolveStorePath(store.path, cwd) },
    maxSteps: values.WORKER_MAX_STEPS,
    concurrency: values.WORKER_CONCURRENCY,
    retryPolicy: {
      ...defaultRetryPolicy,
      attempts: values.STORE_RETRY_ATTEMPTS,
      baseDelayMs: values.STORE_RETRY_BASE_DELAY_MS,
    },
  };
}

/** Reads `<cwd>/.env` underneath `env` (variables already set win), then validates the result. */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): WorkerConfig {
  const fromFile: Record<string, string> = {};
  loadDotenv({ path: resolve(cwd, '.env'), processEnv: fromFile });
  return parseWorkerConfig({ ...fromFile, ...env }, cwd);
}
