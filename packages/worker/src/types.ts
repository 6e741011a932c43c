import { randomUUID } from 'node:crypto';
import { createLogger, type Logger } from '@stepwise/shared';
import { loadWorkerConfig, type WorkerConfig } from './config.js';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { createDefaultGraphRegistry, type GraphRegistry } from './graphs/index.js';
import { defaultOpenPool, type OpenPool, type SignalSource } from './shell.js';

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_USAGE_ERROR
  | typeof EXIT_NOT_FOUND
  | typeof EXIT_RUNTIME_ERROR;

export type CliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
};

export type CliDependencies = {
  loadConfig: (env: NodeJS.ProcessEnv, cwd: string) => WorkerConfig;
  openPool: OpenPool;
  createLogger: (config: WorkerConfig) => Logger;
  graphs: GraphRegistry;
  createRunId: () => string;
  signals: SignalSource | null;
};

export type MainOptions = {
  dependencies?: CliDependencies;
  io?: CliIo;
};

export type CliEntrypointRuntime = {
  argv: string[];
  exit: (code: number) => void;
};

export const defaultDependencies: CliDependencies = {
  loadConfig: (env, cwd) => loadWorkerConfig(env, cwd),
  openPool: defaultOpenPool,
  // stdout carries command output
  createLogger: config => createLogger({ level: config.logLevel, pretty: config.debug, stderr: true }).child({ service: 'stepwise' }),
  graphs: createDefaultGraphRegistry(),
  createRunId: () => randomUUID(),
  signals: process,
};
