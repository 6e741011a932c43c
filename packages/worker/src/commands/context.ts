import { createCheckpointStore, type CheckpointStore } from '@stepwise/db';
import type { Logger } from '@stepwise/shared';
import { WorkerConfigError, type WorkerConfig } from '../config.js';
import { EXIT_NOT_FOUND, EXIT_USAGE_ERROR } from '../constants.js';
import type { RegisteredGraph } from '../graphs/index.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export type CommandContext = {
  config: WorkerConfig;
  logger: Logger;
};

export type LoadedCommandContext = { ok: true; context: CommandContext } | { ok: false; exitCode: ExitCode };

export function loadCommandContext(dependencies: CliDependencies, io: CliIo): LoadedCommandContext {
  let config: WorkerConfig;
  try {
    config = dependencies.loadConfig(io.env, io.cwd);
  } catch (error) {
    if (error instanceof WorkerConfigError) {
      io.stderr(error.message);
      return { ok: false, exitCode: EXIT_USAGE_ERROR };
    }
    throw error;
  }

  return { ok: true, context: { config, logger: dependencies.createLogger(config) } };
}

export type ResolvedGraph = { ok: true; graph: RegisteredGraph } | { ok: false; exitCode: ExitCode };

export function resolveGraph(dependencies: CliDependencies, io: CliIo, graphName: string): ResolvedGraph {
  const graph = dependencies.graphs.get(graphName);
  if (!graph) {
    const known = [...dependencies.graphs.keys()].sort();
    io.stderr(`Graph "${graphName}" is not registered. Known graphs: ${known.length > 0 ? known.join(', ') : '(none)'}.`);
    return { ok: false, exitCode: EXIT_NOT_FOUND };
  }

  return { ok: true, graph };
}

/** Opens a pool for the duration of `operation` against an up-to-date checkpoint schema. */
export async function withCheckpointStore<T>(
  context: CommandContext,
  dependencies: CliDependencies,
  operation: (store: CheckpointStore) => Promise<T>,
): Promise<T> {
  const pool = dependencies.openPool(context.config.store, context.logger);
  try {
    const store = createCheckpointStore(pool, {
      writerId: context.config.workerName,
      retry: { policy: context.config.retryPolicy },
      logger: context.logger.child({ component: 'checkpoint-store' }),
    });
    await store.ensureSchema();
    return await operation(store);
  } finally {
    await pool.close();
  }
}
