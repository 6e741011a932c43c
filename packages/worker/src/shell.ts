import { createGraphExecutor, type ExecutionResult, type GraphExecutor } from '@stepwise/core';
import {
  createCheckpointStore,
  createConnectionPool,
  redactConnectionString,
  type ConnectionPool,
  type StoreConnectionConfig,
} from '@stepwise/db';
import { makeLogger, type JsonObject, type Logger, type RunOutcomeStatus } from '@stepwise/shared';
import type { WorkerConfig } from './config.js';
import type { RegisteredGraph } from './graphs/index.js';
import type { WorkItem } from './workSource.js';

export type ShellState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped';

const validShellTransitions: Record<ShellState, ShellState[]> = {
  created: ['starting', 'stopped'],
  starting: ['running', 'stopped'],
  running: ['stopping'],
  stopping: ['stopped'],
  stopped: [],
};

export function canTransitionShell(from: ShellState, to: ShellState): boolean {
  return validShellTransitions[from].includes(to);
}

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export const shutdownSignals: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export type OpenPool = (config: StoreConnectionConfig, logger: Logger) => ConnectionPool;

export type WorkerShellOptions = {
  config: WorkerConfig;
  graph: RegisteredGraph;
  openPool?: OpenPool;
  logger?: Logger;
  /** Where SIGINT/SIGTERM are observed; `null` installs no handlers. */
  signals?: SignalSource | null;
};

export type ProcessSummary = Record<RunOutcomeStatus, number> & { crashed: number };

export type WorkerShell = {
  readonly state: ShellState;
  /** Aborted as soon as the shell starts stopping. */
  readonly signal: AbortSignal;
  start(): Promise<void>;
  /** Runs one item to an outcome; failures come back as a `failed` result. */
  execute(item: WorkItem): Promise<ExecutionResult<JsonObject>>;
  /** Pulls items until the source ends or the shell stops, keeping at most `concurrency` runs in flight. */
  process(source: AsyncIterable<WorkItem>): Promise<ProcessSummary>;
  stop(reason?: string): Promise<void>;
};

export const defaultOpenPool: OpenPool = (config, logger) =>
  createConnectionPool({ ...config, logger: logger.child({ component: 'pool' }) });

function emptySummary(): ProcessSummary {
  return { completed: 0, cancelled: 0, superseded: 0, failed: 0, crashed: 0 };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createWorkerShell(options: WorkerShellOptions): WorkerShell {
  const { config, graph } = options;
  const openPool = options.openPool ?? defaultOpenPool;
  const signals: SignalSource | null = options.signals === undefined ? process : options.signals;
  const logger = (options.logger ?? makeLogger('worker')).child({ worker: config.workerName });

  let state: ShellState = 'created';
  let pool: ConnectionPool | null = null;
  let executor: GraphExecutor | null = null;
  let startup: Promise<void> | null = null;
  let activeProcess: Promise<ProcessSummary> | null = null;
  const activeRuns = new Set<Promise<void>>();
  let stopping: Promise<void> | null = null;
  const cancellation = new AbortController();
  let notifyStopRequested: () => void = () => undefined;
  const stopRequested = new Promise<void>(resolve => {
    notifyStopRequested = resolve;
  });

  const moveTo = (next: ShellState): void => {
    if (!canTransitionShell(state, next)) {
      throw new Error(`Invalid worker shell transition: ${state} -> ${next}`);
    }
    state = next;
  };

  const onSignal = (signal: ShutdownSignal) => () => {
    logger.info('shutdown requested', { signal });
    shell.stop(signal).catch((error: unknown) => {
      logger.error('shutdown failed', { error: describeError(error) });
    });
  };
  const signalHandlers = new Map<ShutdownSignal, () => void>(shutdownSignals.map(signal => [signal, onSignal(signal)]));

  const removeSignalHandlers = (): void => {
    if (!signals) {
      return;
    }
    for (const [signal, handler] of signalHandlers) {
      signals.off(signal, handler);
    }
  };

  function track<T>(run: Promise<T>): Promise<T> {
    const settled: Promise<void> = run
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        activeRuns.delete(settled);
      });
    activeRuns.add(settled);
    return run;
  }

  async function executeItem(activeExecutor: GraphExecutor, item: WorkItem): Promise<ExecutionResult<JsonObject>> {
    const runLogger = logger.child({ runId: item.runId });
    const result = await graph.execute(activeExecutor, item.runId, item.initialState, {
      signal: cancellation.signal,
      maxSteps: config.maxSteps,
      onCheckpoint: checkpoint => {
        runLogger.debug('checkpoint written', { sequence: checkpoint.sequence, producedBy: checkpoint.producedBy });
      },
    });

    if (result.status === 'failed') {
      runLogger.error('run failed', {
        code: result.error.code,
        error: result.error.message,
        lastSequence: result.lastSequence,
      });
    } else {
      runLogger.info('run finished', { status: result.status, steps: result.steps });
    }
    return result;
  }

  async function consume(activeExecutor: GraphExecutor, source: AsyncIterable<WorkItem>): Promise<ProcessSummary> {
    const summary = emptySummary();
    const inFlight = new Set<Promise<void>>();
    const iterator = source[Symbol.asyncIterator]();
    const stopped = stopRequested.then(() => null);

    const runItem = async (item: WorkItem): Promise<void> => {
      try {
        const result = await track(executeItem(activeExecutor, item));
        summary[result.status] += 1;
      } catch (error) {
        summary.crashed += 1;
        logger.error('run crashed', { runId: item.runId, error: describeError(error) });
      }
    };

    try {
      while (state === 'running') {
        while (inFlight.size >= config.concurrency) {
          await Promise.race(inFlight);
        }
        const next = await Promise.race([iterator.next(), stopped]);
        if (next === null || next.done) {
          break;
        }

        const task = runItem(next.value).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }
    } finally {
      await Promise.all(inFlight);
      if (state !== 'running') {
        iterator.return?.().catch((error: unknown) => {
          logger.warn('work source did not close cleanly', { error: describeError(error) });
        });
      }
    }

    logger.info('work source drained', { ...summary });
    return summary;
  }

  async function openStore(): Promise<void> {
    const openedPool = openPool(config.store, logger);
    try {
      const store = createCheckpointStore(openedPool, {
        writerId: config.workerName,
        retry: { policy: config.retryPolicy },
        logger: logger.child({ component: 'checkpoint-store' }),
      });
      await store.ensureSchema();
      executor = createGraphExecutor({ store, logger: logger.child({ component: 'executor' }) });
    } catch (error) {
      moveTo('stopped');
      await openedPool.close();
      throw error;
    }

    if (cancellation.signal.aborted) {
      moveTo('stopped');
      await openedPool.close();
      throw new Error('Worker shell was stopped before it finished starting.');
    }

    pool = openedPool;
    if (signals) {
      for (const [signal, handler] of signalHandlers) {
        signals.on(signal, handler);
      }
    }
    moveTo('running');
    logger.info('worker started', {
      graph: graph.name,
      database: redactConnectionString(config.databaseUrl),
      poolSize: openedPool.size,
      concurrency: config.concurrency,
      debug: config.debug,
    });
  }

  const shell: WorkerShell = {
    get state() {
      return state;
    },

    get signal() {
      return cancellation.signal;
    },

    start(): Promise<void> {
      if (state !== 'created') {
        return Promise.reject(new Error(`Worker shell cannot start from state "${state}".`));
      }

      moveTo('starting');
      startup = openStore();
      return startup;
    },

    execute(item: WorkItem): Promise<ExecutionResult<JsonObject>> {
      if (state !== 'running' || !executor) {
        return Promise.reject(new Error(`Worker shell cannot execute runs in state "${state}".`));
      }
      return track(executeItem(executor, item));
    },

    process(source: AsyncIterable<WorkItem>): Promise<ProcessSummary> {
      if (state !== 'running' || !executor) {
        return Promise.reject(new Error(`Worker shell cannot process work in state "${state}".`));
      }
      if (activeProcess) {
        return Promise.reject(new Error('Worker shell is already processing a work source.'));
      }

      const processing = consume(executor, source).finally(() => {
        activeProcess = null;
      });
      activeProcess = processing;
      return processing;
    },

    stop(reason = 'requested'): Promise<void> {
      if (stopping) {
        return stopping;
      }
      if (state === 'created') {
        moveTo('stopped');
        return Promise.resolve();
      }
      if (state === 'stopped') {
        return Promise.resolve();
      }
      if (state === 'starting') {
        // start() sees the abort once the schema is ready and closes its own pool.
        logger.info('worker stopping during startup', { reason });
        notifyStopRequested();
        cancellation.abort();
        stopping = (startup ?? Promise.resolve()).then(
          () => undefined,
          () => undefined,
        );
        return stopping;
      }

      moveTo('stopping');
      logger.info('worker stopping', { reason });
      notifyStopRequested();
      cancellation.abort();

      const processing = activeProcess;
      stopping = (async () => {
        try {
          if (processing) {
            await processing;
          }
          await Promise.all(activeRuns);
        } finally {
          removeSignalHandlers();
          await pool?.close();
          moveTo('stopped');
          logger.info('worker stopped');
        }
      })();
      return stopping;
    },
  };

  return shell;
}
