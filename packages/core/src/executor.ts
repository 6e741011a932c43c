import { CheckpointConflictError, StorageError, type Checkpoint, type CheckpointStore } from '@stepwise/db';
import { END, START, makeLogger, type JsonObject, type JsonValue, type Logger } from '@stepwise/shared';
import {
  InvalidTransitionError,
  MissingInitialStateError,
  StateValidationError,
  StepError,
  StepLimitExceededError,
  StorageFailureError,
  type ExecutionError,
} from './errors.js';
import type { CompiledGraph, NodeResult, StateUpdate } from './graph.js';
import { transitionPhase, type ExecutorPhase } from './stateMachine.js';

export type ExecuteOptions = {
  /** Checked before each step and once more after it returns; a running step is never interrupted. */
  signal?: AbortSignal;
  /** Upper bound on checkpoints for the whole run, not just this call. */
  maxSteps?: number;
  /** Called after each append; a throwing observer is logged and does not fail the run. */
  onCheckpoint?: (checkpoint: Checkpoint) => void | Promise<void>;
};

export type ExecutionResult<S extends JsonObject> =
  | {
      status: 'completed';
      runId: string;
      state: S;
      steps: number;
      lastSequence: number | null;
    }
  | {
      status: 'cancelled';
      runId: string;
      state: S;
      steps: number;
      lastSequence: number | null;
      cancelled: true;
    }
  | {
      status: 'superseded';
      runId: string;
      sequence: number;
      steps: number;
    }
  | {
      status: 'failed';
      runId: string;
      error: ExecutionError;
      state: S | null;
      lastSequence: number | null;
      steps: number;
    };

export type GraphExecutorDependencies = {
  store: Pick<CheckpointStore, 'loadLatest' | 'append'>;
  logger?: Logger;
};

export type GraphExecutor = {
  execute<S extends JsonObject>(
    graph: CompiledGraph<S>,
    runId: string,
    initialState?: S,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult<S>>;
};

function deepFreeze(value: JsonValue): void {
  if (value === null || typeof value !== 'object') {
    return;
  }
  for (const nested of Array.isArray(value) ? value : Object.values(value)) {
    deepFreeze(nested);
  }
  Object.freeze(value);
}

function frozenCopy<S extends JsonObject>(state: S): S {
  const copy = structuredClone(state);
  deepFreeze(copy);
  return copy;
}

function isUpdateList<S extends JsonObject>(
  result: StateUpdate<S> | readonly StateUpdate<S>[],
): result is readonly StateUpdate<S>[] {
  return Array.isArray(result);
}

function toUpdateList<S extends JsonObject>(result: NodeResult<S>): readonly unknown[] {
  if (result === undefined || result === null) {
    return [];
  }
  return isUpdateList(result) ? result : [result];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createGraphExecutor(dependencies: GraphExecutorDependencies): GraphExecutor {
  const { store } = dependencies;
  const baseLogger = dependencies.logger ?? makeLogger('executor');

  return {
    async execute<S extends JsonObject>(
      graph: CompiledGraph<S>,
      runId: string,
      initialState?: S,
      options: ExecuteOptions = {},
    ): Promise<ExecutionResult<S>> {
      const log = baseLogger.child({ graph: graph.name, runId });
      const { signal, maxSteps } = options;
      let phase: ExecutorPhase = 'idle';
      let steps = 0;
      let lastSequence: number | null = null;
      let persistedState: S | null = null;

      const moveTo = (next: ExecutorPhase): void => {
        phase = transitionPhase(phase, next);
      };

      const fail = (error: ExecutionError): ExecutionResult<S> => {
        moveTo('failed');
        log.warn('run failed', { code: error.code, error: error.message, steps, lastSequence });
        return { status: 'failed', runId, error, state: persistedState, lastSequence, steps };
      };

      const finish = (state: S, cancelled: boolean): ExecutionResult<S> => {
        moveTo('terminated');
        if (cancelled) {
          log.info('run cancelled', { steps, lastSequence });
          return { status: 'cancelled', runId, state, steps, lastSequence, cancelled: true };
        }
        log.info('run completed', { steps, lastSequence });
        return { status: 'completed', runId, state, steps, lastSequence };
      };

      moveTo('loading');

      let latest: Checkpoint | null;
      try {
        latest = await store.loadLatest(runId);
      } catch (error) {
        if (error instanceof StorageError) {
          return fail(new StorageFailureError({ runId, operation: 'loadLatest', cause: error }));
        }
        throw error;
      }

      let state: S;
      let nextSequence: number;
      let resumeFrom: string;
      if (latest) {
        const loaded = graph.validateState(latest.state);
        if (!loaded.ok) {
          return fail(new StateValidationError({ runId, source: 'checkpoint', issues: loaded.issues }));
        }
        state = loaded.state;
        persistedState = state;
        lastSequence = latest.sequence;
        nextSequence = latest.sequence + 1;
        resumeFrom = latest.producedBy;
        log.debug('resuming run', { sequence: latest.sequence, producedBy: latest.producedBy });
      } else {
        if (initialState === undefined) {
          return fail(new MissingInitialStateError({ runId }));
        }
        const initial = graph.validateState(initialState);
        if (!initial.ok) {
          return fail(new StateValidationError({ runId, source: 'initial', issues: initial.issues }));
        }
        state = initial.state;
        nextSequence = 0;
        resumeFrom = START;
        log.debug('starting run');
      }

      const entry = graph.resolveNext(resumeFrom, frozenCopy(state));
      if (!entry.ok) {
        return fail(new InvalidTransitionError({ runId, from: resumeFrom, target: entry.target, reason: entry.reason, cause: entry.cause }));
      }
      if (entry.target === END) {
        return finish(state, false);
      }

      let currentStep = entry.target;
      moveTo('running');

      for (;;) {
        if (signal?.aborted) {
          return finish(state, true);
        }
        if (maxSteps !== undefined && nextSequence >= maxSteps) {
          return fail(new StepLimitExceededError({ runId, maxSteps }));
        }

        const node = graph.getNode(currentStep);
        // Unreachable: resolveNext only yields END or compiled node names.
        if (!node) {
          return fail(
            new InvalidTransitionError({ runId, from: currentStep, target: currentStep, reason: `Step "${currentStep}" is not a node.` }),
          );
        }

        log.debug('step started', { step: currentStep, sequence: nextSequence });
        let result: NodeResult<S>;
        try {
          result = await node(frozenCopy(state));
        } catch (error) {
          return fail(new StepError({ runId, step: currentStep, sequence: nextSequence, cause: error }));
        }
        const cancelledAfterStep = signal?.aborted === true;

        let reduced: JsonObject;
        try {
          reduced = graph.reduce(state, toUpdateList(result));
        } catch (error) {
          return fail(new StateValidationError({ runId, source: 'update', issues: [describeError(error)], cause: error }));
        }
        const validated = graph.validateState(reduced);
        if (!validated.ok) {
          return fail(new StateValidationError({ runId, source: 'update', issues: validated.issues }));
        }

        moveTo('persisting');
        let checkpoint: Checkpoint;
        try {
          checkpoint = await store.append({
            runId,
            sequence: nextSequence,
            state: validated.state,
            producedBy: currentStep,
          });
        } catch (error) {
          if (error instanceof CheckpointConflictError) {
            moveTo('terminated');
            log.info('run advanced by another writer, abandoning attempt', { step: currentStep, sequence: nextSequence });
            return { status: 'superseded', runId, sequence: nextSequence, steps };
          }
          if (error instanceof StorageError) {
            return fail(new StorageFailureError({ runId, operation: 'append', cause: error }));
          }
          throw error;
        }

        steps += 1;
        state = validated.state;
        persistedState = state;
        lastSequence = checkpoint.sequence;
        nextSequence = checkpoint.sequence + 1;
        log.debug('step finished', { step: currentStep, sequence: checkpoint.sequence });
        if (options.onCheckpoint) {
          try {
            await options.onCheckpoint(checkpoint);
          } catch (error) {
            log.warn('checkpoint observer failed', { sequence: checkpoint.sequence, error: describeError(error) });
          }
        }

        if (cancelledAfterStep) {
          return finish(state, true);
        }

        const next = graph.resolveNext(currentStep, frozenCopy(state));
        if (!next.ok) {
          return fail(new InvalidTransitionError({ runId, from: currentStep, target: next.target, reason: next.reason, cause: next.cause }));
        }
        if (next.target === END) {
          return finish(state, false);
        }

        currentStep = next.target;
        moveTo('running');
      }
    },
  };
}
