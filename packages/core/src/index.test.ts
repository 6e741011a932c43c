import { describe, expect, it } from 'vitest';
import * as core from './index.js';

describe('core index exports', () => {
  it('re-exports graph compilation, the executor and phase helpers', () => {
    expect(typeof core.compileGraph).toBe('function');
    expect(typeof core.createGraphExecutor).toBe('function');
    expect(typeof core.reduceState).toBe('function');
    expect(typeof core.canTransitionPhase).toBe('function');
    expect(core.START).toBe('__start__');
    expect(core.END).toBe('__end__');
  });

  it('keeps execution errors under one base class', () => {
    const cause = new Error('disk full');
    const error = new core.StorageFailureError({ runId: 'run-1', operation: 'append', cause });

    expect(error).toBeInstanceOf(core.ExecutionError);
    expect(error.code).toBe('STORAGE_FAILED');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Checkpoint append failed for run "run-1": disk full');
    expect(new core.MissingInitialStateError({ runId: 'run-1' })).toBeInstanceOf(core.ExecutionError);
  });
});
