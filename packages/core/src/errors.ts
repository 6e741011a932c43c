export type GraphCompileErrorCode =
  | 'RESERVED_NODE_NAME'
  | 'INVALID_NODE'
  | 'INVALID_EDGE'
  | 'MISSING_START_EDGE'
  | 'EDGE_FROM_END'
  | 'UNKNOWN_EDGE_SOURCE'
  | 'UNKNOWN_EDGE_TARGET'
  | 'MISSING_OUTGOING_EDGE'
  | 'UNREACHABLE_NODE'
  | 'INVALID_REDUCER';

export class GraphCompileError extends Error {
  readonly code: GraphCompileErrorCode;
  readonly graphName: string;
  readonly names: readonly string[];

  constructor(
    code: GraphCompileErrorCode,
    message: string,
    options: {
      graphName: string;
      names: readonly string[];
    },
  ) {
    super(message);
    this.name = 'GraphCompileError';
    this.code = code;
    this.graphName = options.graphName;
    this.names = options.names;
  }
}

export type ExecutionErrorCode =
  | 'STEP_FAILED'
  | 'INVALID_TRANSITION'
  | 'STEP_LIMIT_EXCEEDED'
  | 'MISSING_INITIAL_STATE'
  | 'STATE_VALIDATION_FAILED'
  | 'STORAGE_FAILED';

/** Base for every error reported through a `failed` execution result. */
export class ExecutionError extends Error {
  readonly code: ExecutionErrorCode;
  readonly runId: string;

  constructor(
    code: ExecutionErrorCode,
    message: string,
    options: {
      runId: string;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExecutionError';
    this.code = code;
    this.runId = options.runId;
  }
}

export class StepError extends ExecutionError {
  readonly step: string;
  readonly sequence: number;

  constructor(params: { runId: string; step: string; sequence: number; cause: unknown }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super('STEP_FAILED', `Step "${params.step}" failed at sequence ${params.sequence}: ${reason}`, {
      runId: params.runId,
      cause: params.cause,
    });
    this.name = 'StepError';
    this.step = params.step;
    this.sequence = params.sequence;
  }
}

export class InvalidTransitionError extends ExecutionError {
  readonly from: string;
  readonly target: string | null;

  constructor(params: { runId: string; from: string; target: string | null; reason: string; cause?: unknown }) {
    super('INVALID_TRANSITION', params.reason, { runId: params.runId, cause: params.cause });
    this.name = 'InvalidTransitionError';
    this.from = params.from;
    this.target = params.target;
  }
}

export class StepLimitExceededError extends ExecutionError {
  readonly maxSteps: number;

  constructor(params: { runId: string; maxSteps: number }) {
    super('STEP_LIMIT_EXCEEDED', `Run "${params.runId}" reached its limit of ${params.maxSteps} steps.`, {
      runId: params.runId,
    });
    this.name = 'StepLimitExceededError';
    this.maxSteps = params.maxSteps;
  }
}

export class MissingInitialStateError extends ExecutionError {
  constructor(params: { runId: string }) {
    super('MISSING_INITIAL_STATE', `Run "${params.runId}" has no checkpoint and no initial state was given.`, {
      runId: params.runId,
    });
    this.name = 'MissingInitialStateError';
  }
}

export type StateValidationSource = 'initial' | 'checkpoint' | 'update';

export class StateValidationError extends ExecutionError {
  readonly source: StateValidationSource;
  readonly issues: readonly string[];

  constructor(params: { runId: string; source: StateValidationSource; issues: readonly string[]; cause?: unknown }) {
    super('STATE_VALIDATION_FAILED', `Invalid ${params.source} state for run "${params.runId}": ${params.issues.join('; ')}`, {
      runId: params.runId,
      cause: params.cause,
    });
    this.name = 'StateValidationError';
    this.source = params.source;
    this.issues = params.issues;
  }
}

export class StorageFailureError extends ExecutionError {
  readonly operation: 'loadLatest' | 'append';

  constructor(params: { runId: string; operation: 'loadLatest' | 'append'; cause: unknown }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super('STORAGE_FAILED', `Checkpoint ${params.operation} failed for run "${params.runId}": ${reason}`, {
      runId: params.runId,
      cause: params.cause,
    });
    this.name = 'StorageFailureError';
    this.operation = params.operation;
  }
}
