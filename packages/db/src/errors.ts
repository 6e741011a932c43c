export type StorageErrorCode =
  | 'CONNECTION_FAILED'
  | 'POOL_CLOSED'
  | 'SCHEMA_FAILED'
  | 'QUERY_FAILED'
  | 'RETRIES_EXHAUSTED'
  | 'SEQUENCE_GAP'
  | 'INVALID_CONNECTION_STRING';

export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly operation: string;
  readonly attempts: number;

  constructor(
    code: StorageErrorCode,
    message: string,
    options: {
      operation: string;
      attempts?: number;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StorageError';
    this.code = code;
    this.operation = options.operation;
    this.attempts = options.attempts ?? 1;
  }
}

export class CheckpointSequenceGapError extends StorageError {
  readonly runId: string;
  readonly sequence: number;
  readonly expectedSequence: number;

  constructor(params: { runId: string; sequence: number; expectedSequence: number }) {
    super(
      'SEQUENCE_GAP',
      `Checkpoint sequence ${params.sequence} for run "${params.runId}" would leave a gap; expected ${params.expectedSequence}.`,
      { operation: 'append' },
    );
    this.name = 'CheckpointSequenceGapError';
    this.runId = params.runId;
    this.sequence = params.sequence;
    this.expectedSequence = params.expectedSequence;
  }
}

/**
 * Another writer already appended this sequence for the run. Callers reload the
 * latest checkpoint instead of retrying the same append.
 */
export class CheckpointConflictError extends Error {
  readonly code = 'CHECKPOINT_CONFLICT';
  readonly runId: string;
  readonly sequence: number;

  constructor(params: { runId: string; sequence: number; cause?: unknown }) {
    super(
      `Checkpoint sequence ${params.sequence} for run "${params.runId}" was already written.`,
      params.cause === undefined ? undefined : { cause: params.cause },
    );
    this.name = 'CheckpointConflictError';
    this.runId = params.runId;
    this.sequence = params.sequence;
  }
}

export function readSqliteErrorCode(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if ('code' in current && typeof current.code === 'string' && current.code.startsWith('SQLITE_')) {
      return current.code;
    }
    current = current.cause;
  }

  return null;
}

export function isUniqueConstraintViolation(error: unknown): boolean {
  const code = readSqliteErrorCode(error);
  return code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}
