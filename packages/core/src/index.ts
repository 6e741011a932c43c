export { END, START } from '@stepwise/shared';
export {
  compileGraph,
  type CompiledGraph,
  type ConditionalEdge,
  type EdgeTarget,
  type GraphDefinition,
  type NodeFunction,
  type NodeResult,
  type StateSchema,
  type StateUpdate,
  type StateValidationResult,
  type TransitionResult,
} from './graph.js';
export {
  reduceState,
  resolveReducer,
  reducerStrategies,
  isReducerStrategy,
  type Reducer,
  type ReducerFunction,
  type ReducerStrategy,
} from './reducers.js';
export { canTransitionPhase, transitionPhase, isPhaseTerminal, type ExecutorPhase } from './stateMachine.js';
export {
  createGraphExecutor,
  type ExecuteOptions,
  type ExecutionResult,
  type GraphExecutor,
  type GraphExecutorDependencies,
} from './executor.js';
export {
  ExecutionError,
  GraphCompileError,
  InvalidTransitionError,
  MissingInitialStateError,
  StateValidationError,
  StepError,
  StepLimitExceededError,
  StorageFailureError,
  type ExecutionErrorCode,
  type GraphCompileErrorCode,
  type StateValidationSource,
} from './errors.js';
