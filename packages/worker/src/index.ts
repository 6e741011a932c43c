export { main, runCliEntrypoint } from './entrypoint.js';
export { loadWorkerConfig, parseWorkerConfig, WorkerConfigError, type WorkerConfig } from './config.js';
export {
  canTransitionShell,
  createWorkerShell,
  shutdownSignals,
  type ProcessSummary,
  type ShellState,
  type WorkerShell,
  type WorkerShellOptions,
} from './shell.js';
export { fromLines, fromList, parseWorkItemLine, type WorkItem } from './workSource.js';
export {
  createDefaultGraphRegistry,
  createGraphRegistry,
  registerGraph,
  type GraphRegistry,
  type RegisteredGraph,
} from './graphs/index.js';
export type { CliDependencies, CliIo, ExitCode } from './types.js';
