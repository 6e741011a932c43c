import {
  StateValidationError,
  type CompiledGraph,
  type ExecuteOptions,
  type ExecutionResult,
  type GraphExecutor,
} from '@stepwise/core';
import type { JsonObject } from '@stepwise/shared';
import { createExampleGraph, createExampleInitialState } from './exampleGraph.js';

/** A compiled graph with its state type erased, so graphs of different shapes share one registry. */
export type RegisteredGraph = {
  name: string;
  description: string;
  nodeNames: readonly string[];
  defaultInitialState(): JsonObject;
  execute(
    executor: GraphExecutor,
    runId: string,
    initialState?: JsonObject,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult<JsonObject>>;
};

export type GraphRegistry = ReadonlyMap<string, RegisteredGraph>;

export function registerGraph<S extends JsonObject>(
  graph: CompiledGraph<S>,
  params: { description: string; defaultInitialState: () => S },
): RegisteredGraph {
  return {
    name: graph.name,
    description: params.description,
    nodeNames: graph.nodeNames,
    defaultInitialState: params.defaultInitialState,
    async execute(executor, runId, initialState, options) {
      if (initialState === undefined) {
        return executor.execute(graph, runId, undefined, options);
      }

      const validated = graph.validateState(initialState);
      if (!validated.ok) {
        return {
          status: 'failed',
          runId,
          error: new StateValidationError({ runId, source: 'initial', issues: validated.issues }),
          state: null,
          lastSequence: null,
          steps: 0,
        };
      }
      return executor.execute(graph, runId, validated.state, options);
    },
  };
}

export function createGraphRegistry(graphs: readonly RegisteredGraph[]): GraphRegistry {
  return new Map(graphs.map(graph => [graph.name, graph]));
}

export function createDefaultGraphRegistry(): GraphRegistry {
  return createGraphRegistry([
    registerGraph(createExampleGraph(), {
      description: 'input -> process (x3) -> output, appending to a message log',
      defaultInitialState: () => createExampleInitialState(),
    }),
  ]);
}

export {
  createExampleGraph,
  createExampleInitialState,
  exampleStateSchema,
  MAX_PROCESSING_STEPS,
  type ExampleMessage,
  type ExampleState,
} from './exampleGraph.js';
