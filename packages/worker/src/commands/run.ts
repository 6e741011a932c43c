import type { ExecutionResult } from '@stepwise/core';
import type { JsonObject } from '@stepwise/shared';
import { defineCommand, integerOption, jsonObjectOption, textOption } from '../commandOptions.js';
import { DEFAULT_GRAPH_NAME, EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../constants.js';
import { toErrorMessage } from '../io.js';
import { createWorkerShell } from '../shell.js';
import { loadCommandContext, resolveGraph } from './context.js';

export function formatRunOutcome(graphName: string, result: ExecutionResult<JsonObject>): string {
  const prefix = `Run id=${result.runId} graph=${graphName} status=${result.status} steps=${result.steps}`;
  if (result.status === 'superseded') {
    return `${prefix} conflict_sequence=${result.sequence}`;
  }

  return `${prefix} last_sequence=${result.lastSequence ?? 'none'}`;
}

type RunArgs = {
  runId?: string;
  graphName: string;
  initialState?: JsonObject;
  maxSteps?: number;
};

export const runCommand = defineCommand<RunArgs>(
  {
    name: 'run',
    summary: 'Start or resume one run and wait for its outcome',
    defaults: () => ({ graphName: DEFAULT_GRAPH_NAME }),
    options: [
      textOption<RunArgs>('run', 'run_id', (args, value) => {
        args.runId = value;
      }),
      textOption<RunArgs>('graph', 'graph_name', (args, value) => {
        args.graphName = value;
      }),
      jsonObjectOption<RunArgs>('state', 'json_object', (args, value) => {
        args.initialState = value;
      }),
      integerOption<RunArgs>('max-steps', 'count', 1, (args, value) => {
        args.maxSteps = value;
      }),
    ],
  },
  async ({ runId: requestedRunId, graphName, initialState, maxSteps }, dependencies, io) => {
    const resolved = resolveGraph(dependencies, io, graphName);
    if (!resolved.ok) {
      return resolved.exitCode;
    }
    const { graph } = resolved;

    const loaded = loadCommandContext(dependencies, io);
    if (!loaded.ok) {
      return loaded.exitCode;
    }
    const { config, logger } = loaded.context;
    const runId = requestedRunId ?? dependencies.createRunId();

    const shell = createWorkerShell({
      config: { ...config, maxSteps: maxSteps ?? config.maxSteps },
      graph,
      openPool: dependencies.openPool,
      logger,
      signals: dependencies.signals,
    });

    try {
      await shell.start();
      // A resumed run ignores the initial state.
      const result = await shell.execute({ runId, initialState: initialState ?? graph.defaultInitialState() });
      io.stdout(formatRunOutcome(graph.name, result));

      switch (result.status) {
        case 'completed':
          io.stdout(`Final state: ${JSON.stringify(result.state)}`);
          return EXIT_SUCCESS;
        case 'superseded':
          io.stdout(`Another worker already wrote sequence ${result.sequence} for run id=${runId}; stopped without writing.`);
          return EXIT_SUCCESS;
        case 'cancelled':
          io.stderr(`Run id=${runId} was cancelled before completing; run it again to resume.`);
          return EXIT_RUNTIME_ERROR;
        case 'failed':
          io.stderr(`Run id=${runId} failed [${result.error.code}]: ${result.error.message}`);
          return EXIT_RUNTIME_ERROR;
      }
    } catch (error) {
      io.stderr(`Failed to execute run: ${toErrorMessage(error)}`);
      return EXIT_RUNTIME_ERROR;
    } finally {
      await shell.stop('run finished');
    }
  },
);
