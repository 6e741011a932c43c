import { defineCommand, textOption } from '../commandOptions.js';
import { DEFAULT_GRAPH_NAME, EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../constants.js';
import type { RegisteredGraph } from '../graphs/index.js';
import { toErrorMessage } from '../io.js';
import { createWorkerShell, type ProcessSummary } from '../shell.js';
import { fromLines, type WorkItem } from '../workSource.js';
import { loadCommandContext, resolveGraph } from './context.js';

export function formatProcessSummary(summary: ProcessSummary): string {
  return `Processed runs: completed=${summary.completed} cancelled=${summary.cancelled} superseded=${summary.superseded} failed=${summary.failed} crashed=${summary.crashed}`;
}

async function* withDefaultState(source: AsyncIterable<WorkItem>, graph: RegisteredGraph): AsyncGenerator<WorkItem> {
  for await (const item of source) {
    yield { runId: item.runId, initialState: item.initialState ?? graph.defaultInitialState() };
  }
}

type ServeArgs = {
  graphName: string;
};

export const serveCommand = defineCommand<ServeArgs>(
  {
    name: 'serve',
    summary: 'Execute runs read from stdin, one "<run_id> [json]" per line',
    defaults: () => ({ graphName: DEFAULT_GRAPH_NAME }),
    options: [
      textOption<ServeArgs>('graph', 'graph_name', (args, value) => {
        args.graphName = value;
      }),
    ],
  },
  async ({ graphName }, dependencies, io) => {
    const resolved = resolveGraph(dependencies, io, graphName);
    if (!resolved.ok) {
      return resolved.exitCode;
    }

    const loaded = loadCommandContext(dependencies, io);
    if (!loaded.ok) {
      return loaded.exitCode;
    }

    const shell = createWorkerShell({
      config: loaded.context.config,
      graph: resolved.graph,
      openPool: dependencies.openPool,
      logger: loaded.context.logger,
      signals: dependencies.signals,
    });

    try {
      await shell.start();
      const lines = fromLines(io.stdin, {
        signal: shell.signal,
        onInvalidLine: (_line, message) => io.stderr(`Skipping work item: ${message}`),
      });
      const summary = await shell.process(withDefaultState(lines, resolved.graph));
      io.stdout(formatProcessSummary(summary));
      return summary.failed + summary.crashed > 0 ? EXIT_RUNTIME_ERROR : EXIT_SUCCESS;
    } catch (error) {
      io.stderr(`Worker failed: ${toErrorMessage(error)}`);
      return EXIT_RUNTIME_ERROR;
    } finally {
      await shell.stop('work source drained');
    }
  },
);
