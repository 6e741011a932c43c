import { defineCommand } from '../commandOptions.js';
import { EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../constants.js';
import { toErrorMessage } from '../io.js';
import { loadCommandContext, withCheckpointStore } from './context.js';

export const runsCommand = defineCommand<Record<string, never>>(
  {
    name: 'runs',
    summary: 'List runs with their latest checkpoint',
    defaults: () => ({}),
    options: [],
  },
  async (_args, dependencies, io) => {
    const loaded = loadCommandContext(dependencies, io);
    if (!loaded.ok) {
      return loaded.exitCode;
    }

    try {
      const runs = await withCheckpointStore(loaded.context, dependencies, store => store.listRuns());
      if (runs.length === 0) {
        io.stdout('No runs recorded.');
        return EXIT_SUCCESS;
      }

      for (const run of runs) {
        io.stdout(
          `Run id=${run.runId} checkpoints=${run.checkpointCount} latest_sequence=${run.latestSequence} producer=${run.latestProducedBy} written_at=${run.latestWrittenAt}`,
        );
      }
      return EXIT_SUCCESS;
    } catch (error) {
      io.stderr(`Failed to list runs: ${toErrorMessage(error)}`);
      return EXIT_RUNTIME_ERROR;
    }
  },
);
