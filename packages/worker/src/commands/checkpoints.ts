import type { Checkpoint } from '@stepwise/db';
import { defineCommand, flagOption, integerOption, textOption } from '../commandOptions.js';
import { EXIT_NOT_FOUND, EXIT_RUNTIME_ERROR, EXIT_SUCCESS } from '../constants.js';
import { toErrorMessage } from '../io.js';
import { loadCommandContext, withCheckpointStore } from './context.js';

export function formatCheckpoint(checkpoint: Checkpoint): string {
  return `  #${checkpoint.sequence} producer=${checkpoint.producedBy} writer=${checkpoint.writerId ?? '-'} written_at=${checkpoint.writtenAt}`;
}

type CheckpointsArgs = {
  runId: string;
  fromSequence: number;
  showState: boolean;
};

export const checkpointsCommand = defineCommand<CheckpointsArgs>(
  {
    name: 'checkpoints',
    summary: 'Print the checkpoint history of a run',
    defaults: () => ({ runId: '', fromSequence: 0, showState: false }),
    options: [
      textOption<CheckpointsArgs>(
        'run',
        'run_id',
        (args, value) => {
          args.runId = value;
        },
        { required: true },
      ),
      integerOption<CheckpointsArgs>('from', 'sequence', 0, (args, value) => {
        args.fromSequence = value;
      }),
      flagOption<CheckpointsArgs>('show-state', args => {
        args.showState = true;
      }),
    ],
  },
  async ({ runId, fromSequence, showState }, dependencies, io) => {
    const loaded = loadCommandContext(dependencies, io);
    if (!loaded.ok) {
      return loaded.exitCode;
    }

    try {
      const listed = await withCheckpointStore(loaded.context, dependencies, async store => {
        let count = 0;
        for await (const checkpoint of store.listCheckpoints(runId, { fromSequence })) {
          if (count === 0) {
            io.stdout(`Run id=${runId} checkpoints from sequence ${fromSequence}:`);
          }
          count += 1;
          io.stdout(formatCheckpoint(checkpoint));
          if (showState) {
            io.stdout(`    state=${JSON.stringify(checkpoint.state)}`);
          }
        }
        return count;
      });

      if (listed > 0) {
        return EXIT_SUCCESS;
      }
      if (fromSequence > 0) {
        io.stdout(`Run id=${runId} has no checkpoints at or after sequence ${fromSequence}.`);
        return EXIT_SUCCESS;
      }
      io.stderr(`Run id=${runId} has no checkpoints.`);
      return EXIT_NOT_FOUND;
    } catch (error) {
      io.stderr(`Failed to read checkpoints: ${toErrorMessage(error)}`);
      return EXIT_RUNTIME_ERROR;
    }
  },
);
