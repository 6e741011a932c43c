import { defineCommand } from '../commandOptions.js';
import { EXIT_SUCCESS } from '../constants.js';

export const graphsCommand = defineCommand<Record<string, never>>(
  {
    name: 'graphs',
    summary: 'List registered graphs',
    defaults: () => ({}),
    options: [],
  },
  async (_args, dependencies, io) => {
    const graphs = [...dependencies.graphs.values()].sort((left, right) => left.name.localeCompare(right.name));
    if (graphs.length === 0) {
      io.stdout('No graphs registered.');
      return EXIT_SUCCESS;
    }

    for (const graph of graphs) {
      io.stdout(`${graph.name}: ${graph.description}`);
      io.stdout(`  nodes: ${graph.nodeNames.join(', ')}`);
    }
    return EXIT_SUCCESS;
  },
);
