import { createCheckpointStore, createConnectionPool, type CheckpointStore, type ConnectionPool } from '@stepwise/db';
import { END, START } from '@stepwise/shared';
import { z } from 'zod';
import { compileGraph, type CompiledGraph, type GraphDefinition, type NodeFunction } from './graph.js';

export const countSchema = z.object({
  count: z.number().int(),
});

export type CountState = z.infer<typeof countSchema>;

const increment: NodeFunction<CountState> = state => ({ count: state.count + 1 });

/** intake -> enrich -> finalize, each step adding one to `count`. */
export function countGraphDefinition(
  nodes: Partial<Record<'intake' | 'enrich' | 'finalize', NodeFunction<CountState>>> = {},
): GraphDefinition<CountState> {
  return {
    name: 'count',
    stateSchema: countSchema,
    nodes: {
      intake: nodes.intake ?? increment,
      enrich: nodes.enrich ?? increment,
      finalize: nodes.finalize ?? increment,
    },
    edges: {
      [START]: 'intake',
      intake: 'enrich',
      enrich: 'finalize',
      finalize: END,
    },
  };
}

export function createCountGraph(
  nodes: Partial<Record<'intake' | 'enrich' | 'finalize', NodeFunction<CountState>>> = {},
): CompiledGraph<CountState> {
  return compileGraph(countGraphDefinition(nodes));
}

export async function createMemoryCheckpointStore(
  writerId = 'test-worker',
): Promise<{ pool: ConnectionPool; store: CheckpointStore }> {
  const pool = createConnectionPool({ path: ':memory:', poolSize: 1, busyTimeoutMs: 100 });
  const store = createCheckpointStore(pool, { writerId });
  await store.ensureSchema();
  return { pool, store };
}

export async function listSequences(store: CheckpointStore, runId: string): Promise<Array<[number, string]>> {
  const entries: Array<[number, string]> = [];
  for await (const checkpoint of store.listCheckpoints(runId)) {
    entries.push([checkpoint.sequence, checkpoint.producedBy]);
  }
  return entries;
}
