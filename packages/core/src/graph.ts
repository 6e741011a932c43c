import { END, START, isJsonObject, isReservedMarker, type JsonObject } from '@stepwise/shared';
import type { z } from 'zod';
import { GraphCompileError, type GraphCompileErrorCode } from './errors.js';
import { reduceState, resolveReducer, type Reducer, type ReducerFunction } from './reducers.js';

export type StateUpdate<S extends JsonObject> = Partial<S>;

export type NodeResult<S extends JsonObject> = StateUpdate<S> | readonly StateUpdate<S>[] | undefined;

/**
 * A step of the graph. Steps run at least once per checkpoint: a process that
 * dies after a step returned but before its checkpoint was stored runs the
 * step again on resume, so external effects must be idempotent.
 */
export type NodeFunction<S extends JsonObject> = (state: Readonly<S>) => NodeResult<S> | Promise<NodeResult<S>>;

export type ConditionalEdge<S extends JsonObject> = {
  route: (state: Readonly<S>) => string;
  /** Possible destinations; checked at compile time and enforced when routing. */
  targets?: readonly string[];
};

export type EdgeTarget<S extends JsonObject> = string | ConditionalEdge<S>;

export type StateSchema<S extends JsonObject> = z.ZodType<S, z.ZodTypeDef, unknown>;

export type GraphDefinition<S extends JsonObject> = {
  name: string;
  stateSchema: StateSchema<S>;
  nodes: Readonly<Record<string, NodeFunction<S>>>;
  edges: Readonly<Record<string, EdgeTarget<S>>>;
  reducers?: Readonly<Partial<Record<Extract<keyof S, string>, Reducer>>>;
};

export type TransitionResult =
  | { ok: true; target: string }
  | { ok: false; target: string | null; reason: string; cause?: unknown };

export type StateValidationResult<S extends JsonObject> = { ok: true; state: S } | { ok: false; issues: string[] };

export type CompiledGraph<S extends JsonObject> = {
  readonly name: string;
  readonly nodeNames: readonly string[];
  getNode(name: string): NodeFunction<S> | undefined;
  validateState(value: unknown): StateValidationResult<S>;
  reduce(state: S, updates: readonly unknown[]): JsonObject;
  resolveNext(from: string, state: Readonly<S>): TransitionResult;
};

function compileFailure(
  graphName: string,
  code: GraphCompileErrorCode,
  names: readonly string[],
  message: string,
): GraphCompileError {
  return new GraphCompileError(code, `Graph "${graphName}": ${message}`, { graphName, names });
}

function quoteAll(names: readonly string[]): string {
  return names.map(name => `"${name}"`).join(', ');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function successorsOf<S extends JsonObject>(edge: EdgeTarget<S>, nodeNames: readonly string[]): readonly string[] {
  if (typeof edge === 'string') {
    return [edge];
  }
  return edge.targets ?? nodeNames;
}

export function compileGraph<S extends JsonObject>(definition: GraphDefinition<S>): CompiledGraph<S> {
  const graphName = definition.name;
  const nodes = new Map<string, NodeFunction<S>>();
  const nodeEntries: Array<[string, unknown]> = Object.entries(definition.nodes);

  for (const [name, fn] of nodeEntries) {
    if (name.trim().length === 0 || isReservedMarker(name)) {
      throw compileFailure(graphName, 'RESERVED_NODE_NAME', [name], `node name "${name}" is empty or reserved.`);
    }
    if (typeof fn !== 'function') {
      throw compileFailure(graphName, 'INVALID_NODE', [name], `node "${name}" is not a function.`);
    }
  }
  for (const [name, fn] of Object.entries(definition.nodes)) {
    nodes.set(name, fn);
  }
  const nodeNames = [...nodes.keys()];

  const reducers = new Map<string, ReducerFunction>();
  const reducerEntries: Array<[string, Reducer | undefined]> = Object.entries(definition.reducers ?? {});
  for (const [field, reducer] of reducerEntries) {
    const resolved = resolveReducer(reducer);
    if (!resolved) {
      throw compileFailure(graphName, 'INVALID_REDUCER', [field], `field "${field}" has an unknown reducer "${String(reducer)}".`);
    }
    reducers.set(field, resolved);
  }

  const edges = new Map<string, EdgeTarget<S>>();
  for (const [source, edge] of Object.entries(definition.edges)) {
    if (source === END) {
      throw compileFailure(graphName, 'EDGE_FROM_END', [END], 'END cannot have an outgoing edge.');
    }
    if (source !== START && !nodes.has(source)) {
      throw compileFailure(graphName, 'UNKNOWN_EDGE_SOURCE', [source], `edge source "${source}" is not a node.`);
    }
    if (typeof edge !== 'string' && typeof edge.route !== 'function') {
      throw compileFailure(graphName, 'INVALID_EDGE', [source], `conditional edge from "${source}" has no route function.`);
    }

    const declaredTargets = typeof edge === 'string' ? [edge] : (edge.targets ?? []);
    const unknownTargets = declaredTargets.filter(target => target !== END && !nodes.has(target));
    if (unknownTargets.length > 0) {
      throw compileFailure(
        graphName,
        'UNKNOWN_EDGE_TARGET',
        unknownTargets,
        `edge from "${source}" points at unknown target(s) ${quoteAll(unknownTargets)}.`,
      );
    }
    edges.set(source, edge);
  }

  const startEdge = edges.get(START);
  if (!startEdge) {
    throw compileFailure(graphName, 'MISSING_START_EDGE', [START], 'START has no outgoing edge.');
  }

  const deadEnds = nodeNames.filter(name => !edges.has(name));
  if (deadEnds.length > 0) {
    throw compileFailure(graphName, 'MISSING_OUTGOING_EDGE', deadEnds, `node(s) ${quoteAll(deadEnds)} have no outgoing edge.`);
  }

  const reached = new Set<string>();
  const pending = [...successorsOf(startEdge, nodeNames)];
  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || name === END || reached.has(name)) {
      continue;
    }
    reached.add(name);
    const edge = edges.get(name);
    if (edge) {
      pending.push(...successorsOf(edge, nodeNames));
    }
  }
  const unreachable = nodeNames.filter(name => !reached.has(name));
  if (unreachable.length > 0) {
    throw compileFailure(graphName, 'UNREACHABLE_NODE', unreachable, `node(s) ${quoteAll(unreachable)} cannot be reached from START.`);
  }

  const schema = definition.stateSchema;

  const resolveNext = (from: string, state: Readonly<S>): TransitionResult => {
    const edge = edges.get(from);
    if (!edge) {
      return { ok: false, target: null, reason: `No edge leaves "${from}".` };
    }

    let target: string;
    if (typeof edge === 'string') {
      target = edge;
    } else {
      try {
        target = edge.route(state);
      } catch (error) {
        return { ok: false, target: null, reason: `Route from "${from}" threw: ${describeError(error)}`, cause: error };
      }
      if (typeof target !== 'string') {
        return { ok: false, target: null, reason: `Route from "${from}" did not return a step name.` };
      }
      if (edge.targets && !edge.targets.includes(target)) {
        return { ok: false, target, reason: `Route from "${from}" chose "${target}", which is not one of its declared targets.` };
      }
    }

    if (target === END || nodes.has(target)) {
      return { ok: true, target };
    }
    return { ok: false, target, reason: `Route from "${from}" chose unknown step "${target}".` };
  };

  return Object.freeze({
    name: graphName,
    nodeNames: Object.freeze(nodeNames),
    getNode: (name: string) => nodes.get(name),
    validateState(value: unknown): StateValidationResult<S> {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
        };
      }
      if (!isJsonObject(parsed.data)) {
        return { ok: false, issues: ['(root): state must be a JSON object'] };
      }
      return { ok: true, state: parsed.data };
    },
    reduce: (state: S, updates: readonly unknown[]) => reduceState(state, updates, reducers),
    resolveNext,
  });
}
