import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '@stepwise/shared';

export type ReducerFunction = (current: JsonValue | undefined, update: JsonValue) => JsonValue;
export type ReducerStrategy = 'overwrite' | 'append' | 'mergeMap';
export type Reducer = ReducerStrategy | ReducerFunction;

export const reducerStrategies: readonly ReducerStrategy[] = ['overwrite', 'append', 'mergeMap'];

function overwrite(_current: JsonValue | undefined, update: JsonValue): JsonValue {
  return update;
}

function append(current: JsonValue | undefined, update: JsonValue): JsonValue {
  const base: JsonValue[] = current === undefined ? [] : Array.isArray(current) ? current : [current];
  return Array.isArray(update) ? [...base, ...update] : [...base, update];
}

function mergeMap(current: JsonValue | undefined, update: JsonValue): JsonValue {
  if (!isJsonObject(update)) {
    throw new TypeError('mergeMap reducer expects an object update.');
  }
  return isJsonObject(current) ? { ...current, ...update } : { ...update };
}

const builtInReducers: Record<ReducerStrategy, ReducerFunction> = {
  overwrite,
  append,
  mergeMap,
};

export function isReducerStrategy(value: string): value is ReducerStrategy {
  return reducerStrategies.some(strategy => strategy === value);
}

export function resolveReducer(reducer: Reducer | undefined): ReducerFunction | null {
  if (reducer === undefined) {
    return overwrite;
  }
  if (typeof reducer === 'function') {
    return reducer;
  }
  return isReducerStrategy(reducer) ? builtInReducers[reducer] : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Folds step updates into a copy of `state`, one update at a time and in the
 * order given. Fields set to `undefined` are left untouched.
 */
export function reduceState(
  state: JsonObject,
  updates: readonly unknown[],
  reducers: ReadonlyMap<string, ReducerFunction>,
): JsonObject {
  const next: JsonObject = { ...state };

  for (const update of updates) {
    if (!isRecord(update)) {
      throw new TypeError('Step updates must be plain objects.');
    }

    const entries: Array<[string, unknown]> = Object.entries(update);
    for (const [field, value] of entries) {
      if (value === undefined) {
        continue;
      }
      if (!isJsonValue(value)) {
        throw new TypeError(`Update for field "${field}" is not a JSON value.`);
      }

      const reducer = reducers.get(field) ?? overwrite;
      const reduced = reducer(Object.hasOwn(next, field) ? next[field] : undefined, value);
      if (!isJsonValue(reduced)) {
        throw new TypeError(`Reducer for field "${field}" produced a value that is not JSON.`);
      }
      next[field] = reduced;
    }
  }

  return next;
}
