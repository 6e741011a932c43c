// JSON values persisted in checkpoint snapshots
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

// Reserved graph markers
export const START = '__start__';
export const END = '__end__';
export type ReservedMarker = typeof START | typeof END;

export const reservedMarkers: readonly ReservedMarker[] = [START, END];

// Terminal outcomes of a single execute() call
export type RunOutcomeStatus = 'completed' | 'cancelled' | 'superseded' | 'failed';

export const runOutcomeStatuses: readonly RunOutcomeStatus[] = ['completed', 'cancelled', 'superseded', 'failed'];

export function isReservedMarker(value: string): value is ReservedMarker {
  return value === START || value === END;
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    return false;
  }

  return Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}

export {
  createLogger,
  getRootLogger,
  makeLogger,
  resetRootLogger,
  type CreateLoggerOptions,
  type LogLevel,
  type Logger,
} from './logger.js';
