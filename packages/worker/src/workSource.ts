import { createInterface } from 'node:readline';
import { isJsonObject, type JsonObject } from '@stepwise/shared';

export type WorkItem = {
  runId: string;
  initialState?: JsonObject;
};

export type ParsedWorkItemLine =
  | { kind: 'skip' }
  | { kind: 'item'; item: WorkItem }
  | { kind: 'invalid'; message: string };

export function fromList(items: readonly WorkItem[]): AsyncIterable<WorkItem> {
  return {
    async *[Symbol.asyncIterator]() {
      yield* items;
    },
  };
}

/** `<runId>` or `<runId> <json object>`; blank lines and `#` comments are skipped. */
export function parseWorkItemLine(line: string): ParsedWorkItemLine {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return { kind: 'skip' };
  }

  const separator = trimmed.search(/\s/);
  if (separator < 0) {
    return { kind: 'item', item: { runId: trimmed } };
  }

  const runId = trimmed.slice(0, separator);
  const rawState = trimmed.slice(separator + 1).trim();
  let state: unknown;
  try {
    state = JSON.parse(rawState);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { kind: 'invalid', message: `Invalid JSON state for run "${runId}": ${reason}` };
  }

  if (!isJsonObject(state)) {
    return { kind: 'invalid', message: `State for run "${runId}" must be a JSON object.` };
  }
  return { kind: 'item', item: { runId, initialState: state } };
}

export type FromLinesOptions = {
  onInvalidLine?: (line: string, message: string) => void;
  /** Closes the reader; the source then ends as if the input had. */
  signal?: AbortSignal;
};

export async function* fromLines(input: NodeJS.ReadableStream, options: FromLinesOptions = {}): AsyncGenerator<WorkItem> {
  const lines = createInterface({ input, crlfDelay: Infinity, signal: options.signal });
  try {
    for await (const line of lines) {
      const parsed = parseWorkItemLine(line);
      if (parsed.kind === 'item') {
        yield parsed.item;
      } else if (parsed.kind === 'invalid') {
        options.onInvalidLine?.(line, parsed.message);
      }
    }
  } finally {
    lines.close();
  }
}
