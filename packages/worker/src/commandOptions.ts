import { isJsonObject, type JsonObject } from '@stepwise/shared';
import { toErrorMessage, usageError } from './io.js';
import type { CliDependencies, CliIo, ExitCode } from './types.js';

export type OptionSpec<A> = {
  name: string;
  /** Placeholder shown in usage; an option without one is a flag. */
  valueName?: string;
  required?: boolean;
  /** Stores the converted value on `args`, or returns why `raw` was rejected. */
  apply(args: A, raw: string): string | null;
};

export type CommandSpec<A> = {
  name: string;
  summary: string;
  defaults: () => A;
  options: readonly OptionSpec<A>[];
};

export type ParsedCommandArgs<A> = { ok: true; args: A } | { ok: false; exitCode: ExitCode };

export type CliCommand = {
  name: string;
  summary: string;
  /** The command name followed by its options, e.g. `runs` or `serve [--graph <graph_name>]`. */
  synopsis: string;
  run(rawArgs: readonly string[], dependencies: CliDependencies, io: CliIo): Promise<ExitCode>;
};

export function flagOption<A>(name: string, set: (args: A) => void): OptionSpec<A> {
  return {
    name,
    apply(args) {
      set(args);
      return null;
    },
  };
}

export function textOption<A>(
  name: string,
  valueName: string,
  set: (args: A, value: string) => void,
  settings: { required?: boolean } = {},
): OptionSpec<A> {
  return {
    name,
    valueName,
    required: settings.required,
    apply(args, raw) {
      set(args, raw);
      return null;
    },
  };
}

export function parseInteger(raw: string, minimum: 0 | 1): number | null {
  const pattern = minimum === 0 ? /^(0|[1-9]\d*)$/ : /^[1-9]\d*$/;
  if (!pattern.test(raw)) {
    return null;
  }

  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

export function integerOption<A>(
  name: string,
  valueName: string,
  minimum: 0 | 1,
  set: (args: A, value: number) => void,
): OptionSpec<A> {
  const expected = minimum === 0 ? 'a non-negative integer' : 'a positive integer';
  return {
    name,
    valueName,
    apply(args, raw) {
      const value = parseInteger(raw, minimum);
      if (value === null) {
        return `Option "--${name}" must be ${expected}, got "${raw}".`;
      }
      set(args, value);
      return null;
    },
  };
}

export function jsonObjectOption<A>(
  name: string,
  valueName: string,
  set: (args: A, value: JsonObject) => void,
): OptionSpec<A> {
  return {
    name,
    valueName,
    apply(args, raw) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        return `Option "--${name}" must be valid JSON: ${toErrorMessage(error)}`;
      }
      if (!isJsonObject(parsed)) {
        return `Option "--${name}" must be a JSON object.`;
      }
      set(args, parsed);
      return null;
    },
  };
}

function describeOption(option: { name: string; valueName?: string }): string {
  return option.valueName === undefined ? `--${option.name}` : `--${option.name} <${option.valueName}>`;
}

export function formatSynopsis<A>(spec: CommandSpec<A>): string {
  const options = spec.options.map(option => (option.required ? describeOption(option) : `[${describeOption(option)}]`));
  return [spec.name, ...options].join(' ');
}

export function formatUsage<A>(spec: CommandSpec<A>): string {
  return `Usage: stepwise ${formatSynopsis(spec)}`;
}

/**
 * Accepts `--name value`, `--name=value` and bare flags. Every option may
 * appear once; anything that is not an option of `spec` is rejected.
 */
export function parseCommandArgs<A>(
  rawArgs: readonly string[],
  spec: CommandSpec<A>,
  io: Pick<CliIo, 'stderr'>,
): ParsedCommandArgs<A> {
  const reject = (message: string): ParsedCommandArgs<A> => ({
    ok: false,
    exitCode: usageError(io, message, formatUsage(spec)),
  });
  const optionsByName = new Map(spec.options.map(option => [option.name, option]));
  const seen = new Set<string>();
  const args = spec.defaults();

  let cursor = 0;
  while (cursor < rawArgs.length) {
    const token = rawArgs[cursor];
    if (!token.startsWith('--')) {
      return reject(`Unexpected argument for "${spec.name}": ${token}`);
    }

    const equalsIndex = token.indexOf('=');
    const name = equalsIndex >= 0 ? token.slice(2, equalsIndex) : token.slice(2);
    if (name.length === 0) {
      return reject('Option name cannot be empty.');
    }
    const option = optionsByName.get(name);
    if (!option) {
      return reject(`Unknown option for "${spec.name}": --${name}`);
    }
    if (seen.has(name)) {
      return reject(`Option "--${name}" cannot be provided more than once.`);
    }
    seen.add(name);

    let raw = '';
    if (option.valueName === undefined) {
      if (equalsIndex >= 0) {
        return reject(`Option "--${name}" does not take a value.`);
      }
    } else if (equalsIndex >= 0) {
      raw = token.slice(equalsIndex + 1);
    } else {
      const next = rawArgs[cursor + 1];
      if (next !== undefined && !next.startsWith('--')) {
        raw = next;
        cursor += 1;
      }
    }
    if (option.valueName !== undefined && raw.length === 0) {
      return reject(`Option "--${name}" requires a value.`);
    }

    const rejection = option.apply(args, raw);
    if (rejection !== null) {
      return reject(rejection);
    }
    cursor += 1;
  }

  const missing = spec.options.find(option => option.required && !seen.has(option.name));
  if (missing) {
    return reject(`Missing required option: ${describeOption(missing)}`);
  }

  return { ok: true, args };
}

export function defineCommand<A>(
  spec: CommandSpec<A>,
  handle: (args: A, dependencies: CliDependencies, io: CliIo) => Promise<ExitCode>,
): CliCommand {
  return {
    name: spec.name,
    summary: spec.summary,
    synopsis: formatSynopsis(spec),
    async run(rawArgs, dependencies, io) {
      const parsed = parseCommandArgs(rawArgs, spec, io);
      if (!parsed.ok) {
        return parsed.exitCode;
      }
      return handle(parsed.args, dependencies, io);
    },
  };
}
