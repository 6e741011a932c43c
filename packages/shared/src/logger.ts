import { pino, destination, type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface Logger {
  child(bindings?: Record<string, unknown>): Logger;
  fatal(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

export type CreateLoggerOptions = {
  level?: LogLevel;
  pretty?: boolean;
  /** Mostly for tests; pretty output is ignored when a destination is given. */
  destination?: DestinationStream;
  /** Write to stderr instead of stdout. */
  stderr?: boolean;
};

type EmittingLevel = Exclude<LogLevel, 'silent'>;
type PinoCall = (meta: Record<string, unknown>, message: string) => void;

const logLevels: ReadonlySet<string> = new Set<LogLevel>(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function isLogLevel(value: string): value is LogLevel {
  return logLevels.has(value);
}

function wrap(instance: PinoLogger): Logger {
  const fns: Record<EmittingLevel, PinoCall> = {
    fatal: (meta, message) => instance.fatal(meta, message),
    error: (meta, message) => instance.error(meta, message),
    warn: (meta, message) => instance.warn(meta, message),
    info: (meta, message) => instance.info(meta, message),
    debug: (meta, message) => instance.debug(meta, message),
    trace: (meta, message) => instance.trace(meta, message),
  };

  const call = (level: EmittingLevel, message: string, meta?: Record<string, unknown>) => {
    fns[level](meta ?? {}, message);
  };

  return {
    child: bindings => wrap(instance.child(bindings ?? {})),
    fatal: (message, meta) => call('fatal', message, meta),
    error: (message, meta) => call('error', message, meta),
    warn: (message, meta) => call('warn', message, meta),
    info: (message, meta) => call('info', message, meta),
    debug: (message, meta) => call('debug', message, meta),
    trace: (message, meta) => call('trace', message, meta),
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? 'info',
    base: null,
  };

  if (options.destination) {
    return wrap(pino(pinoOptions, options.destination));
  }

  const fd = options.stderr ? 2 : 1;
  if (options.pretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true, singleLine: true, translateTime: 'SYS:HH:MM:ss.l', destination: fd },
    };
    return wrap(pino(pinoOptions));
  }

  return wrap(pino(pinoOptions, destination(fd)));
}

let root: Logger | null = null;

export function getRootLogger(): Logger {
  if (!root) {
    const configuredLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
    root = createLogger({
      level: configuredLevel && isLogLevel(configuredLevel) ? configuredLevel : 'info',
      pretty: process.env.NODE_ENV === 'development',
    });
  }

  return root;
}

/** Replaces the process-wide root logger; `null` rebuilds it from the environment on next use. */
export function resetRootLogger(logger: Logger | null = null): void {
  root = logger;
}

export function makeLogger(service: string, bindings: Record<string, unknown> = {}): Logger {
  return getRootLogger().child({ service, ...bindings });
}
