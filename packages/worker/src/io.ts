import { EXIT_USAGE_ERROR } from './constants.js';
import type { CliIo, ExitCode } from './types.js';

export function createDefaultIo(): CliIo {
  return {
    stdout: message => console.log(message),
    stderr: message => console.error(message),
    cwd: process.cwd(),
    env: process.env,
    stdin: process.stdin,
  };
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function usageError(io: Pick<CliIo, 'stderr'>, message: string, usage: string): ExitCode {
  io.stderr(message);
  io.stderr(usage);
  return EXIT_USAGE_ERROR;
}
