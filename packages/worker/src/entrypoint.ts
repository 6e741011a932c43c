import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CliCommand } from './commandOptions.js';
import { checkpointsCommand } from './commands/checkpoints.js';
import { graphsCommand } from './commands/graphs.js';
import { runCommand } from './commands/run.js';
import { runsCommand } from './commands/runs.js';
import { serveCommand } from './commands/serve.js';
import { EXIT_SUCCESS, EXIT_USAGE_ERROR } from './constants.js';
import { createDefaultIo } from './io.js';
import { defaultDependencies, type CliEntrypointRuntime, type CliIo, type ExitCode, type MainOptions } from './types.js';

export const commands: readonly CliCommand[] = [runCommand, checkpointsCommand, runsCommand, serveCommand, graphsCommand];

const helpArguments = new Set(['help', '--help', '-h']);

export function printGeneralUsage(io: Pick<CliIo, 'stdout'>): void {
  io.stdout('Stepwise - durable graph workflow worker');
  io.stdout('');
  io.stdout('Usage: stepwise <command> [options]');
  io.stdout('');
  io.stdout('Commands:');
  for (const command of commands) {
    io.stdout(`  ${command.synopsis}`);
    io.stdout(`      ${command.summary}`);
  }
  io.stdout('');
  io.stdout('Configuration is read from the environment and ./.env (DATABASE_URL, WORKER_NAME, LOG_LEVEL, ...).');
}

function canonicalPath(path: string): string {
  const absolute = resolve(path);
  try {
    return realpathSync(absolute);
  } catch {
    // Not on disk (yet); compare the resolved path as given.
    return absolute;
  }
}

export function isExecutedAsScript(
  scriptPath: string | undefined = process.argv[1],
  moduleUrl: string = import.meta.url,
): boolean {
  return scriptPath !== undefined && canonicalPath(fileURLToPath(moduleUrl)) === canonicalPath(scriptPath);
}

export async function main(args: string[] = process.argv.slice(2), options: MainOptions = {}): Promise<ExitCode> {
  const dependencies = options.dependencies ?? defaultDependencies;
  const io = options.io ?? createDefaultIo();
  const [name, ...rest] = args;

  if (name === undefined || helpArguments.has(name)) {
    printGeneralUsage(io);
    return EXIT_SUCCESS;
  }

  const command = commands.find(candidate => candidate.name === name);
  if (!command) {
    io.stderr(`Unknown command "${name}".`);
    printGeneralUsage({ stdout: io.stderr });
    return EXIT_USAGE_ERROR;
  }
  return command.run(rest, dependencies, io);
}

export async function runCliEntrypoint(
  runtime: CliEntrypointRuntime = { argv: process.argv, exit: code => process.exit(code) },
  options: MainOptions = {},
): Promise<void> {
  const exitCode = await main(runtime.argv.slice(2), options);
  if (exitCode !== EXIT_SUCCESS) {
    runtime.exit(exitCode);
  }
}
