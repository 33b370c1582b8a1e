#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig } from './src/core/config/config';
import { createPipeline, type CommandOutcome } from './src/pipeline';
import { createScheduler } from './src/core/scheduler/scheduler';
import { BACKUP_KINDS, type BackupKind } from './src/interfaces/backup';
import { ConfigError, errorMessage } from './src/utils/errors';
import { createRunLock } from './src/utils/lock';
import { Verbosity } from './src/interfaces/logger';
import * as logger from './src/utils/logger';

const COMMANDS = [
  'route',
  'backup',
  'rotate',
  'upload',
  'health',
  'run',
  'daemon',
  'folders',
] as const;
type Command = (typeof COMMANDS)[number];

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CONFIG_ERROR = 2;

function readVersion(): string {
  // Beside the sources, or one level up from dist/
  for (const candidate of [
    path.join(__dirname, 'package.json'),
    path.join(__dirname, '..', 'package.json'),
  ]) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      const version: unknown =
        typeof parsed === 'object' && parsed !== null
          ? Reflect.get(parsed, 'version')
          : undefined;
      if (typeof version === 'string') {
        return version;
      }
    } catch {
      continue;
    }
  }
  return 'unknown';
}

export type CliRequest =
  | { type: 'help' }
  | { type: 'version' }
  | {
      type: 'command';
      command: Command;
      kind?: BackupKind;
      configPath?: string;
      verbosity: Verbosity;
      concurrency?: number;
    };

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isBackupKind(value: string): value is BackupKind {
  return BACKUP_KINDS.some((kind) => kind === value);
}

/**
 * Turns argv (without node and script) into a request. Throws on usage
 * errors.
 */
export function parseCliArgs(args: string[]): CliRequest {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      concurrency: { type: 'string' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    return { type: 'help' };
  }
  if (values.version) {
    return { type: 'version' };
  }
  if (positionals.length === 0) {
    return { type: 'help' };
  }

  const [command, kindArg, ...extra] = positionals;
  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }

  const takesKind = command === 'backup' || command === 'upload' || command === 'run';
  if (extra.length > 0 || (!takesKind && kindArg !== undefined)) {
    throw new Error(`Unexpected argument for ${command}: ${[kindArg, ...extra].join(' ')}`);
  }
  if (kindArg !== undefined && !isBackupKind(kindArg)) {
    throw new Error(
      `Unknown backup kind "${kindArg}" (expected ${BACKUP_KINDS.join(', ')})`,
    );
  }
  if (command === 'upload' && kindArg === undefined) {
    throw new Error('upload needs a backup kind');
  }

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`--concurrency must be a positive integer`);
    }
  }

  return {
    type: 'command',
    command,
    kind: kindArg,
    configPath: values.config,
    verbosity: values.quiet
      ? Verbosity.Quiet
      : values.verbose
        ? Verbosity.Verbose
        : Verbosity.Normal,
    concurrency,
  };
}

export function helpText(version: string = readVersion()): string {
  return `
${logger.bold(`dropshelf v${version} - sort a drop zone, rotate zip backups, push them to storage`)}

${logger.bold('Usage: dropshelf <command> [options]')}

${logger.bold('Commands:')}
  route                   Move drop-zone files into their category folders
  backup [kind]           Zip the tree and admit it into rotation (default kind: retention.runKind)
  rotate                  Apply the retention limits to existing backups
  upload <kind>           Upload admitted backups of a kind that are not stored yet
  health                  Check folders, rotation, backup age and size, storage session
  run [kind]              route, backup, upload and health in one go
  daemon                  Run "run" on the cron schedules in retention.schedules
  folders                 Create every configured folder

${logger.bold('Options:')}
  --config=<file>         JSON configuration merged over the defaults (or DROPSHELF_CONFIG)
  --concurrency=<n>       Parallel file moves while routing (default: 2/3 of CPU cores)
  --quiet                 Only errors
  --verbose               Per-file detail
  --help, -h              Show this help message
  --version, -v           Show version information

Every command prints one JSON line on stdout. Exit codes: 0 success,
1 failures, 2 invalid configuration.
`;
}

export interface CliDependencies {
  loadConfig?: typeof loadConfig;
  createPipeline?: typeof createPipeline;
  createScheduler?: typeof createScheduler;
  createRunLock?: typeof createRunLock;
  writeLine?: (line: string) => void;
}

const UNLOCKED_COMMANDS: ReadonlySet<Command> = new Set(['health', 'folders']);

async function dispatch(
  request: Extract<CliRequest, { type: 'command' }>,
  config: AppConfig,
  dependencies: CliDependencies,
): Promise<CommandOutcome> {
  const makePipeline = dependencies.createPipeline ?? createPipeline;
  const pipeline = makePipeline(config, {
    verbosity: request.verbosity,
    concurrency: request.concurrency,
  });
  const kind = request.kind ?? config.retention.runKind;

  switch (request.command) {
    case 'route':
      return pipeline.route();
    case 'backup':
      return pipeline.backup(kind);
    case 'rotate':
      return pipeline.rotate();
    case 'upload':
      return pipeline.upload(kind);
    case 'health':
      return pipeline.health();
    case 'run':
      return pipeline.run(kind);
    case 'folders':
      return pipeline.folders();
    case 'daemon': {
      const makeScheduler = dependencies.createScheduler ?? createScheduler;
      const scheduler = makeScheduler(
        async (scheduledKind) => (await pipeline.run(scheduledKind)).ok,
        { verbosity: request.verbosity },
      );
      await scheduler.startDaemon(config.retention.schedules);
      return { command: 'run', ok: true, summary: { daemon: 'stopped' } };
    }
  }
}

/**
 * Runs one CLI invocation and resolves to its exit code.
 */
export async function runCli(
  args: string[],
  dependencies: CliDependencies = {},
): Promise<number> {
  const writeLine =
    dependencies.writeLine ?? ((line: string) => process.stdout.write(`${line}\n`));

  let request: CliRequest;
  try {
    request = parseCliArgs(args);
  } catch (error) {
    logger.error(errorMessage(error));
    logger.always(helpText());
    return EXIT_FAILURE;
  }

  if (request.type === 'help') {
    logger.always(helpText());
    return EXIT_OK;
  }
  if (request.type === 'version') {
    writeLine(`dropshelf v${readVersion()}`);
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = (dependencies.loadConfig ?? loadConfig)({
      configPath: request.configPath,
    });
  } catch (error) {
    logger.error(errorMessage(error));
    writeLine(
      JSON.stringify({ command: request.command, ok: false, error: errorMessage(error) }),
    );
    return error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_FAILURE;
  }

  const lock = UNLOCKED_COMMANDS.has(request.command)
    ? null
    : (dependencies.createRunLock ?? createRunLock)(config.stateDir);

  try {
    lock?.acquire();
    const outcome = await dispatch(request, config, dependencies);
    writeLine(
      JSON.stringify({ command: outcome.command, ok: outcome.ok, ...outcome.summary }),
    );
    return outcome.ok ? EXIT_OK : EXIT_FAILURE;
  } catch (error) {
    logger.error(errorMessage(error));
    writeLine(
      JSON.stringify({ command: request.command, ok: false, error: errorMessage(error) }),
    );
    return error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_FAILURE;
  } finally {
    lock?.release();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error(errorMessage(error));
      process.exitCode = EXIT_FAILURE;
    },
  );
}
