import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { Command } from 'commander';
import { ExitCode, type ScrubPlaceholders } from '@fixture-harness/shared';
import { AwsApiClient } from '../lib/aws.js';
import type { ApiClient } from '../lib/client.js';
import { EnvVar, config, type HarnessEnv } from '../lib/config.js';
import { AppError, ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { runCommand } from '../lib/process.js';

// Services
import { loadRecordedCalls, readArchive, unpackArchive } from '../lib/services/archive.js';
import { localUsername, resolveCallerIdentity } from '../lib/services/identity.js';
import { ReplayClient } from '../lib/services/player.js';
import { FixtureRecorder } from '../lib/services/recorder.js';
import { buildScrubRules, scrubDirectory } from '../lib/services/scrub.js';

export interface CliDependencies {
  env: HarnessEnv;
  runCommand: (argv: readonly string[], env: NodeJS.ProcessEnv) => Promise<number>;
  liveClient: () => ApiClient;
  localUsername: () => string;
  placeholders: ScrubPlaceholders;
  print: (line: string) => void;
}

export function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    runCommand,
    liveClient: () => new AwsApiClient(config.aws),
    localUsername,
    placeholders: config.fixtures.placeholders,
    print: (line) => process.stdout.write(`${line}\n`),
  };
}

// Environment for the wrapped command: harness flags replaced, the rest passed through
export function childEnv(env: HarnessEnv, flags: Partial<Record<string, string>>): NodeJS.ProcessEnv {
  const result: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (key !== EnvVar.RECORD_DIR && key !== EnvVar.REPLAY_DIR && value !== undefined) {
      result[key] = value;
    }
  }
  return { ...result, ...flags };
}

export interface RecordOptions {
  dir: string;
  archive: string;
}

export async function recordCommand(
  argv: readonly string[],
  options: RecordOptions,
  deps: CliDependencies
): Promise<number> {
  const dir = resolve(options.dir);
  const recorder = await FixtureRecorder.start({ outputDir: dir, env: deps.env });

  const exitCode = await deps.runCommand(argv, childEnv(deps.env, { [EnvVar.RECORD_DIR]: dir }));
  if (exitCode !== 0) {
    logger.error(
      { sessionId: recorder.sessionId, exitCode, dir },
      'Command failed; recording left unscrubbed for inspection'
    );
    return exitCode;
  }

  const identity = await resolveCallerIdentity(deps.liveClient());
  await recorder.finish({
    archivePath: resolve(options.archive),
    identity,
    localUser: deps.localUsername(),
    placeholders: deps.placeholders,
  });
  return ExitCode.SUCCESS;
}

export interface ReplayOptions {
  archive: string;
  scratch?: string;
}

export async function replayCommand(
  argv: readonly string[],
  options: ReplayOptions,
  deps: CliDependencies
): Promise<number> {
  const archive = await readArchive(resolve(options.archive));

  if (options.scratch && existsSync(options.scratch)) {
    throw new ValidationError(`Scratch directory already exists: ${options.scratch}`);
  }
  const scratch = options.scratch
    ? resolve(options.scratch)
    : await mkdtemp(join(tmpdir(), 'fixture-replay-'));

  try {
    await unpackArchive(archive, scratch);
    const exitCode = await deps.runCommand(argv, childEnv(deps.env, { [EnvVar.REPLAY_DIR]: scratch }));

    const unconsumed = (await ReplayClient.fromDirectory(scratch)).unconsumed();
    if (Object.keys(unconsumed).length > 0) {
      logger.info({ sessionId: archive.sessionId, unconsumed }, 'Recorded calls left unreplayed');
    }
    return exitCode;
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }
}

export interface ScrubOptions {
  dir: string;
  accountId: string;
  userId: string;
  localUser?: string;
}

export async function scrubCommand(options: ScrubOptions, deps: CliDependencies): Promise<number> {
  const rules = buildScrubRules(
    {
      accountId: options.accountId,
      userId: options.userId,
      localUser: options.localUser ?? deps.localUsername(),
    },
    deps.placeholders
  );
  const changed = await scrubDirectory(resolve(options.dir), rules);
  deps.print(JSON.stringify({ scrubbed: changed }));
  return ExitCode.SUCCESS;
}

export async function inspectCommand(options: { archive: string }, deps: CliDependencies): Promise<number> {
  const archive = await readArchive(resolve(options.archive));
  const calls = loadRecordedCalls(archive.files);

  const operations: Record<string, number> = {};
  for (const call of calls) {
    operations[call.operationName] = (operations[call.operationName] ?? 0) + 1;
  }

  deps.print(
    JSON.stringify({
      sessionId: archive.sessionId,
      createdAt: archive.createdAt,
      calls: calls.length,
      failedCalls: calls.filter((call) => call.error).length,
      operations,
    })
  );
  return ExitCode.SUCCESS;
}

// Harness errors carry their own exit code; anything else is an internal failure
async function guarded(action: () => Promise<number>): Promise<number> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.toReport(), error.message);
      return error.exitCode;
    }
    logger.error({ error }, 'Unexpected error');
    return ExitCode.FAILURE;
  }
}

export function buildProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('fixture-harness')
    .description('Record and replay AWS API fixtures around a test command')
    .version(config.version)
    .enablePositionalOptions();

  program
    .command('record')
    .description('Run a command against AWS, capturing every call into a fixture archive')
    .requiredOption('--dir <dir>', 'recording directory (must not exist)')
    .requiredOption('--archive <file>', 'fixture archive to write')
    .argument('<command...>', 'command to run, after --')
    .passThroughOptions()
    .action(async (argv: string[], options: RecordOptions) => {
      onExit(await guarded(() => recordCommand(argv, options, deps)));
    });

  program
    .command('replay')
    .description('Run a command with API calls served from a fixture archive')
    .requiredOption('--archive <file>', 'fixture archive to replay')
    .option('--scratch <dir>', 'where to unpack the archive (default: a temp directory)')
    .argument('<command...>', 'command to run, after --')
    .passThroughOptions()
    .action(async (argv: string[], options: ReplayOptions) => {
      onExit(await guarded(() => replayCommand(argv, options, deps)));
    });

  program
    .command('scrub')
    .description('Replace account and user identifiers in a recording directory')
    .requiredOption('--dir <dir>', 'recording directory')
    .requiredOption('--account-id <id>', 'AWS account id to remove')
    .requiredOption('--user-id <id>', 'AWS user id to remove')
    .option('--local-user <name>', 'local username to remove (default: current user)')
    .action(async (options: ScrubOptions) => {
      onExit(await guarded(() => scrubCommand(options, deps)));
    });

  program
    .command('inspect')
    .description('Summarize the calls stored in a fixture archive')
    .requiredOption('--archive <file>', 'fixture archive')
    .action(async (options: { archive: string }) => {
      onExit(await guarded(() => inspectCommand(options, deps)));
    });

  return program;
}

export async function main(
  argv: readonly string[] = process.argv,
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });
  await program.parseAsync([...argv]);
  return exitCode;
}
