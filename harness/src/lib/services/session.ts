import { HarnessMode } from '@fixture-harness/shared';
import { AwsApiClient, type ConnectionDefaults } from '../aws.js';
import type { ApiClient } from '../client.js';
import { EnvVar, config, type HarnessEnv } from '../config.js';
import { ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import { FixtureDirectory } from './fixture-directory.js';
import { ReplayClient } from './player.js';
import { RecordingClient } from './recorder.js';

export function resolveHarnessMode(env: HarnessEnv): HarnessMode {
  const record = env[EnvVar.RECORD_DIR];
  const replay = env[EnvVar.REPLAY_DIR];

  if (record && replay) {
    throw new ValidationError(`${EnvVar.RECORD_DIR} and ${EnvVar.REPLAY_DIR} cannot both be set`);
  }
  if (record) return HarnessMode.RECORD;
  if (replay) return HarnessMode.REPLAY;
  return HarnessMode.LIVE;
}

export interface CreateClientOptions {
  defaults?: ConnectionDefaults;
  // Live client factory; replaced in tests
  live?: (defaults: ConnectionDefaults) => ApiClient;
}

/**
 * Client for code running inside a wrapped test command.
 *
 * The CLI selects the mode through private environment variables; without
 * them calls go straight to AWS.
 */
export async function createApiClient(
  env: HarnessEnv = process.env,
  options: CreateClientOptions = {}
): Promise<ApiClient> {
  const defaults = options.defaults ?? config.aws;
  const live = options.live ?? ((d: ConnectionDefaults) => new AwsApiClient(d));
  const mode = resolveHarnessMode(env);

  switch (mode) {
    case HarnessMode.RECORD: {
      const dir = env[EnvVar.RECORD_DIR] ?? '';
      const directory = await FixtureDirectory.open(dir);
      logger.debug({ dir, sessionId: directory.sessionId }, 'Attached to recording');
      return new RecordingClient(live(defaults), directory);
    }
    case HarnessMode.REPLAY: {
      const dir = env[EnvVar.REPLAY_DIR] ?? '';
      logger.debug({ dir }, 'Attached to replay');
      return ReplayClient.fromDirectory(dir);
    }
    case HarnessMode.LIVE:
      return live(defaults);
  }
}
