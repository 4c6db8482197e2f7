import { z } from 'zod';
import { ScrubTarget, type ScrubPlaceholders } from '@fixture-harness/shared';
import { parseWith } from './validation.js';

const envSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  AWS_PROFILE: z.string().min(1).optional(),
  AWS_ENDPOINT_URL: z.string().url().optional(),
  AWS_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']))
    .default('info'),
  // Private flags set by the CLI for the wrapped command
  _FIXTURE_RECORD: z.string().min(1).optional(),
  _FIXTURE_REPLAY: z.string().min(1).optional(),
  // Set by the outer test-splitting harness
  FIXTURE_SPLIT_HARNESS: z.string().optional(),
  FIXTURE_PLACEHOLDER_ACCOUNT_ID: z.string().min(1).default('123456789012'),
  FIXTURE_PLACEHOLDER_USER_ID: z.string().min(1).default('AIDAFIXTUREUSERID0000'),
  FIXTURE_PLACEHOLDER_LOCAL_USER: z.string().min(1).default('fixture-user'),
  APP_VERSION: z.string().default('0.1.0'),
});

export type HarnessEnv = Record<string, string | undefined>;

// Environment configuration; a variable set to an empty string counts as unset
export function loadConfig(env: HarnessEnv = process.env) {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const vars = parseWith(envSchema, present, 'environment configuration');

  const placeholders: ScrubPlaceholders = {
    [ScrubTarget.ACCOUNT_ID]: vars.FIXTURE_PLACEHOLDER_ACCOUNT_ID,
    [ScrubTarget.USER_ID]: vars.FIXTURE_PLACEHOLDER_USER_ID,
    [ScrubTarget.LOCAL_USER]: vars.FIXTURE_PLACEHOLDER_LOCAL_USER,
  };

  return {
    // AWS connection defaults shared by every operation
    aws: {
      region: vars.AWS_REGION,
      profile: vars.AWS_PROFILE,
      endpoint: vars.AWS_ENDPOINT_URL,
      maxAttempts: vars.AWS_MAX_ATTEMPTS,
    },

    logLevel: vars.LOG_LEVEL,

    fixtures: {
      recordDir: vars._FIXTURE_RECORD,
      replayDir: vars._FIXTURE_REPLAY,
      splitHarness: vars.FIXTURE_SPLIT_HARNESS !== undefined,
      placeholders,
    },

    version: vars.APP_VERSION,
  } as const;
}

export type HarnessConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();

// Names of the environment variables the CLI hands to the wrapped command
export const EnvVar = {
  RECORD_DIR: '_FIXTURE_RECORD',
  REPLAY_DIR: '_FIXTURE_REPLAY',
  SPLIT_HARNESS: 'FIXTURE_SPLIT_HARNESS',
} as const;
