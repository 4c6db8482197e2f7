// Library entry for test code running under the harness
export type { ApiClient, ApiResponse } from './lib/client.js';
export { AwsApiClient, supportedOperations, type ConnectionDefaults } from './lib/aws.js';
export { loadConfig, EnvVar, type HarnessConfig, type HarnessEnv } from './lib/config.js';
export * from './lib/errors.js';
export { createApiClient, resolveHarnessMode, type CreateClientOptions } from './lib/services/session.js';
export {
  FixtureRecorder,
  RecordingClient,
  assertDirectInvocation,
  finishRecording,
  type FinishOptions,
  type FinishResult,
  type StartOptions,
} from './lib/services/recorder.js';
export {
  ReplayClient,
  InMemoryCursorStore,
  FileCursorStore,
  type CursorStore,
} from './lib/services/player.js';
export { FixtureDirectory, fixtureFileName } from './lib/services/fixture-directory.js';
export { buildScrubRules, scrubDirectory, scrubText, type ScrubIdentity } from './lib/services/scrub.js';
export { packDirectory, readArchive, unpackArchive, loadRecordedCalls } from './lib/services/archive.js';
export { resolveCallerIdentity } from './lib/services/identity.js';
export {
  runStep,
  runSteps,
  type StepDefinition,
  type StepOptions,
  type StepResult,
} from './lib/services/steps.js';
