import { rm } from 'node:fs/promises';
import {
  HarnessMode,
  type CallerIdentity,
  type FixtureArchive,
  type JsonObject,
  type ScrubPlaceholders,
} from '@fixture-harness/shared';
import type { ApiClient, ApiResponse } from '../client.js';
import { EnvVar, config, type HarnessEnv } from '../config.js';
import { ApiCallError, WrongInvocationContextError } from '../errors.js';
import { createSessionLogger, logger, type Logger } from '../logger.js';
import { packDirectory } from './archive.js';
import { FixtureDirectory } from './fixture-directory.js';
import { buildScrubRules, scrubDirectory, scrubIdentityOf } from './scrub.js';

// Passthrough client that appends every call to the recording directory
export class RecordingClient implements ApiClient {
  constructor(
    private readonly inner: ApiClient,
    private readonly directory: FixtureDirectory
  ) {}

  async invoke(operation: string, params: JsonObject = {}): Promise<ApiResponse> {
    let response: ApiResponse;
    try {
      response = await this.inner.invoke(operation, params);
    } catch (error) {
      if (error instanceof ApiCallError) {
        await this.recordFailure(operation, params, error);
      }
      throw error;
    }

    await this.directory.append({
      operationName: operation,
      requestParameters: params,
      responseBody: response.body,
      responseMetadata: response.metadata,
    });
    return response;
  }

  // The API error stays the one the caller sees; a failed write is logged beside it
  private async recordFailure(operation: string, params: JsonObject, error: ApiCallError): Promise<void> {
    try {
      await this.directory.append({
        operationName: operation,
        requestParameters: params,
        responseBody: {},
        responseMetadata: {},
        error: error.toRecordedError(),
      });
    } catch (appendError) {
      logger.error(
        { sessionId: this.directory.sessionId, operation, apiError: error.errorName, error: appendError },
        'Failed to record API error'
      );
    }
  }
}

// Recording under the test-splitting harness mixes environments into the fixtures
export function assertDirectInvocation(env: HarnessEnv): void {
  const value = env[EnvVar.SPLIT_HARNESS];
  if (value !== undefined && value !== '') {
    throw new WrongInvocationContextError(EnvVar.SPLIT_HARNESS);
  }
}

export interface FinishOptions {
  archivePath: string;
  identity: CallerIdentity;
  localUser: string;
  placeholders?: ScrubPlaceholders;
}

export interface FinishResult {
  archive: FixtureArchive;
  scrubbedFiles: string[];
}

// Scrub, compress and delete a recording directory
export async function finishRecording(
  directory: FixtureDirectory,
  options: FinishOptions,
  log: Logger = createSessionLogger(directory.sessionId, HarnessMode.RECORD)
): Promise<FinishResult> {
  const rules = buildScrubRules(
    scrubIdentityOf(options.identity, options.localUser),
    options.placeholders ?? config.fixtures.placeholders
  );
  const scrubbedFiles = await scrubDirectory(directory.dir, rules);
  log.info({ scrubbedFiles: scrubbedFiles.length, rules: rules.map((r) => r.target) }, 'Recording scrubbed');

  const archive = await packDirectory(directory.dir, options.archivePath, directory.sessionId);
  await rm(directory.dir, { recursive: true, force: true });
  log.info({ archivePath: options.archivePath, files: archive.files.length }, 'Fixture archive written');

  return { archive, scrubbedFiles };
}

export interface StartOptions {
  outputDir: string;
  env?: HarnessEnv;
}

/**
 * One record session run in-process.
 *
 * `start` checks both pre-conditions before touching the filesystem, so a
 * refused start leaves an existing directory exactly as it was.
 */
export class FixtureRecorder {
  private constructor(
    readonly directory: FixtureDirectory,
    private readonly log: Logger
  ) {}

  static async start(options: StartOptions): Promise<FixtureRecorder> {
    assertDirectInvocation(options.env ?? process.env);
    const directory = await FixtureDirectory.create(options.outputDir);
    const log = createSessionLogger(directory.sessionId, HarnessMode.RECORD);
    log.info({ dir: options.outputDir }, 'Recording started');
    return new FixtureRecorder(directory, log);
  }

  get sessionId(): string {
    return this.directory.sessionId;
  }

  wrap(client: ApiClient): RecordingClient {
    return new RecordingClient(client, this.directory);
  }

  finish(options: FinishOptions): Promise<FinishResult> {
    return finishRecording(this.directory, options, this.log);
  }
}
