import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { JsonObject } from '@fixture-harness/shared';
import type { ApiClient, ApiResponse } from '../lib/client.js';
import { ApiCallError } from '../lib/errors.js';

export function response(body: JsonObject, metadata: JsonObject = { httpStatusCode: 200 }): ApiResponse {
  return { body, metadata };
}

// Scripted stand-in for the live AWS client
export class StubApiClient implements ApiClient {
  readonly calls: Array<{ operation: string; params: JsonObject }> = [];
  private readonly scripted = new Map<string, Array<ApiResponse | ApiCallError>>();

  respond(operation: string, ...results: Array<ApiResponse | ApiCallError>): this {
    this.scripted.set(operation, [...(this.scripted.get(operation) ?? []), ...results]);
    return this;
  }

  async invoke(operation: string, params: JsonObject = {}): Promise<ApiResponse> {
    this.calls.push({ operation, params });
    const next = this.scripted.get(operation)?.shift();
    if (!next) {
      throw new Error(`No stubbed response for ${operation}`);
    }
    if (next instanceof ApiCallError) {
      throw next;
    }
    return next;
  }
}

// Temporary directories removed by cleanupTempDirs()
const created: string[] = [];

export async function makeTempDir(prefix = 'fixture-harness-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  created.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  await Promise.all(created.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}
