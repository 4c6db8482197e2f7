import { setTimeout as delay } from 'node:timers/promises';
import type { JsonObject } from '@fixture-harness/shared';
import type { ApiClient, ApiResponse } from '../client.js';
import { ApiCallError, StepFailedError, UnexpectedCallError } from '../errors.js';
import { logger } from '../logger.js';

export interface StepDefinition {
  name: string;
  operation: string;
  params?: JsonObject;
  // Mutating steps are skipped in check mode
  mutating?: boolean;
  // Extra attempts after the first one; only API errors and unmet conditions are retried
  retries?: number;
  delayMs?: number;
  // Retry until this holds; without it only failed calls are retried
  until?: (response: ApiResponse) => boolean;
  ignoreErrors?: boolean;
  changed?: (response: ApiResponse) => boolean;
}

export interface StepOptions {
  // Parameters merged under every step's own params
  defaults?: JsonObject;
  checkMode?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface StepResult {
  name: string;
  operation: string;
  changed: boolean;
  failed: boolean;
  checkMode: boolean;
  attempts: number;
  response?: ApiResponse;
  error?: string;
}

export async function runStep(
  client: ApiClient,
  step: StepDefinition,
  options: StepOptions = {}
): Promise<StepResult> {
  const params: JsonObject = { ...options.defaults, ...step.params };
  const base = { name: step.name, operation: step.operation };

  if (options.checkMode && step.mutating) {
    logger.debug({ step: step.name }, 'Check mode, call not issued');
    return { ...base, changed: true, failed: false, checkMode: true, attempts: 0 };
  }

  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = (step.retries ?? 0) + 1;
  let lastError: unknown;
  let lastResponse: ApiResponse | undefined;
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (attempts > 0 && step.delayMs) {
      await sleep(step.delayMs);
    }
    attempts++;

    try {
      lastResponse = await client.invoke(step.operation, params);
      lastError = undefined;
    } catch (error) {
      // Replay drift is never a step outcome
      if (error instanceof UnexpectedCallError) {
        throw error;
      }
      lastError = error;
      lastResponse = undefined;
      logger.debug({ step: step.name, attempt: attempts, error }, 'Step attempt failed');
      if (error instanceof ApiCallError) {
        continue;
      }
      break;
    }

    if (!step.until || step.until(lastResponse)) {
      const changed = step.changed ? step.changed(lastResponse) : Boolean(step.mutating);
      return { ...base, changed, failed: false, checkMode: false, attempts, response: lastResponse };
    }
  }

  const reason =
    lastError instanceof Error ? lastError.message : lastError !== undefined ? String(lastError) : 'condition not met';
  if (step.ignoreErrors) {
    logger.warn({ step: step.name, attempts, reason }, 'Step failed, ignoring');
    return {
      ...base,
      changed: false,
      failed: true,
      checkMode: false,
      attempts,
      ...(lastResponse ? { response: lastResponse } : {}),
      error: reason,
    };
  }

  throw new StepFailedError(step.name, [], lastError);
}

// Run steps in order; the first failure not ignored aborts the rest
export async function runSteps(
  client: ApiClient,
  steps: readonly StepDefinition[],
  options: StepOptions = {}
): Promise<StepResult[]> {
  const results: StepResult[] = [];

  for (const step of steps) {
    try {
      results.push(await runStep(client, step, options));
    } catch (error) {
      if (error instanceof StepFailedError) {
        throw new StepFailedError<StepResult>(step.name, results, error.failure);
      }
      throw error;
    }
  }

  return results;
}
