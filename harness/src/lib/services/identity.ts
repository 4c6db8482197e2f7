import { userInfo } from 'node:os';
import { OperationName, type CallerIdentity } from '@fixture-harness/shared';
import type { ApiClient } from '../client.js';
import { callerIdentitySchema, parseWith } from '../validation.js';

// Must be called with a live client so the lookup stays out of the recording
export async function resolveCallerIdentity(client: ApiClient): Promise<CallerIdentity> {
  const response = await client.invoke(OperationName.STS_GET_CALLER_IDENTITY);
  const body = parseWith(callerIdentitySchema, response.body, 'caller identity');
  return { account: body.Account, userId: body.UserId, arn: body.Arn };
}

export function localUsername(): string {
  return userInfo().username;
}
