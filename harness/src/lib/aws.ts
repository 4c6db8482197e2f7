import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import {
  EC2Client,
  DescribeInstancesCommand,
  TerminateInstancesCommand,
} from '@aws-sdk/client-ec2';
import {
  IAMClient,
  GetRoleCommand,
  CreateRoleCommand,
  DeleteRoleCommand,
} from '@aws-sdk/client-iam';
import type { z } from 'zod';
import { OperationName, type JsonObject } from '@fixture-harness/shared';
import type { ApiClient, ApiResponse } from './client.js';
import { config } from './config.js';
import { AppError, ApiCallError, UnknownOperationError } from './errors.js';
import { toJsonObject } from './json.js';
import { logger } from './logger.js';
import {
  createRoleSchema,
  describeInstancesSchema,
  emptyParamsSchema,
  parseWith,
  roleNameSchema,
  terminateInstancesSchema,
} from './validation.js';

// Connection settings shared by every operation of a client
export interface ConnectionDefaults {
  region: string;
  profile?: string;
  endpoint?: string;
  maxAttempts?: number;
}

// Every SDK command output carries $metadata next to the payload
interface SdkOutput {
  $metadata: object;
}

// SDK clients are created on first use, one per service
class AwsClients {
  private stsClient: STSClient | undefined;
  private ec2Client: EC2Client | undefined;
  private iamClient: IAMClient | undefined;

  constructor(private readonly defaults: ConnectionDefaults) {}

  private clientConfig() {
    return {
      region: this.defaults.region,
      maxAttempts: this.defaults.maxAttempts,
      ...(this.defaults.profile ? { profile: this.defaults.profile } : {}),
      ...(this.defaults.endpoint ? { endpoint: this.defaults.endpoint } : {}),
    };
  }

  get sts(): STSClient {
    if (!this.stsClient) this.stsClient = new STSClient(this.clientConfig());
    return this.stsClient;
  }

  get ec2(): EC2Client {
    if (!this.ec2Client) this.ec2Client = new EC2Client(this.clientConfig());
    return this.ec2Client;
  }

  get iam(): IAMClient {
    if (!this.iamClient) this.iamClient = new IAMClient(this.clientConfig());
    return this.iamClient;
  }

  destroy(): void {
    this.stsClient?.destroy();
    this.ec2Client?.destroy();
    this.iamClient?.destroy();
  }
}

interface OperationHandler {
  validate(params: JsonObject): void;
  send(clients: AwsClients, params: JsonObject): Promise<SdkOutput>;
}

function defineOperation<S extends z.ZodTypeAny>(
  operation: OperationName,
  schema: S,
  send: (clients: AwsClients, input: z.output<S>) => Promise<SdkOutput>
): [string, OperationHandler] {
  const parse = (params: JsonObject): z.output<S> => parseWith(schema, params, `${operation} parameters`);
  return [
    operation,
    {
      validate: (params) => {
        parse(params);
      },
      send: (clients, params) => send(clients, parse(params)),
    },
  ];
}

const operationHandlers = new Map<string, OperationHandler>([
  defineOperation(OperationName.STS_GET_CALLER_IDENTITY, emptyParamsSchema, (clients) =>
    clients.sts.send(new GetCallerIdentityCommand({}))
  ),
  defineOperation(OperationName.EC2_DESCRIBE_INSTANCES, describeInstancesSchema, (clients, input) =>
    clients.ec2.send(new DescribeInstancesCommand(input))
  ),
  defineOperation(OperationName.EC2_TERMINATE_INSTANCES, terminateInstancesSchema, (clients, input) =>
    clients.ec2.send(new TerminateInstancesCommand(input))
  ),
  defineOperation(OperationName.IAM_GET_ROLE, roleNameSchema, (clients, input) =>
    clients.iam.send(new GetRoleCommand(input))
  ),
  defineOperation(OperationName.IAM_CREATE_ROLE, createRoleSchema, (clients, input) =>
    clients.iam.send(new CreateRoleCommand(input))
  ),
  defineOperation(OperationName.IAM_DELETE_ROLE, roleNameSchema, (clients, input) =>
    clients.iam.send(new DeleteRoleCommand(input))
  ),
]);

function handlerFor(operation: string): OperationHandler {
  const handler = operationHandlers.get(operation);
  if (!handler) {
    throw new UnknownOperationError(operation);
  }
  return handler;
}

/**
 * The checks every client runs before a call counts: the operation must be
 * known and its parameters valid. Nothing is sent.
 */
export function validateOperation(operation: string, params: JsonObject): void {
  handlerFor(operation).validate(params);
}

export function supportedOperations(): string[] {
  return [...operationHandlers.keys()];
}

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

// Map whatever the SDK threw onto the harness error taxonomy
export function toApiCallError(operation: string, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new ApiCallError(operation, error.name, error.message, httpStatusOf(error));
  }
  return new ApiCallError(operation, 'UnknownError', String(error));
}

// Split SDK output into the recorded body and metadata
export function splitOutput(output: SdkOutput): ApiResponse {
  const { $metadata, ...body } = output;
  return {
    body: toJsonObject(body),
    metadata: toJsonObject($metadata),
  };
}

export class AwsApiClient implements ApiClient {
  private readonly clients: AwsClients;

  constructor(defaults: ConnectionDefaults = config.aws) {
    this.clients = new AwsClients(defaults);
  }

  async invoke(operation: string, params: JsonObject = {}): Promise<ApiResponse> {
    const handler = handlerFor(operation);

    let output: SdkOutput;
    try {
      output = await handler.send(this.clients, params);
    } catch (error) {
      const mapped = toApiCallError(operation, error);
      logger.debug({ operation, code: mapped.code }, 'AWS call failed');
      throw mapped;
    }

    logger.debug({ operation }, 'AWS call succeeded');
    return splitOutput(output);
  }

  destroy(): void {
    this.clients.destroy();
  }
}
