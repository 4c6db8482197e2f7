import { z, ZodError } from 'zod';
import type { JsonObject, JsonValue } from '@fixture-harness/shared';
import { ValidationError } from './errors.js';

// Common validators
export const operationNameSchema = z.string().regex(/^[a-z0-9-]+:[A-Za-z0-9]+$/);
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);
export const isoTimestampSchema = z.string().datetime();

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), jsonValueSchema);

// Fixture schemas
export const recordedErrorSchema = z.object({
  name: z.string().min(1),
  code: z.string().min(1),
  message: z.string(),
  httpStatusCode: z.number().int().optional(),
});

export const recordedCallSchema = z.object({
  callIndex: z.number().int().min(1),
  operationName: operationNameSchema,
  requestParameters: jsonObjectSchema,
  responseBody: jsonObjectSchema,
  responseMetadata: jsonObjectSchema,
  error: recordedErrorSchema.optional(),
});

export const fixtureFileSchema = z
  .object({
    operationName: operationNameSchema,
    calls: z.array(recordedCallSchema),
  })
  .superRefine((file, ctx) => {
    file.calls.forEach((call, i) => {
      if (call.operationName !== file.operationName) {
        ctx.addIssue({
          code: 'custom',
          path: ['calls', i, 'operationName'],
          message: `Expected ${file.operationName}, got ${call.operationName}`,
        });
      }
      const previous = file.calls[i - 1];
      if (previous && call.callIndex <= previous.callIndex) {
        ctx.addIssue({
          code: 'custom',
          path: ['calls', i, 'callIndex'],
          message: 'callIndex must be strictly increasing',
        });
      }
    });
  });

export const sessionManifestSchema = z.object({
  sessionId: ulidSchema,
  startedAt: isoTimestampSchema,
  nextCallIndex: z.number().int().min(1),
});

export const archiveEntrySchema = z.object({
  name: z.string().regex(/^[^/\\]+$/),
  content: z.string(),
});

export const fixtureArchiveSchema = z.object({
  format: z.literal('fixture-archive'),
  version: z.literal(1),
  sessionId: ulidSchema,
  createdAt: isoTimestampSchema,
  files: z.array(archiveEntrySchema),
});

export const replayCursorSchema = z.object({
  consumed: z.record(z.string(), z.number().int().min(0)),
});

export const callerIdentitySchema = z.object({
  Account: z.string().min(1),
  UserId: z.string().min(1),
  Arn: z.string().min(1),
});

// Operation parameter schemas
const filterSchema = z.object({
  Name: z.string(),
  Values: z.array(z.string()),
});

export const describeInstancesSchema = z
  .object({
    InstanceIds: z.array(z.string()).optional(),
    Filters: z.array(filterSchema).optional(),
    MaxResults: z.number().int().min(5).max(1000).optional(),
    NextToken: z.string().optional(),
    DryRun: z.boolean().optional(),
  })
  .strict();

export const terminateInstancesSchema = z
  .object({
    InstanceIds: z.array(z.string()).min(1),
    DryRun: z.boolean().optional(),
  })
  .strict();

export const roleNameSchema = z.object({ RoleName: z.string().min(1).max(64) }).strict();

export const createRoleSchema = z
  .object({
    RoleName: z.string().min(1).max(64),
    AssumeRolePolicyDocument: z.string().min(1),
    Path: z.string().optional(),
    Description: z.string().max(1000).optional(),
    MaxSessionDuration: z.number().int().min(3600).max(43200).optional(),
  })
  .strict();

export const emptyParamsSchema = z.object({}).strict();

// Parse with a schema, reporting failures as ValidationError
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(`Invalid ${what}`, {
        issues: error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      });
    }
    throw error;
  }
}
