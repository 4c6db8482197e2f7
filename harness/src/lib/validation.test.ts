import { describe, it, expect } from 'vitest';
import {
  operationNameSchema,
  fixtureFileSchema,
  fixtureArchiveSchema,
  sessionManifestSchema,
  describeInstancesSchema,
  terminateInstancesSchema,
  createRoleSchema,
  jsonObjectSchema,
  parseWith,
} from './validation.js';
import { ValidationError } from './errors.js';

const call = (callIndex: number, operationName = 'ec2:DescribeInstances') => ({
  callIndex,
  operationName,
  requestParameters: {},
  responseBody: { Reservations: [] },
  responseMetadata: { httpStatusCode: 200 },
});

describe('validation schemas', () => {
  describe('operationNameSchema', () => {
    it('accepts service:Action names', () => {
      expect(operationNameSchema.safeParse('ec2:DescribeInstances').success).toBe(true);
      expect(operationNameSchema.safeParse('resource-groups:ListGroups').success).toBe(true);
    });

    it('rejects names without a service prefix', () => {
      expect(operationNameSchema.safeParse('DescribeInstances').success).toBe(false);
      expect(operationNameSchema.safeParse('EC2:DescribeInstances').success).toBe(false);
      expect(operationNameSchema.safeParse('ec2:Describe/Instances').success).toBe(false);
    });
  });

  describe('jsonObjectSchema', () => {
    it('accepts nested JSON data', () => {
      const value = { a: [1, 'two', null, { b: true }] };
      expect(jsonObjectSchema.parse(value)).toEqual(value);
    });

    it('rejects arrays at the top level', () => {
      expect(jsonObjectSchema.safeParse([1, 2]).success).toBe(false);
    });
  });

  describe('fixtureFileSchema', () => {
    it('accepts calls in increasing order', () => {
      const file = { operationName: 'ec2:DescribeInstances', calls: [call(1), call(4), call(7)] };
      expect(fixtureFileSchema.parse(file).calls.map((c) => c.callIndex)).toEqual([1, 4, 7]);
    });

    it('rejects calls out of order', () => {
      const file = { operationName: 'ec2:DescribeInstances', calls: [call(2), call(2)] };
      expect(fixtureFileSchema.safeParse(file).success).toBe(false);
    });

    it('rejects calls to another operation', () => {
      const file = { operationName: 'ec2:DescribeInstances', calls: [call(1, 'iam:GetRole')] };
      expect(fixtureFileSchema.safeParse(file).success).toBe(false);
    });

    it('accepts a recorded error', () => {
      const file = {
        operationName: 'iam:GetRole',
        calls: [
          {
            ...call(1, 'iam:GetRole'),
            responseBody: {},
            error: { name: 'ApiCallError', code: 'NoSuchEntity', message: 'not found', httpStatusCode: 404 },
          },
        ],
      };
      expect(fixtureFileSchema.parse(file).calls[0]?.error?.code).toBe('NoSuchEntity');
    });
  });

  describe('sessionManifestSchema', () => {
    it('requires a ULID session id', () => {
      const manifest = { sessionId: 'not-a-ulid', startedAt: '2026-01-01T00:00:00.000Z', nextCallIndex: 1 };
      expect(sessionManifestSchema.safeParse(manifest).success).toBe(false);
      expect(
        sessionManifestSchema.safeParse({ ...manifest, sessionId: '01ARZ3NDEKTSV4RRFFQ69G5FAV' }).success
      ).toBe(true);
    });
  });

  describe('fixtureArchiveSchema', () => {
    const archive = {
      format: 'fixture-archive',
      version: 1,
      sessionId: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
      createdAt: '2026-01-01T00:00:00.000Z',
      files: [{ name: 'ec2.DescribeInstances.json', content: '{}' }],
    };

    it('accepts a well-formed archive', () => {
      expect(fixtureArchiveSchema.safeParse(archive).success).toBe(true);
    });

    it('rejects unknown versions', () => {
      expect(fixtureArchiveSchema.safeParse({ ...archive, version: 2 }).success).toBe(false);
    });

    it('rejects file names with path separators', () => {
      const files = [{ name: '../escape.json', content: '{}' }];
      expect(fixtureArchiveSchema.safeParse({ ...archive, files }).success).toBe(false);
    });
  });

  describe('operation parameter schemas', () => {
    it('accepts DescribeInstances filters', () => {
      const params = { Filters: [{ Name: 'tag:Name', Values: ['test-prefix-*'] }] };
      expect(describeInstancesSchema.parse(params)).toEqual(params);
    });

    it('rejects unknown DescribeInstances parameters', () => {
      expect(describeInstancesSchema.safeParse({ InstanceId: 'i-123' }).success).toBe(false);
    });

    it('requires at least one instance to terminate', () => {
      expect(terminateInstancesSchema.safeParse({ InstanceIds: [] }).success).toBe(false);
    });

    it('requires a trust policy for CreateRole', () => {
      expect(createRoleSchema.safeParse({ RoleName: 'test-role' }).success).toBe(false);
    });
  });

  describe('parseWith', () => {
    it('returns parsed data', () => {
      expect(parseWith(terminateInstancesSchema, { InstanceIds: ['i-1'] }, 'params')).toEqual({
        InstanceIds: ['i-1'],
      });
    });

    it('throws ValidationError with issue paths', () => {
      try {
        parseWith(terminateInstancesSchema, { InstanceIds: [1] }, 'ec2:TerminateInstances parameters');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.message).toBe('Invalid ec2:TerminateInstances parameters');
          expect(error.details?.issues).toEqual([
            { path: 'InstanceIds.0', message: expect.any(String) },
          ]);
        }
      }
    });
  });
});
