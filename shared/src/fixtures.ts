import type { ScrubTarget } from './enums.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// API error captured in place of a response
export interface RecordedError {
  name: string;
  code: string;
  message: string;
  httpStatusCode?: number;
}

// One API call captured during a record session
export interface RecordedCall {
  callIndex: number;              // 1-based, increasing across the whole session
  operationName: string;          // e.g. ec2:DescribeInstances
  requestParameters: JsonObject;
  responseBody: JsonObject;
  responseMetadata: JsonObject;   // SDK $metadata: status, request id, attempts
  error?: RecordedError;
}

// All calls to one operation, stored as <service>.<Action>.json
export interface FixtureFile {
  operationName: string;
  calls: RecordedCall[];
}

// Bookkeeping for a recording directory, stored as _session.json
export interface SessionManifest {
  sessionId: string;
  startedAt: string;
  nextCallIndex: number;
}

export interface ArchiveEntry {
  name: string;
  content: string;
}

// Compressed bundle of a scrubbed recording directory
export interface FixtureArchive {
  format: 'fixture-archive';
  version: 1;
  sessionId: string;
  createdAt: string;
  files: ArchiveEntry[];
}

// Replay progress shared by the processes of one replay session
export interface ReplayCursor {
  consumed: Record<string, number>;
}

export interface ScrubRule {
  target: ScrubTarget;
  pattern: string;
  replacement: string;
}

export interface CallerIdentity {
  account: string;
  userId: string;
  arn: string;
}

// Values substituted for each scrub target
export type ScrubPlaceholders = Record<ScrubTarget, string>;
