import type { JsonObject, JsonValue } from '@fixture-harness/shared';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert an SDK value into JSON data.
 *
 * Dates become ISO-8601 strings and binary payloads base64, so a recorded
 * response reads back exactly as it was stored. `undefined` members are
 * dropped; functions and symbols are not representable and are dropped too.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item) ?? null);
  }
  if (value instanceof Map) {
    return toJsonObject(Object.fromEntries(value));
  }
  if (value instanceof Set) {
    return Array.from(value, (item) => toJsonValue(item) ?? null);
  }
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return toJsonObject(value);
  }
  return String(value);
}

export function toJsonObject(value: object): JsonObject {
  const result: JsonObject = {};
  for (const [key, nested] of Object.entries(value)) {
    const converted = toJsonValue(nested);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  return result;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Stable pretty-printed form used for every file the harness writes
export function formatJson(value: JsonValue | object): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
