import type { JsonObject } from '@fixture-harness/shared';

export interface ApiResponse {
  body: JsonObject;
  metadata: JsonObject;
}

/**
 * The single seam between test logic and AWS.
 *
 * Implementations: `AwsApiClient` (live), `RecordingClient`
 * (passthrough-and-record) and `ReplayClient` (archive-backed). A failed API
 * call rejects with `ApiCallError` in all three.
 */
export interface ApiClient {
  invoke(operation: string, params?: JsonObject): Promise<ApiResponse>;
}
