/**
 * Transport types and JSON narrowing helpers
 */

import { JellyseerrApiError } from './errors.js';
import type { ApiLogger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * A decoded JSON object from the remote API
 */
export type JsonObject = Record<string, unknown>;

/**
 * HTTP methods used by the client
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Client configuration
 */
export interface JellyseerrClientConfig {
  /** Base URL of the instance, e.g. `http://jellyseerr:5055` */
  hostUrl: string;
  /** Sent as `X-Api-Key` unless a request suppresses it */
  apiKey?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Logger for request/response tracing */
  logger?: ApiLogger;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Status the call must return (GET/PUT/DELETE: 200, POST: 201) */
  expectedStatus?: number;
  /** Attach the API key header (default: true) */
  useApiKey?: boolean;
}

// =============================================================================
// Narrowing Helpers
// =============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Assert that a response body is a JSON object
 */
export function expectObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new JellyseerrApiError(`Unexpected response for ${what}: expected an object`, 200);
  }
  return value;
}

/**
 * Assert that a response body is a JSON array
 */
export function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new JellyseerrApiError(`Unexpected response for ${what}: expected an array`, 200);
  }
  return value;
}
