/**
 * Jellyseerr API module
 *
 * Provides:
 * - JellyseerrClient with expected-status checking and an optional cookie session
 * - Error hierarchy shared by every reconciler
 * - JSON logging with secret redaction
 */

export { createClient, describeErrorBody } from './client.js';
export type { ClientFactory, JellyseerrClient } from './client.js';

export {
  ConfigValidationError,
  errorMessage,
  JellyseerrApiError,
  JellyseerrError,
  PermissionHierarchyError,
  RemoteDecodeError,
  ResolutionError,
  SecretsError,
  SecretsUnauthorizedError,
} from './errors.js';
export type { ConfigIssue } from './errors.js';

export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactObject,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export { expectArray, expectObject, isJsonObject } from './types.js';
export type { HttpMethod, JellyseerrClientConfig, JsonObject, RequestOptions } from './types.js';
