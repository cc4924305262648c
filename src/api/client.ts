/**
 * Jellyseerr API Client
 *
 * Thin typed wrapper around the Jellyseerr REST API with:
 * - Expected-status checking on every call (no retries)
 * - JSON logging with secret redaction
 * - Optional cookie session, used by first-time initialization
 */

import type {
  HttpMethod,
  JellyseerrClientConfig,
  RequestOptions,
} from './types.js';
import { isJsonObject } from './types.js';
import { JellyseerrApiError } from './errors.js';
import { logger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Main Jellyseerr client interface
 *
 * Response bodies are returned undecoded (`unknown`); callers narrow them.
 */
export interface JellyseerrClient {
  readonly hostUrl: string;

  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, body?: unknown, options?: RequestOptions): Promise<unknown>;
  put(path: string, body: unknown, options?: RequestOptions): Promise<unknown>;
  delete(path: string, options?: RequestOptions): Promise<void>;

  /** A client sharing one cookie jar across its requests */
  withSession(): JellyseerrClient;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { hostUrl: string; hasApiKey: boolean; timeoutMs: number };
}

/**
 * Builds clients; replaced in tests with an in-process fake
 */
export type ClientFactory = (config: JellyseerrClientConfig) => JellyseerrClient;

const DEFAULT_EXPECTED_STATUS: Record<HttpMethod, number> = {
  GET: 200,
  POST: 201,
  PUT: 200,
  DELETE: 200,
};

// =============================================================================
// Error Extraction
// =============================================================================

/**
 * Build the message for an unexpected response, preferring the body's
 * `message` field, then `error`
 */
export function describeErrorBody(body: unknown, rawText: string): string {
  if (isJsonObject(body)) {
    if (typeof body.message === 'string') return body.message;
    if (typeof body.error === 'string') return body.error;
    return `(Unsupported error JSON format) ${JSON.stringify(body)}`;
  }
  return `(Non-JSON error response) ${rawText.substring(0, 200)}`;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text.length === 0) return { ok: false };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a Jellyseerr API client
 */
export function createClient(config: JellyseerrClientConfig): JellyseerrClient {
  return buildClient(config, undefined);
}

function buildClient(
  config: JellyseerrClientConfig,
  cookies: Map<string, string> | undefined
): JellyseerrClient {
  const hostUrl = config.hostUrl.replace(/\/+$/, '');
  const timeoutMs = config.timeoutMs ?? 30000;
  const log = config.logger ?? logger;

  async function request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions
  ): Promise<unknown> {
    const url = `${hostUrl}/${path.replace(/^\/+/, '')}`;
    const expectedStatus = options.expectedStatus ?? DEFAULT_EXPECTED_STATUS[method];

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (config.apiKey && options.useApiKey !== false) {
      headers['X-Api-Key'] = config.apiKey;
    }
    if (cookies && cookies.size > 0) {
      headers['Cookie'] = Array.from(cookies, ([name, value]) => `${name}=${value}`).join('; ');
    }

    log.request(method, url, { headers, body });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    // DELETE responses carry no body worth parsing
    let text: string | undefined;
    const startTime = Date.now();
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      // The timeout covers the body as well as the headers
      if (method !== 'DELETE') text = await response.text();
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new JellyseerrApiError(`Request failed for '${method} ${url}': ${reason}`, 0, {
        method,
        url,
        cause: err,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (cookies) {
      for (const cookie of response.headers.getSetCookie()) {
        const [pair] = cookie.split(';');
        const separator = pair.indexOf('=');
        if (separator > 0) {
          cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
        }
      }
    }

    const prefix = `Unexpected response with status code ${response.status} from '${method} ${url}'`;

    if (text === undefined) {
      log.response(response.status, url, { durationMs: Date.now() - startTime });
      if (response.status !== expectedStatus) {
        throw new JellyseerrApiError(prefix, response.status, { method, url });
      }
      return undefined;
    }

    const parsed = parseJson(text);
    log.response(response.status, url, {
      durationMs: Date.now() - startTime,
      body: parsed.ok ? parsed.value : undefined,
    });

    if (!parsed.ok || response.status !== expectedStatus) {
      throw new JellyseerrApiError(
        `${prefix}: ${describeErrorBody(parsed.ok ? parsed.value : undefined, text)}`,
        response.status,
        { method, url }
      );
    }

    return parsed.value;
  }

  return {
    hostUrl,

    get(path, options = {}) {
      return request('GET', path, undefined, options);
    },

    post(path, body, options = {}) {
      return request('POST', path, body, options);
    },

    put(path, body, options = {}) {
      return request('PUT', path, body, options);
    },

    async delete(path, options = {}) {
      await request('DELETE', path, undefined, options);
    },

    withSession() {
      return buildClient(config, cookies ?? new Map<string, string>());
    },

    getConfig() {
      return { hostUrl, hasApiKey: Boolean(config.apiKey), timeoutMs };
    },
  };
}
