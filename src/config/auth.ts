/**
 * Instance secrets
 *
 * Every reconciliation pass starts by confirming the API key against
 * `/api/v1/status`, which also reports the server version.
 */

import { createClient, type ClientFactory } from '../api/client.js';
import { JellyseerrApiError, SecretsUnauthorizedError } from '../api/errors.js';
import type { ApiLogger } from '../api/logger.js';
import { expectObject } from '../api/types.js';
import type { InstanceConfig } from './schema.js';

export const STATUS_PATH = '/api/v1/status';

const API_KEY_HINT =
  "and that it is set to the value as shown in 'Settings -> General -> API Key' " +
  'on the Jellyseerr instance.';

/**
 * Verified connection details for one instance
 */
export interface InstanceSecrets {
  hostUrl: string;
  apiKey: string;
  version: string;
}

/**
 * `/base` for a non-empty URL base, `''` otherwise
 */
export function normalizeUrlBase(urlBase: string | null | undefined): string {
  const trimmed = (urlBase ?? '').replace(/^\/+|\/+$/g, '');
  return trimmed ? `/${trimmed}` : '';
}

export function buildHostUrl(
  instance: Pick<InstanceConfig, 'protocol' | 'hostname' | 'port' | 'urlBase'>
): string {
  return `${instance.protocol}://${instance.hostname}:${instance.port}${normalizeUrlBase(instance.urlBase)}`;
}

/**
 * Check the API key against the instance and read its version
 */
export async function fetchInstanceSecrets(
  instance: InstanceConfig,
  options: { logger?: ApiLogger; clientFactory?: ClientFactory } = {}
): Promise<InstanceSecrets> {
  const { logger, clientFactory = createClient } = options;
  const hostUrl = buildHostUrl(instance);
  const apiKey = instance.apiKey;

  if (!apiKey) {
    throw new SecretsUnauthorizedError(
      `API key not found in the configuration for the Jellyseerr instance at '${hostUrl}'. ` +
        `Please check that the API key is set correctly, ${API_KEY_HINT}`
    );
  }

  const client = clientFactory({
    hostUrl,
    apiKey,
    timeoutMs: instance.requestTimeout * 1000,
    logger,
  });

  let status: unknown;
  try {
    status = await client.get(STATUS_PATH);
  } catch (err) {
    if (err instanceof JellyseerrApiError && (err.status === 401 || err.status === 403)) {
      throw new SecretsUnauthorizedError(
        `Incorrect API key for the Jellyseerr instance at '${hostUrl}'. ` +
          `Please check that the API key is set correctly in the configuration, ${API_KEY_HINT}`,
        { cause: err }
      );
    }
    throw err;
  }

  const body = expectObject(status, STATUS_PATH);
  if (typeof body.version !== 'string' || !body.version) {
    throw new SecretsUnauthorizedError(
      `Unable to find Jellyseerr version in status metadata: ${JSON.stringify(body)}`
    );
  }

  return { hostUrl, apiKey, version: body.version };
}
