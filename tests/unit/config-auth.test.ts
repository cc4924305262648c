/**
 * Unit Tests: Instance Secrets
 *
 * @see src/config/auth.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { JellyseerrClientConfig } from '../../src/api/types.js';
import { JellyseerrApiError, SecretsUnauthorizedError } from '../../src/api/errors.js';
import {
  buildHostUrl,
  fetchInstanceSecrets,
  normalizeUrlBase,
  STATUS_PATH,
} from '../../src/config/auth.js';
import { instanceSchema } from '../../src/config/schema.js';
import { FakeJellyseerr } from './helpers/fake-client.js';

// =============================================================================
// Mock Client Factory
// =============================================================================

let fake: FakeJellyseerr;
const clientFactory = vi.fn((_config: JellyseerrClientConfig) => fake);

const API_KEY_HINT =
  "and that it is set to the value as shown in 'Settings -> General -> API Key' on the Jellyseerr instance.";

beforeEach(() => {
  fake = new FakeJellyseerr();
  clientFactory.mockClear();
});

// =============================================================================
// URL Tests
// =============================================================================

describe('buildHostUrl', () => {
  it('should join protocol, host, port and URL base', () => {
    expect(buildHostUrl({ protocol: 'https', hostname: 'requests', port: 443, urlBase: '/jellyseerr/' })).toBe(
      'https://requests:443/jellyseerr'
    );
  });

  it('should omit an empty URL base', () => {
    expect(buildHostUrl({ protocol: 'http', hostname: 'jellyseerr', port: 5055, urlBase: null })).toBe(
      'http://jellyseerr:5055'
    );
  });
});

describe('normalizeUrlBase', () => {
  it('should add a single leading slash', () => {
    expect(normalizeUrlBase('base')).toBe('/base');
    expect(normalizeUrlBase('//base//')).toBe('/base');
    expect(normalizeUrlBase('/')).toBe('');
  });
});

// =============================================================================
// fetchInstanceSecrets Tests
// =============================================================================

describe('fetchInstanceSecrets', () => {
  it('should verify the key and return the server version', async () => {
    fake.reply('GET', STATUS_PATH, { version: '2.0.0', commitTag: 'local' });
    const instance = instanceSchema.parse({ apiKey: 'test-secret', requestTimeout: 5 });

    await expect(fetchInstanceSecrets(instance, { clientFactory })).resolves.toEqual({
      hostUrl: 'http://jellyseerr:5055',
      apiKey: 'test-secret',
      version: '2.0.0',
    });
    expect(clientFactory).toHaveBeenCalledWith({
      hostUrl: 'http://jellyseerr:5055',
      apiKey: 'test-secret',
      timeoutMs: 5000,
      logger: undefined,
    });
  });

  it('should fail without calling the instance when no key is configured', async () => {
    const request = fetchInstanceSecrets(instanceSchema.parse({}), { clientFactory });

    await expect(request).rejects.toThrow(SecretsUnauthorizedError);
    await expect(request).rejects.toThrow(
      "API key not found in the configuration for the Jellyseerr instance at 'http://jellyseerr:5055'. " +
        `Please check that the API key is set correctly, ${API_KEY_HINT}`
    );
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('should explain a rejected key', async () => {
    fake.fail('GET', STATUS_PATH, 401, 'Unauthorized');

    await expect(
      fetchInstanceSecrets(instanceSchema.parse({ apiKey: 'test-secret' }), { clientFactory })
    ).rejects.toThrow(
      "Incorrect API key for the Jellyseerr instance at 'http://jellyseerr:5055'. " +
        `Please check that the API key is set correctly in the configuration, ${API_KEY_HINT}`
    );
  });

  it('should pass server errors through', async () => {
    fake.fail('GET', STATUS_PATH, 500, 'Internal Server Error');

    await expect(
      fetchInstanceSecrets(instanceSchema.parse({ apiKey: 'test-secret' }), { clientFactory })
    ).rejects.toThrow(JellyseerrApiError);
  });

  it('should require a version in the status response', async () => {
    fake.reply('GET', STATUS_PATH, { commitTag: 'local' });

    await expect(
      fetchInstanceSecrets(instanceSchema.parse({ apiKey: 'test-secret' }), { clientFactory })
    ).rejects.toThrow('Unable to find Jellyseerr version in status metadata: {"commitTag":"local"}');
  });
});
