/**
 * Unit Tests: Configuration Loading
 *
 * Tests the configuration layer including:
 * - Single and multi-instance documents
 * - Instance block merging
 * - Environment fallbacks
 * - Validation issues with dotted paths
 * - Linked Radarr/Sonarr instance secrets
 *
 * @see src/config/loader.ts
 * @see src/config/merge.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, JellyseerrError } from '../../src/api/errors.js';
import {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from '../../src/config/loader.js';
import { deepMerge } from '../../src/config/merge.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const RADARR_DEFINITION = {
  hostname: 'radarr',
  apiKey: 'test-secret',
  rootFolder: '/data/movies',
  qualityProfile: 'HD-1080p',
};

function issuesOf(data: unknown): unknown {
  try {
    parseConfig(data);
  } catch (err) {
    if (err instanceof ConfigValidationError) return err.issues;
    throw err;
  }
  throw new Error('Expected a ConfigValidationError');
}

// =============================================================================
// parseConfig Tests
// =============================================================================

describe('parseConfig', () => {
  it('should read a single instance from the top-level block', () => {
    const config = parseConfig({
      jellyseerr: {
        hostname: 'requests',
        apiKey: 'test-secret',
        settings: { general: { applicationTitle: 'Media' } },
      },
    });

    expect(config.instances).toHaveLength(1);
    const [instance] = config.instances;
    expect(instance.name).toBe('default');
    expect(instance.tree).toBe('jellyseerr');
    expect(instance.config).toMatchObject({
      hostname: 'requests',
      port: 5055,
      protocol: 'http',
      urlBase: null,
      apiKey: 'test-secret',
      requestTimeout: 30,
    });
    expect(instance.config.settings.general.applicationTitle).toBe('Media');
    expect(instance.config.settings.users.defaultPermissions).toEqual(['request', 'request-4k']);
  });

  it('should fill an empty document with defaults', () => {
    const [instance] = parseConfig(null).instances;

    expect(instance.config.hostname).toBe('jellyseerr');
    expect(instance.config.apiKey).toBeNull();
  });

  it('should merge each instance block over the shared block', () => {
    const config = parseConfig({
      jellyseerr: {
        apiKey: 'test-secret',
        settings: { general: { applicationTitle: 'Shared' } },
        instances: {
          main: {},
          kids: {
            hostname: 'kids.local',
            settings: { general: { hideAvailableMedia: true } },
          },
        },
      },
    });

    expect(config.instances.map((instance) => [instance.name, instance.tree, instance.config.hostname])).toEqual([
      ['main', 'jellyseerr.instances.main', 'main'],
      ['kids', 'jellyseerr.instances.kids', 'kids.local'],
    ]);
    const kids = config.instances[1].config.settings.general;
    expect(kids.applicationTitle).toBe('Shared');
    expect(kids.hideAvailableMedia).toBe(true);
  });

  it('should take the API key from the environment when unset', () => {
    vi.stubEnv('JELLYSEERR_API_KEY', 'env-secret');

    expect(parseConfig({ jellyseerr: {} }).instances[0].config.apiKey).toBe('env-secret');
  });

  it('should report every issue with its full path', () => {
    expect(
      issuesOf({ jellyseerr: { port: 70000, settings: { users: { globalMovieRequestLimit: 101 } } } })
    ).toEqual([
      { path: 'jellyseerr.port', message: 'Number must be less than or equal to 65535' },
      {
        path: 'jellyseerr.settings.users.globalMovieRequestLimit',
        message: 'Number must be less than or equal to 100',
      },
    ]);
  });

  it('should reject unknown settings', () => {
    expect(issuesOf({ jellyseerr: { settings: { general: { title: 'Media' } } } })).toEqual([
      { path: 'jellyseerr.settings.general', message: "Unrecognized key(s) in object: 'title'" },
    ]);
  });

  it('should prefix issues with the instance path', () => {
    expect(issuesOf({ jellyseerr: { instances: { kids: { protocol: 'ftp' } } } })).toMatchObject([
      { path: 'jellyseerr.instances.kids.protocol' },
    ]);
  });

  it('should reject two default servers of the same kind', () => {
    expect(
      issuesOf({
        jellyseerr: {
          settings: {
            services: {
              radarr: {
                definitions: {
                  a: { ...RADARR_DEFINITION, isDefaultServer: true },
                  b: { ...RADARR_DEFINITION, isDefaultServer: true },
                },
              },
            },
          },
        },
      })
    ).toEqual([
      {
        path: 'jellyseerr.settings.services.radarr.definitions',
        message: "more than one instance set as the non-4K default: 'a', 'b'",
      },
    ]);
  });

  it('should reject a document whose jellyseerr block is not a mapping', () => {
    expect(issuesOf({ jellyseerr: 'requests' })).toEqual([
      { path: 'jellyseerr', message: 'Expected object, received string' },
    ]);
  });

  it('should collect linked instance API keys', () => {
    const config = parseConfig({
      radarr: { instances: { movies: { hostname: 'radarr', apiKey: 'radarr-secret' } } },
    });

    expect(config.secrets.radarr.get('movies')).toEqual({ apiKey: 'radarr-secret' });
    expect(config.secrets.sonarr.size).toBe(0);
  });
});

// =============================================================================
// deepMerge Tests
// =============================================================================

describe('deepMerge', () => {
  it('should merge nested objects and replace everything else', () => {
    expect(
      deepMerge(
        { port: 5055, settings: { general: { applicationTitle: 'A', discoverLanguages: ['en'] } } },
        { settings: { general: { discoverLanguages: ['ja'] } }, port: undefined }
      )
    ).toEqual({
      port: 5055,
      settings: { general: { applicationTitle: 'A', discoverLanguages: ['ja'] } },
    });
  });
});

// =============================================================================
// File Loading Tests
// =============================================================================

describe('resolveConfigPath', () => {
  it('should prefer an explicit path, then the environment', () => {
    vi.stubEnv('JELLYSEERR_SYNC_CONFIG', '/etc/jellyseerr-sync.yml');

    expect(resolveConfigPath('local.yml')).toBe('local.yml');
    expect(resolveConfigPath()).toBe('/etc/jellyseerr-sync.yml');
  });

  it('should fall back to the default file name', () => {
    expect(resolveConfigPath()).toBe(DEFAULT_CONFIG_PATH);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jellyseerr-sync-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML file', async () => {
    const path = join(dir, 'config.yml');
    await writeFile(path, 'jellyseerr:\n  hostname: requests\n  apiKey: test-secret\n');

    const config = await loadConfig(path);

    expect(config.source).toBe(path);
    expect(config.instances[0].config.hostname).toBe('requests');
  });

  it('should name a file it cannot read', async () => {
    const path = join(dir, 'missing.yml');

    await expect(loadConfig(path)).rejects.toThrow(JellyseerrError);
    await expect(loadConfig(path)).rejects.toThrow(`Failed to read configuration file '${path}'`);
  });

  it('should name a file it cannot parse', async () => {
    const path = join(dir, 'broken.yml');
    await writeFile(path, 'jellyseerr: [\n');

    await expect(loadConfig(path)).rejects.toThrow(`Failed to parse configuration file '${path}'`);
  });

  it('should attach the file name to validation errors', async () => {
    const path = join(dir, 'invalid.yml');
    await writeFile(path, 'jellyseerr:\n  port: 0\n');

    await expect(loadConfig(path)).rejects.toMatchObject({ source: path });
  });
});
