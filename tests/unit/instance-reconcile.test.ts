/**
 * Unit Tests: Instance Reconciliation Driver
 *
 * Tests the full pass over one instance against an in-process fake:
 * - Initialization check, key verification and version warning
 * - Section updates and change collection
 * - Dry-run mode
 * - First-time initialization
 *
 * @see src/reconcilers/instance.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { JellyseerrClientConfig } from '../../src/api/types.js';
import { createLogger } from '../../src/api/logger.js';
import { STATUS_PATH } from '../../src/config/auth.js';
import { parseConfig, type ResolvedInstance } from '../../src/config/loader.js';
import { emptySecretsContext } from '../../src/reconcilers/core/types.js';
import { MAIN_SETTINGS_PATH } from '../../src/reconcilers/general/index.js';
import { JELLYFIN_LIBRARY_PATH, JELLYFIN_SETTINGS_PATH } from '../../src/reconcilers/jellyfin/index.js';
import {
  INITIALIZE_PATH,
  JELLYFIN_AUTH_PATH,
  PUBLIC_SETTINGS_PATH,
} from '../../src/reconcilers/jellyfin/initialize.js';
import {
  createReconcileContext,
  formatChange,
  readRemoteSettings,
  reconcileInstance,
} from '../../src/reconcilers/instance.js';
import { FakeJellyseerr, quietLogger } from './helpers/fake-client.js';
import { seedInstance, SERVER_VERSION } from './helpers/instance-fixtures.js';

// =============================================================================
// Mock Client Factory
// =============================================================================

let fake: FakeJellyseerr;
const clientFactory = vi.fn((_config: JellyseerrClientConfig) => fake);

function instanceFrom(jellyseerr: Record<string, unknown>): ResolvedInstance {
  return parseConfig({ jellyseerr: { apiKey: 'test-secret', ...jellyseerr } }).instances[0];
}

function reconcile(instance: ResolvedInstance, dryRun = false) {
  return reconcileInstance(instance, {
    dryRun,
    secrets: emptySecretsContext(),
    logger: quietLogger(),
    clientFactory,
  });
}

beforeEach(() => {
  fake = seedInstance(new FakeJellyseerr());
  clientFactory.mockClear();
});

// =============================================================================
// reconcileInstance Tests
// =============================================================================

describe('reconcileInstance', () => {
  it('should apply local settings and collect prefixed changes', async () => {
    const result = await reconcile(instanceFrom({ settings: { general: { applicationTitle: 'Media' } } }));

    expect(result).toEqual({
      instance: 'default',
      hostUrl: 'http://jellyseerr:5055',
      version: SERVER_VERSION,
      initialized: false,
      changed: true,
      changes: [
        {
          path: 'jellyseerr.settings.general.applicationTitle',
          type: 'modified',
          localValue: 'Media',
          remoteValue: 'Jellyseerr',
        },
      ],
    });
    expect(fake.writes().map((call) => `${call.method} ${call.path}`)).toEqual([`POST ${MAIN_SETTINGS_PATH}`]);
  });

  it('should check initialization without the API key', async () => {
    await reconcile(instanceFrom({}));

    expect(clientFactory.mock.calls[0][0].apiKey).toBeUndefined();
    expect(clientFactory.mock.calls[clientFactory.mock.calls.length - 1][0]).toMatchObject({
      hostUrl: 'http://jellyseerr:5055',
      apiKey: 'test-secret',
      timeoutMs: 30000,
    });
    expect(fake.calls[0].path).toBe(PUBLIC_SETTINGS_PATH);
    expect(fake.calls[1].path).toBe(STATUS_PATH);
  });

  it('should report an instance already matching its configuration as unchanged', async () => {
    const result = await reconcile(instanceFrom({}));

    expect(result.changed).toBe(false);
    expect(result.changes).toEqual([]);
    expect(fake.writes()).toEqual([]);
  });

  it('should report but not apply changes in dry-run mode', async () => {
    const result = await reconcile(
      instanceFrom({ settings: { users: { enableLocalSignin: false } } }),
      true
    );

    expect(result.changes.map((change) => change.path)).toEqual(['jellyseerr.settings.users.enableLocalSignin']);
    expect(fake.writes()).toEqual([]);
  });

  it('should warn when the server version differs from the expected one', async () => {
    const output = vi.spyOn(console, 'error').mockImplementation(() => {});

    await reconcileInstance(instanceFrom({ version: '1.9.0' }), {
      dryRun: false,
      secrets: emptySecretsContext(),
      logger: createLogger({ level: 'warn' }),
      clientFactory,
    });

    expect(
      output.mock.calls.some(([line]) => String(line).includes('Expected Jellyseerr version 1.9.0, found 2.0.0'))
    ).toBe(true);
  });

  it('should stop before any configuration read when the key is rejected', async () => {
    fake.fail('GET', STATUS_PATH, 403, 'Forbidden');

    await expect(reconcile(instanceFrom({}))).rejects.toThrow('Incorrect API key');
    expect(fake.callsTo('GET', MAIN_SETTINGS_PATH)).toEqual([]);
  });
});

// =============================================================================
// Initialization Tests
// =============================================================================

describe('reconcileInstance on an uninitialized instance', () => {
  const jellyfin = {
    serverUrl: 'http://jellyfin:8096',
    username: 'admin',
    password: 'test-password',
    emailAddress: 'admin@example.com',
    libraries: ['Movies'],
  };

  beforeEach(() => {
    fake.reply('GET', PUBLIC_SETTINGS_PATH, { initialized: false });
  });

  it('should only report the initialization in dry-run mode', async () => {
    const result = await reconcile(instanceFrom({}), true);

    expect(result).toMatchObject({ initialized: true, changed: true });
    expect(result.changes).toEqual([
      { path: 'jellyseerr', type: 'added', localValue: '(initialized)', remoteValue: undefined },
    ]);
    expect(fake.callsTo('GET', STATUS_PATH)).toEqual([]);
  });

  it('should refuse to initialize without the Jellyfin credentials', async () => {
    await expect(reconcile(instanceFrom({}))).rejects.toThrow(
      'Unable to initialise Jellyseerr instance, required attributes are missing.'
    );
  });

  it('should initialize and then reconcile', async () => {
    fake
      .reply('POST', JELLYFIN_AUTH_PATH, { id: 1 })
      .reply('GET', `${JELLYFIN_LIBRARY_PATH}?sync=true`, [{ id: 'lib1', name: 'Movies', enabled: false }])
      .reply('GET', `${JELLYFIN_LIBRARY_PATH}?enable=lib1`, [])
      .reply('POST', INITIALIZE_PATH, { initialized: true })
      .reply('GET', JELLYFIN_SETTINGS_PATH, {
        externalHostname: '',
        libraries: [{ id: 'lib1', name: 'Movies', enabled: true }],
      });

    const result = await reconcile(instanceFrom({ settings: { jellyfin } }));

    expect(result).toMatchObject({ initialized: true, changed: true, changes: [] });
    expect(fake.callsTo('POST', INITIALIZE_PATH)).toHaveLength(1);
    expect(fake.callsTo('POST', JELLYFIN_SETTINGS_PATH)).toEqual([]);
  });
});

// =============================================================================
// Reporting Tests
// =============================================================================

describe('formatChange', () => {
  it('should show added values', () => {
    expect(formatChange({ path: 'a.b', type: 'added', localValue: 'x', remoteValue: undefined })).toBe('a.b: "x"');
  });

  it('should show deletions', () => {
    expect(formatChange({ path: 'a.b', type: 'removed', localValue: undefined, remoteValue: '(...)' })).toBe(
      'a.b: (...) -> (deleted)'
    );
  });

  it('should show old and new values', () => {
    expect(formatChange({ path: 'a.b', type: 'modified', localValue: 5, remoteValue: undefined })).toBe(
      'a.b: (none) -> 5'
    );
  });
});

describe('createReconcileContext', () => {
  it('should prefix reported paths with the instance tree', () => {
    const changes: Parameters<typeof formatChange>[0][] = [];
    const ctx = createReconcileContext(
      fake,
      { tree: 'jellyseerr.instances.main', secrets: emptySecretsContext(), logger: quietLogger(), dryRun: false },
      changes
    );

    ctx.report([{ path: 'settings.general.applicationTitle', type: 'modified', localValue: 'B', remoteValue: 'A' }]);

    expect(changes).toEqual([
      {
        path: 'jellyseerr.instances.main.settings.general.applicationTitle',
        type: 'modified',
        localValue: 'B',
        remoteValue: 'A',
      },
    ]);
  });
});

describe('readRemoteSettings', () => {
  it('should read every settings area', async () => {
    const ctx = createReconcileContext(fake, {
      tree: 'jellyseerr',
      secrets: emptySecretsContext(),
      logger: quietLogger(),
      dryRun: true,
    });

    const settings = await readRemoteSettings(ctx);

    expect(Object.keys(settings).sort()).toEqual(['general', 'jellyfin', 'notifications', 'services', 'users']);
    expect(settings.general.applicationTitle).toBe('Jellyseerr');
    expect(settings.notifications.email.encryptionMethod).toBe('starttls-optional');
    expect(settings.services.radarr.definitions).toEqual({});
  });
});
