/**
 * Unit Tests: Remote Map Engine
 *
 * Tests decoding remote objects into local fields and building update and
 * create payloads, including secret masking and shared root decoders.
 *
 * @see src/reconcilers/core/remote-map.ts
 */

import { describe, it, expect, vi } from 'vitest';
import { RemoteDecodeError } from '../../src/api/errors.js';
import {
  decodeRemote,
  defineRemoteMap,
  encodeForCreate,
  encodeForUpdate,
  valuesEqual,
} from '../../src/reconcilers/core/remote-map.js';
import { parseSettings } from '../../src/reconcilers/core/settings.js';
import { emailAgent, emailSettingsSchema } from '../../src/reconcilers/notifications/index.js';
import {
  EMPTY_RESOURCES,
  radarrDefinitionSchema,
  radarrRemoteMap,
} from '../../src/reconcilers/services/index.js';

// =============================================================================
// Test Fixtures
// =============================================================================

interface SampleSettings {
  title: string;
  url: string | null;
  apiKey: string | null;
  profile: string | number;
  retries: number;
}

const SAMPLE_MAP = defineRemoteMap<SampleSettings>((field) => [
  field('title', 'applicationTitle'),
  field('url', 'applicationUrl', { decoder: (v) => v || null, encoder: (v) => v ?? '' }),
  field('apiKey', 'apiKey', { secret: true }),
  field('profile', 'profileId', { encoder: (v) => (v === 'HD' ? 4 : v) }),
  field('profile', 'profileName'),
  field('retries', 'retries', { optional: true, setIf: (v) => v > 0 }),
]);

function sample(overrides: Partial<SampleSettings> = {}): SampleSettings {
  return {
    title: 'Requests',
    url: null,
    apiKey: 'test-secret',
    profile: 'HD',
    retries: 0,
    ...overrides,
  };
}

// =============================================================================
// decodeRemote Tests
// =============================================================================

describe('decodeRemote', () => {
  it('should apply decoders and let the last entry for a field win', () => {
    const decoded = decodeRemote(SAMPLE_MAP, {
      applicationTitle: 'Requests',
      applicationUrl: '',
      apiKey: 'test-secret',
      profileId: 4,
      profileName: 'HD',
    });

    expect(decoded).toEqual({
      title: 'Requests',
      url: null,
      apiKey: 'test-secret',
      profile: 'HD',
    });
  });

  it('should fail on a missing required key', () => {
    const decode = () => decodeRemote(SAMPLE_MAP, { applicationTitle: 'Requests' });

    expect(decode).toThrow(RemoteDecodeError);
    expect(decode).toThrow("Remote object is missing required field 'applicationUrl'");
  });

  it('should run a shared root decoder once per decode', () => {
    const rootDecoder = vi.fn((remote: Record<string, unknown>) => (remote.secure ? 'tls' : 'plain'));
    const map = defineRemoteMap<{ mode: string }>((field) => [
      field('mode', 'secure', { rootDecoder }),
      field('mode', 'ignoreTls', { rootDecoder }),
    ]);

    expect(decodeRemote(map, { secure: true, ignoreTls: false })).toEqual({ mode: 'tls' });
    expect(rootDecoder).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// encodeForUpdate Tests
// =============================================================================

describe('encodeForUpdate', () => {
  it('should report no change for equal objects', () => {
    const plan = encodeForUpdate('settings.sample', SAMPLE_MAP, sample(), sample());

    expect(plan.changed).toBe(false);
    expect(plan.changes).toEqual([]);
  });

  it('should send every includable field and report only differences', () => {
    const plan = encodeForUpdate(
      'settings.sample',
      SAMPLE_MAP,
      sample({ title: 'Media', url: 'https://requests.example.com' }),
      sample()
    );

    expect(plan.changed).toBe(true);
    expect(plan.payload).toEqual({
      applicationTitle: 'Media',
      applicationUrl: 'https://requests.example.com',
      apiKey: 'test-secret',
      profileId: 4,
      profileName: 'HD',
    });
    expect(plan.changes).toEqual([
      { path: 'settings.sample.title', type: 'modified', localValue: 'Media', remoteValue: 'Requests' },
      {
        path: 'settings.sample.url',
        type: 'modified',
        localValue: 'https://requests.example.com',
        remoteValue: null,
      },
    ]);
  });

  it('should mask secret values in change reports', () => {
    const plan = encodeForUpdate(
      'settings.sample',
      SAMPLE_MAP,
      sample({ apiKey: 'new-secret' }),
      sample({ apiKey: null })
    );

    expect(plan.changes).toEqual([
      { path: 'settings.sample.apiKey', type: 'modified', localValue: '********', remoteValue: null },
    ]);
    expect(plan.payload.apiKey).toBe('new-secret');
  });

  it('should report a field mapped to several keys once', () => {
    const plan = encodeForUpdate('settings.sample', SAMPLE_MAP, sample({ profile: 'SD' }), sample());

    expect(plan.changes).toEqual([
      { path: 'settings.sample.profile', type: 'modified', localValue: 'SD', remoteValue: 'HD' },
    ]);
  });

  it('should include conditional fields only when their condition holds', () => {
    const plan = encodeForUpdate('settings.sample', SAMPLE_MAP, sample({ retries: 3 }), sample());

    expect(plan.payload.retries).toBe(3);
    expect('retries' in encodeForUpdate('settings.sample', SAMPLE_MAP, sample(), sample()).payload).toBe(false);
  });
});

// =============================================================================
// encodeForCreate Tests
// =============================================================================

describe('encodeForCreate', () => {
  it('should report each included field as added', () => {
    const plan = encodeForCreate('settings.sample', SAMPLE_MAP, sample());

    expect(plan.payload).toEqual({
      applicationTitle: 'Requests',
      applicationUrl: '',
      apiKey: 'test-secret',
      profileId: 4,
      profileName: 'HD',
    });
    expect(plan.changes.map((change) => change.path)).toEqual([
      'settings.sample.title',
      'settings.sample.url',
      'settings.sample.apiKey',
      'settings.sample.profile',
    ]);
    expect(plan.changes[2]).toEqual({
      path: 'settings.sample.apiKey',
      type: 'added',
      localValue: '********',
      remoteValue: undefined,
    });
  });
});

// =============================================================================
// valuesEqual Tests
// =============================================================================

describe('valuesEqual', () => {
  it('should compare arrays element by element', () => {
    expect(valuesEqual([1, 2], [1, 2])).toBe(true);
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
  });

  it('should compare objects key by key', () => {
    expect(valuesEqual({ a: 1, b: [true] }, { b: [true], a: 1 })).toBe(true);
    expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
  });

  it('should not treat null and undefined as equal', () => {
    expect(valuesEqual(null, undefined)).toBe(false);
  });
});

// =============================================================================
// Round-trip Tests
// =============================================================================

describe('decodeRemote after encodeForUpdate', () => {
  it('should restore email settings through the shared encryption decoder', () => {
    const local = emailSettingsSchema.parse({
      enable: true,
      senderAddress: 'requests@example.com',
      smtpHost: 'smtp.example.com',
      encryptionMethod: 'implicit-tls',
      smtpUsername: 'requests',
      smtpPassword: 'test-secret',
    });
    const base = encodeForUpdate('email', emailAgent.baseMap, local, local);
    const options = encodeForUpdate('email', emailAgent.optionsMap, local, local);

    expect(base.changed).toBe(false);
    expect(options.changed).toBe(false);
    expect(options.payload).toMatchObject({ secure: true, ignoreTls: false, requireTls: false });
    expect(
      parseSettings(
        emailSettingsSchema,
        {
          ...decodeRemote(emailAgent.baseMap, base.payload),
          ...decodeRemote(emailAgent.optionsMap, options.payload),
        },
        'email'
      )
    ).toEqual(local);
  });

  it('should restore a Radarr definition referencing resources by ID', () => {
    const map = radarrRemoteMap({ ...EMPTY_RESOURCES, qualityProfiles: new Map([['HD-1080p', 4]]) });
    const local = radarrDefinitionSchema.parse({
      hostname: 'radarr',
      apiKey: 'test-secret',
      externalUrl: 'https://radarr.example.com',
      rootFolder: '/data/movies',
      qualityProfile: 'HD-1080p',
      tags: [2, 1],
    });
    const plan = encodeForUpdate('radarr', map, local, local);

    expect(plan.changed).toBe(false);
    expect(plan.payload).toMatchObject({ activeProfileId: 4, activeProfileName: 'HD-1080p', tags: [1, 2] });
    expect(parseSettings(radarrDefinitionSchema, decodeRemote(map, plan.payload), 'radarr')).toEqual(local);
  });
});
