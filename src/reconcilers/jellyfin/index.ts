/**
 * Jellyfin settings: external URL and enabled libraries
 *
 * `serverUrl`, `username`, `password` and `emailAddress` are only used to
 * initialize a fresh instance (see ./initialize.ts); the remote never
 * reports them back.
 */

import { z } from 'zod';
import { expectObject } from '../../api/types.js';
import { decodeRemote, defineRemoteMap, encodeForUpdate, type RemoteMap } from '../core/remote-map.js';
import { optionalString, optionalUrl, parseSettings } from '../core/settings.js';
import type { ReconcileContext, SettingsSection } from '../core/types.js';
import {
  JELLYFIN_LIBRARY_PATH,
  JELLYFIN_SETTINGS_PATH,
  parseLibraries,
  type JellyfinLibrary,
} from './types.js';

export * from './types.js';
export {
  INITIALIZE_REQUIRED_FIELDS,
  initializeInstance,
  isInitialized,
} from './initialize.js';

const TREE = 'settings.jellyfin';

export const jellyfinSettingsSchema = z
  .object({
    serverUrl: optionalString,
    username: optionalString,
    password: optionalString,
    emailAddress: z
      .union([z.literal(''), z.string().email()])
      .nullable()
      .default(null)
      .transform((value) => (value === '' ? null : value)),
    externalUrl: optionalUrl,
    libraries: z
      .array(z.string().min(1))
      .default([])
      .transform((names) => Array.from(new Set(names)).sort()),
  })
  .strict();

export type JellyfinSettings = z.output<typeof jellyfinSettingsSchema>;

/**
 * Remote map; `libraries` encodes to the IDs of the named libraries known
 * to the remote
 */
export function jellyfinRemoteMap(libraries: readonly JellyfinLibrary[]): RemoteMap<JellyfinSettings> {
  return defineRemoteMap<JellyfinSettings>((field) => [
    field('externalUrl', 'externalHostname', {
      decoder: (v) => v || null,
      encoder: (v) => v ?? '',
    }),
    field('libraries', 'libraries', {
      decoder: (v) =>
        parseLibraries(v)
          .filter((library) => library.enabled)
          .map((library) => library.name),
      encoder: (v) =>
        libraries
          .filter((library) => v.includes(library.name))
          .map((library) => library.id)
          .sort(),
    }),
  ]);
}

export const jellyfinSection: SettingsSection<JellyfinSettings> = {
  tree: TREE,

  async fromRemote(ctx: ReconcileContext): Promise<JellyfinSettings> {
    const remote = expectObject(await ctx.client.get(JELLYFIN_SETTINGS_PATH), JELLYFIN_SETTINGS_PATH);
    return parseSettings(jellyfinSettingsSchema, decodeRemote(jellyfinRemoteMap([]), remote), TREE);
  },

  async updateRemote(ctx, local, remote): Promise<boolean> {
    // The library endpoint is only for enabling libraries; the listing comes
    // from the settings object itself.
    const current = expectObject(await ctx.client.get(JELLYFIN_SETTINGS_PATH), JELLYFIN_SETTINGS_PATH);
    const plan = encodeForUpdate(TREE, jellyfinRemoteMap(parseLibraries(current.libraries)), local, remote);
    if (!plan.changed) return false;
    ctx.report(plan.changes);
    if (!ctx.dryRun) {
      const { libraries, ...rest } = plan.payload;
      const ids = Array.isArray(libraries) ? libraries.map(String) : [];
      await ctx.client.get(`${JELLYFIN_LIBRARY_PATH}?enable=${ids.join(',')}`);
      await ctx.client.post(JELLYFIN_SETTINGS_PATH, rest, { expectedStatus: 200 });
    }
    return true;
  },
};
