/**
 * General settings: application title/URL, proxy and CSRF handling,
 * image caching, display language and discovery filters
 */

import { z } from 'zod';
import { expectObject } from '../../api/types.js';
import { decodeRemote, defineRemoteMap, encodeForUpdate } from '../core/remote-map.js';
import { optionalUrl, parseSettings } from '../core/settings.js';
import type { ReconcileContext, SettingsSection } from '../core/types.js';

export const MAIN_SETTINGS_PATH = '/api/v1/settings/main';

const TREE = 'settings.general';

export const generalSettingsSchema = z
  .object({
    applicationTitle: z.string().min(1).default('Jellyseerr'),
    applicationUrl: optionalUrl,
    enableProxySupport: z.boolean().default(false),
    enableCsrfProtection: z.boolean().default(false),
    enableImageCaching: z.boolean().default(false),
    displayLanguage: z
      .string()
      .min(1)
      .default('en')
      .transform((value) => value.toLowerCase()),
    discoverRegion: z
      .string()
      .nullable()
      .default(null)
      .transform((value) => (value ? value.toUpperCase() : null)),
    discoverLanguages: z
      .array(z.string())
      .default([])
      .transform((values) =>
        Array.from(new Set(values.map((value) => value.trim().toLowerCase()).filter(Boolean))).sort()
      ),
    hideAvailableMedia: z.boolean().default(false),
    allowPartialSeriesRequests: z.boolean().default(true),
  })
  .strict();

export type GeneralSettings = z.output<typeof generalSettingsSchema>;

export const GENERAL_REMOTE_MAP = defineRemoteMap<GeneralSettings>((field) => [
  field('applicationTitle', 'applicationTitle'),
  field('applicationUrl', 'applicationUrl', {
    decoder: (v) => v || null,
    encoder: (v) => v ?? '',
  }),
  field('enableProxySupport', 'trustProxy'),
  field('enableCsrfProtection', 'csrfProtection'),
  field('enableImageCaching', 'cacheImages'),
  // Sometimes an empty string on fresh instances
  field('displayLanguage', 'locale', { decoder: (v) => v || 'en' }),
  field('discoverLanguages', 'originalLanguage', {
    decoder: (v) => (typeof v === 'string' && v ? v.split('|') : []),
    encoder: (v) => [...v].sort().join('|'),
  }),
  field('discoverRegion', 'region', { decoder: (v) => v || null, encoder: (v) => v ?? '' }),
  field('hideAvailableMedia', 'hideAvailable'),
  field('allowPartialSeriesRequests', 'partialRequestsEnabled'),
]);

export const generalSection: SettingsSection<GeneralSettings> = {
  tree: TREE,

  async fromRemote(ctx: ReconcileContext): Promise<GeneralSettings> {
    const remote = expectObject(await ctx.client.get(MAIN_SETTINGS_PATH), MAIN_SETTINGS_PATH);
    return parseSettings(generalSettingsSchema, decodeRemote(GENERAL_REMOTE_MAP, remote), TREE);
  },

  async updateRemote(ctx, local, remote): Promise<boolean> {
    const plan = encodeForUpdate(TREE, GENERAL_REMOTE_MAP, local, remote);
    if (!plan.changed) return false;
    ctx.report(plan.changes);
    if (!ctx.dryRun) {
      await ctx.client.post(MAIN_SETTINGS_PATH, plan.payload, { expectedStatus: 200 });
    }
    return true;
  },
};
