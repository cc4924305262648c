/**
 * User settings: sign-in methods, global request quotas and the
 * permissions granted to new users
 */

import { z } from 'zod';
import { isJsonObject, expectObject, type JsonObject } from '../../api/types.js';
import { PermissionHierarchyError } from '../../api/errors.js';
import { decodeRemote, defineRemoteMap, encodeForUpdate } from '../core/remote-map.js';
import { parseSettings } from '../core/settings.js';
import type { ReconcileContext, SettingsSection } from '../core/types.js';
import { MAIN_SETTINGS_PATH } from '../general/index.js';
import { PERMISSION_NAMES, permissionCodec, type Permission } from './permissions.js';

export * from './permissions.js';

const TREE = 'settings.users';

const DEFAULT_REQUEST_LIMIT = 0;
const DEFAULT_REQUEST_DAYS = 7;

const requestLimit = z.number().int().min(0).max(100).default(DEFAULT_REQUEST_LIMIT);
const requestDays = z.number().int().min(1).max(100).default(DEFAULT_REQUEST_DAYS);

export const usersSettingsSchema = z
  .object({
    enableLocalSignin: z.boolean().default(true),
    enableNewJellyfinSignin: z.boolean().default(true),
    globalMovieRequestLimit: requestLimit,
    globalMovieRequestDays: requestDays,
    globalSeriesRequestLimit: requestLimit,
    globalSeriesRequestDays: requestDays,
    defaultPermissions: z
      .array(z.enum(PERMISSION_NAMES))
      .default(['request', 'request-4k'])
      // Reduce to the form the server reports back, so sets compare equal
      .transform((permissions, ctx): Permission[] => {
        try {
          return permissionCodec.reduce(permissions);
        } catch (err) {
          if (!(err instanceof PermissionHierarchyError)) throw err;
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
          return z.NEVER;
        }
      }),
  })
  .strict();

export type UsersSettings = z.output<typeof usersSettingsSchema>;

// Quotas live under `defaultQuotas.{movie,tv}` on the remote; they are
// flattened into these synthetic keys for the remote map.
export const USERS_REMOTE_MAP = defineRemoteMap<UsersSettings>((field) => [
  field('enableLocalSignin', 'localLogin'),
  field('enableNewJellyfinSignin', 'newPlexLogin'),
  field('globalMovieRequestLimit', 'movieQuotaLimit'),
  field('globalMovieRequestDays', 'movieQuotaDays'),
  field('globalSeriesRequestLimit', 'tvQuotaLimit'),
  field('globalSeriesRequestDays', 'tvQuotaDays'),
  field('defaultPermissions', 'defaultPermissions', {
    decoder: (v) => permissionCodec.decode(typeof v === 'number' ? v : 0),
    encoder: (v) => permissionCodec.encode(v),
  }),
]);

const QUOTA_CATEGORIES = ['movie', 'tv'] as const;

function quotaValue(quotas: JsonObject | undefined, key: string, fallback: number): number {
  const value = quotas?.[key];
  return typeof value === 'number' ? value : fallback;
}

/**
 * Flatten `defaultQuotas` into the keys the remote map reads
 */
export function flattenQuotas(remote: JsonObject): JsonObject {
  const { defaultQuotas, ...rest } = remote;
  const flattened: JsonObject = { ...rest };
  const byCategory: JsonObject = isJsonObject(defaultQuotas) ? defaultQuotas : {};
  for (const category of QUOTA_CATEGORIES) {
    const entry = byCategory[category];
    const quotas = isJsonObject(entry) ? entry : undefined;
    flattened[`${category}QuotaLimit`] = quotaValue(quotas, 'quotaLimit', DEFAULT_REQUEST_LIMIT);
    flattened[`${category}QuotaDays`] = quotaValue(quotas, 'quotaDays', DEFAULT_REQUEST_DAYS);
  }
  return flattened;
}

/**
 * Fold the synthetic quota keys back into `defaultQuotas`
 */
export function nestQuotas(payload: JsonObject): JsonObject {
  const nested: JsonObject = { ...payload };
  const defaultQuotas: JsonObject = {};
  for (const category of QUOTA_CATEGORIES) {
    defaultQuotas[category] = {
      quotaLimit: nested[`${category}QuotaLimit`],
      quotaDays: nested[`${category}QuotaDays`],
    };
    delete nested[`${category}QuotaLimit`];
    delete nested[`${category}QuotaDays`];
  }
  nested.defaultQuotas = defaultQuotas;
  return nested;
}

export const usersSection: SettingsSection<UsersSettings> = {
  tree: TREE,

  async fromRemote(ctx: ReconcileContext): Promise<UsersSettings> {
    const remote = expectObject(await ctx.client.get(MAIN_SETTINGS_PATH), MAIN_SETTINGS_PATH);
    return parseSettings(
      usersSettingsSchema,
      decodeRemote(USERS_REMOTE_MAP, flattenQuotas(remote)),
      TREE
    );
  },

  async updateRemote(ctx, local, remote): Promise<boolean> {
    const plan = encodeForUpdate(TREE, USERS_REMOTE_MAP, local, remote);
    if (!plan.changed) return false;
    ctx.report(plan.changes);
    if (!ctx.dryRun) {
      await ctx.client.post(MAIN_SETTINGS_PATH, nestQuotas(plan.payload), { expectedStatus: 200 });
    }
    return true;
  },
};
