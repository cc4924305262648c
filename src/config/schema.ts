/**
 * Configuration document schema
 *
 * ```yaml
 * jellyseerr:
 *   hostname: jellyseerr
 *   port: 5055
 *   apiKey: ...
 *   settings: { general, jellyfin, users, notifications, services }
 *   instances:
 *     main: { hostname: jellyseerr.example.com }
 * radarr:
 *   instances:
 *     movies: { apiKey: ... }
 * ```
 */

import { z } from 'zod';
import { optionalString, port } from '../reconcilers/core/settings.js';
import { generalSettingsSchema } from '../reconcilers/general/index.js';
import { jellyfinSettingsSchema } from '../reconcilers/jellyfin/index.js';
import { notificationsSettingsSchema } from '../reconcilers/notifications/index.js';
import { servicesSettingsSchema } from '../reconcilers/services/index.js';
import { usersSettingsSchema } from '../reconcilers/users/index.js';

export const DEFAULT_INSTANCE_NAME = 'default';
export const DEFAULT_HOSTNAME = 'jellyseerr';
export const DEFAULT_PORT = 5055;

export const settingsSchema = z
  .object({
    general: generalSettingsSchema.default({}),
    jellyfin: jellyfinSettingsSchema.default({}),
    users: usersSettingsSchema.default({}),
    notifications: notificationsSettingsSchema.default({}),
    services: servicesSettingsSchema.default({}),
  })
  .strict();

export type JellyseerrSettings = z.output<typeof settingsSchema>;

export const instanceSchema = z
  .object({
    hostname: z.string().min(1).default(DEFAULT_HOSTNAME),
    port: port.default(DEFAULT_PORT),
    protocol: z.enum(['http', 'https']).default('http'),
    urlBase: optionalString,
    apiKey: optionalString,
    /** Seconds */
    requestTimeout: z.number().positive().default(30),
    /** Expected server version; a mismatch is logged */
    version: optionalString,
    settings: settingsSchema.default({}),
  })
  .strict();

export type InstanceConfig = z.output<typeof instanceSchema>;

const linkedInstancesSchema = z
  .object({
    instances: z.record(z.object({ apiKey: z.string().min(1) }).passthrough()).default({}),
  })
  .passthrough()
  .default({});

/**
 * Top level of the document; instance blocks are validated after merging
 */
export const documentSchema = z
  .object({
    jellyseerr: z.record(z.unknown()).default({}),
    radarr: linkedInstancesSchema,
    sonarr: linkedInstancesSchema,
  })
  .passthrough();

export type ConfigDocument = z.output<typeof documentSchema>;

export const instanceBlocksSchema = z.record(z.record(z.unknown())).default({});
