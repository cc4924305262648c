/**
 * Notification agent contract
 *
 * Every agent stores `enabled` (and usually `types`) at the top level of its
 * remote object and everything else under `options`, so each agent carries
 * two remote maps.
 */

import { z } from 'zod';
import { defineRemoteMap, type RemoteMap } from '../core/remote-map.js';
import {
  NOTIFICATION_TYPE_NAMES,
  notificationTypeCodec,
  type NotificationType,
} from './notification-types.js';

export const NOTIFICATION_AGENT_TYPES = [
  'discord',
  'email',
  'gotify',
  'pushbullet',
  'pushover',
  'slack',
  'telegram',
  'webhook',
  'webpush',
] as const;

export type NotificationAgentType = (typeof NOTIFICATION_AGENT_TYPES)[number];

export interface NotificationSettingsBase {
  enable: boolean;
}

export interface NotificationTypesSettingsBase extends NotificationSettingsBase {
  notificationTypes: NotificationType[];
}

export interface NotificationAgent<T extends NotificationSettingsBase> {
  type: NotificationAgentType;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Top-level keys of the remote object */
  baseMap: RemoteMap<T>;
  /** Keys under the remote `options` object */
  optionsMap: RemoteMap<T>;
  /** Options that must be non-empty while the agent is enabled */
  requiredIfEnabled: readonly (keyof T & string)[];
}

// =============================================================================
// Shared schema fields and remote maps
// =============================================================================

export const enableField = {
  enable: z.boolean().default(false),
};

export const notificationTypesField = {
  notificationTypes: z
    .array(z.enum(NOTIFICATION_TYPE_NAMES))
    .default([])
    .transform((types) => notificationTypeCodec.normalize(types)),
};

export function baseRemoteMap<T extends NotificationSettingsBase>(): RemoteMap<T> {
  return defineRemoteMap<T>((field) => [field('enable', 'enabled')]);
}

export function typesRemoteMap<T extends NotificationTypesSettingsBase>(): RemoteMap<T> {
  return defineRemoteMap<T>((field) => [
    field('enable', 'enabled'),
    field('notificationTypes', 'types', {
      decoder: (v) => notificationTypeCodec.decode(typeof v === 'number' ? v : 0),
      encoder: (v) => notificationTypeCodec.encode(v),
    }),
  ]);
}

/** Transforms for optional text options the remote stores as "" when unset */
export const textOption = {
  decoder: (v: unknown): unknown => v || null,
  encoder: (v: string | null): string => v ?? '',
};
