/**
 * Notification agent definitions
 */

import { z } from 'zod';
import { JellyseerrError } from '../../api/errors.js';
import { defineRemoteMap, type RootDecoder } from '../core/remote-map.js';
import { optionalString, optionalUrl, port } from '../core/settings.js';
import {
  baseRemoteMap,
  enableField,
  notificationTypesField,
  textOption,
  typesRemoteMap,
  type NotificationAgent,
} from './types.js';

// =============================================================================
// Discord
// =============================================================================

export const discordSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    webhookUrl: optionalUrl,
    username: optionalString,
    avatarUrl: optionalUrl,
    enableMentions: z.boolean().default(true),
  })
  .strict();

export type DiscordSettings = z.output<typeof discordSettingsSchema>;

export const discordAgent: NotificationAgent<DiscordSettings> = {
  type: 'discord',
  schema: discordSettingsSchema,
  baseMap: typesRemoteMap<DiscordSettings>(),
  optionsMap: defineRemoteMap<DiscordSettings>((field) => [
    field('webhookUrl', 'webhookUrl', textOption),
    field('username', 'botUsername', { optional: true, ...textOption }),
    field('avatarUrl', 'botAvatarUrl', { optional: true, ...textOption }),
    field('enableMentions', 'enableMentions', { optional: true }),
  ]),
  requiredIfEnabled: ['webhookUrl'],
};

// =============================================================================
// Email
// =============================================================================

export const ENCRYPTION_METHODS = [
  'unencrypted',
  'implicit-tls',
  'starttls-optional',
  'starttls-enforce',
] as const;

export type EncryptionMethod = (typeof ENCRYPTION_METHODS)[number];

interface EncryptionFlags {
  secure: boolean;
  ignoreTls: boolean;
  requireTls: boolean;
}

export function encryptionFlags(method: EncryptionMethod): EncryptionFlags {
  return {
    secure: method === 'implicit-tls',
    ignoreTls: method === 'unencrypted',
    requireTls: method === 'starttls-enforce',
  };
}

/**
 * One encryption method from the three remote TLS flags
 */
export const decodeEncryptionMethod: RootDecoder = (options) => {
  const flags = {
    secure: options.secure === true,
    ignoreTls: options.ignoreTls === true,
    requireTls: options.requireTls === true,
  };
  const method = ENCRYPTION_METHODS.find((candidate) => {
    const expected = encryptionFlags(candidate);
    return (
      expected.secure === flags.secure &&
      expected.ignoreTls === flags.ignoreTls &&
      expected.requireTls === flags.requireTls
    );
  });
  if (!method) {
    throw new JellyseerrError(
      `Invalid encryption flag combination: secure=${flags.secure}, ignoreTls=${flags.ignoreTls}, requireTls=${flags.requireTls}`
    );
  }
  return method;
};

export const emailSettingsSchema = z
  .object({
    ...enableField,
    requireUserEmail: z.boolean().default(false),
    senderName: z
      .string()
      .nullable()
      .default('Jellyseerr')
      .transform((value) => (value === '' ? null : value)),
    senderAddress: z
      .union([z.literal(''), z.string().email()])
      .nullable()
      .default(null)
      .transform((value) => (value === '' ? null : value)),
    smtpHost: optionalString,
    smtpPort: port.default(587),
    encryptionMethod: z.enum(ENCRYPTION_METHODS).default('starttls-optional'),
    allowSelfsignedCertificates: z.boolean().default(false),
    smtpUsername: optionalString,
    smtpPassword: optionalString,
    pgpPrivateKey: optionalString,
    pgpPassword: optionalString,
  })
  .strict();

export type EmailSettings = z.output<typeof emailSettingsSchema>;

export const emailAgent: NotificationAgent<EmailSettings> = {
  type: 'email',
  schema: emailSettingsSchema,
  baseMap: baseRemoteMap<EmailSettings>(),
  optionsMap: defineRemoteMap<EmailSettings>((field) => [
    field('requireUserEmail', 'userEmailRequired', { optional: true }),
    field('senderName', 'senderName', textOption),
    field('senderAddress', 'emailFrom', textOption),
    field('smtpHost', 'smtpHost', textOption),
    field('smtpPort', 'smtpPort'),
    field('encryptionMethod', 'secure', {
      rootDecoder: decodeEncryptionMethod,
      encoder: (v) => encryptionFlags(v).secure,
    }),
    field('encryptionMethod', 'ignoreTls', {
      rootDecoder: decodeEncryptionMethod,
      encoder: (v) => encryptionFlags(v).ignoreTls,
    }),
    field('encryptionMethod', 'requireTls', {
      rootDecoder: decodeEncryptionMethod,
      encoder: (v) => encryptionFlags(v).requireTls,
    }),
    field('allowSelfsignedCertificates', 'allowSelfSigned'),
    field('smtpUsername', 'authUser', { optional: true, ...textOption }),
    field('smtpPassword', 'authPass', { optional: true, secret: true, ...textOption }),
    field('pgpPrivateKey', 'pgpPrivateKey', { optional: true, secret: true, ...textOption }),
    field('pgpPassword', 'pgpPassword', { optional: true, secret: true, ...textOption }),
  ]),
  requiredIfEnabled: ['senderName', 'senderAddress', 'smtpHost'],
};

// =============================================================================
// Gotify
// =============================================================================

export const gotifySettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    serverUrl: optionalUrl,
    accessToken: optionalString,
  })
  .strict();

export type GotifySettings = z.output<typeof gotifySettingsSchema>;

export const gotifyAgent: NotificationAgent<GotifySettings> = {
  type: 'gotify',
  schema: gotifySettingsSchema,
  baseMap: typesRemoteMap<GotifySettings>(),
  optionsMap: defineRemoteMap<GotifySettings>((field) => [
    field('serverUrl', 'url', textOption),
    field('accessToken', 'token', { secret: true, ...textOption }),
  ]),
  requiredIfEnabled: ['serverUrl', 'accessToken'],
};

// =============================================================================
// Pushbullet
// =============================================================================

export const pushbulletSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    accessToken: optionalString,
    channelTag: optionalString,
  })
  .strict();

export type PushbulletSettings = z.output<typeof pushbulletSettingsSchema>;

export const pushbulletAgent: NotificationAgent<PushbulletSettings> = {
  type: 'pushbullet',
  schema: pushbulletSettingsSchema,
  baseMap: typesRemoteMap<PushbulletSettings>(),
  optionsMap: defineRemoteMap<PushbulletSettings>((field) => [
    field('accessToken', 'accessToken', { secret: true, ...textOption }),
    field('channelTag', 'channelTag', { optional: true, ...textOption }),
  ]),
  requiredIfEnabled: ['accessToken'],
};

// =============================================================================
// Pushover
// =============================================================================

const pushoverKey = z
  .union([z.literal(''), z.string().regex(/^[A-Za-z0-9]{30}$/, 'must be 30 letters or digits')])
  .nullable()
  .default(null)
  .transform((value) => (value === '' ? null : value));

export const pushoverSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    apiKey: pushoverKey,
    userKey: pushoverKey,
  })
  .strict();

export type PushoverSettings = z.output<typeof pushoverSettingsSchema>;

export const pushoverAgent: NotificationAgent<PushoverSettings> = {
  type: 'pushover',
  schema: pushoverSettingsSchema,
  baseMap: typesRemoteMap<PushoverSettings>(),
  optionsMap: defineRemoteMap<PushoverSettings>((field) => [
    field('apiKey', 'accessToken', { secret: true, ...textOption }),
    field('userKey', 'userToken', { secret: true, ...textOption }),
  ]),
  requiredIfEnabled: ['apiKey', 'userKey'],
};

// =============================================================================
// Slack
// =============================================================================

export const slackSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    webhookUrl: optionalUrl,
  })
  .strict();

export type SlackSettings = z.output<typeof slackSettingsSchema>;

export const slackAgent: NotificationAgent<SlackSettings> = {
  type: 'slack',
  schema: slackSettingsSchema,
  baseMap: typesRemoteMap<SlackSettings>(),
  optionsMap: defineRemoteMap<SlackSettings>((field) => [
    field('webhookUrl', 'webhookUrl', textOption),
  ]),
  requiredIfEnabled: ['webhookUrl'],
};

// =============================================================================
// Telegram
// =============================================================================

export const telegramSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    accessToken: optionalString,
    username: optionalString,
    chatId: optionalString,
    sendSilently: z.boolean().default(false),
  })
  .strict();

export type TelegramSettings = z.output<typeof telegramSettingsSchema>;

export const telegramAgent: NotificationAgent<TelegramSettings> = {
  type: 'telegram',
  schema: telegramSettingsSchema,
  baseMap: typesRemoteMap<TelegramSettings>(),
  optionsMap: defineRemoteMap<TelegramSettings>((field) => [
    field('accessToken', 'botAPI', { secret: true, ...textOption }),
    field('username', 'botUsername', { optional: true, ...textOption }),
    field('chatId', 'chatId', textOption),
    field('sendSilently', 'sendSilently'),
  ]),
  requiredIfEnabled: ['accessToken', 'chatId'],
};

// =============================================================================
// Webhook
// =============================================================================

export const webhookSettingsSchema = z
  .object({
    ...enableField,
    ...notificationTypesField,
    webhookUrl: optionalUrl,
    authorizationHeader: optionalString,
    payloadTemplate: optionalString,
  })
  .strict();

export type WebhookSettings = z.output<typeof webhookSettingsSchema>;

export const webhookAgent: NotificationAgent<WebhookSettings> = {
  type: 'webhook',
  schema: webhookSettingsSchema,
  baseMap: typesRemoteMap<WebhookSettings>(),
  optionsMap: defineRemoteMap<WebhookSettings>((field) => [
    field('webhookUrl', 'webhookUrl', textOption),
    field('authorizationHeader', 'authHeader', { optional: true, secret: true, ...textOption }),
    field('payloadTemplate', 'jsonPayload', textOption),
  ]),
  requiredIfEnabled: ['webhookUrl', 'payloadTemplate'],
};

// =============================================================================
// Web Push
// =============================================================================

export const webpushSettingsSchema = z.object({ ...enableField }).strict();

export type WebpushSettings = z.output<typeof webpushSettingsSchema>;

export const webpushAgent: NotificationAgent<WebpushSettings> = {
  type: 'webpush',
  schema: webpushSettingsSchema,
  baseMap: baseRemoteMap<WebpushSettings>(),
  optionsMap: [],
  requiredIfEnabled: [],
};
