/**
 * Notification settings for every supported agent
 */

import { z } from 'zod';
import type { SettingsSection } from '../core/types.js';
import {
  discordAgent,
  emailAgent,
  gotifyAgent,
  pushbulletAgent,
  pushoverAgent,
  slackAgent,
  telegramAgent,
  webhookAgent,
  webpushAgent,
} from './agents.js';
import { createNotificationSection } from './section.js';

export * from './agents.js';
export * from './notification-types.js';
export * from './section.js';
export * from './types.js';

export const notificationsSettingsSchema = z
  .object({
    discord: discordAgent.schema.default({}),
    email: emailAgent.schema.default({}),
    gotify: gotifyAgent.schema.default({}),
    pushbullet: pushbulletAgent.schema.default({}),
    pushover: pushoverAgent.schema.default({}),
    slack: slackAgent.schema.default({}),
    telegram: telegramAgent.schema.default({}),
    webhook: webhookAgent.schema.default({}),
    webpush: webpushAgent.schema.default({}),
  })
  .strict();

export type NotificationsSettings = z.output<typeof notificationsSettingsSchema>;

export const notificationSections = {
  discord: createNotificationSection(discordAgent),
  email: createNotificationSection(emailAgent),
  gotify: createNotificationSection(gotifyAgent),
  pushbullet: createNotificationSection(pushbulletAgent),
  pushover: createNotificationSection(pushoverAgent),
  slack: createNotificationSection(slackAgent),
  telegram: createNotificationSection(telegramAgent),
  webhook: createNotificationSection(webhookAgent),
  webpush: createNotificationSection(webpushAgent),
} satisfies { [K in keyof NotificationsSettings]: SettingsSection<NotificationsSettings[K]> };
