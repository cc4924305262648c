/**
 * Notification event flags, shared by every agent that supports filtering
 */

import { createFlagCodec, type FlagRegistry } from '../core/bitmask.js';

export const NOTIFICATION_TYPE_NAMES = [
  'media-pending',
  'media-approved',
  'media-available',
  'media-failed',
  'test-notification',
  'media-declined',
  'media-auto-approved',
  'issue-created',
  'issue-comment',
  'issue-resolved',
  'issue-reopened',
  'media-auto-requested',
] as const;

export type NotificationType = (typeof NOTIFICATION_TYPE_NAMES)[number];

export const NOTIFICATION_TYPE_BITS: FlagRegistry<NotificationType> = {
  'media-pending': 2,
  'media-approved': 4,
  'media-available': 8,
  'media-failed': 16,
  'test-notification': 32,
  'media-declined': 64,
  'media-auto-approved': 128,
  'issue-created': 256,
  'issue-comment': 512,
  'issue-resolved': 1024,
  'issue-reopened': 2048,
  'media-auto-requested': 4096,
};

export const notificationTypeCodec = createFlagCodec<NotificationType>(
  NOTIFICATION_TYPE_BITS,
  NOTIFICATION_TYPE_NAMES
);
