/**
 * Generic settings section for one notification agent
 */

import { ResolutionError } from '../../api/errors.js';
import { expectObject, isJsonObject, type JsonObject } from '../../api/types.js';
import { decodeRemote, encodeForUpdate } from '../core/remote-map.js';
import { parseSettings } from '../core/settings.js';
import type { ReconcileContext, SettingsSection } from '../core/types.js';
import type { NotificationAgent, NotificationSettingsBase } from './types.js';

export function notificationPath(type: string): string {
  return `/api/v1/settings/notifications/${type}`;
}

function optionsOf(remote: JsonObject): JsonObject {
  return isJsonObject(remote.options) ? remote.options : {};
}

function isEmpty(value: unknown): boolean {
  if (typeof value === 'string') return value.trim().length === 0;
  return !value;
}

/**
 * Options required while enabled, judged on the outgoing payload
 */
export function findMissingRequired<T extends NotificationSettingsBase>(
  agent: NotificationAgent<T>,
  options: JsonObject
): string[] {
  return agent.requiredIfEnabled.filter((name) => {
    const entry = agent.optionsMap.find((candidate) => candidate.local === name);
    return entry !== undefined && isEmpty(options[entry.remote]);
  });
}

export function createNotificationSection<T extends NotificationSettingsBase>(
  agent: NotificationAgent<T>
): SettingsSection<T> {
  const tree = `settings.notifications.${agent.type}`;
  const path = notificationPath(agent.type);

  return {
    tree,

    async fromRemote(ctx: ReconcileContext): Promise<T> {
      const remote = expectObject(await ctx.client.get(path), path);
      return parseSettings(
        agent.schema,
        {
          ...decodeRemote(agent.baseMap, remote),
          ...decodeRemote(agent.optionsMap, optionsOf(remote)),
        },
        tree
      );
    },

    async updateRemote(ctx, local, remote): Promise<boolean> {
      const base = encodeForUpdate(tree, agent.baseMap, local, remote);
      const options = encodeForUpdate(tree, agent.optionsMap, local, remote);

      if (local.enable) {
        const missing = findMissingRequired(agent, options.payload);
        if (missing.length > 0) {
          throw new ResolutionError(
            `Attributes for notification type '${agent.type}' must not be empty ` +
              `when 'enable' is true: ${missing.map((name) => `'${name}'`).join(', ')}`
          );
        }
      }

      if (!base.changed && !options.changed) return false;
      ctx.report([...base.changes, ...options.changes]);

      if (!ctx.dryRun) {
        // Re-read so fields this tool does not manage are sent back unchanged
        const current = expectObject(await ctx.client.get(path), path);
        await ctx.client.post(
          path,
          {
            ...current,
            ...base.payload,
            options: { ...optionsOf(current), ...options.payload },
          },
          { expectedStatus: 200 }
        );
      }
      return true;
    },
  };
}
