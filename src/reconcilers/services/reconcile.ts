/**
 * Generic reconciler for a collection of service definitions
 *
 * Per local definition: borrow or take the API key, test the service for its
 * root folders, profiles and tags, resolve references against them, then
 * create or update the remote definition. Unmanaged remote definitions are
 * reaped in a separate pass.
 */

import type { JellyseerrClient } from '../../api/client.js';
import { ResolutionError } from '../../api/errors.js';
import { expectArray, isJsonObject, type JsonObject } from '../../api/types.js';
import { decodeRemote, encodeForCreate, encodeForUpdate } from '../core/remote-map.js';
import { parseSettings } from '../core/settings.js';
import type { ReconcileContext, SecretsContext, SettingsSection } from '../core/types.js';
import {
  assertDefaultSlots,
  EMPTY_RESOURCES,
  parseResources,
  type ArrResources,
  type ArrService,
  type ArrServiceSettings,
  type ServiceCollection,
  type ServiceType,
} from './types.js';

export interface ServiceSection<T extends ArrServiceSettings>
  extends SettingsSection<ServiceCollection<T>> {
  /**
   * Resolve remote definitions against their own services, so references
   * read back as names where the service knows them
   */
  canonicalize(
    ctx: ReconcileContext,
    remote: ServiceCollection<T>
  ): Promise<ServiceCollection<T>>;
}

export function servicePath(type: ServiceType): string {
  return `/api/v1/settings/${type}`;
}

function definitionTree(tree: string, name: string): string {
  return `${tree}.definitions['${name}']`;
}

async function fetchRemoteDefinitions(client: JellyseerrClient, type: ServiceType): Promise<JsonObject[]> {
  const path = servicePath(type);
  return expectArray(await client.get(path), path).filter(isJsonObject);
}

async function fetchServiceIds(client: JellyseerrClient, type: ServiceType): Promise<Map<string, number>> {
  const ids = new Map<string, number>();
  for (const item of await fetchRemoteDefinitions(client, type)) {
    if (typeof item.name === 'string' && typeof item.id === 'number') {
      ids.set(item.name, item.id);
    }
  }
  return ids;
}

/**
 * The API key to use for a definition: its own, or one borrowed from a
 * linked instance
 */
export function effectiveApiKey(
  secrets: SecretsContext,
  type: ServiceType,
  tree: string,
  definition: ArrServiceSettings
): string {
  if (definition.apiKey) return definition.apiKey;
  if (definition.instanceName) {
    const linked = secrets[type].get(definition.instanceName);
    if (linked) return linked.apiKey;
    throw new ResolutionError(
      `${tree}.instanceName: no ${type} instance named '${definition.instanceName}' ` +
        'with an API key is configured'
    );
  }
  throw new ResolutionError(`${tree}.apiKey: required when 'instanceName' is not defined`);
}

/**
 * Test the connection from the remote to the service and collect its
 * root folders, profiles and tags
 */
export async function testService(
  client: JellyseerrClient,
  type: ServiceType,
  definition: ArrServiceSettings,
  apiKey: string
): Promise<ArrResources> {
  const path = `${servicePath(type)}/test`;
  const body = await client.post(
    path,
    {
      hostname: definition.hostname,
      port: definition.port,
      useSsl: definition.useSsl,
      apiKey,
      ...(definition.urlBase ? { urlBase: definition.urlBase } : {}),
    },
    { expectedStatus: 200 }
  );
  return parseResources(body, path);
}

export function createServiceSection<T extends ArrServiceSettings>(
  service: ArrService<T>
): ServiceSection<T> {
  const tree = `settings.services.${service.type}`;
  const path = servicePath(service.type);

  return {
    tree,

    async fromRemote(ctx) {
      const definitions: Record<string, T> = {};
      for (const item of await fetchRemoteDefinitions(ctx.client, service.type)) {
        const name = typeof item.name === 'string' ? item.name : String(item.id);
        definitions[name] = parseSettings(
          service.definitionSchema,
          decodeRemote(service.remoteMap(EMPTY_RESOURCES), item),
          definitionTree(tree, name)
        );
      }
      return { deleteUnmanaged: false, definitions };
    },

    async updateRemote(ctx, local, remote) {
      assertDefaultSlots(tree, local.definitions);

      const serviceIds = await fetchServiceIds(ctx.client, service.type);
      const remoteDefinitions = new Map(Object.entries(remote.definitions));
      let changed = false;

      for (const [name, definition] of Object.entries(local.definitions)) {
        const subtree = definitionTree(tree, name);
        const apiKey = effectiveApiKey(ctx.secrets, service.type, subtree, definition);
        const resources = await testService(ctx.client, service.type, definition, apiKey);
        const resolved = service.resolve(definition, apiKey, resources, true);
        const map = service.remoteMap(resources);

        const remoteDefinition = remoteDefinitions.get(name);
        const serviceId = serviceIds.get(name);

        if (remoteDefinition === undefined || serviceId === undefined) {
          const plan = encodeForCreate(subtree, map, resolved);
          ctx.report(plan.changes);
          if (!ctx.dryRun) {
            await ctx.client.post(path, { name, ...plan.payload });
          }
          changed = true;
          continue;
        }

        // The remote copy keeps unknown references as given and takes the
        // local API key, which the remote reports back verbatim
        const plan = encodeForUpdate(
          subtree,
          map,
          resolved,
          service.resolve(remoteDefinition, apiKey, resources, false)
        );
        if (!plan.changed) continue;
        ctx.report(plan.changes);
        if (!ctx.dryRun) {
          await ctx.client.put(`${path}/${serviceId}`, { name, ...plan.payload });
        }
        changed = true;
      }

      return changed;
    },

    async deleteRemote(ctx, local, remote) {
      const serviceIds = await fetchServiceIds(ctx.client, service.type);
      let changed = false;

      for (const name of Object.keys(remote.definitions)) {
        if (Object.hasOwn(local.definitions, name)) continue;
        const subtree = definitionTree(tree, name);
        const serviceId = serviceIds.get(name);
        if (!local.deleteUnmanaged || serviceId === undefined) {
          ctx.logger.debug(`${subtree}: (...) (unmanaged)`);
          continue;
        }
        ctx.report([{ path: subtree, type: 'removed', localValue: undefined, remoteValue: '(...)' }]);
        if (!ctx.dryRun) {
          await ctx.client.delete(`${path}/${serviceId}`);
        }
        changed = true;
      }

      return changed;
    },

    async canonicalize(ctx, remote) {
      const definitions: Record<string, T> = {};
      for (const [name, definition] of Object.entries(remote.definitions)) {
        const apiKey = definition.apiKey ?? '';
        const resources = await testService(ctx.client, service.type, definition, apiKey);
        definitions[name] = service.resolve(definition, apiKey, resources, false);
      }
      return { ...remote, definitions };
    },
  };
}
