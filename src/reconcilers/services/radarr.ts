/**
 * Radarr service definitions
 */

import { z } from 'zod';
import { defineRemoteMap, type RemoteMap } from '../core/remote-map.js';
import {
  refToId,
  refsToIds,
  resolveResource,
  resolveResourceSet,
  resolveRootFolder,
} from '../core/resolve.js';
import { port, resourceRef, resourceRefSet } from '../core/settings.js';
import {
  arrBaseFields,
  arrBaseRemoteMap,
  requireApiKeyOrInstance,
  validateDefaultSlots,
  type ArrResources,
  type ArrService,
} from './types.js';

export const MINIMUM_AVAILABILITY = ['announced', 'inCinemas', 'released'] as const;

export const radarrDefinitionSchema = z
  .object({
    ...arrBaseFields,
    port: port.default(7878),
    rootFolder: z.string().min(1),
    qualityProfile: resourceRef,
    minimumAvailability: z.enum(MINIMUM_AVAILABILITY).default('released'),
    tags: resourceRefSet,
  })
  .strict()
  .superRefine(requireApiKeyOrInstance);

export type RadarrSettings = z.output<typeof radarrDefinitionSchema>;

export const radarrServicesSchema = z
  .object({
    deleteUnmanaged: z.boolean().default(false),
    definitions: z.record(radarrDefinitionSchema).default({}),
  })
  .strict()
  .superRefine(validateDefaultSlots);

export type RadarrServices = z.output<typeof radarrServicesSchema>;

export function radarrRemoteMap(resources: ArrResources): RemoteMap<RadarrSettings> {
  return defineRemoteMap<RadarrSettings>((field) => [
    ...arrBaseRemoteMap<RadarrSettings>(),
    field('rootFolder', 'activeDirectory'),
    // Sent as both ID and name; decoding keeps the name
    field('qualityProfile', 'activeProfileId', {
      encoder: (v) => refToId(v, resources.qualityProfiles),
    }),
    field('qualityProfile', 'activeProfileName'),
    field('tags', 'tags', { encoder: (v) => refsToIds(v, resources.tags) }),
    field('minimumAvailability', 'minimumAvailability', { optional: true }),
  ]);
}

export const radarrService: ArrService<RadarrSettings> = {
  type: 'radarr',
  definitionSchema: radarrDefinitionSchema,
  remoteMap: radarrRemoteMap,

  resolve(definition, apiKey, resources, required) {
    return {
      ...definition,
      apiKey,
      rootFolder: resolveRootFolder(definition.rootFolder, resources.rootFolders, required),
      qualityProfile: resolveResource(
        'quality profile',
        definition.qualityProfile,
        resources.qualityProfiles,
        required
      ),
      tags: resolveResourceSet('tag', definition.tags, resources.tags, required),
    };
  },
};
