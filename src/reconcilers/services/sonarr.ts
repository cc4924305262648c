/**
 * Sonarr service definitions
 *
 * Sonarr v4 has no language profiles; it reports none, so language
 * profile references are optional here.
 */

import { z } from 'zod';
import { defineRemoteMap, type RemoteMap } from '../core/remote-map.js';
import {
  refToId,
  refsToIds,
  resolveOptionalResource,
  resolveResource,
  resolveResourceSet,
  resolveRootFolder,
  type ResourceRef,
  type ResourceTable,
} from '../core/resolve.js';
import { optionalString, port, resourceRef, resourceRefSet } from '../core/settings.js';
import {
  arrBaseFields,
  arrBaseRemoteMap,
  requireApiKeyOrInstance,
  validateDefaultSlots,
  type ArrResources,
  type ArrService,
} from './types.js';

const optionalRef = resourceRef.nullable().default(null);

export const sonarrDefinitionSchema = z
  .object({
    ...arrBaseFields,
    port: port.default(8989),
    rootFolder: z.string().min(1),
    qualityProfile: resourceRef,
    languageProfile: optionalRef,
    tags: resourceRefSet,
    animeRootFolder: optionalString,
    animeQualityProfile: optionalRef,
    animeLanguageProfile: optionalRef,
    animeTags: resourceRefSet,
    enableSeasonFolders: z.boolean().default(false),
  })
  .strict()
  .superRefine(requireApiKeyOrInstance);

export type SonarrSettings = z.output<typeof sonarrDefinitionSchema>;

export const sonarrServicesSchema = z
  .object({
    deleteUnmanaged: z.boolean().default(false),
    definitions: z.record(sonarrDefinitionSchema).default({}),
  })
  .strict()
  .superRefine(validateDefaultSlots);

export type SonarrServices = z.output<typeof sonarrServicesSchema>;

function optionalId(ref: ResourceRef | null, table: ResourceTable): number | string | null {
  return ref === null ? null : refToId(ref, table);
}

export function sonarrRemoteMap(resources: ArrResources): RemoteMap<SonarrSettings> {
  return defineRemoteMap<SonarrSettings>((field) => [
    ...arrBaseRemoteMap<SonarrSettings>(),
    field('rootFolder', 'activeDirectory'),
    field('qualityProfile', 'activeProfileId', {
      encoder: (v) => refToId(v, resources.qualityProfiles),
    }),
    field('qualityProfile', 'activeProfileName'),
    field('languageProfile', 'activeLanguageProfileId', {
      optional: true,
      encoder: (v) => optionalId(v, resources.languageProfiles),
    }),
    field('tags', 'tags', { encoder: (v) => refsToIds(v, resources.tags) }),
    field('animeRootFolder', 'activeAnimeDirectory', {
      decoder: (v) => v || null,
      encoder: (v) => v ?? '',
    }),
    field('animeQualityProfile', 'activeAnimeProfileId', {
      optional: true,
      setIf: (v) => Boolean(v),
      encoder: (v) => optionalId(v, resources.qualityProfiles),
    }),
    field('animeQualityProfile', 'activeAnimeProfileName', {
      optional: true,
      setIf: (v) => Boolean(v),
    }),
    field('animeLanguageProfile', 'activeAnimeLanguageProfileId', {
      optional: true,
      setIf: (v) => Boolean(v),
      encoder: (v) => optionalId(v, resources.languageProfiles),
    }),
    field('animeTags', 'animeTags', { encoder: (v) => refsToIds(v, resources.tags) }),
    field('enableSeasonFolders', 'enableSeasonFolders'),
  ]);
}

export const sonarrService: ArrService<SonarrSettings> = {
  type: 'sonarr',
  definitionSchema: sonarrDefinitionSchema,
  remoteMap: sonarrRemoteMap,

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
      languageProfile: resolveOptionalResource(
        'language profile',
        definition.languageProfile,
        resources.languageProfiles,
        required
      ),
      tags: resolveResourceSet('tag', definition.tags, resources.tags, required),
      animeQualityProfile: resolveOptionalResource(
        'quality profile',
        definition.animeQualityProfile,
        resources.qualityProfiles,
        required
      ),
      animeLanguageProfile: resolveOptionalResource(
        'language profile',
        definition.animeLanguageProfile,
        resources.languageProfiles,
        required
      ),
      animeTags: resolveResourceSet('tag', definition.animeTags, resources.tags, required),
    };
  },
};
