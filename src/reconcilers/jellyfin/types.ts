/**
 * Jellyfin endpoint paths and remote library shape
 */

import { isJsonObject } from '../../api/types.js';

export const JELLYFIN_SETTINGS_PATH = '/api/v1/settings/jellyfin';
export const JELLYFIN_LIBRARY_PATH = '/api/v1/settings/jellyfin/library';

/**
 * A library as listed by the Jellyfin settings endpoints
 */
export interface JellyfinLibrary {
  id: string;
  name: string;
  enabled: boolean;
}

/**
 * Narrow a remote library list, skipping malformed entries
 */
export function parseLibraries(value: unknown): JellyfinLibrary[] {
  if (!Array.isArray(value)) return [];
  const libraries: JellyfinLibrary[] = [];
  for (const item of value) {
    if (isJsonObject(item) && typeof item.id === 'string' && typeof item.name === 'string') {
      libraries.push({ id: item.id, name: item.name, enabled: item.enabled === true });
    }
  }
  return libraries;
}
