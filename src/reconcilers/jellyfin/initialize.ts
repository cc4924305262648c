/**
 * First-time initialization of a Jellyseerr instance against Jellyfin
 *
 * A fresh instance has no API key yet, so every call here goes without one.
 * Authentication is by session cookie, kept for the whole sequence.
 */

import type { JellyseerrClient } from '../../api/client.js';
import { JellyseerrApiError, JellyseerrError, ResolutionError } from '../../api/errors.js';
import type { ApiLogger } from '../../api/logger.js';
import { expectArray, expectObject } from '../../api/types.js';
import type { JellyfinSettings } from './index.js';
import { JELLYFIN_LIBRARY_PATH, parseLibraries } from './types.js';

export const PUBLIC_SETTINGS_PATH = '/api/v1/settings/public';
export const JELLYFIN_AUTH_PATH = '/api/v1/auth/jellyfin';
export const INITIALIZE_PATH = '/api/v1/settings/initialize';

export const INITIALIZE_REQUIRED_FIELDS = [
  'serverUrl',
  'username',
  'password',
  'emailAddress',
  'libraries',
] as const satisfies readonly (keyof JellyfinSettings)[];

/**
 * Whether the instance has completed its setup wizard
 */
export async function isInitialized(client: JellyseerrClient): Promise<boolean> {
  const settings = expectObject(
    await client.get(PUBLIC_SETTINGS_PATH, { useApiKey: false }),
    PUBLIC_SETTINGS_PATH
  );
  return settings.initialized === true;
}

function isDefined(value: string | null | readonly string[]): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return value.length > 0;
}

/**
 * Run the setup wizard: sign in with the Jellyfin administrator, sync and
 * enable libraries, then mark the instance initialized
 */
export async function initializeInstance(
  client: JellyseerrClient,
  settings: JellyfinSettings,
  tree: string,
  log: ApiLogger
): Promise<void> {
  log.info('Checking if required attributes are defined');
  const missing = INITIALIZE_REQUIRED_FIELDS.filter((field) => !isDefined(settings[field]));
  if (missing.length > 0) {
    throw new ResolutionError(
      'Unable to initialise Jellyseerr instance, required attributes are missing. ' +
        'Either initialise Jellyseerr manually, or set the following attributes ' +
        `so it can be initialised automatically: ${missing.map((field) => `'${tree}.${field}'`).join(', ')}`
    );
  }

  const session = client.withSession();

  log.info('Authenticating Jellyseerr with Jellyfin');
  try {
    await session.post(
      JELLYFIN_AUTH_PATH,
      {
        username: settings.username,
        password: settings.password,
        hostname: settings.serverUrl,
        email: settings.emailAddress,
      },
      { expectedStatus: 200, useApiKey: false }
    );
  } catch (err) {
    if (
      err instanceof JellyseerrApiError &&
      err.status === 500 &&
      err.message.includes('Jellyfin') &&
      err.message.includes('configured')
    ) {
      throw new JellyseerrError(
        'Jellyseerr already has been configured with a Jellyfin instance ' +
          'but session data has been lost, please recreate Jellyseerr and re-initialise it',
        { cause: err }
      );
    }
    throw err;
  }

  log.info('Syncing Jellyfin libraries to Jellyseerr');
  const synced = parseLibraries(
    expectArray(
      await session.get(`${JELLYFIN_LIBRARY_PATH}?sync=true`, { useApiKey: false }),
      JELLYFIN_LIBRARY_PATH
    )
  );

  const libraryIds = new Map(synced.map((library) => [library.name, library.id]));
  const enabledIds = settings.libraries.map((name) => {
    const id = libraryIds.get(name);
    if (id === undefined) {
      throw new ResolutionError(
        `Enabled library '${name}' not found in Jellyfin ` +
          `(available libraries: ${Array.from(libraryIds.keys(), (known) => `'${known}'`).join(', ')})`
      );
    }
    return id;
  });

  log.info(`Enabling Jellyfin libraries in Jellyseerr: ${settings.libraries.map((name) => `'${name}'`).join(', ')}`);
  await session.get(`${JELLYFIN_LIBRARY_PATH}?enable=${enabledIds.join(',')}`, { useApiKey: false });

  log.info('Finalising initialisation');
  await session.post(INITIALIZE_PATH, undefined, { expectedStatus: 200, useApiKey: false });
}
