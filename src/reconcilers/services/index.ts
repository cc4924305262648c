/**
 * Radarr and Sonarr links
 */

import { z } from 'zod';
import { radarrService, radarrServicesSchema } from './radarr.js';
import { createServiceSection } from './reconcile.js';
import { sonarrService, sonarrServicesSchema } from './sonarr.js';

export * from './radarr.js';
export * from './reconcile.js';
export * from './sonarr.js';
export * from './types.js';

export const servicesSettingsSchema = z
  .object({
    radarr: radarrServicesSchema.default({}),
    sonarr: sonarrServicesSchema.default({}),
  })
  .strict();

export type ServicesSettings = z.output<typeof servicesSettingsSchema>;

export const radarrSection = createServiceSection(radarrService);
export const sonarrSection = createServiceSection(sonarrService);
