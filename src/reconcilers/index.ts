/**
 * Reconcilers module - one settings section per area of Jellyseerr
 * configuration, plus the driver that runs them for an instance
 *
 * @module reconcilers
 */

export * as core from './core/index.js';
export * as general from './general/index.js';
export * as jellyfin from './jellyfin/index.js';
export * as notifications from './notifications/index.js';
export * as services from './services/index.js';
export * as users from './users/index.js';
export * from './instance.js';
