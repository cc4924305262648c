/**
 * Reconciliation core
 */

export * from './bitmask.js';
export * from './remote-map.js';
export * from './resolve.js';
export * from './types.js';
export * from './settings.js';
