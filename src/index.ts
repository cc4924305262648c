/**
 * jellyseerr-sync library entrypoint
 *
 * The CLI lives in ./cli.ts; this module only re-exports.
 */

export * from './api/index.js';
export * from './commands/index.js';
export * from './config/index.js';
export * from './reconcilers/index.js';
export type * from './types.js';
