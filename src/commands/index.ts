/**
 * Command exports
 */

export { diffCommand, type DiffOptions } from './diff.js';
export { dumpConfigCommand, instanceFromUrl, type DumpConfigOptions } from './dump-config.js';
export { statusCommand, type StatusOptions } from './status.js';
export { runInstances, selectInstances, syncCommand, type SyncOptions } from './sync.js';
export { validateCommand, type ValidateOptions } from './validate.js';
