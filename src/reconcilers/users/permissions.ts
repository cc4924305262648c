/**
 * User permission flags
 *
 * Bit values match the server's permission enum. Decoding follows its
 * hierarchy: `admin` supersedes everything, group flags are preferred over
 * their granular members, and auto-request/auto-approve flags require the
 * matching request permission.
 */

import { createHierarchicalCodec, type FlagRegistry } from '../core/bitmask.js';

export const PERMISSION_NAMES = [
  'admin',
  'manage-settings',
  'manage-users',
  'manage-requests',
  'request',
  'vote',
  'auto-approve',
  'auto-approve-movie',
  'auto-approve-series',
  'request-4k',
  'request-4k-movie',
  'request-4k-series',
  'request-advanced',
  'request-view',
  'auto-approve-4k',
  'auto-approve-4k-movie',
  'auto-approve-4k-series',
  'request-movie',
  'request-series',
  'manage-issues',
  'view-issues',
  'create-issues',
  'auto-request',
  'auto-request-movie',
  'auto-request-series',
  'recent-view',
  'watchlist-view',
] as const;

export type Permission = (typeof PERMISSION_NAMES)[number];

export const PERMISSION_BITS: FlagRegistry<Permission> = {
  admin: 2,
  'manage-settings': 4,
  'manage-users': 8,
  'manage-requests': 16,
  request: 32,
  vote: 64,
  'auto-approve': 128,
  'auto-approve-movie': 256,
  'auto-approve-series': 512,
  'request-4k': 1024,
  'request-4k-movie': 2048,
  'request-4k-series': 4096,
  'request-advanced': 8192,
  'request-view': 16384,
  'auto-approve-4k': 32768,
  'auto-approve-4k-movie': 65536,
  'auto-approve-4k-series': 131072,
  'request-movie': 262144,
  'request-series': 524288,
  'manage-issues': 1048576,
  'view-issues': 2097152,
  'create-issues': 4194304,
  'auto-request': 8388608,
  'auto-request-movie': 16777216,
  'auto-request-series': 33554432,
  'recent-view': 67108864,
  'watchlist-view': 134217728,
};

export const permissionCodec = createHierarchicalCodec<Permission>({
  registry: PERMISSION_BITS,
  names: PERMISSION_NAMES,
  superFlag: 'admin',
  standalone: ['manage-settings', 'manage-users', 'vote'],
  groups: [
    { group: 'manage-issues', members: ['create-issues', 'view-issues'] },
    {
      group: 'manage-requests',
      members: ['request-advanced', 'request-view', 'recent-view', 'watchlist-view'],
    },
    { group: 'request', members: ['request-movie', 'request-series'] },
    { group: 'request-4k', members: ['request-4k-movie', 'request-4k-series'] },
    { group: 'auto-request', members: ['auto-request-movie', 'auto-request-series'] },
    { group: 'auto-approve', members: ['auto-approve-movie', 'auto-approve-series'] },
    { group: 'auto-approve-4k', members: ['auto-approve-4k-movie', 'auto-approve-4k-series'] },
  ],
  dependencies: [
    { flag: 'auto-request', requires: ['request'] },
    { flag: 'auto-request-movie', requires: ['request-movie', 'request'] },
    { flag: 'auto-request-series', requires: ['request-series', 'request'] },
    { flag: 'auto-approve', requires: ['request'] },
    { flag: 'auto-approve-movie', requires: ['request-movie', 'request'] },
    { flag: 'auto-approve-series', requires: ['request-series', 'request'] },
    { flag: 'auto-approve-4k', requires: ['request-4k'] },
    { flag: 'auto-approve-4k-movie', requires: ['request-4k-movie', 'request-4k'] },
    { flag: 'auto-approve-4k-series', requires: ['request-4k-series', 'request-4k'] },
  ],
});
