/**
 * Shared shape of Radarr/Sonarr service definitions
 */

import { z } from 'zod';
import { ConfigValidationError } from '../../api/errors.js';
import { expectArray, expectObject, isJsonObject } from '../../api/types.js';
import { defineRemoteMap, type RemoteMap, type RemoteMapEntry } from '../core/remote-map.js';
import type { ResourceTable } from '../core/resolve.js';
import { optionalString, optionalUrl } from '../core/settings.js';

export const SERVICE_TYPES = ['radarr', 'sonarr'] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

// =============================================================================
// Settings
// =============================================================================

/**
 * Fields every service definition carries
 */
export interface ArrServiceSettings {
  isDefaultServer: boolean;
  is4kServer: boolean;
  hostname: string;
  port: number;
  useSsl: boolean;
  urlBase: string | null;
  externalUrl: string | null;
  enableScan: boolean;
  enableAutomaticSearch: boolean;
  /** Linked instance to borrow the API key from */
  instanceName: string | null;
  apiKey: string | null;
}

export const arrBaseFields = {
  isDefaultServer: z.boolean().default(false),
  is4kServer: z.boolean().default(false),
  hostname: z.string().min(1),
  useSsl: z.boolean().default(false),
  urlBase: optionalString,
  externalUrl: optionalUrl,
  enableScan: z.boolean().default(false),
  enableAutomaticSearch: z.boolean().default(true),
  instanceName: optionalString,
  apiKey: optionalString,
};

export function requireApiKeyOrInstance(
  value: { apiKey: string | null; instanceName: string | null },
  ctx: z.RefinementCtx
): void {
  if (!value.apiKey && !value.instanceName) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['apiKey'],
      message: "required when 'instanceName' is not defined",
    });
  }
}

/**
 * A collection of definitions keyed by their name on the remote
 */
export interface ServiceCollection<T> {
  /** Delete remote definitions that are not configured locally */
  deleteUnmanaged: boolean;
  definitions: Record<string, T>;
}

// =============================================================================
// Default server slots
// =============================================================================

interface DefaultSlotFlags {
  isDefaultServer: boolean;
  is4kServer: boolean;
}

/**
 * Messages for each default slot (non-4K, 4K) claimed by more than one definition
 */
export function defaultSlotConflicts(definitions: Record<string, DefaultSlotFlags>): string[] {
  const conflicts: string[] = [];
  for (const [label, is4k] of [
    ['non-4K', false],
    ['4K', true],
  ] as const) {
    const names = Object.entries(definitions)
      .filter(([, definition]) => definition.isDefaultServer && definition.is4kServer === is4k)
      .map(([name]) => `'${name}'`);
    if (names.length > 1) {
      conflicts.push(`more than one instance set as the ${label} default: ${names.join(', ')}`);
    }
  }
  return conflicts;
}

export function validateDefaultSlots(
  value: { definitions: Record<string, DefaultSlotFlags> },
  ctx: z.RefinementCtx
): void {
  for (const message of defaultSlotConflicts(value.definitions)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['definitions'], message });
  }
}

export function assertDefaultSlots(tree: string, definitions: Record<string, DefaultSlotFlags>): void {
  const conflicts = defaultSlotConflicts(definitions);
  if (conflicts.length > 0) {
    throw new ConfigValidationError(
      conflicts.map((message) => ({ path: `${tree}.definitions`, message }))
    );
  }
}

// =============================================================================
// Remote map
// =============================================================================

export function arrBaseRemoteMap<T extends ArrServiceSettings>(): RemoteMapEntry<T>[] {
  return [
    ...defineRemoteMap<T>((field) => [
      field('isDefaultServer', 'isDefault'),
      field('is4kServer', 'is4k'),
      field('hostname', 'hostname'),
      field('port', 'port'),
      field('useSsl', 'useSsl'),
      field('urlBase', 'baseUrl', { decoder: (v) => v || null, encoder: (v) => v ?? '' }),
      field('externalUrl', 'externalUrl', { optional: true, setIf: (v) => Boolean(v) }),
      field('enableScan', 'syncEnabled'),
      field('enableAutomaticSearch', 'preventSearch', {
        decoder: (v) => !v,
        encoder: (v) => !v,
      }),
      field('apiKey', 'apiKey', { secret: true }),
    ]),
  ];
}

// =============================================================================
// Service Resources
// =============================================================================

/**
 * What a service reports through the connection test endpoint
 */
export interface ArrResources {
  rootFolders: ReadonlySet<string>;
  qualityProfiles: ResourceTable;
  /** Empty for services without language profiles */
  languageProfiles: ResourceTable;
  tags: ResourceTable;
}

export const EMPTY_RESOURCES: ArrResources = {
  rootFolders: new Set(),
  qualityProfiles: new Map(),
  languageProfiles: new Map(),
  tags: new Map(),
};

function parseTable(value: unknown, nameKey: string, what: string): Map<string, number> {
  const table = new Map<string, number>();
  for (const item of expectArray(value, what)) {
    if (!isJsonObject(item)) continue;
    const name = item[nameKey];
    if (typeof name === 'string' && typeof item.id === 'number') {
      table.set(name, item.id);
    }
  }
  return table;
}

export function parseResources(body: unknown, what: string): ArrResources {
  const report = expectObject(body, what);
  const rootFolders = new Set<string>();
  for (const folder of expectArray(report.rootFolders, `${what} rootFolders`)) {
    if (isJsonObject(folder) && typeof folder.path === 'string') {
      rootFolders.add(folder.path);
    }
  }
  return {
    rootFolders,
    qualityProfiles: parseTable(report.profiles, 'name', `${what} profiles`),
    languageProfiles:
      report.languageProfiles === undefined || report.languageProfiles === null
        ? new Map()
        : parseTable(report.languageProfiles, 'name', `${what} languageProfiles`),
    tags: parseTable(report.tags, 'label', `${what} tags`),
  };
}

/**
 * Describes one service type for the generic reconciler
 */
export interface ArrService<T extends ArrServiceSettings> {
  readonly type: ServiceType;
  readonly definitionSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Remote map whose encoders turn references into the IDs the service reported */
  remoteMap(resources: ArrResources): RemoteMap<T>;
  /** Canonicalize references to names and set the effective API key */
  resolve(definition: T, apiKey: string, resources: ArrResources, required: boolean): T;
}
