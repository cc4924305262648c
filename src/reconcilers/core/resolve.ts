/**
 * Resource resolver
 *
 * Local configuration may reference remote resources (quality profiles,
 * language profiles, tags) by name or by numeric ID. Resolution runs against
 * a name -> ID table fetched immediately beforehand and canonicalizes every
 * reference to its name.
 */

import { ResolutionError } from '../../api/errors.js';

/**
 * A resource name or remote-assigned numeric ID
 */
export type ResourceRef = string | number;

/**
 * Name -> ID table for one resource kind
 */
export type ResourceTable = ReadonlyMap<string, number>;

function describeTable(table: ResourceTable): string {
  return Array.from(table, ([name, id]) => `'${name}' (${id})`).join(', ');
}

/**
 * Resolve a reference against a resource table
 *
 * With `required` unset, an unknown reference is returned as given. This is
 * the comparison path used for remote copies; it is not a resolution success.
 */
export function resolveResource(
  description: string,
  ref: ResourceRef,
  table: ResourceTable,
  required: boolean
): ResourceRef {
  if (typeof ref === 'number') {
    for (const [name, id] of table) {
      if (id === ref) return name;
    }
    if (!required) return ref;
    throw new ResolutionError(
      `Invalid ${description} ID ${ref} (expected one of: ${describeTable(table)})`
    );
  }

  if (!required || table.has(ref)) return ref;
  throw new ResolutionError(
    `Invalid ${description} name '${ref}' (expected one of: ${describeTable(table)})`
  );
}

/**
 * Resolve an optional reference; empty values stay null
 */
export function resolveOptionalResource(
  description: string,
  ref: ResourceRef | null,
  table: ResourceTable,
  required: boolean
): ResourceRef | null {
  if (ref === null || ref === '' || ref === 0) return null;
  return resolveResource(description, ref, table, required);
}

/**
 * Resolve a set of references, returning them sorted by name
 */
export function resolveResourceSet(
  description: string,
  refs: readonly ResourceRef[],
  table: ResourceTable,
  required: boolean
): ResourceRef[] {
  const resolved = new Set(refs.map((ref) => resolveResource(description, ref, table, required)));
  return sortRefs(resolved);
}

/**
 * Check a root folder path against the folders the service reports
 */
export function resolveRootFolder(
  path: string,
  rootFolders: ReadonlySet<string>,
  required: boolean
): string {
  if (!required || rootFolders.has(path)) return path;
  throw new ResolutionError(
    `Invalid root folder '${path}' (expected one of: ${Array.from(rootFolders, (folder) => `'${folder}'`).join(', ')})`
  );
}

/**
 * Name -> ID lookup used by encoders; unresolved numeric IDs pass through
 */
export function refToId(ref: ResourceRef, table: ResourceTable): number | string {
  if (typeof ref === 'number') return ref;
  return table.get(ref) ?? ref;
}

/**
 * Encode a reference set as the sorted ID list the remote stores
 */
export function refsToIds(refs: readonly ResourceRef[], table: ResourceTable): (number | string)[] {
  return refs
    .map((ref) => refToId(ref, table))
    .sort((a, b) => compareRefs(a, b));
}

function compareRefs(a: ResourceRef, b: ResourceRef): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deduplicate and order references: IDs first (ascending), then names
 */
export function sortRefs(refs: Iterable<ResourceRef>): ResourceRef[] {
  return Array.from(new Set(refs)).sort(compareRefs);
}
