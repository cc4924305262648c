/**
 * Bitmask codec
 *
 * Encodes sets of named flags to packed integers and back. Flag sets are
 * represented as arrays kept in registry order, so equal sets compare equal.
 */

import { PermissionHierarchyError } from '../../api/errors.js';

// =============================================================================
// Simple Registry
// =============================================================================

/**
 * Fixed mapping of flag name to bit value
 */
export type FlagRegistry<F extends string> = Readonly<Record<F, number>>;

/**
 * Codec over a registry without hierarchy
 */
export interface FlagCodec<F extends string> {
  readonly names: readonly F[];
  encode(flags: Iterable<F>): number;
  decode(value: number): F[];
  /** Deduplicate and sort a flag set into registry order */
  normalize(flags: Iterable<F>): F[];
}

export function createFlagCodec<F extends string>(
  registry: FlagRegistry<F>,
  names: readonly F[]
): FlagCodec<F> {
  const order = new Map<string, number>(names.map((name, index) => [name, index]));

  const normalize = (flags: Iterable<F>): F[] =>
    Array.from(new Set(flags)).sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));

  return {
    names,
    normalize,
    encode(flags) {
      let value = 0;
      for (const flag of flags) {
        value |= registry[flag];
      }
      return value;
    },
    decode(value) {
      if (value === 0) return [];
      return names.filter((name) => (value & registry[name]) === registry[name]);
    },
  };
}

// =============================================================================
// Hierarchical Registry
// =============================================================================

/**
 * A group flag and the granular flags it implies
 */
export interface FlagGroup<F extends string> {
  group: F;
  members: readonly F[];
}

/**
 * A flag that is only valid alongside one of its prerequisites
 */
export interface FlagDependency<F extends string> {
  flag: F;
  /** Satisfied when any of these is present; the first is named in errors */
  requires: readonly F[];
}

export interface HierarchicalRegistry<F extends string> {
  registry: FlagRegistry<F>;
  /** Registry order, used for normalized output */
  names: readonly F[];
  /** Supersedes everything when its bit is set */
  superFlag: F;
  groups: readonly FlagGroup<F>[];
  /** Flags outside any group, decoded directly */
  standalone: readonly F[];
  dependencies: readonly FlagDependency<F>[];
}

/**
 * Codec for a registry with a super flag, groups and dependencies
 */
export interface HierarchicalFlagCodec<F extends string> extends FlagCodec<F> {
  /** decode(encode(flags)): collapses members into their groups */
  reduce(flags: Iterable<F>): F[];
}

export function createHierarchicalCodec<F extends string>(
  hierarchy: HierarchicalRegistry<F>
): HierarchicalFlagCodec<F> {
  const simple = createFlagCodec(hierarchy.registry, hierarchy.names);
  const bit = (flag: F): number => hierarchy.registry[flag];
  const has = (value: number, flag: F): boolean => (value & bit(flag)) === bit(flag);

  function decode(value: number): F[] {
    if (value === 0) return [];
    if (has(value, hierarchy.superFlag)) return [hierarchy.superFlag];

    const result = new Set<F>();

    for (const flag of hierarchy.standalone) {
      if (has(value, flag)) result.add(flag);
    }

    for (const { group, members } of hierarchy.groups) {
      if (has(value, group)) {
        result.add(group);
        continue;
      }
      for (const member of members) {
        if (has(value, member)) result.add(member);
      }
    }

    for (const { flag, requires } of hierarchy.dependencies) {
      if (result.has(flag) && !requires.some((req) => result.has(req))) {
        throw new PermissionHierarchyError(flag, requires[0]);
      }
    }

    return simple.normalize(result);
  }

  function encode(flags: Iterable<F>): number {
    return simple.encode(flags);
  }

  return {
    ...simple,
    encode,
    decode,
    reduce(flags) {
      return decode(encode(flags));
    },
  };
}
