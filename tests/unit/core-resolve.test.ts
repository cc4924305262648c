/**
 * Unit Tests: Resource Resolution
 *
 * @see src/reconcilers/core/resolve.ts
 */

import { describe, it, expect } from 'vitest';
import { ResolutionError } from '../../src/api/errors.js';
import {
  refToId,
  refsToIds,
  resolveOptionalResource,
  resolveResource,
  resolveResourceSet,
  resolveRootFolder,
  sortRefs,
} from '../../src/reconcilers/core/resolve.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const PROFILES = new Map([
  ['HD-1080p', 4],
  ['Any', 1],
]);

const TAGS = new Map([
  ['anime', 1],
  ['kids', 2],
]);

// =============================================================================
// resolveResource Tests
// =============================================================================

describe('resolveResource', () => {
  it('should resolve an ID to its name', () => {
    expect(resolveResource('quality profile', 4, PROFILES, true)).toBe('HD-1080p');
  });

  it('should keep a known name', () => {
    expect(resolveResource('quality profile', 'Any', PROFILES, true)).toBe('Any');
  });

  it('should reject an unknown name when required', () => {
    const resolve = () => resolveResource('quality profile', 'Ultra', PROFILES, true);

    expect(resolve).toThrow(ResolutionError);
    expect(resolve).toThrow(
      "Invalid quality profile name 'Ultra' (expected one of: 'HD-1080p' (4), 'Any' (1))"
    );
  });

  it('should reject an unknown ID when required', () => {
    expect(() => resolveResource('quality profile', 9, PROFILES, true)).toThrow(
      "Invalid quality profile ID 9 (expected one of: 'HD-1080p' (4), 'Any' (1))"
    );
  });

  it('should pass unknown references through when not required', () => {
    expect(resolveResource('quality profile', 9, PROFILES, false)).toBe(9);
    expect(resolveResource('quality profile', 'Ultra', PROFILES, false)).toBe('Ultra');
  });
});

describe('resolveOptionalResource', () => {
  it('should treat empty references as unset', () => {
    expect(resolveOptionalResource('language profile', null, PROFILES, true)).toBeNull();
    expect(resolveOptionalResource('language profile', '', PROFILES, true)).toBeNull();
    expect(resolveOptionalResource('language profile', 0, PROFILES, true)).toBeNull();
  });

  it('should resolve a set reference', () => {
    expect(resolveOptionalResource('language profile', 1, PROFILES, true)).toBe('Any');
  });
});

describe('resolveResourceSet', () => {
  it('should resolve, deduplicate and sort by name', () => {
    expect(resolveResourceSet('tag', ['kids', 2, 'anime'], TAGS, true)).toEqual(['anime', 'kids']);
  });

  it('should order unresolved IDs before names', () => {
    expect(resolveResourceSet('tag', ['kids', 7], TAGS, false)).toEqual([7, 'kids']);
  });
});

// =============================================================================
// Root Folder Tests
// =============================================================================

describe('resolveRootFolder', () => {
  const folders = new Set(['/data/movies']);

  it('should accept a reported folder', () => {
    expect(resolveRootFolder('/data/movies', folders, true)).toBe('/data/movies');
  });

  it('should reject an unreported folder when required', () => {
    expect(() => resolveRootFolder('/data/tv', folders, true)).toThrow(
      "Invalid root folder '/data/tv' (expected one of: '/data/movies')"
    );
  });

  it('should pass an unreported folder through when not required', () => {
    expect(resolveRootFolder('/data/tv', folders, false)).toBe('/data/tv');
  });
});

// =============================================================================
// Encoding Helpers Tests
// =============================================================================

describe('refToId / refsToIds / sortRefs', () => {
  it('should look names up and pass unknown names through', () => {
    expect(refToId('HD-1080p', PROFILES)).toBe(4);
    expect(refToId('Ultra', PROFILES)).toBe('Ultra');
    expect(refToId(12, PROFILES)).toBe(12);
  });

  it('should encode a set as sorted IDs', () => {
    expect(refsToIds(['kids', 'anime'], TAGS)).toEqual([1, 2]);
  });

  it('should sort IDs ascending before names', () => {
    expect(sortRefs([3, 'z', 1, 'a', 3])).toEqual([1, 3, 'a', 'z']);
  });
});
