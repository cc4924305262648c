/**
 * Settings schema helpers
 */

import { z } from 'zod';
import { ConfigValidationError, type ConfigIssue } from '../../api/errors.js';
import { sortRefs } from './resolve.js';

/**
 * Convert zod issues to config issues rooted at `path`
 */
export function toConfigIssues(error: z.ZodError, path: string): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: [path, ...issue.path.map(String)].filter((part) => part !== '').join('.'),
    message: issue.message,
  }));
}

/**
 * Parse settings with a schema, reporting failures as a ConfigValidationError
 *
 * Used for both locally authored and remote-decoded settings, so defaults
 * and normalization apply the same way on both sides.
 */
export function parseSettings<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  path: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError(toConfigIssues(result.error, path));
  }
  return result.data;
}

// =============================================================================
// Shared field schemas
// =============================================================================

/** Optional free-text value; empty strings count as unset */
export const optionalString = z
  .string()
  .nullable()
  .default(null)
  .transform((value) => (value === '' ? null : value));

/** Optional http(s) URL; empty strings count as unset */
export const optionalUrl = z
  .union([z.literal(''), z.string().url()])
  .nullable()
  .default(null)
  .transform((value) => (value === '' ? null : value));

export const port = z.number().int().min(1).max(65535);

/** Remote resource reference: a name or a numeric ID */
export const resourceRef = z.union([z.string().min(1), z.number().int()]);

/** Set of resource references, deduplicated and ordered */
export const resourceRefSet = z.array(resourceRef).default([]).transform((refs) => sortRefs(refs));
