/**
 * Deep merge for instance configuration blocks
 */

import { isJsonObject, type JsonObject } from '../api/types.js';

/**
 * Merge `source` over `target`: objects merge key by key, anything else
 * (arrays included) is replaced. `undefined` keeps the target value.
 */
export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = result[key];
    result[key] =
      isJsonObject(targetValue) && isJsonObject(sourceValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}
