/**
 * Attribute remap engine
 *
 * A remote map is a list of entries, each mapping one local field to one
 * remote JSON key with optional transforms:
 *
 * - `decoder`: remote value -> local value
 * - `rootDecoder`: derive the local value from the whole remote object; entries
 *   sharing one root decoder (one local concept spread over several remote
 *   keys) invoke it once per decode
 * - `encoder`: local value -> remote value
 * - `optional`: the remote key may be absent; the local default applies
 * - `setIf`: include the field in outgoing payloads only when this holds
 * - `secret`: mask the value in change reports
 *
 * Several entries may name the same local field (a quality profile is sent
 * as both an ID and a name). On decode the last entry wins.
 */

import { RemoteDecodeError } from '../../api/errors.js';
import { isJsonObject, type JsonObject } from '../../api/types.js';
import { SECRET_MASK, type ConfigDiff } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type RootDecoder = (remote: JsonObject) => unknown;

export interface RemoteMapOptions<V> {
  decoder?: (value: unknown) => unknown;
  rootDecoder?: RootDecoder;
  encoder?: (value: V) => unknown;
  optional?: boolean;
  setIf?: (value: V) => boolean;
  secret?: boolean;
}

/**
 * One entry, with its transforms bound to the settings type
 */
export interface RemoteMapEntry<T> {
  readonly local: keyof T & string;
  readonly remote: string;
  readonly optional: boolean;
  readonly secret: boolean;
  readonly decoder?: (value: unknown) => unknown;
  readonly rootDecoder?: RootDecoder;
  /** Local field value as stored */
  read(obj: T): unknown;
  /** Local field value in remote form */
  encode(obj: T): unknown;
  /** Whether the field belongs in an outgoing payload */
  include(obj: T): boolean;
}

export type RemoteMap<T> = readonly RemoteMapEntry<T>[];

export type RemoteFieldFactory<T> = <K extends keyof T & string>(
  local: K,
  remote: string,
  options?: RemoteMapOptions<T[K]>
) => RemoteMapEntry<T>;

/**
 * Result of comparing a local object with its remote counterpart
 */
export interface UpdatePlan {
  changed: boolean;
  /** Every includable field, changed or not; update endpoints replace whole objects */
  payload: JsonObject;
  changes: ConfigDiff[];
}

export interface CreatePlan {
  payload: JsonObject;
  changes: ConfigDiff[];
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Declare a remote map for settings type T
 *
 * @example
 * const map = defineRemoteMap<GeneralSettings>((field) => [
 *   field('applicationTitle', 'applicationTitle'),
 *   field('applicationUrl', 'applicationUrl', {
 *     decoder: (v) => v || null,
 *     encoder: (v) => v ?? '',
 *   }),
 * ]);
 */
export function defineRemoteMap<T>(
  build: (field: RemoteFieldFactory<T>) => RemoteMapEntry<T>[]
): RemoteMap<T> {
  const field: RemoteFieldFactory<T> = (local, remote, options = {}) => {
    const { encoder, setIf } = options;
    return {
      local,
      remote,
      optional: options.optional ?? false,
      secret: options.secret ?? false,
      decoder: options.decoder,
      rootDecoder: options.rootDecoder,
      read: (obj) => obj[local],
      encode: (obj) => (encoder ? encoder(obj[local]) : obj[local]),
      include: (obj) => (setIf ? setIf(obj[local]) : true),
    };
  };
  return build(field);
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode a remote object into local field values
 *
 * Absent optional fields are omitted so the settings schema supplies defaults.
 */
export function decodeRemote<T>(map: RemoteMap<T>, remote: JsonObject): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const rootValues = new Map<RootDecoder, unknown>();

  for (const entry of map) {
    if (entry.rootDecoder) {
      if (!rootValues.has(entry.rootDecoder)) {
        rootValues.set(entry.rootDecoder, entry.rootDecoder(remote));
      }
      result[entry.local] = rootValues.get(entry.rootDecoder);
      continue;
    }

    if (!(entry.remote in remote)) {
      if (entry.optional) continue;
      throw new RemoteDecodeError(entry.remote);
    }

    const value = remote[entry.remote];
    result[entry.local] = entry.decoder ? entry.decoder(value) : value;
  }

  return result;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Structural equality over JSON-like values
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => key in b && valuesEqual(a[key], b[key]));
  }
  return false;
}

function shown(secret: boolean, value: unknown): unknown {
  return secret && value !== null && value !== undefined && value !== ''
    ? SECRET_MASK
    : value;
}

/**
 * Compare a local object against its remote counterpart
 *
 * Both sides go through the same encoders, so differences are judged in the
 * remote's own representation. Each local field is reported at most once.
 */
export function encodeForUpdate<T>(
  tree: string,
  map: RemoteMap<T>,
  local: T,
  remote: T
): UpdatePlan {
  const payload: JsonObject = {};
  const changes: ConfigDiff[] = [];
  const reported = new Set<string>();

  for (const entry of map) {
    const localValue = entry.encode(local);
    const remoteValue = entry.encode(remote);

    if (!valuesEqual(localValue, remoteValue) && !reported.has(entry.local)) {
      reported.add(entry.local);
      changes.push({
        path: `${tree}.${entry.local}`,
        type: 'modified',
        localValue: shown(entry.secret, entry.read(local)),
        remoteValue: shown(entry.secret, entry.read(remote)),
      });
    }

    if (entry.include(local)) {
      payload[entry.remote] = localValue;
    }
  }

  return { changed: changes.length > 0, payload, changes };
}

/**
 * Build the payload for a remote object that does not exist yet
 */
export function encodeForCreate<T>(tree: string, map: RemoteMap<T>, local: T): CreatePlan {
  const payload: JsonObject = {};
  const changes: ConfigDiff[] = [];
  const reported = new Set<string>();

  for (const entry of map) {
    if (!entry.include(local)) continue;
    payload[entry.remote] = entry.encode(local);
    if (!reported.has(entry.local)) {
      reported.add(entry.local);
      changes.push({
        path: `${tree}.${entry.local}`,
        type: 'added',
        localValue: shown(entry.secret, entry.read(local)),
        remoteValue: undefined,
      });
    }
  }

  return { payload, changes };
}
