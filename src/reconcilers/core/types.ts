/**
 * Shared types for settings sections and the reconciliation driver
 */

import type { JellyseerrClient } from '../../api/client.js';
import type { ApiLogger } from '../../api/logger.js';

// =============================================================================
// Changes
// =============================================================================

/**
 * One field-level difference between local and remote state
 */
export interface ConfigDiff {
  /** Tree path, e.g. `jellyseerr.settings.general.applicationTitle` */
  path: string;
  type: 'added' | 'removed' | 'modified';
  /** Desired value (masked for secret fields) */
  localValue: unknown;
  /** Current remote value (masked for secret fields) */
  remoteValue: unknown;
}

/** Shown in place of secret values in logs and diffs */
export const SECRET_MASK = '********';

// =============================================================================
// Linked Instance Secrets
// =============================================================================

/**
 * Credentials of a Radarr or Sonarr instance declared elsewhere in the config
 */
export interface LinkedInstanceSecrets {
  apiKey: string;
}

/**
 * Linked instance credentials, keyed by service type then instance name
 */
export interface SecretsContext {
  radarr: ReadonlyMap<string, LinkedInstanceSecrets>;
  sonarr: ReadonlyMap<string, LinkedInstanceSecrets>;
}

export function emptySecretsContext(): SecretsContext {
  return { radarr: new Map(), sonarr: new Map() };
}

// =============================================================================
// Reconcile Context
// =============================================================================

/**
 * Everything a section needs during one reconciliation pass
 */
export interface ReconcileContext {
  client: JellyseerrClient;
  secrets: SecretsContext;
  logger: ApiLogger;
  /** Reads and service connection tests still happen; create/update/delete calls are skipped */
  dryRun: boolean;
  /** Log and collect field changes */
  report(changes: readonly ConfigDiff[]): void;
}

/**
 * A settings area that can be read from and written to the remote
 */
export interface SettingsSection<T> {
  /** Tree path used in change reports */
  readonly tree: string;
  fromRemote(ctx: ReconcileContext): Promise<T>;
  /** Returns whether the remote changed (or would change, in dry-run) */
  updateRemote(ctx: ReconcileContext, local: T, remote: T): Promise<boolean>;
  deleteRemote?(ctx: ReconcileContext, local: T, remote: T): Promise<boolean>;
}
