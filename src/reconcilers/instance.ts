/**
 * Instance reconciler
 *
 * Drives every settings section of one Jellyseerr instance:
 * initialize if needed, verify the API key, read all remote state, then
 * update and reap in a fixed order.
 */

import { createClient, type ClientFactory, type JellyseerrClient } from '../api/client.js';
import type { ApiLogger } from '../api/logger.js';
import { logger as defaultLogger } from '../api/logger.js';
import { buildHostUrl, fetchInstanceSecrets } from '../config/auth.js';
import type { ResolvedInstance } from '../config/loader.js';
import type { JellyseerrSettings } from '../config/schema.js';
import type { ConfigDiff, ReconcileContext, SecretsContext, SettingsSection } from './core/types.js';
import { generalSection } from './general/index.js';
import { initializeInstance, isInitialized, jellyfinSection } from './jellyfin/index.js';
import { notificationSections } from './notifications/index.js';
import { radarrSection, sonarrSection } from './services/index.js';
import { usersSection } from './users/index.js';

// =============================================================================
// Types
// =============================================================================

export interface InstanceReconcileOptions {
  dryRun: boolean;
  secrets: SecretsContext;
  logger?: ApiLogger;
  clientFactory?: ClientFactory;
}

export interface InstanceReconcileResult {
  instance: string;
  hostUrl: string;
  /** Server version, when the API key could be verified */
  version?: string;
  /** Whether the first-time setup ran (or would run, in dry-run) */
  initialized: boolean;
  changed: boolean;
  changes: ConfigDiff[];
}

interface LoadedSection {
  update(ctx: ReconcileContext): Promise<boolean>;
  reap(ctx: ReconcileContext): Promise<boolean>;
}

interface PendingSection {
  readonly tree: string;
  load(ctx: ReconcileContext): Promise<LoadedSection>;
}

// =============================================================================
// Sections
// =============================================================================

function bindSection<T>(section: SettingsSection<T>, local: T): PendingSection {
  return {
    tree: section.tree,
    async load(ctx) {
      const remote = await section.fromRemote(ctx);
      return {
        update: (updateCtx) => section.updateRemote(updateCtx, local, remote),
        reap: async (reapCtx) =>
          section.deleteRemote ? section.deleteRemote(reapCtx, local, remote) : false,
      };
    },
  };
}

/**
 * Sections in update order
 */
export function instanceSections(settings: JellyseerrSettings): PendingSection[] {
  const { notifications } = settings;
  return [
    bindSection(generalSection, settings.general),
    bindSection(jellyfinSection, settings.jellyfin),
    bindSection(usersSection, settings.users),
    bindSection(radarrSection, settings.services.radarr),
    bindSection(sonarrSection, settings.services.sonarr),
    bindSection(notificationSections.discord, notifications.discord),
    bindSection(notificationSections.email, notifications.email),
    bindSection(notificationSections.gotify, notifications.gotify),
    bindSection(notificationSections.pushbullet, notifications.pushbullet),
    bindSection(notificationSections.pushover, notifications.pushover),
    bindSection(notificationSections.slack, notifications.slack),
    bindSection(notificationSections.telegram, notifications.telegram),
    bindSection(notificationSections.webhook, notifications.webhook),
    bindSection(notificationSections.webpush, notifications.webpush),
  ];
}

/**
 * Read every settings area from the remote, with service references
 * canonicalized to names
 */
export async function readRemoteSettings(ctx: ReconcileContext): Promise<JellyseerrSettings> {
  const radarr = await radarrSection.fromRemote(ctx);
  const sonarr = await sonarrSection.fromRemote(ctx);
  return {
    general: await generalSection.fromRemote(ctx),
    jellyfin: await jellyfinSection.fromRemote(ctx),
    users: await usersSection.fromRemote(ctx),
    notifications: {
      discord: await notificationSections.discord.fromRemote(ctx),
      email: await notificationSections.email.fromRemote(ctx),
      gotify: await notificationSections.gotify.fromRemote(ctx),
      pushbullet: await notificationSections.pushbullet.fromRemote(ctx),
      pushover: await notificationSections.pushover.fromRemote(ctx),
      slack: await notificationSections.slack.fromRemote(ctx),
      telegram: await notificationSections.telegram.fromRemote(ctx),
      webhook: await notificationSections.webhook.fromRemote(ctx),
      webpush: await notificationSections.webpush.fromRemote(ctx),
    },
    services: {
      radarr: await radarrSection.canonicalize(ctx, radarr),
      sonarr: await sonarrSection.canonicalize(ctx, sonarr),
    },
  };
}

// =============================================================================
// Reporting
// =============================================================================

function formatValue(value: unknown): string {
  if (value === undefined) return '(none)';
  return JSON.stringify(value);
}

/**
 * Render a change as a log line
 */
export function formatChange(change: ConfigDiff): string {
  switch (change.type) {
    case 'added':
      return `${change.path}: ${formatValue(change.localValue)}`;
    case 'removed':
      return `${change.path}: (...) -> (deleted)`;
    case 'modified':
      return `${change.path}: ${formatValue(change.remoteValue)} -> ${formatValue(change.localValue)}`;
  }
}

/**
 * Context whose reporter prefixes paths with the instance tree, logs each
 * change and collects it
 */
export function createReconcileContext(
  client: JellyseerrClient,
  options: { tree: string; secrets: SecretsContext; logger: ApiLogger; dryRun: boolean },
  changes: ConfigDiff[] = []
): ReconcileContext {
  return {
    client,
    secrets: options.secrets,
    logger: options.logger,
    dryRun: options.dryRun,
    report(reported) {
      for (const change of reported) {
        const prefixed = { ...change, path: `${options.tree}.${change.path}` };
        options.logger.info(formatChange(prefixed));
        changes.push(prefixed);
      }
    },
  };
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Reconcile one instance against its local settings
 */
export async function reconcileInstance(
  instance: ResolvedInstance,
  options: InstanceReconcileOptions
): Promise<InstanceReconcileResult> {
  const { config, tree } = instance;
  const clientFactory = options.clientFactory ?? createClient;
  const log = (options.logger ?? defaultLogger).child({ instance: instance.name });
  const hostUrl = buildHostUrl(config);
  const timeoutMs = config.requestTimeout * 1000;
  const changes: ConfigDiff[] = [];

  const setupClient = clientFactory({ hostUrl, timeoutMs, logger: log });
  let initialized = false;
  if (!(await isInitialized(setupClient))) {
    initialized = true;
    if (options.dryRun) {
      log.warn('Instance is not initialized; a sync would initialize it before applying settings');
      changes.push({ path: tree, type: 'added', localValue: '(initialized)', remoteValue: undefined });
      return { instance: instance.name, hostUrl, initialized, changed: true, changes };
    }
    log.info('Initializing Jellyseerr instance');
    await initializeInstance(setupClient, config.settings.jellyfin, `${tree}.settings.jellyfin`, log);
  }

  const secrets = await fetchInstanceSecrets(config, { logger: log, clientFactory });
  if (config.version && config.version !== secrets.version) {
    log.warn(`Expected Jellyseerr version ${config.version}, found ${secrets.version}`);
  }

  const client = clientFactory({ hostUrl, apiKey: secrets.apiKey, timeoutMs, logger: log });
  const ctx = createReconcileContext(
    client,
    { tree, secrets: options.secrets, logger: log, dryRun: options.dryRun },
    changes
  );

  const sections = instanceSections(config.settings);
  const loaded: LoadedSection[] = [];
  for (const section of sections) {
    log.debug(`Reading ${section.tree}`);
    loaded.push(await section.load(ctx));
  }

  let changed = initialized;
  for (const section of loaded) {
    if (await section.update(ctx)) changed = true;
  }
  for (const section of loaded) {
    if (await section.reap(ctx)) changed = true;
  }

  return { instance: instance.name, hostUrl, version: secrets.version, initialized, changed, changes };
}
