/**
 * sync command - Reconcile every configured instance with its configuration
 */

import type { ClientFactory } from '../api/client.js';
import { errorMessage, JellyseerrError } from '../api/errors.js';
import { logger } from '../api/logger.js';
import { buildHostUrl, loadConfig, type LoadedConfig } from '../config/index.js';
import { reconcileInstance } from '../reconcilers/instance.js';
import type { CommandContext, CommandResult, InstanceSyncSummary } from '../types.js';
import { dryRunNotice, error as printError, header, info, success, verbose } from '../utils/output.js';

export interface SyncOptions {
  /** Configuration file path */
  config?: string;
  /** Only reconcile the named instance */
  instance?: string;
  clientFactory?: ClientFactory;
}

/**
 * Select the instances a command should act on
 */
export function selectInstances(config: LoadedConfig, name?: string): LoadedConfig['instances'] {
  if (!name) return config.instances;
  const selected = config.instances.filter((instance) => instance.name === name);
  if (selected.length === 0) {
    const known = config.instances.map((instance) => `'${instance.name}'`).join(', ');
    throw new JellyseerrError(`Unknown instance '${name}' (configured instances: ${known})`);
  }
  return selected;
}

/**
 * Reconcile each selected instance in order. A failure stops that instance
 * only; the rest still run.
 */
export async function runInstances(
  config: LoadedConfig,
  options: SyncOptions & { dryRun: boolean }
): Promise<InstanceSyncSummary[]> {
  const summaries: InstanceSyncSummary[] = [];

  for (const instance of selectInstances(config, options.instance)) {
    try {
      summaries.push(
        await reconcileInstance(instance, {
          dryRun: options.dryRun,
          secrets: config.secrets,
          logger,
          clientFactory: options.clientFactory,
        })
      );
    } catch (err) {
      logger.error(`Reconciliation of instance '${instance.name}' failed`, err instanceof Error ? err : undefined);
      summaries.push({
        instance: instance.name,
        hostUrl: buildHostUrl(instance.config),
        initialized: false,
        changed: false,
        changes: [],
        error: errorMessage(err),
      });
    }
  }

  return summaries;
}

export function summaryErrors(summaries: InstanceSyncSummary[]): string[] {
  return summaries.flatMap((summary) =>
    summary.error ? [`${summary.instance}: ${summary.error}`] : []
  );
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions = {}
): Promise<CommandResult<InstanceSyncSummary[]>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing sync command', globalOpts.verbose);
  verbose(`Dry run: ${globalOpts.dryRun}`, globalOpts.verbose);

  const config = await loadConfig(options.config);
  verbose(`Loaded ${config.instances.length} instance(s) from ${config.source}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Sync');
    if (globalOpts.dryRun) dryRunNotice();
  }

  const summaries = await runInstances(config, { ...options, dryRun: globalOpts.dryRun });
  const errors = summaryErrors(summaries);
  const changed = summaries.filter((summary) => summary.changed);

  if (outputFormat === 'human') {
    for (const summary of summaries) {
      if (summary.error) {
        printError(`${summary.instance}: ${summary.error}`);
      } else if (summary.changed) {
        success(`${summary.instance}: ${summary.changes.length} change(s)${globalOpts.dryRun ? ' (dry run)' : ''}`);
      } else {
        info(`${summary.instance}: up to date`);
      }
    }
  }

  return {
    success: errors.length === 0,
    message:
      errors.length > 0
        ? `Sync failed for ${errors.length} instance(s)`
        : changed.length === 0
          ? 'All instances up to date'
          : `${globalOpts.dryRun ? 'Would update' : 'Updated'} ${changed.length} instance(s)`,
    data: summaries,
    errors: errors.length > 0 ? errors : undefined,
  };
}
