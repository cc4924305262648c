/**
 * status command - Check each configured instance
 */

import { createClient, type ClientFactory } from '../api/client.js';
import { errorMessage } from '../api/errors.js';
import { logger } from '../api/logger.js';
import { buildHostUrl, fetchInstanceSecrets, loadConfig } from '../config/index.js';
import { isInitialized } from '../reconcilers/jellyfin/index.js';
import type { CommandContext, CommandResult, InstanceStatus } from '../types.js';
import { header, printStatus, verbose } from '../utils/output.js';
import { selectInstances } from './sync.js';

export interface StatusOptions {
  config?: string;
  instance?: string;
  clientFactory?: ClientFactory;
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {}
): Promise<CommandResult<InstanceStatus[]>> {
  const { options: globalOpts, outputFormat } = ctx;
  const clientFactory = options.clientFactory ?? createClient;

  verbose('Executing status command', globalOpts.verbose);

  const config = await loadConfig(options.config);
  const statuses: InstanceStatus[] = [];

  for (const { name, config: instance } of selectInstances(config, options.instance)) {
    const hostUrl = buildHostUrl(instance);
    const status: InstanceStatus = {
      instance: name,
      hostUrl,
      expectedVersion: instance.version ?? undefined,
    };
    try {
      status.initialized = await isInitialized(
        clientFactory({ hostUrl, timeoutMs: instance.requestTimeout * 1000, logger })
      );
      status.version = (await fetchInstanceSecrets(instance, { logger, clientFactory })).version;
    } catch (err) {
      status.error = errorMessage(err);
    }
    statuses.push(status);
  }

  if (outputFormat === 'human') {
    header('Instance Status');
    printStatus(statuses, outputFormat);
  }

  const failed = statuses.filter((status) => status.error);
  return {
    success: failed.length === 0,
    message:
      failed.length === 0
        ? `${statuses.length} instance(s) reachable`
        : `${failed.length} of ${statuses.length} instance(s) unreachable`,
    data: statuses,
    errors: failed.length > 0 ? failed.map((status) => `${status.instance}: ${status.error}`) : undefined,
  };
}
