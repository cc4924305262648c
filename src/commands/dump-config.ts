/**
 * dump-config command - Print a remote instance's settings as configuration
 */

import { stringify } from 'yaml';
import { createClient, type ClientFactory } from '../api/client.js';
import { ConfigValidationError } from '../api/errors.js';
import { logger } from '../api/logger.js';
import { fetchInstanceSecrets, instanceSchema, type InstanceConfig } from '../config/index.js';
import { toConfigIssues } from '../reconcilers/core/settings.js';
import { emptySecretsContext } from '../reconcilers/core/types.js';
import { createReconcileContext, readRemoteSettings } from '../reconcilers/instance.js';
import type { CommandContext, CommandResult } from '../types.js';
import { verbose } from '../utils/output.js';

export interface DumpConfigOptions {
  apiKey?: string;
  /** Asks for the API key when neither the option nor the environment sets one */
  promptApiKey?: () => Promise<string>;
  clientFactory?: ClientFactory;
}

/**
 * Instance connection settings from a URL such as `https://requests.example.com:443/base`
 */
export function instanceFromUrl(url: string, apiKey?: string): InstanceConfig {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigValidationError([{ path: 'url', message: `Invalid URL '${url}'` }]);
  }
  const protocol = parsed.protocol.replace(/:$/, '');
  const defaultPort = protocol === 'https' ? 443 : 80;
  const result = instanceSchema.safeParse({
    hostname: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : defaultPort,
    protocol,
    urlBase: parsed.pathname === '/' ? null : parsed.pathname,
    apiKey: apiKey || process.env.JELLYSEERR_API_KEY || null,
  });
  if (!result.success) {
    throw new ConfigValidationError(toConfigIssues(result.error, 'jellyseerr'));
  }
  return result.data;
}

export async function dumpConfigCommand(
  ctx: CommandContext,
  url: string,
  options: DumpConfigOptions = {}
): Promise<CommandResult<string>> {
  verbose(`Executing dump-config command for ${url}`, ctx.options.verbose);

  const clientFactory = options.clientFactory ?? createClient;
  let apiKey = options.apiKey || process.env.JELLYSEERR_API_KEY;
  if (!apiKey && options.promptApiKey) {
    apiKey = await options.promptApiKey();
  }
  const instance = instanceFromUrl(url, apiKey);
  const secrets = await fetchInstanceSecrets(instance, { logger, clientFactory });
  const client = clientFactory({
    hostUrl: secrets.hostUrl,
    apiKey: secrets.apiKey,
    timeoutMs: instance.requestTimeout * 1000,
    logger,
  });
  const reconcileCtx = createReconcileContext(client, {
    tree: 'jellyseerr',
    secrets: emptySecretsContext(),
    logger,
    dryRun: true,
  });

  const settings = await readRemoteSettings(reconcileCtx);
  const document = stringify({
    jellyseerr: {
      hostname: instance.hostname,
      port: instance.port,
      protocol: instance.protocol,
      ...(instance.urlBase ? { urlBase: instance.urlBase } : {}),
      settings,
    },
  });

  if (ctx.outputFormat === 'human') {
    process.stdout.write(document);
  }

  return {
    success: true,
    message: `Dumped configuration of Jellyseerr ${secrets.version} at ${secrets.hostUrl}`,
    data: document,
  };
}
