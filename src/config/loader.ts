/**
 * Configuration loading
 *
 * Resolution order for the file path:
 * 1. Explicit path argument
 * 2. JELLYSEERR_SYNC_CONFIG
 * 3. ./jellyseerr-sync.yml
 */

import { readFile } from 'node:fs/promises';
import { parseDocument } from 'yaml';
import { ConfigValidationError, JellyseerrError, type ConfigIssue } from '../api/errors.js';
import type { JsonObject } from '../api/types.js';
import { toConfigIssues } from '../reconcilers/core/settings.js';
import type { LinkedInstanceSecrets, SecretsContext } from '../reconcilers/core/types.js';
import { deepMerge } from './merge.js';
import {
  DEFAULT_INSTANCE_NAME,
  documentSchema,
  instanceBlocksSchema,
  instanceSchema,
  type ConfigDocument,
  type InstanceConfig,
} from './schema.js';

export const DEFAULT_CONFIG_PATH = 'jellyseerr-sync.yml';

/**
 * One Jellyseerr instance to reconcile
 */
export interface ResolvedInstance {
  name: string;
  /** Prefix for change reports, e.g. `jellyseerr.instances.main` */
  tree: string;
  config: InstanceConfig;
}

export interface LoadedConfig {
  /** File the configuration came from, if any */
  source?: string;
  instances: ResolvedInstance[];
  secrets: SecretsContext;
}

export function resolveConfigPath(path?: string): string {
  return path || process.env.JELLYSEERR_SYNC_CONFIG || DEFAULT_CONFIG_PATH;
}

function linkedSecrets(
  block: ConfigDocument['radarr']
): Map<string, LinkedInstanceSecrets> {
  return new Map(
    Object.entries(block.instances).map(([name, instance]) => [name, { apiKey: instance.apiKey }])
  );
}

function parseInstance(
  name: string,
  tree: string,
  raw: JsonObject,
  issues: ConfigIssue[]
): ResolvedInstance | undefined {
  const withEnv: JsonObject = { ...raw };
  if (!withEnv.apiKey && process.env.JELLYSEERR_API_KEY) {
    withEnv.apiKey = process.env.JELLYSEERR_API_KEY;
  }
  const result = instanceSchema.safeParse(withEnv);
  if (!result.success) {
    issues.push(...toConfigIssues(result.error, tree));
    return undefined;
  }
  return { name, tree, config: result.data };
}

/**
 * Validate a parsed configuration document and expand its instances
 */
export function parseConfig(data: unknown, source?: string): LoadedConfig {
  const document = documentSchema.safeParse(data ?? {});
  if (!document.success) {
    throw new ConfigValidationError(toConfigIssues(document.error, ''), source);
  }

  const { instances: rawInstances, ...globalBlock } = document.data.jellyseerr;
  const blocks = instanceBlocksSchema.safeParse(rawInstances);
  if (!blocks.success) {
    throw new ConfigValidationError(toConfigIssues(blocks.error, 'jellyseerr.instances'), source);
  }

  const issues: ConfigIssue[] = [];
  const instances: ResolvedInstance[] = [];
  const names = Object.keys(blocks.data);

  if (names.length === 0) {
    const instance = parseInstance(DEFAULT_INSTANCE_NAME, 'jellyseerr', globalBlock, issues);
    if (instance) instances.push(instance);
  }

  for (const name of names) {
    // An instance's hostname defaults to its name
    const merged = deepMerge({ hostname: name, ...globalBlock }, blocks.data[name]);
    const instance = parseInstance(name, `jellyseerr.instances.${name}`, merged, issues);
    if (instance) instances.push(instance);
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues, source);
  }

  return {
    source,
    instances,
    secrets: {
      radarr: linkedSecrets(document.data.radarr),
      sonarr: linkedSecrets(document.data.sonarr),
    },
  };
}

/**
 * Read, parse and validate a configuration file
 */
export async function loadConfig(path?: string): Promise<LoadedConfig> {
  const configPath = resolveConfigPath(path);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new JellyseerrError(
      `Failed to read configuration file '${configPath}': ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  const document = parseDocument(content);
  if (document.errors.length > 0) {
    throw new JellyseerrError(
      `Failed to parse configuration file '${configPath}': ${document.errors.map((e) => e.message).join('\n')}`
    );
  }

  return parseConfig(document.toJS(), configPath);
}
