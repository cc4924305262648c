/**
 * diff command - Show what a sync would change, without changing anything
 */

import type { CommandContext, CommandResult, ConfigDiff } from '../types.js';
import { loadConfig } from '../config/index.js';
import { error as printError, header, info, printDiff, verbose } from '../utils/output.js';
import { runInstances, summaryErrors, type SyncOptions } from './sync.js';

export type DiffOptions = SyncOptions;

/**
 * Execute the diff command
 * Reads remote state and tests linked services, but never writes
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions = {}
): Promise<CommandResult<ConfigDiff[]>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing diff command', globalOpts.verbose);

  const config = await loadConfig(options.config);

  if (outputFormat === 'human') {
    header('Configuration Diff');
    info('Comparing local configuration with remote state...');
  }

  const summaries = await runInstances(config, { ...options, dryRun: true });
  const diffs = summaries.flatMap((summary) => summary.changes);
  const errors = summaryErrors(summaries);

  if (outputFormat === 'human') {
    printDiff(diffs, outputFormat);
    errors.forEach((message) => printError(message));
  }

  return {
    success: errors.length === 0,
    message: diffs.length === 0 ? 'No differences found' : `Found ${diffs.length} difference(s)`,
    data: diffs,
    errors: errors.length > 0 ? errors : undefined,
  };
}
