#!/usr/bin/env node
/**
 * jellyseerr-sync CLI - Manage Jellyseerr settings from a configuration file
 *
 * Commands:
 * - sync: Apply the configuration to every instance
 * - diff: Show what sync would change
 * - validate: Check the configuration file offline
 * - status: Show version and setup state of each instance
 * - dump-config: Print a running instance's settings as configuration
 */

import { Command, Option } from 'commander';
import { errorMessage } from './api/errors.js';
import { logger } from './api/logger.js';
import {
  diffCommand,
  dumpConfigCommand,
  statusCommand,
  syncCommand,
  validateCommand,
} from './commands/index.js';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { error, printResult } from './utils/output.js';
import { promptInput } from './utils/prompt.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

/**
 * Run a command, print its result and exit with its status
 */
async function run<T>(
  label: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>,
  options: { printHuman?: boolean } = {}
): Promise<void> {
  const ctx = createContext(program.opts<GlobalOptions>());
  try {
    const result = await execute(ctx);
    if (ctx.outputFormat === 'json' || options.printHuman !== false) {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('jellyseerr-sync')
  .description('Reconcile Jellyseerr settings with a declarative configuration file')
  .version(VERSION)
  .addOption(new Option('--dry-run', 'Show what would happen without making changes').default(false))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

program
  .command('sync')
  .description('Apply the configuration to every Jellyseerr instance')
  .argument('[config]', 'Configuration file (default: $JELLYSEERR_SYNC_CONFIG or jellyseerr-sync.yml)')
  .option('--instance <name>', 'Only sync the named instance')
  .action(async (config: string | undefined, cmdOpts: { instance?: string }) => {
    await run('Sync', (ctx) => syncCommand(ctx, { config, instance: cmdOpts.instance }));
  });

program
  .command('diff')
  .description('Show differences between the configuration and the remote instances')
  .argument('[config]', 'Configuration file')
  .option('--instance <name>', 'Only diff the named instance')
  .action(async (config: string | undefined, cmdOpts: { instance?: string }) => {
    await run('Diff', (ctx) => diffCommand(ctx, { config, instance: cmdOpts.instance }));
  });

program
  .command('validate')
  .description('Validate the configuration file without contacting any instance')
  .argument('[config]', 'Configuration file')
  .action(async (config: string | undefined) => {
    await run('Validate', (ctx) => validateCommand(ctx, { config }));
  });

program
  .command('status')
  .description('Show version and setup state of each instance')
  .argument('[config]', 'Configuration file')
  .option('--instance <name>', 'Only check the named instance')
  .action(async (config: string | undefined, cmdOpts: { instance?: string }) => {
    await run('Status', (ctx) => statusCommand(ctx, { config, instance: cmdOpts.instance }));
  });

program
  .command('dump-config')
  .description('Print the settings of a running instance as configuration')
  .argument('<url>', 'Instance URL, e.g. http://localhost:5055')
  .addOption(
    new Option('-k, --api-key <key>', 'API key of the instance, prompted for if unset').env('JELLYSEERR_API_KEY')
  )
  .action(async (url: string, cmdOpts: { apiKey?: string }) => {
    const promptApiKey = process.stdin.isTTY
      ? () => promptInput('Jellyseerr instance API key: ')
      : undefined;
    // The YAML document is the human output
    await run(
      'Dump config',
      (ctx) => dumpConfigCommand(ctx, url, { apiKey: cmdOpts.apiKey, promptApiKey }),
      { printHuman: false }
    );
  });

await program.parseAsync();
