/**
 * validate command - Check a configuration file without contacting any instance
 */

import { ConfigValidationError } from '../api/errors.js';
import { loadConfig } from '../config/index.js';
import type { CommandContext, CommandResult } from '../types.js';
import { verbose } from '../utils/output.js';

export interface ValidateOptions {
  config?: string;
}

export async function validateCommand(
  ctx: CommandContext,
  options: ValidateOptions = {}
): Promise<CommandResult<{ instances: string[] }>> {
  verbose('Executing validate command', ctx.options.verbose);

  try {
    const config = await loadConfig(options.config);
    return {
      success: true,
      message: `Configuration is valid (${config.instances.length} instance(s))`,
      data: { instances: config.instances.map((instance) => instance.name) },
    };
  } catch (err) {
    if (!(err instanceof ConfigValidationError)) throw err;
    return {
      success: false,
      message: err.message,
      errors: err.issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)),
    };
  }
}
