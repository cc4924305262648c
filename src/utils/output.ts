/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, ConfigDiff, InstanceStatus, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a diff in a human-readable format
 */
export function printDiff(diffs: ConfigDiff[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(diffs, null, 2));
    return;
  }

  if (diffs.length === 0) {
    console.log(chalk.gray('No changes detected'));
    return;
  }

  console.log(chalk.bold(`\n${diffs.length} change(s) detected:\n`));

  for (const diff of diffs) {
    const color = getDiffColor(diff.type);
    console.log(color(`${getDiffIcon(diff.type)} ${diff.path}`));

    if (diff.type === 'modified') {
      console.log(chalk.red(`  - ${formatValue(diff.remoteValue)}`));
      console.log(chalk.green(`  + ${formatValue(diff.localValue)}`));
    } else if (diff.type === 'added') {
      console.log(chalk.green(`  + ${formatValue(diff.localValue)}`));
    } else {
      console.log(chalk.red('  - (deleted)'));
    }
  }
}

/**
 * Print one line per instance with its version and setup state
 */
export function printStatus(statuses: InstanceStatus[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(statuses, null, 2));
    return;
  }

  console.log(chalk.bold('\nInstance Status:\n'));
  for (const status of statuses) {
    console.log(`  ${chalk.cyan(status.instance)} ${chalk.gray(status.hostUrl)}`);
    if (status.error) {
      console.log(`    ${chalk.gray('Error:')} ${chalk.red(status.error)}`);
      continue;
    }
    console.log(
      `    ${chalk.gray('Initialized:')} ${status.initialized ? chalk.green('✓') : chalk.yellow('no')}`
    );
    const version = status.version ?? 'unknown';
    const mismatch = status.expectedVersion && status.expectedVersion !== status.version;
    console.log(
      `    ${chalk.gray('Version:')} ${mismatch ? chalk.yellow(`${version} (expected ${status.expectedVersion})`) : version}`
    );
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getDiffIcon(type: ConfigDiff['type']): string {
  switch (type) {
    case 'added':
      return '+';
    case 'removed':
      return '-';
    case 'modified':
      return '~';
  }
}

function getDiffColor(type: ConfigDiff['type']): typeof chalk.green {
  switch (type) {
    case 'added':
      return chalk.green;
    case 'removed':
      return chalk.red;
    case 'modified':
      return chalk.yellow;
  }
}

export function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
