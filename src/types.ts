/**
 * Shared types for the jellyseerr-sync CLI
 */

import type { ConfigDiff } from './reconcilers/core/types.js';

export type { ConfigDiff };

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Read everything, report changes, apply nothing */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to each command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

// ============================================================================
// Command Results
// ============================================================================

/**
 * Outcome of reconciling one instance
 */
export interface InstanceSyncSummary {
  instance: string;
  hostUrl: string;
  version?: string;
  initialized: boolean;
  changed: boolean;
  changes: ConfigDiff[];
  error?: string;
}

/**
 * What the status command reports per instance
 */
export interface InstanceStatus {
  instance: string;
  hostUrl: string;
  initialized?: boolean;
  version?: string;
  expectedVersion?: string;
  error?: string;
}
