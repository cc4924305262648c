/**
 * Error hierarchy
 *
 * Every failure surfaced by a reconciliation pass is one of these. None of
 * them are retried: an error aborts the pass for the instance it came from.
 */

/**
 * Base class for all errors raised by this package
 */
export class JellyseerrError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JellyseerrError';
  }
}

/**
 * Non-expected HTTP status or undecodable response body
 */
export class JellyseerrApiError extends JellyseerrError {
  public readonly status: number;
  public readonly method?: string;
  public readonly url?: string;

  constructor(
    message: string,
    status: number,
    options?: {
      method?: string;
      url?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'JellyseerrApiError';
    this.status = status;
    this.method = options?.method;
    this.url = options?.url;
  }
}

/**
 * A remote object lacks a field the remote map requires
 */
export class RemoteDecodeError extends JellyseerrError {
  public readonly field: string;

  constructor(field: string) {
    super(`Remote object is missing required field '${field}'`);
    this.name = 'RemoteDecodeError';
    this.field = field;
  }
}

/**
 * Failure while fetching or validating instance secrets
 */
export class SecretsError extends JellyseerrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SecretsError';
  }
}

/**
 * Missing or rejected API key
 */
export class SecretsUnauthorizedError extends SecretsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SecretsUnauthorizedError';
  }
}

/**
 * A reference or required attribute could not be resolved against the remote
 */
export class ResolutionError extends JellyseerrError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

/**
 * A permission is set without the permission it depends on
 */
export class PermissionHierarchyError extends ResolutionError {
  public readonly permission: string;
  public readonly requires: string;

  constructor(permission: string, requires: string) {
    super(`permission '${permission}' requires unset permission '${requires}'`);
    this.name = 'PermissionHierarchyError';
    this.permission = permission;
    this.requires = requires;
  }
}

/**
 * One problem found while validating a configuration document
 */
export interface ConfigIssue {
  /** Dotted path to the offending value, e.g. `jellyseerr.settings.users.movieRequestLimit` */
  path: string;
  message: string;
}

/**
 * Configuration failed validation before any network call was made
 */
export class ConfigValidationError extends JellyseerrError {
  public readonly issues: ConfigIssue[];
  public readonly source?: string;

  constructor(issues: ConfigIssue[], source?: string) {
    super(
      `Configuration validation failed${source ? ` for ${source}` : ''} with ${issues.length} issue(s)`
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
    this.source = source;
  }

  /**
   * Get formatted issue messages, one per line
   */
  formatErrors(): string {
    return this.issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('\n');
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(err: unknown): string {
  if (err instanceof ConfigValidationError) {
    return `${err.message}\n${err.formatErrors()}`;
  }
  return err instanceof Error ? err.message : String(err);
}
