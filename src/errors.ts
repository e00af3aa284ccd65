/**
 * Error classes for deployment runs
 *
 * Fatal errors abort the whole run. Non-fatal errors are recorded against the
 * template being processed and the batch moves on.
 */

export type DeployErrorCode =
  | 'AUTH_FAILED'
  | 'CONFIG_INVALID'
  | 'TEMPLATE_FOLDER_NOT_FOUND'
  | 'TEMPLATE_MALFORMED'
  | 'GROUP_RESOLUTION_FAILED'
  | 'AMBIGUOUS_MATCH'
  | 'REMOTE_WRITE_FAILED';

/**
 * Base error class for deployment errors
 */
export class DeployError extends Error {
  constructor(
    message: string,
    public readonly code: DeployErrorCode,
    public readonly fatal: boolean,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'DeployError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Token acquisition failed, or Graph kept rejecting the token after a refresh
 */
export class AuthError extends DeployError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'AUTH_FAILED',
      true,
      'Sign in again, and check that the app registration has Policy.ReadWrite.ConditionalAccess and Group.ReadWrite.All',
      undefined,
      { cause }
    );
    this.name = 'AuthError';
  }
}

/**
 * Required configuration is missing or invalid
 */
export class ConfigError extends DeployError {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super(
      message,
      'CONFIG_INVALID',
      true,
      `Pass --${option}, set the matching CA_DEPLOY_* variable, or add it to ca-deploy.yaml`
    );
    this.name = 'ConfigError';
  }
}

/**
 * The templates folder does not exist or is not a directory
 */
export class TemplateFolderError extends DeployError {
  constructor(public readonly folder: string, cause?: Error) {
    super(
      `Templates folder not found: ${folder}`,
      'TEMPLATE_FOLDER_NOT_FOUND',
      true,
      'Point --templates at a folder of policy JSON files',
      undefined,
      { cause }
    );
    this.name = 'TemplateFolderError';
  }
}

/**
 * A template file could not be parsed or lacks the fields the engine needs
 */
export class MalformedTemplateError extends DeployError {
  constructor(
    public readonly fileName: string,
    reason: string,
    cause?: Error
  ) {
    super(
      `Malformed template ${fileName}: ${reason}`,
      'TEMPLATE_MALFORMED',
      false,
      undefined,
      { fileName, reason },
      { cause }
    );
    this.name = 'MalformedTemplateError';
  }
}

/**
 * A group could not be looked up or created
 */
export class GroupResolutionError extends DeployError {
  constructor(
    public readonly groupName: string,
    public readonly reason: string,
    options: { fatal?: boolean; cause?: Error; details?: Record<string, unknown> } = {}
  ) {
    super(
      `Could not resolve group "${groupName}": ${reason}`,
      'GROUP_RESOLUTION_FAILED',
      options.fatal ?? false,
      undefined,
      { groupName, ...options.details },
      { cause: options.cause }
    );
    this.name = 'GroupResolutionError';
  }

  /**
   * Same failure, marked fatal (used for the groups every template shares)
   */
  asFatal(): GroupResolutionError {
    return new GroupResolutionError(this.groupName, this.reason, {
      fatal: true,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause : undefined,
    });
  }
}

/**
 * More than one remote policy matches a template's match name
 */
export class AmbiguousMatchError extends DeployError {
  constructor(
    public readonly matchName: string,
    public readonly candidates: Array<{ id: string; displayName: string }>
  ) {
    super(
      `${candidates.length} policies match "${matchName}": ${candidates
        .map((c) => `${c.displayName} (${c.id})`)
        .join(', ')}`,
      'AMBIGUOUS_MATCH',
      false,
      'Rename or remove the duplicate policies so exactly one matches',
      { matchName, candidates }
    );
    this.name = 'AmbiguousMatchError';
  }
}

/**
 * Graph rejected a policy create or update
 */
export class RemoteWriteError extends DeployError {
  constructor(
    public readonly templateName: string,
    public readonly action: 'create' | 'update',
    public readonly status: number | undefined,
    public readonly body: unknown,
    cause?: Error
  ) {
    super(
      `Failed to ${action} policy "${templateName}"${status !== undefined ? ` (HTTP ${status})` : ''}: ${
        cause?.message ?? 'request rejected'
      }`,
      'REMOTE_WRITE_FAILED',
      false,
      undefined,
      { templateName, action, status, body },
      { cause }
    );
    this.name = 'RemoteWriteError';
  }
}

/**
 * Type guard for deployment errors
 */
export function isDeployError(error: unknown): error is DeployError {
  return error instanceof DeployError;
}
