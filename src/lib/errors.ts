/**
 * Error handling utilities for consistent error management
 */

/**
 * Stage of the preview run an error came from
 */
export type PreviewStage = 'parameters' | 'template' | 'gateway' | 'changeset' | 'diff' | 'config';

export type PreviewErrorCode =
  | 'StackNotFound'
  | 'InvalidParameterFormat'
  | 'RemoteRejected'
  | 'ChangesetTimeout'
  | 'DiffToolError'
  | 'RemoteTransientError'
  | 'ConfigurationError'
  | 'TemplateNotReadable'
  | 'Interrupted';

/**
 * Base class for every failure surfaced by a preview run
 */
export class PreviewError extends Error {
  constructor(
    message: string,
    public readonly code: PreviewErrorCode,
    public readonly stage: PreviewStage,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PreviewError';
  }
}

export class StackNotFoundError extends PreviewError {
  constructor(public readonly stackName: string, cause?: string) {
    super(`Stack "${stackName}" does not exist`, 'StackNotFound', 'gateway', cause ? { cause } : undefined);
    this.name = 'StackNotFoundError';
  }
}

export class InvalidParameterFormatError extends PreviewError {
  constructor(public readonly argument: string, reason: string) {
    super(`Invalid parameter "${argument}": ${reason} (expected key=value)`, 'InvalidParameterFormat', 'parameters');
    this.name = 'InvalidParameterFormatError';
  }
}

export class RemoteRejectedError extends PreviewError {
  constructor(message: string, stage: PreviewStage = 'gateway', details?: Record<string, unknown>) {
    super(message, 'RemoteRejected', stage, details);
    this.name = 'RemoteRejectedError';
  }
}

export class ChangesetTimeoutError extends PreviewError {
  constructor(public readonly changesetName: string, public readonly waitedMs: number) {
    super(
      `Changeset ${changesetName} did not finish within ${Math.round(waitedMs / 1000)}s`,
      'ChangesetTimeout',
      'changeset'
    );
    this.name = 'ChangesetTimeoutError';
  }
}

export class DiffToolError extends PreviewError {
  constructor(public readonly command: string, reason: string) {
    super(`Invalid differ tool "${command}": ${reason}`, 'DiffToolError', 'diff');
    this.name = 'DiffToolError';
  }
}

export class RemoteTransientError extends PreviewError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RemoteTransientError', 'gateway', details);
    this.name = 'RemoteTransientError';
  }
}

/**
 * Custom error class for configuration errors
 */
export class ConfigurationError extends PreviewError {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly validationErrors?: string[]
  ) {
    super(message, 'ConfigurationError', 'config');
    this.name = 'ConfigurationError';
  }
}

export class TemplateReadError extends PreviewError {
  constructor(public readonly templatePath: string, reason: string) {
    super(`Cannot read template ${templatePath}: ${reason}`, 'TemplateNotReadable', 'template');
    this.name = 'TemplateReadError';
  }
}

export class PreviewInterruptedError extends PreviewError {
  constructor(stage: PreviewStage = 'changeset') {
    super('Interrupted', 'Interrupted', stage);
    this.name = 'PreviewInterruptedError';
  }
}

/**
 * Formats an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof PreviewError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * One-line failure summary naming the stage that failed
 *
 * @example
 * describeFailure(new StackNotFoundError('api'))
 * // 'gateway failed [StackNotFound]: Stack "api" does not exist'
 */
export function describeFailure(error: unknown): string {
  if (error instanceof PreviewError) {
    return `${error.stage} failed [${error.code}]: ${error.message}`;
  }
  return `preview failed: ${formatError(error)}`;
}
