/**
 * AWS SDK error classification
 *
 * Maps errors thrown by AWS SDK v3 clients onto the preview error taxonomy.
 * Throttling, timeouts, network errors and 5xx responses become
 * RemoteTransientError. Nothing is retried.
 */

import {
  PreviewError,
  PreviewInterruptedError,
  RemoteRejectedError,
  RemoteTransientError,
  StackNotFoundError,
} from './errors.js';

/**
 * AWS SDK error names and Node network error codes that indicate a transient failure
 */
const TRANSIENT_ERROR_CODES = [
  'RequestTimeout',
  'RequestTimeoutException',
  'PriorRequestNotComplete',
  'ConnectionError',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'NetworkingError',
  'TimeoutError',
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TooManyRequestsException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalError',
  'InternalServiceError',
];

/**
 * The fields of an SDK error this module cares about
 */
export interface AwsErrorInfo {
  name: string;
  message: string;
  code?: string;
  httpStatusCode?: number;
  fault?: 'client' | 'server';
}

/**
 * Read the interesting fields off anything thrown by an SDK call
 */
export function inspectAwsError(error: unknown): AwsErrorInfo {
  if (typeof error !== 'object' || error === null) {
    return { name: 'Error', message: String(error) };
  }

  const info: AwsErrorInfo = {
    name: 'name' in error && typeof error.name === 'string' ? error.name : 'Error',
    message: 'message' in error && typeof error.message === 'string' ? error.message : '',
  };

  if ('code' in error && typeof error.code === 'string') {
    info.code = error.code;
  }

  if ('$fault' in error && (error.$fault === 'client' || error.$fault === 'server')) {
    info.fault = error.$fault;
  }

  if (
    '$metadata' in error &&
    typeof error.$metadata === 'object' &&
    error.$metadata !== null &&
    'httpStatusCode' in error.$metadata &&
    typeof error.$metadata.httpStatusCode === 'number'
  ) {
    info.httpStatusCode = error.$metadata.httpStatusCode;
  }

  return info;
}

/**
 * Check if an error is a transient service or network failure
 */
export function isTransientError(info: AwsErrorInfo): boolean {
  if (TRANSIENT_ERROR_CODES.includes(info.name)) {
    return true;
  }

  if (info.code && TRANSIENT_ERROR_CODES.includes(info.code)) {
    return true;
  }

  const message = info.message.toLowerCase();
  if (
    message.includes('rate exceeded') ||
    message.includes('throttl') ||
    message.includes('too many requests') ||
    message.includes('socket hang up')
  ) {
    return true;
  }

  // Retry-class status codes: 429 and every 5xx
  if (info.httpStatusCode !== undefined) {
    return info.httpStatusCode === 429 || info.httpStatusCode >= 500;
  }

  return info.fault === 'server';
}

/**
 * CloudFormation answers lookups of unknown stacks with a ValidationError
 * ("Stack with id X does not exist")
 */
export function isStackMissing(info: AwsErrorInfo): boolean {
  return info.name === 'ValidationError' && /does not exist/i.test(info.message);
}

/**
 * Translate an SDK failure into a PreviewError
 *
 * @param error - Whatever the SDK call threw
 * @param context - Operation name for the message; stackName enables StackNotFound detection
 *
 * @example
 * ```typescript
 * try {
 *   await client.send(new GetTemplateCommand({ StackName: 'api' }));
 * } catch (error) {
 *   throw toGatewayError(error, { operation: 'GetTemplate', stackName: 'api' });
 * }
 * ```
 */
export function toGatewayError(
  error: unknown,
  context: { operation: string; stackName?: string }
): PreviewError {
  if (error instanceof PreviewError) {
    return error;
  }

  const info = inspectAwsError(error);

  if (info.name === 'AbortError') {
    return new PreviewInterruptedError('gateway');
  }

  if (context.stackName !== undefined && isStackMissing(info)) {
    return new StackNotFoundError(context.stackName, info.message);
  }

  const details: Record<string, unknown> = { operation: context.operation, errorName: info.name };
  if (info.httpStatusCode !== undefined) {
    details.httpStatusCode = info.httpStatusCode;
  }

  const message = `${context.operation}: ${info.message || info.name}`;
  if (isTransientError(info)) {
    return new RemoteTransientError(message, details);
  }
  return new RemoteRejectedError(message, 'gateway', details);
}
