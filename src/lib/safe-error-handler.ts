/**
 * Safe Error Handler
 *
 * AWS SDK errors carry large nested metadata objects. Printing them verbatim
 * buries the actual message, so this module formats errors with bounded
 * depth and length and turns the common credential and permission failures
 * into a short fix list.
 *
 * @example
 * ```typescript
 * import { installGlobalErrorHandler, formatErrorSafely } from './safe-error-handler.js';
 *
 * // Install global handler (call once at CLI entry point)
 * installGlobalErrorHandler();
 *
 * // Or format errors manually
 * try {
 *   await runPreview(options, deps);
 * } catch (error) {
 *   console.error(formatErrorSafely(error));
 * }
 * ```
 */

import util from 'util';
import chalk from 'chalk';

/**
 * Maximum lengths to keep output readable
 */
const MAX_STRING_LENGTH = 50000;
const MAX_STACK_LINES = 50;
const MAX_DEPTH = 5;

/**
 * Safely format an error object for display
 *
 * Handles:
 * - Circular references (replaced with "[Circular]")
 * - Very deep object nesting (truncated at MAX_DEPTH)
 * - Large strings (truncated at MAX_STRING_LENGTH)
 * - Stack traces (limited to MAX_STACK_LINES)
 *
 * @returns Formatted error string (never throws)
 */
export function formatErrorSafely(
  error: unknown,
  options: {
    maxLength?: number;
    maxStackLines?: number;
    maxDepth?: number;
    colorize?: boolean;
  } = {}
): string {
  const maxLength = options.maxLength ?? MAX_STRING_LENGTH;
  const maxStackLines = options.maxStackLines ?? MAX_STACK_LINES;
  const maxDepth = options.maxDepth ?? MAX_DEPTH;
  const colorize = options.colorize ?? true;

  try {
    const parts: string[] = [];

    if (error && typeof error === 'object') {
      const constructor = error.constructor?.name || 'Error';
      parts.push(colorize ? chalk.red(`${constructor}:`) : `${constructor}:`);
    }

    if (error instanceof Error) {
      const message = error.message || 'No message';
      const truncatedMessage = message.length > maxLength
        ? message.substring(0, maxLength) + '... [truncated]'
        : message;
      parts.push(truncatedMessage);

      if (error.stack) {
        const stackLines = error.stack.split('\n');
        const relevantLines = stackLines.slice(0, maxStackLines);

        if (stackLines.length > maxStackLines) {
          relevantLines.push(`... [${stackLines.length - maxStackLines} more lines]`);
        }

        parts.push('');
        parts.push(colorize ? chalk.dim('Stack trace:') : 'Stack trace:');
        parts.push(relevantLines.join('\n'));
      }

      // Own properties: SDK $metadata, preview error code/stage/details
      const knownProps = ['name', 'message', 'stack', 'constructor'];
      const additionalProps = Object.keys(error).filter(key => !knownProps.includes(key));

      if (additionalProps.length > 0) {
        parts.push('');
        parts.push(colorize ? chalk.dim('Additional properties:') : 'Additional properties:');

        for (const key of additionalProps) {
          try {
            const inspected = util.inspect(Reflect.get(error, key), {
              depth: maxDepth,
              maxStringLength: 200,
              breakLength: Infinity,
              compact: true,
            });
            parts.push(`  ${key}: ${inspected}`);
          } catch {
            parts.push(`  ${key}: [Unable to serialize]`);
          }
        }
      }
    } else if (error && typeof error === 'object') {
      try {
        parts.push(util.inspect(error, {
          depth: maxDepth,
          maxStringLength: maxLength,
          breakLength: Infinity,
          colors: colorize,
        }));
      } catch {
        parts.push('[Complex object - unable to serialize safely]');
      }
    } else {
      parts.push(String(error));
    }

    return parts.join('\n');
  } catch {
    return `[Error formatting failed: ${String(error)}]`;
  }
}

/**
 * Extract actionable error messages from AWS failures
 *
 * Common error patterns:
 * - Missing credentials: "Could not load credentials"
 * - Missing region: "Region is missing"
 * - Permission errors: "AccessDenied", "not authorized"
 * - Expired sessions: "ExpiredToken"
 *
 * @returns Actionable message with fix suggestions, or null when no pattern matches
 */
export function extractActionableMessage(error: unknown): string | null {
  if (!(error instanceof Error)) {
    return null;
  }

  const combined = `${error.name} ${error.message}`.toLowerCase();
  const original = chalk.dim('Original error: ' + error.message.substring(0, 200));

  if (combined.includes('could not load credentials') || combined.includes('credentialsprovidererror')) {
    return chalk.red('❌ AWS Credentials Not Found\n\n') +
      'No credentials were found in the environment, shared config or instance metadata.\n\n' +
      chalk.cyan('Fix:\n') +
      '1. Pick a profile: stackdiff --profile <name> ...\n' +
      '2. Or export AWS_PROFILE / AWS_ACCESS_KEY_ID\n' +
      '3. Verify with: aws sts get-caller-identity\n\n' +
      original;
  }

  if (combined.includes('region is missing')) {
    return chalk.red('❌ AWS Region Not Set\n\n') +
      chalk.cyan('Fix:\n') +
      '1. Pass --region <region>\n' +
      '2. Or export AWS_REGION\n\n' +
      original;
  }

  if (combined.includes('expiredtoken') || combined.includes('security token included in the request is expired')) {
    return chalk.red('❌ AWS Session Expired\n\n') +
      chalk.cyan('Fix:\n') +
      '1. Refresh your session: aws sso login --profile <name>\n\n' +
      original;
  }

  if (combined.includes('accessdenied') || combined.includes('not authorized')) {
    return chalk.red('❌ AWS Permission Denied\n\n') +
      'Previewing needs cloudformation:GetTemplate, DescribeStacks, CreateChangeSet,\n' +
      'DescribeChangeSet and DeleteChangeSet on the stack.\n\n' +
      chalk.cyan('Fix:\n') +
      '1. Verify the identity: aws sts get-caller-identity\n' +
      '2. Check the IAM policies attached to it\n\n' +
      original;
  }

  return null;
}

/**
 * Install global error handlers to catch unhandled rejections and exceptions
 *
 * Should be called once at the CLI entry point (src/cli.ts).
 */
export function installGlobalErrorHandler(options: {
  exitOnError?: boolean;
  verbose?: boolean;
} = {}): void {
  const exitOnError = options.exitOnError ?? true;
  const verbose = options.verbose ?? false;

  const report = (title: string, reason: unknown) => {
    console.error('\n' + chalk.red('═'.repeat(80)));
    console.error(chalk.red.bold(`🔴 ${title}\n`));
    console.error(extractActionableMessage(reason) ?? formatErrorSafely(reason, { colorize: true, maxStackLines: verbose ? MAX_STACK_LINES : 5 }));
    console.error(chalk.red('═'.repeat(80)) + '\n');

    if (exitOnError) {
      process.exit(1);
    }
  };

  process.on('unhandledRejection', reason => report('UNHANDLED PROMISE REJECTION', reason));
  process.on('uncaughtException', error => report('UNCAUGHT EXCEPTION', error));
}
