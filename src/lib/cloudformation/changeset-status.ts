/**
 * Changeset status resolution
 *
 * CloudFormation reports a changeset that would change nothing as FAILED,
 * with a status reason explaining there were no changes. That overloaded
 * status is resolved here, once, into a tagged ChangesetOutcome so nothing
 * downstream has to inspect reason strings again.
 */

import type { ChangesetOutcome } from '../../types.js';

/**
 * Check a service-provided reason against the configured no-change patterns
 */
export function matchesNoChange(reason: string | undefined, patterns: readonly RegExp[]): boolean {
  if (!reason) {
    return false;
  }
  return patterns.some(pattern => pattern.test(reason));
}

/**
 * Resolve a raw DescribeChangeSet status into an outcome
 *
 * @param status - Status field (CREATE_PENDING, CREATE_IN_PROGRESS, CREATE_COMPLETE, FAILED, ...)
 * @param reason - StatusReason field
 * @param patterns - No-change patterns
 *
 * @example
 * ```typescript
 * resolveChangesetOutcome('FAILED', "The submitted information didn't contain changes. ...", patterns);
 * // { kind: 'no-changes', reason: "The submitted information didn't contain changes. ..." }
 * ```
 */
export function resolveChangesetOutcome(
  status: string | undefined,
  reason: string | undefined,
  patterns: readonly RegExp[]
): ChangesetOutcome {
  if (!status || status.endsWith('_PENDING') || status.endsWith('_IN_PROGRESS')) {
    return { kind: 'pending', status: status ?? 'UNKNOWN' };
  }

  if (status === 'CREATE_COMPLETE') {
    return { kind: 'available' };
  }

  if (matchesNoChange(reason, patterns)) {
    return { kind: 'no-changes', reason: reason ?? status };
  }

  return { kind: 'failed', reason: reason || `Changeset status is ${status}` };
}
