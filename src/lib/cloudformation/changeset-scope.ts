/**
 * Scoped changeset lifetime
 *
 * A changeset created for a preview must never outlive it. withChangeset
 * creates one, hands it to a callback, and deletes it on every exit path:
 * success, failure, timeout and interrupt alike.
 */

import type { ChangesetHandle } from '../../types.js';
import { formatError } from '../errors.js';
import type { Logger } from '../../monitoring/structured-logger.js';
import type { ChangesetRequest, StackGateway } from './gateway.js';

export type ScopedChangesetResult<T> = { kind: 'refused'; reason: string } | { kind: 'used'; value: T };

export interface WithChangesetOptions {
  logger: Logger;
}

/**
 * Delete a changeset, logging rather than throwing on failure
 */
export async function releaseChangeset(gateway: StackGateway, handle: ChangesetHandle, logger: Logger): Promise<void> {
  try {
    await gateway.deleteChangeset(handle);
  } catch (error) {
    logger.warn(`Could not delete changeset ${handle.changesetName}: ${formatError(error)}`, {
      stackName: handle.stackName,
    });
  }
}

/**
 * Run `use` against a freshly created changeset, then delete it
 *
 * Creation is never aborted, so an accepted changeset always yields a
 * handle to delete.
 *
 * @example
 * ```typescript
 * const result = await withChangeset(gateway, request, handle => awaitChangeset(gateway, handle, opts), { logger });
 * if (result.kind === 'refused') {
 *   // nothing would change
 * }
 * ```
 */
export async function withChangeset<T>(
  gateway: StackGateway,
  request: ChangesetRequest,
  use: (handle: ChangesetHandle) => Promise<T>,
  options: WithChangesetOptions
): Promise<ScopedChangesetResult<T>> {
  const created = await gateway.createChangeset(request);
  if (created.kind === 'no-changes') {
    return { kind: 'refused', reason: created.reason };
  }

  try {
    return { kind: 'used', value: await use(created.handle) };
  } finally {
    await releaseChangeset(gateway, created.handle, options.logger);
  }
}
