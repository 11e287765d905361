/**
 * Changeset polling
 *
 * Polls the changeset status at a fixed interval until it leaves the
 * pending states or the wait budget runs out.
 */

import type { ChangesetHandle, Clock, SettledOutcome } from '../../types.js';
import { ChangesetTimeoutError } from '../errors.js';
import { systemClock, throwIfAborted } from '../clock.js';
import type { Logger } from '../../monitoring/structured-logger.js';
import type { StackGateway } from './gateway.js';

export interface AwaitChangesetOptions {
  pollIntervalMs: number;
  maxWaitMs: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Wait for a changeset to settle
 *
 * @throws {ChangesetTimeoutError} When still pending after maxWaitMs
 * @throws {PreviewInterruptedError} When the signal fires
 */
export async function awaitChangeset(
  gateway: StackGateway,
  handle: ChangesetHandle,
  options: AwaitChangesetOptions
): Promise<SettledOutcome> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let polls = 0;

  for (;;) {
    throwIfAborted(options.signal);

    const outcome = await gateway.readChangesetStatus(handle, options.signal);
    polls += 1;
    if (outcome.kind !== 'pending') {
      options.logger?.debug('Changeset settled', { changeset: handle.changesetName, outcome: outcome.kind, polls });
      return outcome;
    }

    const elapsed = clock.now() - startedAt;
    if (elapsed >= options.maxWaitMs) {
      throw new ChangesetTimeoutError(handle.changesetName, elapsed);
    }

    options.logger?.debug('Changeset pending', { changeset: handle.changesetName, status: outcome.status });
    await clock.sleep(Math.min(options.pollIntervalMs, options.maxWaitMs - elapsed), options.signal);
  }
}
