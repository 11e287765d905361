import { setTimeout as delay } from 'timers/promises';
import type { Clock } from '../types.js';
import { PreviewInterruptedError } from './errors.js';

/**
 * Wall-clock implementation used outside of tests
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new PreviewInterruptedError('changeset');
      }
      throw error;
    }
  },
};

/**
 * Throw if the run has been interrupted
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: 'gateway' | 'changeset' = 'changeset'): void {
  if (signal?.aborted) {
    throw new PreviewInterruptedError(stage);
  }
}
