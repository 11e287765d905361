/**
 * Shared test utilities for stackdiff
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import type {
  ChangeRecord,
  ChangesetHandle,
  ChangesetOutcome,
  Clock,
  DeployedParameter,
} from './types.js';
import type { ChangesetRequest, CreateChangesetResult, StackGateway } from './lib/cloudformation/gateway.js';
import type { Logger, LogLevel } from './monitoring/structured-logger.js';
import { PreviewInterruptedError, StackNotFoundError } from './lib/errors.js';
import { throwIfAborted } from './lib/clock.js';

/**
 * Create a temporary directory for testing
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'stackdiff-test-'));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Absolute path of a file under tests/fixtures
 */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../tests/fixtures/${name}`, import.meta.url));
}

export interface RecordedLogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger that keeps entries in memory
 */
export class RecordingLogger implements Logger {
  readonly entries: RecordedLogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context, error });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

/**
 * Manually advanced clock; sleeping moves time forward instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(
    private current = 0,
    private readonly onSleep?: (ms: number) => void
  ) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new PreviewInterruptedError('changeset');
    }
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
    if (signal?.aborted) {
      throw new PreviewInterruptedError('changeset');
    }
  }
}

export interface FakeGatewayOptions {
  template?: string;
  parameters?: DeployedParameter[];
  stackMissing?: boolean;
  /** Result of createChangeset, or the error it throws */
  create?: CreateChangesetResult | Error;
  /** Outcomes returned by successive status reads; the last one repeats */
  statuses?: ChangesetOutcome[];
  changes?: ChangeRecord[];
  describeError?: Error;
  deleteError?: Error;
}

/**
 * In-memory StackGateway recording every call
 */
export class FakeStackGateway implements StackGateway {
  readonly calls: string[] = [];
  readonly requests: ChangesetRequest[] = [];
  readonly deleted: ChangesetHandle[] = [];
  readonly createSignals: Array<AbortSignal | undefined> = [];
  private statusReads = 0;

  constructor(private readonly options: FakeGatewayOptions = {}) {}

  async fetchCurrentTemplate(stackName: string): Promise<string> {
    this.calls.push('fetchCurrentTemplate');
    if (this.options.stackMissing) {
      throw new StackNotFoundError(stackName);
    }
    return this.options.template ?? '';
  }

  async fetchDeployedParameters(stackName: string): Promise<DeployedParameter[]> {
    this.calls.push('fetchDeployedParameters');
    if (this.options.stackMissing) {
      throw new StackNotFoundError(stackName);
    }
    return this.options.parameters ?? [];
  }

  async createChangeset(request: ChangesetRequest, signal?: AbortSignal): Promise<CreateChangesetResult> {
    this.calls.push('createChangeset');
    this.requests.push(request);
    this.createSignals.push(signal);

    const create = this.options.create;
    if (create instanceof Error) {
      throw create;
    }
    return create ?? { kind: 'created', handle: { stackName: request.stackName, changesetName: 'stackdiff-test' } };
  }

  async readChangesetStatus(_handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangesetOutcome> {
    this.calls.push('readChangesetStatus');
    throwIfAborted(signal, 'gateway');

    const statuses: ChangesetOutcome[] = this.options.statuses ?? [{ kind: 'available' }];
    const outcome = statuses[Math.min(this.statusReads, statuses.length - 1)];
    this.statusReads += 1;
    return outcome;
  }

  async describeChangeset(_handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangeRecord[]> {
    this.calls.push('describeChangeset');
    throwIfAborted(signal, 'gateway');

    if (this.options.describeError) {
      throw this.options.describeError;
    }
    return this.options.changes ?? [];
  }

  async deleteChangeset(handle: ChangesetHandle): Promise<void> {
    this.calls.push('deleteChangeset');
    if (this.options.deleteError) {
      throw this.options.deleteError;
    }
    this.deleted.push(handle);
  }
}
