/**
 * Shared type definitions for stackdiff
 */

/**
 * A `key=value` pair supplied on the command line
 */
export interface ParameterOverride {
  key: string;
  value: string;
}

/**
 * Parameter as currently deployed on the stack
 */
export interface DeployedParameter {
  key: string;
  /** Last value used, when the service reports one */
  value?: string;
  /** Whether the service may carry the previous value forward as-is */
  reusable: boolean;
}

/**
 * Final value submitted for one parameter of the preview
 */
export type EffectiveParameter =
  | { kind: 'reuse'; key: string }
  | { kind: 'literal'; key: string; value: string };

/**
 * Effective parameters, sorted by key, one entry per key
 */
export type EffectiveParameterSet = readonly EffectiveParameter[];

export type ChangeAction = 'Add' | 'Modify' | 'Remove' | 'Import' | 'Dynamic';

export type ReplacementMode = 'always' | 'conditional' | 'never';

/**
 * One predicted resource-level change
 */
export interface ChangeRecord {
  readonly logicalId: string;
  readonly resourceType: string;
  readonly action: ChangeAction;
  readonly replacement: ReplacementMode;
  readonly physicalId?: string;
  /** Changed attribute groups (Properties, Metadata, Tags, ...) */
  readonly scope: readonly string[];
}

/**
 * Reference to a changeset created on the remote service
 */
export interface ChangesetHandle {
  stackName: string;
  changesetName: string;
  /** ARN returned by the service, when available */
  id?: string;
}

/**
 * Changeset state, resolved once right after it is read from the service
 */
export type ChangesetOutcome =
  | { kind: 'pending'; status: string }
  | { kind: 'available' }
  | { kind: 'no-changes'; reason: string }
  | { kind: 'failed'; reason: string };

/**
 * A changeset outcome that no longer needs polling
 */
export type SettledOutcome = Exclude<ChangesetOutcome, { kind: 'pending' }>;

export type ChangesetStatus = 'has-changes' | 'no-changes' | 'failed';

export interface ChangesetResult {
  status: ChangesetStatus;
  /** Sorted by logical id */
  changes: ChangeRecord[];
  reason?: string;
}

export type TemplateDiffStatus = 'identical' | 'different' | 'tool-error';

export interface TemplateDiff {
  text: string;
  status: TemplateDiffStatus;
  /** Exit code of the external diff tool, when one was used */
  exitCode?: number;
}

/**
 * Injectable time source for polling loops
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
