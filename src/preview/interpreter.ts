/**
 * Changeset interpretation
 *
 * Turns a settled changeset outcome and its resource changes into a sorted
 * ChangesetResult, and renders individual changes for the terminal.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { ChangeAction, ChangeRecord, ChangesetResult, SettledOutcome } from '../types.js';

const ACTION_ORDER: readonly ChangeAction[] = ['Add', 'Modify', 'Remove', 'Import', 'Dynamic'];

const ACTION_ICONS: Record<ChangeAction, string> = {
  Add: '🌱',
  Modify: '🔧',
  Remove: '✂️',
  Import: '📥',
  Dynamic: '❓',
};

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort by logical id, then action, then resource type
 */
export function sortChangeRecords(records: readonly ChangeRecord[]): ChangeRecord[] {
  return [...records].sort(
    (a, b) =>
      compareText(a.logicalId, b.logicalId) ||
      ACTION_ORDER.indexOf(a.action) - ACTION_ORDER.indexOf(b.action) ||
      compareText(a.resourceType, b.resourceType)
  );
}

/**
 * Combine a settled outcome with the changes read from the service
 *
 * An available changeset with zero resource changes counts as no changes.
 */
export function interpretChangeset(outcome: SettledOutcome, records: readonly ChangeRecord[]): ChangesetResult {
  switch (outcome.kind) {
    case 'no-changes':
      return { status: 'no-changes', changes: [], reason: outcome.reason };
    case 'failed':
      return { status: 'failed', changes: [], reason: outcome.reason };
    case 'available':
      if (records.length === 0) {
        return { status: 'no-changes', changes: [] };
      }
      return { status: 'has-changes', changes: sortChangeRecords(records) };
  }
}

/**
 * Count changes per action
 */
export function summarizeChanges(records: readonly ChangeRecord[]): Record<ChangeAction, number> {
  const counts: Record<ChangeAction, number> = { Add: 0, Modify: 0, Remove: 0, Import: 0, Dynamic: 0 };
  for (const record of records) {
    counts[record.action] += 1;
  }
  return counts;
}

function actionColor(action: ChangeAction, color: ChalkInstance): ChalkInstance {
  switch (action) {
    case 'Add':
      return color.green;
    case 'Modify':
      return color.yellow;
    case 'Remove':
      return color.red;
    case 'Import':
      return color.cyan;
    case 'Dynamic':
      return color.magenta;
  }
}

/**
 * Render one change as a single line
 *
 * @example
 * renderChangeRecord(record)
 * // '🔧 Modify AWS::DynamoDB::Table Table (api-table) [Properties] ⚠️  Requires replacement'
 */
export function renderChangeRecord(record: ChangeRecord, color: ChalkInstance = chalk): string {
  let line = `${ACTION_ICONS[record.action]} ${actionColor(record.action, color)(record.action)} ${record.resourceType} ${color.bold(record.logicalId)}`;

  if (record.physicalId) {
    line += color.gray(` (${record.physicalId})`);
  }

  if (record.scope.length > 0) {
    line += ` [${record.scope.join(', ')}]`;
  }

  if (record.replacement === 'always') {
    line += ` ${color.red('⚠️  Requires replacement')}`;
  } else if (record.replacement === 'conditional') {
    line += ` ${color.yellow('⚠️  May require replacement')}`;
  }

  return line;
}
