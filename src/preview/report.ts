/**
 * Report rendering
 *
 * Assembles the text printed on stdout at the end of a preview.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { ChangeAction, ChangesetResult, TemplateDiff } from '../types.js';
import { renderChangeRecord, summarizeChanges } from './interpreter.js';

export interface PreviewReport {
  stackName: string;
  changeset: ChangesetResult;
  templateDiff: TemplateDiff;
}

export interface RenderOptions {
  colors: boolean;
}

export interface RenderedReport {
  text: string;
  exitCode: number;
  /** True when neither the changeset nor the template diff found anything */
  noChanges: boolean;
}

const ACTION_PHRASES: Array<[ChangeAction, string]> = [
  ['Add', 'to add'],
  ['Modify', 'to modify'],
  ['Remove', 'to remove'],
  ['Import', 'to import'],
  ['Dynamic', 'dynamic'],
];

function renderChangesetSection(report: PreviewReport, color: ChalkInstance): string[] {
  const { changeset, stackName } = report;

  if (changeset.status === 'failed') {
    return [color.red(`❌ Changeset for stack ${stackName} failed: ${changeset.reason ?? 'unknown reason'}`)];
  }

  if (changeset.status === 'no-changes') {
    return [color.bold(`Changeset for stack ${stackName}: no resource changes`)];
  }

  const counts = summarizeChanges(changeset.changes);
  const breakdown = ACTION_PHRASES.filter(([action]) => counts[action] > 0)
    .map(([action, phrase]) => `${counts[action]} ${phrase}`)
    .join(', ');

  return [
    color.bold(`Changeset for stack ${stackName}: ${changeset.changes.length} change(s) (${breakdown})`),
    ...changeset.changes.map(record => `  ${renderChangeRecord(record, color)}`),
  ];
}

function colorizeDiffLine(line: string, color: ChalkInstance): string {
  if (line.startsWith('+++') || line.startsWith('---')) {
    return color.bold(line);
  }
  if (line.startsWith('@@')) {
    return color.cyan(line);
  }
  if (line.startsWith('+')) {
    return color.green(line);
  }
  if (line.startsWith('-')) {
    return color.red(line);
  }
  return line;
}

function renderDiffSection(diff: TemplateDiff, color: ChalkInstance): string[] {
  const lines: string[] = [];

  if (diff.text.length > 0) {
    lines.push('', color.bold('Template diff (remote → local):'));
    lines.push(...diff.text.replace(/\n$/, '').split('\n').map(line => colorizeDiffLine(line, color)));
  }

  if (diff.status === 'tool-error') {
    lines.push('', color.yellow(`⚠️  Diff tool exited with code ${diff.exitCode ?? 'unknown'}`));
  }

  return lines;
}

/**
 * Render the final report
 *
 * @example
 * ```typescript
 * const { text } = renderReport({ stackName: 'api', changeset, templateDiff }, { colors: false });
 * // '✅ No changes detected for stack api'
 * ```
 */
export function renderReport(report: PreviewReport, options: RenderOptions): RenderedReport {
  const color = new Chalk({ level: options.colors ? chalk.level : 0 });

  const noChanges =
    report.changeset.status === 'no-changes' &&
    report.templateDiff.text.length === 0 &&
    report.templateDiff.status !== 'tool-error';
  if (noChanges) {
    return {
      text: color.green(`✅ No changes detected for stack ${report.stackName}`),
      exitCode: 0,
      noChanges: true,
    };
  }

  const lines = [...renderChangesetSection(report, color), ...renderDiffSection(report.templateDiff, color)];
  return { text: lines.join('\n'), exitCode: 0, noChanges: false };
}
