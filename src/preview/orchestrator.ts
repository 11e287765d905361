/**
 * Preview orchestration
 *
 * Runs one preview end to end:
 * 1. Parse parameter overrides (before any remote call)
 * 2. Read the local template
 * 3. Fetch the deployed template and parameters
 * 4. Reconcile parameters
 * 5. Create, await, describe and delete a changeset while diffing templates
 */

import { readFile } from 'fs/promises';
import type { ChangesetResult, Clock, EffectiveParameterSet, SettledOutcome, TemplateDiff } from '../types.js';
import { RemoteRejectedError, TemplateReadError } from '../lib/errors.js';
import { throwIfAborted } from '../lib/clock.js';
import type { ChangesetRequest, StackGateway } from '../lib/cloudformation/gateway.js';
import { awaitChangeset } from '../lib/cloudformation/changeset-waiter.js';
import { withChangeset } from '../lib/cloudformation/changeset-scope.js';
import type { PreviewConfig } from '../cli/utils/config-loader.js';
import { getLogger, type Logger } from '../monitoring/structured-logger.js';
import { describeParameters, parseParameterOverrides, reconcileParameters } from './parameters.js';
import { interpretChangeset } from './interpreter.js';
import type { TemplateDiffer } from './template-differ.js';
import type { PreviewReport } from './report.js';

export interface PreviewRequest {
  stackName: string;
  templatePath: string;
  /** Raw `key=value` arguments */
  parameters: readonly string[];
}

export type PreviewPhase = 'reading-template' | 'fetching-stack' | 'computing-changeset';

export interface PreviewDependencies {
  gateway: StackGateway;
  differ: TemplateDiffer;
  config: Pick<PreviewConfig, 'pollIntervalMs' | 'maxWaitMs'>;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
  onPhase?: (phase: PreviewPhase) => void;
  readTemplate?: (path: string) => Promise<string>;
}

export interface PreviewOutcome extends PreviewReport {
  parameters: EffectiveParameterSet;
}

async function readLocalTemplate(
  path: string,
  read: (path: string) => Promise<string>
): Promise<string> {
  try {
    return await read(path);
  } catch (error) {
    throw new TemplateReadError(path, error instanceof Error ? error.message : String(error));
  }
}

async function computeChangeset(
  request: ChangesetRequest,
  deps: PreviewDependencies,
  logger: Logger
): Promise<ChangesetResult> {
  const { gateway, signal } = deps;

  const scoped = await withChangeset(
    gateway,
    request,
    async handle => {
      const outcome: SettledOutcome = await awaitChangeset(gateway, handle, {
        pollIntervalMs: deps.config.pollIntervalMs,
        maxWaitMs: deps.config.maxWaitMs,
        clock: deps.clock,
        signal,
        logger,
      });
      if (outcome.kind !== 'available') {
        return interpretChangeset(outcome, []);
      }
      return interpretChangeset(outcome, await gateway.describeChangeset(handle, signal));
    },
    { logger }
  );

  if (scoped.kind === 'refused') {
    return interpretChangeset({ kind: 'no-changes', reason: scoped.reason }, []);
  }
  return scoped.value;
}

/**
 * Preview what deploying a local template would change on a stack
 *
 * The changeset created along the way is deleted before this returns or
 * throws.
 */
export async function runPreview(request: PreviewRequest, deps: PreviewDependencies): Promise<PreviewOutcome> {
  const logger = deps.logger ?? getLogger();
  const { gateway, signal } = deps;

  const overrides = parseParameterOverrides(request.parameters);

  deps.onPhase?.('reading-template');
  const local = await readLocalTemplate(request.templatePath, deps.readTemplate ?? (path => readFile(path, 'utf-8')));

  throwIfAborted(signal, 'gateway');
  deps.onPhase?.('fetching-stack');
  const [remote, deployed] = await Promise.all([
    gateway.fetchCurrentTemplate(request.stackName, signal),
    gateway.fetchDeployedParameters(request.stackName, signal),
  ]);

  const parameters = reconcileParameters(deployed, overrides);
  logger.debug('Effective parameters', { parameters: describeParameters(parameters) });

  throwIfAborted(signal, 'gateway');
  deps.onPhase?.('computing-changeset');
  const [changesetResult, diffResult] = await Promise.allSettled([
    computeChangeset({ stackName: request.stackName, templateBody: local, parameters }, deps, logger),
    deps.differ.diff({ remote, local, localPath: request.templatePath, signal }),
  ]);

  if (changesetResult.status === 'rejected') {
    throw changesetResult.reason;
  }
  if (diffResult.status === 'rejected') {
    throw diffResult.reason;
  }

  const changeset = changesetResult.value;
  if (changeset.status === 'failed') {
    throw new RemoteRejectedError(`Changeset failed: ${changeset.reason ?? 'no reason given'}`, 'changeset');
  }

  const templateDiff: TemplateDiff = diffResult.value;
  return { stackName: request.stackName, changeset, templateDiff, parameters };
}
