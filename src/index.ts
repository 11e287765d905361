/**
 * stackdiff
 *
 * Preview the effect of deploying a CloudFormation template on an existing
 * stack: a resource changeset plus a template diff, without applying anything.
 */

export { runPreview } from './preview/orchestrator.js';
export type { PreviewRequest, PreviewDependencies, PreviewOutcome, PreviewPhase } from './preview/orchestrator.js';
export {
  parseParameterOverride,
  parseParameterOverrides,
  reconcileParameters,
  describeParameters,
} from './preview/parameters.js';
export { interpretChangeset, sortChangeRecords, summarizeChanges, renderChangeRecord } from './preview/interpreter.js';
export {
  createTemplateDiffer,
  BuiltinTemplateDiffer,
  ExternalTemplateDiffer,
  type TemplateDiffer,
  type TemplateDiffInput,
} from './preview/template-differ.js';
export { renderReport, type PreviewReport, type RenderedReport } from './preview/report.js';
export {
  CloudFormationGateway,
  createCloudFormationClient,
  toCloudFormationParameters,
  type StackGateway,
  type ChangesetRequest,
  type CreateChangesetResult,
} from './lib/cloudformation/gateway.js';
export { awaitChangeset } from './lib/cloudformation/changeset-waiter.js';
export { withChangeset, releaseChangeset } from './lib/cloudformation/changeset-scope.js';
export { resolveChangesetOutcome, matchesNoChange } from './lib/cloudformation/changeset-status.js';
export { loadConfig, DEFAULT_NO_CHANGE_PATTERNS, type PreviewConfig } from './cli/utils/config-loader.js';
export { systemClock } from './lib/clock.js';
export * from './lib/errors.js';
export type * from './types.js';
