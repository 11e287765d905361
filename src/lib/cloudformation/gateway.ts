/**
 * CloudFormation gateway
 *
 * Every call the preview makes against the remote stack goes through the
 * StackGateway interface. CloudFormationGateway implements it on top of the
 * AWS SDK v3 client; tests substitute an in-memory fake.
 */

import {
  CloudFormationClient,
  CreateChangeSetCommand,
  DeleteChangeSetCommand,
  DescribeChangeSetCommand,
  DescribeStacksCommand,
  GetTemplateCommand,
  type Capability,
  type Change,
  type Parameter,
  type Stack,
} from '@aws-sdk/client-cloudformation';
import { fromIni } from '@aws-sdk/credential-providers';
import type {
  ChangeAction,
  ChangeRecord,
  ChangesetHandle,
  ChangesetOutcome,
  DeployedParameter,
  EffectiveParameterSet,
  ReplacementMode,
} from '../../types.js';
import { StackNotFoundError } from '../errors.js';
import { inspectAwsError, toGatewayError } from '../aws-errors.js';
import type { Logger } from '../../monitoring/structured-logger.js';
import { matchesNoChange, resolveChangesetOutcome } from './changeset-status.js';

/**
 * Everything needed to ask for an UPDATE changeset
 */
export interface ChangesetRequest {
  stackName: string;
  templateBody: string;
  parameters: EffectiveParameterSet;
}

/**
 * Result of a create request: the service either accepted it, or refused
 * it because nothing would change
 */
export type CreateChangesetResult =
  | { kind: 'created'; handle: ChangesetHandle }
  | { kind: 'no-changes'; reason: string };

/**
 * Remote operations used by a preview run
 */
export interface StackGateway {
  fetchCurrentTemplate(stackName: string, signal?: AbortSignal): Promise<string>;
  fetchDeployedParameters(stackName: string, signal?: AbortSignal): Promise<DeployedParameter[]>;
  createChangeset(request: ChangesetRequest, signal?: AbortSignal): Promise<CreateChangesetResult>;
  readChangesetStatus(handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangesetOutcome>;
  /** All resource-level changes, across every page */
  describeChangeset(handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangeRecord[]>;
  deleteChangeset(handle: ChangesetHandle): Promise<void>;
}

export interface CloudFormationGatewayOptions {
  client: CloudFormationClient;
  noChangePatterns: readonly RegExp[];
  capabilities: readonly Capability[];
  logger: Logger;
  /** Changeset name generator; defaults to `stackdiff-<epoch-ms>` */
  nameFactory?: () => string;
}

/**
 * Create a CloudFormation client for the given region and named profile
 */
export function createCloudFormationClient(options: { region?: string; profile?: string } = {}): CloudFormationClient {
  return new CloudFormationClient({
    region: options.region,
    ...(options.profile ? { credentials: fromIni({ profile: options.profile }) } : {}),
  });
}

/**
 * Convert effective parameters to the CloudFormation wire shape
 */
export function toCloudFormationParameters(parameters: EffectiveParameterSet): Parameter[] {
  return parameters.map(parameter =>
    parameter.kind === 'reuse'
      ? { ParameterKey: parameter.key, UsePreviousValue: true }
      : { ParameterKey: parameter.key, ParameterValue: parameter.value }
  );
}

function toChangeAction(action: string | undefined): ChangeAction {
  switch (action) {
    case 'Add':
    case 'Modify':
    case 'Remove':
    case 'Import':
      return action;
    default:
      return 'Dynamic';
  }
}

function toReplacementMode(replacement: string | undefined): ReplacementMode {
  if (replacement === 'True') {
    return 'always';
  }
  if (replacement === 'Conditional') {
    return 'conditional';
  }
  return 'never';
}

/**
 * Map one DescribeChangeSet entry; entries that are not resource changes yield null
 */
export function toChangeRecord(change: Change): ChangeRecord | null {
  const resource = change.ResourceChange;
  if (change.Type !== 'Resource' || !resource) {
    return null;
  }

  return {
    logicalId: resource.LogicalResourceId ?? '',
    resourceType: resource.ResourceType ?? '',
    action: toChangeAction(resource.Action),
    replacement: toReplacementMode(resource.Replacement),
    ...(resource.PhysicalResourceId ? { physicalId: resource.PhysicalResourceId } : {}),
    scope: resource.Scope ?? [],
  };
}

export class CloudFormationGateway implements StackGateway {
  private readonly client: CloudFormationClient;
  private readonly noChangePatterns: readonly RegExp[];
  private readonly capabilities: Capability[];
  private readonly logger: Logger;
  private readonly nameFactory: () => string;

  constructor(options: CloudFormationGatewayOptions) {
    this.client = options.client;
    this.noChangePatterns = options.noChangePatterns;
    this.capabilities = [...options.capabilities];
    this.logger = options.logger;
    this.nameFactory = options.nameFactory ?? (() => `stackdiff-${Date.now()}`);
  }

  async fetchCurrentTemplate(stackName: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.send(
        new GetTemplateCommand({ StackName: stackName, TemplateStage: 'Original' }),
        { abortSignal: signal }
      );
      return response.TemplateBody ?? '';
    } catch (error) {
      throw toGatewayError(error, { operation: 'GetTemplate', stackName });
    }
  }

  async fetchDeployedParameters(stackName: string, signal?: AbortSignal): Promise<DeployedParameter[]> {
    let stacks: Stack[];
    try {
      const response = await this.client.send(new DescribeStacksCommand({ StackName: stackName }), {
        abortSignal: signal,
      });
      stacks = response.Stacks ?? [];
    } catch (error) {
      throw toGatewayError(error, { operation: 'DescribeStacks', stackName });
    }

    const stack = stacks[0];
    if (!stack) {
      throw new StackNotFoundError(stackName);
    }

    const parameters: DeployedParameter[] = [];
    for (const parameter of stack.Parameters ?? []) {
      if (!parameter.ParameterKey) {
        continue;
      }
      parameters.push({
        key: parameter.ParameterKey,
        ...(parameter.ParameterValue !== undefined ? { value: parameter.ParameterValue } : {}),
        reusable: parameter.UsePreviousValue ?? true,
      });
    }

    this.logger.debug('Fetched deployed parameters', { stackName, count: parameters.length });
    return parameters;
  }

  async createChangeset(request: ChangesetRequest, signal?: AbortSignal): Promise<CreateChangesetResult> {
    const changesetName = this.nameFactory();

    try {
      const response = await this.client.send(
        new CreateChangeSetCommand({
          StackName: request.stackName,
          ChangeSetName: changesetName,
          ChangeSetType: 'UPDATE',
          Description: 'Preview created by stackdiff',
          TemplateBody: request.templateBody,
          Parameters: toCloudFormationParameters(request.parameters),
          Capabilities: this.capabilities,
        }),
        { abortSignal: signal }
      );

      this.logger.debug('Changeset created', { stackName: request.stackName, changesetName });
      return {
        kind: 'created',
        handle: {
          stackName: request.stackName,
          changesetName,
          ...(response.Id ? { id: response.Id } : {}),
        },
      };
    } catch (error) {
      const info = inspectAwsError(error);
      if (matchesNoChange(info.message, this.noChangePatterns)) {
        this.logger.debug('Changeset request refused: no changes', { stackName: request.stackName });
        return { kind: 'no-changes', reason: info.message };
      }
      throw toGatewayError(error, { operation: 'CreateChangeSet', stackName: request.stackName });
    }
  }

  async readChangesetStatus(handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangesetOutcome> {
    try {
      const response = await this.client.send(
        new DescribeChangeSetCommand({ StackName: handle.stackName, ChangeSetName: handle.changesetName }),
        { abortSignal: signal }
      );
      return resolveChangesetOutcome(response.Status, response.StatusReason, this.noChangePatterns);
    } catch (error) {
      throw toGatewayError(error, { operation: 'DescribeChangeSet', stackName: handle.stackName });
    }
  }

  async describeChangeset(handle: ChangesetHandle, signal?: AbortSignal): Promise<ChangeRecord[]> {
    const records: ChangeRecord[] = [];
    let nextToken: string | undefined;

    do {
      let changes: Change[];
      try {
        const response = await this.client.send(
          new DescribeChangeSetCommand({
            StackName: handle.stackName,
            ChangeSetName: handle.changesetName,
            NextToken: nextToken,
          }),
          { abortSignal: signal }
        );
        changes = response.Changes ?? [];
        nextToken = response.NextToken;
      } catch (error) {
        throw toGatewayError(error, { operation: 'DescribeChangeSet', stackName: handle.stackName });
      }

      for (const change of changes) {
        const record = toChangeRecord(change);
        if (record) {
          records.push(record);
        } else {
          this.logger.debug('Skipping non-resource change', { type: change.Type ?? 'unknown' });
        }
      }
    } while (nextToken);

    return records;
  }

  async deleteChangeset(handle: ChangesetHandle): Promise<void> {
    try {
      await this.client.send(
        new DeleteChangeSetCommand({ StackName: handle.stackName, ChangeSetName: handle.changesetName })
      );
      this.logger.debug('Changeset deleted', { changesetName: handle.changesetName });
    } catch (error) {
      throw toGatewayError(error, { operation: 'DeleteChangeSet', stackName: handle.stackName });
    }
  }
}
