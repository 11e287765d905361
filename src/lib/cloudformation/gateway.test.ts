import { describe, it, mock } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  CloudFormationClient,
  CreateChangeSetCommand,
  DeleteChangeSetCommand,
  DescribeChangeSetCommand,
  DescribeStacksCommand,
  GetTemplateCommand,
} from '@aws-sdk/client-cloudformation';
import { CloudFormationGateway, toChangeRecord, toCloudFormationParameters } from './gateway.js';
import { compilePatterns, DEFAULT_CAPABILITIES, DEFAULT_NO_CHANGE_PATTERNS } from '../../cli/utils/config-loader.js';
import { RemoteRejectedError, RemoteTransientError, StackNotFoundError } from '../errors.js';
import { RecordingLogger } from '../../test-utils.js';

function awsError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

function createGateway(send: (command: unknown) => Promise<unknown>) {
  const sendMock = mock.fn(send);
  const client = { send: sendMock } as unknown as CloudFormationClient;
  const gateway = new CloudFormationGateway({
    client,
    noChangePatterns: compilePatterns(DEFAULT_NO_CHANGE_PATTERNS),
    capabilities: DEFAULT_CAPABILITIES,
    logger: new RecordingLogger(),
    nameFactory: () => 'stackdiff-1700000000000',
  });
  return { gateway, sendMock };
}

describe('CloudFormationGateway', () => {
  describe('fetchCurrentTemplate', () => {
    it('requests the original template stage', async () => {
      const { gateway, sendMock } = createGateway(async command => {
        assert.ok(command instanceof GetTemplateCommand);
        return { TemplateBody: 'Resources: {}\n' };
      });

      const body = await gateway.fetchCurrentTemplate('api');

      assert.strictEqual(body, 'Resources: {}\n');
      const command = sendMock.mock.calls[0].arguments[0];
      assert.ok(command instanceof GetTemplateCommand);
      assert.deepStrictEqual(command.input, { StackName: 'api', TemplateStage: 'Original' });
    });

    it('maps a missing stack to StackNotFoundError', async () => {
      const { gateway } = createGateway(async () => {
        throw awsError('ValidationError', 'Stack with id api does not exist');
      });

      await assert.rejects(gateway.fetchCurrentTemplate('api'), (error: unknown) => {
        assert.ok(error instanceof StackNotFoundError);
        assert.strictEqual(error.stackName, 'api');
        return true;
      });
    });
  });

  describe('fetchDeployedParameters', () => {
    it('returns the parameters of the stack', async () => {
      const { gateway } = createGateway(async command => {
        assert.ok(command instanceof DescribeStacksCommand);
        return {
          Stacks: [
            {
              StackName: 'api',
              Parameters: [
                { ParameterKey: 'Env', ParameterValue: 'prod' },
                { ParameterKey: 'Secret', ParameterValue: '****' },
              ],
            },
          ],
        };
      });

      const parameters = await gateway.fetchDeployedParameters('api');

      assert.deepStrictEqual(parameters, [
        { key: 'Env', value: 'prod', reusable: true },
        { key: 'Secret', value: '****', reusable: true },
      ]);
    });

    it('treats an empty stack list as a missing stack', async () => {
      const { gateway } = createGateway(async () => ({ Stacks: [] }));

      await assert.rejects(gateway.fetchDeployedParameters('api'), StackNotFoundError);
    });
  });

  describe('createChangeset', () => {
    it('submits an UPDATE changeset with carried-forward parameters', async () => {
      const { gateway, sendMock } = createGateway(async () => ({ Id: 'arn:aws:cloudformation:cs/1' }));

      const result = await gateway.createChangeset({
        stackName: 'api',
        templateBody: 'Resources: {}\n',
        parameters: [
          { kind: 'reuse', key: 'Env' },
          { kind: 'literal', key: 'Size', value: 'large' },
        ],
      });

      assert.deepStrictEqual(result, {
        kind: 'created',
        handle: { stackName: 'api', changesetName: 'stackdiff-1700000000000', id: 'arn:aws:cloudformation:cs/1' },
      });

      const command = sendMock.mock.calls[0].arguments[0];
      assert.ok(command instanceof CreateChangeSetCommand);
      assert.strictEqual(command.input.ChangeSetType, 'UPDATE');
      assert.strictEqual(command.input.ChangeSetName, 'stackdiff-1700000000000');
      assert.deepStrictEqual(command.input.Capabilities, [
        'CAPABILITY_IAM',
        'CAPABILITY_NAMED_IAM',
        'CAPABILITY_AUTO_EXPAND',
      ]);
      assert.deepStrictEqual(command.input.Parameters, [
        { ParameterKey: 'Env', UsePreviousValue: true },
        { ParameterKey: 'Size', ParameterValue: 'large' },
      ]);
    });

    it('reports a refused request without changes as no-changes', async () => {
      const { gateway } = createGateway(async () => {
        throw awsError('ValidationError', 'No updates are to be performed.');
      });

      const result = await gateway.createChangeset({ stackName: 'api', templateBody: '', parameters: [] });

      assert.deepStrictEqual(result, { kind: 'no-changes', reason: 'No updates are to be performed.' });
    });

    it('maps other refusals to RemoteRejectedError', async () => {
      const { gateway } = createGateway(async () => {
        throw awsError('InsufficientCapabilitiesException', 'Requires capabilities : [CAPABILITY_IAM]');
      });

      await assert.rejects(
        gateway.createChangeset({ stackName: 'api', templateBody: '', parameters: [] }),
        (error: unknown) => {
          assert.ok(error instanceof RemoteRejectedError);
          assert.strictEqual(error.message, 'CreateChangeSet: Requires capabilities : [CAPABILITY_IAM]');
          return true;
        }
      );
    });
  });

  describe('readChangesetStatus', () => {
    it('resolves the no-change failure once', async () => {
      const { gateway } = createGateway(async () => ({
        Status: 'FAILED',
        StatusReason: "The submitted information didn't contain changes. Submit different information.",
      }));

      const outcome = await gateway.readChangesetStatus({ stackName: 'api', changesetName: 'cs' });

      assert.deepStrictEqual(outcome, {
        kind: 'no-changes',
        reason: "The submitted information didn't contain changes. Submit different information.",
      });
    });
  });

  describe('describeChangeset', () => {
    it('follows pagination and keeps resource changes only', async () => {
      const { gateway, sendMock } = createGateway(async command => {
        assert.ok(command instanceof DescribeChangeSetCommand);
        if (!command.input.NextToken) {
          return {
            Changes: [
              {
                Type: 'Resource',
                ResourceChange: {
                  Action: 'Modify',
                  LogicalResourceId: 'Table',
                  PhysicalResourceId: 'api-table',
                  ResourceType: 'AWS::DynamoDB::Table',
                  Replacement: 'True',
                  Scope: ['Properties'],
                },
              },
            ],
            NextToken: 'page-2',
          };
        }
        return {
          Changes: [
            { Type: 'Other' },
            {
              Type: 'Resource',
              ResourceChange: {
                Action: 'Add',
                LogicalResourceId: 'Queue',
                ResourceType: 'AWS::SQS::Queue',
              },
            },
          ],
        };
      });

      const records = await gateway.describeChangeset({ stackName: 'api', changesetName: 'cs' });

      assert.strictEqual(sendMock.mock.callCount(), 2);
      assert.deepStrictEqual(records, [
        {
          logicalId: 'Table',
          resourceType: 'AWS::DynamoDB::Table',
          action: 'Modify',
          replacement: 'always',
          physicalId: 'api-table',
          scope: ['Properties'],
        },
        {
          logicalId: 'Queue',
          resourceType: 'AWS::SQS::Queue',
          action: 'Add',
          replacement: 'never',
          scope: [],
        },
      ]);
    });
  });

  describe('deleteChangeset', () => {
    it('maps throttling to RemoteTransientError', async () => {
      const { gateway, sendMock } = createGateway(async () => {
        throw awsError('Throttling', 'Rate exceeded');
      });

      await assert.rejects(gateway.deleteChangeset({ stackName: 'api', changesetName: 'cs' }), RemoteTransientError);
      assert.ok(sendMock.mock.calls[0].arguments[0] instanceof DeleteChangeSetCommand);
    });
  });
});

describe('toChangeRecord', () => {
  it('maps conditional replacement and unknown actions', () => {
    assert.deepStrictEqual(
      toChangeRecord({
        Type: 'Resource',
        ResourceChange: { Action: 'Dynamic', LogicalResourceId: 'Fn', ResourceType: 'AWS::Lambda::Function', Replacement: 'Conditional' },
      }),
      { logicalId: 'Fn', resourceType: 'AWS::Lambda::Function', action: 'Dynamic', replacement: 'conditional', scope: [] }
    );
  });
});

describe('toCloudFormationParameters', () => {
  it('keeps literal values verbatim', () => {
    assert.deepStrictEqual(toCloudFormationParameters([{ kind: 'literal', key: 'Url', value: 'a=b=c' }]), [
      { ParameterKey: 'Url', ParameterValue: 'a=b=c' },
    ]);
  });
});
