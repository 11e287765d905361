import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { Chalk } from 'chalk';
import { interpretChangeset, renderChangeRecord, sortChangeRecords, summarizeChanges } from './interpreter.js';
import type { ChangeRecord } from '../types.js';

const plain = new Chalk({ level: 0 });

const table: ChangeRecord = {
  logicalId: 'Table',
  resourceType: 'AWS::DynamoDB::Table',
  action: 'Modify',
  replacement: 'always',
  physicalId: 'api-table',
  scope: ['Properties'],
};
const queue: ChangeRecord = {
  logicalId: 'Queue',
  resourceType: 'AWS::SQS::Queue',
  action: 'Add',
  replacement: 'never',
  scope: [],
};
const bucket: ChangeRecord = {
  logicalId: 'Bucket',
  resourceType: 'AWS::S3::Bucket',
  action: 'Remove',
  replacement: 'never',
  physicalId: 'api-bucket',
  scope: [],
};

describe('interpretChangeset', () => {
  it('reports the no-change sentinel as no-changes', () => {
    assert.deepStrictEqual(
      interpretChangeset({ kind: 'no-changes', reason: "The submitted information didn't contain changes." }, []),
      { status: 'no-changes', changes: [], reason: "The submitted information didn't contain changes." }
    );
  });

  it('treats an available changeset without records as no-changes', () => {
    assert.deepStrictEqual(interpretChangeset({ kind: 'available' }, []), { status: 'no-changes', changes: [] });
  });

  it('keeps genuine failures', () => {
    assert.deepStrictEqual(interpretChangeset({ kind: 'failed', reason: 'Template error' }, []), {
      status: 'failed',
      changes: [],
      reason: 'Template error',
    });
  });

  it('sorts changes by logical id', () => {
    const result = interpretChangeset({ kind: 'available' }, [table, queue, bucket]);

    assert.strictEqual(result.status, 'has-changes');
    assert.deepStrictEqual(
      result.changes.map(change => change.logicalId),
      ['Bucket', 'Queue', 'Table']
    );
  });

  it('is stable under permutation of the input', () => {
    const forward = interpretChangeset({ kind: 'available' }, [table, queue, bucket]);
    const backward = interpretChangeset({ kind: 'available' }, [bucket, queue, table]);
    const shuffled = interpretChangeset({ kind: 'available' }, [queue, table, bucket]);

    assert.deepStrictEqual(forward, backward);
    assert.deepStrictEqual(forward, shuffled);
  });
});

describe('sortChangeRecords', () => {
  it('breaks logical id ties by action then type', () => {
    const remove: ChangeRecord = { ...queue, action: 'Remove', resourceType: 'AWS::SNS::Topic' };
    const addTopic: ChangeRecord = { ...queue, resourceType: 'AWS::SNS::Topic' };

    assert.deepStrictEqual(sortChangeRecords([remove, queue, addTopic]), [addTopic, queue, remove]);
  });
});

describe('summarizeChanges', () => {
  it('counts changes per action', () => {
    assert.deepStrictEqual(summarizeChanges([table, queue, bucket, queue]), {
      Add: 2,
      Modify: 1,
      Remove: 1,
      Import: 0,
      Dynamic: 0,
    });
  });
});

describe('renderChangeRecord', () => {
  it('renders a replacement', () => {
    assert.strictEqual(
      renderChangeRecord(table, plain),
      '🔧 Modify AWS::DynamoDB::Table Table (api-table) [Properties] ⚠️  Requires replacement'
    );
  });

  it('renders a conditional replacement', () => {
    assert.strictEqual(
      renderChangeRecord({ ...table, replacement: 'conditional', physicalId: undefined, scope: [] }, plain),
      '🔧 Modify AWS::DynamoDB::Table Table ⚠️  May require replacement'
    );
  });

  it('renders an addition without extras', () => {
    assert.strictEqual(renderChangeRecord(queue, plain), '🌱 Add AWS::SQS::Queue Queue');
  });
});
