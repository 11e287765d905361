import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { formatErrorSafely, extractActionableMessage } from './safe-error-handler.js';
import { StackNotFoundError } from './errors.js';

describe('Safe error handler', () => {
  describe('formatErrorSafely', () => {
    it('starts with the constructor name and message', () => {
      const lines = formatErrorSafely(new TypeError('bad input'), { colorize: false }).split('\n');
      assert.strictEqual(lines[0], 'TypeError:');
      assert.strictEqual(lines[1], 'bad input');
    });

    it('truncates long messages', () => {
      const formatted = formatErrorSafely(new Error('x'.repeat(20)), { colorize: false, maxLength: 5 });
      assert.strictEqual(formatted.split('\n')[1], 'xxxxx... [truncated]');
    });

    it('lists own properties of preview errors', () => {
      const formatted = formatErrorSafely(new StackNotFoundError('api'), { colorize: false });
      assert.ok(formatted.includes("  code: 'StackNotFound'"));
      assert.ok(formatted.includes("  stage: 'gateway'"));
      assert.ok(formatted.includes("  stackName: 'api'"));
    });

    it('formats primitives', () => {
      assert.strictEqual(formatErrorSafely(42, { colorize: false }), '42');
    });

    it('survives circular objects', () => {
      const circular: Record<string, unknown> = { a: 1 };
      circular.self = circular;
      const formatted = formatErrorSafely(circular, { colorize: false });
      assert.ok(formatted.includes('[Circular *1]'));
    });
  });

  describe('extractActionableMessage', () => {
    it('explains missing credentials', () => {
      const error = Object.assign(new Error('Could not load credentials from any providers'), {
        name: 'CredentialsProviderError',
      });
      const message = extractActionableMessage(error);
      assert.ok(message?.includes('AWS Credentials Not Found'));
    });

    it('explains permission errors', () => {
      const error = Object.assign(new Error('User is not authorized to perform: cloudformation:CreateChangeSet'), {
        name: 'AccessDenied',
      });
      assert.ok(extractActionableMessage(error)?.includes('AWS Permission Denied'));
    });

    it('returns null for unrelated errors', () => {
      assert.strictEqual(extractActionableMessage(new Error('Template format error')), null);
      assert.strictEqual(extractActionableMessage('text'), null);
    });
  });
});
