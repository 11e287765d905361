/**
 * Structured logger tests
 */

import { describe, it, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import chalk from 'chalk';
import { StructuredLogger, getLogger, resetLogger } from './structured-logger.js';

// Plain output so lines can be compared directly
chalk.level = 0;

function capture(minLevel: 'debug' | 'info' | 'warn' | 'error', showStacks = false) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ minLevel, showStacks, write: line => lines.push(line) });
  return { logger, lines };
}

describe('StructuredLogger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('drops entries below the minimum level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('polling');
    logger.info('fetched template');
    logger.warn('cleanup failed');
    assert.strictEqual(lines.length, 1);
    assert.ok(lines[0].endsWith('⚠️  WARN  cleanup failed'));
  });

  it('formats context as key=value pairs', () => {
    const { logger, lines } = capture('debug');
    logger.debug('changeset status', { status: 'CREATE_PENDING', attempt: 2 });
    assert.ok(lines[0].endsWith('changeset status (status="CREATE_PENDING" attempt=2)'));
  });

  it('appends the error message on error entries', () => {
    const { logger, lines } = capture('error');
    logger.error('delete failed', new Error('AccessDenied'));
    assert.strictEqual(lines[0].split('\n')[1], '  Error: AccessDenied');
  });

  it('includes stack frames only when enabled', () => {
    const quiet = capture('error');
    quiet.logger.error('boom', new Error('x'));
    assert.strictEqual(quiet.lines[0].split('\n').length, 2);

    const verbose = capture('error', true);
    verbose.logger.error('boom', new Error('x'));
    assert.ok(verbose.lines[0].split('\n').length > 2);
  });

  it('returns the same global instance until reset', () => {
    const first = getLogger({ minLevel: 'debug' });
    assert.strictEqual(getLogger(), first);
    resetLogger();
    assert.notStrictEqual(getLogger(), first);
  });
});
