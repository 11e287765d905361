import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { parseCliArgs, UsageError, type CliOptions } from './args.js';

function preview(argv: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const command = parseCliArgs(argv, env);
  assert.strictEqual(command.kind, 'preview');
  if (command.kind !== 'preview') {
    throw new Error('unreachable');
  }
  return command.options;
}

describe('parseCliArgs', () => {
  it('parses the stack name, parameters and template path', () => {
    assert.deepStrictEqual(preview(['-s', 'api', '-p', 'Env=prod', '-p', 'Size=2', 'template.yml']), {
      templatePath: 'template.yml',
      stackName: 'api',
      parameters: ['Env=prod', 'Size=2'],
      region: undefined,
      profile: undefined,
      color: true,
      verbose: false,
    });
  });

  it('accepts long flags with inline values', () => {
    const options = preview(['--stack-name=api', '--parameters=Url=https://x?a=b', '--region', 'eu-west-1', 't.json']);
    assert.strictEqual(options.stackName, 'api');
    assert.deepStrictEqual(options.parameters, ['Url=https://x?a=b']);
    assert.strictEqual(options.region, 'eu-west-1');
  });

  it('keeps malformed parameters for the reconciler to reject', () => {
    assert.deepStrictEqual(preview(['-s', 'api', '-p', 'Foo', 't.yml']).parameters, ['Foo']);
  });

  it('reads --no-color, --verbose and --profile', () => {
    const options = preview(['--no-color', '--verbose', '--profile', 'ops', '-s', 'api', 't.yml']);
    assert.strictEqual(options.color, false);
    assert.strictEqual(options.verbose, true);
    assert.strictEqual(options.profile, 'ops');
  });

  it('turns on verbose output with DEBUG=true', () => {
    assert.strictEqual(preview(['-s', 'api', 't.yml'], { DEBUG: 'true' }).verbose, true);
  });

  it('recognises help and version', () => {
    assert.deepStrictEqual(parseCliArgs(['--help']), { kind: 'help' });
    assert.deepStrictEqual(parseCliArgs(['-v']), { kind: 'version' });
  });

  it('requires a stack name', () => {
    assert.throws(() => parseCliArgs(['t.yml'], {}), new UsageError('Missing required option: --stack-name <name>'));
  });

  it('requires exactly one template file', () => {
    assert.throws(() => parseCliArgs(['-s', 'api'], {}), /Missing template file argument/);
    assert.throws(() => parseCliArgs(['-s', 'api', 'a.yml', 'b.yml'], {}), /Expected one template file, got: a.yml, b.yml/);
  });

  it('rejects unknown options and missing values', () => {
    assert.throws(() => parseCliArgs(['-x', '-s', 'api', 't.yml'], {}), /Unknown option: -x/);
    assert.throws(() => parseCliArgs(['t.yml', '-s'], {}), /Option -s requires a value/);
  });
});
