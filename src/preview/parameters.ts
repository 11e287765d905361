/**
 * Parameter reconciliation
 *
 * Merges `key=value` overrides from the command line with the parameters
 * currently deployed on the stack. Deployed values that are not overridden
 * are carried forward with UsePreviousValue, so the preview never needs
 * secrets it cannot read back.
 */

import type { DeployedParameter, EffectiveParameter, EffectiveParameterSet, ParameterOverride } from '../types.js';
import { InvalidParameterFormatError } from '../lib/errors.js';

/**
 * Parse a single `key=value` argument
 *
 * Only the first `=` separates key from value; the value may be empty.
 *
 * @example
 * parseParameterOverride('Url=https://example.com/?a=b')
 * // { key: 'Url', value: 'https://example.com/?a=b' }
 */
export function parseParameterOverride(argument: string): ParameterOverride {
  const separator = argument.indexOf('=');
  if (separator === -1) {
    throw new InvalidParameterFormatError(argument, 'missing "="');
  }

  const key = argument.slice(0, separator);
  if (key.length === 0) {
    throw new InvalidParameterFormatError(argument, 'empty key');
  }

  return { key, value: argument.slice(separator + 1) };
}

/**
 * Parse every `--parameters` argument, rejecting repeated keys
 */
export function parseParameterOverrides(args: readonly string[]): ParameterOverride[] {
  const seen = new Set<string>();
  return args.map(argument => {
    const override = parseParameterOverride(argument);
    if (seen.has(override.key)) {
      throw new InvalidParameterFormatError(argument, `duplicate key "${override.key}"`);
    }
    seen.add(override.key);
    return override;
  });
}

function compareKeys(a: EffectiveParameter, b: EffectiveParameter): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Compute the parameters to submit with the changeset
 *
 * Every key from either input appears exactly once; overrides win.
 */
export function reconcileParameters(
  deployed: readonly DeployedParameter[],
  overrides: readonly ParameterOverride[]
): EffectiveParameterSet {
  const effective = new Map<string, EffectiveParameter>();

  for (const parameter of deployed) {
    if (!parameter.reusable && parameter.value !== undefined) {
      effective.set(parameter.key, { kind: 'literal', key: parameter.key, value: parameter.value });
    } else {
      effective.set(parameter.key, { kind: 'reuse', key: parameter.key });
    }
  }

  for (const override of overrides) {
    effective.set(override.key, { kind: 'literal', key: override.key, value: override.value });
  }

  return [...effective.values()].sort(compareKeys);
}

/**
 * Human-readable listing for verbose output
 */
export function describeParameters(parameters: EffectiveParameterSet): string[] {
  return parameters.map(parameter =>
    parameter.kind === 'reuse' ? `${parameter.key} = (previous value)` : `${parameter.key} = ${parameter.value}`
  );
}
