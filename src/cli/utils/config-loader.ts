/**
 * Configuration loading and validation
 *
 * Sources, highest precedence first: CLI options, environment variables,
 * `.stackdiff.json` in the working directory, built-in defaults.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { Capability } from '@aws-sdk/client-cloudformation';
import { ConfigurationError } from '../../lib/errors.js';

export const CONFIG_FILE_NAME = '.stackdiff.json';

/**
 * Status reasons CloudFormation uses for a changeset that has nothing to do.
 * Matched case-insensitively against FAILED changesets and refused requests.
 */
export const DEFAULT_NO_CHANGE_PATTERNS = [
  "The submitted information didn't contain changes",
  'No updates are to be performed',
];

export const DEFAULT_CAPABILITIES: Capability[] = [
  Capability.CAPABILITY_IAM,
  Capability.CAPABILITY_NAMED_IAM,
  Capability.CAPABILITY_AUTO_EXPAND,
];

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_MAX_WAIT_MS = 5 * 60 * 1000;

const ConfigFileSchema = z
  .object({
    differ: z.string().min(1).optional(),
    pollIntervalMs: z.number().int().positive().optional(),
    maxWaitMs: z.number().int().positive().optional(),
    noChangePatterns: z.array(z.string().min(1)).optional(),
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    capabilities: z.array(z.nativeEnum(Capability)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const EnvSchema = z.object({
  STACKDIFF_DIFFER: z.string().optional(),
  STACKDIFF_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  STACKDIFF_MAX_WAIT_MS: z.coerce.number().int().positive().optional(),
  STACKDIFF_NO_CHANGE_PATTERN: z.string().min(1).optional(),
});

/**
 * Fully resolved configuration for one preview run
 */
export interface PreviewConfig {
  /** External diff command; undefined selects the built-in differ */
  differ?: string;
  pollIntervalMs: number;
  maxWaitMs: number;
  noChangePatterns: RegExp[];
  region?: string;
  profile?: string;
  capabilities: Capability[];
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: { region?: string; profile?: string };
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Read and validate `.stackdiff.json`, if present
 */
export function readConfigFile(cwd: string): ConfigFile {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const errors = describeIssues(parsed.error);
    throw new ConfigurationError(`Invalid ${CONFIG_FILE_NAME}: ${errors.join('; ')}`, configPath, errors);
  }
  return parsed.data;
}

/**
 * Compile no-change patterns (case-insensitive)
 */
export function compilePatterns(sources: string[]): RegExp[] {
  return sources.map(source => {
    try {
      return new RegExp(source, 'i');
    } catch (error) {
      throw new ConfigurationError(`Invalid no-change pattern "${source}": ${error instanceof Error ? error.message : String(error)}`);
    }
  });
}

/**
 * Resolve the configuration for a run
 *
 * @example
 * ```typescript
 * const config = loadConfig({ overrides: { region: 'eu-west-1' } });
 * config.noChangePatterns; // [/The submitted information didn't contain changes/i, ...]
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): PreviewConfig {
  const cwd = options.cwd ?? process.cwd();
  const file = readConfigFile(cwd);

  const envResult = EnvSchema.safeParse(options.env ?? process.env);
  if (!envResult.success) {
    const errors = describeIssues(envResult.error);
    throw new ConfigurationError(`Invalid environment: ${errors.join('; ')}`, undefined, errors);
  }
  const env = envResult.data;

  const patterns = [...(file.noChangePatterns ?? DEFAULT_NO_CHANGE_PATTERNS)];
  if (env.STACKDIFF_NO_CHANGE_PATTERN) {
    patterns.push(env.STACKDIFF_NO_CHANGE_PATTERN);
  }

  const differ = env.STACKDIFF_DIFFER?.trim() || file.differ;

  return {
    differ: differ || undefined,
    pollIntervalMs: env.STACKDIFF_POLL_INTERVAL_MS ?? file.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    maxWaitMs: env.STACKDIFF_MAX_WAIT_MS ?? file.maxWaitMs ?? DEFAULT_MAX_WAIT_MS,
    noChangePatterns: compilePatterns(patterns),
    region: options.overrides?.region ?? file.region,
    profile: options.overrides?.profile ?? file.profile,
    capabilities: file.capabilities ?? DEFAULT_CAPABILITIES,
  };
}
