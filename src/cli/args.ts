/**
 * Command-line argument parsing
 *
 * Usage: stackdiff [options] <template-file>
 */

export interface CliOptions {
  templatePath: string;
  stackName: string;
  /** Raw `key=value` arguments, validated later by the parameter reconciler */
  parameters: string[];
  region?: string;
  profile?: string;
  color: boolean;
  verbose: boolean;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'preview'; options: CliOptions };

/**
 * Thrown for malformed invocations; the CLI prints usage and exits with 2
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS: Record<string, 'stackName' | 'parameters' | 'region' | 'profile'> = {
  '-s': 'stackName',
  '--stack-name': 'stackName',
  '-p': 'parameters',
  '--parameters': 'parameters',
  '-r': 'region',
  '--region': 'region',
  '--profile': 'profile',
};

/**
 * Parse argv (without the node executable and script path)
 *
 * @example
 * parseCliArgs(['-s', 'api', '-p', 'Env=prod', 'template.yml'])
 * // { kind: 'preview', options: { stackName: 'api', parameters: ['Env=prod'], templatePath: 'template.yml', ... } }
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  if (argv.includes('-h') || argv.includes('--help')) {
    return { kind: 'help' };
  }
  if (argv.includes('-v') || argv.includes('--version')) {
    return { kind: 'version' };
  }

  let stackName: string | undefined;
  let region: string | undefined;
  let profile: string | undefined;
  let color = true;
  let verbose = env.DEBUG === 'true';
  const parameters: string[] = [];
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '--no-color') {
      color = false;
      continue;
    }
    if (arg === '--verbose') {
      verbose = true;
      continue;
    }

    // --flag=value form (only long flags)
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const target = VALUE_FLAGS[flag];

    if (target === undefined) {
      if (arg.startsWith('-') && arg !== '-') {
        throw new UsageError(`Unknown option: ${arg}`);
      }
      positionals.push(arg);
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new UsageError(`Option ${flag} requires a value`);
      }
      value = next;
      i++;
    }

    switch (target) {
      case 'stackName':
        stackName = value;
        break;
      case 'parameters':
        parameters.push(value);
        break;
      case 'region':
        region = value;
        break;
      case 'profile':
        profile = value;
        break;
    }
  }

  if (!stackName) {
    throw new UsageError('Missing required option: --stack-name <name>');
  }
  if (positionals.length === 0) {
    throw new UsageError('Missing template file argument');
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected one template file, got: ${positionals.join(', ')}`);
  }

  return {
    kind: 'preview',
    options: {
      templatePath: positionals[0],
      stackName,
      parameters,
      region,
      profile,
      color,
      verbose,
    },
  };
}
