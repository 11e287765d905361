/**
 * Preview command
 *
 * Wires configuration, the CloudFormation gateway, the differ, the spinner
 * and interrupt handling around a single preview run.
 */

import chalk, { Chalk } from 'chalk';
import ora from 'ora';
import type { CliOptions } from '../args.js';
import { UsageError } from '../args.js';
import { loadConfig, type PreviewConfig } from '../utils/config-loader.js';
import { CloudFormationGateway, createCloudFormationClient, type StackGateway } from '../../lib/cloudformation/gateway.js';
import { describeFailure, PreviewError } from '../../lib/errors.js';
import { extractActionableMessage, formatErrorSafely } from '../../lib/safe-error-handler.js';
import { getLogger, type Logger } from '../../monitoring/structured-logger.js';
import { runPreview, type PreviewPhase } from '../../preview/orchestrator.js';
import { createTemplateDiffer } from '../../preview/template-differ.js';
import { renderReport } from '../../preview/report.js';
import type { Clock } from '../../types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

const PHASE_LABELS: Record<PreviewPhase, string> = {
  'reading-template': 'Reading template...',
  'fetching-stack': 'Fetching deployed stack...',
  'computing-changeset': 'Computing changeset and diffing templates...',
};

export interface PreviewCommandDependencies {
  logger?: Logger;
  createGateway?: (config: PreviewConfig, logger: Logger) => StackGateway;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  /** Report sink; defaults to stdout */
  write?: (text: string) => void;
  /** Failure sink; defaults to stderr */
  writeError?: (text: string) => void;
  /** Show the spinner; defaults to whether stderr is a terminal */
  spinner?: boolean;
}

/**
 * Map a failure onto the process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) {
    return EXIT_USAGE;
  }
  if (error instanceof PreviewError && error.code === 'Interrupted') {
    return EXIT_INTERRUPTED;
  }
  return EXIT_FAILURE;
}

function createDefaultGateway(config: PreviewConfig, logger: Logger): StackGateway {
  return new CloudFormationGateway({
    client: createCloudFormationClient({ region: config.region, profile: config.profile }),
    noChangePatterns: config.noChangePatterns,
    capabilities: config.capabilities,
    logger,
  });
}

/**
 * Run the preview and print the report
 *
 * @returns Exit code for the process
 */
export async function handlePreviewCommand(
  options: CliOptions,
  deps: PreviewCommandDependencies = {}
): Promise<number> {
  const logger = deps.logger ?? getLogger({ minLevel: options.verbose ? 'debug' : 'warn', showStacks: options.verbose });
  const write = deps.write ?? ((text: string) => process.stdout.write(text + '\n'));
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(text + '\n'));
  const color = new Chalk({ level: options.color ? chalk.level : 0 });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, cleaning up changeset');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const spinner = ora({
    stream: process.stderr,
    isSilent: !(deps.spinner ?? process.stderr.isTTY === true),
  });

  try {
    const config = loadConfig({
      cwd: deps.cwd,
      env: deps.env,
      overrides: { region: options.region, profile: options.profile },
    });
    logger.debug('Configuration loaded', {
      differ: config.differ ?? 'built-in',
      pollIntervalMs: config.pollIntervalMs,
      maxWaitMs: config.maxWaitMs,
    });

    const gateway = (deps.createGateway ?? createDefaultGateway)(config, logger);
    const differ = createTemplateDiffer(config.differ, logger);

    spinner.start();
    const outcome = await runPreview(
      { stackName: options.stackName, templatePath: options.templatePath, parameters: options.parameters },
      {
        gateway,
        differ,
        config,
        clock: deps.clock,
        signal: controller.signal,
        logger,
        onPhase: phase => {
          spinner.text = PHASE_LABELS[phase];
        },
      }
    );
    spinner.stop();

    const rendered = renderReport(outcome, { colors: options.color });
    write(rendered.text);
    return rendered.exitCode;
  } catch (error) {
    spinner.stop();
    writeError(color.red(`❌ ${describeFailure(error)}`));

    if (options.verbose) {
      writeError(formatErrorSafely(error, { colorize: options.color }));
    } else {
      const hint = extractActionableMessage(error);
      if (hint) {
        writeError('\n' + hint);
      }
    }
    return exitCodeFor(error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
