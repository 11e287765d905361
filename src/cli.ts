#!/usr/bin/env node
/**
 * stackdiff CLI Entry Point
 * Preview what deploying a CloudFormation template would change
 */

// Install global error handler FIRST (before any other imports)
import { installGlobalErrorHandler } from './lib/safe-error-handler.js';
installGlobalErrorHandler({
  exitOnError: true,
  verbose: process.env.DEBUG === 'true' || process.argv.includes('--verbose'),
});

import chalk from 'chalk';
import { parseCliArgs, UsageError, type CliCommand } from './cli/args.js';
import { EXIT_USAGE, handlePreviewCommand } from './cli/commands/preview.js';
import { getFormattedVersion } from './cli/utils/version.js';

function printHelpMessage(): void {
  console.log(chalk.bold.cyan('\nstackdiff') + chalk.gray(' - preview CloudFormation stack updates\n'));
  console.log(chalk.bold('Usage:'));
  console.log('  stackdiff [options] <template-file>\n');
  console.log(chalk.bold('Options:'));
  console.log('  -s, --stack-name <name>     Stack to compare against (required)');
  console.log('  -p, --parameters <key=val>  Override a parameter (repeatable)');
  console.log('  -r, --region <region>       AWS region');
  console.log('      --profile <name>        AWS named profile');
  console.log('      --no-color              Disable colors');
  console.log('      --verbose               Debug logging and full error details');
  console.log('  -h, --help                  Show this help');
  console.log('  -v, --version               Show version\n');
  console.log(chalk.bold('Environment:'));
  console.log('  STACKDIFF_DIFFER            External diff command, e.g. "diff -u"');
  console.log('  STACKDIFF_POLL_INTERVAL_MS  Changeset poll interval (default 1000)');
  console.log('  STACKDIFF_MAX_WAIT_MS       Changeset wait limit (default 300000)');
  console.log('  STACKDIFF_NO_CHANGE_PATTERN Extra "no changes" status pattern\n');
  console.log(chalk.bold('Examples:'));
  console.log(chalk.gray('  stackdiff -s api template.yml'));
  console.log(chalk.gray('  stackdiff -s api -p Env=prod -p Size=large --region eu-west-1 template.yml\n'));
}

async function cli(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(`❌ ${error.message}`));
      console.error(chalk.gray('   Run: stackdiff --help'));
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.kind) {
    case 'help':
      printHelpMessage();
      return 0;
    case 'version':
      console.log(getFormattedVersion());
      return 0;
    case 'preview':
      return handlePreviewCommand(command.options);
  }
}

cli().then(
  code => process.exit(code),
  (error: unknown) => {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
);
