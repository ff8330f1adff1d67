#!/usr/bin/env node
/**
 * ACARS Splitter CLI
 *
 * Usage: acars-splitter [options] <command> [arguments]
 *
 * Run `acars-splitter --help` for detailed usage information.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerListenCommand } from './commands/listen.js';
import { registerSplitCommand } from './commands/split.js';
import { ConfigurationError, describeError } from '../util/errors.js';
import { parseLogLevel, setGlobalLevel, shutdownLogging } from '../logging/index.js';

// Package version - would normally read from package.json
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('acars-splitter')
    .description('Reassemble ACARS log streams and split them by label, tail, type or keyword')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--log-level <level>', 'Log level (TRACE, DEBUG, INFO, WARN, ERROR)');

  program.hook('preAction', (thisCommand) => {
    const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
    if (logLevel) {
      setGlobalLevel(parseLogLevel(logLevel));
    }
  });

  registerListenCommand(program);
  registerSplitCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Listen on the ports listed in a config file')}
  $ acars-splitter listen config/splitter.example.json

  ${chalk.gray('# Split a saved log by aircraft tail number')}
  $ acars-splitter split acars.log --by-tail -o by_tail
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const label = error instanceof ConfigurationError ? 'Configuration error:' : 'Error:';
    console.error(chalk.red(label), describeError(error));
    await shutdownLogging();
    process.exit(1);
  }
  await shutdownLogging();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), describeError(error));
    process.exit(1);
  });
}
