/**
 * Split Command
 *
 * One-shot split of a saved ACARS log file by label, tail, type or keyword.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { splitLogFile } from '../../server/FileSplitter.js';
import { SplitStrategy } from '../../datatypes/acars/AcarsProperties.js';
import { DEFAULT_OUTPUT_DIRECTORY } from '../../connectors/file/FileConnectorProperties.js';

export interface SplitCommandOptions {
  outputDir: string;
  byLabel?: boolean;
  byTail?: boolean;
  byType?: boolean;
  keyword?: string;
}

/**
 * Pick the strategy from the mutually exclusive flags; label when none is given.
 */
export function resolveSplitStrategy(options: SplitCommandOptions): SplitStrategy {
  if (options.byTail) return SplitStrategy.TAIL;
  if (options.byType) return SplitStrategy.TYPE;
  if (options.keyword) return SplitStrategy.KEYWORD;
  return SplitStrategy.LABEL;
}

const STRATEGY_FLAGS = ['byLabel', 'byTail', 'byType', 'keyword'];

function exclusive(option: Option): Option {
  return option.conflicts(STRATEGY_FLAGS.filter((name) => name !== option.attributeName()));
}

/**
 * Register the split command
 */
export function registerSplitCommand(program: Command): void {
  program
    .command('split <file>')
    .description('Split a saved ACARS log file into one file per label, tail, type or keyword match')
    .option('-o, --output-dir <dir>', 'Directory to store output files', DEFAULT_OUTPUT_DIRECTORY)
    .addOption(exclusive(new Option('-l, --by-label', 'Split messages by label (default)')))
    .addOption(exclusive(new Option('-t, --by-tail', 'Split messages by aircraft tail number')))
    .addOption(exclusive(new Option('-m, --by-type', 'Split messages by type (CPDLC, ADS-C, MIAM, OTHER)')))
    .addOption(
      exclusive(new Option('-k, --keyword <keyword>', 'Extract messages containing a specific keyword'))
    )
    .action(async (file: string, options: SplitCommandOptions) => {
      const splitBy = resolveSplitStrategy(options);
      const result = await splitLogFile(file, {
        outputDir: options.outputDir,
        splitBy,
        keyword: options.keyword,
      });

      if (result.buckets.length === 0) {
        return;
      }

      console.log();
      console.log(chalk.bold(`${result.messageCount} messages split by ${splitBy}:`));
      for (const bucket of result.buckets) {
        console.log(`  ${chalk.cyan(bucket.filePath)} ${chalk.gray(`(${bucket.messageCount})`)}`);
      }
    });
}
