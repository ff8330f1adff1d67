/**
 * Listen Command
 *
 * Runs the streaming splitter on every configured UDP port until SIGINT/SIGTERM.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadSplitterConfig } from '../../server/SplitterConfig.js';
import { Splitter } from '../../server/Splitter.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger('cli');

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Register the listen command
 */
export function registerListenCommand(program: Command): void {
  program
    .command('listen <config>')
    .description('Reassemble ACARS messages arriving on the configured UDP ports and split them into files')
    .action(async (configPath: string) => {
      const config = loadSplitterConfig(configPath);
      const splitter = new Splitter(config);

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down...`);
        controller.abort();
      };
      for (const signal of SHUTDOWN_SIGNALS) {
        process.once(signal, onSignal);
      }

      try {
        await splitter.run(controller.signal);
      } finally {
        for (const signal of SHUTDOWN_SIGNALS) {
          process.off(signal, onSignal);
        }
      }

      console.log(chalk.gray('Exiting...'));
    });
}
