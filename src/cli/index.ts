#!/usr/bin/env node
import process from 'process';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { logger, flushLogs, errorMessage } from '../utils';
import { parseCliOptions } from './options';
import { runAnalysis } from './run';

interface RawOptions {
  ignore?: string;
  json?: boolean;
  fix?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('dustat')
  .description('Find exported Go identifiers that nothing in the project references')
  .version('0.1.0')
  .argument('<path>', 'Path to the project to analyze')
  .option('--ignore <names>', 'Comma-separated list of exported identifiers to ignore')
  .option('--json', 'Output results in JSON format', false)
  .option('--fix', 'Rename unused exported symbols to unexported', false)
  .option('--dry-run', 'Preview changes without applying them (requires --fix)', false)
  .option('--verbose', 'Enable verbose logging', false)
  .action(async (projectPath: string, rawOptions: RawOptions) => {
    try {
      const options = parseCliOptions({ path: projectPath, ...rawOptions });

      if (options.verbose) {
        logger.level = 'debug';
      }

      // Progress goes to stderr and only for the plain report
      const progress = options.json || options.fix ? undefined : ora({ stream: process.stderr });

      await runAnalysis(options, {
        stdout: line => console.log(line),
        stderr: line => console.error(chalk.red(line)),
        progress,
      });
    } catch (error) {
      logger.debug('Run failed', { error: errorMessage(error) });
      console.error(chalk.red(`error: ${errorMessage(error)}`));
      await flushLogs();
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch(error => {
  console.error(chalk.red(`error: ${errorMessage(error)}`));
  process.exit(1);
});
