/**
 * Status command - Probe every configured service.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, withGateway } from '../lib/context.js';
import { formatOutput, parseFormat, renderStatusTable, type OutputFormat } from '../lib/output.js';

interface StatusOptions {
  format: OutputFormat;
}

export const statusCommand = new Command('status')
  .description('Show connectivity and tool counts for every service')
  .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
  .action(async (options: StatusOptions) => {
    const spinner = ora('Checking services...').start();

    try {
      const statuses = await withGateway(async ({ registry }) => registry.listServiceStatuses());
      const connected = statuses.filter((status) => status.connected).length;
      spinner.succeed(`${connected}/${statuses.length} service(s) connected`);

      if (options.format === 'json') {
        console.log(formatOutput(statuses, 'json'));
      } else {
        console.log(renderStatusTable(statuses));
      }
    } catch (error) {
      spinner.fail('Failed to check services');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });
