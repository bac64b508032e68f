/**
 * Services command - Manage configured MCP services.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { ServiceInput } from '@toolbridge/gateway';
import { errorMessage, withGateway } from '../lib/context.js';
import {
  formatOutput,
  parseFormat,
  publicService,
  renderServicesTable,
  type OutputFormat,
} from '../lib/output.js';

interface ListOptions {
  format: OutputFormat;
}

export interface AddOptions {
  id?: string;
  name?: string;
  endpoint?: string;
  command?: string;
  arg: string[];
  transport?: string;
  token?: string;
  disabled?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Maps `services add` flags onto a directory upsert. A command without an
 * explicit transport selects stdio; an existing service keeps its enabled
 * state unless `--disabled` is given.
 */
export function toServiceInput(options: AddOptions): ServiceInput {
  return {
    id: options.id,
    name: options.name,
    endpoint: options.endpoint,
    command: options.command,
    args: options.arg,
    transport: options.transport ?? (options.command ? 'stdio' : undefined),
    authToken: options.token,
    enabled: options.disabled ? false : undefined,
  };
}

const listCommand = new Command('list')
  .description('List configured services')
  .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
  .action(async (options: ListOptions) => {
    const spinner = ora('Loading services...').start();

    try {
      const services = await withGateway(async ({ directory }) => directory.listServices());
      spinner.succeed(`Found ${services.length} service(s)`);

      if (options.format === 'json') {
        console.log(formatOutput(services.map(publicService), 'json'));
      } else {
        console.log(renderServicesTable(services));
      }
    } catch (error) {
      spinner.fail('Failed to load services');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const addCommand = new Command('add')
  .description('Add a service, or update the one with the same ID')
  .option('--id <id>', 'Service ID (generated from the name when omitted)')
  .option('-n, --name <name>', 'Display name')
  .option('-e, --endpoint <url>', 'Endpoint URL for streamable_http and sse services')
  .option('-c, --command <command>', 'Command to launch for stdio services')
  .option('-a, --arg <value>', 'Argument for the stdio command (repeatable)', collect, [])
  .option('-t, --transport <transport>', 'Transport: streamable_http, sse, stdio')
  .option('--token <token>', 'Bearer token sent to HTTP services')
  .option('--disabled', 'Add the service disabled')
  .action(async (options: AddOptions) => {
    const spinner = ora('Saving service...').start();

    try {
      const service = await withGateway(async ({ directory }) =>
        directory.upsertService(toServiceInput(options))
      );
      spinner.succeed(`Saved service ${chalk.cyan(service.id)}`);
    } catch (error) {
      spinner.fail('Failed to save service');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const removeCommand = new Command('remove')
  .description('Remove a service')
  .argument('<id>', 'Service ID')
  .action(async (id: string) => {
    const spinner = ora(`Removing ${id}...`).start();

    try {
      await withGateway(async ({ directory }) => directory.deleteService(id));
      spinner.succeed(`Removed service ${chalk.cyan(id)}`);
    } catch (error) {
      spinner.fail('Failed to remove service');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

function toggleCommand(name: 'enable' | 'disable'): Command {
  const enabled = name === 'enable';

  return new Command(name)
    .description(`${enabled ? 'Enable' : 'Disable'} a service`)
    .argument('<id>', 'Service ID')
    .action(async (id: string) => {
      try {
        await withGateway(async ({ directory }) => directory.setServiceEnabled(id, enabled));
        console.log(chalk.green(`✓ Service ${id} ${enabled ? 'enabled' : 'disabled'}`));
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}

export const servicesCommand = new Command('services')
  .description('Manage MCP services')
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand)
  .addCommand(toggleCommand('enable'))
  .addCommand(toggleCommand('disable'));
