/**
 * Tools command - List, call and toggle the tools exposed by enabled services.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, withGateway } from '../lib/context.js';
import { formatOutput, parseFormat, renderToolsTable, type OutputFormat } from '../lib/output.js';

interface ListOptions {
  format: OutputFormat;
}

interface CallOptions {
  args: string;
  format: OutputFormat;
}

const listCommand = new Command('list')
  .description('List the tools every enabled service exposes')
  .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
  .action(async (options: ListOptions) => {
    const spinner = ora('Discovering tools...').start();

    try {
      const tools = await withGateway(async ({ registry }) => registry.listTools());
      spinner.succeed(`Found ${tools.length} tool(s)`);

      if (options.format === 'json') {
        console.log(formatOutput(tools, 'json'));
      } else {
        console.log(renderToolsTable(tools));
      }
    } catch (error) {
      spinner.fail('Failed to list tools');
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const callCommand = new Command('call')
  .description('Call a tool by its exposed name')
  .argument('<name>', 'Exposed tool name, e.g. docs__search')
  .option('-a, --args <json>', 'Tool arguments as a JSON object', '{}')
  .option('-f, --format <format>', 'Output format: table, json', parseFormat, 'table')
  .action(async (name: string, options: CallOptions) => {
    const spinner = ora(`Calling ${name}...`).start();

    const execution = await withGateway(async ({ registry }) =>
      registry.executeToolCall({ function: { name, arguments: options.args } })
    ).catch((error: unknown) => ({ name, ok: false as const, error: errorMessage(error) }));

    if (options.format === 'json') {
      if (execution.ok) spinner.succeed(`Called ${name}`);
      else spinner.fail(`Tool ${name} failed`);
      console.log(formatOutput(execution, 'json'));
      if (!execution.ok) process.exit(1);
      return;
    }

    if (!execution.ok) {
      spinner.fail(`Tool ${name} failed`);
      console.error(chalk.red(`\nError: ${execution.error}`));
      process.exit(1);
    }

    spinner.succeed(`Called ${name}`);
    console.log(execution.content);
  });

function toggleCommand(name: 'enable' | 'disable'): Command {
  const enabled = name === 'enable';

  return new Command(name)
    .description(`${enabled ? 'Enable' : 'Disable'} one tool of a service`)
    .argument('<service>', 'Service ID')
    .argument('<tool>', 'Tool name as the service reports it')
    .action(async (serviceId: string, toolName: string) => {
      try {
        await withGateway(async ({ directory }) =>
          directory.setToolEnabled(serviceId, toolName, enabled)
        );
        console.log(
          chalk.green(`✓ Tool ${toolName} on ${serviceId} ${enabled ? 'enabled' : 'disabled'}`)
        );
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}

export const toolsCommand = new Command('tools')
  .description('Discover and call MCP tools')
  .addCommand(listCommand)
  .addCommand(callCommand)
  .addCommand(toggleCommand('enable'))
  .addCommand(toggleCommand('disable'));
