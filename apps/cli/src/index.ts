#!/usr/bin/env tsx
/**
 * toolbridge CLI
 * Manage MCP services and call the tools they expose.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { servicesCommand } from './commands/services.js';
import { toolsCommand } from './commands/tools.js';
import { statusCommand } from './commands/status.js';

// Gateway logs go to stdout; keep them out of command output unless asked for.
process.env.LOG_LEVEL ??= process.argv.includes('--verbose') ? 'debug' : 'warn';

const program = new Command();

program
  .name('toolbridge')
  .description('Manage MCP services and call their tools')
  .version('1.0.0')
  .option('--verbose', 'Print gateway debug logs');

program.addCommand(servicesCommand);
program.addCommand(toolsCommand);
program.addCommand(statusCommand);

program.exitOverride((err) => {
  if (
    err.code === 'commander.help' ||
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.version'
  ) {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

await program.parseAsync();
