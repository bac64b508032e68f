/**
 * Output formatting for CLI commands.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { InvalidArgumentError } from 'commander';
import type { McpService, ServiceStatus, ToolDefinition } from '@toolbridge/gateway';

export type OutputFormat = 'table' | 'json';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json'];

/**
 * Option parser for `--format`.
 */
export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export function formatOutput(data: unknown, format: 'json'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);
  }
}

/**
 * Where a service connects: its endpoint, or the command line for stdio services.
 */
export function serviceTarget(service: McpService): string {
  if (service.transport === 'stdio') {
    return [service.command, ...service.args].join(' ');
  }
  return service.endpoint;
}

/** JSON form of a service. The bearer token is reported only as present or absent. */
export function publicService(service: McpService): Omit<McpService, 'authToken'> & { hasAuthToken: boolean } {
  const { authToken, ...rest } = service;
  return { ...rest, hasAuthToken: Boolean(authToken) };
}

// cli-table3 types its constructor as the union of every layout; rows here are arrays.
function newTable(head: string[]): Table.GenericTable<Table.HorizontalTableRow> {
  return new Table({
    head: head.map((label) => chalk.cyan(label)),
    style: { head: [], border: [] },
  }) as Table.GenericTable<Table.HorizontalTableRow>;
}

export function renderServicesTable(services: McpService[]): string {
  const table = newTable(['ID', 'Name', 'Transport', 'Target', 'Enabled', 'Disabled Tools']);

  for (const service of services) {
    table.push([
      service.id,
      service.name,
      service.transport,
      serviceTarget(service),
      service.enabled ? chalk.green('yes') : chalk.gray('no'),
      service.toolStates.map((state) => state.name).join(', '),
    ]);
  }

  return table.toString();
}

export function renderToolsTable(tools: ToolDefinition[]): string {
  const table = newTable(['Name', 'Description']);

  for (const tool of tools) {
    table.push([tool.function.name, tool.function.description]);
  }

  return table.toString();
}

export function renderStatusTable(statuses: ServiceStatus[]): string {
  const table = newTable(['Service', 'Transport', 'Status', 'Tools', 'Error']);

  for (const status of statuses) {
    table.push([
      status.service.id,
      status.service.transport,
      status.connected ? chalk.green('connected') : chalk.red('offline'),
      `${status.toolCount}/${status.tools.length}`,
      status.error ?? '',
    ]);
  }

  return table.toString();
}
