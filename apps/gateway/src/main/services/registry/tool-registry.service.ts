import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import { ToolRegistryError } from '@main/core/errors';
import type {
  IConfig,
  ILogger,
  IMcpClient,
  IServiceDirectory,
  IToolRegistry,
  McpService,
  RemoteTool,
  ServiceStatus,
  ToolBinding,
  ToolCall,
  ToolCallResult,
  ToolDefinition,
  ToolExecution,
} from '@main/core/interfaces';
import { sanitizeName } from '@main/utils/identifiers';

export const DEFAULT_TOOL_CACHE_TTL_MS = 30000;

/**
 * Everything ListTools/CallTool read, replaced as one value on refresh.
 */
interface RegistrySnapshot {
  readonly tools: readonly ToolDefinition[];
  readonly bindings: ReadonlyMap<string, ToolBinding>;
  readonly expiresAt: number;
}

interface Discovery {
  service: McpService;
  tools: RemoteTool[];
}

const EMPTY_SNAPSHOT: RegistrySnapshot = { tools: [], bindings: new Map(), expiresAt: 0 };

const EMPTY_OBJECT_SCHEMA = { type: 'object', properties: {} };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `serviceId__toolName` with both parts sanitized; the tool part alone when the
 * service part sanitizes to nothing.
 */
export function exposedToolName(serviceId: string, toolName: string): string {
  const prefix = sanitizeName(serviceId);
  const name = sanitizeName(toolName);
  return prefix === '' ? name : `${prefix}__${name}`;
}

export function toToolDefinition(service: McpService, tool: RemoteTool): ToolDefinition {
  const description = tool.description.trim() || 'MCP tool';
  return {
    type: 'function',
    function: {
      name: exposedToolName(service.id, tool.name),
      description: `[MCP ${service.name}] ${description}`,
      parameters: tool.inputSchema ?? { ...EMPTY_OBJECT_SCHEMA, properties: {} },
    },
  };
}

/**
 * Blank means no arguments; `null` is treated the same. Anything but a JSON object is rejected.
 */
export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  const trimmed = (raw ?? '').trim();
  if (trimmed === '') {
    return {};
  }
  const parsed: unknown = JSON.parse(trimmed);
  if (parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new TypeError(`expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
  }
  return parsed;
}

/**
 * Text parts joined by newlines; else structured content as JSON; else the raw result as JSON.
 */
export function renderToolResult(result: ToolCallResult): string {
  const texts = result.content.flatMap((part) =>
    part.type.toLowerCase() === 'text' && part.text !== undefined && part.text.trim() !== ''
      ? [part.text]
      : []
  );
  if (texts.length > 0) {
    return texts.join('\n');
  }
  if (result.structuredContent !== undefined && result.structuredContent !== null) {
    return JSON.stringify(result.structuredContent);
  }
  return JSON.stringify(result.raw ?? {});
}

function cloneTools(tools: readonly ToolDefinition[]): ToolDefinition[] {
  return tools.map((tool) => ({ type: tool.type, function: { ...tool.function } }));
}

function withoutCredential(service: McpService): McpService {
  const copy = { ...service };
  delete copy.authToken;
  return copy;
}

/**
 * Tool registry over every enabled MCP service.
 *
 * Discovery results become function-tool definitions with unique exposed names
 * and a binding back to (service, remote tool). Both live in one immutable
 * snapshot with a TTL; a refresh does all its network I/O first and then swaps
 * the snapshot in a single assignment, so readers see either the old table or
 * the new one. Concurrent refreshes: the last swap wins.
 */
@injectable()
export class ToolRegistry implements IToolRegistry {
  private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;
  private readonly ttlMs: number;

  constructor(
    @inject(TYPES.ServiceDirectory) private directory: IServiceDirectory,
    @inject(TYPES.McpClient) private client: IMcpClient,
    @inject(TYPES.Config) config: IConfig,
    @inject(TYPES.Logger) private logger: ILogger
  ) {
    const configured = config.get<unknown>('mcp.toolCacheTtlMs');
    this.ttlMs =
      typeof configured === 'number' && configured > 0 ? configured : DEFAULT_TOOL_CACHE_TTL_MS;
  }

  async listTools(signal?: AbortSignal): Promise<ToolDefinition[]> {
    const { tools, expiresAt } = this.snapshot;
    if (tools.length > 0 && Date.now() < expiresAt) {
      return cloneTools(tools);
    }
    return this.refreshTools(signal);
  }

  async refreshTools(signal?: AbortSignal): Promise<ToolDefinition[]> {
    const services = this.directory.listEnabledServices();
    const discoveries = await Promise.all(services.map((service) => this.discover(service, signal)));

    const tools: ToolDefinition[] = [];
    const bindings = new Map<string, ToolBinding>();

    for (const { service, tools: remoteTools } of discoveries) {
      for (const tool of remoteTools) {
        if (!this.directory.isToolEnabled(service.id, tool.name)) {
          continue;
        }
        const definition = toToolDefinition(service, tool);
        const base = definition.function.name;
        let name = base;
        for (let suffix = 2; bindings.has(name); suffix++) {
          name = `${base}_${suffix}`;
        }
        definition.function.name = name;
        bindings.set(name, { serviceId: service.id, toolName: tool.name });
        tools.push(definition);
      }
    }

    tools.sort((a, b) => compareStrings(a.function.name, b.function.name));

    this.snapshot = { tools, bindings, expiresAt: Date.now() + this.ttlMs };
    this.logger.debug('Refreshed MCP tools', {
      services: services.length,
      tools: tools.length,
    });

    return cloneTools(tools);
  }

  async callTool(call: ToolCall, signal?: AbortSignal): Promise<string> {
    const name = call.function.name;

    let binding = this.snapshot.bindings.get(name);
    if (!binding) {
      await this.refreshTools(signal);
      binding = this.snapshot.bindings.get(name);
      if (!binding) {
        throw new ToolRegistryError('UNKNOWN_TOOL', `unknown tool "${name}"`);
      }
    }

    const service = this.directory.getService(binding.serviceId);
    if (!service) {
      throw new ToolRegistryError(
        'SERVICE_NOT_FOUND',
        `mcp service "${binding.serviceId}" not found`
      );
    }
    if (!service.enabled) {
      throw new ToolRegistryError(
        'SERVICE_DISABLED',
        `mcp service "${binding.serviceId}" is disabled`
      );
    }
    if (!this.directory.isToolEnabled(binding.serviceId, binding.toolName)) {
      throw new ToolRegistryError(
        'TOOL_DISABLED',
        `mcp service "${binding.serviceId}" tool "${binding.toolName}" is disabled`
      );
    }

    let args: Record<string, unknown>;
    try {
      args = parseToolArguments(call.function.arguments);
    } catch (error) {
      throw new ToolRegistryError(
        'INVALID_ARGUMENTS',
        `invalid tool arguments for "${name}": ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const result = await this.client.callTool(service, binding.toolName, args, signal);
    const output = renderToolResult(result);
    if (result.isError) {
      throw new ToolRegistryError('TOOL_ERROR', output.trim() || `tool "${name}" reported an error`);
    }
    return output;
  }

  /**
   * CallTool for the conversation loop: failures come back as an error result instead of a rejection.
   */
  async executeToolCall(call: ToolCall, signal?: AbortSignal): Promise<ToolExecution> {
    const name = call.function.name;
    try {
      const content = await this.callTool(call, signal);
      return { callId: call.id, name, ok: true, content };
    } catch (error) {
      this.logger.warn('MCP tool call failed', { tool: name, error: errorMessage(error) });
      return { callId: call.id, name, ok: false, error: errorMessage(error) };
    }
  }

  async listServiceStatuses(signal?: AbortSignal): Promise<ServiceStatus[]> {
    const services = this.directory.listServices();
    const statuses = await Promise.all(services.map((service) => this.statusOf(service, signal)));
    return statuses.sort((a, b) => compareStrings(a.service.id, b.service.id));
  }

  invalidateCache(): void {
    this.snapshot = { ...this.snapshot, expiresAt: 0 };
  }

  private async discover(service: McpService, signal?: AbortSignal): Promise<Discovery> {
    try {
      return { service, tools: await this.client.listTools(service, signal) };
    } catch (error) {
      this.logger.warn('MCP tool discovery failed; skipping service', {
        serviceId: service.id,
        error: errorMessage(error),
      });
      return { service, tools: [] };
    }
  }

  private async statusOf(service: McpService, signal?: AbortSignal): Promise<ServiceStatus> {
    const publicService = withoutCredential(service);
    if (!service.enabled) {
      return {
        service: publicService,
        connected: false,
        toolCount: 0,
        tools: [],
        error: 'service is disabled',
      };
    }

    try {
      const remoteTools = await this.client.listTools(service, signal);
      const tools = remoteTools
        .map((tool) => ({
          name: tool.name,
          description: tool.description.trim(),
          enabled: this.directory.isToolEnabled(service.id, tool.name),
        }))
        .sort((a, b) => compareStrings(a.name, b.name));

      return {
        service: publicService,
        connected: true,
        toolCount: tools.filter((tool) => tool.enabled).length,
        tools,
      };
    } catch (error) {
      return {
        service: publicService,
        connected: false,
        toolCount: 0,
        tools: [],
        error: errorMessage(error),
      };
    }
  }
}
