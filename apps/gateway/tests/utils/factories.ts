import { nanoid } from 'nanoid';
import type {
  McpService,
  RemoteTool,
  ToolCallResult,
} from '@main/core/interfaces';

/**
 * Factory for creating mock McpService objects.
 */
export function createMockService(overrides?: Partial<McpService>): McpService {
  return {
    id: `service-${nanoid(8)}`,
    name: 'Test Service',
    endpoint: 'https://mcp.example.test/mcp',
    command: '',
    args: [],
    transport: 'streamable_http',
    enabled: true,
    toolStates: [],
    updatedAt: Date.now(),
    ...overrides,
  };
}

/**
 * Factory for creating a stdio service that runs `command`.
 */
export function createStdioService(
  command: string,
  args: string[],
  overrides?: Partial<McpService>
): McpService {
  return createMockService({
    transport: 'stdio',
    endpoint: '',
    command,
    args,
    ...overrides,
  });
}

/**
 * Factory for creating a remote tool as returned by tools/list.
 */
export function createRemoteTool(overrides?: Partial<RemoteTool>): RemoteTool {
  return {
    name: `tool_${nanoid(6)}`,
    description: 'A test tool',
    inputSchema: { type: 'object', properties: {} },
    ...overrides,
  };
}

/**
 * Factory for creating a tools/call result with a single text part.
 */
export function createTextResult(text: string, overrides?: Partial<ToolCallResult>): ToolCallResult {
  const content = [{ type: 'text', text }];
  return {
    content,
    isError: false,
    raw: { content },
    ...overrides,
  };
}
