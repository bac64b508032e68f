/**
 * InversifyJS dependency injection symbols.
 * All injectable services are identified by these symbols.
 */
export const TYPES = {
  // Core Infrastructure
  Config: Symbol.for('Config'),
  Database: Symbol.for('Database'),
  Logger: Symbol.for('Logger'),
  Fetch: Symbol.for('Fetch'),

  // Repositories
  ServiceRepository: Symbol.for('ServiceRepository'),

  // Service Directory
  ServiceDirectory: Symbol.for('ServiceDirectory'),

  // MCP Protocol Layer
  JsonRpcCodec: Symbol.for('JsonRpcCodec'),
  SessionStore: Symbol.for('SessionStore'),
  HttpTransport: Symbol.for('HttpTransport'),
  SseTransport: Symbol.for('SseTransport'),
  StdioTransport: Symbol.for('StdioTransport'),
  TransportRegistry: Symbol.for('TransportRegistry'),
  McpClient: Symbol.for('McpClient'),

  // Tool Registry
  ToolRegistry: Symbol.for('ToolRegistry'),
} as const;

export type TypeKeys = keyof typeof TYPES;
