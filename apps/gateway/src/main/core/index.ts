/**
 * Core module exports.
 * This is the main entry point for dependency injection setup.
 */

export { TYPES, type TypeKeys } from './types';

export type {
  // Core Infrastructure
  IConfig,
  IDatabase,
  ILogger,
  LogLevel,
  FetchFn,

  // MCP Services
  McpService,
  ServiceInput,
  ServiceToolState,
  ServiceTransport,
  IServiceRepository,
  IServiceDirectory,

  // JSON-RPC
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcNotification,
  JsonRpcOutbound,
  JsonRpcInbound,
  JsonRpcErrorObject,
  IJsonRpcCodec,

  // Transports & Sessions
  RpcSendOptions,
  RpcExchange,
  IRpcTransport,
  ITransportRegistry,
  ISessionStore,

  // Protocol Client
  RemoteTool,
  ToolContentPart,
  ToolCallResult,
  IMcpClient,

  // Tool Registry
  ToolDefinition,
  ToolCall,
  ToolBinding,
  ToolExecution,
  ServiceToolStatus,
  ServiceStatus,
  IToolProvider,
  IToolRegistry,
} from './interfaces';

export { SERVICE_TRANSPORTS } from './interfaces';

export {
  McpError,
  TransportError,
  StatusError,
  RpcError,
  DecodeError,
  StreamExhaustedError,
  SessionError,
  ToolRegistryError,
  ServiceDirectoryError,
  toMcpError,
  type McpErrorCode,
  type McpErrorContext,
  type ToolRegistryErrorCode,
  type ServiceDirectoryErrorCode,
} from './errors';

export {
  createContainer,
  startServices,
  initializeContainer,
  getContainer,
  disposeContainer,
  getService,
} from './container';
