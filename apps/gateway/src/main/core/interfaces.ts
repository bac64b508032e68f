import type { Database as BetterSqlite3Database } from 'better-sqlite3';

/**
 * Core service interfaces for dependency injection.
 * All services implement these interfaces so collaborators can be swapped in tests.
 */

// ============================================================================
// Core Infrastructure
// ============================================================================

export interface IConfig {
  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  set<T>(key: string, value: T): void;
  has(key: string): boolean;
  delete(key: string): void;
  readonly dataPath: string;
}

export interface IDatabase {
  readonly db: BetterSqlite3Database;
  initialize(): void;
  close(): void;
  transaction<T>(fn: () => T): T;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}

/**
 * The subset of the WHATWG fetch signature the HTTP transports rely on.
 */
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

// ============================================================================
// MCP Services
// ============================================================================

export const SERVICE_TRANSPORTS = ['streamable_http', 'sse', 'stdio'] as const;

export type ServiceTransport = (typeof SERVICE_TRANSPORTS)[number];

export interface ServiceToolState {
  name: string;
  enabled: boolean;
}

export interface McpService {
  id: string;
  name: string;
  endpoint: string;
  command: string;
  args: string[];
  /** Kept verbatim when unrecognised; validation and dispatch reject it. */
  transport: string;
  authToken?: string;
  enabled: boolean;
  /** Only explicitly disabled tools are recorded. */
  toolStates: ServiceToolState[];
  updatedAt: number;
}

export interface ServiceInput {
  id?: string;
  name?: string;
  endpoint?: string;
  command?: string;
  args?: string[];
  transport?: string;
  authToken?: string;
  enabled?: boolean;
  toolStates?: ServiceToolState[];
}

export interface IServiceRepository {
  findAll(): Promise<McpService[]>;
  findById(id: string): Promise<McpService | null>;
  create(service: McpService): Promise<McpService>;
  update(service: McpService): Promise<McpService>;
  delete(id: string): Promise<void>;
}

/**
 * Configuration store consumed by the tool registry.
 * Reads are synchronous against the copy loaded by `load()`; writes go through to SQLite.
 */
export interface IServiceDirectory {
  load(): Promise<void>;
  listServices(): McpService[];
  listEnabledServices(): McpService[];
  getService(id: string): McpService | undefined;
  isToolEnabled(serviceId: string, toolName: string): boolean;
  upsertService(input: ServiceInput): Promise<McpService>;
  deleteService(id: string): Promise<void>;
  setServiceEnabled(id: string, enabled: boolean): Promise<McpService>;
  setToolEnabled(serviceId: string, toolName: string, enabled: boolean): Promise<McpService>;
  onChange(listener: () => void): () => void;
}

// ============================================================================
// JSON-RPC
// ============================================================================

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

export type JsonRpcOutbound = JsonRpcRequest | JsonRpcNotification;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Any message read off the wire. Responses carry `id` plus `result` or `error`;
 * server-originated requests and notifications carry `method`.
 */
export interface JsonRpcInbound {
  jsonrpc?: string;
  id?: JsonRpcId | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export interface IJsonRpcCodec {
  readonly protocolVersion: string;
  request(method: string, params?: Record<string, unknown>): JsonRpcRequest;
  notification(method: string, params?: Record<string, unknown>): JsonRpcNotification;
  initializeRequest(): JsonRpcRequest;
  initializedNotification(): JsonRpcNotification;
  encode(message: JsonRpcOutbound): string;
  /** Returns undefined for anything that is not a JSON object. */
  parseMessage(text: string): JsonRpcInbound | undefined;
  /** True when the message is a response (no method) whose id equals `expectId`. */
  isResponseTo(message: JsonRpcInbound, expectId: JsonRpcId): boolean;
  decodeResponse(body: string, contentType: string | null, expectId?: JsonRpcId): JsonRpcInbound;
}

// ============================================================================
// Transports & Sessions
// ============================================================================

export interface RpcSendOptions {
  service: McpService;
  message: JsonRpcOutbound;
  sessionId?: string;
  signal: AbortSignal;
}

export interface RpcExchange {
  /** Present when the outbound message was a request. */
  response?: JsonRpcInbound;
  sessionId?: string;
}

/**
 * Uniform "send one RPC, optionally await the reply" contract shared by every wire transport.
 */
export interface IRpcTransport {
  readonly kind: ServiceTransport;
  /** Whether the client should establish and reuse a session for this transport. */
  readonly sessionful: boolean;
  send(options: RpcSendOptions): Promise<RpcExchange>;
}

export interface ITransportRegistry {
  resolve(service: McpService): IRpcTransport;
}

export interface ISessionStore {
  get(key: string): string | undefined;
  set(key: string, sessionId: string): void;
  clear(key: string): void;
  /** Runs `fn` with exclusive access to `key`; callers for other keys are not blocked. */
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

// ============================================================================
// Protocol Client
// ============================================================================

export interface RemoteTool {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
}

export interface ToolContentPart {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface ToolCallResult {
  content: ToolContentPart[];
  structuredContent?: unknown;
  isError: boolean;
  /** The `result` member exactly as the service sent it. */
  raw: unknown;
}

export interface IMcpClient {
  listTools(service: McpService, signal?: AbortSignal): Promise<RemoteTool[]>;
  callTool(
    service: McpService,
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<ToolCallResult>;
}

// ============================================================================
// Tool Registry
// ============================================================================

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ToolCall {
  id?: string;
  type?: 'function';
  function: {
    name: string;
    /** JSON object text as produced by the model; blank means no arguments. */
    arguments?: string;
  };
}

export interface ToolBinding {
  serviceId: string;
  toolName: string;
}

export type ToolExecution =
  | { callId?: string; name: string; ok: true; content: string }
  | { callId?: string; name: string; ok: false; error: string };

export interface ServiceToolStatus {
  name: string;
  description: string;
  enabled: boolean;
}

export interface ServiceStatus {
  service: McpService;
  connected: boolean;
  toolCount: number;
  tools: ServiceToolStatus[];
  error?: string;
}

/**
 * Capability consumed by the conversation loop to advertise and execute tools.
 */
export interface IToolProvider {
  listTools(signal?: AbortSignal): Promise<ToolDefinition[]>;
  callTool(call: ToolCall, signal?: AbortSignal): Promise<string>;
}

export interface IToolRegistry extends IToolProvider {
  refreshTools(signal?: AbortSignal): Promise<ToolDefinition[]>;
  executeToolCall(call: ToolCall, signal?: AbortSignal): Promise<ToolExecution>;
  listServiceStatuses(signal?: AbortSignal): Promise<ServiceStatus[]>;
  invalidateCache(): void;
}
