import type { JsonRpcId } from './interfaces';

// ============================================================================
// Protocol Client Errors
// ============================================================================

export type McpErrorCode =
  | 'TRANSPORT'
  | 'STATUS'
  | 'RPC'
  | 'DECODE'
  | 'STREAM_EXHAUSTED'
  | 'SESSION';

export interface McpErrorContext {
  serviceId?: string;
  method?: string;
  transport?: string;
}

/**
 * Base class for every failure raised while talking to an MCP service.
 * `detail` is the bare reason; `message` carries the service/method/transport prefix
 * once context is attached.
 */
export class McpError extends Error {
  public context: McpErrorContext = {};

  constructor(
    public readonly code: McpErrorCode,
    public detail: string,
    options?: { cause?: unknown; context?: McpErrorContext }
  ) {
    super(detail, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'McpError';
    if (options?.context) {
      this.withContext(options.context);
    }
  }

  /**
   * Attach (or fill in) diagnostic context. Fields already set are kept.
   */
  withContext(context: McpErrorContext): this {
    this.context = { ...context, ...stripUndefined(this.context) };
    this.message = formatMessage(this.context, this.detail);
    return this;
  }

  /**
   * Append diagnostic text, such as a subprocess's stderr tail, to the detail.
   */
  annotate(extra: string): this {
    this.detail = `${this.detail}; ${extra}`;
    this.message = formatMessage(this.context, this.detail);
    return this;
  }
}

export class TransportError extends McpError {
  constructor(detail: string, options?: { cause?: unknown; context?: McpErrorContext }) {
    super('TRANSPORT', detail, options);
    this.name = 'TransportError';
  }
}

export class StatusError extends McpError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super('STATUS', `status ${status}: ${body}`);
    this.name = 'StatusError';
  }
}

export class RpcError extends McpError {
  constructor(
    public readonly rpcCode: number,
    public readonly rpcMessage: string,
    public readonly data?: unknown
  ) {
    super('RPC', `rpc error ${rpcCode}: ${rpcMessage}`);
    this.name = 'RpcError';
  }
}

export class DecodeError extends McpError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('DECODE', `decode rpc response: ${reason}`, options);
    this.name = 'DecodeError';
  }
}

export class StreamExhaustedError extends McpError {
  constructor(
    public readonly expectedId: JsonRpcId,
    source: 'sse stream' | 'stdout'
  ) {
    super('STREAM_EXHAUSTED', `${source} ended before a response to request ${expectedId}`);
    this.name = 'StreamExhaustedError';
  }
}

/**
 * Raised when the single reinitialize attempt after a failed RPC does not succeed.
 */
export class SessionError extends McpError {
  constructor(
    public readonly original: McpError,
    public readonly reinitialize: McpError
  ) {
    super('SESSION', `rpc failed: ${original.detail}; reinitialize failed: ${reinitialize.detail}`, {
      cause: reinitialize,
    });
    this.name = 'SessionError';
  }
}

/**
 * Normalize anything thrown below the client into an McpError carrying `context`.
 */
export function toMcpError(error: unknown, context: McpErrorContext): McpError {
  if (error instanceof McpError) {
    return error.withContext(context);
  }
  const detail = error instanceof Error ? error.message : 'Unknown error';
  return new TransportError(detail, { cause: error, context });
}

function formatMessage(context: McpErrorContext, detail: string): string {
  const scope = [context.serviceId, context.method].filter(Boolean).join(' ');
  if (!scope) {
    return detail;
  }
  const transport = context.transport ? ` (${context.transport})` : '';
  return `mcp ${scope}${transport}: ${detail}`;
}

function stripUndefined(context: McpErrorContext): McpErrorContext {
  const result: McpErrorContext = {};
  if (context.serviceId !== undefined) result.serviceId = context.serviceId;
  if (context.method !== undefined) result.method = context.method;
  if (context.transport !== undefined) result.transport = context.transport;
  return result;
}

// ============================================================================
// Tool Registry Errors
// ============================================================================

export type ToolRegistryErrorCode =
  | 'UNKNOWN_TOOL'
  | 'SERVICE_NOT_FOUND'
  | 'SERVICE_DISABLED'
  | 'TOOL_DISABLED'
  | 'INVALID_ARGUMENTS'
  | 'TOOL_ERROR';

export class ToolRegistryError extends Error {
  constructor(
    public readonly code: ToolRegistryErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ToolRegistryError';
  }
}

// ============================================================================
// Service Directory Errors
// ============================================================================

export type ServiceDirectoryErrorCode = 'VALIDATION' | 'NOT_FOUND';

export class ServiceDirectoryError extends Error {
  constructor(
    public readonly code: ServiceDirectoryErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ServiceDirectoryError';
  }
}
