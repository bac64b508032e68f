import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import { DecodeError } from '@main/core/errors';
import type {
  IConfig,
  IJsonRpcCodec,
  JsonRpcId,
  JsonRpcInbound,
  JsonRpcNotification,
  JsonRpcOutbound,
  JsonRpcRequest,
} from '@main/core/interfaces';
import { JsonRpcInboundSchema } from '@main/validation/rpc-schemas';
import { parseSseText } from './sse';

export const DEFAULT_PROTOCOL_VERSION = '2025-06-18';

/**
 * Ids are compared by their trimmed string forms so `7` and `"7"` match.
 */
export function sameRpcId(expected: JsonRpcId, actual: JsonRpcId | null | undefined): boolean {
  if (actual === undefined || actual === null) {
    return false;
  }
  return String(expected).trim() === String(actual).trim();
}

function isEventStream(contentType: string | null, body: string): boolean {
  return (
    (contentType ?? '').toLowerCase().includes('text/event-stream') ||
    body.startsWith('event:') ||
    body.startsWith('data:')
  );
}

function readNonBlank(config: IConfig, key: string, fallback: string): string {
  const value = config.get<unknown>(key);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback;
}

/**
 * JSON-RPC 2.0 framing for MCP: builds outbound envelopes with monotonically
 * increasing numeric ids and decodes replies delivered as a JSON body or as an
 * event-stream body.
 */
@injectable()
export class JsonRpcCodec implements IJsonRpcCodec {
  readonly protocolVersion: string;
  private readonly clientInfo: { name: string; version: string };
  private lastId = 0;

  constructor(@inject(TYPES.Config) config: IConfig) {
    this.protocolVersion = readNonBlank(config, 'mcp.protocolVersion', DEFAULT_PROTOCOL_VERSION);
    this.clientInfo = {
      name: readNonBlank(config, 'mcp.clientName', 'toolbridge'),
      version: readNonBlank(config, 'mcp.clientVersion', '1.0.0'),
    };
  }

  request(method: string, params: Record<string, unknown> = {}): JsonRpcRequest {
    this.lastId += 1;
    return { jsonrpc: '2.0', id: this.lastId, method, params };
  }

  notification(method: string, params: Record<string, unknown> = {}): JsonRpcNotification {
    return { jsonrpc: '2.0', method, params };
  }

  initializeRequest(): JsonRpcRequest {
    return this.request('initialize', {
      protocolVersion: this.protocolVersion,
      capabilities: { tools: {} },
      clientInfo: { ...this.clientInfo },
    });
  }

  initializedNotification(): JsonRpcNotification {
    return this.notification('notifications/initialized');
  }

  encode(message: JsonRpcOutbound): string {
    return JSON.stringify(message);
  }

  parseMessage(text: string): JsonRpcInbound | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return undefined;
    }
    const result = JsonRpcInboundSchema.safeParse(parsed);
    return result.success ? result.data : undefined;
  }

  isResponseTo(message: JsonRpcInbound, expectId: JsonRpcId): boolean {
    if (message.method !== undefined && message.method.trim() !== '') {
      return false;
    }
    return sameRpcId(expectId, message.id);
  }

  /**
   * Decode a complete response body. Event-stream bodies are scanned for the
   * first event holding a JSON-RPC response (matching `expectId` when given).
   */
  decodeResponse(body: string, contentType: string | null, expectId?: JsonRpcId): JsonRpcInbound {
    const trimmed = body.trim();
    if (trimmed === '') {
      throw new DecodeError('empty response');
    }

    if (isEventStream(contentType, trimmed)) {
      for (const event of parseSseText(trimmed)) {
        const data = event.data.trim();
        if (data === '') {
          continue;
        }
        const message = this.parseMessage(data);
        if (!message || message.method) {
          continue;
        }
        if (expectId !== undefined && !sameRpcId(expectId, message.id)) {
          continue;
        }
        return message;
      }
      throw new DecodeError('no rpc message in sse stream');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new DecodeError(error instanceof Error ? error.message : 'invalid JSON', { cause: error });
    }

    const result = JsonRpcInboundSchema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError('body is not a JSON-RPC message');
    }
    const message = result.data;
    if (expectId !== undefined && message.id != null && !sameRpcId(expectId, message.id)) {
      throw new DecodeError(`response id ${String(message.id)} does not match request ${expectId}`);
    }
    return message;
  }
}
