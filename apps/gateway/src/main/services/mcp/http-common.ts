import { StatusError, TransportError } from '@main/core/errors';
import type { FetchFn, JsonRpcOutbound, JsonRpcRequest, McpService } from '@main/core/interfaces';

export const SESSION_HEADER = 'Mcp-Session-Id';
export const PROTOCOL_HEADER = 'MCP-Protocol-Version';
export const JSON_ACCEPT = 'application/json, text/event-stream';
export const EVENT_STREAM_ACCEPT = 'text/event-stream';

export function isRequest(message: JsonRpcOutbound): message is JsonRpcRequest {
  return 'id' in message;
}

/**
 * Headers every MCP HTTP request carries: protocol version, bearer credential and session, when known.
 */
export function mcpHeaders(
  service: McpService,
  protocolVersion: string,
  sessionId: string | undefined
): Record<string, string> {
  const headers: Record<string, string> = { [PROTOCOL_HEADER]: protocolVersion };
  if (service.authToken) {
    headers.Authorization = `Bearer ${service.authToken}`;
  }
  if (sessionId) {
    headers[SESSION_HEADER] = sessionId;
  }
  return headers;
}

export function readSessionId(headers: Headers): string | undefined {
  const value = headers.get(SESSION_HEADER)?.trim();
  return value ? value : undefined;
}

export async function readBody(response: Response, what: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError(
      `read ${what}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }
}

/**
 * Throws a StatusError carrying the trimmed body for any status of 400 or above.
 */
export function ensureSuccess(response: Response, body: string): void {
  if (response.status >= 400) {
    throw new StatusError(response.status, body.trim());
  }
}

export async function sendHttp(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  what: string
): Promise<Response> {
  try {
    return await fetchFn(url, init);
  } catch (error) {
    throw new TransportError(
      `${what}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }
}
