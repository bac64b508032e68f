/**
 * MCP Protocol Layer Services
 *
 * - JsonRpcCodec: JSON-RPC 2.0 framing and response decoding (JSON or event-stream bodies)
 * - SessionStore: per-service session ids with per-service exclusion
 * - HttpTransport / SseTransport / StdioTransport: one RPC exchange per call
 * - TransportRegistry: dispatch from a service's declared transport
 * - McpClient: tools/list and tools/call with session lifecycle and single retry
 */

export { JsonRpcCodec, sameRpcId, DEFAULT_PROTOCOL_VERSION } from './json-rpc-codec';
export { SessionStore } from './session-store';
export { HttpTransport } from './http-transport';
export { SseTransport, resolveSseEndpoint } from './sse-transport';
export { StdioTransport } from './stdio-transport';
export { TransportRegistry } from './transport-registry';
export { McpClient, DEFAULT_REQUEST_TIMEOUT_MS } from './mcp-client.service';
export { SseEventParser, parseSseText, parseSseEvents, readLines, type SseEvent } from './sse';
