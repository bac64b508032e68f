import { describe, it, expect, beforeEach } from 'vitest';
import { Container } from 'inversify';
import { TYPES } from '@main/core/types';
import { DecodeError, StatusError, TransportError } from '@main/core/errors';
import type { FetchFn, IJsonRpcCodec, IRpcTransport } from '@main/core/interfaces';
import { HttpTransport } from '../http-transport';
import { JsonRpcCodec } from '../json-rpc-codec';
import { createMockFetch, createMockService, createTestContainer } from '@tests/utils';

function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

describe('HttpTransport', () => {
  let container: Container;
  let codec: IJsonRpcCodec;
  const service = createMockService({
    id: 'docs',
    endpoint: 'https://docs.example.test/mcp',
    authToken: 'test-secret',
  });

  function createTransport(fetchFn: FetchFn): IRpcTransport {
    container.bind<FetchFn>(TYPES.Fetch).toConstantValue(fetchFn);
    container.bind<IRpcTransport>(TYPES.HttpTransport).to(HttpTransport);
    return container.get<IRpcTransport>(TYPES.HttpTransport);
  }

  beforeEach(() => {
    container = createTestContainer({ useMockDatabase: false });
    container.bind<IJsonRpcCodec>(TYPES.JsonRpcCodec).to(JsonRpcCodec);
    codec = container.get<IJsonRpcCodec>(TYPES.JsonRpcCodec);
  });

  it('POSTs the encoded request with MCP headers and decodes the reply', async () => {
    const fetchFn = createMockFetch(() =>
      jsonResponse({ jsonrpc: '2.0', id: 1, result: { tools: [] } }, { 'Mcp-Session-Id': 'sess-2' })
    );
    const transport = createTransport(fetchFn);
    const message = codec.request('tools/list');

    const exchange = await transport.send({
      service,
      message,
      sessionId: 'sess-1',
      signal: new AbortController().signal,
    });

    expect(exchange).toEqual({
      response: { jsonrpc: '2.0', id: 1, result: { tools: [] } },
      sessionId: 'sess-2',
    });

    const call = fetchFn.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://docs.example.test/mcp');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify(message));
    const headers = new Headers(init?.headers);
    expect(headers.get('Content-Type')).toBe('application/json');
    expect(headers.get('Accept')).toBe('application/json, text/event-stream');
    expect(headers.get('Authorization')).toBe('Bearer test-secret');
    expect(headers.get('Mcp-Session-Id')).toBe('sess-1');
    expect(headers.get('MCP-Protocol-Version')).toBe('2025-06-18');
  });

  it('omits the session and credential headers when there are none', async () => {
    const fetchFn = createMockFetch(() => jsonResponse({ jsonrpc: '2.0', id: 1, result: {} }));
    const transport = createTransport(fetchFn);

    await transport.send({
      service: { ...service, authToken: undefined },
      message: codec.request('tools/list'),
      signal: new AbortController().signal,
    });

    const headers = new Headers(fetchFn.mock.calls[0]?.[1]?.headers);
    expect(headers.has('Authorization')).toBe(false);
    expect(headers.has('Mcp-Session-Id')).toBe(false);
  });

  it('decodes an event-stream reply', async () => {
    const fetchFn = createMockFetch(
      () =>
        new Response('event: message\ndata: {"jsonrpc":"2.0","id":1,"result":{"ok":1}}\n\n', {
          status: 200,
          headers: { 'Content-Type': 'text/event-stream' },
        })
    );
    const transport = createTransport(fetchFn);

    const exchange = await transport.send({
      service,
      message: codec.request('tools/list'),
      signal: new AbortController().signal,
    });

    expect(exchange.response?.result).toEqual({ ok: 1 });
    expect(exchange.sessionId).toBeUndefined();
  });

  it('does not decode the body of a notification', async () => {
    const fetchFn = createMockFetch(
      () => new Response(null, { status: 202, headers: { 'Mcp-Session-Id': 'sess-9' } })
    );
    const transport = createTransport(fetchFn);

    const exchange = await transport.send({
      service,
      message: codec.initializedNotification(),
      sessionId: 'sess-9',
      signal: new AbortController().signal,
    });

    expect(exchange).toEqual({ sessionId: 'sess-9' });
  });

  it('raises a status error with the trimmed body', async () => {
    const fetchFn = createMockFetch(() => new Response('  session expired \n', { status: 404 }));
    const transport = createTransport(fetchFn);

    const error = await transport
      .send({ service, message: codec.request('tools/list'), signal: new AbortController().signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StatusError);
    expect(error).toMatchObject({ status: 404, body: 'session expired' });
    expect(error).toHaveProperty('message', 'status 404: session expired');
  });

  it('raises a transport error when the request cannot be sent', async () => {
    const fetchFn = createMockFetch(() => {
      throw new TypeError('fetch failed');
    });
    const transport = createTransport(fetchFn);

    const error = await transport
      .send({ service, message: codec.request('tools/list'), signal: new AbortController().signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'send rpc request: fetch failed');
  });

  it('raises a decode error for a reply to another request', async () => {
    const fetchFn = createMockFetch(() => jsonResponse({ jsonrpc: '2.0', id: 99, result: {} }));
    const transport = createTransport(fetchFn);

    await expect(
      transport.send({ service, message: codec.request('tools/list'), signal: new AbortController().signal })
    ).rejects.toBeInstanceOf(DecodeError);
  });
});
