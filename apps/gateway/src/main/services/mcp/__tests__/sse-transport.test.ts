import { describe, it, expect, beforeEach } from 'vitest';
import { Container } from 'inversify';
import { TYPES } from '@main/core/types';
import { StatusError, StreamExhaustedError, TransportError } from '@main/core/errors';
import type { FetchFn, IJsonRpcCodec, IRpcTransport } from '@main/core/interfaces';
import { SseTransport, resolveSseEndpoint } from '../sse-transport';
import { JsonRpcCodec } from '../json-rpc-codec';
import { createMockFetch, createMockService, createTestContainer } from '@tests/utils';

function eventStream(body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream', ...headers },
  });
}

const ENDPOINT_EVENT = 'event: endpoint\ndata: /messages?sessionId=abc\n\n';

describe('SseTransport', () => {
  let container: Container;
  let codec: IJsonRpcCodec;
  const service = createMockService({
    id: 'legacy',
    endpoint: 'https://legacy.example.test/sse',
    transport: 'sse',
    authToken: 'test-secret',
  });

  function createTransport(fetchFn: FetchFn): IRpcTransport {
    container.bind<FetchFn>(TYPES.Fetch).toConstantValue(fetchFn);
    container.bind<IRpcTransport>(TYPES.SseTransport).to(SseTransport);
    return container.get<IRpcTransport>(TYPES.SseTransport);
  }

  function send(transport: IRpcTransport, sessionId?: string) {
    return transport.send({
      service,
      message: codec.request('tools/list'),
      sessionId,
      signal: new AbortController().signal,
    });
  }

  beforeEach(() => {
    container = createTestContainer({ useMockDatabase: false });
    container.bind<IJsonRpcCodec>(TYPES.JsonRpcCodec).to(JsonRpcCodec);
    codec = container.get<IJsonRpcCodec>(TYPES.JsonRpcCodec);
  });

  it('posts to the announced endpoint and reads the reply from the stream', async () => {
    const fetchFn = createMockFetch(
      () =>
        eventStream(
          `${ENDPOINT_EVENT}: ping\n\nevent: message\ndata: {"jsonrpc":"2.0","method":"notifications/message"}\n\n` +
            'event: message\ndata: {"jsonrpc":"2.0","id":1,"result":{"tools":[]}}\n\n'
        ),
      () => new Response(null, { status: 202 })
    );
    const transport = createTransport(fetchFn);

    const exchange = await send(transport, 'sess-1');

    expect(exchange.response).toEqual({ jsonrpc: '2.0', id: 1, result: { tools: [] } });

    const get = fetchFn.mock.calls[0];
    expect(get?.[0]).toBe('https://legacy.example.test/sse');
    expect(get?.[1]?.method).toBe('GET');
    const getHeaders = new Headers(get?.[1]?.headers);
    expect(getHeaders.get('Accept')).toBe('text/event-stream');
    expect(getHeaders.get('Authorization')).toBe('Bearer test-secret');
    expect(getHeaders.get('Mcp-Session-Id')).toBe('sess-1');

    const post = fetchFn.mock.calls[1];
    expect(post?.[0]).toBe('https://legacy.example.test/messages?sessionId=abc');
    expect(post?.[1]?.method).toBe('POST');
    const postHeaders = new Headers(post?.[1]?.headers);
    expect(postHeaders.get('Content-Type')).toBe('application/json');
    expect(postHeaders.get('Authorization')).toBe('Bearer test-secret');
  });

  it('takes the reply from the POST body when it carries one', async () => {
    const fetchFn = createMockFetch(
      () => eventStream(ENDPOINT_EVENT),
      () =>
        new Response('{"jsonrpc":"2.0","id":1,"result":{"inline":true}}', {
          status: 200,
          headers: { 'Content-Type': 'application/json', 'Mcp-Session-Id': 'sess-post' },
        })
    );
    const transport = createTransport(fetchFn);

    const exchange = await send(transport);

    expect(exchange).toEqual({
      response: { jsonrpc: '2.0', id: 1, result: { inline: true } },
      sessionId: 'sess-post',
    });
  });

  it('falls back to the session id from the stream response', async () => {
    const fetchFn = createMockFetch(
      () =>
        eventStream(`${ENDPOINT_EVENT}data: {"jsonrpc":"2.0","id":1,"result":{}}\n\n`, {
          'Mcp-Session-Id': 'sess-stream',
        }),
      () => new Response('Accepted', { status: 202 })
    );
    const transport = createTransport(fetchFn);

    const exchange = await send(transport);

    expect(exchange.sessionId).toBe('sess-stream');
    expect(exchange.response?.result).toEqual({});
  });

  it('posts to the service URL when the stream ends without an endpoint event', async () => {
    const fetchFn = createMockFetch(
      () => eventStream(': nothing to see\n\n'),
      () => new Response('{"jsonrpc":"2.0","id":1,"result":{}}', { status: 200 })
    );
    const transport = createTransport(fetchFn);

    await send(transport);

    expect(fetchFn.mock.calls[1]?.[0]).toBe('https://legacy.example.test/sse');
  });

  it('returns after the POST for a notification', async () => {
    const fetchFn = createMockFetch(
      () => eventStream(ENDPOINT_EVENT),
      () => new Response(null, { status: 202 })
    );
    const transport = createTransport(fetchFn);

    const exchange = await transport.send({
      service,
      message: codec.initializedNotification(),
      signal: new AbortController().signal,
    });

    expect(exchange).toEqual({ sessionId: undefined });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('fails when the stream closes before the reply', async () => {
    const fetchFn = createMockFetch(
      () => eventStream(ENDPOINT_EVENT),
      () => new Response(null, { status: 202 })
    );
    const transport = createTransport(fetchFn);

    const error = await send(transport).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StreamExhaustedError);
    expect(error).toHaveProperty('message', 'sse stream ended before a response to request 1');
  });

  it('rejects an endpoint event without data', async () => {
    const fetchFn = createMockFetch(() => eventStream('event: endpoint\ndata:\n\n'));
    const transport = createTransport(fetchFn);

    const error = await send(transport).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'empty sse endpoint event');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('raises a status error when the stream is refused', async () => {
    const fetchFn = createMockFetch(() => new Response('unauthorized\n', { status: 401 }));
    const transport = createTransport(fetchFn);

    const error = await send(transport).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StatusError);
    expect(error).toMatchObject({ status: 401, body: 'unauthorized' });
  });

  it('raises a status error when the POST is refused', async () => {
    const fetchFn = createMockFetch(
      () => eventStream(ENDPOINT_EVENT),
      () => new Response('bad session', { status: 400 })
    );
    const transport = createTransport(fetchFn);

    await expect(send(transport)).rejects.toMatchObject({ status: 400, body: 'bad session' });
  });
});

describe('resolveSseEndpoint', () => {
  it('resolves relative and absolute endpoints against the service URL', () => {
    expect(resolveSseEndpoint('https://a.example.test/sse', 'messages')).toBe(
      'https://a.example.test/messages'
    );
    expect(resolveSseEndpoint('https://a.example.test/sse', 'https://b.example.test/rpc')).toBe(
      'https://b.example.test/rpc'
    );
  });

  it('rejects empty data', () => {
    expect(() => resolveSseEndpoint('https://a.example.test/sse', '')).toThrow(
      'empty sse endpoint event'
    );
  });
});
