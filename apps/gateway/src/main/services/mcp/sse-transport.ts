import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import { DecodeError, StreamExhaustedError, TransportError } from '@main/core/errors';
import type {
  FetchFn,
  IJsonRpcCodec,
  ILogger,
  IRpcTransport,
  JsonRpcId,
  JsonRpcInbound,
  RpcExchange,
  RpcSendOptions,
} from '@main/core/interfaces';
import {
  EVENT_STREAM_ACCEPT,
  JSON_ACCEPT,
  ensureSuccess,
  isRequest,
  mcpHeaders,
  readBody,
  readSessionId,
  sendHttp,
} from './http-common';
import { parseSseEvents, readLines, type SseEvent } from './sse';

/**
 * Resolve the data of an `endpoint` event against the service URL.
 */
export function resolveSseEndpoint(baseEndpoint: string, eventData: string): string {
  if (eventData === '') {
    throw new TransportError('empty sse endpoint event');
  }
  try {
    return new URL(eventData, baseEndpoint).toString();
  } catch (error) {
    throw new TransportError(`invalid sse endpoint "${eventData}"`, { cause: error });
  }
}

/**
 * Event-stream transport (legacy MCP "HTTP+SSE").
 *
 * Each send opens the GET stream, waits for the `endpoint` event naming the POST
 * address, then POSTs the message. The reply is taken from the POST body when it
 * holds one; otherwise it is read from the still-open stream. The stream is
 * closed before `send` settles.
 */
@injectable()
export class SseTransport implements IRpcTransport {
  readonly kind = 'sse' as const;
  readonly sessionful = true;

  constructor(
    @inject(TYPES.Fetch) private fetchFn: FetchFn,
    @inject(TYPES.JsonRpcCodec) private codec: IJsonRpcCodec,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  async send({ service, message, sessionId, signal }: RpcSendOptions): Promise<RpcExchange> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    const headers = mcpHeaders(service, this.codec.protocolVersion, sessionId);
    let events: AsyncGenerator<SseEvent> | undefined;

    try {
      const stream = await sendHttp(
        this.fetchFn,
        service.endpoint,
        {
          method: 'GET',
          headers: { Accept: EVENT_STREAM_ACCEPT, ...headers },
          signal: controller.signal,
        },
        'open sse stream'
      );
      if (stream.status >= 400) {
        ensureSuccess(stream, await readBody(stream, 'sse stream'));
      }
      if (!stream.body) {
        throw new TransportError('sse stream has no body');
      }

      events = parseSseEvents(readLines(stream.body));
      const postEndpoint = await this.awaitEndpoint(events, service.endpoint);

      this.logger.debug('Posting MCP request over SSE transport', {
        serviceId: service.id,
        method: message.method,
        endpoint: postEndpoint,
      });

      const post = await sendHttp(
        this.fetchFn,
        postEndpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: JSON_ACCEPT,
            ...headers,
          },
          body: this.codec.encode(message),
          signal: controller.signal,
        },
        'send rpc request'
      );
      const postBody = await readBody(post, 'rpc response');
      ensureSuccess(post, postBody);
      const nextSessionId = readSessionId(post.headers) ?? readSessionId(stream.headers);

      if (!isRequest(message)) {
        return { sessionId: nextSessionId };
      }

      const inline = this.decodeInline(postBody, post.headers.get('content-type'), message.id);
      if (inline) {
        return { response: inline, sessionId: nextSessionId };
      }

      return {
        response: await this.awaitResponse(events, message.id),
        sessionId: nextSessionId,
      };
    } finally {
      signal.removeEventListener('abort', onAbort);
      await events?.return(undefined);
      controller.abort();
    }
  }

  /**
   * Read events until `endpoint`. A stream that ends first leaves requests going to the service URL.
   */
  private async awaitEndpoint(events: AsyncGenerator<SseEvent>, baseEndpoint: string): Promise<string> {
    for (;;) {
      const next = await events.next();
      if (next.done) {
        this.logger.debug('SSE stream ended without endpoint event', { endpoint: baseEndpoint });
        return baseEndpoint;
      }
      if (next.value.name.trim().toLowerCase() === 'endpoint') {
        return resolveSseEndpoint(baseEndpoint, next.value.data.trim());
      }
    }
  }

  private decodeInline(
    body: string,
    contentType: string | null,
    expectId: JsonRpcId
  ): JsonRpcInbound | undefined {
    if (body.trim() === '') {
      return undefined;
    }
    try {
      return this.codec.decodeResponse(body, contentType, expectId);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      this.logger.debug('No inline reply; waiting on SSE stream', { reason: error.detail });
      return undefined;
    }
  }

  private async awaitResponse(events: AsyncGenerator<SseEvent>, expectId: JsonRpcId): Promise<JsonRpcInbound> {
    for (;;) {
      const next = await events.next();
      if (next.done) {
        throw new StreamExhaustedError(expectId, 'sse stream');
      }
      const data = next.value.data.trim();
      if (data === '') {
        continue;
      }
      const message = this.codec.parseMessage(data);
      if (message && this.codec.isResponseTo(message, expectId)) {
        return message;
      }
    }
  }
}
