import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import type {
  FetchFn,
  IJsonRpcCodec,
  ILogger,
  IRpcTransport,
  RpcExchange,
  RpcSendOptions,
} from '@main/core/interfaces';
import {
  JSON_ACCEPT,
  ensureSuccess,
  isRequest,
  mcpHeaders,
  readBody,
  readSessionId,
  sendHttp,
} from './http-common';

/**
 * Direct request transport (MCP "streamable HTTP").
 * One POST per message; the reply is a JSON body or an event-stream body holding it.
 */
@injectable()
export class HttpTransport implements IRpcTransport {
  readonly kind = 'streamable_http' as const;
  readonly sessionful = true;

  constructor(
    @inject(TYPES.Fetch) private fetchFn: FetchFn,
    @inject(TYPES.JsonRpcCodec) private codec: IJsonRpcCodec,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  async send({ service, message, sessionId, signal }: RpcSendOptions): Promise<RpcExchange> {
    this.logger.debug('Sending MCP request', {
      serviceId: service.id,
      method: message.method,
      id: isRequest(message) ? message.id : undefined,
    });

    const response = await sendHttp(
      this.fetchFn,
      service.endpoint,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: JSON_ACCEPT,
          ...mcpHeaders(service, this.codec.protocolVersion, sessionId),
        },
        body: this.codec.encode(message),
        signal,
      },
      'send rpc request'
    );

    const body = await readBody(response, 'rpc response');
    ensureSuccess(response, body);
    const nextSessionId = readSessionId(response.headers);

    if (!isRequest(message)) {
      return { sessionId: nextSessionId };
    }

    return {
      response: this.codec.decodeResponse(body, response.headers.get('content-type'), message.id),
      sessionId: nextSessionId,
    };
  }
}
