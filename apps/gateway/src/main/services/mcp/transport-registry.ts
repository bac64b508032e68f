import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import { TransportError } from '@main/core/errors';
import type { IRpcTransport, ITransportRegistry, McpService } from '@main/core/interfaces';
import { normalizeTransport } from '@main/utils/identifiers';

/**
 * Single dispatch point from a service's declared transport to its handler.
 */
@injectable()
export class TransportRegistry implements ITransportRegistry {
  private readonly transports: ReadonlyMap<string, IRpcTransport>;

  constructor(
    @inject(TYPES.HttpTransport) http: IRpcTransport,
    @inject(TYPES.SseTransport) sse: IRpcTransport,
    @inject(TYPES.StdioTransport) stdio: IRpcTransport
  ) {
    this.transports = new Map([http, sse, stdio].map((transport) => [transport.kind, transport]));
  }

  resolve(service: McpService): IRpcTransport {
    const kind = normalizeTransport(service.transport);
    const transport = this.transports.get(kind);
    if (!transport) {
      throw new TransportError(`unsupported transport "${service.transport}"`);
    }
    return transport;
  }
}
