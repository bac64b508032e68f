import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import {
  DecodeError,
  RpcError,
  SessionError,
  toMcpError,
  type McpErrorContext,
} from '@main/core/errors';
import type {
  IConfig,
  IJsonRpcCodec,
  ILogger,
  IMcpClient,
  IRpcTransport,
  ISessionStore,
  ITransportRegistry,
  McpService,
  RemoteTool,
  ToolCallResult,
} from '@main/core/interfaces';
import { ToolCallResultSchema, ToolsListResultSchema } from '@main/validation/rpc-schemas';
import { Deadline } from '@main/utils/deadline';

export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;

interface CallScope {
  transport: IRpcTransport;
  service: McpService;
  context: McpErrorContext;
  signal: AbortSignal;
}

/**
 * MCP protocol client.
 *
 * Runs `tools/list` and `tools/call` over whichever transport a service declares.
 * For session-based transports it owns the per-service session: established
 * lazily with `initialize` + `notifications/initialized`, reused until an RPC made
 * with it fails, then cleared and re-established exactly once for a single retry.
 */
@injectable()
export class McpClient implements IMcpClient {
  private readonly timeoutMs: number;

  constructor(
    @inject(TYPES.TransportRegistry) private transports: ITransportRegistry,
    @inject(TYPES.SessionStore) private sessions: ISessionStore,
    @inject(TYPES.JsonRpcCodec) private codec: IJsonRpcCodec,
    @inject(TYPES.Config) config: IConfig,
    @inject(TYPES.Logger) private logger: ILogger
  ) {
    const configured = config.get<unknown>('mcp.requestTimeoutMs');
    this.timeoutMs =
      typeof configured === 'number' && configured > 0 ? configured : DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async listTools(service: McpService, signal?: AbortSignal): Promise<RemoteTool[]> {
    const result = await this.call(service, 'tools/list', {}, signal);
    const parsed = ToolsListResultSchema.safeParse(result ?? {});
    if (!parsed.success) {
      throw new DecodeError(`tools/list result: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        cause: parsed.error,
      }).withContext(this.contextFor(service, 'tools/list'));
    }
    return parsed.data.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      ...(tool.inputSchema ? { inputSchema: tool.inputSchema } : {}),
    }));
  }

  async callTool(
    service: McpService,
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<ToolCallResult> {
    const result = await this.call(service, 'tools/call', { name: toolName, arguments: args }, signal);
    const parsed = ToolCallResultSchema.safeParse(result ?? {});
    if (!parsed.success) {
      throw new DecodeError(`tools/call result: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        cause: parsed.error,
      }).withContext(this.contextFor(service, 'tools/call'));
    }
    return {
      content: parsed.data.content,
      structuredContent: parsed.data.structuredContent,
      isError: parsed.data.isError,
      raw: result,
    };
  }

  private async call(
    service: McpService,
    method: string,
    params: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const context = this.contextFor(service, method);
    const deadline = new Deadline(this.timeoutMs, signal);
    const startedAt = Date.now();

    try {
      const transport = this.transports.resolve(service);
      const scope: CallScope = { transport, service, context, signal: deadline.signal };
      const result = transport.sessionful
        ? await this.callWithSession(scope, method, params)
        : await this.invoke(scope, method, params, undefined);

      this.logger.debug('MCP call completed', {
        serviceId: service.id,
        method,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      throw toMcpError(deadline.explain(error), context);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * First attempt, then at most one retry on a freshly initialized session.
   * The retry only happens when the first attempt carried a session id.
   */
  private async callWithSession(
    scope: CallScope,
    method: string,
    params: Record<string, unknown>
  ): Promise<unknown> {
    const sessionId = await this.ensureSession(scope);

    try {
      return await this.invoke(scope, method, params, sessionId);
    } catch (error) {
      if (sessionId === undefined || scope.signal.aborted) {
        throw error;
      }

      const original = toMcpError(error, scope.context);
      this.logger.warn('MCP request failed on existing session; reinitializing', {
        serviceId: scope.service.id,
        method,
        error: original.detail,
      });

      let renewed: string | undefined;
      try {
        renewed = await this.renewSession(scope, sessionId);
      } catch (reinitError) {
        throw new SessionError(original, toMcpError(reinitError, scope.context));
      }

      return this.invoke(scope, method, params, renewed);
    }
  }

  private async invoke(
    scope: CallScope,
    method: string,
    params: Record<string, unknown>,
    sessionId: string | undefined
  ): Promise<unknown> {
    const exchange = await scope.transport.send({
      service: scope.service,
      message: this.codec.request(method, params),
      sessionId,
      signal: scope.signal,
    });

    const response = exchange.response;
    if (!response) {
      throw new DecodeError('no response received');
    }
    if (response.error) {
      throw new RpcError(response.error.code, response.error.message, response.error.data);
    }

    if (scope.transport.sessionful && exchange.sessionId) {
      this.sessions.set(scope.service.id, exchange.sessionId);
    }
    return response.result;
  }

  private ensureSession(scope: CallScope): Promise<string | undefined> {
    return this.sessions.runExclusive(scope.service.id, async () => {
      const cached = this.sessions.get(scope.service.id);
      if (cached !== undefined) {
        return cached;
      }
      return this.initializeSession(scope);
    });
  }

  /**
   * Replace `stale` with a new session. If another caller already replaced it, reuse theirs.
   */
  private renewSession(scope: CallScope, stale: string): Promise<string | undefined> {
    return this.sessions.runExclusive(scope.service.id, async () => {
      const current = this.sessions.get(scope.service.id);
      if (current !== undefined && current !== stale) {
        return current;
      }
      this.sessions.clear(scope.service.id);
      return this.initializeSession(scope);
    });
  }

  private async initializeSession(scope: CallScope): Promise<string | undefined> {
    const { transport, service, signal } = scope;
    const context = { ...scope.context, method: 'initialize' };

    try {
      const exchange = await transport.send({
        service,
        message: this.codec.initializeRequest(),
        signal,
      });
      if (!exchange.response) {
        throw new DecodeError('no response received');
      }
      if (exchange.response.error) {
        const { code, message, data } = exchange.response.error;
        throw new RpcError(code, message, data);
      }

      const sessionId = exchange.sessionId;
      if (sessionId !== undefined) {
        this.sessions.set(service.id, sessionId);
      }

      try {
        await transport.send({
          service,
          message: this.codec.initializedNotification(),
          sessionId,
          signal,
        });
      } catch (error) {
        this.sessions.clear(service.id);
        throw toMcpError(error, { ...context, method: 'notifications/initialized' });
      }

      this.logger.info('MCP service initialized', {
        serviceId: service.id,
        transport: transport.kind,
        stateful: sessionId !== undefined,
      });
      return sessionId;
    } catch (error) {
      throw toMcpError(error, context);
    }
  }

  private contextFor(service: McpService, method: string): McpErrorContext {
    return { serviceId: service.id, method, transport: service.transport };
  }
}
