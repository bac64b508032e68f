import { injectable, inject } from 'inversify';
import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { createInterface, type Interface } from 'readline';
import { TYPES } from '@main/core/types';
import {
  DecodeError,
  McpError,
  RpcError,
  StreamExhaustedError,
  TransportError,
} from '@main/core/errors';
import type {
  IJsonRpcCodec,
  ILogger,
  IRpcTransport,
  JsonRpcId,
  JsonRpcInbound,
  JsonRpcOutbound,
  RpcExchange,
  RpcSendOptions,
} from '@main/core/interfaces';
import { isRequest } from './http-common';

const STDERR_TAIL_LIMIT = 4096;

/**
 * One spawned MCP server process and its newline-delimited JSON pipes.
 */
class StdioProcess {
  private stderrTail = '';
  private readonly reader: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly closed: Promise<void>;
  private disposing: Promise<void> | undefined;

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly logger: ILogger
  ) {
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      this.stderrTail = (this.stderrTail + chunk).slice(-STDERR_TAIL_LIMIT);
    });
    child.stdin.on('error', (error) => {
      this.logger.debug('MCP server stdin closed', { pid: child.pid, error: error.message });
    });
    child.on('error', (error) => {
      this.logger.warn('MCP server process error', { pid: child.pid, error: error.message });
    });

    this.closed = new Promise((resolve) => {
      child.once('close', () => resolve());
    });

    this.reader = createInterface({ input: child.stdout, crlfDelay: Infinity });
    this.lines = this.reader[Symbol.asyncIterator]();
  }

  static async start(command: string, args: string[], logger: ILogger): Promise<StdioProcess> {
    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      shell: false,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => {
          child.off('error', reject);
          resolve();
        });
        child.once('error', reject);
      });
    } catch (error) {
      throw new TransportError(
        `start stdio command "${command}": ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }

    logger.debug('MCP server process spawned', { command, pid: child.pid });
    return new StdioProcess(child, logger);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get stderr(): string {
    return this.stderrTail.trim();
  }

  write(line: string, what: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.child.stdin.write(`${line}\n`, (error) => {
        if (error) {
          reject(new TransportError(`write ${what}: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async readLine(): Promise<string | undefined> {
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  kill(): void {
    if (this.isRunning()) {
      this.child.kill('SIGKILL');
    }
  }

  /**
   * Kill the process if it is still running and wait until it has exited and its pipes have closed.
   * Safe to call more than once.
   */
  dispose(): Promise<void> {
    this.disposing ??= this.shutdown();
    return this.disposing;
  }

  private async shutdown(): Promise<void> {
    this.child.stdin.end();
    this.kill();
    this.child.stdout.destroy();
    await this.closed;
    this.reader.close();
    this.logger.debug('MCP server process reaped', {
      pid: this.child.pid,
      exitCode: this.child.exitCode,
      signal: this.child.signalCode,
    });
  }

  private isRunning(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }
}

/**
 * Subprocess transport. Every send spawns the service's command, performs the
 * initialize handshake over stdin/stdout, sends the message and reads until the
 * matching reply. The process is killed and reaped before `send` settles.
 */
@injectable()
export class StdioTransport implements IRpcTransport {
  readonly kind = 'stdio' as const;
  readonly sessionful = false;

  constructor(
    @inject(TYPES.JsonRpcCodec) private codec: IJsonRpcCodec,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  async send({ service, message, signal }: RpcSendOptions): Promise<RpcExchange> {
    const command = service.command.trim();
    if (command === '') {
      throw new TransportError('stdio command is required');
    }
    if (signal.aborted) {
      throw new TransportError('stdio request aborted', { cause: signal.reason });
    }

    const proc = await StdioProcess.start(command, service.args, this.logger);
    const onAbort = (): void => proc.kill();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      // The signal may have fired while the process was starting.
      if (signal.aborted) {
        throw new TransportError('stdio request aborted', { cause: signal.reason });
      }
      return await this.exchange(proc, message, signal);
    } catch (error) {
      if (error instanceof McpError) {
        await proc.dispose();
        if (proc.stderr !== '') {
          error.annotate(`stderr: ${proc.stderr}`);
        }
      }
      throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
      await proc.dispose();
    }
  }

  private async exchange(
    proc: StdioProcess,
    message: JsonRpcOutbound,
    signal: AbortSignal
  ): Promise<RpcExchange> {
    const initialize = this.codec.initializeRequest();
    await this.write(proc, initialize, 'initialize request');
    const initReply = await this.awaitResponse(proc, initialize.id, signal);
    if (initReply.error) {
      throw new RpcError(initReply.error.code, initReply.error.message, initReply.error.data);
    }

    await this.write(proc, this.codec.initializedNotification(), 'initialized notification');
    await this.write(proc, message, 'rpc request');

    if (!isRequest(message)) {
      return {};
    }
    return { response: await this.awaitResponse(proc, message.id, signal) };
  }

  private write(proc: StdioProcess, message: JsonRpcOutbound, what: string): Promise<void> {
    return proc.write(this.codec.encode(message), what);
  }

  /**
   * Skip server-originated requests and notifications, and replies to other ids,
   * until the reply to `expectId` arrives.
   */
  private async awaitResponse(
    proc: StdioProcess,
    expectId: JsonRpcId,
    signal: AbortSignal
  ): Promise<JsonRpcInbound> {
    for (;;) {
      const line = await proc.readLine();
      if (line === undefined) {
        if (signal.aborted) {
          throw new TransportError('stdio request aborted', { cause: signal.reason });
        }
        throw new StreamExhaustedError(expectId, 'stdout');
      }
      const trimmed = line.trim();
      if (trimmed === '') {
        continue;
      }
      const inbound = this.codec.parseMessage(trimmed);
      if (!inbound) {
        throw new DecodeError(`invalid JSON-RPC line on stdout: ${trimmed.slice(0, 200)}`);
      }
      if (this.codec.isResponseTo(inbound, expectId)) {
        return inbound;
      }
      this.logger.debug('Skipping MCP server message', {
        pid: proc.pid,
        method: inbound.method,
        id: inbound.id,
      });
    }
  }
}
