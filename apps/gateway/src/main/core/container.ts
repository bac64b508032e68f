import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import type {
  FetchFn,
  IConfig,
  IDatabase,
  IJsonRpcCodec,
  ILogger,
  IMcpClient,
  IRpcTransport,
  IServiceDirectory,
  IServiceRepository,
  ISessionStore,
  IToolRegistry,
  ITransportRegistry,
} from './interfaces';

// Core
import { ConfigService } from '@main/services/core/config.service';
import { SqliteDatabase } from '@main/services/core/database.service';
import { Logger } from '@main/services/core/logger.service';

// Repositories
import { ServiceRepository } from '@main/repositories/service.repository';

// Services
import { ServiceDirectory } from '@main/services/directory/service-directory.service';
import { JsonRpcCodec } from '@main/services/mcp/json-rpc-codec';
import { SessionStore } from '@main/services/mcp/session-store';
import { HttpTransport } from '@main/services/mcp/http-transport';
import { SseTransport } from '@main/services/mcp/sse-transport';
import { StdioTransport } from '@main/services/mcp/stdio-transport';
import { TransportRegistry } from '@main/services/mcp/transport-registry';
import { McpClient } from '@main/services/mcp/mcp-client.service';
import { ToolRegistry } from '@main/services/registry/tool-registry.service';

const globalFetch: FetchFn = (input, init) => fetch(input, init);

/**
 * Creates and configures the InversifyJS dependency injection container.
 * All services are bound as singletons.
 */
export function createContainer(): Container {
  const container = new Container({
    defaultScope: 'Singleton',
    autoBindInjectable: false,
  });

  // ============================================================================
  // Core Infrastructure (bind first, as other services depend on these)
  // ============================================================================
  container.bind<IConfig>(TYPES.Config).to(ConfigService);
  container.bind<IDatabase>(TYPES.Database).to(SqliteDatabase);
  container.bind<ILogger>(TYPES.Logger).to(Logger);
  container.bind<FetchFn>(TYPES.Fetch).toConstantValue(globalFetch);

  // ============================================================================
  // Repositories
  // ============================================================================
  container.bind<IServiceRepository>(TYPES.ServiceRepository).to(ServiceRepository);

  // ============================================================================
  // Service Directory
  // ============================================================================
  container.bind<IServiceDirectory>(TYPES.ServiceDirectory).to(ServiceDirectory);

  // ============================================================================
  // MCP Protocol Layer (JSON-RPC, Sessions, Transports, Client)
  // ============================================================================
  container.bind<IJsonRpcCodec>(TYPES.JsonRpcCodec).to(JsonRpcCodec);
  container.bind<ISessionStore>(TYPES.SessionStore).to(SessionStore);
  container.bind<IRpcTransport>(TYPES.HttpTransport).to(HttpTransport);
  container.bind<IRpcTransport>(TYPES.SseTransport).to(SseTransport);
  container.bind<IRpcTransport>(TYPES.StdioTransport).to(StdioTransport);
  container.bind<ITransportRegistry>(TYPES.TransportRegistry).to(TransportRegistry);
  container.bind<IMcpClient>(TYPES.McpClient).to(McpClient);

  // ============================================================================
  // Tool Registry
  // ============================================================================
  container.bind<IToolRegistry>(TYPES.ToolRegistry).to(ToolRegistry);

  return container;
}

/**
 * Open the database, load the service directory and invalidate the tool cache on
 * every directory change. Returns the unsubscribe function for that wiring.
 */
export async function startServices(container: Container): Promise<() => void> {
  container.get<IDatabase>(TYPES.Database).initialize();

  const directory = container.get<IServiceDirectory>(TYPES.ServiceDirectory);
  await directory.load();

  const registry = container.get<IToolRegistry>(TYPES.ToolRegistry);
  return directory.onChange(() => registry.invalidateCache());
}

/**
 * Global container instance.
 * Initialize by calling initializeContainer() during startup.
 */
let containerInstance: Container | null = null;
let stopServices: (() => void) | null = null;

/**
 * Initializes the global container instance and starts its services.
 * Should be called once during startup.
 */
export async function initializeContainer(): Promise<Container> {
  if (containerInstance) {
    throw new Error('Container already initialized. Call disposeContainer() first.');
  }
  const container = createContainer();
  stopServices = await startServices(container);
  containerInstance = container;
  return container;
}

/**
 * Returns the global container instance.
 * Throws if container hasn't been initialized.
 */
export function getContainer(): Container {
  if (!containerInstance) {
    throw new Error('Container not initialized. Call initializeContainer() first.');
  }
  return containerInstance;
}

/**
 * Disposes the global container instance.
 * Should be called during shutdown.
 */
export function disposeContainer(): void {
  if (containerInstance) {
    stopServices?.();
    stopServices = null;

    const database = containerInstance.get<IDatabase>(TYPES.Database);
    database.close();

    containerInstance = null;
  }
}

/**
 * Helper to get a service from the container.
 * Syntactic sugar for container.get<T>(TYPES.ServiceName)
 */
export function getService<T>(serviceIdentifier: symbol): T {
  return getContainer().get<T>(serviceIdentifier);
}
