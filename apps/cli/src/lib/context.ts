/**
 * Gateway bootstrap for one CLI invocation.
 */

import {
  TYPES,
  disposeContainer,
  initializeContainer,
  type IServiceDirectory,
  type IToolRegistry,
} from '@toolbridge/gateway';

export interface Gateway {
  directory: IServiceDirectory;
  registry: IToolRegistry;
}

/**
 * Opens the service store, runs `fn` against it, and closes the store again
 * whether or not `fn` succeeds.
 */
export async function withGateway<T>(fn: (gateway: Gateway) => Promise<T>): Promise<T> {
  const container = await initializeContainer();
  try {
    return await fn({
      directory: container.get<IServiceDirectory>(TYPES.ServiceDirectory),
      registry: container.get<IToolRegistry>(TYPES.ToolRegistry),
    });
  } finally {
    disposeContainer();
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
