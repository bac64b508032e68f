import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import { ServiceDirectoryError } from '@main/core/errors';
import type {
  ILogger,
  IServiceDirectory,
  IServiceRepository,
  McpService,
  ServiceInput,
  ServiceToolState,
} from '@main/core/interfaces';
import { ServiceInputSchema, ServiceRecordSchema } from '@main/validation/service-schemas';
import { generateUniqueId, normalizeTransport } from '@main/utils/identifiers';
import { KeyedLock } from '@main/utils/keyed-lock';

const WRITE_LOCK = 'services';

/**
 * Keep only explicit disabled overrides, deduplicated by trimmed name (last one wins)
 * and sorted by name.
 */
export function normalizeToolStates(states: readonly ServiceToolState[]): ServiceToolState[] {
  const byName = new Map<string, ServiceToolState>();
  for (const state of states) {
    const name = state.name.trim();
    if (name === '') {
      continue;
    }
    if (state.enabled) {
      byName.delete(name);
    } else {
      byName.set(name, { name, enabled: false });
    }
  }
  return [...byName.values()].sort((a, b) => compareStrings(a.name, b.name));
}

export function isServiceToolEnabled(service: McpService, toolName: string): boolean {
  const name = toolName.trim();
  if (name === '') {
    return false;
  }
  const state = service.toolStates.find((candidate) => candidate.name.trim() === name);
  return state ? state.enabled : true;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function cloneService(service: McpService): McpService {
  return {
    ...service,
    args: [...service.args],
    toolStates: service.toolStates.map((state) => ({ ...state })),
  };
}

/**
 * Directory of configured MCP services.
 *
 * Reads are served from an in-memory copy so the tool registry can consult it
 * synchronously; every write goes through to the repository first and then
 * replaces the in-memory record. Writes are serialized.
 */
@injectable()
export class ServiceDirectory implements IServiceDirectory {
  private services: McpService[] = [];
  private loaded = false;
  private readonly listeners = new Set<() => void>();
  private readonly writeLock = new KeyedLock();

  constructor(
    @inject(TYPES.ServiceRepository) private repository: IServiceRepository,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  async load(): Promise<void> {
    this.services = await this.repository.findAll();
    this.loaded = true;
    this.logger.info('Loaded MCP services', { count: this.services.length });
  }

  listServices(): McpService[] {
    return this.services.map(cloneService);
  }

  listEnabledServices(): McpService[] {
    return this.services.filter((service) => service.enabled).map(cloneService);
  }

  getService(id: string): McpService | undefined {
    const service = this.find(id.trim());
    return service ? cloneService(service) : undefined;
  }

  isToolEnabled(serviceId: string, toolName: string): boolean {
    const id = serviceId.trim();
    if (id === '' || toolName.trim() === '') {
      return false;
    }
    const service = this.find(id);
    return service ? isServiceToolEnabled(service, toolName) : false;
  }

  async upsertService(input: ServiceInput): Promise<McpService> {
    const parsed = ServiceInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ServiceDirectoryError(
        'VALIDATION',
        parsed.error.issues.map((issue) => issue.message).join('; ')
      );
    }
    const payload = parsed.data;

    return this.write(async () => {
      const endpoint = payload.endpoint?.trim() ?? '';
      const name = payload.name?.trim() ?? '';
      const id =
        payload.id?.trim() ||
        this.findIdByEndpoint(endpoint) ||
        generateUniqueId(
          new Set(this.services.map((service) => service.id)),
          [name, endpoint, payload.command ?? ''],
          'service'
        );
      const existing = this.find(id);
      const authToken = payload.authToken?.trim() || existing?.authToken;

      const record: McpService = {
        id,
        name: name || id,
        endpoint,
        command: payload.command?.trim() ?? '',
        args: payload.args ?? [],
        transport: normalizeTransport(payload.transport),
        enabled: payload.enabled ?? existing?.enabled ?? true,
        toolStates: payload.toolStates
          ? normalizeToolStates(payload.toolStates)
          : (existing?.toolStates ?? []),
        updatedAt: Date.now(),
      };
      if (authToken) {
        record.authToken = authToken;
      }

      this.validate(record);

      if (existing) {
        await this.repository.update(record);
        this.replace(record);
        this.logger.info('Updated MCP service', { serviceId: id, transport: record.transport });
      } else {
        await this.repository.create(record);
        this.services.push(record);
        this.logger.info('Added MCP service', { serviceId: id, transport: record.transport });
      }

      return cloneService(record);
    });
  }

  async deleteService(id: string): Promise<void> {
    const serviceId = this.requireId(id);
    await this.write(async () => {
      this.require(serviceId);
      await this.repository.delete(serviceId);
      this.services = this.services.filter((service) => service.id !== serviceId);
      this.logger.info('Removed MCP service', { serviceId });
    });
  }

  async setServiceEnabled(id: string, enabled: boolean): Promise<McpService> {
    const serviceId = this.requireId(id);
    return this.write(async () => {
      const record = { ...cloneService(this.require(serviceId)), enabled, updatedAt: Date.now() };
      await this.repository.update(record);
      this.replace(record);
      this.logger.info(enabled ? 'Enabled MCP service' : 'Disabled MCP service', { serviceId });
      return cloneService(record);
    });
  }

  async setToolEnabled(serviceId: string, toolName: string, enabled: boolean): Promise<McpService> {
    const id = this.requireId(serviceId);
    const name = toolName.trim();
    if (name === '') {
      throw new ServiceDirectoryError('VALIDATION', 'tool name is required');
    }

    return this.write(async () => {
      const current = this.require(id);
      const others = current.toolStates.filter((state) => state.name !== name);
      const record: McpService = {
        ...cloneService(current),
        toolStates: normalizeToolStates(enabled ? others : [...others, { name, enabled: false }]),
        updatedAt: Date.now(),
      };
      await this.repository.update(record);
      this.replace(record);
      this.logger.info(enabled ? 'Enabled MCP tool' : 'Disabled MCP tool', {
        serviceId: id,
        tool: name,
      });
      return cloneService(record);
    });
  }

  onChange(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async write<T>(fn: () => Promise<T>): Promise<T> {
    return this.writeLock.run(WRITE_LOCK, async () => {
      if (!this.loaded) {
        await this.load();
      }
      const result = await fn();
      this.notify();
      return result;
    });
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        this.logger.error('Service directory listener failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
  }

  private validate(record: McpService): void {
    const result = ServiceRecordSchema.safeParse(record);
    if (!result.success) {
      throw new ServiceDirectoryError(
        'VALIDATION',
        result.error.issues.map((issue) => issue.message).join('; ')
      );
    }
  }

  private find(id: string): McpService | undefined {
    return this.services.find((service) => service.id === id);
  }

  private findIdByEndpoint(endpoint: string): string | undefined {
    if (endpoint === '') {
      return undefined;
    }
    return this.services.find((service) => service.endpoint.trim() === endpoint)?.id;
  }

  private replace(record: McpService): void {
    this.services = this.services.map((service) => (service.id === record.id ? record : service));
  }

  private requireId(id: string): string {
    const trimmed = id.trim();
    if (trimmed === '') {
      throw new ServiceDirectoryError('VALIDATION', 'service id is required');
    }
    return trimmed;
  }

  private require(id: string): McpService {
    const service = this.find(id);
    if (!service) {
      throw new ServiceDirectoryError('NOT_FOUND', `service "${id}" not found`);
    }
    return service;
  }
}
