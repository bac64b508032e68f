import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Container } from 'inversify';
import { TYPES } from '@main/core/types';
import { ServiceDirectoryError } from '@main/core/errors';
import type { IDatabase, IServiceDirectory, IServiceRepository, ILogger } from '@main/core/interfaces';
import { ServiceRepository } from '@main/repositories/service.repository';
import {
  ServiceDirectory,
  isServiceToolEnabled,
  normalizeToolStates,
} from '../service-directory.service';
import { createMockService, createTestContainer } from '@tests/utils';

describe('ServiceDirectory', () => {
  let container: Container;
  let directory: IServiceDirectory;
  let repository: IServiceRepository;

  beforeEach(async () => {
    container = createTestContainer();
    container.bind<IServiceRepository>(TYPES.ServiceRepository).to(ServiceRepository);
    container.bind<IServiceDirectory>(TYPES.ServiceDirectory).to(ServiceDirectory);

    repository = container.get<IServiceRepository>(TYPES.ServiceRepository);
    directory = container.get<IServiceDirectory>(TYPES.ServiceDirectory);
    await directory.load();
  });

  afterEach(() => {
    container.get<IDatabase>(TYPES.Database).close();
  });

  describe('upsertService', () => {
    it('generates an id from the name and defaults the rest', async () => {
      const service = await directory.upsertService({
        name: ' Docs Search ',
        endpoint: 'https://docs.example.test/mcp',
      });

      expect(service).toMatchObject({
        id: 'docs-search',
        name: 'Docs Search',
        endpoint: 'https://docs.example.test/mcp',
        transport: 'streamable_http',
        enabled: true,
        toolStates: [],
      });
      await expect(repository.findById('docs-search')).resolves.toMatchObject({ name: 'Docs Search' });
    });

    it('falls back to the endpoint, then "service", for the generated id', async () => {
      const fromEndpoint = await directory.upsertService({ endpoint: 'http://localhost:9000/mcp' });
      const fromCommand = await directory.upsertService({ transport: 'stdio', command: '***' });

      expect(fromEndpoint.id).toBe('http-localhost-9000-mcp');
      expect(fromEndpoint.name).toBe('http-localhost-9000-mcp');
      expect(fromCommand.id).toBe('service');
    });

    it('suffixes generated ids that are already taken', async () => {
      await directory.upsertService({ name: 'docs', endpoint: 'https://a.example.test/mcp' });
      const second = await directory.upsertService({ name: 'docs', endpoint: 'https://b.example.test/mcp' });

      expect(second.id).toBe('docs-2');
    });

    it('updates the service with the same endpoint when no id is given', async () => {
      await directory.upsertService({
        id: 'docs',
        endpoint: 'https://docs.example.test/mcp',
        authToken: 'test-secret',
        toolStates: [{ name: 'drop', enabled: false }],
      });

      const updated = await directory.upsertService({
        name: 'Docs v2',
        endpoint: 'https://docs.example.test/mcp',
      });

      expect(updated.id).toBe('docs');
      expect(updated.name).toBe('Docs v2');
      expect(updated.authToken).toBe('test-secret');
      expect(updated.toolStates).toEqual([{ name: 'drop', enabled: false }]);
      expect(directory.listServices()).toHaveLength(1);
    });

    it('keeps only disabled tool overrides', async () => {
      const service = await directory.upsertService({
        id: 'docs',
        endpoint: 'https://docs.example.test/mcp',
        toolStates: [
          { name: ' zeta ', enabled: false },
          { name: 'alpha', enabled: true },
          { name: 'beta', enabled: false },
        ],
      });

      expect(service.toolStates).toEqual([
        { name: 'beta', enabled: false },
        { name: 'zeta', enabled: false },
      ]);
    });

    it.each([
      [{ id: 'bad id', endpoint: 'https://x.example.test' }, 'service id must match [a-zA-Z0-9_-]+'],
      [{ id: 'x', endpoint: '' }, 'service endpoint is required'],
      [{ id: 'x', endpoint: 'ftp://x.example.test' }, 'service endpoint must start with http:// or https://'],
      [{ id: 'x', transport: 'stdio' }, 'stdio service command is required'],
      [
        { id: 'x', endpoint: 'https://x.example.test', transport: 'websocket' },
        'service transport must be one of streamable_http, sse, stdio',
      ],
    ])('rejects %j', async (input, message) => {
      const error = await directory.upsertService(input).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceDirectoryError);
      expect(error).toMatchObject({ code: 'VALIDATION', message });
      expect(directory.listServices()).toEqual([]);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await directory.upsertService({ id: 'a', endpoint: 'https://a.example.test/mcp' });
      await directory.upsertService({ id: 'b', endpoint: 'https://b.example.test/mcp', enabled: false });
      await directory.setToolEnabled('a', 'drop', false);
    });

    it('lists all services and only the enabled ones', () => {
      expect(directory.listServices().map((s) => s.id)).toEqual(['a', 'b']);
      expect(directory.listEnabledServices().map((s) => s.id)).toEqual(['a']);
    });

    it('returns copies that do not alias directory state', () => {
      const copy = directory.getService('a');
      copy?.toolStates.push({ name: 'query', enabled: false });

      expect(directory.isToolEnabled('a', 'query')).toBe(true);
    });

    it('answers isToolEnabled', () => {
      expect(directory.isToolEnabled('a', 'query')).toBe(true);
      expect(directory.isToolEnabled('a', 'drop')).toBe(false);
      expect(directory.isToolEnabled('a', '  ')).toBe(false);
      expect(directory.isToolEnabled('', 'query')).toBe(false);
      expect(directory.isToolEnabled('missing', 'query')).toBe(false);
    });

    it('trims the id in getService', () => {
      expect(directory.getService(' a ')?.id).toBe('a');
      expect(directory.getService('missing')).toBeUndefined();
    });
  });

  describe('writes', () => {
    beforeEach(async () => {
      await directory.upsertService({ id: 'a', endpoint: 'https://a.example.test/mcp' });
    });

    it('re-enabling a tool removes its override', async () => {
      await directory.setToolEnabled('a', 'drop', false);
      const service = await directory.setToolEnabled('a', 'drop', true);

      expect(service.toolStates).toEqual([]);
      await expect(repository.findById('a')).resolves.toMatchObject({ toolStates: [] });
    });

    it('toggles a service', async () => {
      const service = await directory.setServiceEnabled('a', false);

      expect(service.enabled).toBe(false);
      expect(directory.listEnabledServices()).toEqual([]);
    });

    it('deletes a service', async () => {
      await directory.deleteService('a');

      expect(directory.listServices()).toEqual([]);
      await expect(repository.findById('a')).resolves.toBeNull();
    });

    it('rejects unknown ids and blank names', async () => {
      await expect(directory.deleteService('missing')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'service "missing" not found',
      });
      await expect(directory.setServiceEnabled(' ', true)).rejects.toThrow('service id is required');
      await expect(directory.setToolEnabled('a', ' ', false)).rejects.toThrow('tool name is required');
    });

    it('notifies listeners after each successful write', async () => {
      const listener = vi.fn();
      const unsubscribe = directory.onChange(listener);

      await directory.setServiceEnabled('a', false);
      await directory.deleteService('missing').catch(() => undefined);
      expect(listener).toHaveBeenCalledTimes(1);

      unsubscribe();
      await directory.setServiceEnabled('a', true);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('logs and survives a failing listener', async () => {
      directory.onChange(() => {
        throw new Error('listener broke');
      });

      await expect(directory.setServiceEnabled('a', false)).resolves.toMatchObject({ enabled: false });
      expect(container.get<ILogger>(TYPES.Logger).error).toHaveBeenCalledWith(
        'Service directory listener failed',
        { error: 'listener broke' }
      );
    });
  });

  it('loads persisted services on first write when load was never called', async () => {
    await repository.create(createMockService({ id: 'persisted' }));
    const fresh = new ServiceDirectory(repository, container.get<ILogger>(TYPES.Logger));

    await fresh.setServiceEnabled('persisted', false);

    expect(fresh.listServices().map((s) => s.id)).toEqual(['persisted']);
  });
});

describe('normalizeToolStates', () => {
  it('lets the last entry for a name win', () => {
    expect(
      normalizeToolStates([
        { name: 'a', enabled: false },
        { name: 'a', enabled: true },
        { name: 'b', enabled: true },
        { name: 'b', enabled: false },
      ])
    ).toEqual([{ name: 'b', enabled: false }]);
  });
});

describe('isServiceToolEnabled', () => {
  it('defaults to enabled and matches trimmed names', () => {
    const service = createMockService({ toolStates: [{ name: ' drop ', enabled: false }] });

    expect(isServiceToolEnabled(service, 'drop')).toBe(false);
    expect(isServiceToolEnabled(service, 'query')).toBe(true);
  });
});
