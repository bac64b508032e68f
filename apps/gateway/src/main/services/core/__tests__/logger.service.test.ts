import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, sanitize } from '../logger.service';
import { createMockConfig } from '@tests/utils';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  function lastInfoLine(): Record<string, unknown> {
    const calls = vi.mocked(console.info).mock.calls;
    const line = calls[calls.length - 1]?.[0];
    return typeof line === 'string' ? JSON.parse(line) : {};
  }

  it('writes one JSON line with context and metadata', () => {
    delete process.env.LOG_LEVEL;
    const logger = new Logger().child({ component: 'registry' });

    logger.info('Refreshed MCP tools', { tools: 3 });

    expect(console.info).toHaveBeenCalledTimes(1);
    expect(lastInfoLine()).toMatchObject({
      level: 'info',
      message: 'Refreshed MCP tools',
      component: 'registry',
      tools: 3,
    });
  });

  it('drops entries below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const logger = new Logger();

    logger.info('quiet');
    logger.warn('loud');

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('defaults to info for an unknown level', () => {
    process.env.LOG_LEVEL = 'verbose';
    const logger = new Logger();

    logger.debug('hidden');
    logger.info('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).toHaveBeenCalledTimes(1);
  });

  it('takes the level from config when LOG_LEVEL is unset', () => {
    delete process.env.LOG_LEVEL;
    const logger = new Logger(createMockConfig({ 'log.level': 'error' }));

    logger.warn('hidden');
    logger.error('shown');

    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('prefers LOG_LEVEL over config', () => {
    process.env.LOG_LEVEL = 'debug';
    const logger = new Logger(createMockConfig({ 'log.level': 'error' }));

    logger.debug('shown');

    expect(console.debug).toHaveBeenCalledTimes(1);
  });

  it('keeps the parent level in child loggers', () => {
    delete process.env.LOG_LEVEL;
    const logger = new Logger(createMockConfig({ 'log.level': 'warn' })).child({ serviceId: 'docs' });

    logger.info('hidden');

    expect(console.info).not.toHaveBeenCalled();
  });
});

describe('sanitize', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      sanitize({
        serviceId: 'docs',
        authToken: 'test-secret',
        headers: { Authorization: 'Bearer test-secret', Accept: 'application/json' },
        services: [{ id: 'a', apiKey: 'test-key' }],
        sessionId: 'sess-1',
      })
    ).toEqual({
      serviceId: 'docs',
      authToken: '[REDACTED]',
      headers: { Authorization: '[REDACTED]', Accept: 'application/json' },
      services: [{ id: 'a', apiKey: '[REDACTED]' }],
      sessionId: '[REDACTED]',
    });
  });
});
