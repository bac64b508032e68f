import { injectable, inject, optional } from 'inversify';
import { TYPES } from '@main/core/types';
import type { IConfig, ILogger, LogLevel } from '@main/core/interfaces';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'session',
  'cookie',
];

const REDACTED = '[REDACTED]';

/**
 * Structured JSON logger. One line per entry on the console stream matching its level.
 * Metadata keys that look like credentials or session identifiers are redacted.
 *
 * The minimum level is `LOG_LEVEL` when it names a level, else the `log.level` config key.
 */
@injectable()
export class Logger implements ILogger {
  private context: Record<string, unknown> = {};
  private minLevel: LogLevel;

  constructor(@inject(TYPES.Config) @optional() config?: IConfig) {
    this.minLevel = resolveLevel(process.env.LOG_LEVEL, config?.get<string>('log.level'));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): ILogger {
    const childLogger = new Logger();
    childLogger.context = { ...this.context, ...context };
    childLogger.minLevel = this.minLevel;
    return childLogger;
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const output = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...sanitize({ ...this.context, ...meta }),
    });

    switch (level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
        console.error(output);
        break;
    }
  }
}

function resolveLevel(...candidates: Array<string | undefined>): LogLevel {
  for (const candidate of candidates) {
    const level = candidate?.trim().toLowerCase();
    if (isLogLevel(level)) {
      return level;
    }
  }
  return 'info';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively replace values under sensitive keys.
 */
export function sanitize(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
      result[key] = REDACTED;
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? sanitize(item) : item));
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
