import { injectable } from 'inversify';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { IConfig } from '@main/core/interfaces';

export const CONFIG_DEFAULTS: Readonly<Record<string, unknown>> = {
  // MCP protocol client
  'mcp.requestTimeoutMs': 20000,
  'mcp.protocolVersion': '2025-06-18',
  'mcp.clientName': 'toolbridge',
  'mcp.clientVersion': '1.0.0',

  // Tool registry
  'mcp.toolCacheTtlMs': 30000,

  // Database
  'database.path': 'toolbridge.db',

  // Logging
  'log.level': 'info',
};

type EnvParser = (raw: string) => unknown;

const positiveInteger: EnvParser = (raw) => {
  const value = Number(raw.trim());
  return Number.isInteger(value) && value > 0 ? value : undefined;
};

const nonBlank: EnvParser = (raw) => {
  const value = raw.trim();
  return value === '' ? undefined : value;
};

const ENV_OVERRIDES: ReadonlyArray<{ env: string; key: string; parse: EnvParser }> = [
  { env: 'MCP_REQUEST_TIMEOUT_MS', key: 'mcp.requestTimeoutMs', parse: positiveInteger },
  { env: 'MCP_PROTOCOL_VERSION', key: 'mcp.protocolVersion', parse: nonBlank },
  { env: 'MCP_TOOL_CACHE_TTL_MS', key: 'mcp.toolCacheTtlMs', parse: positiveInteger },
  { env: 'TOOLBRIDGE_DB_PATH', key: 'database.path', parse: nonBlank },
];

/**
 * Configuration service.
 * JSON file in the data directory, addressed with dot-notation keys. Environment
 * overrides win over the file and are never written back.
 */
@injectable()
export class ConfigService implements IConfig {
  private config: Record<string, unknown> = {};
  private readonly overrides = new Map<string, unknown>();
  private readonly configPath: string;

  constructor() {
    this.configPath = path.join(this.dataPath, 'config.json');

    this.loadConfig();
    this.applyDefaults();
    this.loadEnvironment();
  }

  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  get<T>(key: string, defaultValue?: T): T | undefined {
    const value = this.overrides.has(key)
      ? this.overrides.get(key)
      : getNestedValue(this.config, key);

    if (value === undefined) {
      return defaultValue;
    }

    return value as T;
  }

  set<T>(key: string, value: T): void {
    setNestedValue(this.config, key, value);
    this.saveConfig();
  }

  has(key: string): boolean {
    return this.overrides.has(key) || getNestedValue(this.config, key) !== undefined;
  }

  delete(key: string): void {
    deleteNestedValue(this.config, key);
    this.saveConfig();
  }

  get dataPath(): string {
    const home = process.env.TOOLBRIDGE_HOME?.trim();
    return home ? path.resolve(home) : path.join(os.homedir(), '.toolbridge');
  }

  private loadConfig(): void {
    if (!fs.existsSync(this.configPath)) {
      return;
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
      this.config = isRecord(parsed) ? parsed : {};
    } catch (error) {
      console.error('Failed to load config:', error instanceof Error ? error.message : error);
      this.config = {};
    }
  }

  private saveConfig(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { mode: 0o600 });
  }

  private applyDefaults(): void {
    for (const [key, value] of Object.entries(CONFIG_DEFAULTS)) {
      if (getNestedValue(this.config, key) === undefined) {
        setNestedValue(this.config, key, value);
      }
    }
  }

  private loadEnvironment(): void {
    for (const { env, key, parse } of ENV_OVERRIDES) {
      const raw = process.env[env];
      if (raw === undefined) {
        continue;
      }
      const value = parse(raw);
      if (value !== undefined) {
        this.overrides.set(key, value);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getNestedValue(obj: Record<string, unknown>, key: string): unknown {
  let current: unknown = obj;

  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}

function setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = obj;
  for (const k of keys) {
    const next = current[k];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[k] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function deleteNestedValue(obj: Record<string, unknown>, key: string): void {
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = obj;
  for (const k of keys) {
    const next = current[k];
    if (!isRecord(next)) {
      return;
    }
    current = next;
  }

  delete current[lastKey];
}
