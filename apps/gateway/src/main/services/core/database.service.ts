import { injectable, inject } from 'inversify';
import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { TYPES } from '@main/core/types';
import type { IDatabase, IConfig, ILogger } from '@main/core/interfaces';

export interface Migration {
  name: string;
  up: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    name: '001_services',
    up: `
      CREATE TABLE IF NOT EXISTS services (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        endpoint TEXT NOT NULL DEFAULT '',
        command TEXT NOT NULL DEFAULT '',
        args TEXT NOT NULL DEFAULT '[]',
        transport TEXT NOT NULL DEFAULT 'streamable_http',
        auth_token TEXT,
        enabled INTEGER NOT NULL DEFAULT 1,
        tool_states TEXT NOT NULL DEFAULT '[]',
        created_at INTEGER DEFAULT (strftime('%s', 'now')),
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_services_endpoint ON services(endpoint);
    `,
  },
];

/**
 * Create the migrations table and apply every migration not yet recorded.
 */
export function applyMigrations(db: Database.Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at INTEGER DEFAULT (strftime('%s', 'now'))
    )
  `);

  const rows = db.prepare<[], { name: string }>('SELECT name FROM migrations').all();
  const applied = new Set(rows.map((row) => row.name));
  const record = db.prepare<[string]>('INSERT INTO migrations (name) VALUES (?)');
  const ran: string[] = [];

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.name)) {
      continue;
    }
    db.transaction(() => {
      db.exec(migration.up);
      record.run(migration.name);
    })();
    ran.push(migration.name);
  }

  return ran;
}

/**
 * SQLite database service using better-sqlite3.
 */
@injectable()
export class SqliteDatabase implements IDatabase {
  private _db: Database.Database | null = null;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) private logger: ILogger
  ) {}

  get db(): Database.Database {
    return this._db ?? this.open();
  }

  initialize(): void {
    if (!this._db) {
      this.open();
    }
  }

  close(): void {
    if (this._db) {
      this._db.close();
      this._db = null;
      this.logger.info('Database connection closed');
    }
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private open(): Database.Database {
    const dbPath = this.getDatabasePath();
    if (dbPath !== ':memory:') {
      ensureDirectory(path.dirname(dbPath));
    }

    this.logger.info('Initializing database', { path: dbPath });

    try {
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');

      const ran = applyMigrations(db);
      if (ran.length > 0) {
        this.logger.info('Applied database migrations', { migrations: ran });
      }

      this._db = db;
      return db;
    } catch (error) {
      this.logger.error('Failed to initialize database', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  private getDatabasePath(): string {
    const dbFile = this.config.get<string>('database.path', 'toolbridge.db');

    if (dbFile === ':memory:' || path.isAbsolute(dbFile)) {
      return dbFile;
    }

    return path.join(this.config.dataPath, dbFile);
  }
}

function ensureDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}
