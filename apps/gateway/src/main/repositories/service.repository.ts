import { injectable, inject } from 'inversify';
import { TYPES } from '@main/core/types';
import type { IServiceRepository, IDatabase, McpService } from '@main/core/interfaces';
import { StringArraySchema, ToolStatesSchema } from '@main/validation/service-schemas';

/**
 * Database row type for the services table.
 */
interface ServiceRow {
  id: string;
  name: string;
  endpoint: string;
  command: string;
  args: string;
  transport: string;
  auth_token: string | null;
  enabled: number;
  tool_states: string;
  updated_at: number;
}

/**
 * MCP service repository for SQLite persistence.
 */
@injectable()
export class ServiceRepository implements IServiceRepository {
  constructor(@inject(TYPES.Database) private database: IDatabase) {}

  async findAll(): Promise<McpService[]> {
    const rows = this.database.db
      .prepare<[], ServiceRow>('SELECT * FROM services ORDER BY created_at ASC, rowid ASC')
      .all();
    return rows.map((row) => this.mapRowToService(row));
  }

  async findById(id: string): Promise<McpService | null> {
    const row = this.database.db
      .prepare<[string], ServiceRow>('SELECT * FROM services WHERE id = ?')
      .get(id);

    return row ? this.mapRowToService(row) : null;
  }

  async create(service: McpService): Promise<McpService> {
    this.database.db
      .prepare(
        `
      INSERT INTO services (
        id, name, endpoint, command, args, transport,
        auth_token, enabled, tool_states, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        service.id,
        service.name,
        service.endpoint,
        service.command,
        JSON.stringify(service.args),
        service.transport,
        service.authToken ?? null,
        service.enabled ? 1 : 0,
        JSON.stringify(service.toolStates),
        service.updatedAt
      );

    return service;
  }

  async update(service: McpService): Promise<McpService> {
    this.database.db
      .prepare(
        `
      UPDATE services SET
        name = ?,
        endpoint = ?,
        command = ?,
        args = ?,
        transport = ?,
        auth_token = ?,
        enabled = ?,
        tool_states = ?,
        updated_at = ?
      WHERE id = ?
    `
      )
      .run(
        service.name,
        service.endpoint,
        service.command,
        JSON.stringify(service.args),
        service.transport,
        service.authToken ?? null,
        service.enabled ? 1 : 0,
        JSON.stringify(service.toolStates),
        service.updatedAt,
        service.id
      );

    return service;
  }

  async delete(id: string): Promise<void> {
    this.database.db.prepare('DELETE FROM services WHERE id = ?').run(id);
  }

  private mapRowToService(row: ServiceRow): McpService {
    return {
      id: row.id,
      name: row.name,
      endpoint: row.endpoint,
      command: row.command,
      args: StringArraySchema.parse(JSON.parse(row.args)),
      transport: row.transport,
      authToken: row.auth_token ?? undefined,
      enabled: row.enabled === 1,
      toolStates: ToolStatesSchema.parse(JSON.parse(row.tool_states)),
      updatedAt: row.updated_at,
    };
  }
}
