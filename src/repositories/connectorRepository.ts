import { randomUUID } from 'crypto';
import { getDb, type Db, type Row } from '../db/client.js';
import {
  isConnectorType,
  isJobStatus,
  type Connector,
  type ConnectorType,
  type JobStatus,
} from '../core/types.js';
import { NotFoundError, RepositoryError, wrapStorageError } from './errors.js';
import { int, parseJsonObject, text, textOrNull, toDate, toDateOrNull } from './rows.js';

type ConnectorRow = {
  id: string;
  enclave_id: string;
  type: string;
  name: string;
  config_json: string;
  cron_expression: string | null;
  enabled: number;
  last_run_at: string | null;
  last_run_status: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
};

function map(row: Row): Connector {
  const id = text(row, 'id');
  const type = text(row, 'type');
  if (!isConnectorType(type)) {
    throw new RepositoryError(`Connector ${id} has unknown type ${type}`);
  }
  const status = textOrNull(row, 'last_run_status');
  return {
    id,
    enclaveId: text(row, 'enclave_id'),
    type,
    name: text(row, 'name'),
    config: parseJsonObject(text(row, 'config_json')),
    cronExpression: textOrNull(row, 'cron_expression'),
    enabled: int(row, 'enabled') === 1,
    lastRunAt: toDateOrNull(textOrNull(row, 'last_run_at')),
    lastRunStatus: status !== null && isJobStatus(status) ? status : null,
    createdAt: toDate(text(row, 'created_at')),
    updatedAt: toDate(text(row, 'updated_at')),
    deletedAt: toDateOrNull(textOrNull(row, 'deleted_at')),
  };
}

export interface CreateConnectorInput {
  enclaveId: string;
  type: ConnectorType;
  name: string;
  config: Record<string, unknown>;
  cronExpression?: string | null;
  enabled?: boolean;
}

export interface UpdateConnectorInput {
  name?: string;
  config?: Record<string, unknown>;
  cronExpression?: string | null;
  enabled?: boolean;
}

export class ConnectorRepository {
  constructor(private readonly db: Db = getDb()) {}

  async create(data: CreateConnectorInput): Promise<Connector> {
    const now = new Date().toISOString();
    const row: ConnectorRow = {
      id: randomUUID(),
      enclave_id: data.enclaveId,
      type: data.type,
      name: data.name,
      config_json: JSON.stringify(data.config),
      cron_expression: data.cronExpression ?? null,
      enabled: data.enabled === false ? 0 : 1,
      last_run_at: null,
      last_run_status: null,
      created_at: now,
      updated_at: now,
      deleted_at: null,
    };
    try {
      this.db
        .prepare(
          `INSERT INTO connectors (id, enclave_id, type, name, config_json, cron_expression, enabled,
             last_run_at, last_run_status, created_at, updated_at, deleted_at)
           VALUES (@id, @enclave_id, @type, @name, @config_json, @cron_expression, @enabled,
             @last_run_at, @last_run_status, @created_at, @updated_at, @deleted_at)`,
        )
        .run(row);
      return map(row);
    } catch (err) {
      throw wrapStorageError('Failed to create connector', err);
    }
  }

  /** Soft-deleted connectors are reported as not found unless includeDeleted is set. */
  async get(id: string, opts: { includeDeleted?: boolean } = {}): Promise<Connector> {
    try {
      const row = this.db
        .prepare('SELECT * FROM connectors WHERE id = ?')
        .get(id);
      if (!row || (textOrNull(row, 'deleted_at') !== null && !opts.includeDeleted)) {
        throw new NotFoundError(`Connector ${id} not found`);
      }
      return map(row);
    } catch (err) {
      throw wrapStorageError(`Failed to get connector ${id}`, err);
    }
  }

  async listByEnclave(enclaveId: string): Promise<Connector[]> {
    try {
      const rows = this.db
        .prepare(
          'SELECT * FROM connectors WHERE enclave_id = ? AND deleted_at IS NULL ORDER BY name ASC',
        )
        .all(enclaveId);
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError(`Failed to list connectors for enclave ${enclaveId}`, err);
    }
  }

  /** Enabled, live connectors carrying a cron expression. */
  async listScheduled(): Promise<Connector[]> {
    try {
      const rows = this.db
        .prepare(
          `SELECT * FROM connectors
           WHERE deleted_at IS NULL AND enabled = 1 AND cron_expression IS NOT NULL
           ORDER BY created_at ASC`,
        )
        .all();
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError('Failed to list scheduled connectors', err);
    }
  }

  async update(id: string, data: UpdateConnectorInput): Promise<Connector> {
    const current = await this.get(id);
    const next = {
      id,
      name: data.name ?? current.name,
      config_json: JSON.stringify(data.config ?? current.config),
      cron_expression: data.cronExpression === undefined ? current.cronExpression : data.cronExpression,
      enabled: (data.enabled ?? current.enabled) ? 1 : 0,
      updated_at: new Date().toISOString(),
    };
    try {
      this.db
        .prepare(
          `UPDATE connectors SET name = @name, config_json = @config_json, cron_expression = @cron_expression,
             enabled = @enabled, updated_at = @updated_at
           WHERE id = @id AND deleted_at IS NULL`,
        )
        .run(next);
      return this.get(id);
    } catch (err) {
      throw wrapStorageError(`Failed to update connector ${id}`, err);
    }
  }

  /**
   * Soft delete: the connector is hidden and disabled, its jobs, findings and
   * the identities they produced stay in place.
   */
  async softDelete(id: string): Promise<void> {
    const now = new Date().toISOString();
    try {
      const result = this.db
        .prepare(
          'UPDATE connectors SET deleted_at = ?, enabled = 0, updated_at = ? WHERE id = ? AND deleted_at IS NULL',
        )
        .run(now, now, id);
      if (result.changes === 0) throw new NotFoundError(`Connector ${id} not found`);
    } catch (err) {
      throw wrapStorageError(`Failed to delete connector ${id}`, err);
    }
  }

  async recordRun(id: string, at: Date, status: JobStatus): Promise<void> {
    try {
      this.db
        .prepare('UPDATE connectors SET last_run_at = ?, last_run_status = ? WHERE id = ?')
        .run(at.toISOString(), status, id);
    } catch (err) {
      throw wrapStorageError(`Failed to record run for connector ${id}`, err);
    }
  }
}
