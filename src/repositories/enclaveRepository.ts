import { randomUUID } from 'crypto';
import { getDb, type Db, type Row } from '../db/client.js';
import type { Enclave } from '../core/types.js';
import { ConflictError, NotFoundError, isUniqueViolation, wrapStorageError } from './errors.js';
import { text, textOrNull, toDate } from './rows.js';

type EnclaveRow = {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
};

function map(row: Row): Enclave {
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    description: textOrNull(row, 'description'),
    createdAt: toDate(text(row, 'created_at')),
    updatedAt: toDate(text(row, 'updated_at')),
  };
}

export interface CreateEnclaveInput {
  name: string;
  description?: string | null;
}

export interface UpdateEnclaveInput {
  name?: string;
  description?: string | null;
}

export class EnclaveRepository {
  constructor(private readonly db: Db = getDb()) {}

  async create(data: CreateEnclaveInput): Promise<Enclave> {
    const now = new Date().toISOString();
    const row: EnclaveRow = {
      id: randomUUID(),
      name: data.name,
      description: data.description ?? null,
      created_at: now,
      updated_at: now,
    };
    try {
      this.db
        .prepare(
          `INSERT INTO enclaves (id, name, description, created_at, updated_at)
           VALUES (@id, @name, @description, @created_at, @updated_at)`,
        )
        .run(row);
      return map(row);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`Enclave name ${data.name} already exists`);
      throw wrapStorageError('Failed to create enclave', err);
    }
  }

  async get(id: string): Promise<Enclave> {
    try {
      const row = this.db
        .prepare('SELECT * FROM enclaves WHERE id = ?')
        .get(id);
      if (!row) throw new NotFoundError(`Enclave ${id} not found`);
      return map(row);
    } catch (err) {
      throw wrapStorageError(`Failed to get enclave ${id}`, err);
    }
  }

  async list(): Promise<Enclave[]> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM enclaves ORDER BY name ASC')
        .all();
      return rows.map(map);
    } catch (err) {
      throw wrapStorageError('Failed to list enclaves', err);
    }
  }

  async update(id: string, data: UpdateEnclaveInput): Promise<Enclave> {
    const current = await this.get(id);
    const next = {
      id,
      name: data.name ?? current.name,
      description: data.description === undefined ? current.description : data.description,
      updated_at: new Date().toISOString(),
    };
    try {
      this.db
        .prepare(
          'UPDATE enclaves SET name = @name, description = @description, updated_at = @updated_at WHERE id = @id',
        )
        .run(next);
      return this.get(id);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`Enclave name ${next.name} already exists`);
      throw wrapStorageError(`Failed to update enclave ${id}`, err);
    }
  }

  /** Deletes the enclave; connectors, jobs, findings and identities cascade with it. */
  async delete(id: string): Promise<void> {
    try {
      const result = this.db.prepare('DELETE FROM enclaves WHERE id = ?').run(id);
      if (result.changes === 0) throw new NotFoundError(`Enclave ${id} not found`);
    } catch (err) {
      throw wrapStorageError(`Failed to delete enclave ${id}`, err);
    }
  }
}
