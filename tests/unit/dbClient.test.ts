import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { openDatabase, resolveDatabasePath, SqliteError, type Db } from '../../src/db/client.js';
import { EnclaveRepository } from '../../src/repositories/enclaveRepository.js';
import { ConflictError } from '../../src/repositories/errors.js';

const opened: Db[] = [];
const dirs: string[] = [];

function tempDbUrl(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nhi-db-'));
  dirs.push(dir);
  return `file:${path.join(dir, 'nested', 'inventory.db')}`;
}

function open(url: string): Db {
  const db = openDatabase(url);
  opened.push(db);
  return db;
}

afterEach(() => {
  for (const db of opened.splice(0)) db.close();
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('resolveDatabasePath', () => {
  it('maps file urls to paths and keeps memory databases', () => {
    expect(resolveDatabasePath('file::memory:')).toBe(':memory:');
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
    expect(resolveDatabasePath('file:/var/lib/nhi.db')).toBe('/var/lib/nhi.db');
    expect(resolveDatabasePath('file:./data/nhi.db')).toBe(path.resolve(process.cwd(), 'data/nhi.db'));
  });
});

describe('Db', () => {
  it('binds named parameters from plain object keys', () => {
    const db = open(':memory:');
    db.prepare('CREATE TABLE t (a TEXT, b INTEGER)').run();
    const result = db.prepare('INSERT INTO t (a, b) VALUES (@a, @b)').run({ a: 'x', b: 2 });
    expect(result.changes).toBe(1);
    expect(db.prepare('SELECT a, b FROM t WHERE a = ?').get('x')).toEqual({ a: 'x', b: 2 });
    expect(db.prepare('SELECT a FROM t WHERE a = ?').get('missing')).toBeUndefined();
  });

  it('reports zero changes when a conditional write matches nothing', () => {
    const db = open(':memory:');
    db.prepare('CREATE TABLE t (a TEXT)').run();
    expect(db.prepare('UPDATE t SET a = ? WHERE a = ?').run('y', 'x').changes).toBe(0);
    expect(db.prepare('INSERT INTO t (a) SELECT ? WHERE 1 = 0').run('x').changes).toBe(0);
  });

  it('raises unique violations with a constraint code', () => {
    const db = open(':memory:');
    db.prepare('CREATE TABLE t (a TEXT UNIQUE)').run();
    db.prepare('INSERT INTO t (a) VALUES (?)').run('x');
    let caught: unknown;
    try {
      db.prepare('INSERT INTO t (a) VALUES (?)').run('x');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SqliteError);
    expect(caught).toMatchObject({ code: 'SQLITE_CONSTRAINT_UNIQUE' });
  });

  it('rolls back a transaction that throws', () => {
    const db = open(':memory:');
    db.prepare('CREATE TABLE t (a TEXT)').run();
    expect(() =>
      db.transaction(() => {
        db.prepare('INSERT INTO t (a) VALUES (?)').run('x');
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(db.prepare('SELECT COUNT(*) AS n FROM t').get()).toEqual({ n: 0 });
  });

  it('enforces foreign keys', () => {
    const db = open(':memory:');
    expect(() =>
      db
        .prepare(
          `INSERT INTO connectors (id, enclave_id, type, name, config_json, enabled, created_at, updated_at)
           VALUES ('c1', 'no-such-enclave', 'adcs_file', 'c', '{}', 1, 'now', 'now')`,
        )
        .run(),
    ).toThrow('FOREIGN KEY constraint failed');
  });

  it('persists file-backed databases across reopen', async () => {
    const url = tempDbUrl();
    const first = openDatabase(url);
    const created = await new EnclaveRepository(first).create({ name: 'prod' });
    first.close();

    const second = open(url);
    const enclaves = new EnclaveRepository(second);
    expect((await enclaves.get(created.id)).name).toBe('prod');
    await expect(enclaves.create({ name: 'prod' })).rejects.toBeInstanceOf(ConflictError);
  });
});
