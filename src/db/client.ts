import sqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlJsStatic, SqlValue, Statement as SqlJsStatement } from 'sql.js';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { SCHEMA_SQL } from './schema.js';

export type SqlParam = string | number | null;
export type Row = Record<string, SqlValue>;
/** Positional values, or a single object whose keys match `@name` placeholders. */
export type BindArg = SqlParam | Record<string, SqlParam>;

export interface RunResult {
  changes: number;
}

/** Driver failure carrying a SQLite-style result code derived from the message. */
export class SqliteError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = 'SqliteError';
  }
}

function resultCode(message: string): string {
  if (message.includes('UNIQUE constraint failed')) return 'SQLITE_CONSTRAINT_UNIQUE';
  if (message.includes('FOREIGN KEY constraint failed')) return 'SQLITE_CONSTRAINT_FOREIGNKEY';
  if (message.includes('constraint failed')) return 'SQLITE_CONSTRAINT';
  return 'SQLITE_ERROR';
}

function toSqliteError(err: unknown): SqliteError {
  if (err instanceof SqliteError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SqliteError(message, resultCode(message));
}

function toBindParams(args: BindArg[]): SqlParam[] | Record<string, SqlParam> {
  const [first] = args;
  if (args.length === 1 && typeof first === 'object' && first !== null) {
    const named: Record<string, SqlParam> = {};
    for (const [key, value] of Object.entries(first)) named[`@${key}`] = value;
    return named;
  }
  return args.map((arg) => {
    if (typeof arg === 'object' && arg !== null) {
      throw new TypeError('Named parameters must be passed as the only argument');
    }
    return arg;
  });
}

export class Statement {
  constructor(
    private readonly db: Db,
    private readonly sql: string,
  ) {}

  run(...args: BindArg[]): RunResult {
    const changes = this.db.withStatement(this.sql, args, (stmt, handle) => {
      stmt.step();
      return handle.getRowsModified();
    });
    if (changes > 0) this.db.markWritten();
    return { changes };
  }

  get(...args: BindArg[]): Row | undefined {
    return this.db.withStatement(this.sql, args, (stmt) => (stmt.step() ? stmt.getAsObject() : undefined));
  }

  all(...args: BindArg[]): Row[] {
    return this.db.withStatement(this.sql, args, (stmt) => {
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    });
  }
}

/**
 * SQLite connection over the sql.js WebAssembly build. File-backed databases
 * are loaded into memory on open and written back after every committed write.
 */
export class Db {
  private inTransaction = false;
  private dirty = false;

  constructor(
    private readonly handle: SqlJsDatabase,
    readonly file: string | null,
  ) {}

  prepare(sql: string): Statement {
    return new Statement(this, sql);
  }

  exec(sql: string): void {
    this.execRaw(sql);
    this.markWritten();
  }

  /** Runs fn between BEGIN and COMMIT, rolling back when it throws. Nested calls join the outer one. */
  transaction<T>(fn: () => T): T {
    if (this.inTransaction) return fn();
    this.execRaw('BEGIN');
    this.inTransaction = true;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.inTransaction = false;
      this.dirty = false;
      this.execRaw('ROLLBACK');
      throw err;
    }
    this.inTransaction = false;
    this.execRaw('COMMIT');
    this.flush();
    return result;
  }

  withStatement<T>(sql: string, args: BindArg[], fn: (stmt: SqlJsStatement, handle: SqlJsDatabase) => T): T {
    let stmt: SqlJsStatement | undefined;
    try {
      stmt = this.handle.prepare(sql);
      stmt.bind(toBindParams(args));
      return fn(stmt, this.handle);
    } catch (err) {
      if (err instanceof TypeError) throw err;
      throw toSqliteError(err);
    } finally {
      stmt?.free();
    }
  }

  private execRaw(sql: string): void {
    try {
      this.handle.exec(sql);
    } catch (err) {
      throw toSqliteError(err);
    }
  }

  markWritten(): void {
    this.dirty = true;
    if (!this.inTransaction) this.flush();
  }

  close(): void {
    this.flush();
    this.handle.close();
  }

  private flush(): void {
    if (!this.dirty || this.file === null) return;
    this.dirty = false;
    fs.writeFileSync(this.file, this.handle.export());
    // export() reopens the connection, which resets per-connection pragmas
    this.handle.exec('PRAGMA foreign_keys = ON');
  }
}

let engine: SqlJsStatic | undefined;
let db: Db | undefined;

/** Loads the SQLite WebAssembly module. Must resolve before a database is opened. */
export async function loadSqlEngine(): Promise<void> {
  if (!engine) {
    engine = await sqlJs.default();
  }
}

/** Resolve a `file:` style database url to a filesystem path, or `:memory:`. */
export function resolveDatabasePath(url: string): string {
  const raw = url.startsWith('file:') ? url.slice('file:'.length) : url;
  if (raw === ':memory:' || raw === '') return ':memory:';
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function openDatabase(url: string): Db {
  if (!engine) throw new Error('SQLite engine not loaded; await loadSqlEngine() first');
  const file = resolveDatabasePath(url);
  let handle: SqlJsDatabase;
  if (file === ':memory:') {
    handle = new engine.Database();
  } else {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    handle = new engine.Database(fs.existsSync(file) ? fs.readFileSync(file) : null);
  }
  const conn = new Db(handle, file === ':memory:' ? null : file);
  conn.exec(SCHEMA_SQL);
  return conn;
}

export function getDb(): Db {
  if (!db) {
    const cfg = loadConfig();
    db = openDatabase(cfg.database.url);
    getLogger().debug({ url: cfg.database.url }, 'Database opened');
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
