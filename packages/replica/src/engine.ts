// packages/replica/src/engine.ts
import mysql from 'mysql2/promise';
import type { Pool } from 'mysql2/promise';
import { StatementError } from '@wikireplica/core';
import type { RawQueryResult } from '@wikireplica/core';
import { readCredentials } from './credentials';

// --------------------
// Connection target
// --------------------
export interface ConnectionTarget {
  host: string;
  port: number;
  database: string;
  charset: 'utf8';
  credentialsFile: string;
}

// Credentials stay out of the URI; they come from the credentials file.
export function connectionUri(t: ConnectionTarget): string {
  const params = new URLSearchParams({ charset: t.charset, read_default_file: t.credentialsFile });
  return `mysql://${t.host}:${t.port}/${t.database}?${params.toString()}`;
}

// --------------------
// Engine seam (mysql2 in production, fakes in tests)
// --------------------
export interface EngineConnection {
  /** Opens a read-only transaction. */
  begin(): Promise<void>;
  run(sql: string, parameters: readonly unknown[]): Promise<RawQueryResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface Engine {
  acquire(): Promise<EngineConnection>;
  end(): Promise<void>;
}

export type EngineFactory = (target: ConnectionTarget) => Engine | Promise<Engine>;

// --------------------
// mysql2
// --------------------
const UNKNOWN_TYPE_CODE = -1;

// The parts of mysql2's FieldPacket and PoolConnection used here.
interface DriverField {
  name: string;
  columnType?: number;
  type?: number;
}

interface DriverConnection {
  query(options: { sql: string; values?: unknown[]; rowsAsArray?: boolean }): Promise<[unknown, DriverField[] | undefined]>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

function typeCodeOf(field: DriverField): number {
  if (typeof field.columnType === 'number') return field.columnType;
  if (typeof field.type === 'number') return field.type;
  return UNKNOWN_TYPE_CODE;
}

class MysqlEngineConnection implements EngineConnection {
  constructor(private readonly conn: DriverConnection) {}

  async begin() {
    await this.conn.query({ sql: 'START TRANSACTION READ ONLY' });
  }

  async run(sql: string, parameters: readonly unknown[]): Promise<RawQueryResult> {
    // rowsAsArray keeps same-named columns apart
    const [rows, fields] = await this.conn.query({ sql, values: [...parameters], rowsAsArray: true });
    if (!Array.isArray(rows) || !Array.isArray(fields)) {
      throw new StatementError('Statement did not return a result set');
    }
    const tuples: unknown[][] = [];
    for (const r of rows) {
      if (!Array.isArray(r)) throw new StatementError('Statement returned more than one result set');
      tuples.push([...r]);
    }
    return {
      columns: fields.map((f) => ({ name: f.name, typeCode: typeCodeOf(f) })),
      rows: tuples
    };
  }

  async commit() {
    await this.conn.commit();
  }

  async rollback() {
    await this.conn.rollback();
  }

  release() {
    this.conn.release();
  }
}

class MysqlEngine implements Engine {
  constructor(private readonly pool: Pool) {}

  async acquire(): Promise<EngineConnection> {
    return new MysqlEngineConnection(await this.pool.getConnection());
  }

  async end() {
    await this.pool.end();
  }
}

export function createMysqlEngineFactory(opts: { poolSize: number }): EngineFactory {
  return async (target) => {
    const { user, password } = await readCredentials(target.credentialsFile);
    const pool = mysql.createPool({
      host: target.host,
      port: target.port,
      database: target.database,
      charset: target.charset,
      user,
      password,
      connectionLimit: opts.poolSize,
      supportBigNumbers: true,
      bigNumberStrings: true,
      // replicas store UTC; read DATE/DATETIME without shifting to the host zone
      timezone: 'Z'
    });
    return new MysqlEngine(pool);
  };
}
