// packages/replica/src/database.ts
import { mapDriverError } from '@wikireplica/core';
import type {
  Identity,
  Logger,
  RawQueryResult,
  SchemaOverrides,
  StringMode
} from '@wikireplica/core';
import type { ConnectionTarget, Engine, EngineFactory } from './engine';
import { materialize } from './materialize';
import { compileStatement, defaultStringMode } from './statement';
import type { Statement } from './statement';
import type { TypedTable } from './typed-table';

export interface FetchOptions {
  /** Defaults to 'string' for builder-made selects and 'binary' otherwise. */
  mode?: StringMode;
  schemaOverrides?: SchemaOverrides;
}

export function hostDescriptor(identity: Identity): string {
  return identity.extension ? `${identity.extension}.${identity.project}` : identity.project;
}

/**
 * One project (or project extension) database. Obtain through
 * `ReplicaRegistry.getOrCreate`, which keeps a single instance per identity.
 */
export class ReplicaDatabase {
  readonly project: string;
  readonly extension: string | null;
  readonly host: string;
  readonly target: ConnectionTarget;

  private engine: Promise<Engine> | null = null;

  constructor(
    identity: Identity,
    target: ConnectionTarget,
    private readonly createEngine: EngineFactory,
    private readonly logger: Logger
  ) {
    this.project = identity.project;
    this.extension = identity.extension;
    this.host = hostDescriptor(identity);
    this.target = target;
  }

  get identity(): Identity {
    return { project: this.project, extension: this.extension };
  }

  // Built on first use; concurrent first callers share the same promise.
  private getEngine(): Promise<Engine> {
    if (!this.engine) {
      this.logger.info({ host: this.target.host, database: this.target.database }, 'engine-create');
      const pending = Promise.resolve()
        .then(() => this.createEngine(this.target))
        .catch((err: unknown) => {
          // not cached, so a later call tries again
          if (this.engine === pending) this.engine = null;
          throw mapDriverError(err, this.identity);
        });
      this.engine = pending;
    }
    return this.engine;
  }

  /**
   * Run one statement in its own read-only transaction and return the
   * driver's column metadata and every row. The connection is released on
   * every path; a failed statement is rolled back.
   */
  async executeRaw(stmt: Statement): Promise<RawQueryResult> {
    const compiled = compileStatement(stmt);
    const engine = await this.getEngine();
    const t0 = Date.now();

    const conn = await engine.acquire().catch((err: unknown) => {
      throw mapDriverError(err, this.identity);
    });

    try {
      await conn.begin();
      const result = await conn.run(compiled.sql, compiled.parameters);
      await conn.commit();
      this.logger.debug(
        { host: this.host, sql: compiled.sql, rowCount: result.rows.length, ms: Date.now() - t0 },
        'statement'
      );
      return result;
    } catch (err) {
      try {
        await conn.rollback();
      } catch (rollbackErr) {
        this.logger.warn({ host: this.host, err: rollbackErr }, 'rollback-failed');
      }
      throw mapDriverError(err, this.identity);
    } finally {
      conn.release();
    }
  }

  async fetch(stmt: Statement, opts: FetchOptions = {}): Promise<TypedTable> {
    const mode = opts.mode ?? defaultStringMode(compileStatement(stmt));
    const raw = await this.executeRaw(stmt);
    return materialize(raw, mode, opts.schemaOverrides, this.logger);
  }

  async end(): Promise<void> {
    const pending = this.engine;
    if (!pending) return;
    this.engine = null;
    // a creation that failed has already been reported to its caller
    const engine = await pending.catch(() => null);
    await engine?.end();
  }
}
