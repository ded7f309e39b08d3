// packages/replica/src/registry.ts
import { createConsoleLogger, loadConfig } from '@wikireplica/core';
import type { Identity, Logger, ReplicaConfig, SiteLike } from '@wikireplica/core';
import { ReplicaDatabase, hostDescriptor } from './database';
import { createMysqlEngineFactory } from './engine';
import type { ConnectionTarget, EngineFactory } from './engine';

export interface ReplicaRegistryOptions {
  config?: ReplicaConfig;
  /** Replaces the mysql2 engine, e.g. with an in-process fake. */
  createEngine?: EngineFactory;
  logger?: Logger;
}

function identityKey(i: Identity): string {
  return JSON.stringify([i.project, i.extension]);
}

/**
 * Owns one `ReplicaDatabase` per (project, extension). Entries live as long as
 * the registry; the identity space is the farm's known databases. Pass the
 * registry to whatever needs a database instead of reaching for a global.
 */
export class ReplicaRegistry {
  private readonly config: ReplicaConfig;
  private readonly createEngine: EngineFactory;
  private readonly logger: Logger;
  private readonly databases = new Map<string, ReplicaDatabase>();

  constructor(opts: ReplicaRegistryOptions = {}) {
    this.config = opts.config ?? loadConfig();
    this.createEngine = opts.createEngine ?? createMysqlEngineFactory({ poolSize: this.config.poolSize });
    this.logger = opts.logger ?? createConsoleLogger('replica', this.config.logLevel);
  }

  get size(): number {
    return this.databases.size;
  }

  targetFor(identity: Identity): ConnectionTarget {
    return {
      host: `${hostDescriptor(identity)}.${this.config.domainSuffix}`,
      port: this.config.port,
      database: `${identity.project}_p`,
      charset: 'utf8',
      credentialsFile: this.config.credentialsFile
    };
  }

  // Check-and-insert runs without an await in between, so it cannot interleave.
  getOrCreate(project: string, extension: string | null = null): ReplicaDatabase {
    // '' addresses the same host as no extension
    const identity: Identity = { project, extension: extension || null };
    const key = identityKey(identity);
    let db = this.databases.get(key);
    if (!db) {
      db = new ReplicaDatabase(identity, this.targetFor(identity), this.createEngine, this.logger);
      this.databases.set(key, db);
    }
    return db;
  }

  fromSite(site: SiteLike, extension: string | null = null): ReplicaDatabase {
    return this.getOrCreate(site.dbName(), extension);
  }

  /** Ends every engine built so far. Entries stay cached; a later query rebuilds its engine. */
  async end(): Promise<void> {
    await Promise.all([...this.databases.values()].map(db => db.end()));
  }
}
