/* tests/helpers.ts */
import type { RawQueryResult } from '@wikireplica/core';
import type { ConnectionTarget, Engine, EngineConnection, EngineFactory } from '@wikireplica/replica';

export type Responder = (sql: string, parameters: readonly unknown[]) => RawQueryResult | Error;

export interface FakeEngineOptions {
  acquireError?: Error;
  commitError?: Error;
  rollbackError?: Error;
}

/** In-process stand-in for a mysql2 pool: records every step of every lease. */
export class FakeEngine implements Engine {
  readonly events: string[] = [];
  readonly calls: Array<{ sql: string; parameters: readonly unknown[] }> = [];
  ended = false;

  constructor(private readonly respond: Responder, private readonly opts: FakeEngineOptions = {}) {}

  async acquire(): Promise<EngineConnection> {
    if (this.opts.acquireError) throw this.opts.acquireError;
    this.events.push('acquire');
    const { events, calls, respond, opts } = this;
    return {
      async begin() { events.push('begin'); },
      async run(sql, parameters) {
        events.push('run');
        calls.push({ sql, parameters });
        const out = respond(sql, parameters);
        if (out instanceof Error) throw out;
        return out;
      },
      async commit() {
        events.push('commit');
        if (opts.commitError) throw opts.commitError;
      },
      async rollback() {
        events.push('rollback');
        if (opts.rollbackError) throw opts.rollbackError;
      },
      release() { events.push('release'); }
    };
  }

  async end() {
    this.ended = true;
  }
}

export function fakeEngineFactory(respond: Responder, opts: FakeEngineOptions = {}) {
  const engines: FakeEngine[] = [];
  const targets: ConnectionTarget[] = [];
  const factory: EngineFactory = async (target) => {
    targets.push(target);
    const engine = new FakeEngine(respond, opts);
    engines.push(engine);
    return engine;
  };
  return { factory, engines, targets };
}

/** Mimics a mysql2 error object. */
export function driverError(code: string, message: string, fatal = false): Error {
  return Object.assign(new Error(message), { code, fatal });
}

export const PAGES_RESULT: RawQueryResult = {
  columns: [
    { name: 'page_id', typeCode: 3 },
    { name: 'page_title', typeCode: 253 }
  ],
  rows: [
    [1, Buffer.from('Foo')],
    [2, Buffer.from('Bar')]
  ]
};
