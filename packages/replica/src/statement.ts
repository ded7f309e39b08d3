// packages/replica/src/statement.ts
import { CompiledQuery } from 'kysely';
import type { Compilable, RawBuilder } from 'kysely';
import type { StringMode } from '@wikireplica/core';
import { mediawiki } from '@wikireplica/tables';

// A query builder (select, union, ...), a `sql` template, or literal SQL text.
export type Statement = string | Compilable<unknown> | RawBuilder<unknown>;

function isRawBuilder(stmt: Compilable<unknown> | RawBuilder<unknown>): stmt is RawBuilder<unknown> {
  return 'isRawBuilder' in stmt && stmt.isRawBuilder === true;
}

export function compileStatement(stmt: Statement): CompiledQuery<unknown> {
  if (typeof stmt === 'string') return CompiledQuery.raw(stmt);
  // raw templates compile against a dialect; the replica one is MySQL
  if (isRawBuilder(stmt)) return stmt.compile(mediawiki);
  return stmt.compile();
}

/**
 * Builder-made selects carry their column typing, so text comes back as
 * strings. Anything else may touch binary columns and stays binary.
 */
export function defaultStringMode(compiled: CompiledQuery<unknown>): StringMode {
  return compiled.query.kind === 'SelectQueryNode' ? 'string' : 'binary';
}
