// packages/query/src/predicates.ts
import { sql } from 'kysely';
import type { RawBuilder, SqlBool } from 'kysely';

// --------------------
// Column identifiers
// --------------------
export interface ColumnRef {
  table: string;
  name: string;
}

export function column(table: string, name: string): ColumnRef {
  return { table, name };
}

// --------------------
// Predicates
// --------------------
export type FilterScalar = string | number | bigint | boolean;

// Anything with a value identity can be a member of an IN list.
export type MemberValue = FilterScalar | Date | Uint8Array | null;

export type Predicate =
  | { op: 'eq'; column: ColumnRef; value: unknown }
  | { op: 'in'; column: ColumnRef; values: readonly MemberValue[] };

// Strings, buffers and dates are single values even though some of them iterate.
function isMultiValued(value: unknown): value is Iterable<unknown> {
  if (typeof value === 'string' || value instanceof Uint8Array || value instanceof Date) return false;
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function isMemberValue(value: unknown): value is MemberValue {
  const t = typeof value;
  return value === null || t === 'string' || t === 'number' || t === 'bigint' || t === 'boolean'
    || value instanceof Date || value instanceof Uint8Array;
}

type Kind = 'bigint' | 'boolean' | 'bytes' | 'date' | 'null' | 'number' | 'string';

function kindOf(v: MemberValue): Kind {
  if (v === null) return 'null';
  if (v instanceof Date) return 'date';
  if (v instanceof Uint8Array) return 'bytes';
  if (typeof v === 'bigint') return 'bigint';
  if (typeof v === 'boolean') return 'boolean';
  if (typeof v === 'number') return 'number';
  return 'string';
}

// equal values share a key: dates by instant, buffers by content
function identityKey(v: MemberValue): string {
  if (v === null) return 'null';
  if (v instanceof Date) return `date:${v.getTime()}`;
  if (v instanceof Uint8Array) return `bytes:${Buffer.from(v).toString('hex')}`;
  return `${typeof v}:${String(v)}`;
}

function order<T extends number | bigint | string>(x: T, y: T): number {
  return x < y ? -1 : x > y ? 1 : 0;
}

function numberOrder(x: number, y: number): number {
  // NaN last, so the order never depends on the input order
  if (Number.isNaN(x) || Number.isNaN(y)) return Number(Number.isNaN(x)) - Number(Number.isNaN(y));
  return order(x, y);
}

// total order across kinds, so equal sets always come out identical
function compareMembers(a: MemberValue, b: MemberValue): number {
  const ka = kindOf(a);
  const kb = kindOf(b);
  if (ka !== kb) return order(ka, kb);
  if (typeof a === 'bigint' && typeof b === 'bigint') return order(a, b);
  if (typeof a === 'number' && typeof b === 'number') return numberOrder(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'string' && typeof b === 'string') return order(a, b);
  if (a instanceof Date && b instanceof Date) return numberOrder(a.getTime(), b.getTime());
  if (a instanceof Uint8Array && b instanceof Uint8Array) return Buffer.compare(a, b);
  return 0;
}

export function buildPredicate(col: ColumnRef, value: unknown): Predicate {
  if (!isMultiValued(value)) return { op: 'eq', column: col, value };

  const items = [...value];
  if (!items.every(isMemberValue)) {
    // no usable identity for the elements; compare against the value as given
    return { op: 'eq', column: col, value };
  }
  const unique = new Map<string, MemberValue>();
  for (const item of items) {
    const key = identityKey(item);
    if (!unique.has(key)) unique.set(key, item);
  }
  const values = [...unique.values()].sort(compareMembers);
  return { op: 'in', column: col, values };
}

export function buildPredicates(
  pairs: Iterable<readonly [ColumnRef, unknown]>
): Predicate[] {
  const out: Predicate[] = [];
  for (const [col, value] of pairs) {
    if (value === null || value === undefined) continue;
    out.push(buildPredicate(col, value));
  }
  return out;
}

export function predicateToSql(p: Predicate): RawBuilder<SqlBool> {
  const ref = sql.ref(`${p.column.table}.${p.column.name}`);
  if (p.op === 'eq') return sql<SqlBool>`${ref} = ${p.value}`;
  if (p.values.length === 0) return sql<SqlBool>`0 = 1`;
  return sql<SqlBool>`${ref} in (${sql.join(p.values)})`;
}
