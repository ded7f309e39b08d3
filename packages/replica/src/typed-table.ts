// packages/replica/src/typed-table.ts
import type { Cell, SemanticType } from '@wikireplica/core';

export interface TypedColumn<T extends SemanticType = SemanticType> {
  name: string;
  type: T;
  values: ReadonlyArray<Cell<T>>;
}

export type JsonCell = string | number | boolean | null;

export interface TypedTableJSON {
  columns: Array<{ name: string; type: SemanticType }>;
  rows: JsonCell[][];
}

export function toJsonCell(value: unknown): JsonCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value) ?? null;
}

/**
 * Column-oriented query result. Columns keep the order the driver reported and
 * may share a name (e.g. two `namespace` columns of a self-join); look those up
 * by position.
 */
export class TypedTable {
  readonly columns: ReadonlyArray<TypedColumn>;
  readonly height: number;

  constructor(columns: ReadonlyArray<TypedColumn>, height: number) {
    this.columns = columns;
    this.height = height;
  }

  get width(): number {
    return this.columns.length;
  }

  get columnNames(): string[] {
    return this.columns.map(c => c.name);
  }

  get schema(): Array<[string, SemanticType]> {
    return this.columns.map(c => [c.name, c.type]);
  }

  /** By position, or the first column with that name. */
  column(key: string | number): TypedColumn | undefined {
    if (typeof key === 'number') return this.columns[key];
    return this.columns.find(c => c.name === key);
  }

  row(i: number): Cell[] {
    if (i < 0 || i >= this.height) throw new RangeError(`row ${i} out of range (height ${this.height})`);
    return this.columns.map(c => c.values[i]);
  }

  rows(): Cell[][] {
    return Array.from({ length: this.height }, (_, i) => this.row(i));
  }

  /** Row objects keyed by column name; a later duplicate name overwrites an earlier one. */
  toRecords(): Array<Record<string, Cell>> {
    return this.rows().map(r => {
      const o: Record<string, Cell> = {};
      this.columns.forEach((c, j) => { o[c.name] = r[j]; });
      return o;
    });
  }

  toJSON(): TypedTableJSON {
    return {
      columns: this.columns.map(c => ({ name: c.name, type: c.type })),
      rows: this.rows().map(r => r.map(toJsonCell))
    };
  }
}
