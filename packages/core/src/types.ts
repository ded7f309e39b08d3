// packages/core/src/types.ts

// --------------------
// Semantic column types
// --------------------
export type SemanticType =
  | 'int64'
  | 'float64'
  | 'decimal'
  | 'date'
  | 'datetime'
  | 'string'
  | 'binary'
  | 'null'
  | 'unknown';

// Resolves driver codes that are used for both text and binary columns.
export type StringMode = 'string' | 'binary' | 'guess';

export interface CellByType {
  int64: bigint;
  float64: number;
  decimal: string;
  date: Date;
  datetime: Date;
  string: string;
  binary: Buffer;
  null: null;
  unknown: unknown;
}

export type Cell<T extends SemanticType = SemanticType> = CellByType[T] | null;

export type SchemaOverrides = Readonly<Record<string, SemanticType>>;

// --------------------
// Identity
// --------------------
export interface Identity {
  project: string;
  extension: string | null;
}

// Anything that can name its project database, e.g. a bot framework site object.
export interface SiteLike {
  dbName(): string;
}

// --------------------
// Raw results
// --------------------
export interface ColumnDescriptor {
  name: string;
  typeCode: number;
}

export interface RawQueryResult {
  columns: ColumnDescriptor[];
  rows: unknown[][];
}
