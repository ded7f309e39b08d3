// packages/replica/src/materialize.ts
import { SchemaError, silentLogger } from '@wikireplica/core';
import type {
  Cell,
  Logger,
  RawQueryResult,
  SchemaOverrides,
  SemanticType,
  StringMode
} from '@wikireplica/core';
import { isKnownTypeCode, mapType } from './type-map';
import { TypedTable } from './typed-table';
import type { TypedColumn } from './typed-table';

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

class CastError extends Error {}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return undefined;
}

/** Coerce one driver value into the representation of `type`. Throws CastError. */
export function castCell(value: unknown, type: SemanticType): Cell {
  if (value === null || value === undefined) return null;

  switch (type) {
    case 'unknown':
      return value;

    case 'null':
      throw new CastError('expected only nulls');

    case 'int64': {
      if (typeof value === 'bigint') return value;
      if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
      if (typeof value === 'boolean') return value ? 1n : 0n;
      const text = asText(value)?.trim();
      if (text !== undefined && INTEGER_TEXT.test(text)) return BigInt(text);
      break;
    }

    case 'float64': {
      if (typeof value === 'number') return value;
      if (typeof value === 'bigint') return Number(value);
      const text = asText(value)?.trim();
      if (text !== undefined && text !== '' && !Number.isNaN(Number(text))) return Number(text);
      break;
    }

    case 'decimal': {
      if (typeof value === 'number' && Number.isFinite(value)) return String(value);
      if (typeof value === 'bigint') return value.toString();
      const text = asText(value)?.trim();
      if (text !== undefined && DECIMAL_TEXT.test(text)) return text;
      break;
    }

    case 'date':
    case 'datetime': {
      if (value instanceof Date) {
        if (!Number.isNaN(value.getTime())) return value;
        break;
      }
      const text = asText(value);
      if (text !== undefined) {
        const d = new Date(text);
        if (!Number.isNaN(d.getTime())) return d;
      }
      break;
    }

    case 'string': {
      const text = asText(value);
      if (text !== undefined) return text;
      if (typeof value === 'number' || typeof value === 'bigint') return String(value);
      break;
    }

    case 'binary': {
      if (Buffer.isBuffer(value)) return value;
      if (value instanceof Uint8Array) return Buffer.from(value);
      if (typeof value === 'string') return Buffer.from(value, 'utf8');
      break;
    }
  }
  throw new CastError(`cannot read ${describeValue(value)} as ${type}`);
}

function describeValue(value: unknown): string {
  if (Buffer.isBuffer(value)) return `a ${value.length}-byte buffer`;
  if (value instanceof Date) return 'an invalid date';
  return `${typeof value} ${JSON.stringify(String(value))}`;
}

/**
 * Build a typed table from driver rows. Overrides win over the mapped type of
 * every column with that name; row arity must match the column count.
 */
export function materialize(
  raw: RawQueryResult,
  mode: StringMode,
  overrides?: SchemaOverrides | null,
  logger: Logger = silentLogger
): TypedTable {
  const width = raw.columns.length;

  const types: SemanticType[] = raw.columns.map((c) => {
    const override = overrides?.[c.name];
    if (override !== undefined) return override;
    if (!isKnownTypeCode(c.typeCode)) {
      logger.debug({ column: c.name, typeCode: c.typeCode }, 'unknown-type-code');
    }
    return mapType(c.typeCode, mode);
  });

  const cells: Cell[][] = raw.columns.map(() => []);

  raw.rows.forEach((row, i) => {
    if (row.length !== width) {
      throw new SchemaError(`Row ${i} has ${row.length} values but the result has ${width} columns`);
    }
    row.forEach((value, j) => {
      try {
        cells[j].push(castCell(value, types[j]));
      } catch (e) {
        if (!(e instanceof CastError)) throw e;
        throw new SchemaError(`Column "${raw.columns[j].name}" (#${j}), row ${i}: ${e.message}`);
      }
    });
  });

  const columns: TypedColumn[] = raw.columns.map((c, j) => ({
    name: c.name,
    type: types[j],
    values: cells[j]
  }));
  return new TypedTable(columns, raw.rows.length);
}
