// packages/tables/src/index.ts
import { z } from 'zod';
import { SchemaError, SemanticTypeEnum } from '@wikireplica/core';
import type { SchemaOverrides, SemanticType } from '@wikireplica/core';
import rawTables from '../data/mediawiki-tables.json';

export * from './mediawiki';

const TableDescriptorSchema = z.object({
  primaryKey: z.array(z.string()).min(1),
  columns: z.record(z.string(), SemanticTypeEnum)
}).strict();

const TablesFileSchema = z.object({
  tables: z.record(z.string(), TableDescriptorSchema)
}).strict();

export interface TableDescriptor {
  name: string;
  primaryKey: readonly string[];
  columns: ReadonlyArray<{ name: string; type: SemanticType }>;
}

const descriptors: ReadonlyMap<string, TableDescriptor> = new Map(
  Object.entries(TablesFileSchema.parse(rawTables).tables).map(([name, t]) => [
    name,
    {
      name,
      primaryKey: t.primaryKey,
      columns: Object.entries(t.columns).map(([column, type]) => ({ name: column, type }))
    }
  ])
);

export function tableNames(): string[] {
  return [...descriptors.keys()];
}

export function hasTable(name: string): boolean {
  return descriptors.has(name);
}

export function getTable(name: string): TableDescriptor {
  const table = descriptors.get(name);
  if (!table) throw new SchemaError(`Unknown table: ${name}`);
  return table;
}

/**
 * Column types of the given tables as materializer overrides. Useful for raw
 * SQL, whose text columns otherwise come back in binary mode. Later tables
 * win when two declare the same column name.
 */
export function schemaOverridesFor(...tables: string[]): SchemaOverrides {
  const out: Record<string, SemanticType> = {};
  for (const name of tables) {
    for (const col of getTable(name).columns) out[col.name] = col.type;
  }
  return out;
}
