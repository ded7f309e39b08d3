// packages/core/src/schemas.ts
import { z } from 'zod';

export const SemanticTypeEnum = z.enum([
  'int64', 'float64', 'decimal',
  'date', 'datetime',
  'string', 'binary',
  'null', 'unknown'
]);

export const StringModeEnum = z.enum(['string', 'binary', 'guess']);

export const SchemaOverridesSchema = z.record(z.string(), SemanticTypeEnum);

// one filter dimension: a single value or a list of them
export const FilterValue = z.union([z.string(), z.array(z.string()).min(1)]);

export const IdentitySchema = z.object({
  project: z.string().regex(/^[a-z0-9_]+$/, 'project must be a database name such as "enwiki"'),
  extension: z.string().regex(/^[a-z0-9_]+$/).nullable().optional()
});

export const PagesQuerySchema = IdentitySchema.extend({
  name: FilterValue.optional(),
  quality: FilterValue.optional(),
  priority: FilterValue.optional()
}).strict();
export type PagesQuery = z.infer<typeof PagesQuerySchema>;

export const SqlQuerySchema = IdentitySchema.extend({
  sql: z.string().trim().min(1),
  mode: StringModeEnum.optional(),
  overrides: SchemaOverridesSchema.optional()
}).strict();
export type SqlQuery = z.infer<typeof SqlQuerySchema>;
