// packages/replica/src/type-map.ts
import type { SemanticType, StringMode } from '@wikireplica/core';

// Codes the server uses for both text and binary columns (varchar vs varbinary, text vs blob).
type Ambiguous = 'text-or-binary';

// MySQL wire protocol column type codes
const TYPE_CODES: ReadonlyMap<number, SemanticType | Ambiguous> = new Map<number, SemanticType | Ambiguous>([
  [1, 'int64'],      // TINY
  [2, 'int64'],      // SHORT
  [3, 'int64'],      // LONG
  [4, 'float64'],    // FLOAT
  [5, 'float64'],    // DOUBLE
  [6, 'null'],       // NULL; uncertain
  [7, 'datetime'],   // TIMESTAMP
  [8, 'int64'],      // LONGLONG
  [9, 'int64'],      // INT24
  [10, 'date'],      // DATE
  [12, 'datetime'],  // DATETIME
  [13, 'int64'],     // YEAR
  [15, 'text-or-binary'],  // VARCHAR
  [246, 'decimal'],        // NEWDECIMAL
  [247, 'text-or-binary'], // ENUM
  [248, 'text-or-binary'], // SET
  [249, 'text-or-binary'], // TINY_BLOB
  [250, 'text-or-binary'], // MEDIUM_BLOB
  [251, 'text-or-binary'], // LONG_BLOB
  [252, 'text-or-binary'], // BLOB
  [253, 'text-or-binary'], // VAR_STRING
  [254, 'text-or-binary']  // STRING
]);

export function isKnownTypeCode(code: number): boolean {
  return TYPE_CODES.has(code);
}

/**
 * Semantic type for a driver type code. Never throws: codes outside the table
 * are 'unknown'. 'guess' does no inference and leaves ambiguous codes 'unknown'.
 */
export function mapType(code: number, mode: StringMode = 'guess'): SemanticType {
  const t = TYPE_CODES.get(code) ?? 'unknown';
  if (t !== 'text-or-binary') return t;
  switch (mode) {
    case 'string': return 'string';
    case 'binary': return 'binary';
    case 'guess': return 'unknown';
  }
}
