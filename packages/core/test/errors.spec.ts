/* packages/core/test/errors.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  ReplicaError,
  SchemaError,
  StatementError,
  mapDriverError
} from '../src';

const err = (code: string, message: string, fatal = false) => Object.assign(new Error(message), { code, fatal });

describe('mapDriverError', () => {
  it.each([
    'ECONNREFUSED',
    'ENOTFOUND',
    'ER_ACCESS_DENIED_ERROR',
    'ER_BAD_DB_ERROR',
    'PROTOCOL_CONNECTION_LOST'
  ])('classifies %s as a connection error', (code) => {
    const mapped = mapDriverError(err(code, 'boom'));
    expect(mapped).toBeInstanceOf(ConnectionError);
    expect(mapped.code).toBe('REPLICA_CONNECTION');
  });

  it('classifies fatal transport errors without a server code as connection errors', () => {
    expect(mapDriverError(err('', 'socket hang up', true))).toBeInstanceOf(ConnectionError);
  });

  it.each(['ER_PARSE_ERROR', 'ER_NO_SUCH_TABLE', 'ER_BAD_FIELD_ERROR'])('classifies %s as a statement error', (code) => {
    const mapped = mapDriverError(err(code, 'bad'));
    expect(mapped).toBeInstanceOf(StatementError);
    expect(mapped.code).toBe('REPLICA_STATEMENT');
  });

  it('names the identity and keeps the original error', () => {
    const original = err('ER_PARSE_ERROR', 'near "SELEC"');
    const mapped = mapDriverError(original, { project: 'wikidatawiki', extension: 'termstore' });
    expect(mapped.message).toBe('Statement failed (termstore.wikidatawiki): near "SELEC"');
    expect(mapped.originalError).toBe(original);
    expect(mapped.identity).toEqual({ project: 'wikidatawiki', extension: 'termstore' });
  });

  it('returns replica errors unchanged', () => {
    const schema = new SchemaError('Row 0 has 1 values but the result has 2 columns');
    expect(mapDriverError(schema)).toBe(schema);
    expect(schema).toBeInstanceOf(ReplicaError);
    expect(schema.name).toBe('SchemaError');
  });

  it('handles non-Error throwables', () => {
    const mapped = mapDriverError('plain string');
    expect(mapped).toBeInstanceOf(StatementError);
    expect(mapped.message).toBe('Statement failed: plain string');
  });
});
