// packages/core/src/errors.ts
import type { Identity } from './types';

export type ReplicaErrorCode =
  | 'REPLICA_CONNECTION'
  | 'REPLICA_STATEMENT'
  | 'REPLICA_SCHEMA';

export class ReplicaError extends Error {
  readonly code: ReplicaErrorCode;
  readonly originalError: unknown;
  readonly identity?: Identity;

  constructor(opts: {
    code: ReplicaErrorCode;
    message: string;
    originalError?: unknown;
    identity?: Identity;
  }) {
    super(opts.message);
    this.name = 'ReplicaError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.identity = opts.identity;
  }
}

/** Host unreachable, credentials missing or rejected, database unknown. Never retried here. */
export class ConnectionError extends ReplicaError {
  constructor(message: string, opts: { originalError?: unknown; identity?: Identity } = {}) {
    super({ code: 'REPLICA_CONNECTION', message, ...opts });
    this.name = 'ConnectionError';
  }
}

/** The server rejected the statement or it produced no result set. */
export class StatementError extends ReplicaError {
  constructor(message: string, opts: { originalError?: unknown; identity?: Identity } = {}) {
    super({ code: 'REPLICA_STATEMENT', message, ...opts });
    this.name = 'StatementError';
  }
}

/** Result rows disagree with the column metadata, or a value does not fit its column type. */
export class SchemaError extends ReplicaError {
  constructor(message: string) {
    super({ code: 'REPLICA_SCHEMA', message });
    this.name = 'SchemaError';
  }
}

// --------------------
// Driver error mapping
// --------------------
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_ACCESS_DENIED_ERROR',
  'ER_DBACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR',
  'ER_CON_COUNT_ERROR',
  'ER_USER_LIMIT_REACHED'
]);

function describe(err: unknown): { code: string; message: string; fatal: boolean } {
  if (!(err instanceof Error)) return { code: '', message: String(err), fatal: false };
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  const fatal = 'fatal' in err && err.fatal === true;
  return { code, message: err.message, fatal };
}

export function mapDriverError(err: unknown, identity?: Identity): ReplicaError {
  if (err instanceof ReplicaError) return err;

  const { code, message, fatal } = describe(err);
  const where = identity ? ` (${identity.extension ? `${identity.extension}.` : ''}${identity.project})` : '';

  if (CONNECTION_CODES.has(code) || (fatal && !code.startsWith('ER_'))) {
    return new ConnectionError(`Cannot connect to replica${where}: ${message}`, { originalError: err, identity });
  }
  return new StatementError(`Statement failed${where}: ${message}`, { originalError: err, identity });
}
