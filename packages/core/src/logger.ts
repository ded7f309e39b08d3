// packages/core/src/logger.ts
import type { LogLevel } from './config';

type LogFn = (obj: object, msg?: string) => void;

// Same call shape as pino, so a Fastify request/app logger can be passed straight in.
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

export function createConsoleLogger(scope: string, level: LogLevel = 'info'): Logger {
  const at = (lvl: Exclude<LogLevel, 'silent'>, sink: (...args: unknown[]) => void): LogFn =>
    (obj, msg) => {
      if (RANK[lvl] < RANK[level]) return;
      sink(`[${scope}] ${msg ?? lvl}`, obj);
    };
  return {
    debug: at('debug', console.debug),
    info: at('info', console.log),
    warn: at('warn', console.warn),
    error: at('error', console.error)
  };
}

export const silentLogger: Logger = createConsoleLogger('silent', 'silent');
