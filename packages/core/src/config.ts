// packages/core/src/config.ts
import { z } from 'zod';

export const LogLevelEnum = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelEnum>;

const EnvSchema = z.object({
  REPLICA_DOMAIN: z.string().min(1).default('analytics.db.svc.wikimedia.cloud'),
  REPLICA_CNF: z.string().min(1).default('.my.cnf'),
  REPLICA_PORT: z.coerce.number().int().positive().default(3306),
  REPLICA_POOL_SIZE: z.coerce.number().int().positive().max(10).default(2),
  LOG_LEVEL: LogLevelEnum.default('info'),
  HTTP_HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default('')
});

export interface ReplicaConfig {
  domainSuffix: string;
  credentialsFile: string;
  port: number;
  poolSize: number;
  logLevel: LogLevel;
  http: { host: string; port: number; corsOrigins: string[] };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ReplicaConfig {
  const e = EnvSchema.parse(env);
  return {
    domainSuffix: e.REPLICA_DOMAIN,
    credentialsFile: e.REPLICA_CNF,
    port: e.REPLICA_PORT,
    poolSize: e.REPLICA_POOL_SIZE,
    logLevel: e.LOG_LEVEL,
    http: {
      host: e.HTTP_HOST,
      port: e.HTTP_PORT,
      corsOrigins: e.CORS_ORIGIN.split(',').map(s => s.trim()).filter(Boolean)
    }
  };
}
