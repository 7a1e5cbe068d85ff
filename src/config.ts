import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const LogLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().positive().default(3000),

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(25),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),

  LOG_LEVEL: LogLevelSchema,
  SERVICE_NAME: z.string().min(1).default('user-registry'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface DbConfig {
  url: string;
  poolMax: number;
  statementTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: NodeEnv;
  port: number;
  db: DbConfig;

  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
  rateLimitPerMinute: number;

  logLevel: LogLevel;
  serviceName: string;
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    db: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DB_POOL_MAX,
      statementTimeoutMs: parsed.DB_STATEMENT_TIMEOUT_MS,
    },

    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    shutdownTimeoutMs: parsed.SHUTDOWN_TIMEOUT_MS,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  };
}
