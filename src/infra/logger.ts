import winston from 'winston';
import type { AppConfig } from '../config.js';

export type Logger = winston.Logger;

export type LoggerOptions = Pick<AppConfig, 'logLevel' | 'serviceName' | 'nodeEnv'>;

/**
 * Structured JSON logger. Silent under NODE_ENV=test.
 */
export function createLogger(options: LoggerOptions): Logger {
  return winston.createLogger({
    level: options.logLevel,
    silent: options.nodeEnv === 'test',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: {
      service: options.serviceName,
      env: options.nodeEnv,
    },
    transports: [new winston.transports.Console()],
  });
}

/**
 * JSON.stringify drops Error fields, so flatten them before logging as metadata.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { message: String(error) };
}
