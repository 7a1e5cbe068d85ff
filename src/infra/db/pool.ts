import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { DbConfig } from '../../config.js';
import { Logger, serializeError } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

/**
 * The slice of a pg pool the repositories use.
 */
export interface QueryRunner {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

/**
 * Build the connection pool. Every statement is time-bound both server side
 * (statement_timeout) and client side (query_timeout).
 */
export function createPool(config: DbConfig, logger: Logger): DbPool {
  const pool = new Pool({
    connectionString: config.url,
    max: config.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: config.statementTimeoutMs,
    query_timeout: config.statementTimeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { err: serializeError(err) });
  });

  return pool;
}

export function toQueryRunner(pool: DbPool): QueryRunner {
  return {
    query: (text, values) => pool.query(text, values),
  };
}
