import type { Server } from 'http';
import { buildConfig } from '../../config.js';
import { UserService } from '../../application/users/userService.js';
import { collectDefaultMetrics } from 'prom-client';
import { createLogger, Logger, serializeError } from '../logger.js';
import { createMetrics } from '../metrics.js';
import { createPool, DbPool, toQueryRunner } from '../db/pool.js';
import { PostgresUserRepo } from '../db/postgresUserRepo.js';
import { createApp } from './app.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Stop accepting connections, then release the pool. Gives up after `timeoutMs`.
 */
async function shutdown(
  server: Server,
  pool: DbPool,
  logger: Logger,
  timeoutMs: number
): Promise<void> {
  const deadline = setTimeout(() => {
    logger.error('Shutdown timed out, forcing exit', { timeoutMs });
    process.exit(1);
  }, timeoutMs);
  deadline.unref();

  try {
    await closeServer(server);
    await pool.end();
    logger.info('Shutdown complete');
  } catch (error) {
    logger.error('Shutdown failed', { err: serializeError(error) });
    process.exitCode = 1;
  } finally {
    clearTimeout(deadline);
  }
}

async function main(): Promise<void> {
  const config = buildConfig();
  const logger = createLogger(config);
  const pool = createPool(config.db, logger);

  const userRepo = new PostgresUserRepo(toQueryRunner(pool));
  const userService = new UserService(userRepo);

  try {
    await userService.ping(AbortSignal.timeout(5000));
  } catch (error) {
    logger.error('Failed to reach database', { err: serializeError(error) });
    await pool.end();
    process.exitCode = 1;
    return;
  }
  logger.info('Database connected');

  const metrics = createMetrics();
  collectDefaultMetrics({ register: metrics.registry });

  const app = createApp({ userService, logger, config, metrics });
  const server = app.listen(config.port, () => {
    logger.info('HTTP server started', { port: config.port });
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info('Received shutdown signal', { signal });
    void shutdown(server, pool, logger, config.shutdownTimeoutMs);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  // Invalid config or logger setup; no logger to report through
  console.error('Fatal startup error:', error);
  process.exit(1);
});
