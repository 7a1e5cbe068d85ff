import { buildConfig } from '../../config.js';
import { createLogger, serializeError } from '../logger.js';
import { runMigrations } from './migrations.js';
import { createPool } from './pool.js';

async function migrate(): Promise<void> {
  const config = buildConfig();
  const logger = createLogger(config);
  const pool = createPool(config.db, logger);

  try {
    logger.info('Starting migrations...');
    await runMigrations(pool, logger);
    logger.info('All migrations applied successfully');
  } catch (error) {
    logger.error('Migration failed', { err: serializeError(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
