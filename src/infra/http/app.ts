import express from 'express';
import type { AppConfig } from '../../config.js';
import type { UserService } from '../../application/users/userService.js';
import type { Logger } from '../logger.js';
import { createMetrics, Metrics } from '../metrics.js';
import { createUserRoutes } from './routes/users.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createMetricsRoutes } from './routes/metrics.js';
import { countRequests } from './middleware/metrics.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { requestContext } from './middleware/requestContext.js';

export interface AppDependencies {
  userService: UserService;
  logger: Logger;
  config: Pick<AppConfig, 'requestTimeoutMs' | 'rateLimitPerMinute'>;
  /** Defaults to a fresh registry. */
  metrics?: Metrics;
}

export function createApp({
  userService,
  logger,
  config,
  metrics = createMetrics(),
}: AppDependencies): express.Application {
  const app = express();

  // Must run first: the error handler logs through the request context
  app.use(requestContext(logger, config.requestTimeoutMs));
  app.use(countRequests(metrics));
  app.use(express.json());
  app.use(createApiRateLimiter(config.rateLimitPerMinute));

  app.use(createHealthRoutes(userService));
  app.use(createMetricsRoutes(metrics));
  app.use(createSwaggerRoutes());
  app.use('/api/users', createUserRoutes(userService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
