import { Router } from 'express';
import type { Metrics } from '../../metrics.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /metrics:
 *   get:
 *     tags: [Health]
 *     summary: Prometheus metrics in text exposition format
 *     responses:
 *       200: { description: Metrics }
 */
export function createMetricsRoutes(metrics: Metrics) {
  const router = Router();

  router.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      const body = await metrics.registry.metrics();
      res.status(200).type(metrics.registry.contentType).send(body);
    })
  );

  return router;
}
