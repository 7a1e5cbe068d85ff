import { Router } from 'express';
import type { UserService } from '../../../application/users/userService.js';
import { serializeError } from '../../logger.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

export const READY_TIMEOUT_MS = 2000;

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Liveness probe (no I/O)
 *     responses:
 *       200: { description: OK }
 *
 * /readyz:
 *   get:
 *     tags: [Health]
 *     summary: Readiness probe (pings the database)
 *     responses:
 *       200: { description: Ready }
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(userService: UserService) {
  const router = Router();

  router.get('/healthz', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get(
    '/readyz',
    asyncHandler(async (req, res) => {
      try {
        await userService.ping(AbortSignal.timeout(READY_TIMEOUT_MS));
        res.status(200).json({ status: 'ready' });
      } catch (error) {
        req.requestContext.logger.warn('Readiness check failed', { err: serializeError(error) });
        res.status(503).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      }
    })
  );

  return router;
}
