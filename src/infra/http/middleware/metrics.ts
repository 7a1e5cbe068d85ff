import type { RequestHandler } from 'express';
import type { Metrics } from '../../metrics.js';

/**
 * Counts every request by method and raw path, before routing.
 */
export function countRequests(metrics: Metrics): RequestHandler {
  return (req, _res, next) => {
    metrics.httpRequests.inc({ method: req.method, path: req.path });
    next();
  };
}
