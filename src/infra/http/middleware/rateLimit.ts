import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

/**
 * Per-client API rate limiter over a one minute window.
 * Uses an in-memory store (resets on server restart).
 */
export function createApiRateLimiter(limitPerMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
