import { randomUUID } from 'crypto';
import type { RequestHandler } from 'express';
import type { Logger } from '../../logger.js';

export interface RequestContext {
  requestId: string;
  /** Aborted on request timeout or when the client goes away first. */
  signal: AbortSignal;
  logger: Logger;
}

declare global {
  namespace Express {
    interface Request {
      requestContext: RequestContext;
    }
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Attaches request id, abort signal and a request-scoped logger.
 * An acceptable incoming X-Request-Id is reused, otherwise a UUID is generated.
 */
export function requestContext(logger: Logger, timeoutMs: number): RequestHandler {
  return (req, res, next) => {
    const incoming = req.header('x-request-id');
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    const requestLogger = logger.child({ requestId, method: req.method, path: req.path });
    const controller = new AbortController();
    const startedAt = Date.now();

    const timer = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref();

    res.on('finish', () => {
      clearTimeout(timer);
      requestLogger.info('request completed', {
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });

    res.on('close', () => {
      clearTimeout(timer);
      if (!res.writableFinished) {
        controller.abort(new Error('Client closed request'));
      }
    });

    res.setHeader('X-Request-Id', requestId);
    req.requestContext = { requestId, signal: controller.signal, logger: requestLogger };

    requestLogger.info('incoming request');
    next();
  };
}
