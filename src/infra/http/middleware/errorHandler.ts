import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  CancelledError,
  DuplicateEmailError,
  InvalidInputError,
  NotFoundError,
  VersionConflictError,
} from '../../../application/errors.js';
import { serializeError } from '../../logger.js';
import { InvalidCursorError } from '../cursor.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

const INTERNAL_ERROR: MappedError = {
  status: 500,
  body: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
};

/**
 * body-parser and friends attach a 4xx status to client errors (e.g. malformed JSON).
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const status = err.status;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

export function mapError(err: unknown): MappedError {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (err instanceof InvalidInputError) {
    return { status: 400, body: { code: 'INVALID_INPUT', message: err.message } };
  }

  if (err instanceof InvalidCursorError) {
    return { status: 400, body: { code: 'INVALID_CURSOR', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof DuplicateEmailError) {
    return { status: 409, body: { code: 'DUPLICATE_EMAIL', message: err.message } };
  }

  // Caller must re-read and retry
  if (err instanceof VersionConflictError) {
    return {
      status: 409,
      body: {
        code: 'VERSION_CONFLICT',
        message: err.message,
        details: { id: err.id, expectedVersion: err.expectedVersion },
      },
    };
  }

  if (err instanceof CancelledError) {
    return {
      status: 503,
      body: { code: 'REQUEST_CANCELLED', message: 'Request cancelled or timed out' },
    };
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    return {
      status,
      body: { code: 'BAD_REQUEST', message: err instanceof Error ? err.message : 'Bad request' },
    };
  }

  // StorageError, IdAlreadySetError and anything unexpected stay opaque
  return INTERNAL_ERROR;
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = mapError(err);
  const meta = { status, code: body.code, err: serializeError(err) };
  if (status >= 500) {
    req.requestContext.logger.error('Request failed', meta);
  } else {
    req.requestContext.logger.warn('Request rejected', meta);
  }

  res.status(status).json(body);
};

export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorResponse = {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  };
  res.status(404).json(body);
}
