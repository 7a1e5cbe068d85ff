import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Express 4 ignores returned promises; route rejections go to next() so
 * errorHandler maps them.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
