import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Zod validation middleware. Rejects the request before the handler runs;
 * handlers parse again to get typed values. ZodErrors go to the error handler.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      schemas.params?.parse(req.params);
      schemas.query?.parse(req.query);
      schemas.body?.parse(req.body);
      next();
    } catch (error) {
      next(error);
    }
  };
}
