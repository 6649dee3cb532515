import { Request, Response, NextFunction } from 'express';
import { ZodTypeAny, z } from 'zod';

import { ValidationError } from '../errors/ValidationError';

/**
 * Route handler that receives the parsed body
 */
export type ValidatedBodyHandler<T extends ZodTypeAny> = (
  body: z.infer<T>,
  req: Request,
  res: Response
) => void;

/**
 * Validate `req.body` against `schema` and hand the parsed value to `handler`.
 * Failures are forwarded as a ValidationError.
 */
export function withValidatedBody<T extends ZodTypeAny>(
  schema: T,
  handler: ValidatedBodyHandler<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const body: unknown = req.body;
    const result = schema.safeParse(body);

    if (!result.success) {
      next(new ValidationError(result.error));
      return;
    }

    handler(result.data, req, res);
  };
}
