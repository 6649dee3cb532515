import { ErrorCode } from '@storefront/contracts';
import { Request, Response, NextFunction } from 'express';

import { AppError } from '../errors/AppError';

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  const error = new AppError(`Route ${req.method} ${req.path} not found`, 404, ErrorCode.NOT_FOUND);
  next(error);
}
