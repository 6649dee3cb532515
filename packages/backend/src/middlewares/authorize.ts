import { ErrorCode } from '@storefront/contracts';
import { Request, Response, NextFunction } from 'express';

import '../types/express-augmentation';
import { AppError } from '../errors/AppError';

/**
 * Role gate for routes mounted behind `authenticate`.
 *
 * Roles are compared as plain strings, so tiers outside `Role` work too. An
 * empty list admits any authenticated caller.
 */
export function authorize(
  roles: string | readonly string[]
): (req: Request, res: Response, next: NextFunction) => void {
  const allowed: readonly string[] = typeof roles === 'string' ? [roles] : roles;

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (req.user === undefined) {
      next(new AppError('Authentication required', 401, ErrorCode.UNAUTHORIZED));
      return;
    }

    if (allowed.length > 0 && !allowed.includes(req.user.role)) {
      next(
        new AppError('Insufficient permissions', 403, ErrorCode.FORBIDDEN, [
          `Required roles: ${allowed.join(', ')}`,
        ])
      );
      return;
    }

    next();
  };
}
