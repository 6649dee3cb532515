import { ErrorCode } from '@storefront/contracts';
import { Request, Response, NextFunction } from 'express';

import '../types/express-augmentation';
import { extractBearerToken } from '../auth/jwt';
import { TokenService } from '../auth/TokenService';
import { Claims } from '../auth/types';
import { AppError } from '../errors/AppError';
import { InvalidTokenError, TokenExpiredError } from '../errors/TokenError';
import { MetricsRecorder, noopMetricsRecorder } from '../metrics/MetricsRecorder';
import { setTraceUser } from '../utils/traceContext';

type FailureReason = 'missing' | 'invalid' | 'expired';

/**
 * Authentication middleware factory.
 * Verifies the bearer token and attaches the caller to `req.user`.
 */
export function authenticate(
  tokenService: TokenService,
  metrics: MetricsRecorder = noopMetricsRecorder
): (req: Request, res: Response, next: NextFunction) => void {
  const reject = (next: NextFunction, reason: FailureReason, error: AppError): void => {
    metrics.incrementCounter('auth_failures_total', { reason });
    next(error);
  };

  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (authHeader === undefined) {
      reject(
        next,
        'missing',
        new AppError('No authorization header provided', 401, ErrorCode.UNAUTHORIZED)
      );
      return;
    }

    const token = extractBearerToken(authHeader);
    if (token === null) {
      reject(
        next,
        'invalid',
        new AppError('Invalid authorization header format', 401, ErrorCode.UNAUTHORIZED)
      );
      return;
    }

    let claims: Claims;
    try {
      claims = tokenService.validateToken(token);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        reject(next, 'expired', error);
      } else if (error instanceof InvalidTokenError) {
        reject(next, 'invalid', error);
      } else {
        next(error);
      }
      return;
    }

    req.user = {
      id: claims.userId,
      email: claims.email,
      role: claims.role,
    };
    setTraceUser(claims.userId);

    next();
  };
}
