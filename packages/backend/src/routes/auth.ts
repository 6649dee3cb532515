import {
  DevTokenRequestSchema,
  ErrorCode,
  RefreshTokenRequestSchema,
  TokenPairResponse,
  VerifyTokenRequestSchema,
  VerifyTokenResponse,
} from '@storefront/contracts';
import { TokenKind, isKnownRole } from '@storefront/shared';
import { Router, Request, Response, NextFunction } from 'express';

import '../types/express-augmentation';
import { TokenService } from '../auth/TokenService';
import { Claims, TokenPair } from '../auth/types';
import { AppError } from '../errors/AppError';
import { InvalidTokenError, TokenExpiredError } from '../errors/TokenError';
import { MetricsRecorder, noopMetricsRecorder } from '../metrics/MetricsRecorder';
import { authenticate } from '../middlewares/auth';
import { withValidatedBody } from '../middlewares/validate';
import { logger } from '../utils/logger';

export interface AuthRouterOptions {
  tokenService: TokenService;
  metrics?: MetricsRecorder;
  env: string;
}

function toTokenPairResponse(tokenService: TokenService, pair: TokenPair): TokenPairResponse {
  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    tokenType: 'Bearer',
    expiresIn: Math.ceil(tokenService.getAccessTokenDuration() / 1000),
  };
}

/**
 * Report whether a token is currently valid. An authentic but expired token
 * still reports whose session it was.
 */
function verifyToken(tokenService: TokenService, token: string): VerifyTokenResponse {
  try {
    const claims = tokenService.validateToken(token);
    return {
      valid: true,
      userId: claims.userId,
      email: claims.email,
      role: claims.role,
      expiresAt: claims.expiresAt.toISOString(),
    };
  } catch (error) {
    if (error instanceof TokenExpiredError) {
      const stale = tokenService.getClaimsFromToken(token);
      return { valid: false, reason: 'expired', userId: stale.userId, email: stale.email };
    }
    if (error instanceof InvalidTokenError) {
      return { valid: false, reason: 'invalid' };
    }
    throw error;
  }
}

/**
 * Validate a token presented for refresh exchange. Access tokens are refused.
 */
function claimsForRefresh(tokenService: TokenService, refreshToken: string): Claims {
  let claims: Claims;
  try {
    claims = tokenService.validateToken(refreshToken);
  } catch (error) {
    if (error instanceof TokenExpiredError) {
      throw new AppError('Refresh token expired', 401, ErrorCode.TOKEN_EXPIRED);
    }
    if (error instanceof InvalidTokenError) {
      throw new AppError('Invalid refresh token', 401, ErrorCode.UNAUTHORIZED);
    }
    throw error;
  }

  if (claims.kind === TokenKind.ACCESS) {
    throw new AppError('Invalid refresh token', 401, ErrorCode.UNAUTHORIZED);
  }
  return claims;
}

/**
 * Session endpoints backed by the token service
 */
export function createAuthRouter({
  tokenService,
  metrics = noopMetricsRecorder,
  env,
}: AuthRouterOptions): Router {
  const router = Router();

  /**
   * POST /auth/verify
   */
  router.post(
    '/verify',
    withValidatedBody(VerifyTokenRequestSchema, ({ token }, _req, res) => {
      res.json(verifyToken(tokenService, token));
    })
  );

  /**
   * POST /auth/refresh
   */
  router.post(
    '/refresh',
    withValidatedBody(RefreshTokenRequestSchema, ({ refreshToken }, _req, res) => {
      const claims = claimsForRefresh(tokenService, refreshToken);
      const pair = tokenService.issueTokenPair(claims.userId, claims.email, claims.role);

      logger.info('Token pair refreshed', { userId: claims.userId, operation: 'refresh' });
      res.json(toTokenPairResponse(tokenService, pair));
    })
  );

  /**
   * GET /auth/session
   */
  router.get(
    '/session',
    authenticate(tokenService, metrics),
    (req: Request, res: Response, next: NextFunction): void => {
      if (req.user === undefined) {
        next(new AppError('Authentication required', 401, ErrorCode.UNAUTHORIZED));
        return;
      }
      res.json({ userId: req.user.id, email: req.user.email, role: req.user.role });
    }
  );

  /**
   * POST /auth/dev-token (development only)
   * Stands in for register/login, which live in the account service.
   */
  if (env !== 'production') {
    router.post(
      '/dev-token',
      withValidatedBody(DevTokenRequestSchema, ({ userId, email, role }, _req, res) => {
        if (role !== '' && !isKnownRole(role)) {
          logger.warn('Issuing development token with unrecognised role', { userId, role });
        }
        const pair = tokenService.issueTokenPair(userId, email, role);

        logger.debug('Issued development token pair', { userId, operation: 'dev-token' });
        res.json(toTokenPairResponse(tokenService, pair));
      })
    );
  }

  return router;
}
