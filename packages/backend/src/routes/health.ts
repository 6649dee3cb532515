import { Router, Request, Response } from 'express';

import { TokenService } from '../auth/TokenService';
import { logger } from '../utils/logger';

export interface HealthRouterOptions {
  tokenService: TokenService;
  env: string;
}

const PROBE_SUBJECT = 'health-probe';

/**
 * Issue and validate a throwaway token to prove the signing key is usable
 */
function probeTokenService(tokenService: TokenService): boolean {
  try {
    const token = tokenService.issueAccessToken(PROBE_SUBJECT, '', '');
    return tokenService.validateToken(token).userId === PROBE_SUBJECT;
  } catch (error) {
    logger.error('Token service health probe failed', { error });
    return false;
  }
}

export function createHealthRouter({ tokenService, env }: HealthRouterOptions): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Basic health check
   */
  router.get('/', (_req: Request, res: Response): void => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
      environment: env,
      version: process.env['npm_package_version'] ?? '1.0.0',
    });
  });

  /**
   * Readiness check (for Kubernetes)
   */
  router.get('/ready', (_req: Request, res: Response): void => {
    const checks = {
      tokenService: probeTokenService(tokenService),
    };

    const ready = Object.values(checks).every(Boolean);

    res.status(ready ? 200 : 503).json({
      ready,
      checks,
    });
  });

  return router;
}
