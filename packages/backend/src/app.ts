import { ErrorCode } from '@storefront/contracts';
import cors from 'cors';
import express, { Application } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';

import { TokenService } from './auth/TokenService';
import { AppConfig, getConfig } from './config';
import { AppError } from './errors/AppError';
import { MetricsRecorder, noopMetricsRecorder } from './metrics/MetricsRecorder';
import { errorHandler } from './middlewares/errorHandler';
import { notFoundHandler } from './middlewares/notFoundHandler';
import { requestMetrics } from './middlewares/requestMetrics';
import { assignTraceId, traceContext } from './middlewares/traceContext';
import { createAuthRouter } from './routes/auth';
import { createHealthRouter } from './routes/health';
import { httpLogger } from './utils/logger';

export interface AppDependencies {
  tokenService: TokenService;
  metrics?: MetricsRecorder;
  config?: AppConfig;
}

/**
 * Create Express application
 */
export function createApp({
  tokenService,
  metrics = noopMetricsRecorder,
  config = getConfig(),
}: AppDependencies): Application {
  const app = express();

  // Security middlewares
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: config.cors.origin,
      credentials: config.cors.credentials,
    })
  );

  // Tracing, access log, metrics
  app.use(assignTraceId);
  app.use(httpLogger);
  app.use(requestMetrics(metrics));

  // Rate limiting
  app.use(
    '/auth',
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      handler: (_req, _res, next) => {
        next(new AppError('Too many requests', 429, ErrorCode.TOO_MANY_REQUESTS));
      },
    })
  );

  // Body parsing
  app.use(express.json());

  app.use(traceContext);

  // Routes
  app.use('/health', createHealthRouter({ tokenService, env: config.env }));
  app.use('/auth', createAuthRouter({ tokenService, metrics, env: config.env }));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
