import { createApp } from './app';
import { createTokenService, getJwtConfig, validateJwtConfig } from './auth';
import { getConfig, validateConfig } from './config';
import { noopMetricsRecorder } from './metrics';
import { logger } from './utils/logger';

/**
 * Start the server
 */
function startServer(): void {
  try {
    const config = getConfig();
    validateConfig(config);

    const jwtConfig = getJwtConfig();
    validateJwtConfig(jwtConfig);

    const tokenService = createTokenService(jwtConfig);
    // No exporter is wired yet; plug one in behind MetricsRecorder
    const app = createApp({ tokenService, metrics: noopMetricsRecorder, config });

    const server = app.listen(config.port, () => {
      logger.info('Auth gateway listening', {
        port: config.port,
        environment: config.env,
        service: config.serviceName,
      });
    });

    // Graceful shutdown
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info('Shutdown signal received, closing HTTP server', { signal });
      server.close((error) => {
        if (error) {
          logger.error('HTTP server did not close cleanly', { error });
        }
        void logger.close().then(() => process.exit(error ? 1 : 0));
      });
    };
    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exitCode = 1;
  }
}

// Start server if not in test environment
if (process.env['NODE_ENV'] !== 'test') {
  startServer();
}
