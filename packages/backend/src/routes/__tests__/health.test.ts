import express from 'express';
import request from 'supertest';

import { TokenService } from '../../auth/TokenService';
import { createTestTokenService } from '../../__tests__/utils/auth-helper';
import { TokenSigningError } from '../../errors/TokenError';
import { logger } from '../../utils/logger';
import { createHealthRouter } from '../health';

function createTestApp(tokenService: TokenService): express.Express {
  const app = express();
  app.use('/health', createHealthRouter({ tokenService, env: 'test' }));
  return app;
}

describe('Health Router', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      // Act
      const response = await request(createTestApp(createTestTokenService())).get('/health');

      // Assert
      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/application\/json/);
      expect(response.body).toMatchObject({
        status: 'healthy',
        timestamp: expect.any(String) as unknown,
        uptime: expect.any(Number) as unknown,
        environment: 'test',
      });
    });

    it('should return health status with version from env', async () => {
      // Arrange
      const originalVersion = process.env['npm_package_version'];
      process.env['npm_package_version'] = '2.0.0';

      // Act
      const response = await request(createTestApp(createTestTokenService())).get('/health');

      // Assert
      expect(response.status).toBe(200);
      const responseBody = response.body as { version: string };
      expect(responseBody.version).toBe('2.0.0');

      // Cleanup
      if (originalVersion !== undefined) {
        process.env['npm_package_version'] = originalVersion;
      } else {
        delete process.env['npm_package_version'];
      }
    });
  });

  describe('GET /health/ready', () => {
    it('should be ready when tokens can be issued and validated', async () => {
      // Act
      const response = await request(createTestApp(createTestTokenService())).get(
        '/health/ready'
      );

      // Assert
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ready: true, checks: { tokenService: true } });
    });

    it('should return 503 when the signing key is unusable', async () => {
      // Arrange
      const errorSpy = jest.spyOn(logger, 'error').mockImplementation();
      const broken = createTestTokenService();
      jest.spyOn(broken, 'issueAccessToken').mockImplementation(() => {
        throw new TokenSigningError('key unavailable');
      });

      // Act
      const response = await request(createTestApp(broken)).get('/health/ready');

      // Assert
      expect(response.status).toBe(503);
      expect(response.body).toEqual({ ready: false, checks: { tokenService: false } });
      expect(errorSpy).toHaveBeenCalledWith(
        'Token service health probe failed',
        expect.objectContaining({ error: expect.any(Error) as unknown })
      );
    });
  });
});
