import request from 'supertest';

import { createApp } from '../app';
import { InMemoryMetricsRecorder } from '../metrics/InMemoryMetricsRecorder';
import { TRACE_HEADER } from '../middlewares/traceContext';

import { createTestTokenService, testConfig } from './utils/auth-helper';

describe('App Configuration', () => {
  const app = createApp({ tokenService: createTestTokenService(), config: testConfig() });

  it('should have security headers', async () => {
    // Act
    const response = await request(app).get('/health');

    // Assert
    expect(response.headers).toHaveProperty('content-security-policy');
    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should handle 404 for unknown routes', async () => {
    // Act
    const response = await request(app).get('/unknown-route');

    // Assert
    expect(response.status).toBe(404);
    const responseBody = response.body as {
      error: { code: string; message: string };
      timestamp: string;
      path: string;
      requestId: string;
    };
    expect(responseBody).toMatchObject({
      error: {
        code: 'NOT_FOUND',
        message: 'Route GET /unknown-route not found',
      },
      timestamp: expect.any(String) as unknown,
      path: '/unknown-route',
    });
    expect(responseBody.requestId).toBe(response.headers[TRACE_HEADER]);
  });

  it('should echo the caller trace id in the error envelope', async () => {
    // Act
    const response = await request(app).get('/unknown-route').set(TRACE_HEADER, 'edge-42');

    // Assert
    expect(response.headers[TRACE_HEADER]).toBe('edge-42');
    expect(response.body).toMatchObject({ requestId: 'edge-42' });
  });

  it('should handle invalid JSON', async () => {
    // Act
    const response = await request(app)
      .post('/auth/verify')
      .set('Content-Type', 'application/json')
      .send('invalid json');

    // Assert
    expect(response.status).toBe(400);
    const responseBody = response.body as { error: { code: string; message: string } };
    expect(responseBody.error).toEqual({
      code: 'BAD_REQUEST',
      message: 'Invalid JSON payload',
    });
  });

  it('should support CORS for allowed origins', async () => {
    // Act
    const response = await request(app).get('/health').set('Origin', 'http://localhost:3000');

    // Assert
    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
  });

  it('should record request metrics', async () => {
    // Arrange
    const metrics = new InMemoryMetricsRecorder();
    const instrumented = createApp({
      tokenService: createTestTokenService(),
      metrics,
      config: testConfig(),
    });

    // Act
    await request(instrumented).get('/health');

    // Assert
    expect(
      metrics.counterValue('http_requests_total', {
        method: 'GET',
        route: '/health',
        status: '200',
      })
    ).toBe(1);
  });

  it('should rate limit the auth routes', async () => {
    // Arrange
    const limited = createApp({
      tokenService: createTestTokenService(),
      config: testConfig({ rateLimit: { windowMs: 60000, max: 2 } }),
    });

    // Act
    await request(limited).post('/auth/verify').send({ token: 'a' });
    await request(limited).post('/auth/verify').send({ token: 'a' });
    const response = await request(limited).post('/auth/verify').send({ token: 'a' });

    // Assert
    expect(response.status).toBe(429);
    const responseBody = response.body as { error: { code: string; message: string } };
    expect(responseBody.error).toEqual({
      code: 'TOO_MANY_REQUESTS',
      message: 'Too many requests',
    });
  });
});
