import * as backendExports from '../index';

describe('Backend package exports', () => {
  it('should export the app factory and token service', () => {
    // Assert
    expect(backendExports).toHaveProperty('createApp');
    expect(backendExports).toHaveProperty('TokenService');
    expect(backendExports).toHaveProperty('createTokenService');
  });

  it('should export the metrics recorders', () => {
    // Assert
    expect(backendExports).toHaveProperty('InMemoryMetricsRecorder');
    expect(backendExports).toHaveProperty('noopMetricsRecorder');
  });

  it('should export the auth middlewares', () => {
    // Assert
    expect(backendExports).toHaveProperty('authenticate');
    expect(backendExports).toHaveProperty('authorize');
  });
});
