import * as authExports from '../index';

describe('Auth module exports', () => {
  it('should export the token service and its errors', () => {
    // Assert
    expect(authExports).toHaveProperty('TokenService');
    expect(authExports).toHaveProperty('InvalidTokenError');
    expect(authExports).toHaveProperty('TokenExpiredError');
    expect(authExports).toHaveProperty('TokenSigningError');
  });

  it('should export JWT helpers', () => {
    // Assert
    expect(authExports).toHaveProperty('extractBearerToken');
    expect(authExports).toHaveProperty('parseDuration');
  });

  it('should export config functions', () => {
    // Assert
    expect(authExports).toHaveProperty('getJwtConfig');
    expect(authExports).toHaveProperty('validateJwtConfig');
    expect(authExports).toHaveProperty('createTokenService');
  });
});
