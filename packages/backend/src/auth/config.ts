import { isValidDuration, parseDuration } from './duration';
import { TokenService } from './TokenService';
import { JwtConfig, TokenServiceOptions } from './types';

/**
 * Get JWT configuration from environment
 */
export function getJwtConfig(): JwtConfig {
  const secret = process.env['JWT_SECRET'];
  if (secret === undefined || secret === '') {
    throw new Error('JWT_SECRET environment variable is required');
  }

  return {
    secret,
    accessTokenTtl: process.env['JWT_ACCESS_TOKEN_TTL'] ?? '15m',
    refreshTokenTtl: process.env['JWT_REFRESH_TOKEN_TTL'] ?? '7d',
  };
}

/**
 * Validate JWT configuration
 */
export function validateJwtConfig(config: JwtConfig): void {
  if (config.secret.length < 32) {
    throw new Error('JWT secret must be at least 32 characters long');
  }

  if (!isValidDuration(config.accessTokenTtl) || !isValidDuration(config.refreshTokenTtl)) {
    throw new Error('Invalid JWT expiration format');
  }

  const accessMs = parseDuration(config.accessTokenTtl);
  const refreshMs = parseDuration(config.refreshTokenTtl);
  if (accessMs <= 0 || refreshMs <= 0) {
    throw new Error('JWT expiration must be positive');
  }
  if (accessMs >= refreshMs) {
    throw new Error('Access token TTL must be shorter than refresh token TTL');
  }
}

/**
 * Build the process-wide token service from a validated configuration
 */
export function createTokenService(
  config: JwtConfig,
  options: TokenServiceOptions = {}
): TokenService {
  return new TokenService(
    config.secret,
    parseDuration(config.accessTokenTtl),
    parseDuration(config.refreshTokenTtl),
    options
  );
}
