import { TokenKind } from '@storefront/shared';

/**
 * Identity recovered from (or embedded in) a token
 */
export interface Claims {
  userId: string;
  email: string;
  role: string; // empty when the token carries no role
  kind?: TokenKind; // absent on tokens minted without a token_type claim
  issuedAt: Date;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

export interface TokenServiceOptions {
  /** Clock used for issuance and expiry checks */
  now?: () => Date;
}

/**
 * User information attached to an authenticated request
 */
export interface AuthUser {
  id: string;
  email: string;
  role: string;
}

/**
 * JWT configuration
 */
export interface JwtConfig {
  secret: string;
  accessTokenTtl: string;
  refreshTokenTtl: string;
}
