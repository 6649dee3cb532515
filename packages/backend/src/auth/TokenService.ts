import { TokenClaimsPayload, TokenClaimsSchema } from '@storefront/contracts';
import { TokenKind } from '@storefront/shared';
import jwt from 'jsonwebtoken';

import { InvalidTokenError, TokenExpiredError, TokenSigningError } from '../errors/TokenError';

import { ACCEPTED_ALGORITHMS, SIGNING_ALGORITHM, fromNumericDate, toNumericDate } from './jwt';
import { Claims, TokenPair, TokenServiceOptions } from './types';

function assertPositiveDuration(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number of milliseconds`);
  }
}

function toClaims(payload: TokenClaimsPayload): Claims {
  return {
    userId: payload.user_id,
    email: payload.email,
    role: payload.role ?? '',
    kind: payload.token_type,
    issuedAt: fromNumericDate(payload.iat),
    expiresAt: fromNumericDate(payload.exp),
  };
}

/**
 * Issues and validates HMAC-signed access/refresh token pairs.
 *
 * Holds only the secret, the two lifetimes (milliseconds) and a clock, all
 * fixed at construction, so one instance can serve every request in the
 * process.
 */
export class TokenService {
  // HMAC key bytes, possibly empty
  private readonly key: Buffer;
  private readonly now: () => Date;

  constructor(
    secret: string,
    private readonly accessTokenDuration: number,
    private readonly refreshTokenDuration: number,
    options: TokenServiceOptions = {}
  ) {
    assertPositiveDuration('accessTokenDuration', accessTokenDuration);
    assertPositiveDuration('refreshTokenDuration', refreshTokenDuration);
    this.key = Buffer.from(secret, 'utf8');
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Access token lifetime in milliseconds
   */
  getAccessTokenDuration(): number {
    return this.accessTokenDuration;
  }

  issueAccessToken(userId: string, email: string, role: string): string {
    return this.issue(TokenKind.ACCESS, userId, email, role);
  }

  /**
   * Refresh tokens carry the same claims as access tokens, email and role
   * included; only the lifetime and `token_type` differ.
   */
  issueRefreshToken(userId: string, email: string, role: string): string {
    return this.issue(TokenKind.REFRESH, userId, email, role);
  }

  /**
   * Issue both tokens. Throws without returning either one if any signing fails.
   */
  issueTokenPair(userId: string, email: string, role: string): TokenPair {
    const accessToken = this.issueAccessToken(userId, email, role);
    const refreshToken = this.issueRefreshToken(userId, email, role);
    return { accessToken, refreshToken };
  }

  /**
   * Verify signature, algorithm, payload shape and expiry.
   *
   * @throws InvalidTokenError when the token is not authentic or not well-formed
   * @throws TokenExpiredError when it is authentic but `now >= expiresAt`
   */
  validateToken(token: string): Claims {
    return this.parse(token, false);
  }

  /**
   * Same checks as {@link validateToken} minus expiry. For showing who an
   * expired session belonged to; never use the result to authorize anything.
   *
   * @throws InvalidTokenError
   */
  getClaimsFromToken(token: string): Claims {
    return this.parse(token, true);
  }

  private issue(kind: TokenKind, userId: string, email: string, role: string): string {
    const issuedAt = this.now().getTime();
    const duration =
      kind === TokenKind.ACCESS ? this.accessTokenDuration : this.refreshTokenDuration;

    const payload: TokenClaimsPayload = {
      user_id: userId,
      email,
      ...(role === '' ? {} : { role }),
      exp: toNumericDate(issuedAt + duration),
      iat: toNumericDate(issuedAt),
      token_type: kind,
    };

    try {
      return jwt.sign(payload, this.key, { algorithm: SIGNING_ALGORITHM });
    } catch (error) {
      throw new TokenSigningError(error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Signature and shape come first: only an authentic, well-formed token can
   * be reported as expired.
   */
  private parse(token: string, ignoreExpiration: boolean): Claims {
    const now = toNumericDate(this.now().getTime());

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.key, {
        algorithms: ACCEPTED_ALGORITHMS,
        ignoreExpiration: true,
        clockTimestamp: now,
      });
    } catch (error) {
      throw new InvalidTokenError(error instanceof Error ? error.message : 'invalid token');
    }

    const result = TokenClaimsSchema.safeParse(decoded);
    if (!result.success) {
      throw new InvalidTokenError('unexpected claims payload');
    }

    const claims = toClaims(result.data);
    if (!ignoreExpiration && now >= result.data.exp) {
      throw new TokenExpiredError(claims.expiresAt);
    }
    return claims;
  }
}
