import { ErrorCode } from '@storefront/contracts';

import { AppError } from './AppError';

/**
 * Token is malformed, unsigned, signed with a disallowed algorithm, signed
 * with another secret, or carries a payload of the wrong shape.
 *
 * The public message never says which; `reason` is for logs only.
 */
export class InvalidTokenError extends AppError {
  constructor(public readonly reason: string = 'invalid token') {
    super('Invalid token', 401, ErrorCode.UNAUTHORIZED);
    this.name = 'InvalidTokenError';
  }
}

/**
 * Token is authentic and well-formed but past its expiry instant
 */
export class TokenExpiredError extends AppError {
  constructor(public readonly expiredAt: Date) {
    super('Token expired', 401, ErrorCode.TOKEN_EXPIRED);
    this.name = 'TokenExpiredError';
  }
}

/**
 * Signing failed. Deterministic for a given secret, so never retried.
 */
export class TokenSigningError extends AppError {
  constructor(public readonly reason: string) {
    super('Failed to sign token', 500, ErrorCode.INTERNAL_ERROR);
    this.name = 'TokenSigningError';
  }
}
