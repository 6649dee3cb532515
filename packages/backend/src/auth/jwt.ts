import type { Algorithm } from 'jsonwebtoken';

/**
 * Algorithm used when issuing tokens
 */
export const SIGNING_ALGORITHM: Algorithm = 'HS256';

/**
 * Algorithms accepted on verification. HMAC family only: `none` and
 * asymmetric algorithms are rejected even when the rest of the token is valid.
 */
export const ACCEPTED_ALGORITHMS: Algorithm[] = ['HS256', 'HS384', 'HS512'];

/**
 * Convert epoch milliseconds to a JWT NumericDate (seconds, fractional part kept)
 */
export function toNumericDate(epochMs: number): number {
  return epochMs / 1000;
}

/**
 * Convert a JWT NumericDate back to a Date, rounded to the millisecond
 */
export function fromNumericDate(numericDate: number): Date {
  return new Date(Math.round(numericDate * 1000));
}

/**
 * Extract Bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string): string | null {
  if (authHeader === '') {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2) {
    return null;
  }

  const [scheme, token] = parts;
  if (scheme === undefined || !/^Bearer$/i.test(scheme)) {
    return null;
  }

  if (token === undefined || token === '') {
    return null;
  }

  return token;
}
