/**
 * Authorization tier carried in token claims.
 *
 * The set is open: tokens may carry roles not listed here, and an empty role
 * is valid.
 */
export enum Role {
  USER = 'USER',
  ADMIN = 'ADMIN',
}

/**
 * Token kind, written to the `token_type` claim
 */
export enum TokenKind {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/**
 * Check whether a role string is one of the well-known roles
 */
export function isKnownRole(role: string): role is Role {
  return Object.values(Role).some((known) => known === role);
}
