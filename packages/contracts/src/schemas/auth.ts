import { Role, TokenKind } from '@storefront/shared';
import { z } from 'zod';

/**
 * JWT payload as it travels on the wire.
 *
 * `iat` and `exp` are NumericDates (seconds since epoch, fractional part
 * allowed). `role` is omitted when empty; `token_type` is absent on tokens
 * minted before the kind claim existed.
 */
export const TokenClaimsSchema = z.object({
  user_id: z.string(),
  email: z.string(),
  role: z.string().optional(),
  token_type: z.nativeEnum(TokenKind).optional(),
  exp: z.number(),
  iat: z.number(),
});

export type TokenClaimsPayload = z.infer<typeof TokenClaimsSchema>;

export const VerifyTokenRequestSchema = z.object({
  token: z.string().min(1, 'token is required'),
});

export const RefreshTokenRequestSchema = z.object({
  refreshToken: z.string().min(1, 'refreshToken is required'),
});

export const DevTokenRequestSchema = z.object({
  userId: z.string().min(1).default('dev-user-1'),
  email: z.string().email().default('dev@example.com'),
  role: z.string().default(Role.USER),
});

export const TokenPairResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal('Bearer'),
  expiresIn: z.number().int().positive(),
});

export const VerifyTokenResponseSchema = z.discriminatedUnion('valid', [
  z.object({
    valid: z.literal(true),
    userId: z.string(),
    email: z.string(),
    role: z.string(),
    expiresAt: z.string().datetime(),
  }),
  z.object({
    valid: z.literal(false),
    reason: z.enum(['expired', 'invalid']),
    userId: z.string().optional(),
    email: z.string().optional(),
  }),
]);

/**
 * Type exports
 */
export type VerifyTokenRequest = z.infer<typeof VerifyTokenRequestSchema>;
export type RefreshTokenRequest = z.infer<typeof RefreshTokenRequestSchema>;
export type DevTokenRequest = z.infer<typeof DevTokenRequestSchema>;
export type TokenPairResponse = z.infer<typeof TokenPairResponseSchema>;
export type VerifyTokenResponse = z.infer<typeof VerifyTokenResponseSchema>;
