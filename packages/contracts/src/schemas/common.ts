import { z } from 'zod';

/**
 * Error codes enum
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  FORBIDDEN = 'FORBIDDEN',
  TOO_MANY_REQUESTS = 'TOO_MANY_REQUESTS',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
}

/**
 * Error response schema
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(z.string()).optional(),
  }),
  timestamp: z.string().datetime(),
  path: z.string(),
  requestId: z.string(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Create error response helper
 */
export function createErrorResponse(params: {
  code: string;
  message: string;
  details?: string[];
  path: string;
  requestId: string;
}): ErrorResponse {
  return {
    error: {
      code: params.code,
      message: params.message,
      details: params.details,
    },
    timestamp: new Date().toISOString(),
    path: params.path,
    requestId: params.requestId,
  };
}
