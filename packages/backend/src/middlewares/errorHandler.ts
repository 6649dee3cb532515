import { ErrorCode, createErrorResponse } from '@storefront/contracts';
import { Request, Response, NextFunction } from 'express';

import '../types/express-augmentation';
import { AppError } from '../errors/AppError';
import { InvalidTokenError, TokenSigningError } from '../errors/TokenError';
import { logger } from '../utils/logger';

interface ErrorInfo {
  statusCode: number;
  code: string;
  message: string;
  details?: string[];
}

/**
 * Extract error information from error object
 */
function getErrorInfo(err: Error): ErrorInfo {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      code: err.code,
      message: err.message,
      details: err.details,
    };
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return {
      statusCode: 400,
      code: ErrorCode.BAD_REQUEST,
      message: 'Invalid JSON payload',
    };
  }

  return {
    statusCode: 500,
    code: ErrorCode.INTERNAL_ERROR,
    message: 'Internal server error',
  };
}

function internalReason(err: Error): string | undefined {
  if (err instanceof InvalidTokenError || err instanceof TokenSigningError) {
    return err.reason;
  }
  return undefined;
}

/**
 * Global error handler middleware
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const { statusCode, code, message, details } = getErrorInfo(err);

  const logContext = {
    statusCode,
    code,
    path: req.path,
    traceId: req.id,
    reason: internalReason(err),
  };
  if (statusCode >= 500) {
    logger.error(message, { ...logContext, error: err });
  } else {
    logger.warn(message, logContext);
  }

  const errorResponse = createErrorResponse({
    code,
    message,
    details,
    path: req.path,
    requestId: req.id ?? 'unknown',
  });

  res.status(statusCode).json(errorResponse);
}
