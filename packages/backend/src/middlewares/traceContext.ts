import { resolveTraceId } from '@storefront/shared';
import { Request, Response, NextFunction } from 'express';

import '../types/express-augmentation';
import { runWithTraceContext } from '../utils/traceContext';

export const TRACE_HEADER = 'x-trace-id';

function ensureTraceId(req: Request, res: Response): string {
  if (req.id !== undefined) {
    return req.id;
  }
  const traceId = resolveTraceId(req.get(TRACE_HEADER));
  req.id = traceId;
  res.setHeader(TRACE_HEADER, traceId);
  return traceId;
}

/**
 * Pick the request's trace id (reusing a well-formed upstream `x-trace-id`)
 * and echo it on the response
 */
export function assignTraceId(req: Request, res: Response, next: NextFunction): void {
  ensureTraceId(req, res);
  next();
}

/**
 * Run the rest of the chain inside the request's trace context.
 * Mounted after body parsing: stream callbacks from the parser do not carry
 * the async context.
 */
export function traceContext(req: Request, res: Response, next: NextFunction): void {
  const traceId = ensureTraceId(req, res);
  runWithTraceContext({ traceId }, () => next());
}
