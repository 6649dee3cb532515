import { randomUUID } from 'crypto';

/**
 * Accepted shape for trace ids propagated from upstream callers
 */
const TRACE_ID_REGEX = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Generate a new trace ID (UUID v4)
 */
export function generateTraceId(): string {
  return randomUUID();
}

/**
 * Trace ID validation
 */
export function isValidTraceId(id: unknown): id is string {
  if (typeof id !== 'string') {
    return false;
  }
  return TRACE_ID_REGEX.test(id);
}

/**
 * Reuse an incoming trace ID when it is well-formed, otherwise mint one
 */
export function resolveTraceId(incoming: unknown): string {
  return isValidTraceId(incoming) ? incoming : generateTraceId();
}
