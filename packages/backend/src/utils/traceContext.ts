import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped values available to anything running inside the request
 */
export interface TraceContext {
  traceId: string;
  userId?: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

/**
 * Run `fn` with `context` as the active trace context
 */
export function runWithTraceContext<T>(context: TraceContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getTraceContext(): TraceContext | undefined {
  return storage.getStore();
}

export function getTraceId(): string | undefined {
  return storage.getStore()?.traceId;
}

/**
 * Record the authenticated user on the active context, if there is one
 */
export function setTraceUser(userId: string): void {
  const context = storage.getStore();
  if (context !== undefined) {
    context.userId = userId;
  }
}
