export * from './types/auth';
export * from './utils/traceId';
