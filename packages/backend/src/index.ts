export { createApp } from './app';
export type { AppDependencies } from './app';
export * from './auth';
export * from './metrics';
export { AppError } from './errors/AppError';
export { ValidationError } from './errors/ValidationError';
export { authenticate } from './middlewares/auth';
export { authorize } from './middlewares/authorize';
export { logger } from './utils/logger';
