// Schemas
export * from './schemas/common';
export * from './schemas/auth';

// Re-export shared types
export { Role, TokenKind } from '@storefront/shared';
