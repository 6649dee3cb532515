export * from './types';
export * from './jwt';
export * from './duration';
export * from './config';
export { TokenService } from './TokenService';
export { InvalidTokenError, TokenExpiredError, TokenSigningError } from '../errors/TokenError';
