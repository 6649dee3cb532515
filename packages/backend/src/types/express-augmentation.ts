/**
 * Express Request augmentation.
 *
 * Imported for its side effect by every module that reads `req.user` or
 * `req.id`, so the augmentation is in scope wherever those are compiled.
 */

import { AuthUser } from '../auth/types';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      // authenticated caller (set by the authenticate middleware)
      user?: AuthUser;

      // trace id (set by the traceContext middleware)
      id?: string;
    }
  }
}

export {};
