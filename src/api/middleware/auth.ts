import { Request, Response, NextFunction } from 'express';
import type { TokenValidator } from '../../auth/tokenValidator';
import { AuthenticationError } from '../../shared/errors';
import { AuthContext } from '../../shared/types';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

/**
 * Resolves a bearer access token into `req.authContext`. Requests without an
 * Authorization header pass through anonymously; a header that is present
 * but unusable is always a 401.
 */
export function createAuthMiddleware(validator: TokenValidator) {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      next();
      return;
    }

    if (!authHeader.startsWith('Bearer ')) {
      next(new AuthenticationError('Malformed authorization header.'));
      return;
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      next(new AuthenticationError('Missing token.'));
      return;
    }

    try {
      const result = await validator.validate(token, 'access');
      if (result.isErr()) {
        next(new AuthenticationError(result.error.detail));
        return;
      }

      const claims = result.value;
      if (!claims.role) {
        next(new AuthenticationError('Token is invalid.'));
        return;
      }

      req.authContext = { sub: claims.sub, role: claims.role, jti: claims.jti };
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  if (!req.authContext) {
    next(new AuthenticationError());
    return;
  }
  next();
}

/** The authenticated caller; only valid behind `requireAuth`. */
export function currentUser(req: Request): AuthContext {
  if (!req.authContext) {
    throw new AuthenticationError();
  }
  return req.authContext;
}
