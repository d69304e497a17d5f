import type { Request, Response, NextFunction } from 'express';
import { AuthError } from '../domain/errors.js';

/**
 * Caller identity middleware. Sign-in happens upstream (reverse proxy or SSO);
 * this service only needs a stable username on every request.
 */
export function createRequireUser(options: { header: string; allowedUsers: string[] }) {
  const allowed = new Set(options.allowedUsers.map((user) => user.toLowerCase()));

  return (req: Request, res: Response, next: NextFunction): void => {
    const user = req.get(options.header)?.trim();

    if (!user) {
      next(new AuthError(`Sign-in required: missing ${options.header} header`));
      return;
    }
    if (allowed.size > 0 && !allowed.has(user.toLowerCase())) {
      next(new AuthError(`Sign-in required: user ${user} is not allowed`));
      return;
    }

    res.locals.user = user;
    next();
  };
}

/**
 * Username set by createRequireUser
 */
export function currentUser(res: Response): string {
  const user: unknown = res.locals.user;
  if (typeof user !== 'string' || user.length === 0) {
    throw new AuthError('Sign-in required');
  }
  return user;
}
