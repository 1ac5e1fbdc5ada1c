import type { Request, Response, NextFunction } from 'express';
import { ForbiddenError, UnauthorizedError } from '../utils/customErrors';
import { hasPermission } from '../model/user.model';
import type { AuthUser, Permission } from '../model/user.model';
import type { UserRepository } from '../repositories/user.repository';
import type TokenService from '../services/token.service';
import { ACCESS_TOKEN_COOKIE } from '../services/token.service';
import logger from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export const LOGIN_PATH = '/login';

const readToken = (req: Request): string | undefined => {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.split(' ')[1];
  }

  const cookieToken: unknown = req.cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof cookieToken === 'string' && cookieToken ? cookieToken : undefined;
};

/**
 * Attaches the signed-in user to the request when a valid token is present.
 * Requests without one, or with a stale one, simply continue as anonymous.
 */
export const authenticate = (tokenService: TokenService, users: UserRepository) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const token = readToken(req);
    if (!token) {
      next();
      return;
    }

    try {
      const payload = await tokenService.verifyAccessToken(token);
      const user = await users.findById(payload.userId);

      if (user?.isActive) {
        req.user = user;
      } else {
        logger.warn(`Token presented for missing or inactive user ${payload.userId}`);
      }
      next();
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        next();
        return;
      }
      next(error);
    }
  };
};

const redirectToLogin = (req: Request, res: Response): void => {
  res.redirect(302, `${LOGIN_PATH}?next=${encodeURIComponent(req.originalUrl)}`);
};

export const requireLogin = (req: Request, res: Response, next: NextFunction): void => {
  if (!req.user) {
    redirectToLogin(req, res);
    return;
  }
  next();
};

// Anonymous users are sent to log in; signed-in users without the permission get 403.
export const requirePermission = (permission: Permission) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      redirectToLogin(req, res);
      return;
    }

    if (!hasPermission(req.user, permission)) {
      logger.warn(`User ${req.user.username} lacks ${permission} for ${req.originalUrl}`);
      next(new ForbiddenError('You do not have permission to perform this action'));
      return;
    }

    next();
  };
};

export const getUser = (req: Request): AuthUser => {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user;
};
