import { Request, Response, NextFunction } from 'express';
import { AuthService } from '../services/auth.service';
import { TokenError, TokenErrorKind } from '../services/token.service';
import { ErrorCode } from '../types/error-dtos';
import { User } from '../types/domain';
import { describeError, isServiceError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ResponseBuilder } from '../utils/response-builder';

export const ACCESS_TOKEN_COOKIE = 'access_token';

// Global declaration merging to add 'user' property to Request
declare module 'express-serve-static-core' {
  interface Request {
    user?: User;
  }
}

/** Why a request was refused by the gate. */
export type GateFailure = 'Unauthenticated' | TokenErrorKind | 'AccountInactive' | 'Forbidden';

export type GateResult =
  | { status: 'authenticated'; user: User }
  | { status: 'rejected'; reason: GateFailure };

/**
 * Pulls the access token from the request: the cookie first, then the Authorization header.
 */
export const extractToken = (req: Request): string | null => {
  // req.cookies is filled by cookie-parser
  const raw: unknown = req.cookies?.[ACCESS_TOKEN_COOKIE];
  if (typeof raw === 'string') {
    const token = raw.startsWith('Bearer ') ? raw.slice('Bearer '.length).trim() : raw.trim();
    if (token) return token;
  }

  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice('Bearer '.length).trim();
    if (token) return token;
  }

  return null;
};

/**
 * Runs the gate for one request: extract, validate, resolve, active check and, when asked, admin check.
 * Store failures propagate to the caller.
 */
export const evaluateAccess = async (
  authService: AuthService,
  token: string | null,
  options: { requireAdmin?: boolean } = {}
): Promise<GateResult> => {
  if (!token) {
    return { status: 'rejected', reason: 'Unauthenticated' };
  }

  let user: User;
  try {
    user = await authService.resolveUser(token);
  } catch (error: unknown) {
    if (error instanceof TokenError) {
      return { status: 'rejected', reason: error.kind };
    }
    // A valid token for a vanished account looks the same as a bad token
    if (isServiceError(error, 'UserNotFound')) {
      return { status: 'rejected', reason: 'Unauthenticated' };
    }
    throw error;
  }

  if (!user.isActive) {
    return { status: 'rejected', reason: 'AccountInactive' };
  }
  if (options.requireAdmin && !user.isAdmin) {
    return { status: 'rejected', reason: 'Forbidden' };
  }

  return { status: 'authenticated', user };
};

const rejectRequest = (res: Response, reason: GateFailure): void => {
  switch (reason) {
    case 'Expired':
      return ResponseBuilder.unauthorized(
        res,
        'Authentication token has expired.',
        ErrorCode.TOKEN_EXPIRED
      );
    case 'InvalidSignature':
      return ResponseBuilder.unauthorized(
        res,
        'Authentication token is invalid.',
        ErrorCode.TOKEN_INVALID
      );
    case 'Malformed':
      return ResponseBuilder.unauthorized(
        res,
        'Authentication token is malformed.',
        ErrorCode.TOKEN_MALFORMED
      );
    case 'AccountInactive':
      return ResponseBuilder.error(res, ErrorCode.ACCOUNT_INACTIVE, 'Inactive user.', 403);
    case 'Forbidden':
      return ResponseBuilder.forbidden(res, 'Admin access required.');
    case 'Unauthenticated':
      return ResponseBuilder.unauthorized(res, 'Could not validate credentials.');
  }
};

const redirectToLogin = (res: Response, reason: GateFailure): void => {
  if (reason === 'AccountInactive' || reason === 'Forbidden') {
    return rejectRequest(res, reason);
  }
  res.redirect(303, '/login');
};

/**
 * Builds the request guards bound to an AuthService.
 * On success `req.user` holds the freshly loaded account.
 */
export const createAuthGuards = (authService: AuthService) => {
  const guard = (requireAdmin: boolean, onReject: typeof rejectRequest = rejectRequest) => {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const result = await evaluateAccess(authService, extractToken(req), { requireAdmin });

        if (result.status === 'rejected') {
          logger.warn('Access denied', { reason: result.reason, method: req.method, path: req.path });
          return onReject(res, result.reason);
        }

        req.user = result.user;
        next();
      } catch (error: unknown) {
        logger.error('Access check failed', { path: req.path, error: describeError(error) });
        ResponseBuilder.error(
          res,
          ErrorCode.INTERNAL_SERVER_ERROR,
          'An error occurred during authentication.',
          500
        );
      }
    };
  };

  return {
    /** Requires a valid token for an active account. */
    authenticate: guard(false),
    /** Same as authenticate, plus the admin flag. */
    requireAdmin: guard(true),
    /** For HTML pages: a missing or unusable token sends the browser to the login form. */
    authenticatePage: guard(false, redirectToLogin),
  };
};

export type AuthGuards = ReturnType<typeof createAuthGuards>;

/**
 * Returns the account attached by the guards.
 * Handlers mounted behind `authenticate` can rely on it being present.
 */
export const currentUser = (req: Request): User => {
  if (!req.user) {
    throw new Error('currentUser() used on a route without authentication');
  }
  return req.user;
};

/** The account attached by the guards, if any ran for this request. */
export const attachedUser = (req: Request): User | undefined => req.user;
