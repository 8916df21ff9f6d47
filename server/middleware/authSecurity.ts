import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { User } from '@shared/schema';
import type { IStorage } from '../storage';
import type { TokenService } from '../services/tokenService';
import { ACCOUNT_MESSAGES } from '@shared/messages';
import { AuthenticationError } from './errorHandler';
import { logger } from '../utils/logger';

export function extractBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) return undefined;
  const token = authHeader.substring(7).trim();
  return token || undefined;
}

/**
 * Bearer access-token check. On success the owning user is attached as
 * `req.user` and the raw token as `req.accessToken`.
 */
export function requireAuth(tokens: TokenService, storage: Pick<IStorage, 'getUser'>): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = extractBearerToken(req);
    if (!token) {
      next(new AuthenticationError('Authentication credentials were not provided', 'NO_TOKEN'));
      return;
    }

    let userId: number;
    try {
      userId = tokens.verifyAccess(token).userId;
    } catch (error) {
      logger.security('INVALID_TOKEN_ATTEMPT', {
        ip: req.ip,
        userAgent: req.headers['user-agent'],
      });
      next(error);
      return;
    }

    storage.getUser(userId).then(user => {
      if (!user) {
        next(new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'INVALID_TOKEN'));
        return;
      }
      req.user = user;
      req.accessToken = token;
      next();
    }, next);
  };
}

// Narrows req.user for handlers mounted behind requireAuth
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new AuthenticationError('Authentication credentials were not provided', 'NO_TOKEN');
  }
  return req.user;
}
