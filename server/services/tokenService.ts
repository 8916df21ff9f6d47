import jwt from 'jsonwebtoken';
import crypto from 'crypto';
import { z } from 'zod';
import type { User } from '@shared/schema';
import type { IStorage } from '../storage';
import { ACCOUNT_MESSAGES } from '@shared/messages';
import { AuthenticationError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';

const TOKEN_ALGORITHM: jwt.Algorithm = 'HS256';
const TOKEN_ISSUER = 'gallery-api';
const TOKEN_AUDIENCE = 'gallery-api-client';

export type TokenType = 'access' | 'refresh';

export interface TokenPair {
  access: string;
  refresh: string;
}

const claimsSchema = z.object({
  userId: z.number().int(),
  tokenType: z.enum(['access', 'refresh']),
  jti: z.string().min(1),
  exp: z.number(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface TokenServiceOptions {
  secret: string;
  accessTokenTtl: string;
  refreshTokenTtl: string;
}

const UNIT_SECONDS: Record<string, number> = {
  ms: 0.001,
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
};

/**
 * Converts "15m", "7d", "3600" (seconds) and the like to whole seconds.
 */
export function parseDuration(value: string): number {
  const match = /^(\d+)(ms|s|m|h|d)?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  const seconds = Math.floor(Number(match[1]) * UNIT_SECONDS[match[2] ?? 's']);
  if (seconds <= 0) {
    throw new Error(`Duration must be at least one second: ${value}`);
  }
  return seconds;
}

type TokenStore = Pick<IStorage, 'updateUser' | 'revokeToken' | 'isTokenRevoked' | 'purgeExpiredTokens'>;

/**
 * Signed bearer tokens. Access tokens are stateless; refresh tokens can be
 * revoked through the denylist until they expire.
 */
export class TokenService {
  private readonly accessTtl: number;
  private readonly refreshTtl: number;

  constructor(
    private readonly storage: TokenStore,
    private readonly options: TokenServiceOptions
  ) {
    this.accessTtl = parseDuration(options.accessTokenTtl);
    this.refreshTtl = parseDuration(options.refreshTokenTtl);
  }

  private sign(userId: number, tokenType: TokenType): string {
    return jwt.sign({ userId, tokenType }, this.options.secret, {
      expiresIn: tokenType === 'access' ? this.accessTtl : this.refreshTtl,
      algorithm: TOKEN_ALGORITHM,
      issuer: TOKEN_ISSUER,
      audience: TOKEN_AUDIENCE,
      jwtid: crypto.randomUUID(),
    });
  }

  private decode(token: string, expected: TokenType): TokenClaims {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [TOKEN_ALGORITHM],
        issuer: TOKEN_ISSUER,
        audience: TOKEN_AUDIENCE,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'TOKEN_EXPIRED');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'INVALID_TOKEN');
      }
      throw error;
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success || claims.data.tokenType !== expected) {
      throw new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'INVALID_TOKEN');
    }
    return claims.data;
  }

  /**
   * Issues an access/refresh pair and mirrors the access token onto the user.
   */
  async issue(user: User): Promise<TokenPair> {
    const pair = {
      access: this.sign(user.id, 'access'),
      refresh: this.sign(user.id, 'refresh'),
    };
    await this.storage.updateUser(user.id, { token: pair.access });
    return pair;
  }

  verifyAccess(token: string): TokenClaims {
    return this.decode(token, 'access');
  }

  async verifyRefresh(token: string): Promise<TokenClaims> {
    const claims = this.decode(token, 'refresh');
    if (await this.storage.isTokenRevoked(claims.jti)) {
      throw new AuthenticationError(ACCOUNT_MESSAGES.revokedToken, 'TOKEN_REVOKED');
    }
    return claims;
  }

  async refresh(refreshToken: string): Promise<string> {
    const claims = await this.verifyRefresh(refreshToken);
    const access = this.sign(claims.userId, 'access');
    const user = await this.storage.updateUser(claims.userId, { token: access });
    if (!user) {
      // Account removed after the token was issued
      throw new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'INVALID_TOKEN');
    }
    return access;
  }

  /**
   * Puts a refresh token on the denylist. When `ownerId` is given the token
   * must have been issued to that user.
   */
  async revoke(refreshToken: string, ownerId?: number): Promise<void> {
    const claims = await this.verifyRefresh(refreshToken);
    if (ownerId !== undefined && claims.userId !== ownerId) {
      throw new AuthenticationError(ACCOUNT_MESSAGES.invalidToken, 'INVALID_TOKEN');
    }

    const inserted = await this.storage.revokeToken({
      jti: claims.jti,
      userId: claims.userId,
      expiresAt: new Date(claims.exp * 1000),
    });
    if (!inserted) {
      throw new AuthenticationError(ACCOUNT_MESSAGES.revokedToken, 'TOKEN_REVOKED');
    }

    logger.security('REFRESH_TOKEN_REVOKED', { userId: claims.userId });
  }

  async purgeExpired(now = new Date()): Promise<number> {
    const purged = await this.storage.purgeExpiredTokens(now);
    if (purged > 0) {
      logger.info('Purged expired revoked tokens', { count: purged });
    }
    return purged;
  }
}
