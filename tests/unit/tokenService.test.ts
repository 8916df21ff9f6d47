import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { User } from '@shared/schema';
import { TokenService, parseDuration } from '../../server/services/tokenService';
import { MemStorage } from '../../server/memStorage';
import { userRow } from '../helpers/fixtures';

const options = { secret: 'test-secret', accessTokenTtl: '15m', refreshTokenTtl: '7d' };

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

describe('parseDuration', () => {
  it('should convert unit suffixes to seconds', () => {
    expect(parseDuration('15m')).toBe(900);
    expect(parseDuration('7d')).toBe(604800);
    expect(parseDuration('2h')).toBe(7200);
    expect(parseDuration(' 30s ')).toBe(30);
    expect(parseDuration('1500ms')).toBe(1);
  });

  it('should read a bare number as seconds', () => {
    expect(parseDuration('3600')).toBe(3600);
  });

  it('should reject durations below one second', () => {
    expect(() => parseDuration('500ms')).toThrow('Duration must be at least one second: 500ms');
    expect(() => parseDuration('0')).toThrow('Duration must be at least one second: 0');
  });

  it('should reject malformed durations', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration: soon');
    expect(() => parseDuration('-5m')).toThrow('Invalid duration: -5m');
  });
});

describe('TokenService', () => {
  let storage: MemStorage;
  let tokens: TokenService;
  let user: User;

  beforeEach(async () => {
    storage = new MemStorage();
    tokens = new TokenService(storage, options);
    user = await storage.createUser(userRow());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('issue and verify', () => {
    it('should issue a verifiable access token and store it on the user', async () => {
      const pair = await tokens.issue(user);

      expect(tokens.verifyAccess(pair.access)).toMatchObject({ userId: user.id, tokenType: 'access' });
      expect((await storage.getUser(user.id))?.token).toBe(pair.access);
    });

    it('should give every token its own id', async () => {
      const pair = await tokens.issue(user);

      const access = tokens.verifyAccess(pair.access);
      const refresh = await tokens.verifyRefresh(pair.refresh);

      expect(access.jti).not.toBe(refresh.jti);
    });

    it('should not accept a refresh token as an access token', async () => {
      const pair = await tokens.issue(user);

      expect(thrown(() => tokens.verifyAccess(pair.refresh))).toMatchObject({
        message: 'Invalid Token',
        code: 'INVALID_TOKEN',
        statusCode: 401,
      });
    });

    it('should reject malformed tokens and foreign signatures', async () => {
      const other = new TokenService(new MemStorage(), { ...options, secret: 'other-secret' });
      const pair = await other.issue(user);

      expect(thrown(() => tokens.verifyAccess('not-a-token'))).toMatchObject({ code: 'INVALID_TOKEN' });
      expect(thrown(() => tokens.verifyAccess(pair.access))).toMatchObject({ code: 'INVALID_TOKEN' });
    });

    it('should reject an access token after it expires', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      const pair = await tokens.issue(user);

      vi.setSystemTime(new Date('2026-01-01T00:14:00Z'));
      expect(tokens.verifyAccess(pair.access).userId).toBe(user.id);

      vi.setSystemTime(new Date('2026-01-01T00:16:00Z'));
      expect(thrown(() => tokens.verifyAccess(pair.access))).toMatchObject({
        message: 'Invalid Token',
        code: 'TOKEN_EXPIRED',
      });
    });
  });

  describe('refresh', () => {
    it('should mint a new access token and mirror it onto the user', async () => {
      const pair = await tokens.issue(user);

      const access = await tokens.refresh(pair.refresh);

      expect(tokens.verifyAccess(access).userId).toBe(user.id);
      expect((await storage.getUser(user.id))?.token).toBe(access);
    });

    it('should refuse an access token', async () => {
      const pair = await tokens.issue(user);

      await expect(tokens.refresh(pair.access)).rejects.toMatchObject({ code: 'INVALID_TOKEN' });
    });

    it('should refuse tokens for accounts that no longer exist', async () => {
      const detached = new TokenService(new MemStorage(), options);
      const pair = await detached.issue(user);

      await expect(detached.refresh(pair.refresh)).rejects.toMatchObject({
        message: 'Invalid Token',
        code: 'INVALID_TOKEN',
      });
    });
  });

  describe('revoke', () => {
    it('should blacklist a refresh token', async () => {
      const pair = await tokens.issue(user);

      await tokens.revoke(pair.refresh, user.id);

      await expect(tokens.refresh(pair.refresh)).rejects.toMatchObject({
        message: 'Token is blacklisted',
        code: 'TOKEN_REVOKED',
      });
    });

    it('should report a second revocation as blacklisted', async () => {
      const pair = await tokens.issue(user);
      await tokens.revoke(pair.refresh);

      await expect(tokens.revoke(pair.refresh)).rejects.toMatchObject({
        message: 'Token is blacklisted',
        statusCode: 401,
      });
    });

    it('should refuse to revoke another user\'s token', async () => {
      const other = await storage.createUser(userRow({ username: 'bobby!dev', email: 'bob@example.com' }));
      const pair = await tokens.issue(other);

      await expect(tokens.revoke(pair.refresh, user.id)).rejects.toMatchObject({
        message: 'Invalid Token',
        code: 'INVALID_TOKEN',
      });
      await expect(tokens.verifyRefresh(pair.refresh)).resolves.toMatchObject({ userId: other.id });
    });

    it('should leave other refresh tokens of the same user usable', async () => {
      const first = await tokens.issue(user);
      const second = await tokens.issue(user);

      await tokens.revoke(first.refresh, user.id);

      await expect(tokens.refresh(second.refresh)).resolves.toEqual(expect.any(String));
    });
  });

  describe('purgeExpired', () => {
    it('should drop denylist entries only after the token expires', async () => {
      const pair = await tokens.issue(user);
      await tokens.revoke(pair.refresh);

      expect(await tokens.purgeExpired(new Date())).toBe(0);
      expect(await tokens.purgeExpired(new Date(Date.now() + 8 * 24 * 60 * 60 * 1000))).toBe(1);
      expect(await storage.purgeExpiredTokens(new Date(Date.now() + 8 * 24 * 60 * 60 * 1000))).toBe(0);
    });
  });
});
