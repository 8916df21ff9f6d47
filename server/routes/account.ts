import { Router, type Request, type RequestHandler } from 'express';
import { ACCOUNT_MESSAGES } from '@shared/messages';
import { asyncHandler } from '../middleware/errorHandler';
import { currentUser } from '../middleware/authSecurity';
import { rateLimiter } from '../middleware/security';
import { validate } from '../validation/schemas';
import { serializeUser } from '../serializers';
import type { AccountService } from '../services/accountService';

export interface AccountRouterDeps {
  accounts: AccountService;
  auth: RequestHandler;
  authRateLimitMax: number;
}

// Availability checks accept the value in the body or the query string
function checkInput(req: Request): unknown {
  return req.method === 'GET' ? req.query : req.body;
}

/**
 * Account endpoints:
 * - POST /signup, POST /signin, POST /sign_out, POST /token/refresh
 * - GET|PUT|PATCH /userprofile
 * - GET|POST /emailvalidator, GET|POST /username-validator
 */
export function createAccountRouter({ accounts, auth, authRateLimitMax }: AccountRouterDeps): Router {
  const router = Router();
  const authLimiter = rateLimiter({
    windowMs: 15 * 60 * 1000,
    max: authRateLimitMax,
    message: 'Too many authentication attempts, please try again later.',
  });

  router.post('/signup', authLimiter, asyncHandler(async (req, res) => {
    const user = await accounts.signup(validate('signup', req.body));
    res.status(201).json(serializeUser(user));
  }));

  router.post('/signin', authLimiter, asyncHandler(async (req, res) => {
    const tokens = await accounts.signin(validate('signin', req.body));
    res.json(tokens);
  }));

  router.post('/sign_out', auth, asyncHandler(async (req, res) => {
    await accounts.signOut(currentUser(req), validate('signOut', req.body));
    res.json({ success: true });
  }));

  router.post('/token/refresh', authLimiter, asyncHandler(async (req, res) => {
    res.json(await accounts.refresh(validate('refresh', req.body)));
  }));

  router.get('/userprofile', auth, asyncHandler(async (req, res) => {
    const user = await accounts.getProfile(currentUser(req).id);
    res.json(serializeUser(user));
  }));

  router.put('/userprofile', auth, asyncHandler(async (req, res) => {
    const user = await accounts.updateProfile(currentUser(req), validate('profileReplace', req.body));
    res.json({ message: ACCOUNT_MESSAGES.updated, data: serializeUser(user) });
  }));

  router.patch('/userprofile', auth, asyncHandler(async (req, res) => {
    const user = await accounts.updateProfile(currentUser(req), validate('profileUpdate', req.body));
    res.json({ message: ACCOUNT_MESSAGES.updated, data: serializeUser(user) });
  }));

  const emailCheck = asyncHandler(async (req, res) => {
    const data = await accounts.checkEmail(validate('emailCheck', checkInput(req)));
    res.json({ success: true, data });
  });
  router.get('/emailvalidator', emailCheck);
  router.post('/emailvalidator', emailCheck);

  const usernameCheck = asyncHandler(async (req, res) => {
    const data = await accounts.checkUsername(validate('usernameCheck', checkInput(req)));
    res.json({ success: true, data });
  });
  router.get('/username-validator', usernameCheck);
  router.post('/username-validator', usernameCheck);

  return router;
}
