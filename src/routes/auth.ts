import { Router, type Response } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { SESSION_COOKIE, readSessionId, type AuthMiddleware, type AuthenticatedRequest } from '../middleware/auth';
import type { EmailVerificationService } from '../services/emailVerification';
import type { GuestDataMigrator } from '../services/guestDataMigrator';
import type { UserManager } from '../services/userManager';
import { toPublicUser } from '../types/user';
import { respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface AuthRouterDeps {
  userManager: UserManager;
  verification: EmailVerificationService;
  guestData: GuestDataMigrator;
  auth: AuthMiddleware;
}

const optionalText = z.string().trim().optional().transform((value) => value || undefined);

const registerSchema = z.object({
  username: z.string().trim(),
  password: z.string(),
  email: optionalText,
  phone: optionalText,
  referral_code: optionalText,
});

const loginSchema = z.object({
  login: z.string().trim().min(1, 'login is required'),
  password: z.string().min(1, 'password is required'),
  remember_me: z.boolean().optional().default(false),
});

const claimSchema = z.object({
  template_ids: z.array(z.string()).optional().default([]),
  version_ids: z.array(z.string()).optional().default([]),
});

function setSessionCookie(res: Response, sessionId: string, expiresAt: string) {
  res.cookie(SESSION_COOKIE, sessionId, {
    httpOnly: true,
    sameSite: 'lax',
    secure: process.env.NODE_ENV === 'production',
    expires: new Date(expiresAt),
  });
}

export function createAuthRouter({ userManager, verification, guestData, auth }: AuthRouterDeps) {
  const router = Router();

  router.post('/register', async (req, res) => {
    const transactionId = `register-${uuid()}`;
    try {
      const body = parseRequest(registerSchema, req.body);
      const user = await userManager.register({
        username: body.username,
        password: body.password,
        email: body.email,
        phone: body.phone,
        referralCode: body.referral_code,
      });

      await Logger.logInfo('Auth', 'User registered', {
        TransactionID: transactionId,
        Endpoint: 'POST /auth/register',
        UserID: user.id,
        Status: 'SUCCESS',
      });
      return res.status(201).json({ user, verification_sent: Boolean(user.email) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'POST /auth/register',
      });
    }
  });

  router.post('/login', async (req, res) => {
    const transactionId = `login-${uuid()}`;
    try {
      const body = parseRequest(loginSchema, req.body);
      const { session, user } = await userManager.login(body.login, body.password, {
        rememberMe: body.remember_me,
        ipAddress: req.ip,
        userAgent: req.get('user-agent'),
      });

      setSessionCookie(res, session.session_id, session.expires_at);
      await Logger.logInfo('Auth', 'User login successful', {
        TransactionID: transactionId,
        Endpoint: 'POST /auth/login',
        UserID: user.id,
        Status: 'SUCCESS',
      });
      return res.json({ user, session_id: session.session_id, expires_at: session.expires_at });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'POST /auth/login',
        Status: 'AUTH_FAILED',
      });
    }
  });

  router.post('/logout', async (req, res) => {
    const transactionId = `logout-${uuid()}`;
    try {
      const sessionId = readSessionId(req);
      if (sessionId) {
        await userManager.logout(sessionId);
      }
      res.clearCookie(SESSION_COOKIE);
      return res.json({ ok: true });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'POST /auth/logout',
      });
    }
  });

  router.get('/me', auth.requireAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `me-${uuid()}`;
    try {
      if (!req.user) return res.status(401).json({ error: 'Authentication required' });
      const credits = await userManager.creditStatus(req.user.id);
      return res.json({ user: toPublicUser(req.user.record), credits });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'GET /auth/me',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/verify-email', async (req, res) => {
    const transactionId = `verify-email-${uuid()}`;
    try {
      const code = typeof req.query.code === 'string' ? req.query.code.trim() : '';
      if (!code) {
        return res.status(400).json({ error: 'code is required', code: 'VALIDATION_ERROR' });
      }
      const result = await verification.verify(code);

      await Logger.logInfo('Auth', 'Email verified', {
        TransactionID: transactionId,
        Endpoint: 'GET /auth/verify-email',
        UserID: result.userId,
        Status: 'SUCCESS',
      });
      return res.json({ verified: true, referral_rewarded: result.referralRewarded });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'GET /auth/verify-email',
      });
    }
  });

  router.post('/resend-verification', auth.requireAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `resend-verification-${uuid()}`;
    try {
      if (!req.user) return res.status(401).json({ error: 'Authentication required' });
      await userManager.resendVerification(req.user.id);
      return res.json({ sent: true });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'POST /auth/resend-verification',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/claim-guest-data', auth.requireAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `claim-guest-data-${uuid()}`;
    try {
      if (!req.user) return res.status(401).json({ error: 'Authentication required' });
      const body = parseRequest(claimSchema, req.body);
      const claimed = await guestData.claim(req.user.id, { templateIds: body.template_ids, versionIds: body.version_ids });
      return res.json({ claimed });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Auth',
        TransactionID: transactionId,
        Endpoint: 'POST /auth/claim-guest-data',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
