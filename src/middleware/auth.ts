import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';
import type { UserManager } from '../services/userManager';
import type { UserRole } from '../types/roles';
import type { UserRecord } from '../types/user';
import { Logger } from '../utils/Logger';

export const SESSION_COOKIE = 'session_id';

export interface AuthenticatedRequest extends Request {
  user?: {
    id: string;
    username: string;
    role: UserRole;
    sessionId: string;
    record: UserRecord;
  };
  isAdminToken?: boolean;
}

// Bearer token first, then the session cookie
export function readSessionId(req: Request): string | undefined {
  const authHeader = req.headers.authorization || '';
  if (authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    if (token) return token;
  }
  const cookies: unknown = req.cookies;
  if (typeof cookies === 'object' && cookies !== null && SESSION_COOKIE in cookies) {
    const value: unknown = cookies[SESSION_COOKIE];
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}

function safeEqual(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

export function createAuthMiddleware(userManager: UserManager, adminPassword: string) {
  const resolveUser = async (req: AuthenticatedRequest): Promise<boolean> => {
    const sessionId = readSessionId(req);
    if (!sessionId) return false;
    const user = await userManager.getUserBySession(sessionId);
    if (!user) return false;
    req.user = { id: user.id, username: user.username, role: user.role, sessionId, record: user };
    return true;
  };

  const requireAuth = (allowedRoles?: UserRole[]) => {
    return async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      const transactionId = `auth-${uuid()}`;
      try {
        if (!(await resolveUser(req)) || !req.user) {
          await Logger.logBackendError('Auth', new Error('Missing or invalid session'), {
            TransactionID: transactionId,
            Endpoint: req.path || 'Unknown',
            Status: 'AUTH_ERROR',
          });
          return res.status(401).json({ error: 'Invalid or expired session', code: 'AUTH_ERROR' });
        }

        if (allowedRoles && allowedRoles.length > 0 && !allowedRoles.includes(req.user.role)) {
          await Logger.logBackendError('Auth', new Error('Forbidden - insufficient role'), {
            TransactionID: transactionId,
            Endpoint: req.path || 'Unknown',
            UserID: req.user.id,
            Status: 'FORBIDDEN',
            Exception: `User role ${req.user.role} not in allowed roles: ${allowedRoles.join(', ')}`,
          });
          return res.status(403).json({ error: 'Forbidden', code: 'FORBIDDEN' });
        }

        next();
      } catch (err) {
        await Logger.logBackendError('Auth', err, {
          TransactionID: transactionId,
          Endpoint: req.path || 'Unknown',
          Status: 'AUTH_ERROR',
          Exception: 'Unexpected authentication error',
        });
        return res.status(401).json({ error: 'Invalid or expired session', code: 'AUTH_ERROR' });
      }
    };
  };

  // Guests pass through without req.user
  const optionalAuth = () => {
    return async (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
      try {
        await resolveUser(req);
      } catch (err) {
        await Logger.logBackendError('Auth', err, {
          Endpoint: req.path || 'Unknown',
          Status: 'OPTIONAL_AUTH_FAILED',
        });
      }
      next();
    };
  };

  const requireAdmin = () => {
    return async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      const transactionId = `admin-auth-${uuid()}`;
      try {
        const token = readSessionId(req);
        if (token && safeEqual(token, adminPassword)) {
          req.isAdminToken = true;
          return next();
        }
        if ((await resolveUser(req)) && req.user?.role === 'admin') {
          return next();
        }

        await Logger.logBackendError('Auth', new Error('Admin access denied'), {
          TransactionID: transactionId,
          Endpoint: req.path || 'Unknown',
          UserID: req.user?.id,
          Status: 'FORBIDDEN',
        });
        return req.user
          ? res.status(403).json({ error: 'Forbidden', code: 'FORBIDDEN' })
          : res.status(401).json({ error: 'Admin credentials required', code: 'AUTH_ERROR' });
      } catch (err) {
        await Logger.logBackendError('Auth', err, {
          TransactionID: transactionId,
          Endpoint: req.path || 'Unknown',
          Status: 'AUTH_ERROR',
        });
        return res.status(401).json({ error: 'Admin credentials required', code: 'AUTH_ERROR' });
      }
    };
  };

  return { requireAuth, optionalAuth, requireAdmin };
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
