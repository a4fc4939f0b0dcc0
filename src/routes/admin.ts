import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { SessionRepository, UserRepository } from '../repositories/types';
import type { FeedbackService } from '../services/feedbackService';
import { runMaintenance, type MaintenanceDeps } from '../services/maintenance';
import type { UserManager } from '../services/userManager';
import { toPublicUser } from '../types/user';
import { NotFoundError, ValidationError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';
import { systemClock, type Clock } from '../utils/time';

export interface AdminRouterDeps {
  users: UserRepository;
  sessions: SessionRepository;
  userManager: UserManager;
  feedback: FeedbackService;
  maintenance: MaintenanceDeps;
  auth: AuthMiddleware;
  clock?: Clock;
}

const pageSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});

const userPatchSchema = z
  .object({
    is_active: z.boolean(),
    role: z.enum(['user', 'admin']),
    vip_type: z.enum(['free', 'vip']),
    free_optimization_count: z.number().int().min(0),
  })
  .partial()
  .strict();

export function createAdminRouter(deps: AdminRouterDeps) {
  const { users, sessions, userManager, feedback, auth, clock = systemClock } = deps;
  const router = Router();
  router.use(auth.requireAdmin());

  router.get('/stats', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-stats-${uuid()}`;
    try {
      const sessions_cleaned = await userManager.cleanupExpiredSessions();
      const [stats, active_sessions] = await Promise.all([users.stats(), sessions.countActive(clock().toISOString())]);
      return res.json({ users: stats, active_sessions, sessions_cleaned });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'GET /admin/stats',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/users', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-users-${uuid()}`;
    try {
      const { page, page_size } = parseRequest(pageSchema, req.query);
      const result = await users.list({ offset: (page - 1) * page_size, limit: page_size });
      return res.json({ users: result.users.map(toPublicUser), total: result.total, page, page_size });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'GET /admin/users',
        UserID: req.user?.id,
      });
    }
  });

  router.patch('/users/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-update-user-${uuid()}`;
    try {
      const patch = parseRequest(userPatchSchema, req.body);
      if (Object.keys(patch).length === 0) throw new ValidationError('Nothing to update');
      const existing = await users.findById(req.params.id);
      if (!existing) throw new NotFoundError('User');

      const updated = await users.update(existing.id, patch);
      await Logger.logInfo('Admin', 'User updated by admin', {
        TransactionID: transactionId,
        Endpoint: 'PATCH /admin/users/:id',
        UserID: req.user?.id,
        RelatedTo: existing.id,
        RequestPayload: patch,
        Status: 'SUCCESS',
      });
      return res.json({ user: toPublicUser(updated) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'PATCH /admin/users/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/feedback', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-feedback-${uuid()}`;
    try {
      return res.json({ feedback: await feedback.list() });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'GET /admin/feedback',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/feedback/summary', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-feedback-summary-${uuid()}`;
    try {
      return res.json({ sent: await feedback.sendSummary() });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'POST /admin/feedback/summary',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/maintenance', async (req: AuthenticatedRequest, res) => {
    const transactionId = `admin-maintenance-${uuid()}`;
    try {
      return res.json({ cleaned: await runMaintenance(deps.maintenance) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Admin',
        TransactionID: transactionId,
        Endpoint: 'POST /admin/maintenance',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
