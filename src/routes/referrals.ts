import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { ReferralTracker } from '../services/referralTracker';
import { AuthError, respondWithError } from '../utils/errors';

export interface ReferralRouterDeps {
  referrals: ReferralTracker;
  auth: AuthMiddleware;
}

export function createReferralRouter({ referrals, auth }: ReferralRouterDeps) {
  const router = Router();

  router.get('/me', auth.requireAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `referral-stats-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      return res.json({ referrals: await referrals.getStats(req.user.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Referrals',
        TransactionID: transactionId,
        Endpoint: 'GET /referrals/me',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
