import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { FeedbackService } from '../services/feedbackService';
import { respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface FeedbackRouterDeps {
  feedback: FeedbackService;
  auth: AuthMiddleware;
}

const feedbackSchema = z.object({
  content: z.string().trim().min(1, 'content is required').max(5000, 'content must be at most 5000 characters'),
});

export function createFeedbackRouter({ feedback, auth }: FeedbackRouterDeps) {
  const router = Router();

  // Guests may send feedback too
  router.post('/', auth.optionalAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `submit-feedback-${uuid()}`;
    try {
      const { content } = parseRequest(feedbackSchema, req.body);
      const record = await feedback.submit(content, {
        userId: req.user?.id ?? null,
        ipAddress: req.ip ?? null,
        userAgent: req.get('user-agent') ?? null,
        referer: req.get('referer') ?? null,
      });

      await Logger.logInfo('Feedback', 'Feedback received', {
        TransactionID: transactionId,
        Endpoint: 'POST /feedback',
        UserID: req.user?.id,
        RelatedTo: record.id,
        Status: record.delivered ? 'DELIVERED' : 'STORED',
      });
      return res.status(201).json({ id: record.id, delivered: record.delivered });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Feedback',
        TransactionID: transactionId,
        Endpoint: 'POST /feedback',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
