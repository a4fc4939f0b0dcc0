import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { TaskRunner } from '../services/taskRunner';
import { AuthError, respondWithError } from '../utils/errors';

export interface TaskRouterDeps {
  tasks: TaskRunner;
  auth: AuthMiddleware;
}

export function createTaskRouter({ tasks, auth }: TaskRouterDeps) {
  const router = Router();

  router.get('/:id', auth.requireAuth(), async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-task-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      return res.json({ task: await tasks.get(req.params.id, req.user.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Tasks',
        TransactionID: transactionId,
        Endpoint: 'GET /tasks/:id',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
