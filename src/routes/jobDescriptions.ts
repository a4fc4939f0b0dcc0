import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { JobDescriptionRepository } from '../repositories/types';
import type { JobDescriptionParser } from '../services/jobDescriptionParser';
import { AuthError, NotFoundError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';
import { systemClock, type Clock } from '../utils/time';

export interface JobDescriptionRouterDeps {
  jobDescriptions: JobDescriptionRepository;
  parser: JobDescriptionParser;
  auth: AuthMiddleware;
  clock?: Clock;
}

const createSchema = z.object({ text: z.string().max(50000) });

export function createJobDescriptionRouter({ jobDescriptions, parser, auth, clock = systemClock }: JobDescriptionRouterDeps) {
  const router = Router();
  router.use(auth.requireAuth());

  router.post('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `parse-jd-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const { text } = parseRequest(createSchema, req.body);
      const parsed = await parser.parse(text);
      const record = await jobDescriptions.insert({
        id: `jd_${uuid()}`,
        user_id: req.user.id,
        raw_text: text,
        parsed,
        created_at: clock().toISOString(),
      });

      await Logger.logInfo('JobDescriptions', 'Job description parsed', {
        TransactionID: transactionId,
        Endpoint: 'POST /job-descriptions',
        UserID: req.user.id,
        RelatedTo: record.id,
        Status: 'SUCCESS',
      });
      return res.status(201).json({ job_description: record });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'JobDescriptions',
        TransactionID: transactionId,
        Endpoint: 'POST /job-descriptions',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `list-jds-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const items = await jobDescriptions.list(req.user.id);
      return res.json({
        job_descriptions: items.map(({ id, parsed, created_at }) => ({
          id,
          title: parsed.title,
          company: parsed.company,
          created_at,
        })),
      });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'JobDescriptions',
        TransactionID: transactionId,
        Endpoint: 'GET /job-descriptions',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-jd-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const jd = await jobDescriptions.findById(req.user.id, req.params.id);
      if (!jd) throw new NotFoundError('Job description');
      return res.json({ job_description: jd });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'JobDescriptions',
        TransactionID: transactionId,
        Endpoint: 'GET /job-descriptions/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.delete('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `delete-jd-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const removed = await jobDescriptions.delete(req.user.id, req.params.id);
      if (!removed) throw new NotFoundError('Job description');
      return res.status(204).send();
    } catch (error) {
      return respondWithError(res, error, {
        category: 'JobDescriptions',
        TransactionID: transactionId,
        Endpoint: 'DELETE /job-descriptions/:id',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
