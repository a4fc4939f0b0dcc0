import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import { singleUpload } from '../middleware/upload';
import { MAX_QUESTIONS, type AnswerInput, type MockInterviewManager } from '../services/mockInterviewManager';
import { AuthError, ValidationError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface InterviewRouterDeps {
  interviews: MockInterviewManager;
  auth: AuthMiddleware;
}

const createSchema = z.object({
  target_position: z.string().trim().min(1, 'target_position is required'),
  target_company: z.string().trim().optional(),
  resume_id: z.string().nullable().optional(),
  job_description_id: z.string().nullable().optional(),
  question_count: z.number().int().min(1).max(MAX_QUESTIONS).optional(),
});

const segmentSchema = z.object({
  speaker: z.string().min(1),
  text: z.string(),
  start: z.number().optional(),
  end: z.number().optional(),
});

const answerSchema = z.union([
  z.object({ answer_text: z.string().trim().min(1, 'answer_text is required').max(20000) }),
  z.object({ segments: z.array(segmentSchema).min(1), candidate_speaker: z.string().optional() }),
]) satisfies z.ZodType<AnswerInput, z.ZodTypeDef, unknown>;

export function createInterviewRouter({ interviews, auth }: InterviewRouterDeps) {
  const router = Router();
  router.use(auth.requireAuth());

  router.post('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `create-interview-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const input = parseRequest(createSchema, req.body);
      const session = await interviews.createSession(req.user.id, input);

      await Logger.logInfo('MockInterview', 'Interview session created', {
        TransactionID: transactionId,
        Endpoint: 'POST /interviews',
        UserID: req.user.id,
        RelatedTo: session.id,
        Status: 'SUCCESS',
      });
      return res.status(202).json({ session, task_id: session.task_id });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'POST /interviews',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `list-interviews-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      return res.json({ sessions: await interviews.listSessions(req.user.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'GET /interviews',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-interview-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      return res.json({ session: await interviews.getSession(req.user.id, req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'GET /interviews/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id/next', async (req: AuthenticatedRequest, res) => {
    const transactionId = `next-question-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const next = await interviews.nextQuestion(req.user.id, req.params.id);
      return res.json(next ? { done: false, ...next } : { done: true });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'GET /interviews/:id/next',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/:id/answers', async (req: AuthenticatedRequest, res) => {
    const transactionId = `submit-answer-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const input = parseRequest(answerSchema, req.body);
      const { answer, session } = await interviews.submitAnswer(req.user.id, req.params.id, input);
      return res.json({ answer, status: session.status, summary: session.summary });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'POST /interviews/:id/answers',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/:id/audio-answers', singleUpload('audio'), async (req: AuthenticatedRequest, res) => {
    const transactionId = `submit-audio-answer-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      if (!req.file) throw new ValidationError('audio file is required');
      const { answer, session } = await interviews.submitAudioAnswer(req.user.id, req.params.id, req.file.buffer, req.file.mimetype);
      return res.json({ answer, status: session.status, summary: session.summary });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'POST /interviews/:id/audio-answers',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/:id/finish', async (req: AuthenticatedRequest, res) => {
    const transactionId = `finish-interview-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      return res.json({ session: await interviews.finishSession(req.user.id, req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'POST /interviews/:id/finish',
        UserID: req.user?.id,
      });
    }
  });

  router.delete('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `delete-interview-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      await interviews.deleteSession(req.user.id, req.params.id);
      return res.status(204).send();
    } catch (error) {
      return respondWithError(res, error, {
        category: 'MockInterview',
        TransactionID: transactionId,
        Endpoint: 'DELETE /interviews/:id',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
