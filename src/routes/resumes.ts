import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import { singleUpload } from '../middleware/upload';
import type { ResumeRepository } from '../repositories/types';
import type { ResumeParser, ResumeSource } from '../services/resumeParser';
import type { ResumeRecord } from '../types/resume';
import { AuthError, NotFoundError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';
import { systemClock, type Clock } from '../utils/time';

export interface ResumeRouterDeps {
  resumes: ResumeRepository;
  parser: ResumeParser;
  auth: AuthMiddleware;
  clock?: Clock;
}

const textResumeSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
  fileName: z.string().trim().optional(),
});

export function createResumeRouter({ resumes, parser, auth, clock = systemClock }: ResumeRouterDeps) {
  const router = Router();
  router.use(auth.requireAuth());

  // multipart `file`, or JSON { text, fileName }
  router.post('/', singleUpload('file'), async (req: AuthenticatedRequest, res) => {
    const transactionId = `parse-resume-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      let source: ResumeSource;
      let fileName: string;
      if (req.file) {
        fileName = req.file.originalname;
        source = { buffer: req.file.buffer, fileName, mimeType: req.file.mimetype };
      } else {
        const body = parseRequest(textResumeSchema, req.body);
        fileName = body.fileName || 'resume.txt';
        source = { text: body.text };
      }

      const parsed = await parser.parse(source);
      const record: ResumeRecord = await resumes.insert({
        id: `res_${uuid()}`,
        user_id: req.user.id,
        file_name: fileName,
        parsed,
        raw_text: parsed.raw_text,
        parsing_confidence: parsed.parsing_confidence,
        created_at: clock().toISOString(),
      });

      await Logger.logInfo('Resumes', 'Resume parsed', {
        TransactionID: transactionId,
        Endpoint: 'POST /resumes',
        UserID: req.user.id,
        RelatedTo: record.id,
        Status: 'SUCCESS',
        ResponsePayload: { confidence: record.parsing_confidence },
      });
      return res.status(201).json({ resume: record });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Resumes',
        TransactionID: transactionId,
        Endpoint: 'POST /resumes',
        UserID: req.user?.id,
        fallbackMessage: 'Failed to parse resume',
      });
    }
  });

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `list-resumes-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const items = await resumes.list(req.user.id);
      return res.json({
        resumes: items.map(({ id, file_name, parsing_confidence, created_at, parsed }) => ({
          id,
          file_name,
          parsing_confidence,
          created_at,
          full_name: parsed.personal_info.full_name,
        })),
      });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Resumes',
        TransactionID: transactionId,
        Endpoint: 'GET /resumes',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-resume-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const resume = await resumes.findById(req.user.id, req.params.id);
      if (!resume) throw new NotFoundError('Resume');
      return res.json({ resume });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Resumes',
        TransactionID: transactionId,
        Endpoint: 'GET /resumes/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.delete('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `delete-resume-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const removed = await resumes.delete(req.user.id, req.params.id);
      if (!removed) throw new NotFoundError('Resume');
      return res.status(204).send();
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Resumes',
        TransactionID: transactionId,
        Endpoint: 'DELETE /resumes/:id',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
