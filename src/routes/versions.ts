import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { ResumeRepository } from '../repositories/types';
import type { ResumeVersionManager } from '../services/resumeVersionManager';
import type { ATSScore } from '../types/optimizer';
import { parsedResumeSchema, type ParsedResume } from '../types/resume';
import { NotFoundError, ValidationError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface VersionRouterDeps {
  versions: ResumeVersionManager;
  resumes: ResumeRepository;
  auth: AuthMiddleware;
}

const score = z.number().min(0).max(100);

const atsScoreSchema = z.object({
  overall_score: score,
  keyword_score: score,
  format_score: score,
  structure_score: score,
  quantification_score: score,
  issues: z.array(z.string()).default([]),
  improvements: z.array(z.string()).default([]),
}) satisfies z.ZodType<ATSScore, z.ZodTypeDef, unknown>;

const versionFields = {
  name: z.string().trim().max(120).optional(),
  target_company: z.string().trim().max(120).optional(),
  target_position: z.string().trim().max(120).optional(),
  description: z.string().max(2000).optional(),
  version_notes: z.string().max(5000).optional(),
  ats_score: atsScoreSchema.nullable().optional(),
  optimization_applied: z.array(z.string()).optional(),
};

const createSchema = z.object({
  ...versionFields,
  resume_id: z.string().optional(),
  resume_data: parsedResumeSchema.optional(),
  job_description_text: z.string().optional(),
  base_version_id: z.string().nullable().optional(),
});

const updateSchema = z.object({ ...versionFields, resume_data: parsedResumeSchema.optional() }).strict();

const performanceSchema = z.object({
  applications_sent: z.number().int().min(0).optional(),
  interviews_received: z.number().int().min(0).optional(),
  feedback: z.string().max(2000).optional(),
  ats_score: score.optional(),
});

export function createVersionRouter({ versions, resumes, auth }: VersionRouterDeps) {
  const router = Router();
  router.use(auth.optionalAuth());

  const ownerOf = (req: AuthenticatedRequest) => req.user?.id ?? null;

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `list-versions-${uuid()}`;
    try {
      return res.json({ versions: await versions.listVersions(ownerOf(req)) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `create-version-${uuid()}`;
    try {
      const owner = ownerOf(req);
      const { resume_id, resume_data, ...input } = parseRequest(createSchema, req.body);

      let resumeData: ParsedResume;
      if (resume_data) {
        resumeData = resume_data;
      } else if (resume_id && owner) {
        const resume = await resumes.findById(owner, resume_id);
        if (!resume) throw new NotFoundError('Resume');
        resumeData = resume.parsed;
      } else {
        throw new ValidationError('resume_data is required (resume_id needs a signed-in account)');
      }

      const version = await versions.createVersion(owner, { ...input, resume_data: resumeData });
      await Logger.logInfo('ResumeVersions', 'Version created', {
        TransactionID: transactionId,
        Endpoint: 'POST /versions',
        UserID: owner ?? undefined,
        RelatedTo: version.id,
        Status: 'SUCCESS',
      });
      return res.status(201).json({ version });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'POST /versions',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/active', async (req: AuthenticatedRequest, res) => {
    const transactionId = `active-version-${uuid()}`;
    try {
      return res.json({ version: await versions.getActiveVersion(ownerOf(req)) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/active',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/best', async (req: AuthenticatedRequest, res) => {
    const transactionId = `best-version-${uuid()}`;
    try {
      const best = await versions.getBestPerformingVersion(ownerOf(req));
      return res.json({ version: best?.version ?? null, score: best?.score ?? null });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/best',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/compare', async (req: AuthenticatedRequest, res) => {
    const transactionId = `compare-versions-${uuid()}`;
    try {
      const a = typeof req.query.a === 'string' ? req.query.a : '';
      const b = typeof req.query.b === 'string' ? req.query.b : '';
      if (!a || !b) throw new ValidationError('Query parameters a and b are required');
      if (a === b) throw new ValidationError('Choose two different versions');
      const { cached, ...comparison } = await versions.compareVersions(ownerOf(req), a, b);
      return res.json({ comparison, cached });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/compare',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-version-${uuid()}`;
    try {
      return res.json({ version: await versions.getVersion(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.put('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `update-version-${uuid()}`;
    try {
      const update = parseRequest(updateSchema, req.body);
      return res.json({ version: await versions.updateVersion(ownerOf(req), req.params.id, update) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'PUT /versions/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.delete('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `delete-version-${uuid()}`;
    try {
      await versions.deleteVersion(ownerOf(req), req.params.id);
      return res.status(204).send();
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'DELETE /versions/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/:id/activate', async (req: AuthenticatedRequest, res) => {
    const transactionId = `activate-version-${uuid()}`;
    try {
      return res.json({ version: await versions.setActiveVersion(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'POST /versions/:id/activate',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id/performance', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-performance-${uuid()}`;
    try {
      return res.json({ performance: await versions.getPerformanceMetrics(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/:id/performance',
        UserID: req.user?.id,
      });
    }
  });

  router.put('/:id/performance', async (req: AuthenticatedRequest, res) => {
    const transactionId = `update-performance-${uuid()}`;
    try {
      const update = parseRequest(performanceSchema, req.body);
      return res.json({ performance: await versions.updatePerformanceMetrics(ownerOf(req), req.params.id, update) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'PUT /versions/:id/performance',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id/report', async (req: AuthenticatedRequest, res) => {
    const transactionId = `version-report-${uuid()}`;
    try {
      return res.json({ report: await versions.generateVersionReport(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'ResumeVersions',
        TransactionID: transactionId,
        Endpoint: 'GET /versions/:id/report',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
