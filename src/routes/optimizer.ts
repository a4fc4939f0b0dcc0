import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { JobDescriptionRepository, ResumeRepository } from '../repositories/types';
import type { ResumeOptimizer } from '../services/resumeOptimizer';
import type { ResumeVersionManager } from '../services/resumeVersionManager';
import type { UserManager } from '../services/userManager';
import type { JobDescriptionRecord } from '../types/jobDescription';
import type { OptimizationReport } from '../types/optimizer';
import type { ResumeRecord } from '../types/resume';
import { AuthError, NotFoundError, errorMessage, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface OptimizerRouterDeps {
  resumes: ResumeRepository;
  jobDescriptions: JobDescriptionRepository;
  optimizer: ResumeOptimizer;
  userManager: UserManager;
  versions: ResumeVersionManager;
  auth: AuthMiddleware;
}

const pairSchema = z.object({
  resume_id: z.string().min(1),
  job_description_id: z.string().min(1),
});

const optimizeSchema = pairSchema.extend({
  save_version: z.boolean().optional().default(false),
  version_name: z.string().trim().optional(),
});

export function createOptimizerRouter(deps: OptimizerRouterDeps) {
  const { resumes, jobDescriptions, optimizer, userManager, versions, auth } = deps;
  const router = Router();
  router.use(auth.requireAuth());

  const loadPair = async (userId: string, body: z.infer<typeof pairSchema>): Promise<[ResumeRecord, JobDescriptionRecord]> => {
    const [resume, jd] = await Promise.all([
      resumes.findById(userId, body.resume_id),
      jobDescriptions.findById(userId, body.job_description_id),
    ]);
    if (!resume) throw new NotFoundError('Resume');
    if (!jd) throw new NotFoundError('Job description');
    return [resume, jd];
  };

  router.post('/ats-score', async (req: AuthenticatedRequest, res) => {
    const transactionId = `ats-score-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const [resume, jd] = await loadPair(req.user.id, parseRequest(pairSchema, req.body));
      const ats_score = await optimizer.calculateAtsScore(resume.parsed, jd.parsed);
      return res.json({ ats_score });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Optimizer',
        TransactionID: transactionId,
        Endpoint: 'POST /optimizer/ats-score',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/keywords', async (req: AuthenticatedRequest, res) => {
    const transactionId = `keywords-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const [resume, jd] = await loadPair(req.user.id, parseRequest(pairSchema, req.body));
      const keyword_analysis = await optimizer.analyzeResumeVsJd(resume.parsed, jd.parsed);
      return res.json({ keyword_analysis });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Optimizer',
        TransactionID: transactionId,
        Endpoint: 'POST /optimizer/keywords',
        UserID: req.user?.id,
      });
    }
  });

  // Spends one credit for free accounts; the credit comes back if the analysis fails
  router.post('/optimize', async (req: AuthenticatedRequest, res) => {
    const transactionId = `optimize-${uuid()}`;
    try {
      if (!req.user) throw new AuthError();
      const userId = req.user.id;
      const body = parseRequest(optimizeSchema, req.body);
      const [resume, jd] = await loadPair(userId, body);

      const credits = await userManager.consumeOptimizationCredit(userId);
      let report: OptimizationReport;
      try {
        report = await optimizer.optimize(resume.parsed, jd.parsed);
      } catch (err) {
        await userManager.refundOptimizationCredit(userId);
        await Logger.logWarning('Optimizer', 'Optimization failed; credit refunded', {
          TransactionID: transactionId,
          UserID: userId,
          Exception: errorMessage(err),
        });
        throw err;
      }

      const version = body.save_version
        ? await versions.createVersion(userId, {
            name: body.version_name,
            resume_data: resume.parsed,
            target_company: jd.parsed.company,
            target_position: jd.parsed.title,
            job_description_text: jd.raw_text,
            ats_score: report.ats_score,
            optimization_applied: [...new Set(report.suggestions.map((s) => s.type))],
          })
        : null;

      await Logger.logInfo('Optimizer', 'Resume optimized', {
        TransactionID: transactionId,
        Endpoint: 'POST /optimizer/optimize',
        UserID: userId,
        Status: 'SUCCESS',
        ResponsePayload: { overall: report.ats_score.overall_score, suggestions: report.suggestions.length },
      });
      return res.json({
        report,
        credits: { unlimited: credits.unlimited, remaining: credits.remaining },
        version_id: version?.id ?? null,
      });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Optimizer',
        TransactionID: transactionId,
        Endpoint: 'POST /optimizer/optimize',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
