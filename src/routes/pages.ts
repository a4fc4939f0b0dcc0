import { Router, type Response } from 'express';
import { v4 as uuid } from 'uuid';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { MockInterviewManager } from '../services/mockInterviewManager';
import type { PageRenderer } from '../services/pageRenderer';
import type { ResumeVersionManager } from '../services/resumeVersionManager';
import { AppError, AuthError } from '../utils/errors';
import { Logger } from '../utils/Logger';

export interface PageRouterDeps {
  renderer: PageRenderer;
  versions: ResumeVersionManager;
  interviews: MockInterviewManager;
  auth: AuthMiddleware;
}

const API_SECTIONS = [
  { path: '/auth', description: 'accounts, sessions and email verification' },
  { path: '/resumes', description: 'upload and parse resumes' },
  { path: '/job-descriptions', description: 'parse job postings' },
  { path: '/optimizer', description: 'ATS score, keyword gaps and suggestions' },
  { path: '/versions', description: 'tailored resume versions and their results' },
  { path: '/templates', description: 'answer template library' },
  { path: '/interviews', description: 'AI mock interviews' },
];

export function createPageRouter({ renderer, versions, interviews, auth }: PageRouterDeps) {
  const router = Router();
  router.use(auth.optionalAuth());

  const renderError = async (res: Response, error: unknown, endpoint: string, transactionId: string, userId?: string) => {
    const status = error instanceof AppError ? error.status : 500;
    const message = error instanceof AppError ? error.message : 'Something went wrong';
    await Logger.logBackendError('Pages', error, {
      TransactionID: transactionId,
      Endpoint: endpoint,
      UserID: userId,
      Status: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
    });
    try {
      return res.status(status).type('html').send(await renderer.render('error', String(status), { status, message }));
    } catch (renderErr) {
      await Logger.logError('Pages', renderErr, { TransactionID: transactionId, Endpoint: endpoint });
      return res.status(status).type('text').send(message);
    }
  };

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `home-page-${uuid()}`;
    try {
      return res.type('html').send(await renderer.render('home', 'Home', { sections: API_SECTIONS }));
    } catch (error) {
      return renderError(res, error, 'GET /', transactionId, req.user?.id);
    }
  });

  router.get('/pages/versions/:id/report', async (req: AuthenticatedRequest, res) => {
    const transactionId = `version-report-page-${uuid()}`;
    try {
      const report = await versions.generateVersionReport(req.user?.id ?? null, req.params.id);
      return res.type('html').send(await renderer.render('version-report', report.version_info.name, { report }));
    } catch (error) {
      return renderError(res, error, 'GET /pages/versions/:id/report', transactionId, req.user?.id);
    }
  });

  router.get('/pages/interviews/:id/summary', async (req: AuthenticatedRequest, res) => {
    const transactionId = `interview-summary-page-${uuid()}`;
    try {
      if (!req.user) throw new AuthError('Sign in to view this interview');
      const session = await interviews.getSession(req.user.id, req.params.id);
      const answers = session.answers.map((answer) => ({
        ...answer,
        question: session.questions[answer.question_index]?.question ?? '',
      }));
      return res.type('html').send(await renderer.render('interview-summary', 'Interview summary', { session, answers }));
    } catch (error) {
      return renderError(res, error, 'GET /pages/interviews/:id/summary', transactionId, req.user?.id);
    }
  });

  return router;
}
