import express from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';

import type { AppConfig } from './config/appConfig';
import type { Services } from './container';
import { createAuthMiddleware } from './middleware/auth';
import { createAdminRouter } from './routes/admin';
import { createAuthRouter } from './routes/auth';
import { createFeedbackRouter } from './routes/feedback';
import { createInterviewRouter } from './routes/interviews';
import { createJobDescriptionRouter } from './routes/jobDescriptions';
import { createOptimizerRouter } from './routes/optimizer';
import { createPageRouter } from './routes/pages';
import { createReferralRouter } from './routes/referrals';
import { createResumeRouter } from './routes/resumes';
import { createTaskRouter } from './routes/tasks';
import { createTemplateRouter } from './routes/templates';
import { createVersionRouter } from './routes/versions';
import { AppError, errorMessage } from './utils/errors';
import { Logger } from './utils/Logger';

// Body-parser marks its own failures (bad JSON, oversized body) with a client status
function clientStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(config: AppConfig, services: Services) {
  const app = express();
  const { repos, clock } = services;
  const auth = createAuthMiddleware(services.userManager, config.adminPassword);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || config.allowedOrigins.length === 0 || config.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        return callback(new Error('Not allowed by CORS'));
      },
      credentials: true,
      allowedHeaders: ['Content-Type', 'Authorization'],
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    })
  );

  app.use(express.json({ limit: config.bodyLimit }));
  app.use(express.urlencoded({ limit: config.bodyLimit, extended: true }));
  app.use(cookieParser());

  app.get('/health', (_req, res) => {
    res.json({ ok: true, llm: config.llm !== null, speech: config.azureSpeech !== null });
  });

  app.use('/auth', createAuthRouter({
    userManager: services.userManager,
    verification: services.verification,
    guestData: services.guestData,
    auth,
  }));
  app.use('/resumes', createResumeRouter({ resumes: repos.resumes, parser: services.resumeParser, auth, clock }));
  app.use('/job-descriptions', createJobDescriptionRouter({
    jobDescriptions: repos.jobDescriptions,
    parser: services.jobDescriptionParser,
    auth,
    clock,
  }));
  app.use('/optimizer', createOptimizerRouter({
    resumes: repos.resumes,
    jobDescriptions: repos.jobDescriptions,
    optimizer: services.optimizer,
    userManager: services.userManager,
    versions: services.versions,
    auth,
  }));
  app.use('/versions', createVersionRouter({ versions: services.versions, resumes: repos.resumes, auth }));
  app.use('/templates', createTemplateRouter({ templates: services.templates, auth }));
  app.use('/interviews', createInterviewRouter({ interviews: services.interviews, auth }));
  app.use('/tasks', createTaskRouter({ tasks: services.tasks, auth }));
  app.use('/referrals', createReferralRouter({ referrals: services.referrals, auth }));
  app.use('/feedback', createFeedbackRouter({ feedback: services.feedback, auth }));
  app.use('/admin', createAdminRouter({
    users: repos.users,
    sessions: repos.sessions,
    userManager: services.userManager,
    feedback: services.feedback,
    maintenance: services.maintenance,
    auth,
    clock,
  }));
  app.use('/', createPageRouter({
    renderer: services.renderer,
    versions: services.versions,
    interviews: services.interviews,
    auth,
  }));

  // Global error handler middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = err instanceof AppError ? err.status : clientStatus(err);

    Logger.logBackendError('Server', err, {
      Endpoint: req.path || 'Unknown',
      Status: status ? 'REQUEST_ERROR' : 'UNHANDLED_ERROR',
      RequestPayload: { method: req.method, path: req.path },
    }).catch((logErr: unknown) => {
      console.error('Failed to log error:', errorMessage(logErr));
    });

    if (status) {
      res.status(status).json({ error: errorMessage(err), code: err instanceof AppError ? err.code : 'BAD_REQUEST' });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
