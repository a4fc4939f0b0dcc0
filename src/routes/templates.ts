import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth';
import type { TemplateLibrary } from '../services/templateLibrary';
import { TEMPLATE_TIERS } from '../types/template';
import { ValidationError, respondWithError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { parseRequest } from '../utils/schema';

export interface TemplateRouterDeps {
  templates: TemplateLibrary;
  auth: AuthMiddleware;
}

const tier = z.enum(TEMPLATE_TIERS);

const templateFields = {
  question: z.string().trim().min(1).max(2000),
  answer: z.string().trim().min(1).max(10000),
  framework: z.enum(['STAR', 'PREP', 'FREE']).optional(),
  category: z.string().trim().max(60).optional(),
  tags: z.array(z.string().trim().max(40)).max(20).optional(),
  tier: tier.optional(),
};

const createSchema = z.object(templateFields);
const updateSchema = z.object(templateFields).partial().strict();
const tierSchema = z.object({ tier });

const listQuerySchema = z.object({
  tier: tier.optional(),
  category: z.string().optional(),
});

const searchQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
  limit: z.coerce.number().int().min(1).max(50).optional(),
  min_score: z.coerce.number().min(0).max(1).optional(),
});

export function createTemplateRouter({ templates, auth }: TemplateRouterDeps) {
  const router = Router();
  router.use(auth.optionalAuth());

  const ownerOf = (req: AuthenticatedRequest) => req.user?.id ?? null;

  router.get('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `list-templates-${uuid()}`;
    try {
      const filter = parseRequest(listQuerySchema, req.query);
      return res.json({ templates: await templates.listTemplates(ownerOf(req), filter) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'GET /templates',
        UserID: req.user?.id,
        fallbackMessage: 'Failed to load templates',
      });
    }
  });

  router.get('/search', async (req: AuthenticatedRequest, res) => {
    const transactionId = `search-templates-${uuid()}`;
    try {
      const query = parseRequest(searchQuerySchema, req.query);
      const hits = await templates.searchTemplates(ownerOf(req), query.q, { limit: query.limit, minScore: query.min_score });
      return res.json({
        results: hits.map((hit) => ({ template: hit.template, score: Math.round(hit.score * 1000) / 1000, method: hit.method })),
      });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'GET /templates/search',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/', async (req: AuthenticatedRequest, res) => {
    const transactionId = `create-template-${uuid()}`;
    try {
      const input = parseRequest(createSchema, req.body);
      const template = await templates.createTemplate(ownerOf(req), input);
      await Logger.logInfo('Templates', 'Template created', {
        TransactionID: transactionId,
        Endpoint: 'POST /templates',
        UserID: req.user?.id,
        RelatedTo: template.id,
        Status: 'SUCCESS',
      });
      return res.status(201).json({ template });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'POST /templates',
        UserID: req.user?.id,
      });
    }
  });

  router.get('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `get-template-${uuid()}`;
    try {
      return res.json({ template: await templates.getTemplate(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'GET /templates/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.put('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `update-template-${uuid()}`;
    try {
      const input = parseRequest(updateSchema, req.body);
      if (Object.keys(input).length === 0) throw new ValidationError('Nothing to update');
      return res.json({ template: await templates.updateTemplate(ownerOf(req), req.params.id, input) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'PUT /templates/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.delete('/:id', async (req: AuthenticatedRequest, res) => {
    const transactionId = `delete-template-${uuid()}`;
    try {
      await templates.deleteTemplate(ownerOf(req), req.params.id);
      return res.status(204).send();
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'DELETE /templates/:id',
        UserID: req.user?.id,
      });
    }
  });

  router.post('/:id/use', async (req: AuthenticatedRequest, res) => {
    const transactionId = `use-template-${uuid()}`;
    try {
      return res.json({ template: await templates.recordUsage(ownerOf(req), req.params.id) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'POST /templates/:id/use',
        UserID: req.user?.id,
      });
    }
  });

  router.put('/:id/tier', async (req: AuthenticatedRequest, res) => {
    const transactionId = `set-template-tier-${uuid()}`;
    try {
      const body = parseRequest(tierSchema, req.body);
      return res.json({ template: await templates.setTier(ownerOf(req), req.params.id, body.tier) });
    } catch (error) {
      return respondWithError(res, error, {
        category: 'Templates',
        TransactionID: transactionId,
        Endpoint: 'PUT /templates/:id/tier',
        UserID: req.user?.id,
      });
    }
  });

  return router;
}
