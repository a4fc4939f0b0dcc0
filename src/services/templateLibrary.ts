import { v4 as uuid } from 'uuid';
import type { TemplateFilter, TemplateRepository } from '../repositories/types';
import type { AnswerFramework, TemplateRecord, TemplateSearchHit, TemplateTier } from '../types/template';
import { ForbiddenError, NotFoundError, ValidationError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addDays, systemClock, type Clock } from '../utils/time';
import { cosineSimilarity, jaccardSimilarity, type EmbeddingClient } from './embeddings';

// Days a template survives without being used; CORE never expires
export const TIER_RETENTION_DAYS: Record<TemplateTier, number | null> = {
  TEMPORARY: 3,
  SHORT: 14,
  MEDIUM: 60,
  CORE: null,
};

const TIER_RANK: Record<TemplateTier, number> = { TEMPORARY: 0, SHORT: 1, MEDIUM: 2, CORE: 3 };

const PROMOTIONS: Array<[number, TemplateTier]> = [
  [20, 'CORE'],
  [8, 'MEDIUM'],
  [3, 'SHORT'],
];

export function expiryFor(tier: TemplateTier, from: Date): string | null {
  const days = TIER_RETENTION_DAYS[tier];
  return days === null ? null : addDays(from, days).toISOString();
}

// Tier earned by a usage count, never lower than the current tier
export function promotedTier(current: TemplateTier, usageCount: number): TemplateTier {
  for (const [threshold, tier] of PROMOTIONS) {
    if (usageCount >= threshold && TIER_RANK[tier] > TIER_RANK[current]) return tier;
  }
  return current;
}

export interface TemplateInput {
  question: string;
  answer: string;
  framework?: AnswerFramework;
  category?: string;
  tags?: string[];
  tier?: TemplateTier;
}

export interface SearchOptions {
  limit?: number;
  minScore?: number;
}

export class TemplateLibrary {
  constructor(
    private readonly templates: TemplateRepository,
    private readonly embeddings: EmbeddingClient | null,
    private readonly clock: Clock = systemClock
  ) {}

  private async embed(text: string): Promise<number[] | null> {
    if (!this.embeddings) return null;
    try {
      return await this.embeddings.embed(text);
    } catch (err) {
      await Logger.logWarning('TemplateLibrary', 'Embedding failed; template stored without a vector', {
        Endpoint: 'TemplateLibrary.embed',
        Exception: errorMessage(err),
      });
      return null;
    }
  }

  private async owned(ownerId: string | null, id: string): Promise<TemplateRecord> {
    const template = await this.templates.findById(id);
    if (!template) throw new NotFoundError('Template');
    if (template.user_id !== null && template.user_id !== ownerId) {
      throw new ForbiddenError('Template belongs to another account');
    }
    return template;
  }

  async createTemplate(ownerId: string | null, input: TemplateInput): Promise<TemplateRecord> {
    const question = input.question.trim();
    const answer = input.answer.trim();
    if (!question || !answer) {
      throw new ValidationError('question and answer are required');
    }
    const now = this.clock();
    const tier = input.tier ?? (ownerId ? 'SHORT' : 'TEMPORARY');

    return this.templates.insert({
      id: `tpl_${uuid()}`,
      user_id: ownerId,
      question,
      answer,
      framework: input.framework ?? 'FREE',
      category: input.category?.trim() || 'general',
      tags: input.tags ?? [],
      tier,
      usage_count: 0,
      embedding: await this.embed(`${question}\n${answer}`),
      created_at: now.toISOString(),
      last_used_at: null,
      expires_at: expiryFor(tier, now),
    });
  }

  getTemplate(ownerId: string | null, id: string): Promise<TemplateRecord> {
    return this.owned(ownerId, id);
  }

  listTemplates(ownerId: string | null, filter: TemplateFilter = {}): Promise<TemplateRecord[]> {
    return this.templates.listVisible(ownerId, filter);
  }

  async updateTemplate(ownerId: string | null, id: string, input: Partial<TemplateInput>): Promise<TemplateRecord> {
    const current = await this.owned(ownerId, id);
    const patch: Partial<TemplateRecord> = {};

    if (input.question !== undefined) patch.question = input.question.trim();
    if (input.answer !== undefined) patch.answer = input.answer.trim();
    if (patch.question === '' || patch.answer === '') {
      throw new ValidationError('question and answer cannot be empty');
    }
    if (input.framework !== undefined) patch.framework = input.framework;
    if (input.category !== undefined) patch.category = input.category.trim() || 'general';
    if (input.tags !== undefined) patch.tags = input.tags;
    if (input.tier !== undefined) patch.tier = input.tier;
    if (Object.keys(patch).length === 0) {
      throw new ValidationError('Nothing to update');
    }

    if (patch.question !== undefined || patch.answer !== undefined) {
      patch.embedding = await this.embed(`${patch.question ?? current.question}\n${patch.answer ?? current.answer}`);
    }
    const from = patch.tier !== undefined ? this.clock() : new Date(current.last_used_at ?? current.created_at);
    patch.expires_at = expiryFor(patch.tier ?? current.tier, from);

    return this.templates.update(id, patch);
  }

  async deleteTemplate(ownerId: string | null, id: string): Promise<void> {
    await this.owned(ownerId, id);
    await this.templates.delete(id);
  }

  async setTier(ownerId: string | null, id: string, tier: TemplateTier): Promise<TemplateRecord> {
    await this.owned(ownerId, id);
    return this.templates.update(id, { tier, expires_at: expiryFor(tier, this.clock()) });
  }

  async recordUsage(ownerId: string | null, id: string): Promise<TemplateRecord> {
    const template = await this.owned(ownerId, id);
    const now = this.clock();
    const usageCount = template.usage_count + 1;
    const tier = promotedTier(template.tier, usageCount);

    if (tier !== template.tier) {
      await Logger.logInfo('TemplateLibrary', `Template promoted to ${tier}`, {
        RelatedTo: id,
        UserID: ownerId ?? undefined,
        Status: 'PROMOTED',
      });
    }
    return this.templates.update(id, {
      usage_count: usageCount,
      tier,
      last_used_at: now.toISOString(),
      expires_at: expiryFor(tier, now),
    });
  }

  /**
   * Ranks visible templates against the query: cosine similarity when the query and
   * the template both have an embedding, token Jaccard otherwise. A template scoring 0
   * shares nothing with the query and is never a hit; `minScore` raises that floor.
   */
  async searchTemplates(ownerId: string | null, query: string, options: SearchOptions = {}): Promise<TemplateSearchHit[]> {
    const { limit = 5, minScore = 0 } = options;
    if (!query.trim()) return [];

    const [candidates, queryVector] = await Promise.all([
      this.templates.listVisible(ownerId),
      this.embed(query),
    ]);

    const hits = candidates.map((template): TemplateSearchHit => {
      if (queryVector && template.embedding && template.embedding.length === queryVector.length) {
        return { template, score: cosineSimilarity(queryVector, template.embedding), method: 'embedding' };
      }
      return { template, score: jaccardSimilarity(query, `${template.question} ${template.tags.join(' ')}`), method: 'lexical' };
    });

    return hits
      .filter((hit) => hit.score > 0 && hit.score >= minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  purgeExpired(now: Date = this.clock()): Promise<number> {
    return this.templates.deleteExpired(now.toISOString());
  }
}
