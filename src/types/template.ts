export const TEMPLATE_TIERS = ['TEMPORARY', 'SHORT', 'MEDIUM', 'CORE'] as const;

export type TemplateTier = (typeof TEMPLATE_TIERS)[number];

export type AnswerFramework = 'STAR' | 'PREP' | 'FREE';

export interface TemplateRecord {
  id: string;
  user_id: string | null;
  question: string;
  answer: string;
  framework: AnswerFramework;
  category: string;
  tags: string[];
  tier: TemplateTier;
  usage_count: number;
  embedding: number[] | null;
  created_at: string;
  last_used_at: string | null;
  expires_at: string | null;
}

export interface TemplateSearchHit {
  template: TemplateRecord;
  score: number;
  method: 'embedding' | 'lexical';
}
