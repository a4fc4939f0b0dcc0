import { z } from 'zod';
import { stringList, text } from '../utils/schema';

export const jdKeywordsSchema = z.object({
  technical: stringList,
  soft: stringList,
  industry: stringList,
  experience_level: stringList,
  certifications: stringList,
  tools: stringList,
});

export type JdKeywords = z.infer<typeof jdKeywordsSchema>;

export interface KeywordAnalysis {
  technical_skills: string[];
  soft_skills: string[];
  industry_keywords: string[];
  missing_keywords: string[];
  match_score: number;
  recommendations: string[];
}

export interface ATSScore {
  overall_score: number;
  keyword_score: number;
  format_score: number;
  structure_score: number;
  quantification_score: number;
  issues: string[];
  improvements: string[];
}

export const starSuggestionSchema = z.object({
  missing_elements: stringList,
  suggestions: z.preprocess(
    (value) => (value === null || value === undefined ? {} : value),
    z.object({ S: text, T: text, A: text, R: text })
  ),
  improved_description: text,
  quantification_tips: stringList,
});

export type StarSuggestionBody = z.infer<typeof starSuggestionSchema>;

export interface STARSuggestion extends StarSuggestionBody {
  source: 'work_experience' | 'projects';
  index: number;
  title: string;
}

export type SuggestionPriority = 'high' | 'medium' | 'low';

export interface OptimizationSuggestion {
  type: 'keyword_missing' | 'star_incomplete' | 'quantification_needed';
  priority: SuggestionPriority;
  section: string;
  current_text: string;
  suggested_text: string;
  reason: string;
}

export type ImpactType = 'cost' | 'revenue' | 'efficiency' | 'performance';

export interface QuantifiedAchievement {
  text: string;
  metric: string;
  kind: 'percentage' | 'users' | 'money' | 'duration' | 'count';
  impact: ImpactType;
}

export interface OptimizationReport {
  ats_score: ATSScore;
  keyword_analysis: KeywordAnalysis;
  star_suggestions: STARSuggestion[];
  suggestions: OptimizationSuggestion[];
}
