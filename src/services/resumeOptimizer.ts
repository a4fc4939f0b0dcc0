import { z } from 'zod';
import type { ParsedJobDescription } from '../types/jobDescription';
import {
  jdKeywordsSchema,
  starSuggestionSchema,
  type ATSScore,
  type ImpactType,
  type JdKeywords,
  type KeywordAnalysis,
  type OptimizationReport,
  type OptimizationSuggestion,
  type QuantifiedAchievement,
  type STARSuggestion,
} from '../types/optimizer';
import type { ParsedResume, Project, WorkExperience } from '../types/resume';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import type { LLMClient } from './llmClient';
import { requestLLMJson } from './llmJson';
import { flattenSkills } from './skillDictionary';

const QUANTIFICATION_WORDS = [
  '提升', '提高', '增长', '减少', '节省', '优化',
  'increased', 'reduced', 'improved', 'saved', 'grew', 'doubled', 'tripled',
];

const QUANTIFIED_PATTERNS: Array<{ kind: QuantifiedAchievement['kind']; pattern: RegExp }> = [
  { kind: 'percentage', pattern: /(\d+(?:\.\d+)?)\s*%/gi },
  { kind: 'users', pattern: /(\d+(?:,\d+)*\+?)\s*(?:users?|customers?|clients?)/gi },
  { kind: 'money', pattern: /\$(\d+(?:,\d+)*(?:\.\d+)?)\s*(?:million|k|thousand)?/gi },
  { kind: 'duration', pattern: /(\d+(?:,\d+)*)\s*(?:hours?|days?|weeks?|months?)/gi },
  { kind: 'count', pattern: /(\d+(?:,\d+)*)\s*(?:projects?|tasks?|features?)/gi },
];

export const ATS_THRESHOLDS = { keyword: 70, format: 80, structure: 80, quantification: 60 } as const;

export function hasQuantification(text: string): boolean {
  if (/\d/.test(text)) return true;
  const lower = text.toLowerCase();
  return QUANTIFICATION_WORDS.some((word) => lower.includes(word));
}

function impactOf(text: string): ImpactType {
  const lower = text.toLowerCase();
  if (['cost', 'save', 'reduce'].some((w) => lower.includes(w))) return 'cost';
  if (['revenue', 'sales', 'profit'].some((w) => lower.includes(w))) return 'revenue';
  if (['efficiency', 'speed', 'time', 'faster', 'latency'].some((w) => lower.includes(w))) return 'efficiency';
  return 'performance';
}

export function extractQuantifiedAchievements(text: string): QuantifiedAchievement[] {
  const impact = impactOf(text);
  const found: QuantifiedAchievement[] = [];
  for (const { kind, pattern } of QUANTIFIED_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.push({ text: match[0].trim(), metric: match[1], kind, impact });
    }
  }
  return found;
}

export function extractResumeKeywords(resume: ParsedResume): string[] {
  const keywords: string[] = [...flattenSkills(resume.technical_skills)];
  for (const work of resume.work_experience) {
    keywords.push(...work.responsibilities, ...work.achievements);
  }
  for (const project of resume.projects) {
    keywords.push(...project.technologies, ...project.achievements);
  }
  return [...new Set(keywords.map((kw) => kw.toLowerCase().trim()).filter(Boolean))];
}

function allJdKeywords(jdKeywords: JdKeywords): string[] {
  return Object.values(jdKeywords).flat().map((kw) => kw.toLowerCase().trim()).filter(Boolean);
}

function isMatched(jdKeyword: string, resumeKeywords: string[]): boolean {
  return resumeKeywords.some((kw) => kw.includes(jdKeyword) || jdKeyword.includes(kw));
}

/**
 * Percentage (0-100) of JD keywords that appear in, or contain, some resume keyword
 */
export function calculateMatchScore(resumeKeywords: string[], jdKeywords: JdKeywords): number {
  const wanted = allJdKeywords(jdKeywords);
  if (wanted.length === 0) return 0;
  const matched = wanted.filter((kw) => isMatched(kw, resumeKeywords)).length;
  return (matched / wanted.length) * 100;
}

export function calculateFormatScore(resume: ParsedResume): number {
  let score = 100;
  const info = resume.personal_info;
  if (!info.full_name && !info.email && !info.phone) score -= 20;
  if (resume.work_experience.length === 0) score -= 20;
  if (resume.education.length === 0) score -= 20;
  if (!info.email) score -= 15;
  if (!info.phone) score -= 10;
  return Math.max(0, score);
}

export function calculateStructureScore(resume: ParsedResume): number {
  let score = 100;
  if (resume.work_experience.length === 0) {
    score -= 30;
  } else {
    for (const work of resume.work_experience) {
      if (!work.company) score -= 10;
      if (!work.job_title) score -= 10;
      if (work.responsibilities.length === 0 && work.achievements.length === 0) score -= 15;
    }
  }
  if (flattenSkills(resume.technical_skills).length === 0) score -= 20;
  return Math.max(0, score);
}

export function calculateQuantificationScore(resume: ParsedResume): number {
  const achievements = [
    ...resume.work_experience.flatMap((w) => w.achievements),
    ...resume.projects.flatMap((p) => p.achievements),
  ];
  if (achievements.length === 0) return 0;
  const quantified = achievements.filter(hasQuantification).length;
  return Math.floor((quantified / achievements.length) * 100);
}

export function atsFeedback(scores: { keyword: number; format: number; structure: number; quantification: number }) {
  const issues: string[] = [];
  const improvements: string[] = [];
  if (scores.keyword < ATS_THRESHOLDS.keyword) {
    issues.push(`Low keyword match (${scores.keyword}%)`);
    improvements.push('Add skills and keywords from the target job description');
  }
  if (scores.format < ATS_THRESHOLDS.format) {
    issues.push(`Format needs work (${scores.format}%)`);
    improvements.push('Complete your personal information and contact details');
  }
  if (scores.structure < ATS_THRESHOLDS.structure) {
    issues.push(`Incomplete structure (${scores.structure}%)`);
    improvements.push('Fill in missing work experience or project descriptions');
  }
  if (scores.quantification < ATS_THRESHOLDS.quantification) {
    issues.push(`Few quantified results (${scores.quantification}%)`);
    improvements.push('Add concrete numbers and percentages to your achievements');
  }
  return { issues, improvements };
}

function jdKeywordFallback(jd: ParsedJobDescription): JdKeywords {
  return { technical: jd.skills_required, soft: [], industry: [], experience_level: [], certifications: [], tools: [] };
}

function describeExperience(item: WorkExperience | Project): string {
  if ('company' in item) {
    return [
      `Company: ${item.company}`,
      `Position: ${item.job_title}`,
      `Responsibilities: ${item.responsibilities.join('; ')}`,
      `Achievements: ${item.achievements.join('; ')}`,
    ].join('\n');
  }
  return [
    `Project: ${item.name}`,
    `Role: ${item.role}`,
    `Description: ${item.description}`,
    `Achievements: ${item.achievements.join('; ')}`,
  ].join('\n');
}

const recommendationsSchema = z.preprocess(
  (value) => (typeof value === 'object' && value !== null && 'recommendations' in value ? value.recommendations : value),
  z.array(z.string()).min(1)
);

export class ResumeOptimizer {
  constructor(private readonly llm: LLMClient) {}

  async extractJdKeywords(jd: ParsedJobDescription): Promise<JdKeywords> {
    const prompt = `Analyze this job posting and extract keywords by category. Return only JSON:
{"technical": [], "soft": [], "industry": [], "experience_level": [], "certifications": [], "tools": []}

Title: ${jd.title}
Company: ${jd.company}
Requirements: ${jd.requirements.join(' ')}
Responsibilities: ${jd.responsibilities.join(' ')}
Skills: ${jd.skills_required.join(', ')}`;
    try {
      return await requestLLMJson(this.llm, prompt, jdKeywordsSchema, {
        temperature: 0.1,
        maxTokens: 1000,
        category: 'ResumeOptimizer',
      });
    } catch (err) {
      await Logger.logBackendError('ResumeOptimizer', err, { Status: 'JD_KEYWORDS_FALLBACK', Exception: errorMessage(err) });
      return jdKeywordFallback(jd);
    }
  }

  private async keywordRecommendations(resumeKeywords: string[], missing: string[], jd: ParsedJobDescription): Promise<string[]> {
    const prompt = `Suggest 5-8 concrete resume edits to improve keyword match for the role "${jd.title}".
Missing keywords: ${missing.join(', ') || 'none'}
Existing resume keywords: ${resumeKeywords.slice(0, 20).join(', ')}

Each suggestion names the missing keyword, the resume section to add it to, and an example phrasing.
Return a JSON array of strings.`;
    try {
      return await requestLLMJson(this.llm, prompt, recommendationsSchema, {
        temperature: 0.7,
        maxTokens: 800,
        category: 'ResumeOptimizer',
      });
    } catch (err) {
      await Logger.logBackendError('ResumeOptimizer', err, { Status: 'RECOMMENDATION_FALLBACK', Exception: errorMessage(err) });
      return ['Could not generate keyword suggestions; compare your skills section with the job requirements manually'];
    }
  }

  async analyzeResumeVsJd(resume: ParsedResume, jd: ParsedJobDescription): Promise<KeywordAnalysis> {
    const jdKeywords = await this.extractJdKeywords(jd);
    const resumeKeywords = extractResumeKeywords(resume);
    const missing = [...new Set(allJdKeywords(jdKeywords))].filter((kw) => !isMatched(kw, resumeKeywords));

    return {
      technical_skills: jdKeywords.technical,
      soft_skills: jdKeywords.soft,
      industry_keywords: jdKeywords.industry,
      missing_keywords: missing,
      match_score: Math.round(calculateMatchScore(resumeKeywords, jdKeywords) * 10) / 10,
      recommendations: await this.keywordRecommendations(resumeKeywords, missing, jd),
    };
  }

  scoreAts(resume: ParsedResume, keywordAnalysis: KeywordAnalysis): ATSScore {
    const keyword = Math.floor(keywordAnalysis.match_score);
    const format = calculateFormatScore(resume);
    const structure = calculateStructureScore(resume);
    const quantification = calculateQuantificationScore(resume);
    const { issues, improvements } = atsFeedback({ keyword, format, structure, quantification });

    return {
      overall_score: Math.floor(keyword * 0.4 + format * 0.2 + structure * 0.2 + quantification * 0.2),
      keyword_score: keyword,
      format_score: format,
      structure_score: structure,
      quantification_score: quantification,
      issues,
      improvements,
    };
  }

  async calculateAtsScore(resume: ParsedResume, jd: ParsedJobDescription): Promise<ATSScore> {
    return this.scoreAts(resume, await this.analyzeResumeVsJd(resume, jd));
  }

  private async starFor(
    source: 'work_experience' | 'projects',
    index: number,
    item: WorkExperience | Project,
    jd: ParsedJobDescription
  ): Promise<STARSuggestion | null> {
    const title = 'company' in item ? `${item.job_title} @ ${item.company}` : item.name;
    const prompt = `Review this ${source === 'projects' ? 'project' : 'work experience'} against the STAR method (Situation, Task, Action, Result) for the target role "${jd.title}".

${describeExperience(item)}

Return only JSON:
{"missing_elements": ["S", "T", "A", "R"], "suggestions": {"S": "", "T": "", "A": "", "R": ""}, "improved_description": "", "quantification_tips": []}
List only the elements that are actually missing.`;
    try {
      const body = await requestLLMJson(this.llm, prompt, starSuggestionSchema, {
        temperature: 0.7,
        maxTokens: 1200,
        category: 'ResumeOptimizer',
      });
      return { ...body, source, index, title };
    } catch (err) {
      await Logger.logBackendError('ResumeOptimizer', err, {
        Status: 'STAR_SKIPPED',
        RelatedTo: `${source}[${index}]`,
        Exception: errorMessage(err),
      });
      return null;
    }
  }

  // One model call per job and project; failed calls are left out
  async generateStarSuggestions(resume: ParsedResume, jd: ParsedJobDescription): Promise<STARSuggestion[]> {
    const results = await Promise.all([
      ...resume.work_experience.map((work, i) => this.starFor('work_experience', i, work, jd)),
      ...resume.projects.map((project, i) => this.starFor('projects', i, project, jd)),
    ]);
    return results.filter((r): r is STARSuggestion => r !== null);
  }

  quantificationSuggestions(resume: ParsedResume): OptimizationSuggestion[] {
    const suggestions: OptimizationSuggestion[] = [];
    resume.work_experience.forEach((work, i) => {
      work.achievements.forEach((achievement, j) => {
        if (!hasQuantification(achievement)) {
          suggestions.push({
            type: 'quantification_needed',
            priority: 'medium',
            section: `work_experience[${i}].achievements[${j}]`,
            current_text: achievement,
            suggested_text: `${achievement} (add a number: percentage, volume, time saved)`,
            reason: 'Achievements without numbers are less convincing',
          });
        }
      });
    });
    return suggestions;
  }

  buildSuggestions(keywordAnalysis: KeywordAnalysis, stars: STARSuggestion[], resume: ParsedResume): OptimizationSuggestion[] {
    const suggestions: OptimizationSuggestion[] = keywordAnalysis.recommendations.map((recommendation) => ({
      type: 'keyword_missing',
      priority: 'high',
      section: 'skills',
      current_text: '',
      suggested_text: recommendation,
      reason: 'Improves keyword match with the job description',
    }));

    for (const star of stars) {
      if (star.missing_elements.length > 0) {
        suggestions.push({
          type: 'star_incomplete',
          priority: 'medium',
          section: `${star.source}[${star.index}]`,
          current_text: '',
          suggested_text: star.improved_description,
          reason: `Complete the STAR story, missing: ${star.missing_elements.join(', ')}`,
        });
      }
    }

    return [...suggestions, ...this.quantificationSuggestions(resume)];
  }

  async generateOptimizationSuggestions(resume: ParsedResume, jd: ParsedJobDescription): Promise<OptimizationSuggestion[]> {
    const [analysis, stars] = await Promise.all([
      this.analyzeResumeVsJd(resume, jd),
      this.generateStarSuggestions(resume, jd),
    ]);
    return this.buildSuggestions(analysis, stars, resume);
  }

  // Full report; the keyword analysis is computed once and shared
  async optimize(resume: ParsedResume, jd: ParsedJobDescription): Promise<OptimizationReport> {
    const [keywordAnalysis, starSuggestions] = await Promise.all([
      this.analyzeResumeVsJd(resume, jd),
      this.generateStarSuggestions(resume, jd),
    ]);
    return {
      ats_score: this.scoreAts(resume, keywordAnalysis),
      keyword_analysis: keywordAnalysis,
      star_suggestions: starSuggestions,
      suggestions: this.buildSuggestions(keywordAnalysis, starSuggestions, resume),
    };
  }
}
