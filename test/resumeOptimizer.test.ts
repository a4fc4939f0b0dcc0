import { describe, expect, it } from 'vitest';
import {
  ResumeOptimizer,
  calculateFormatScore,
  calculateMatchScore,
  calculateQuantificationScore,
  calculateStructureScore,
  extractQuantifiedAchievements,
  extractResumeKeywords,
  hasQuantification,
} from '../src/services/resumeOptimizer';
import { emptyResume } from '../src/types/resume';
import { FakeLLMClient } from './support/fakes';
import { sampleJobDescription, sampleResume } from './support/fixtures';

const EMPTY_KEYWORDS = { technical: [], soft: [], industry: [], experience_level: [], certifications: [], tools: [] };

describe('scoring helpers', () => {
  it('detects quantified text by digits or result words', () => {
    expect(hasQuantification('Served 10,000 users')).toBe(true);
    expect(hasQuantification('Improved onboarding')).toBe(true);
    expect(hasQuantification('提升了团队效率')).toBe(true);
    expect(hasQuantification('Led the team')).toBe(false);
  });

  it('pulls metrics out of an achievement', () => {
    expect(extractQuantifiedAchievements('Cut cloud cost by 25% for 3,000 customers')).toEqual([
      { text: '25%', metric: '25', kind: 'percentage', impact: 'cost' },
      { text: '3,000 customers', metric: '3,000', kind: 'users', impact: 'cost' },
    ]);
  });

  it('collects lower-cased resume keywords once', () => {
    expect(extractResumeKeywords(sampleResume())).toEqual([
      'python',
      'typescript',
      'postgresql',
      'docker',
      'built payment apis',
      'reduced latency by 40%',
      'led the migration to kubernetes',
      'go',
      'served 10,000 users',
    ]);
  });

  it('matches keywords by containment', () => {
    const resumeKeywords = extractResumeKeywords(sampleResume());
    expect(calculateMatchScore(resumeKeywords, { ...EMPTY_KEYWORDS, technical: ['Python', 'Kubernetes', 'AWS', 'Go'] })).toBe(75);
    expect(calculateMatchScore(resumeKeywords, EMPTY_KEYWORDS)).toBe(0);
  });

  it('scores format, structure and quantification', () => {
    const resume = sampleResume();
    expect(calculateFormatScore(resume)).toBe(100);
    expect(calculateStructureScore(resume)).toBe(100);
    expect(calculateQuantificationScore(resume)).toBe(66);

    const empty = emptyResume();
    expect(calculateFormatScore(empty)).toBe(15);
    expect(calculateStructureScore(empty)).toBe(50);
    expect(calculateQuantificationScore(empty)).toBe(0);
  });
});

describe('ResumeOptimizer', () => {
  it('falls back to the posting skills when the model is unavailable', async () => {
    const optimizer = new ResumeOptimizer(new FakeLLMClient());
    const report = await optimizer.optimize(sampleResume(), sampleJobDescription());

    expect(report.keyword_analysis).toEqual({
      technical_skills: ['Python', 'Kubernetes', 'AWS', 'Go'],
      soft_skills: [],
      industry_keywords: [],
      missing_keywords: ['aws'],
      match_score: 75,
      recommendations: ['Could not generate keyword suggestions; compare your skills section with the job requirements manually'],
    });
    expect(report.ats_score).toEqual({
      overall_score: 83,
      keyword_score: 75,
      format_score: 100,
      structure_score: 100,
      quantification_score: 66,
      issues: [],
      improvements: [],
    });
    expect(report.star_suggestions).toEqual([]);
    expect(report.suggestions.map((s) => s.type)).toEqual(['keyword_missing', 'quantification_needed']);
    expect(report.suggestions[1]).toMatchObject({
      section: 'work_experience[0].achievements[1]',
      current_text: 'Led the migration to Kubernetes',
    });
  });

  it('builds a full report from model answers', async () => {
    const llm = new FakeLLMClient()
      .when('Analyze this job posting', { technical: ['Python', 'Rust'], soft: ['Communication'], tools: ['Docker'] })
      .when('Suggest 5-8 concrete resume edits', ['Add Rust to the skills section'])
      .when('against the STAR method', {
        missing_elements: ['R'],
        suggestions: { R: 'State the outcome' },
        improved_description: 'Improved text',
      });
    const report = await new ResumeOptimizer(llm).optimize(sampleResume(), sampleJobDescription());

    expect(report.keyword_analysis.missing_keywords).toEqual(['rust', 'communication']);
    expect(report.keyword_analysis.match_score).toBe(50);
    expect(report.ats_score.overall_score).toBe(73);
    expect(report.ats_score.issues).toEqual(['Low keyword match (50%)']);
    expect(report.star_suggestions.map((star) => [star.source, star.index, star.title])).toEqual([
      ['work_experience', 0, 'Backend Engineer @ Acme'],
      ['projects', 0, 'Ledger'],
    ]);
    expect(report.star_suggestions[0].suggestions).toEqual({ S: '', T: '', A: '', R: 'State the outcome' });
    expect(report.suggestions.map((s) => s.type)).toEqual([
      'keyword_missing',
      'star_incomplete',
      'star_incomplete',
      'quantification_needed',
    ]);
    expect(report.suggestions[1].reason).toBe('Complete the STAR story, missing: R');

    const recommendationPrompt = llm.calls.find((call) => call.prompt.includes('Suggest 5-8'))?.prompt ?? '';
    expect(recommendationPrompt).toContain('Missing keywords: rust, communication');
  });

  it('scores ATS from a fresh keyword analysis', async () => {
    const score = await new ResumeOptimizer(new FakeLLMClient()).calculateAtsScore(emptyResume(), sampleJobDescription());
    expect(score).toMatchObject({ keyword_score: 0, format_score: 15, structure_score: 50, quantification_score: 0, overall_score: 13 });
    expect(score.issues).toEqual([
      'Low keyword match (0%)',
      'Format needs work (15%)',
      'Incomplete structure (50%)',
      'Few quantified results (0%)',
    ]);
  });
});
