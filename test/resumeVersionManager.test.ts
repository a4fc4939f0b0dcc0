import { beforeEach, describe, expect, it } from 'vitest';
import {
  calculateDifferences,
  calculateSimilarity,
  comparisonRecommendation,
  hashJobDescription,
  newVersionId,
} from '../src/services/resumeVersionManager';
import type { ATSScore } from '../src/types/optimizer';
import { ForbiddenError, NotFoundError, ValidationError } from '../src/utils/errors';
import { createTestHarness, type TestHarness } from './support/fakes';
import { sampleResume } from './support/fixtures';

const ats = (overall: number): ATSScore => ({
  overall_score: overall,
  keyword_score: overall,
  format_score: overall,
  structure_score: overall,
  quantification_score: overall,
  issues: [],
  improvements: [],
});

function tailoredResume() {
  const resume = sampleResume();
  resume.personal_info.email = 'jane@work.test';
  resume.technical_skills.programming_languages.push('Rust');
  resume.technical_skills.tools_software = [];
  resume.work_experience.push({ ...resume.work_experience[0], company: 'Initech' });
  return resume;
}

describe('version helpers', () => {
  it('stamps ids with the UTC time', () => {
    expect(newVersionId(new Date('2024-03-01T09:05:07Z'))).toMatch(/^v_20240301_090507_[0-9a-f]{8}$/);
  });

  it('hashes job descriptions with md5', () => {
    expect(hashJobDescription('hello')).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('lists changed contact fields, sections and skills', () => {
    expect(calculateDifferences(sampleResume(), tailoredResume())).toEqual({
      personal_info: { email: { v1: 'jane@example.com', v2: 'jane@work.test' } },
      work_experience: { count_diff: 1, content_changed: true },
      skills: { added: ['Rust'], removed: ['Docker'] },
    });
    expect(calculateDifferences(sampleResume(), sampleResume())).toEqual({});
  });

  it('measures similarity over top-level fields', () => {
    expect(calculateSimilarity(sampleResume(), sampleResume())).toBe(1);
    expect(calculateSimilarity(sampleResume(), tailoredResume())).toBeCloseTo(8 / 11, 10);
  });

  it('recommends by similarity band', () => {
    expect(comparisonRecommendation(0.95)).toBe('The versions are nearly identical; differentiate them further');
    expect(comparisonRecommendation(0.8)).toBe('Moderate differences; suitable for different kinds of roles');
    expect(comparisonRecommendation(0.6)).toBe('Large differences; make sure each change targets the role');
    expect(comparisonRecommendation(0.5)).toBe('Very different versions; re-evaluate the optimization strategy');
  });
});

describe('ResumeVersionManager', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  it('names and fingerprints new versions', async () => {
    const version = await h.services.versions.createVersion(null, {
      resume_data: sampleResume(),
      target_company: ' Globex ',
      target_position: 'Platform Engineer',
      job_description_text: 'hello',
    });
    expect(version).toMatchObject({
      user_id: null,
      name: 'Globex_Platform Engineer_version',
      target_company: 'Globex',
      target_jd_hash: '5d41402abc4b2a76b9719d911017c592',
      is_active: false,
      created_at: '2024-03-01T09:00:00.000Z',
    });

    const general = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    expect(general.name).toBe('general_resume_version');
  });

  it('checks the base version', async () => {
    await expect(
      h.services.versions.createVersion('user_1', { resume_data: sampleResume(), base_version_id: 'v_missing' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('shares guest versions and hides other accounts', async () => {
    const guest = await h.services.versions.createVersion(null, { resume_data: sampleResume() });
    const owned = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });

    await expect(h.services.versions.getVersion('user_2', guest.id)).resolves.toMatchObject({ id: guest.id });
    await expect(h.services.versions.getVersion('user_2', owned.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(h.services.versions.getVersion(null, owned.id)).rejects.toBeInstanceOf(ForbiddenError);
    expect((await h.services.versions.listVersions('user_2')).map((v) => v.id)).toEqual([guest.id]);
  });

  it('updates fields and the modification time', async () => {
    const version = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    await expect(h.services.versions.updateVersion('user_1', version.id, {})).rejects.toThrow(
      new ValidationError('Nothing to update')
    );

    h.time.advanceHours(2);
    const updated = await h.services.versions.updateVersion('user_1', version.id, { name: 'Globex cut' });
    expect(updated).toMatchObject({ name: 'Globex cut', last_modified: '2024-03-01T11:00:00.000Z' });
  });

  it('keeps one active version per owner', async () => {
    const first = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    const second = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });

    await h.services.versions.setActiveVersion('user_1', first.id);
    await h.services.versions.setActiveVersion('user_1', second.id);

    expect(h.repos.versions.table.get(first.id)?.is_active).toBe(false);
    expect((await h.services.versions.getActiveVersion('user_1'))?.id).toBe(second.id);
    expect(await h.services.versions.getActiveVersion('user_2')).toBeNull();
  });

  it('moves the active flag when a signed-in user activates a shared guest version', async () => {
    const own = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    const guest = await h.services.versions.createVersion(null, { resume_data: sampleResume() });

    await h.services.versions.setActiveVersion('user_1', own.id);
    await h.services.versions.setActiveVersion('user_1', guest.id);

    const active = h.repos.versions.table.all().filter((v) => v.is_active).map((v) => v.id);
    expect(active).toEqual([guest.id]);
    expect((await h.services.versions.getActiveVersion('user_1'))?.id).toBe(guest.id);
  });

  it('caches comparisons for a day', async () => {
    const base = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    const tailored = await h.services.versions.createVersion('user_1', { resume_data: tailoredResume() });

    const fresh = await h.services.versions.compareVersions('user_1', base.id, tailored.id);
    expect(fresh).toMatchObject({
      version1_id: base.id,
      version2_id: tailored.id,
      similarity_score: 0.727,
      recommendation: 'Moderate differences; suitable for different kinds of roles',
      cached: false,
    });

    const reversed = await h.services.versions.compareVersions('user_1', tailored.id, base.id);
    expect(reversed).toMatchObject({ version1_id: base.id, cached: true });

    h.time.advanceHours(25);
    expect((await h.services.versions.compareVersions('user_1', base.id, tailored.id)).cached).toBe(false);

    h.time.advanceDays(7);
    expect(await h.services.versions.cleanupOldComparisons()).toBe(1);
  });

  it('deletes metrics and comparisons with the version', async () => {
    const base = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
    const other = await h.services.versions.createVersion('user_1', { resume_data: tailoredResume() });
    await h.services.versions.compareVersions('user_1', base.id, other.id);
    await h.services.versions.updatePerformanceMetrics('user_1', base.id, { applications_sent: 1 });

    await h.services.versions.deleteVersion('user_1', base.id);

    expect(h.repos.versions.table.get(base.id)).toBeNull();
    expect(h.repos.performance.table.get(base.id)).toBeNull();
    expect(h.repos.comparisons.table.all()).toEqual([]);
  });

  describe('performance metrics', () => {
    it('merges updates and derives the response rate', async () => {
      const version = await h.services.versions.createVersion('user_1', { resume_data: sampleResume(), ats_score: ats(80) });

      const first = await h.services.versions.updatePerformanceMetrics('user_1', version.id, {
        applications_sent: 10,
        interviews_received: 2,
        feedback: ' Recruiter liked the summary ',
      });
      expect(first).toMatchObject({
        applications_sent: 10,
        interviews_received: 2,
        response_rate: 0.2,
        avg_ats_score: 80,
        feedback_received: ['Recruiter liked the summary'],
      });

      const second = await h.services.versions.updatePerformanceMetrics('user_1', version.id, { interviews_received: 3, feedback: '  ' });
      expect(second).toMatchObject({ applications_sent: 10, interviews_received: 3, response_rate: 0.3 });
      expect(second.feedback_received).toEqual(['Recruiter liked the summary']);

      await expect(
        h.services.versions.updatePerformanceMetrics('user_1', version.id, { interviews_received: 11 })
      ).rejects.toThrow('interviews_received cannot exceed applications_sent');
    });

    it('ranks versions that were sent out', async () => {
      const steady = await h.services.versions.createVersion('user_1', { resume_data: sampleResume(), ats_score: ats(80) });
      const responsive = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
      await h.services.versions.createVersion('user_1', { resume_data: sampleResume(), ats_score: ats(99) });

      await h.services.versions.updatePerformanceMetrics('user_1', steady.id, { applications_sent: 10, interviews_received: 3 });
      await h.services.versions.updatePerformanceMetrics('user_1', responsive.id, {
        applications_sent: 2,
        interviews_received: 1,
        ats_score: 60,
      });

      const best = await h.services.versions.getBestPerformingVersion('user_1');
      expect(best?.version.id).toBe(responsive.id);
      expect(best?.score).toBe(0.53);
      expect(await h.services.versions.getBestPerformingVersion('user_2')).toBeNull();
    });

    it('recommends changes for versions that get no replies', async () => {
      const version = await h.services.versions.createVersion('user_1', {
        resume_data: sampleResume(),
        target_company: 'Globex',
        optimization_applied: ['keywords'],
      });
      await h.services.versions.updatePerformanceMetrics('user_1', version.id, { applications_sent: 12, interviews_received: 0 });

      const report = await h.services.versions.generateVersionReport('user_1', version.id);
      expect(report.version_info).toMatchObject({ id: version.id, target_company: 'Globex', is_active: false });
      expect(report.optimization_applied).toEqual(['keywords']);
      expect(report.recommendations).toEqual([
        'Low response rate; refine the resume content or your application targeting',
        'Low ATS score; add keywords from the job description and tidy the format',
        'Many applications without a reply; consider rebuilding this version',
      ]);
    });

    it('reports no recommendations before any results are recorded', async () => {
      const version = await h.services.versions.createVersion('user_1', { resume_data: sampleResume() });
      const report = await h.services.versions.generateVersionReport('user_1', version.id);
      expect(report.performance_metrics).toBeNull();
      expect(report.recommendations).toEqual([]);
    });
  });
});
