import { createHash, randomBytes } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import { v4 as uuid } from 'uuid';
import type { ComparisonRepository, PerformanceRepository, VersionRepository } from '../repositories/types';
import type { ATSScore } from '../types/optimizer';
import type { ParsedResume } from '../types/resume';
import type {
  FieldChange,
  ResumeVersionRecord,
  VersionComparison,
  VersionDifferences,
  VersionPerformanceRecord,
  VersionReport,
} from '../types/version';
import { ForbiddenError, NotFoundError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addDays, addHours, systemClock, type Clock } from '../utils/time';
import { flattenSkills } from './skillDictionary';

export interface CreateVersionInput {
  resume_data: ParsedResume;
  name?: string;
  target_company?: string;
  target_position?: string;
  job_description_text?: string;
  base_version_id?: string | null;
  description?: string;
  ats_score?: ATSScore | null;
  optimization_applied?: string[];
  version_notes?: string;
}

export type VersionUpdate = Partial<
  Pick<
    ResumeVersionRecord,
    'name' | 'target_company' | 'target_position' | 'description' | 'version_notes' | 'resume_data' | 'ats_score' | 'optimization_applied'
  >
>;

export interface PerformanceUpdate {
  applications_sent?: number;
  interviews_received?: number;
  feedback?: string;
  ats_score?: number;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

// v_YYYYMMDD_HHMMSS_<8 hex>
export function newVersionId(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `v_${date}_${time}_${randomBytes(4).toString('hex')}`;
}

export function hashJobDescription(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

export function calculateDifferences(a: ParsedResume, b: ParsedResume): VersionDifferences {
  const differences: VersionDifferences = {};

  const personalKeys = new Set([...Object.keys(a.personal_info), ...Object.keys(b.personal_info)]);
  const personal: Record<string, FieldChange> = {};
  const infoA: Record<string, unknown> = a.personal_info;
  const infoB: Record<string, unknown> = b.personal_info;
  for (const key of personalKeys) {
    if (!isDeepStrictEqual(infoA[key], infoB[key])) {
      personal[key] = { v1: infoA[key], v2: infoB[key] };
    }
  }
  if (Object.keys(personal).length > 0) differences.personal_info = personal;

  if (!isDeepStrictEqual(a.work_experience, b.work_experience)) {
    differences.work_experience = { count_diff: b.work_experience.length - a.work_experience.length, content_changed: true };
  }
  if (!isDeepStrictEqual(a.projects, b.projects)) {
    differences.projects = { count_diff: b.projects.length - a.projects.length, content_changed: true };
  }

  const skillsA = new Set(flattenSkills(a.technical_skills));
  const skillsB = new Set(flattenSkills(b.technical_skills));
  const added = [...skillsB].filter((s) => !skillsA.has(s));
  const removed = [...skillsA].filter((s) => !skillsB.has(s));
  if (added.length > 0 || removed.length > 0) differences.skills = { added, removed };

  return differences;
}

// Share of top-level resume fields that are identical
export function calculateSimilarity(a: ParsedResume, b: ParsedResume): number {
  const left: Record<string, unknown> = a;
  const right: Record<string, unknown> = b;
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  if (keys.size === 0) return 0;
  let same = 0;
  for (const key of keys) {
    if (isDeepStrictEqual(left[key], right[key])) same += 1;
  }
  return same / keys.size;
}

export function comparisonRecommendation(similarity: number): string {
  if (similarity > 0.9) return 'The versions are nearly identical; differentiate them further';
  if (similarity > 0.7) return 'Moderate differences; suitable for different kinds of roles';
  if (similarity > 0.5) return 'Large differences; make sure each change targets the role';
  return 'Very different versions; re-evaluate the optimization strategy';
}

export class ResumeVersionManager {
  constructor(
    private readonly versions: VersionRepository,
    private readonly performance: PerformanceRepository,
    private readonly comparisons: ComparisonRepository,
    private readonly comparisonCacheHours = 24,
    private readonly clock: Clock = systemClock
  ) {}

  private async visible(ownerId: string | null, id: string): Promise<ResumeVersionRecord> {
    const version = await this.versions.findById(id);
    if (!version) throw new NotFoundError('Resume version');
    if (version.user_id !== null && version.user_id !== ownerId) {
      throw new ForbiddenError('Resume version belongs to another account');
    }
    return version;
  }

  async createVersion(ownerId: string | null, input: CreateVersionInput): Promise<ResumeVersionRecord> {
    const now = this.clock();
    const company = input.target_company?.trim() ?? '';
    const position = input.target_position?.trim() ?? '';
    if (input.base_version_id) {
      await this.visible(ownerId, input.base_version_id);
    }

    const version = await this.versions.insert({
      id: newVersionId(now),
      user_id: ownerId,
      name: input.name?.trim() || `${company || 'general'}_${position || 'resume'}_version`,
      base_version_id: input.base_version_id ?? null,
      target_company: company,
      target_position: position,
      target_jd_hash: input.job_description_text ? hashJobDescription(input.job_description_text) : null,
      description: input.description ?? '',
      resume_data: input.resume_data,
      ats_score: input.ats_score ?? null,
      optimization_applied: input.optimization_applied ?? [],
      version_notes: input.version_notes ?? '',
      is_active: false,
      created_at: now.toISOString(),
      last_modified: now.toISOString(),
    });

    await Logger.logInfo('ResumeVersions', 'Version created', {
      UserID: ownerId ?? undefined,
      RelatedTo: version.id,
      Status: 'CREATED',
    });
    return version;
  }

  getVersion(ownerId: string | null, id: string): Promise<ResumeVersionRecord> {
    return this.visible(ownerId, id);
  }

  listVersions(ownerId: string | null): Promise<ResumeVersionRecord[]> {
    return this.versions.listVisible(ownerId);
  }

  async updateVersion(ownerId: string | null, id: string, update: VersionUpdate): Promise<ResumeVersionRecord> {
    await this.visible(ownerId, id);
    if (Object.keys(update).length === 0) {
      throw new ValidationError('Nothing to update');
    }
    return this.versions.update(id, { ...update, last_modified: this.clock().toISOString() });
  }

  async deleteVersion(ownerId: string | null, id: string): Promise<void> {
    await this.visible(ownerId, id);
    await this.comparisons.deleteForVersion(id);
    await this.performance.delete(id);
    await this.versions.delete(id);
  }

  // At most one active version per owner
  async setActiveVersion(ownerId: string | null, id: string): Promise<ResumeVersionRecord> {
    const version = await this.visible(ownerId, id);
    await this.versions.clearActive(ownerId);
    // A signed-in user may activate a guest row they can see; the guest set loses its active row too
    if (version.user_id !== ownerId) await this.versions.clearActive(version.user_id);
    return this.versions.update(id, { is_active: true, last_modified: this.clock().toISOString() });
  }

  async getActiveVersion(ownerId: string | null): Promise<ResumeVersionRecord | null> {
    const all = await this.versions.listVisible(ownerId);
    return all.find((v) => v.is_active && v.user_id === ownerId) ?? all.find((v) => v.is_active) ?? null;
  }

  async compareVersions(ownerId: string | null, firstId: string, secondId: string): Promise<VersionComparison & { cached: boolean }> {
    const [first, second] = await Promise.all([this.visible(ownerId, firstId), this.visible(ownerId, secondId)]);
    const now = this.clock();
    const since = addHours(now, -this.comparisonCacheHours).toISOString();

    const cached = await this.comparisons.findPair(firstId, secondId, since);
    if (cached) {
      return { ...cached.comparison, cached: true };
    }

    const similarity = calculateSimilarity(first.resume_data, second.resume_data);
    const comparison: VersionComparison = {
      version1_id: firstId,
      version2_id: secondId,
      differences: calculateDifferences(first.resume_data, second.resume_data),
      similarity_score: Math.round(similarity * 1000) / 1000,
      recommendation: comparisonRecommendation(similarity),
    };
    await this.comparisons.insert({
      id: uuid(),
      version1_id: firstId,
      version2_id: secondId,
      comparison,
      created_at: now.toISOString(),
    });
    return { ...comparison, cached: false };
  }

  cleanupOldComparisons(days = 7): Promise<number> {
    return this.comparisons.deleteOlderThan(addDays(this.clock(), -days).toISOString());
  }

  async updatePerformanceMetrics(ownerId: string | null, id: string, update: PerformanceUpdate): Promise<VersionPerformanceRecord> {
    const version = await this.visible(ownerId, id);
    const current = await this.performance.find(id);

    const applications = update.applications_sent ?? current?.applications_sent ?? 0;
    const interviews = update.interviews_received ?? current?.interviews_received ?? 0;
    if (interviews > applications) {
      throw new ValidationError('interviews_received cannot exceed applications_sent');
    }
    const feedback = [...(current?.feedback_received ?? [])];
    if (update.feedback?.trim()) feedback.push(update.feedback.trim());

    return this.performance.upsert({
      version_id: id,
      applications_sent: applications,
      interviews_received: interviews,
      response_rate: applications > 0 ? interviews / applications : 0,
      feedback_received: feedback,
      avg_ats_score: update.ats_score ?? current?.avg_ats_score ?? version.ats_score?.overall_score ?? 0,
      last_updated: this.clock().toISOString(),
    });
  }

  async getPerformanceMetrics(ownerId: string | null, id: string): Promise<VersionPerformanceRecord | null> {
    await this.visible(ownerId, id);
    return this.performance.find(id);
  }

  /**
   * Version with the best 0.7 x response rate + 0.3 x ATS (0-1) among versions that were sent out
   */
  async getBestPerformingVersion(ownerId: string | null): Promise<{ version: ResumeVersionRecord; score: number } | null> {
    const versions = await this.versions.listVisible(ownerId);
    let best: { version: ResumeVersionRecord; score: number } | null = null;

    for (const version of versions) {
      const metrics = await this.performance.find(version.id);
      if (!metrics || metrics.applications_sent <= 0) continue;
      const score = metrics.response_rate * 0.7 + (metrics.avg_ats_score / 100) * 0.3;
      if (!best || score > best.score) {
        best = { version, score: Math.round(score * 1000) / 1000 };
      }
    }
    return best;
  }

  async generateVersionReport(ownerId: string | null, id: string): Promise<VersionReport> {
    const version = await this.visible(ownerId, id);
    const metrics = await this.performance.find(id);
    const recommendations: string[] = [];

    if (metrics) {
      if (metrics.response_rate < 0.1) {
        recommendations.push('Low response rate; refine the resume content or your application targeting');
      }
      if (metrics.avg_ats_score < 70) {
        recommendations.push('Low ATS score; add keywords from the job description and tidy the format');
      }
      if (metrics.applications_sent > 10 && metrics.interviews_received === 0) {
        recommendations.push('Many applications without a reply; consider rebuilding this version');
      }
    }

    return {
      version_info: {
        id: version.id,
        name: version.name,
        target_company: version.target_company,
        target_position: version.target_position,
        created_at: version.created_at,
        last_modified: version.last_modified,
        is_active: version.is_active,
      },
      performance_metrics: metrics,
      ats_score: version.ats_score,
      optimization_applied: version.optimization_applied,
      recommendations,
    };
  }
}
