import type { SupabaseClient } from '@supabase/supabase-js';
import type { ComparisonRepository, PerformanceRepository, VersionRepository } from '../types';
import type { ComparisonRecord, ResumeVersionRecord, VersionPerformanceRecord } from '../../types/version';
import { requireRow, throwIfError } from './query';

export class SupabaseVersionRepository implements VersionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(version: ResumeVersionRecord): Promise<ResumeVersionRecord> {
    const { data, error } = await this.db.from('resume_versions').insert(version).select('*').single();
    return requireRow<ResumeVersionRecord>(data, error, 'Insert resume version');
  }

  async findById(id: string): Promise<ResumeVersionRecord | null> {
    const { data, error } = await this.db.from('resume_versions').select('*').eq('id', id).maybeSingle();
    throwIfError(error, 'Load resume version');
    return data;
  }

  async listVisible(userId: string | null): Promise<ResumeVersionRecord[]> {
    let query = this.db.from('resume_versions').select('*');
    query = userId ? query.or(`user_id.eq.${userId},user_id.is.null`) : query.is('user_id', null);
    const { data, error } = await query.order('created_at', { ascending: false });
    throwIfError(error, 'List resume versions');
    return data ?? [];
  }

  async update(id: string, patch: Partial<ResumeVersionRecord>): Promise<ResumeVersionRecord> {
    const { data, error } = await this.db.from('resume_versions').update(patch).eq('id', id).select('*').single();
    return requireRow<ResumeVersionRecord>(data, error, 'Update resume version');
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('resume_versions').delete().eq('id', id);
    throwIfError(error, 'Delete resume version');
  }

  async clearActive(ownerId: string | null): Promise<void> {
    const base = this.db.from('resume_versions').update({ is_active: false });
    const { error } = ownerId ? await base.eq('user_id', ownerId) : await base.is('user_id', null);
    throwIfError(error, 'Clear active version');
  }

  async claimGuest(ids: string[], userId: string): Promise<number> {
    if (ids.length === 0) return 0;
    const { error, count } = await this.db
      .from('resume_versions')
      .update({ user_id: userId }, { count: 'exact' })
      .in('id', ids)
      .is('user_id', null);
    throwIfError(error, 'Claim guest versions');
    return count ?? 0;
  }

  async deleteGuestOlderThan(cutoffIso: string): Promise<number> {
    const { error, count } = await this.db
      .from('resume_versions')
      .delete({ count: 'exact' })
      .is('user_id', null)
      .lt('created_at', cutoffIso);
    throwIfError(error, 'Delete guest versions');
    return count ?? 0;
  }
}

export class SupabasePerformanceRepository implements PerformanceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async find(versionId: string): Promise<VersionPerformanceRecord | null> {
    const { data, error } = await this.db.from('version_performance').select('*').eq('version_id', versionId).maybeSingle();
    throwIfError(error, 'Load version performance');
    return data;
  }

  async upsert(record: VersionPerformanceRecord): Promise<VersionPerformanceRecord> {
    const { data, error } = await this.db
      .from('version_performance')
      .upsert(record, { onConflict: 'version_id' })
      .select('*')
      .single();
    return requireRow<VersionPerformanceRecord>(data, error, 'Save version performance');
  }

  async delete(versionId: string): Promise<void> {
    const { error } = await this.db.from('version_performance').delete().eq('version_id', versionId);
    throwIfError(error, 'Delete version performance');
  }
}

export class SupabaseComparisonRepository implements ComparisonRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findPair(versionA: string, versionB: string, sinceIso: string): Promise<ComparisonRecord | null> {
    const { data, error } = await this.db
      .from('version_comparisons')
      .select('*')
      .or(
        `and(version1_id.eq.${versionA},version2_id.eq.${versionB}),and(version1_id.eq.${versionB},version2_id.eq.${versionA})`
      )
      .gt('created_at', sinceIso)
      .order('created_at', { ascending: false })
      .limit(1);
    throwIfError(error, 'Load cached comparison');
    return data && data.length > 0 ? data[0] : null;
  }

  async insert(record: ComparisonRecord): Promise<ComparisonRecord> {
    const { error } = await this.db.from('version_comparisons').insert(record);
    throwIfError(error, 'Cache comparison');
    return record;
  }

  async deleteForVersion(versionId: string): Promise<void> {
    const { error } = await this.db
      .from('version_comparisons')
      .delete()
      .or(`version1_id.eq.${versionId},version2_id.eq.${versionId}`);
    throwIfError(error, 'Delete comparisons');
  }

  async deleteOlderThan(cutoffIso: string): Promise<number> {
    const { error, count } = await this.db
      .from('version_comparisons')
      .delete({ count: 'exact' })
      .lt('created_at', cutoffIso);
    throwIfError(error, 'Delete old comparisons');
    return count ?? 0;
  }
}
