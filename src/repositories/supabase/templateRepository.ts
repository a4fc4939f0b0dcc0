import type { SupabaseClient } from '@supabase/supabase-js';
import type { TemplateFilter, TemplateRepository } from '../types';
import type { TemplateRecord } from '../../types/template';
import { requireRow, throwIfError } from './query';

export class SupabaseTemplateRepository implements TemplateRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(template: TemplateRecord): Promise<TemplateRecord> {
    const { data, error } = await this.db.from('interview_templates').insert(template).select('*').single();
    return requireRow<TemplateRecord>(data, error, 'Insert template');
  }

  async findById(id: string): Promise<TemplateRecord | null> {
    const { data, error } = await this.db.from('interview_templates').select('*').eq('id', id).maybeSingle();
    throwIfError(error, 'Load template');
    return data;
  }

  async listVisible(userId: string | null, filter: TemplateFilter = {}): Promise<TemplateRecord[]> {
    let query = this.db.from('interview_templates').select('*');
    query = userId ? query.or(`user_id.eq.${userId},user_id.is.null`) : query.is('user_id', null);
    if (filter.tier) query = query.eq('tier', filter.tier);
    if (filter.category) query = query.eq('category', filter.category);
    const { data, error } = await query.order('created_at', { ascending: false });
    throwIfError(error, 'List templates');
    return data ?? [];
  }

  async update(id: string, patch: Partial<TemplateRecord>): Promise<TemplateRecord> {
    const { data, error } = await this.db.from('interview_templates').update(patch).eq('id', id).select('*').single();
    return requireRow<TemplateRecord>(data, error, 'Update template');
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('interview_templates').delete().eq('id', id);
    throwIfError(error, 'Delete template');
  }

  async deleteExpired(nowIso: string): Promise<number> {
    const { error, count } = await this.db
      .from('interview_templates')
      .delete({ count: 'exact' })
      .neq('tier', 'CORE')
      .lt('expires_at', nowIso);
    throwIfError(error, 'Delete expired templates');
    return count ?? 0;
  }

  async claimGuest(ids: string[], userId: string): Promise<number> {
    if (ids.length === 0) return 0;
    const { error, count } = await this.db
      .from('interview_templates')
      .update({ user_id: userId }, { count: 'exact' })
      .in('id', ids)
      .is('user_id', null);
    throwIfError(error, 'Claim guest templates');
    return count ?? 0;
  }

  async deleteGuestOlderThan(cutoffIso: string): Promise<number> {
    const { error, count } = await this.db
      .from('interview_templates')
      .delete({ count: 'exact' })
      .is('user_id', null)
      .lt('created_at', cutoffIso);
    throwIfError(error, 'Delete guest templates');
    return count ?? 0;
  }
}
