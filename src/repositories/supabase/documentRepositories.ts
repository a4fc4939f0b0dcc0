import type { SupabaseClient } from '@supabase/supabase-js';
import type { OwnedRepository } from '../types';
import { requireRow, throwIfError } from './query';

// resumes and job_descriptions share the same ownership shape
export class SupabaseOwnedRepository<T extends { id: string; user_id: string }> implements OwnedRepository<T> {
  constructor(
    private readonly db: SupabaseClient,
    private readonly table: 'resumes' | 'job_descriptions'
  ) {}

  async insert(record: T): Promise<T> {
    const { data, error } = await this.db.from(this.table).insert(record).select('*').single();
    return requireRow<T>(data, error, `Insert into ${this.table}`);
  }

  async findById(userId: string, id: string): Promise<T | null> {
    const { data, error } = await this.db
      .from(this.table)
      .select('*')
      .eq('id', id)
      .eq('user_id', userId)
      .maybeSingle();
    throwIfError(error, `Load from ${this.table}`);
    return data;
  }

  async list(userId: string): Promise<T[]> {
    const { data, error } = await this.db
      .from(this.table)
      .select('*')
      .eq('user_id', userId)
      .order('created_at', { ascending: false });
    throwIfError(error, `List ${this.table}`);
    return data ?? [];
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const { error, count } = await this.db
      .from(this.table)
      .delete({ count: 'exact' })
      .eq('id', id)
      .eq('user_id', userId);
    throwIfError(error, `Delete from ${this.table}`);
    return (count ?? 0) > 0;
  }
}
