import type { SupabaseClient } from '@supabase/supabase-js';
import type { InterviewRepository, TaskRepository } from '../types';
import type { MockInterviewRecord } from '../../types/interview';
import type { TaskRecord } from '../../types/task';
import { requireRow, throwIfError } from './query';

export class SupabaseInterviewRepository implements InterviewRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(session: MockInterviewRecord): Promise<MockInterviewRecord> {
    const { data, error } = await this.db.from('mock_interviews').insert(session).select('*').single();
    return requireRow<MockInterviewRecord>(data, error, 'Insert mock interview');
  }

  async findById(id: string): Promise<MockInterviewRecord | null> {
    const { data, error } = await this.db.from('mock_interviews').select('*').eq('id', id).maybeSingle();
    throwIfError(error, 'Load mock interview');
    return data;
  }

  async list(userId: string): Promise<MockInterviewRecord[]> {
    const { data, error } = await this.db
      .from('mock_interviews')
      .select('*')
      .eq('user_id', userId)
      .order('created_at', { ascending: false });
    throwIfError(error, 'List mock interviews');
    return data ?? [];
  }

  async update(id: string, patch: Partial<MockInterviewRecord>): Promise<MockInterviewRecord> {
    const { data, error } = await this.db.from('mock_interviews').update(patch).eq('id', id).select('*').single();
    return requireRow<MockInterviewRecord>(data, error, 'Update mock interview');
  }

  async updateAtIndex(id: string, expectedIndex: number, patch: Partial<MockInterviewRecord>): Promise<MockInterviewRecord | null> {
    const { data, error } = await this.db
      .from('mock_interviews')
      .update(patch)
      .eq('id', id)
      .eq('current_index', expectedIndex)
      .select('*')
      .maybeSingle();
    throwIfError(error, 'Update mock interview');
    return data;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('mock_interviews').delete().eq('id', id);
    throwIfError(error, 'Delete mock interview');
  }
}

export class SupabaseTaskRepository implements TaskRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(task: TaskRecord): Promise<TaskRecord> {
    const { data, error } = await this.db.from('task_status').insert(task).select('*').single();
    return requireRow<TaskRecord>(data, error, 'Insert task');
  }

  async findById(id: string): Promise<TaskRecord | null> {
    const { data, error } = await this.db.from('task_status').select('*').eq('id', id).maybeSingle();
    throwIfError(error, 'Load task');
    return data;
  }

  async update(id: string, patch: Partial<TaskRecord>): Promise<TaskRecord> {
    const { data, error } = await this.db.from('task_status').update(patch).eq('id', id).select('*').single();
    return requireRow<TaskRecord>(data, error, 'Update task');
  }

  async deleteFinishedOlderThan(cutoffIso: string): Promise<number> {
    const { data, error } = await this.db
      .from('task_status')
      .delete()
      .in('status', ['completed', 'failed'])
      .lt('updated_at', cutoffIso)
      .select('id');
    throwIfError(error, 'Delete finished tasks');
    return data?.length ?? 0;
  }
}
