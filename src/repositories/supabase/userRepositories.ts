import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  EmailVerificationRepository,
  FeedbackRepository,
  Page,
  ReferralRepository,
  SessionRepository,
  UserRepository,
  UserStats,
} from '../types';
import type {
  EmailVerificationRecord,
  FeedbackRecord,
  ReferralRecord,
  SessionRecord,
  UserRecord,
} from '../../types/user';
import { requireRow, throwIfError } from './query';

export class SupabaseUserRepository implements UserRepository {
  constructor(private readonly db: SupabaseClient) {}

  private async findBy(column: string, value: string): Promise<UserRecord | null> {
    const { data, error } = await this.db.from('users').select('*').eq(column, value).maybeSingle();
    throwIfError(error, `Load user by ${column}`);
    return data;
  }

  findById(id: string) {
    return this.findBy('id', id);
  }

  findByUsername(username: string) {
    return this.findBy('username', username);
  }

  findByEmail(email: string) {
    return this.findBy('email', email);
  }

  findByPhone(phone: string) {
    return this.findBy('phone', phone);
  }

  findByReferralCode(code: string) {
    return this.findBy('referral_code', code);
  }

  async insert(user: UserRecord): Promise<UserRecord> {
    const { data, error } = await this.db.from('users').insert(user).select('*').single();
    return requireRow<UserRecord>(data, error, 'Insert user');
  }

  async update(id: string, patch: Partial<UserRecord>): Promise<UserRecord> {
    const { data, error } = await this.db.from('users').update(patch).eq('id', id).select('*').single();
    return requireRow<UserRecord>(data, error, 'Update user');
  }

  async list(page: Page): Promise<{ users: UserRecord[]; total: number }> {
    const { data, error, count } = await this.db
      .from('users')
      .select('*', { count: 'exact' })
      .order('created_at', { ascending: false })
      .range(page.offset, page.offset + page.limit - 1);
    throwIfError(error, 'List users');
    return { users: data ?? [], total: count ?? 0 };
  }

  async stats(): Promise<UserStats> {
    const countWhere = async (column?: string, value?: string | boolean) => {
      let query = this.db.from('users').select('id', { count: 'exact', head: true });
      if (column !== undefined && value !== undefined) {
        query = query.eq(column, value);
      }
      const { count, error } = await query;
      throwIfError(error, 'Count users');
      return count ?? 0;
    };

    const [total, active, verified, vip] = await Promise.all([
      countWhere(),
      countWhere('is_active', true),
      countWhere('email_verified', true),
      countWhere('vip_type', 'vip'),
    ]);
    return { total, active, verified, vip };
  }
}

export class SupabaseSessionRepository implements SessionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(session: SessionRecord): Promise<SessionRecord> {
    const { error } = await this.db.from('user_sessions').insert(session);
    throwIfError(error, 'Insert session');
    return session;
  }

  async find(sessionId: string): Promise<SessionRecord | null> {
    const { data, error } = await this.db.from('user_sessions').select('*').eq('session_id', sessionId).maybeSingle();
    throwIfError(error, 'Load session');
    return data;
  }

  async delete(sessionId: string): Promise<void> {
    const { error } = await this.db.from('user_sessions').delete().eq('session_id', sessionId);
    throwIfError(error, 'Delete session');
  }

  async deleteExpired(nowIso: string): Promise<number> {
    const { error, count } = await this.db.from('user_sessions').delete({ count: 'exact' }).lt('expires_at', nowIso);
    throwIfError(error, 'Delete expired sessions');
    return count ?? 0;
  }

  async countActive(nowIso: string): Promise<number> {
    const { error, count } = await this.db
      .from('user_sessions')
      .select('session_id', { count: 'exact', head: true })
      .gte('expires_at', nowIso);
    throwIfError(error, 'Count sessions');
    return count ?? 0;
  }
}

export class SupabaseEmailVerificationRepository implements EmailVerificationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(record: EmailVerificationRecord): Promise<void> {
    const { error } = await this.db.from('email_verifications').upsert(record, { onConflict: 'user_id' });
    throwIfError(error, 'Save verification code');
  }

  async findByCode(code: string): Promise<EmailVerificationRecord | null> {
    const { data, error } = await this.db
      .from('email_verifications')
      .select('*')
      .eq('verification_code', code)
      .maybeSingle();
    throwIfError(error, 'Load verification code');
    return data;
  }

  async markVerified(userId: string, verifiedAt: string): Promise<void> {
    const { error } = await this.db
      .from('email_verifications')
      .update({ is_verified: true, verified_at: verifiedAt })
      .eq('user_id', userId);
    throwIfError(error, 'Mark verification used');
  }
}

export class SupabaseReferralRepository implements ReferralRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(referral: ReferralRecord): Promise<ReferralRecord> {
    const { data, error } = await this.db.from('referrals').insert(referral).select('*').single();
    return requireRow<ReferralRecord>(data, error, 'Insert referral');
  }

  async findByReferee(refereeId: string): Promise<ReferralRecord | null> {
    const { data, error } = await this.db.from('referrals').select('*').eq('referee_id', refereeId).maybeSingle();
    throwIfError(error, 'Load referral');
    return data;
  }

  async update(id: string, patch: Partial<ReferralRecord>): Promise<ReferralRecord> {
    const { data, error } = await this.db.from('referrals').update(patch).eq('id', id).select('*').single();
    return requireRow<ReferralRecord>(data, error, 'Update referral');
  }

  async listByReferrer(referrerId: string): Promise<ReferralRecord[]> {
    const { data, error } = await this.db
      .from('referrals')
      .select('*')
      .eq('referrer_id', referrerId)
      .order('created_at', { ascending: false });
    throwIfError(error, 'List referrals');
    return data ?? [];
  }
}

export class SupabaseFeedbackRepository implements FeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(feedback: FeedbackRecord): Promise<FeedbackRecord> {
    const { data, error } = await this.db.from('feedback').insert(feedback).select('*').single();
    return requireRow<FeedbackRecord>(data, error, 'Insert feedback');
  }

  async update(id: string, patch: Partial<FeedbackRecord>): Promise<FeedbackRecord> {
    const { data, error } = await this.db.from('feedback').update(patch).eq('id', id).select('*').single();
    return requireRow<FeedbackRecord>(data, error, 'Update feedback');
  }

  async list(): Promise<FeedbackRecord[]> {
    const { data, error } = await this.db.from('feedback').select('*').order('created_at', { ascending: false });
    throwIfError(error, 'List feedback');
    return data ?? [];
  }
}
