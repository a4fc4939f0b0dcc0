import type { UserRole } from './roles';

export type VipType = 'free' | 'vip';

export interface UserRecord {
  id: string;
  username: string;
  email: string | null;
  phone: string | null;
  password_hash: string;
  role: UserRole;
  created_at: string;
  last_login: string | null;
  is_active: boolean;
  login_attempts: number;
  locked_until: string | null;
  email_verified: boolean;
  free_optimization_count: number;
  vip_type: VipType;
  coupon_used: boolean;
  coupon_expires_at: string | null;
  referral_code: string;
}

export type PublicUser = Omit<UserRecord, 'password_hash' | 'login_attempts' | 'locked_until'>;

export function toPublicUser(user: UserRecord): PublicUser {
  const { password_hash: _hash, login_attempts: _attempts, locked_until: _locked, ...rest } = user;
  return rest;
}

export interface SessionRecord {
  session_id: string;
  user_id: string;
  created_at: string;
  expires_at: string;
  remember_me: boolean;
  ip_address: string | null;
  user_agent: string | null;
}

export interface EmailVerificationRecord {
  user_id: string;
  verification_code: string;
  created_at: string;
  verified_at: string | null;
  is_verified: boolean;
}

export interface ReferralRecord {
  id: string;
  referrer_id: string;
  referee_id: string;
  referral_code: string;
  created_at: string;
  email_verified: boolean;
  rewarded: boolean;
}

export interface FeedbackRecord {
  id: string;
  user_id: string | null;
  content: string;
  ip_address: string | null;
  user_agent: string | null;
  referer: string | null;
  created_at: string;
  delivered: boolean;
  delivery_channel: string | null;
}
