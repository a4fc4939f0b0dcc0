import { v4 as uuid } from 'uuid';
import type { ReferralRepository, UserRepository } from '../repositories/types';
import type { ReferralRecord } from '../types/user';
import { Logger } from '../utils/Logger';
import { systemClock, type Clock } from '../utils/time';

export interface ReferralStats {
  referral_code: string;
  total_referrals: number;
  verified_referrals: number;
  rewards_earned: number;
}

export class ReferralTracker {
  constructor(
    private readonly referrals: ReferralRepository,
    private readonly users: UserRepository,
    private readonly clock: Clock = systemClock
  ) {}

  // Unknown codes and self-referrals are ignored
  async recordReferral(code: string, refereeId: string): Promise<ReferralRecord | null> {
    const normalized = code.trim().toUpperCase();
    if (!normalized) return null;

    const referrer = await this.users.findByReferralCode(normalized);
    if (!referrer || referrer.id === refereeId) {
      await Logger.logWarning('Referrals', 'Referral code ignored', {
        UserID: refereeId,
        RequestPayload: { referral_code: normalized },
      });
      return null;
    }

    const existing = await this.referrals.findByReferee(refereeId);
    if (existing) return existing;

    return this.referrals.insert({
      id: uuid(),
      referrer_id: referrer.id,
      referee_id: refereeId,
      referral_code: normalized,
      created_at: this.clock().toISOString(),
      email_verified: false,
      rewarded: false,
    });
  }

  /**
   * Called once the referee verifies their email. The referrer gets one extra
   * free optimization, at most once per referee.
   */
  async markEmailVerified(refereeId: string): Promise<boolean> {
    const referral = await this.referrals.findByReferee(refereeId);
    if (!referral || referral.rewarded) return false;

    const referrer = await this.users.findById(referral.referrer_id);
    if (!referrer) {
      await this.referrals.update(referral.id, { email_verified: true });
      return false;
    }

    await this.users.update(referrer.id, {
      free_optimization_count: referrer.free_optimization_count + 1,
    });
    await this.referrals.update(referral.id, { email_verified: true, rewarded: true });
    await Logger.logInfo('Referrals', 'Referral reward granted', {
      UserID: referrer.id,
      RelatedTo: refereeId,
      Status: 'REWARDED',
    });
    return true;
  }

  async getStats(userId: string): Promise<ReferralStats> {
    const user = await this.users.findById(userId);
    const referrals = await this.referrals.listByReferrer(userId);
    return {
      referral_code: user?.referral_code ?? '',
      total_referrals: referrals.length,
      verified_referrals: referrals.filter((r) => r.email_verified).length,
      rewards_earned: referrals.filter((r) => r.rewarded).length,
    };
  }
}
