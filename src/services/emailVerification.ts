import { randomBytes } from 'node:crypto';
import type { EmailVerificationRepository, UserRepository } from '../repositories/types';
import { ValidationError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addHours, systemClock, type Clock } from '../utils/time';
import type { FallbackEmailSender } from './emailSender';
import type { ReferralTracker } from './referralTracker';

export interface EmailVerificationDeps {
  verifications: EmailVerificationRepository;
  users: UserRepository;
  mailer: FallbackEmailSender;
  referrals: ReferralTracker;
  baseUrl: string;
  validityHours: number;
  clock?: Clock;
}

export class EmailVerificationService {
  private readonly clock: Clock;

  constructor(private readonly deps: EmailVerificationDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  verificationLink(code: string): string {
    return `${this.deps.baseUrl}/auth/verify-email?code=${code}`;
  }

  /**
   * Stores a fresh code for the user (replacing any earlier one) and mails the link.
   * A delivery failure is logged; the code stays valid.
   */
  async issue(user: { id: string; email: string; username: string }): Promise<string> {
    const code = randomBytes(16).toString('hex');
    await this.deps.verifications.upsert({
      user_id: user.id,
      verification_code: code,
      created_at: this.clock().toISOString(),
      verified_at: null,
      is_verified: false,
    });

    const link = this.verificationLink(code);
    try {
      await this.deps.mailer.deliver({
        to: user.email,
        subject: 'Verify your email address',
        text: `Hi ${user.username},\n\nConfirm your email address by opening the link below within ${this.deps.validityHours} hours:\n${link}\n`,
      });
    } catch (err) {
      await Logger.logBackendError('EmailVerification', err, {
        UserID: user.id,
        Status: 'EMAIL_NOT_SENT',
        Exception: errorMessage(err),
      });
    }
    return code;
  }

  async verify(code: string): Promise<{ userId: string; referralRewarded: boolean }> {
    const record = await this.deps.verifications.findByCode(code.trim());
    if (!record || record.is_verified) {
      throw new ValidationError('Invalid or already used verification code');
    }

    const now = this.clock();
    if (addHours(new Date(record.created_at), this.deps.validityHours) < now) {
      throw new ValidationError('Verification code expired');
    }

    await this.deps.verifications.markVerified(record.user_id, now.toISOString());
    await this.deps.users.update(record.user_id, { email_verified: true });
    const referralRewarded = await this.deps.referrals.markEmailVerified(record.user_id);

    await Logger.logInfo('EmailVerification', 'Email verified', {
      UserID: record.user_id,
      Status: 'VERIFIED',
    });
    return { userId: record.user_id, referralRewarded };
  }
}
