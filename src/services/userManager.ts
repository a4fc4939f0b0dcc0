import { randomBytes } from 'node:crypto';
import type { AuthRules } from '../config/appConfig';
import type { SessionRepository, UserRepository } from '../repositories/types';
import { DEFAULT_ROLE } from '../types/roles';
import { toPublicUser, type PublicUser, type SessionRecord, type UserRecord } from '../types/user';
import {
  AccountLockedError,
  AuthError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  QuotaExceededError,
  ValidationError,
} from '../utils/errors';
import { Logger } from '../utils/Logger';
import { addDays, addHours, systemClock, type Clock } from '../utils/time';
import type { EmailVerificationService } from './emailVerification';
import type { PasswordHasher } from './passwords';
import type { ReferralTracker } from './referralTracker';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const PHONE_PATTERN = /^1[3-9]\d{9}$/;

export interface RegisterInput {
  username: string;
  password: string;
  email?: string;
  phone?: string;
  referralCode?: string;
}

export interface LoginContext {
  rememberMe?: boolean;
  ipAddress?: string;
  userAgent?: string;
}

export interface LoginResult {
  session: SessionRecord;
  user: PublicUser;
}

export interface CreditStatus {
  unlimited: boolean;
  remaining: number;
}

export interface UserManagerDeps {
  users: UserRepository;
  sessions: SessionRepository;
  hasher: PasswordHasher;
  rules: AuthRules;
  referrals: ReferralTracker;
  verification: EmailVerificationService;
  clock?: Clock;
}

export class UserManager {
  private readonly clock: Clock;

  constructor(private readonly deps: UserManagerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  validateRegistration(input: RegisterInput): { username: string; email: string | null; phone: string | null } {
    const { rules } = this.deps;
    const username = input.username.trim();
    const email = input.email?.trim() || null;
    const phone = input.phone?.trim() || null;

    if (username.length < rules.minUsernameLength || username.length > rules.maxUsernameLength) {
      throw new ValidationError(
        `Username must be ${rules.minUsernameLength}-${rules.maxUsernameLength} characters`
      );
    }
    if (input.password.length < rules.minPasswordLength) {
      throw new ValidationError(`Password must be at least ${rules.minPasswordLength} characters`);
    }
    if (!email && !phone) {
      throw new ValidationError('Email or phone number is required');
    }
    if (email && !EMAIL_PATTERN.test(email)) {
      throw new ValidationError('Invalid email format');
    }
    if (phone && !PHONE_PATTERN.test(phone)) {
      throw new ValidationError('Invalid phone number format');
    }
    return { username, email, phone };
  }

  async register(input: RegisterInput): Promise<PublicUser> {
    const { username, email, phone } = this.validateRegistration(input);
    const { users, rules } = this.deps;

    if (await users.findByUsername(username)) {
      throw new ConflictError('Username already taken');
    }
    if (email && (await users.findByEmail(email))) {
      throw new ConflictError('Email already registered');
    }
    if (phone && (await users.findByPhone(phone))) {
      throw new ConflictError('Phone number already registered');
    }

    const now = this.clock();
    const user = await users.insert({
      id: `user_${randomBytes(16).toString('hex')}`,
      username,
      email,
      phone,
      password_hash: await this.deps.hasher.hash(input.password),
      role: DEFAULT_ROLE,
      created_at: now.toISOString(),
      last_login: null,
      is_active: true,
      login_attempts: 0,
      locked_until: null,
      email_verified: false,
      free_optimization_count: rules.freeOptimizationCredits,
      vip_type: 'free',
      coupon_used: false,
      coupon_expires_at: addDays(now, rules.couponDays).toISOString(),
      referral_code: randomBytes(4).toString('hex').toUpperCase(),
    });

    if (input.referralCode) {
      await this.deps.referrals.recordReferral(input.referralCode, user.id);
    }
    if (email) {
      await this.deps.verification.issue({ id: user.id, email, username });
    }

    await Logger.logInfo('Auth', 'User registered', { UserID: user.id, Status: 'REGISTERED' });
    return toPublicUser(user);
  }

  private async findByLoginId(loginId: string): Promise<UserRecord | null> {
    const { users } = this.deps;
    return (
      (await users.findByUsername(loginId)) ??
      (await users.findByEmail(loginId)) ??
      (await users.findByPhone(loginId))
    );
  }

  async login(loginId: string, password: string, context: LoginContext = {}): Promise<LoginResult> {
    const { users, sessions, rules } = this.deps;
    let user = await this.findByLoginId(loginId.trim());
    if (!user) {
      throw new AuthError('Invalid login or password');
    }
    if (!user.is_active) {
      throw new ForbiddenError('Account is disabled');
    }

    const now = this.clock();
    if (user.locked_until) {
      if (now < new Date(user.locked_until)) {
        throw new AccountLockedError(user.locked_until);
      }
      user = await users.update(user.id, { locked_until: null, login_attempts: 0 });
    }

    if (!(await this.deps.hasher.verify(password, user.password_hash))) {
      const attempts = user.login_attempts + 1;
      if (attempts >= rules.maxLoginAttempts) {
        const lockedUntil = addHours(now, rules.lockoutMinutes / 60).toISOString();
        await users.update(user.id, { login_attempts: attempts, locked_until: lockedUntil });
        await Logger.logWarning('Auth', 'Account locked after failed logins', { UserID: user.id, Status: 'LOCKED' });
        throw new AccountLockedError(lockedUntil);
      }
      await users.update(user.id, { login_attempts: attempts });
      throw new AuthError('Invalid login or password', { attempts_left: rules.maxLoginAttempts - attempts });
    }

    const updated = await users.update(user.id, {
      login_attempts: 0,
      locked_until: null,
      last_login: now.toISOString(),
    });

    const rememberMe = Boolean(context.rememberMe);
    const expiresAt = rememberMe ? addDays(now, rules.rememberMeDays) : addHours(now, rules.sessionHours);
    const session = await sessions.insert({
      session_id: randomBytes(32).toString('hex'),
      user_id: user.id,
      created_at: now.toISOString(),
      expires_at: expiresAt.toISOString(),
      remember_me: rememberMe,
      ip_address: context.ipAddress ?? null,
      user_agent: context.userAgent ?? null,
    });

    return { session, user: toPublicUser(updated) };
  }

  // Null for unknown, expired or disabled; expired sessions are removed
  async getUserBySession(sessionId: string): Promise<UserRecord | null> {
    const { users, sessions } = this.deps;
    const session = await sessions.find(sessionId);
    if (!session) return null;

    if (new Date(session.expires_at) <= this.clock()) {
      await sessions.delete(sessionId);
      return null;
    }

    const user = await users.findById(session.user_id);
    if (!user || !user.is_active) return null;
    return user;
  }

  async logout(sessionId: string): Promise<void> {
    await this.deps.sessions.delete(sessionId);
  }

  async cleanupExpiredSessions(): Promise<number> {
    const removed = await this.deps.sessions.deleteExpired(this.clock().toISOString());
    if (removed > 0) {
      await Logger.logInfo('Auth', `Removed ${removed} expired sessions`, { Status: 'CLEANUP' });
    }
    return removed;
  }

  async resendVerification(userId: string): Promise<void> {
    const user = await this.deps.users.findById(userId);
    if (!user) throw new NotFoundError('User');
    if (!user.email) throw new ValidationError('Account has no email address');
    if (user.email_verified) throw new ConflictError('Email already verified');
    await this.deps.verification.issue({ id: user.id, email: user.email, username: user.username });
  }

  async creditStatus(userId: string): Promise<CreditStatus> {
    const user = await this.deps.users.findById(userId);
    if (!user) throw new NotFoundError('User');
    return { unlimited: user.vip_type === 'vip', remaining: user.free_optimization_count };
  }

  // VIP accounts are unlimited; free accounts spend one credit per optimization
  async consumeOptimizationCredit(userId: string): Promise<CreditStatus> {
    const user = await this.deps.users.findById(userId);
    if (!user) throw new NotFoundError('User');
    if (user.vip_type === 'vip') {
      return { unlimited: true, remaining: user.free_optimization_count };
    }
    if (user.free_optimization_count <= 0) {
      throw new QuotaExceededError();
    }
    const updated = await this.deps.users.update(userId, {
      free_optimization_count: user.free_optimization_count - 1,
    });
    return { unlimited: false, remaining: updated.free_optimization_count };
  }

  async refundOptimizationCredit(userId: string): Promise<void> {
    const user = await this.deps.users.findById(userId);
    if (!user || user.vip_type === 'vip') return;
    await this.deps.users.update(userId, { free_optimization_count: user.free_optimization_count + 1 });
  }
}
