import type {
  ComparisonRepository,
  EmailVerificationRepository,
  FeedbackRepository,
  InterviewRepository,
  OwnedRepository,
  Page,
  PerformanceRepository,
  ReferralRepository,
  Repositories,
  SessionRepository,
  TaskRepository,
  TemplateFilter,
  TemplateRepository,
  UserRepository,
  UserStats,
  VersionRepository,
} from '../../src/repositories/types';
import type { JobDescriptionRecord } from '../../src/types/jobDescription';
import type { MockInterviewRecord } from '../../src/types/interview';
import type { ResumeRecord } from '../../src/types/resume';
import type { TaskRecord } from '../../src/types/task';
import type { TemplateRecord } from '../../src/types/template';
import type {
  EmailVerificationRecord,
  FeedbackRecord,
  ReferralRecord,
  SessionRecord,
  UserRecord,
} from '../../src/types/user';
import type { ComparisonRecord, ResumeVersionRecord, VersionPerformanceRecord } from '../../src/types/version';

// Rows are copied in and out so callers never share state with the store
const copy = <T>(value: T): T => structuredClone(value);

const newestFirst = <T extends { created_at: string }>(rows: T[]) =>
  [...rows].sort((a, b) => b.created_at.localeCompare(a.created_at));

class Table<T> {
  readonly rows = new Map<string, T>();

  constructor(private readonly key: (row: T) => string) {}

  put(row: T): T {
    this.rows.set(this.key(row), copy(row));
    return copy(row);
  }

  get(id: string): T | null {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  patch(id: string, patch: Partial<T>, what: string): T {
    const row = this.rows.get(id);
    if (!row) throw new Error(`${what} ${id} not found`);
    const updated = { ...row, ...copy(patch) };
    this.rows.set(id, updated);
    return copy(updated);
  }

  all(): T[] {
    return [...this.rows.values()].map(copy);
  }

  removeWhere(predicate: (row: T) => boolean): number {
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (predicate(row)) {
        this.rows.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}

export class MemoryUserRepository implements UserRepository {
  readonly table = new Table<UserRecord>((user) => user.id);

  private async findBy(match: (user: UserRecord) => boolean) {
    return this.table.all().find(match) ?? null;
  }

  async findById(id: string) {
    return this.table.get(id);
  }

  findByUsername(username: string) {
    return this.findBy((user) => user.username === username);
  }

  findByEmail(email: string) {
    return this.findBy((user) => user.email === email);
  }

  findByPhone(phone: string) {
    return this.findBy((user) => user.phone === phone);
  }

  findByReferralCode(code: string) {
    return this.findBy((user) => user.referral_code === code);
  }

  async insert(user: UserRecord) {
    if (this.table.all().some((existing) => existing.username === user.username)) {
      throw new Error('duplicate username');
    }
    return this.table.put(user);
  }

  async update(id: string, patch: Partial<UserRecord>) {
    return this.table.patch(id, patch, 'User');
  }

  async list(page: Page) {
    const users = newestFirst(this.table.all());
    return { users: users.slice(page.offset, page.offset + page.limit), total: users.length };
  }

  async stats(): Promise<UserStats> {
    const users = this.table.all();
    return {
      total: users.length,
      active: users.filter((user) => user.is_active).length,
      verified: users.filter((user) => user.email_verified).length,
      vip: users.filter((user) => user.vip_type === 'vip').length,
    };
  }
}

export class MemorySessionRepository implements SessionRepository {
  readonly table = new Table<SessionRecord>((session) => session.session_id);

  async insert(session: SessionRecord) {
    return this.table.put(session);
  }

  async find(sessionId: string) {
    return this.table.get(sessionId);
  }

  async delete(sessionId: string) {
    this.table.removeWhere((session) => session.session_id === sessionId);
  }

  async deleteExpired(nowIso: string) {
    return this.table.removeWhere((session) => session.expires_at < nowIso);
  }

  async countActive(nowIso: string) {
    return this.table.all().filter((session) => session.expires_at >= nowIso).length;
  }
}

export class MemoryEmailVerificationRepository implements EmailVerificationRepository {
  readonly table = new Table<EmailVerificationRecord>((record) => record.user_id);

  async upsert(record: EmailVerificationRecord) {
    this.table.put(record);
  }

  async findByCode(code: string) {
    return this.table.all().find((record) => record.verification_code === code) ?? null;
  }

  async markVerified(userId: string, verifiedAt: string) {
    this.table.patch(userId, { is_verified: true, verified_at: verifiedAt }, 'Verification');
  }
}

export class MemoryReferralRepository implements ReferralRepository {
  readonly table = new Table<ReferralRecord>((referral) => referral.id);

  async insert(referral: ReferralRecord) {
    return this.table.put(referral);
  }

  async findByReferee(refereeId: string) {
    return this.table.all().find((referral) => referral.referee_id === refereeId) ?? null;
  }

  async update(id: string, patch: Partial<ReferralRecord>) {
    return this.table.patch(id, patch, 'Referral');
  }

  async listByReferrer(referrerId: string) {
    return newestFirst(this.table.all().filter((referral) => referral.referrer_id === referrerId));
  }
}

export class MemoryFeedbackRepository implements FeedbackRepository {
  readonly table = new Table<FeedbackRecord>((feedback) => feedback.id);

  async insert(feedback: FeedbackRecord) {
    return this.table.put(feedback);
  }

  async update(id: string, patch: Partial<FeedbackRecord>) {
    return this.table.patch(id, patch, 'Feedback');
  }

  async list() {
    return newestFirst(this.table.all());
  }
}

export class MemoryOwnedRepository<T extends { id: string; user_id: string; created_at: string }> implements OwnedRepository<T> {
  readonly table = new Table<T>((row) => row.id);

  async insert(record: T) {
    return this.table.put(record);
  }

  async findById(userId: string, id: string) {
    const row = this.table.get(id);
    return row && row.user_id === userId ? row : null;
  }

  async list(userId: string) {
    return newestFirst(this.table.all().filter((row) => row.user_id === userId));
  }

  async delete(userId: string, id: string) {
    return this.table.removeWhere((row) => row.id === id && row.user_id === userId) > 0;
  }
}

const visibleTo = (userId: string | null) => (row: { user_id: string | null }) =>
  row.user_id === null || row.user_id === userId;

export class MemoryVersionRepository implements VersionRepository {
  readonly table = new Table<ResumeVersionRecord>((version) => version.id);

  async insert(version: ResumeVersionRecord) {
    return this.table.put(version);
  }

  async findById(id: string) {
    return this.table.get(id);
  }

  async listVisible(userId: string | null) {
    return newestFirst(this.table.all().filter(visibleTo(userId)));
  }

  async update(id: string, patch: Partial<ResumeVersionRecord>) {
    return this.table.patch(id, patch, 'Version');
  }

  async delete(id: string) {
    this.table.removeWhere((version) => version.id === id);
  }

  async clearActive(ownerId: string | null) {
    for (const version of this.table.all()) {
      if (version.user_id === ownerId && version.is_active) {
        this.table.patch(version.id, { is_active: false }, 'Version');
      }
    }
  }

  async claimGuest(ids: string[], userId: string) {
    let claimed = 0;
    for (const id of ids) {
      const version = this.table.get(id);
      if (version && version.user_id === null) {
        this.table.patch(id, { user_id: userId }, 'Version');
        claimed += 1;
      }
    }
    return claimed;
  }

  async deleteGuestOlderThan(cutoffIso: string) {
    return this.table.removeWhere((version) => version.user_id === null && version.created_at < cutoffIso);
  }
}

export class MemoryPerformanceRepository implements PerformanceRepository {
  readonly table = new Table<VersionPerformanceRecord>((record) => record.version_id);

  async find(versionId: string) {
    return this.table.get(versionId);
  }

  async upsert(record: VersionPerformanceRecord) {
    return this.table.put(record);
  }

  async delete(versionId: string) {
    this.table.removeWhere((record) => record.version_id === versionId);
  }
}

export class MemoryComparisonRepository implements ComparisonRepository {
  readonly table = new Table<ComparisonRecord>((record) => record.id);

  async findPair(versionA: string, versionB: string, sinceIso: string) {
    const matches = this.table
      .all()
      .filter(
        (record) =>
          record.created_at >= sinceIso &&
          ((record.version1_id === versionA && record.version2_id === versionB) ||
            (record.version1_id === versionB && record.version2_id === versionA))
      );
    return newestFirst(matches)[0] ?? null;
  }

  async insert(record: ComparisonRecord) {
    return this.table.put(record);
  }

  async deleteForVersion(versionId: string) {
    this.table.removeWhere((record) => record.version1_id === versionId || record.version2_id === versionId);
  }

  async deleteOlderThan(cutoffIso: string) {
    return this.table.removeWhere((record) => record.created_at < cutoffIso);
  }
}

export class MemoryTemplateRepository implements TemplateRepository {
  readonly table = new Table<TemplateRecord>((template) => template.id);

  async insert(template: TemplateRecord) {
    return this.table.put(template);
  }

  async findById(id: string) {
    return this.table.get(id);
  }

  async listVisible(userId: string | null, filter: TemplateFilter = {}) {
    return newestFirst(
      this.table
        .all()
        .filter(visibleTo(userId))
        .filter((template) => !filter.tier || template.tier === filter.tier)
        .filter((template) => !filter.category || template.category === filter.category)
    );
  }

  async update(id: string, patch: Partial<TemplateRecord>) {
    return this.table.patch(id, patch, 'Template');
  }

  async delete(id: string) {
    this.table.removeWhere((template) => template.id === id);
  }

  async deleteExpired(nowIso: string) {
    return this.table.removeWhere((template) => template.expires_at !== null && template.expires_at < nowIso);
  }

  async claimGuest(ids: string[], userId: string) {
    let claimed = 0;
    for (const id of ids) {
      const template = this.table.get(id);
      if (template && template.user_id === null) {
        this.table.patch(id, { user_id: userId }, 'Template');
        claimed += 1;
      }
    }
    return claimed;
  }

  async deleteGuestOlderThan(cutoffIso: string) {
    return this.table.removeWhere((template) => template.user_id === null && template.created_at < cutoffIso);
  }
}

export class MemoryInterviewRepository implements InterviewRepository {
  readonly table = new Table<MockInterviewRecord>((session) => session.id);

  async insert(session: MockInterviewRecord) {
    return this.table.put(session);
  }

  async findById(id: string) {
    return this.table.get(id);
  }

  async list(userId: string) {
    return newestFirst(this.table.all().filter((session) => session.user_id === userId));
  }

  async update(id: string, patch: Partial<MockInterviewRecord>) {
    return this.table.patch(id, patch, 'Interview');
  }

  async updateAtIndex(id: string, expectedIndex: number, patch: Partial<MockInterviewRecord>) {
    const session = this.table.get(id);
    if (!session || session.current_index !== expectedIndex) return null;
    return this.table.patch(id, patch, 'Interview');
  }

  async delete(id: string) {
    this.table.removeWhere((session) => session.id === id);
  }
}

export class MemoryTaskRepository implements TaskRepository {
  readonly table = new Table<TaskRecord>((task) => task.id);

  async insert(task: TaskRecord) {
    return this.table.put(task);
  }

  async findById(id: string) {
    return this.table.get(id);
  }

  async update(id: string, patch: Partial<TaskRecord>) {
    return this.table.patch(id, patch, 'Task');
  }

  async deleteFinishedOlderThan(cutoffIso: string) {
    return this.table.removeWhere(
      (task) => (task.status === 'completed' || task.status === 'failed') && task.updated_at < cutoffIso
    );
  }
}

export interface MemoryRepositories extends Repositories {
  users: MemoryUserRepository;
  sessions: MemorySessionRepository;
  verifications: MemoryEmailVerificationRepository;
  referrals: MemoryReferralRepository;
  feedback: MemoryFeedbackRepository;
  resumes: MemoryOwnedRepository<ResumeRecord>;
  jobDescriptions: MemoryOwnedRepository<JobDescriptionRecord>;
  versions: MemoryVersionRepository;
  performance: MemoryPerformanceRepository;
  comparisons: MemoryComparisonRepository;
  templates: MemoryTemplateRepository;
  interviews: MemoryInterviewRepository;
  tasks: MemoryTaskRepository;
}

export function createMemoryRepositories(): MemoryRepositories {
  return {
    users: new MemoryUserRepository(),
    sessions: new MemorySessionRepository(),
    verifications: new MemoryEmailVerificationRepository(),
    referrals: new MemoryReferralRepository(),
    feedback: new MemoryFeedbackRepository(),
    resumes: new MemoryOwnedRepository<ResumeRecord>(),
    jobDescriptions: new MemoryOwnedRepository<JobDescriptionRecord>(),
    versions: new MemoryVersionRepository(),
    performance: new MemoryPerformanceRepository(),
    comparisons: new MemoryComparisonRepository(),
    templates: new MemoryTemplateRepository(),
    interviews: new MemoryInterviewRepository(),
    tasks: new MemoryTaskRepository(),
  };
}
