import type { JobDescriptionRecord } from '../types/jobDescription';
import type { MockInterviewRecord } from '../types/interview';
import type { ResumeRecord } from '../types/resume';
import type { TaskRecord } from '../types/task';
import type { TemplateRecord, TemplateTier } from '../types/template';
import type {
  EmailVerificationRecord,
  FeedbackRecord,
  ReferralRecord,
  SessionRecord,
  UserRecord,
} from '../types/user';
import type { ComparisonRecord, ResumeVersionRecord, VersionPerformanceRecord } from '../types/version';

export interface Page {
  offset: number;
  limit: number;
}

export interface UserStats {
  total: number;
  active: number;
  verified: number;
  vip: number;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByPhone(phone: string): Promise<UserRecord | null>;
  findByReferralCode(code: string): Promise<UserRecord | null>;
  insert(user: UserRecord): Promise<UserRecord>;
  update(id: string, patch: Partial<UserRecord>): Promise<UserRecord>;
  list(page: Page): Promise<{ users: UserRecord[]; total: number }>;
  stats(): Promise<UserStats>;
}

export interface SessionRepository {
  insert(session: SessionRecord): Promise<SessionRecord>;
  find(sessionId: string): Promise<SessionRecord | null>;
  delete(sessionId: string): Promise<void>;
  deleteExpired(nowIso: string): Promise<number>;
  countActive(nowIso: string): Promise<number>;
}

export interface EmailVerificationRepository {
  upsert(record: EmailVerificationRecord): Promise<void>;
  findByCode(code: string): Promise<EmailVerificationRecord | null>;
  markVerified(userId: string, verifiedAt: string): Promise<void>;
}

export interface ReferralRepository {
  insert(referral: ReferralRecord): Promise<ReferralRecord>;
  findByReferee(refereeId: string): Promise<ReferralRecord | null>;
  update(id: string, patch: Partial<ReferralRecord>): Promise<ReferralRecord>;
  listByReferrer(referrerId: string): Promise<ReferralRecord[]>;
}

export interface FeedbackRepository {
  insert(feedback: FeedbackRecord): Promise<FeedbackRecord>;
  update(id: string, patch: Partial<FeedbackRecord>): Promise<FeedbackRecord>;
  list(): Promise<FeedbackRecord[]>;
}

// Rows owned by exactly one user
export interface OwnedRepository<T> {
  insert(record: T): Promise<T>;
  findById(userId: string, id: string): Promise<T | null>;
  list(userId: string): Promise<T[]>;
  delete(userId: string, id: string): Promise<boolean>;
}

export type ResumeRepository = OwnedRepository<ResumeRecord>;
export type JobDescriptionRepository = OwnedRepository<JobDescriptionRecord>;

// user_id null marks guest rows
export interface GuestClaimable {
  claimGuest(ids: string[], userId: string): Promise<number>;
  deleteGuestOlderThan(cutoffIso: string): Promise<number>;
}

export interface VersionRepository extends GuestClaimable {
  insert(version: ResumeVersionRecord): Promise<ResumeVersionRecord>;
  findById(id: string): Promise<ResumeVersionRecord | null>;
  listVisible(userId: string | null): Promise<ResumeVersionRecord[]>;
  update(id: string, patch: Partial<ResumeVersionRecord>): Promise<ResumeVersionRecord>;
  delete(id: string): Promise<void>;
  clearActive(ownerId: string | null): Promise<void>;
}

export interface PerformanceRepository {
  find(versionId: string): Promise<VersionPerformanceRecord | null>;
  upsert(record: VersionPerformanceRecord): Promise<VersionPerformanceRecord>;
  delete(versionId: string): Promise<void>;
}

export interface ComparisonRepository {
  findPair(versionA: string, versionB: string, sinceIso: string): Promise<ComparisonRecord | null>;
  insert(record: ComparisonRecord): Promise<ComparisonRecord>;
  deleteForVersion(versionId: string): Promise<void>;
  deleteOlderThan(cutoffIso: string): Promise<number>;
}

export interface TemplateFilter {
  tier?: TemplateTier;
  category?: string;
}

export interface TemplateRepository extends GuestClaimable {
  insert(template: TemplateRecord): Promise<TemplateRecord>;
  findById(id: string): Promise<TemplateRecord | null>;
  listVisible(userId: string | null, filter?: TemplateFilter): Promise<TemplateRecord[]>;
  update(id: string, patch: Partial<TemplateRecord>): Promise<TemplateRecord>;
  delete(id: string): Promise<void>;
  deleteExpired(nowIso: string): Promise<number>;
}

export interface InterviewRepository {
  insert(session: MockInterviewRecord): Promise<MockInterviewRecord>;
  findById(id: string): Promise<MockInterviewRecord | null>;
  list(userId: string): Promise<MockInterviewRecord[]>;
  update(id: string, patch: Partial<MockInterviewRecord>): Promise<MockInterviewRecord>;
  // Applies the patch only while current_index still equals expectedIndex; null otherwise
  updateAtIndex(id: string, expectedIndex: number, patch: Partial<MockInterviewRecord>): Promise<MockInterviewRecord | null>;
  delete(id: string): Promise<void>;
}

export interface TaskRepository {
  insert(task: TaskRecord): Promise<TaskRecord>;
  findById(id: string): Promise<TaskRecord | null>;
  update(id: string, patch: Partial<TaskRecord>): Promise<TaskRecord>;
  // Completed or failed tasks last touched before the cutoff
  deleteFinishedOlderThan(cutoffIso: string): Promise<number>;
}

export interface Repositories {
  users: UserRepository;
  sessions: SessionRepository;
  verifications: EmailVerificationRepository;
  referrals: ReferralRepository;
  feedback: FeedbackRepository;
  resumes: ResumeRepository;
  jobDescriptions: JobDescriptionRepository;
  versions: VersionRepository;
  performance: PerformanceRepository;
  comparisons: ComparisonRepository;
  templates: TemplateRepository;
  interviews: InterviewRepository;
  tasks: TaskRepository;
}
