import type { SupabaseClient } from '@supabase/supabase-js';
import type { Repositories } from '../types';
import type { JobDescriptionRecord } from '../../types/jobDescription';
import type { ResumeRecord } from '../../types/resume';
import { SupabaseOwnedRepository } from './documentRepositories';
import { SupabaseInterviewRepository, SupabaseTaskRepository } from './interviewRepositories';
import { SupabaseTemplateRepository } from './templateRepository';
import {
  SupabaseEmailVerificationRepository,
  SupabaseFeedbackRepository,
  SupabaseReferralRepository,
  SupabaseSessionRepository,
  SupabaseUserRepository,
} from './userRepositories';
import {
  SupabaseComparisonRepository,
  SupabasePerformanceRepository,
  SupabaseVersionRepository,
} from './versionRepositories';

export function createSupabaseRepositories(db: SupabaseClient): Repositories {
  return {
    users: new SupabaseUserRepository(db),
    sessions: new SupabaseSessionRepository(db),
    verifications: new SupabaseEmailVerificationRepository(db),
    referrals: new SupabaseReferralRepository(db),
    feedback: new SupabaseFeedbackRepository(db),
    resumes: new SupabaseOwnedRepository<ResumeRecord>(db, 'resumes'),
    jobDescriptions: new SupabaseOwnedRepository<JobDescriptionRecord>(db, 'job_descriptions'),
    versions: new SupabaseVersionRepository(db),
    performance: new SupabasePerformanceRepository(db),
    comparisons: new SupabaseComparisonRepository(db),
    templates: new SupabaseTemplateRepository(db),
    interviews: new SupabaseInterviewRepository(db),
    tasks: new SupabaseTaskRepository(db),
  };
}
