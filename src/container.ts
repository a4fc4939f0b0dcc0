import type { AppConfig } from './config/appConfig';
import { getSupabaseAdmin } from './config/supabase';
import { createSupabaseRepositories } from './repositories/supabase';
import type { Repositories } from './repositories/types';
import { AnswerEvaluator } from './services/answerEvaluator';
import { FallbackEmailSender, LoggingEmailSender, type EmailSender } from './services/emailSender';
import { EmailVerificationService } from './services/emailVerification';
import { HttpEmbeddingClient, type EmbeddingClient } from './services/embeddings';
import { FeedbackService } from './services/feedbackService';
import { GuestDataMigrator } from './services/guestDataMigrator';
import { JobDescriptionParser } from './services/jobDescriptionParser';
import { HttpLLMClient, type LLMClient } from './services/llmClient';
import type { MaintenanceDeps } from './services/maintenance';
import { MockInterviewManager } from './services/mockInterviewManager';
import { PageRenderer } from './services/pageRenderer';
import { BcryptPasswordHasher, type PasswordHasher } from './services/passwords';
import { ReferralTracker } from './services/referralTracker';
import { ResumeOptimizer } from './services/resumeOptimizer';
import { ResumeParser } from './services/resumeParser';
import { ResumeVersionManager } from './services/resumeVersionManager';
import { loadSkillDictionary } from './services/skillDictionary';
import { AzureSpeechTranscriber, type SpeechTranscriber } from './services/speechTranscriber';
import { TaskRunner } from './services/taskRunner';
import { TemplateLibrary } from './services/templateLibrary';
import { UserManager } from './services/userManager';
import { systemClock, type Clock } from './utils/time';

// Everything that talks to a vendor; tests swap these for fakes
export interface ExternalClients {
  llm: LLMClient;
  embeddings: EmbeddingClient | null;
  transcriber: SpeechTranscriber;
  emailSenders: EmailSender[];
  hasher: PasswordHasher;
}

export interface Services {
  repos: Repositories;
  userManager: UserManager;
  verification: EmailVerificationService;
  referrals: ReferralTracker;
  feedback: FeedbackService;
  guestData: GuestDataMigrator;
  resumeParser: ResumeParser;
  jobDescriptionParser: JobDescriptionParser;
  optimizer: ResumeOptimizer;
  versions: ResumeVersionManager;
  templates: TemplateLibrary;
  tasks: TaskRunner;
  interviews: MockInterviewManager;
  renderer: PageRenderer;
  maintenance: MaintenanceDeps;
  clock: Clock;
}

export function createServices(
  config: AppConfig,
  repos: Repositories,
  clients: ExternalClients,
  clock: Clock = systemClock
): Services {
  const mailer = new FallbackEmailSender(clients.emailSenders);
  const dictionary = loadSkillDictionary();

  const referrals = new ReferralTracker(repos.referrals, repos.users, clock);
  const verification = new EmailVerificationService({
    verifications: repos.verifications,
    users: repos.users,
    mailer,
    referrals,
    baseUrl: config.appBaseUrl,
    validityHours: config.auth.verificationHours,
    clock,
  });
  const userManager = new UserManager({
    users: repos.users,
    sessions: repos.sessions,
    hasher: clients.hasher,
    rules: config.auth,
    referrals,
    verification,
    clock,
  });

  const versions = new ResumeVersionManager(repos.versions, repos.performance, repos.comparisons, config.comparisonCacheHours, clock);
  const templates = new TemplateLibrary(repos.templates, clients.embeddings, clock);
  const tasks = new TaskRunner(repos.tasks, clock);
  const guestData = new GuestDataMigrator(repos.templates, repos.versions, clock);

  const interviews = new MockInterviewManager({
    interviews: repos.interviews,
    resumes: repos.resumes,
    jobDescriptions: repos.jobDescriptions,
    templates,
    tasks,
    llm: clients.llm,
    evaluator: new AnswerEvaluator(clients.llm),
    transcriber: clients.transcriber,
    clock,
  });

  return {
    repos,
    userManager,
    verification,
    referrals,
    feedback: new FeedbackService(repos.feedback, mailer, config.feedbackInbox, clock),
    guestData,
    resumeParser: new ResumeParser(clients.llm, dictionary),
    jobDescriptionParser: new JobDescriptionParser(clients.llm, dictionary),
    optimizer: new ResumeOptimizer(clients.llm),
    versions,
    templates,
    tasks,
    interviews,
    renderer: new PageRenderer(),
    maintenance: {
      userManager,
      versions,
      templates,
      guestData,
      tasks,
      guestRetentionDays: config.guestRetentionDays,
      taskRetentionDays: config.taskRetentionDays,
    },
    clock,
  };
}

// Supabase storage and the HTTP vendor clients configured in the environment
export function createProductionServices(config: AppConfig): Services {
  const repos = createSupabaseRepositories(getSupabaseAdmin(config));
  return createServices(config, repos, {
    llm: new HttpLLMClient(config.llm),
    embeddings: config.embeddings ? new HttpEmbeddingClient(config.embeddings) : null,
    transcriber: new AzureSpeechTranscriber(config.azureSpeech),
    emailSenders: [new LoggingEmailSender()],
    hasher: new BcryptPasswordHasher(config.bcryptRounds),
  });
}
