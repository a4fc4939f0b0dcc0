import { z } from 'zod';

export const AUTH_RULES = {
  sessionHours: 12,
  rememberMeDays: 30,
  maxLoginAttempts: 5,
  lockoutMinutes: 60,
  minPasswordLength: 6,
  minUsernameLength: 3,
  maxUsernameLength: 20,
  freeOptimizationCredits: 3,
  couponDays: 30,
  verificationHours: 24,
} as const;

export type AuthRules = { -readonly [K in keyof typeof AUTH_RULES]: number };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LLMSettings {
  apiUrl: string;
  apiKey: string;
  model?: string;
}

export interface AppConfig {
  port: number;
  bodyLimit: string;
  allowedOrigins: string[];
  supabase: { url?: string; serviceRoleKey?: string };
  llm: LLMSettings | null;
  embeddings: { apiUrl: string; apiKey: string; model: string } | null;
  azureSpeech: { key: string; region: string; language: string } | null;
  adminPassword: string;
  appBaseUrl: string;
  feedbackInbox: string;
  bcryptRounds: number;
  logLevel: LogLevel;
  auth: AuthRules;
  guestRetentionDays: number;
  taskRetentionDays: number;
  comparisonCacheHours: number;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  BODY_LIMIT: z.string().default('10mb'),
  ALLOWED_ORIGINS: z.string().default(''),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  LLM_API_URL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_MODEL: optionalString,
  EMBEDDING_API_URL: z.string().default('https://api.openai.com/v1/embeddings'),
  EMBEDDING_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  AZURE_SPEECH_KEY: optionalString,
  AZURE_SPEECH_REGION: z.string().default('eastus'),
  AZURE_SPEECH_LANGUAGE: z.string().default('zh-CN'),
  ADMIN_PASSWORD: z.string().min(1).default('admin123'),
  APP_BASE_URL: z.string().default('http://localhost:4000'),
  FEEDBACK_EMAIL: z.string().email().default('feedback@localhost.localdomain'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SESSION_HOURS: z.coerce.number().positive().optional(),
  REMEMBER_ME_DAYS: z.coerce.number().positive().optional(),
  MAX_LOGIN_ATTEMPTS: z.coerce.number().int().positive().optional(),
  LOCKOUT_MINUTES: z.coerce.number().positive().optional(),
  GUEST_RETENTION_DAYS: z.coerce.number().positive().default(7),
  TASK_RETENTION_DAYS: z.coerce.number().positive().default(7),
  COMPARISON_CACHE_HOURS: z.coerce.number().positive().default(24),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  const llm = e.LLM_API_URL && e.LLM_API_KEY
    ? { apiUrl: e.LLM_API_URL, apiKey: e.LLM_API_KEY, model: e.LLM_MODEL }
    : null;

  // OpenAI keys double as embedding keys when no dedicated key is set
  const embeddingKey = e.EMBEDDING_API_KEY ?? (e.LLM_API_KEY?.startsWith('sk-') && !e.LLM_API_KEY.startsWith('sk-ant-') ? e.LLM_API_KEY : undefined);

  return {
    port: e.PORT,
    bodyLimit: e.BODY_LIMIT,
    allowedOrigins: e.ALLOWED_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean),
    supabase: { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY },
    llm,
    embeddings: embeddingKey ? { apiUrl: e.EMBEDDING_API_URL, apiKey: embeddingKey, model: e.EMBEDDING_MODEL } : null,
    azureSpeech: e.AZURE_SPEECH_KEY
      ? { key: e.AZURE_SPEECH_KEY, region: e.AZURE_SPEECH_REGION, language: e.AZURE_SPEECH_LANGUAGE }
      : null,
    adminPassword: e.ADMIN_PASSWORD,
    appBaseUrl: e.APP_BASE_URL.replace(/\/+$/, ''),
    feedbackInbox: e.FEEDBACK_EMAIL,
    bcryptRounds: e.BCRYPT_ROUNDS,
    logLevel: e.LOG_LEVEL,
    auth: {
      ...AUTH_RULES,
      sessionHours: e.SESSION_HOURS ?? AUTH_RULES.sessionHours,
      rememberMeDays: e.REMEMBER_ME_DAYS ?? AUTH_RULES.rememberMeDays,
      maxLoginAttempts: e.MAX_LOGIN_ATTEMPTS ?? AUTH_RULES.maxLoginAttempts,
      lockoutMinutes: e.LOCKOUT_MINUTES ?? AUTH_RULES.lockoutMinutes,
    },
    guestRetentionDays: e.GUEST_RETENTION_DAYS,
    taskRetentionDays: e.TASK_RETENTION_DAYS,
    comparisonCacheHours: e.COMPARISON_CACHE_HOURS,
  };
}
