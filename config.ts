import { z } from 'zod';

const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.0-flash-001';
const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  AUTH_KEY: z.string().min(1).default('change-me'),
  AI_PROVIDER: z.enum(['openrouter', 'gemini']).default('openrouter'),
  API_KEY: z.string().optional(),
  AI_MODEL: z.string().optional(),
  AI_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1/chat/completions'),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  SCAM_THRESHOLD: z.coerce.number().min(0).max(1).default(0.65),
  MIN_TURNS: z.coerce.number().int().min(1).default(3),
  MAX_TURNS: z.coerce.number().int().min(1).default(10),
  MONITORING_REPLY: z.enum(['silent', 'neutral']).default('silent'),
  CALLBACK_URL: z.string({ required_error: 'CALLBACK_URL is required' }).url(),
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  REPORT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  REPORT_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
  RETIRED_TTL_MS: z.coerce.number().int().positive().default(86_400_000),
  MAINTENANCE_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  LOG_LEVEL: z.enum(['trace', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
  port: number;
  authKey: string;
  ai: {
    provider: 'openrouter' | 'gemini';
    apiKey?: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
  };
  detection: {
    threshold: number;
  };
  engagement: {
    minTurns: number;
    maxTurns: number;
    monitoringReply: 'silent' | 'neutral';
    sessionTtlMs: number;
    retiredTtlMs: number;
    maintenanceIntervalMs: number;
  };
  report: {
    callbackUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    backoffMs: number;
  };
  rateLimit: {
    max: number;
    windowMs: number;
  };
  logLevel: 'trace' | 'info' | 'warn' | 'error' | 'silent';
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Reads the process environment (or any map of strings) into a validated config. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings in .env files mean "unset".
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  if (e.MAX_TURNS < e.MIN_TURNS) {
    throw new ConfigError([`MAX_TURNS (${e.MAX_TURNS}) must be >= MIN_TURNS (${e.MIN_TURNS})`]);
  }

  return Object.freeze({
    port: e.PORT,
    authKey: e.AUTH_KEY,
    ai: {
      provider: e.AI_PROVIDER,
      apiKey: e.API_KEY,
      model: e.AI_MODEL ?? (e.AI_PROVIDER === 'gemini' ? DEFAULT_GEMINI_MODEL : DEFAULT_OPENROUTER_MODEL),
      baseUrl: e.AI_BASE_URL,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    detection: { threshold: e.SCAM_THRESHOLD },
    engagement: {
      minTurns: e.MIN_TURNS,
      maxTurns: e.MAX_TURNS,
      monitoringReply: e.MONITORING_REPLY,
      sessionTtlMs: e.SESSION_TTL_MS,
      retiredTtlMs: e.RETIRED_TTL_MS,
      maintenanceIntervalMs: e.MAINTENANCE_INTERVAL_MS,
    },
    report: {
      callbackUrl: e.CALLBACK_URL,
      timeoutMs: e.CALLBACK_TIMEOUT_MS,
      maxAttempts: e.REPORT_MAX_ATTEMPTS,
      backoffMs: e.REPORT_BACKOFF_MS,
    },
    rateLimit: { max: e.RATE_LIMIT_MAX, windowMs: e.RATE_LIMIT_WINDOW_MS },
    logLevel: e.LOG_LEVEL,
  });
}
