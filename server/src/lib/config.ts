import { z } from 'zod';

const DEFAULT_ZAI_BASE_URL = 'https://api.z.ai/api/paas/v4';

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  UPLOADS_DIR: z.string().default('./uploads'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  OCR_FALLBACK_MIN_CHARS: z.coerce.number().int().min(0).default(100),
  OCR_LANGUAGE: z.string().default('eng'),
  OCR_LANG_PATH: z.string().optional(),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  LLM_PROVIDER: z.enum(['zai', 'anthropic']).optional(),
  ZAI_API_KEY: z.string().optional(),
  ZAI_BASE_URL: z.string().url().default(DEFAULT_ZAI_BASE_URL),
  ZAI_MODEL: z.string().default('glm-4.7'),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5'),
  MAX_TOKENS: z.coerce.number().int().positive().default(8192),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  REDIS_URL: z.string().optional(),
  SENTRY_DSN: z.string().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  uploadsDir: string;
  maxUploadBytes: number;
  ocrFallbackMinChars: number;
  ocrLanguage: string;
  ocrLangPath: string | null;
  inferenceTimeoutMs: number;
  workerConcurrency: number;
  llm: {
    provider: 'zai' | 'anthropic' | null;
    zaiApiKey: string | null;
    zaiBaseUrl: string;
    zaiModel: string;
    anthropicApiKey: string | null;
    anthropicModel: string;
    maxTokens: number;
  };
  supabase: { url: string; serviceRoleKey: string } | null;
  redisUrl: string | null;
  sentryDsn: string | null;
  allowedOrigins: string[];
}

/**
 * Reads and validates the process environment. Empty strings count as unset,
 * so `FOO=` in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Config: invalid environment (${details})`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    uploadsDir: e.UPLOADS_DIR,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    ocrFallbackMinChars: e.OCR_FALLBACK_MIN_CHARS,
    ocrLanguage: e.OCR_LANGUAGE,
    ocrLangPath: e.OCR_LANG_PATH ?? null,
    inferenceTimeoutMs: e.INFERENCE_TIMEOUT_MS,
    workerConcurrency: e.WORKER_CONCURRENCY,
    llm: {
      provider: e.LLM_PROVIDER ?? null,
      zaiApiKey: e.ZAI_API_KEY ?? null,
      zaiBaseUrl: e.ZAI_BASE_URL,
      zaiModel: e.ZAI_MODEL,
      anthropicApiKey: e.ANTHROPIC_API_KEY ?? null,
      anthropicModel: e.ANTHROPIC_MODEL,
      maxTokens: e.MAX_TOKENS,
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    redisUrl: e.REDIS_URL ?? null,
    sentryDsn: e.SENTRY_DSN ?? null,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
