import * as path from 'path';
import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const PLACEHOLDER_TOKEN = 'your_huggingface_token_here';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  INFERENCE_PROVIDER: z.enum(['huggingface', 'openai']).default('huggingface'),
  HUGGINGFACE_TOKEN: optionalString.transform((v) => (v === PLACEHOLDER_TOKEN ? undefined : v)),
  HF_API_URL: z.string().url().default('https://api-inference.huggingface.co'),
  HF_SQL_MODEL: z.string().min(1).default('defog/sqlcoder-7b-2'),
  HF_VISION_MODEL: z.string().min(1).default('llava-hf/llava-1.5-7b-hf'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LOADING_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  LOADING_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  DEMO_DATA_DIR: z.string().min(1).default('./db'),
  DEMO_DB_PATH: optionalString,
});

export type InferenceProvider = 'huggingface' | 'openai';

export interface AppConfig {
  port: number;
  provider: InferenceProvider;
  /** Bearer credential for the inference endpoint; absent means the shared, lower rate limit. */
  apiToken?: string;
  hfApiUrl: string;
  sqlModel: string;
  visionModel: string;
  timeoutMs: number;
  loadingMaxRetries: number;
  loadingRetryDelayMs: number;
  historyLimit: number;
  /** Idle time after which a session is dropped. */
  sessionTtlMs: number;
  maxSessions: number;
  maxImageBytes: number;
  demoDataDir: string;
  demoDbPath?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  const openai = e.INFERENCE_PROVIDER === 'openai';
  if (openai && !e.OPENAI_API_KEY) {
    throw new Error('Invalid configuration: OPENAI_API_KEY is required when INFERENCE_PROVIDER=openai');
  }

  return {
    port: e.PORT,
    provider: e.INFERENCE_PROVIDER,
    apiToken: openai ? e.OPENAI_API_KEY : e.HUGGINGFACE_TOKEN,
    hfApiUrl: e.HF_API_URL.replace(/\/+$/, ''),
    sqlModel: openai ? e.OPENAI_MODEL : e.HF_SQL_MODEL,
    visionModel: openai ? e.OPENAI_MODEL : e.HF_VISION_MODEL,
    timeoutMs: e.INFERENCE_TIMEOUT_MS,
    loadingMaxRetries: e.LOADING_MAX_RETRIES,
    loadingRetryDelayMs: e.LOADING_RETRY_DELAY_MS,
    historyLimit: e.HISTORY_LIMIT,
    sessionTtlMs: e.SESSION_TTL_MS,
    maxSessions: e.MAX_SESSIONS,
    maxImageBytes: e.MAX_IMAGE_BYTES,
    demoDataDir: path.resolve(e.DEMO_DATA_DIR),
    demoDbPath: e.DEMO_DB_PATH ? path.resolve(e.DEMO_DB_PATH) : undefined,
  };
}
