import { parsePositiveInt, parseNonNegativeInt } from './http-body-guard.js';

type Env = Record<string, string | undefined>;

export interface OcrPollSettings {
  pollIntervalSeconds: number;
  maxWaitSeconds: number;
  maxTransientRetries: number;
}

export interface AppConfig {
  port: number;
  supabase: { url: string; serviceRoleKey: string };
  aws: {
    region: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    bucket: string;
  };
  gemini: { apiKey: string; embeddingModel: string };
  redisUrl: string;
  queueName: string;
  ocr: OcrPollSettings;
  /** Compare-and-swap claim of QUEUED/FAILED applications before processing. */
  exclusiveClaim: boolean;
  /** 0 runs layout reconstruction on the calling thread. */
  layoutWorkerThreads: number;
  maxUploadBytes: number;
}

export const DEFAULT_OCR_POLL_SETTINGS: OcrPollSettings = {
  pollIntervalSeconds: 5,
  maxWaitSeconds: 300,
  maxTransientRetries: 5,
};

export function envBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`${key} environment variable is required`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.PORT, 3001),
    supabase: {
      url: requireEnv(env, 'SUPABASE_URL'),
      serviceRoleKey: requireEnv(env, 'SUPABASE_SERVICE_ROLE_KEY'),
    },
    aws: {
      region: requireEnv(env, 'AWS_DEFAULT_REGION'),
      accessKeyId: env.AWS_ACCESS_KEY_ID || undefined,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || undefined,
      bucket: requireEnv(env, 'AWS_S3_BUCKET_NAME'),
    },
    gemini: {
      apiKey: requireEnv(env, 'GEMINI_API_KEY'),
      embeddingModel: env.GEMINI_EMBEDDING_MODEL ?? 'gemini-embedding-001',
    },
    redisUrl: env.REDIS_URL ?? 'redis://localhost:6379/0',
    queueName: env.RESUME_QUEUE_NAME ?? 'resume_processing',
    ocr: {
      pollIntervalSeconds: parsePositiveInt(
        env.OCR_POLL_INTERVAL_SECONDS,
        DEFAULT_OCR_POLL_SETTINGS.pollIntervalSeconds,
      ),
      maxWaitSeconds: parsePositiveInt(env.OCR_MAX_WAIT_SECONDS, DEFAULT_OCR_POLL_SETTINGS.maxWaitSeconds),
      maxTransientRetries: parsePositiveInt(
        env.OCR_MAX_TRANSIENT_RETRIES,
        DEFAULT_OCR_POLL_SETTINGS.maxTransientRetries,
      ),
    },
    exclusiveClaim: envBool(env.PIPELINE_EXCLUSIVE_CLAIM, false),
    layoutWorkerThreads: parseNonNegativeInt(env.LAYOUT_WORKER_THREADS, 2),
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
  };
}
