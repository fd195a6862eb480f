import type { Redis } from 'ioredis';
import { createLayoutExecutor, type LayoutExecutor } from '../layout/executor.js';
import { ResumePipeline } from '../pipeline/processor.js';
import { RedisJobQueue } from '../queue/job-queue.js';
import { SupabaseApplicationRepository } from '../repositories/applications.js';
import { SupabaseJobPostRepository } from '../repositories/job-posts.js';
import { S3DocumentStore } from '../services/document-store.js';
import { GeminiEmbeddingProvider } from '../services/embeddings.js';
import { JobFitEvaluator } from '../services/evaluator.js';
import { TextractOcrClient } from '../services/ocr.js';
import { ProfileNormalizer } from '../services/profile-normalizer.js';
import type { AppConfig } from './config.js';
import { createLLMProvider, getStructuringModel, MAX_TOKENS } from './llm.js';
import logger from './logger.js';
import { createRedisClient, shutdownRedis } from './redis-client.js';
import { createSupabaseAdmin } from './supabase.js';

export interface Services {
  config: AppConfig;
  applications: SupabaseApplicationRepository;
  jobPosts: SupabaseJobPostRepository;
  store: S3DocumentStore;
  ocr: TextractOcrClient;
  layout: LayoutExecutor;
  queue: RedisJobQueue;
  pipeline: ResumePipeline;
  close(): Promise<void>;
}

/**
 * Wires every external collaborator from configuration. The API and the worker
 * each build their own container; the layout pool only spawns threads once the
 * pipeline asks for one.
 */
export function createServices(config: AppConfig, env: Record<string, string | undefined> = process.env): Services {
  const db = createSupabaseAdmin(config.supabase.url, config.supabase.serviceRoleKey);
  const applications = new SupabaseApplicationRepository(db);
  const jobPosts = new SupabaseJobPostRepository(db);

  const store = new S3DocumentStore(config.aws.bucket, config.aws);
  const ocr = new TextractOcrClient(config.aws);
  const layout = createLayoutExecutor(config.layoutWorkerThreads);

  const llm = createLLMProvider(env);
  const model = getStructuringModel(llm);
  const normalizer = new ProfileNormalizer(llm, { model, maxTokens: MAX_TOKENS });
  const evaluator = new JobFitEvaluator(llm, { model, maxTokens: MAX_TOKENS });
  const embeddings = new GeminiEmbeddingProvider({
    apiKey: config.gemini.apiKey,
    model: config.gemini.embeddingModel,
  });

  const redis: Redis = createRedisClient(config.redisUrl);
  const queue = new RedisJobQueue(redis, config.queueName);

  const pipeline = new ResumePipeline({
    applications,
    jobPosts,
    ocr,
    layout,
    normalizer,
    embeddings,
    evaluator,
    settings: {
      bucket: config.aws.bucket,
      ocr: config.ocr,
      exclusiveClaim: config.exclusiveClaim,
    },
  });

  logger.info({
    llmProvider: llm.name,
    model,
    queue: config.queueName,
    layoutWorkerThreads: config.layoutWorkerThreads,
    exclusiveClaim: config.exclusiveClaim,
  }, 'Services configured');

  return {
    config,
    applications,
    jobPosts,
    store,
    ocr,
    layout,
    queue,
    pipeline,
    async close() {
      const results = await Promise.allSettled([layout.close(), shutdownRedis(redis)]);
      for (const result of results) {
        if (result.status === 'rejected') {
          logger.warn({
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          }, 'Service shutdown step failed');
        }
      }
      store.destroy();
      ocr.destroy();
    },
  };
}
