import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import { z } from 'zod';
import logger from '../lib/logger.js';

export const PROCESS_RESUME_JOB = 'process_resume';

export const ProcessResumePayloadSchema = z.object({
  application_id: z.string().uuid(),
  job_post_id: z.string().uuid(),
});

export type ProcessResumePayload = z.infer<typeof ProcessResumePayloadSchema>;

const QueuedJobSchema = z.object({
  id: z.string(),
  name: z.string(),
  data: z.record(z.unknown()),
  created_at: z.string(),
});

export type QueuedJob = z.infer<typeof QueuedJobSchema>;

export interface JobQueue {
  enqueue(name: string, data: Record<string, unknown>, queue?: string): Promise<string>;
  /** Blocks up to `timeoutSeconds`; null when nothing arrived. */
  dequeue(queue: string, timeoutSeconds: number): Promise<QueuedJob | null>;
}

export function queueKey(queue: string): string {
  return `queue:${queue}`;
}

/**
 * FIFO list queue: producers LPUSH, consumers BRPOP from the other end.
 */
export class RedisJobQueue implements JobQueue {
  constructor(
    private readonly redis: Redis,
    private readonly defaultQueue: string,
  ) {}

  async enqueue(name: string, data: Record<string, unknown>, queue = this.defaultQueue): Promise<string> {
    const job: QueuedJob = {
      id: randomUUID(),
      name,
      data,
      created_at: new Date().toISOString(),
    };
    await this.redis.lpush(queueKey(queue), JSON.stringify(job));
    logger.info({ jobId: job.id, name, queue }, 'Enqueued job');
    return job.id;
  }

  async dequeue(queue: string, timeoutSeconds: number): Promise<QueuedJob | null> {
    const result = await this.redis.brpop(queueKey(queue), timeoutSeconds);
    if (!result) return null;

    const [, raw] = result;
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn({ queue, error: err instanceof Error ? err.message : String(err) }, 'Dropping undecodable queue entry');
      return null;
    }

    const parsed = QueuedJobSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn({ queue }, 'Dropping malformed queue entry');
      return null;
    }
    return parsed.data;
  }
}
