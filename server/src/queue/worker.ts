import logger from '../lib/logger.js';
import { sleep as defaultSleep } from '../lib/retry.js';
import { validateInput } from '../lib/validate.js';
import type { PipelineOutcome } from '../pipeline/processor.js';
import { PROCESS_RESUME_JOB, ProcessResumePayloadSchema, type JobQueue } from './job-queue.js';

export interface ResumeProcessor {
  process(applicationId: string, jobPostId: string): Promise<PipelineOutcome>;
}

export interface ResumeWorkerOptions {
  queueName: string;
  dequeueTimeoutSeconds?: number;
  errorBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type WorkerTick =
  | { kind: 'idle' }
  | { kind: 'dropped'; reason: string }
  | { kind: 'processed'; jobId: string; outcome: PipelineOutcome };

/**
 * Consumes `process_resume` jobs one at a time and hands them to the pipeline.
 */
export class ResumeWorker {
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly dequeueTimeoutSeconds: number;
  private readonly errorBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly queue: JobQueue,
    private readonly pipeline: ResumeProcessor,
    private readonly options: ResumeWorkerOptions,
  ) {
    this.dequeueTimeoutSeconds = options.dequeueTimeoutSeconds ?? 5;
    this.errorBackoffMs = options.errorBackoffMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): Promise<void> {
    if (this.loop) return this.loop;
    this.running = true;
    logger.info({ queue: this.options.queueName }, 'Resume worker started');
    this.loop = this.runLoop().finally(() => {
      this.loop = null;
      logger.info({ queue: this.options.queueName }, 'Resume worker stopped');
    });
    return this.loop;
  }

  /** Resolves once the in-flight job (if any) has finished. */
  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
  }

  async runOnce(): Promise<WorkerTick> {
    const job = await this.queue.dequeue(this.options.queueName, this.dequeueTimeoutSeconds);
    if (!job) return { kind: 'idle' };

    if (job.name !== PROCESS_RESUME_JOB) {
      logger.warn({ jobId: job.id, name: job.name }, 'Unknown job name; dropping');
      return { kind: 'dropped', reason: `Unknown job name: ${job.name}` };
    }

    const payload = validateInput(ProcessResumePayloadSchema, job.data);
    if (!payload.success) {
      logger.warn({ jobId: job.id, issues: payload.issues }, 'Malformed process_resume payload; dropping');
      return { kind: 'dropped', reason: payload.issues.join('; ') };
    }

    const { application_id, job_post_id } = payload.data;
    const outcome = await this.pipeline.process(application_id, job_post_id);
    logger.info({ jobId: job.id, applicationId: application_id, outcome: outcome.status }, 'Job finished');
    return { kind: 'processed', jobId: job.id, outcome };
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.runOnce();
      } catch (err) {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Worker iteration failed');
        await this.sleep(this.errorBackoffMs);
      }
    }
  }
}
