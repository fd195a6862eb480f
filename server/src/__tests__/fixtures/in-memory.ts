import type { OcrBlock } from '../../layout/types.js';
import type {
  ApplicationRecord,
  ApplicationRepository,
  CompletedApplication,
  NewApplication,
} from '../../repositories/applications.js';
import type { JobPostRecord, JobPostRepository } from '../../repositories/job-posts.js';
import { appendFailureReason, type ApplicationStatus } from '../../pipeline/status.js';
import type { EmbeddingProvider, EmbeddingTaskType } from '../../services/embeddings.js';
import type { OcrClient, OcrResultPage } from '../../services/ocr.js';
import type { DocumentStore } from '../../services/document-store.js';
import type { JobQueue, QueuedJob } from '../../queue/job-queue.js';

export const APPLICATION_ID = '11111111-1111-4111-8111-111111111111';
export const JOB_POST_ID = '22222222-2222-4222-8222-222222222222';

export function makeApplication(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  return {
    id: APPLICATION_ID,
    candidate_name: 'Test Candidate',
    candidate_email: 'candidate@example.com',
    job_post_id: JOB_POST_ID,
    original_filename: 'resume.pdf',
    s3_path: 'resumes/abc_resume.pdf',
    status: 'QUEUED',
    seniority_level: null,
    extracted_data: null,
    embedded_value: null,
    analysis: null,
    failed_reason: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/** Unit vector along axis `axis` in `dimension` dimensions. */
export function axisVector(dimension: number, axis: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  vector[axis] = 1;
  return vector;
}

export function makeJobPost(overrides: Partial<JobPostRecord> = {}): JobPostRecord {
  return {
    id: JOB_POST_ID,
    title: 'Backend Engineer',
    description: 'Build services',
    requirements: 'TypeScript',
    responsibilities: 'Own the API',
    description_embedding: axisVector(3072, 0),
    requirements_embedding: axisVector(3072, 0),
    responsibilities_embedding: axisVector(3072, 1),
    applicant_count: 0,
    ...overrides,
  };
}

export class InMemoryApplicationRepository implements ApplicationRepository {
  readonly rows = new Map<string, ApplicationRecord>();
  readonly statusHistory: ApplicationStatus[] = [];
  completeCalls = 0;
  private nextId = 1;

  constructor(initial: ApplicationRecord[] = []) {
    for (const row of initial) this.rows.set(row.id, { ...row });
  }

  async create(input: NewApplication): Promise<ApplicationRecord> {
    const id = `00000000-0000-4000-8000-${String(this.nextId++).padStart(12, '0')}`;
    const row = makeApplication({ ...input, id, s3_path: null, status: 'PENDING' });
    this.rows.set(id, row);
    return { ...row };
  }

  async get(id: string): Promise<ApplicationRecord | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async markQueued(id: string, s3Path: string): Promise<void> {
    this.patch(id, { s3_path: s3Path, status: 'QUEUED' });
  }

  async setStatus(id: string, status: ApplicationStatus): Promise<void> {
    this.patch(id, { status });
  }

  async claim(id: string, from: readonly ApplicationStatus[]): Promise<ApplicationRecord | null> {
    const row = this.rows.get(id);
    if (!row || !from.includes(row.status)) return null;
    this.patch(id, { status: 'PROCESSING' });
    return this.get(id);
  }

  async recordFailure(id: string, entry: string): Promise<void> {
    const row = this.rows.get(id);
    this.patch(id, { status: 'FAILED', failed_reason: appendFailureReason(row?.failed_reason, entry) });
  }

  async complete(id: string, result: CompletedApplication): Promise<void> {
    this.completeCalls += 1;
    this.patch(id, { ...result, status: 'COMPLETED' });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private patch(id: string, fields: Partial<ApplicationRecord>): void {
    const row = this.rows.get(id);
    if (!row) throw new Error(`No application ${id}`);
    if (fields.status) this.statusHistory.push(fields.status);
    this.rows.set(id, { ...row, ...fields });
  }
}

export class InMemoryJobPostRepository implements JobPostRepository {
  readonly posts = new Map<string, JobPostRecord>();
  incrementCalls = 0;
  incrementResult: boolean | Error = true;

  constructor(initial: JobPostRecord[] = []) {
    for (const post of initial) this.posts.set(post.id, post);
  }

  async get(id: string): Promise<JobPostRecord | null> {
    return this.posts.get(id) ?? null;
  }

  async incrementApplicantCount(id: string): Promise<boolean> {
    this.incrementCalls += 1;
    if (this.incrementResult instanceof Error) throw this.incrementResult;
    const post = this.posts.get(id);
    if (post && this.incrementResult) {
      this.posts.set(id, { ...post, applicant_count: post.applicant_count + 1 });
    }
    return this.incrementResult;
  }
}

/**
 * Replays scripted responses to `poll`. An Error entry is thrown instead of returned.
 */
export class ScriptedOcrClient implements OcrClient {
  readonly startCalls: Array<{ bucket: string; key: string }> = [];
  readonly pollCalls: Array<{ jobId: string; nextToken?: string }> = [];
  startError: Error | null = null;

  constructor(private readonly script: Array<OcrResultPage | Error> = []) {}

  async start(bucket: string, key: string): Promise<string> {
    this.startCalls.push({ bucket, key });
    if (this.startError) throw this.startError;
    return 'ocr-job-1';
  }

  async poll(jobId: string, nextToken?: string): Promise<OcrResultPage> {
    this.pollCalls.push({ jobId, nextToken });
    const next = this.script.shift();
    if (!next) throw new Error('OCR script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function lineBlock(text: string, top: number, left: number, page = 1, height = 0.02): OcrBlock {
  return { blockType: 'LINE', text, page, boundingBox: { top, left, width: 0.3, height } };
}

export class FixedEmbeddingProvider implements EmbeddingProvider {
  readonly calls: Array<{ content: string; taskType: EmbeddingTaskType; title?: string }> = [];

  constructor(private readonly vector: number[] | null | Error) {}

  async embed(content: string, taskType: EmbeddingTaskType, title?: string): Promise<number[] | null> {
    this.calls.push({ content, taskType, title });
    if (this.vector instanceof Error) throw this.vector;
    return this.vector;
  }
}

export class MemoryDocumentStore implements DocumentStore {
  readonly bucket = 'test-bucket';
  readonly objects = new Map<string, { bytes: Uint8Array; contentType?: string }>();
  failWith: Error | null = null;

  async put(bytes: Uint8Array, locator: string, contentType?: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.objects.set(locator, { bytes, contentType });
  }
}

export class MemoryJobQueue implements JobQueue {
  readonly jobs: QueuedJob[] = [];
  failWith: Error | null = null;
  private nextId = 1;

  async enqueue(name: string, data: Record<string, unknown>): Promise<string> {
    if (this.failWith) throw this.failWith;
    const id = `job-${this.nextId++}`;
    this.jobs.push({ id, name, data, created_at: '2026-01-01T00:00:00.000Z' });
    return id;
  }

  async dequeue(): Promise<QueuedJob | null> {
    return this.jobs.shift() ?? null;
  }
}
