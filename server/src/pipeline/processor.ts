import { countSectionRows } from '../layout/engine.js';
import type { LayoutExecutor } from '../layout/executor.js';
import type { SectionMap } from '../layout/types.js';
import type { OcrPollSettings } from '../lib/config.js';
import { createApplicationLogger, type Logger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import type { AnalysisDocument, ApplicationRecord, ApplicationRepository } from '../repositories/applications.js';
import type { JobPostRecord, JobPostRepository } from '../repositories/job-posts.js';
import {
  assertEmbeddingDimension,
  buildEmbeddingContent,
  RESUME_EMBEDDING_TITLE,
  type EmbeddingProvider,
} from '../services/embeddings.js';
import type { JobFitEvaluator } from '../services/evaluator.js';
import type { OcrClient } from '../services/ocr.js';
import { combineSections, type CandidateProfile, type ProfileNormalizer } from '../services/profile-normalizer.js';
import { overallScore, similarity } from '../services/similarity.js';
import { errorMessage, StageFailure, type FatalStage } from './errors.js';
import { collectOcrBlocks } from './ocr-poller.js';
import { canTransition, CLAIMABLE_STATUSES } from './status.js';

export interface PipelineSettings {
  bucket: string;
  ocr: OcrPollSettings;
  exclusiveClaim: boolean;
}

export interface PipelineDeps {
  applications: ApplicationRepository;
  jobPosts: JobPostRepository;
  ocr: OcrClient;
  layout: LayoutExecutor;
  normalizer: Pick<ProfileNormalizer, 'normalize'>;
  embeddings: EmbeddingProvider;
  evaluator: Pick<JobFitEvaluator, 'evaluate'>;
  settings: PipelineSettings;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type PipelineOutcome =
  | { status: 'completed' }
  | { status: 'failed'; reason: string }
  | { status: 'skipped'; reason: string };

interface JobPostEmbeddings {
  description: number[];
  requirements: number[];
  responsibilities: number[];
}

const UNEXPECTED_ERROR_LABEL = 'Unexpected error during processing';

/**
 * Runs one application through OCR, layout, normalization, embedding and
 * scoring. Every stage failure is appended to the application's failure
 * history and the application is marked FAILED; `process` itself never rejects.
 */
export class ResumePipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async process(applicationId: string, jobPostId: string): Promise<PipelineOutcome> {
    const log = createApplicationLogger(applicationId, { jobPostId });
    try {
      return await this.run(applicationId, jobPostId, log);
    } catch (err) {
      if (err instanceof StageFailure) {
        log.error({ stage: err.stage, error: err.detail }, 'Pipeline stage failed');
        captureError(err, { applicationId, jobPostId, stage: err.stage });
        try {
          await this.deps.applications.recordFailure(applicationId, err.toReasonEntry());
          return { status: 'failed', reason: err.message };
        } catch (persistErr) {
          return this.handleUnexpected(applicationId, jobPostId, persistErr, log);
        }
      }
      return this.handleUnexpected(applicationId, jobPostId, err, log);
    }
  }

  private async run(applicationId: string, jobPostId: string, log: Logger): Promise<PipelineOutcome> {
    const { applications, settings } = this.deps;

    const application = await applications.get(applicationId);
    if (!application) {
      log.warn('Application not found; dropping job');
      return { status: 'skipped', reason: 'Application not found' };
    }
    if (application.status === 'COMPLETED') {
      log.info('Application already completed; skipping');
      return { status: 'skipped', reason: 'Application already completed' };
    }
    if (application.status === 'PENDING') {
      log.warn('Application document has not been stored yet; skipping');
      return { status: 'skipped', reason: 'Application is still pending upload' };
    }

    const claimed = await this.claim(application, log);
    if (!claimed) {
      return { status: 'skipped', reason: 'Application is being processed by another worker' };
    }

    log.info({ previousStatus: application.status }, 'Processing application');

    const { post, embeddings: jobEmbeddings } = await this.stage('fetch_job_post', log, () =>
      this.fetchJobPost(jobPostId));

    const ocrJobId = await this.stage('start_ocr', log, async () => {
      if (!claimed.s3_path) throw new Error('Storage locator is missing for this application');
      return this.deps.ocr.start(settings.bucket, claimed.s3_path);
    });
    log.info({ ocrJobId }, 'OCR job started');

    const blocks = await this.stage('collect_ocr', log, () =>
      collectOcrBlocks(this.deps.ocr, ocrJobId, settings.ocr, { sleep: this.deps.sleep, now: this.deps.now, log }));

    const sections = await this.stage('group_layout', log, () => this.deps.layout.group(blocks));
    log.info({ groups: Object.keys(sections).length, rows: countSectionRows(sections) }, 'Layout reconstructed');

    const profile = await this.stage('normalize_profile', log, () => this.normalize(sections));

    const vector = await this.stage('create_embedding', log, async () => {
      const content = buildEmbeddingContent(profile);
      const embedding = await this.deps.embeddings.embed(content, 'RETRIEVAL_DOCUMENT', RESUME_EMBEDDING_TITLE);
      return assertEmbeddingDimension(embedding);
    });

    const analysis = await this.stage('score', log, () => this.score(vector, jobEmbeddings, sections, post));
    log.info({ overallScore: analysis.overall_score }, 'Scoring complete');

    await this.incrementApplicantCount(jobPostId, log);

    await applications.complete(applicationId, {
      extracted_data: profile,
      embedded_value: vector,
      analysis,
    });
    log.info('Application processed');
    return { status: 'completed' };
  }

  private async claim(application: ApplicationRecord, log: Logger): Promise<ApplicationRecord | null> {
    const { applications, settings } = this.deps;
    if (settings.exclusiveClaim) {
      const claimed = await applications.claim(application.id, CLAIMABLE_STATUSES);
      if (!claimed) log.info({ status: application.status }, 'Lost claim on application; skipping');
      return claimed;
    }
    if (!canTransition(application.status, 'PROCESSING')) {
      log.warn({ status: application.status }, 'Application cannot move to PROCESSING');
      return null;
    }
    await applications.setStatus(application.id, 'PROCESSING');
    return { ...application, status: 'PROCESSING' };
  }

  private async stage<T>(stage: FatalStage, log: Logger, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    log.debug({ stage }, 'Stage started');
    try {
      const result = await fn();
      log.debug({ stage, durationMs: Date.now() - started }, 'Stage finished');
      return result;
    } catch (err) {
      throw new StageFailure(stage, errorMessage(err), { cause: err });
    }
  }

  private async fetchJobPost(jobPostId: string): Promise<{ post: JobPostRecord; embeddings: JobPostEmbeddings }> {
    const post = await this.deps.jobPosts.get(jobPostId);
    if (!post) throw new Error(`Job post ${jobPostId} not found`);
    const { description_embedding, requirements_embedding, responsibilities_embedding } = post;
    if (!description_embedding || !requirements_embedding || !responsibilities_embedding) {
      throw new Error('Job post or its embeddings not found');
    }
    return {
      post,
      embeddings: {
        description: description_embedding,
        requirements: requirements_embedding,
        responsibilities: responsibilities_embedding,
      },
    };
  }

  private async normalize(sections: SectionMap): Promise<CandidateProfile> {
    const result = await this.deps.normalizer.normalize(sections);
    if (!result.ok) {
      throw new Error(JSON.stringify({
        error: result.error,
        details: result.details,
        raw_response: result.raw_response,
      }));
    }
    return result.profile;
  }

  private async score(
    vector: number[],
    jobEmbeddings: JobPostEmbeddings,
    sections: SectionMap,
    post: JobPostRecord,
  ): Promise<AnalysisDocument> {
    const description = similarity(vector, jobEmbeddings.description);
    const requirements = similarity(vector, jobEmbeddings.requirements);
    const responsibilities = similarity(vector, jobEmbeddings.responsibilities);

    const evaluation = await this.deps.evaluator.evaluate(combineSections(sections), post);

    return {
      similarity_scores: { description, requirements, responsibilities },
      evaluation,
      overall_score: overallScore(description, requirements, responsibilities, evaluation.score),
    };
  }

  private async incrementApplicantCount(jobPostId: string, log: Logger): Promise<void> {
    try {
      const updated = await this.deps.jobPosts.incrementApplicantCount(jobPostId);
      if (!updated) log.warn('Applicant count was not incremented; job post row missing');
    } catch (err) {
      log.warn({ error: errorMessage(err) }, 'Failed to increment applicant count');
    }
  }

  private async handleUnexpected(
    applicationId: string,
    jobPostId: string,
    err: unknown,
    log: Logger,
  ): Promise<PipelineOutcome> {
    const message = errorMessage(err);
    log.error({ error: message }, 'Unexpected error processing application');
    captureError(err, { applicationId, jobPostId });

    try {
      const current = await this.deps.applications.get(applicationId);
      if (current && current.status !== 'COMPLETED') {
        await this.deps.applications.recordFailure(applicationId, `${UNEXPECTED_ERROR_LABEL}: ${message}`);
      }
    } catch (persistErr) {
      log.error({ error: errorMessage(persistErr) }, 'Failed to mark application as FAILED');
      captureError(persistErr, { applicationId, jobPostId, phase: 'record_failure' });
    }

    return { status: 'failed', reason: message };
  }
}
