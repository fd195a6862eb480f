export type PipelineStage =
  | 'fetch_job_post'
  | 'start_ocr'
  | 'collect_ocr'
  | 'group_layout'
  | 'normalize_profile'
  | 'create_embedding'
  | 'score'
  | 'increment_applicant_count'
  | 'finalize';

export const STAGE_LABELS: Readonly<Record<Exclude<PipelineStage, 'increment_applicant_count' | 'finalize'>, string>> = {
  fetch_job_post: 'Failed to fetch job post',
  start_ocr: 'Failed to start OCR job',
  collect_ocr: 'Failed OCR processing',
  group_layout: 'Grouping failed',
  normalize_profile: 'Profile normalization failed',
  create_embedding: 'Embedding creation failed',
  score: 'Similarity scoring failed',
};

export type FatalStage = keyof typeof STAGE_LABELS;

/** A fatal stage error, already labelled for the application's failure history. */
export class StageFailure extends Error {
  constructor(
    readonly stage: FatalStage,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${STAGE_LABELS[stage]}: ${detail}`, options);
    this.name = 'StageFailure';
  }

  toReasonEntry(): string {
    return JSON.stringify({ stage: this.stage, error: this.message });
  }
}

export class OcrJobFailedError extends Error {
  constructor(readonly jobId: string, statusMessage?: string) {
    super(`OCR job ${jobId} failed${statusMessage ? `: ${statusMessage}` : ''}`);
    this.name = 'OcrJobFailedError';
  }
}

export class OcrTimeoutError extends Error {
  constructor(readonly jobId: string, readonly waitedSeconds: number) {
    super(`OCR job ${jobId} did not finish within ${waitedSeconds}s`);
    this.name = 'OcrTimeoutError';
  }
}

export class SectionKeyError extends Error {
  constructor(readonly key: string) {
    super(`Section key "${key}" is not an integer`);
    this.name = 'SectionKeyError';
  }
}

export class EmbeddingContractError extends Error {
  constructor(readonly expected: number, readonly received: number | null) {
    super(
      received === null
        ? 'Embedding provider returned no vector'
        : `Embedding has ${received} dimensions, expected ${expected}`,
    );
    this.name = 'EmbeddingContractError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
