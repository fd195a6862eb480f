import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { APPLICATION_STATUSES, type ApplicationStatus } from '../pipeline/status.js';
import { JobFitEvaluationSchema } from '../services/evaluator.js';
import { VectorColumnSchema } from './vector.js';

export const SENIORITY_LEVELS = ['intern', 'junior', 'mid', 'senior', 'lead'] as const;
export type SeniorityLevel = (typeof SENIORITY_LEVELS)[number];

export const AnalysisDocumentSchema = z.object({
  similarity_scores: z.object({
    description: z.number(),
    requirements: z.number(),
    responsibilities: z.number(),
  }),
  evaluation: JobFitEvaluationSchema,
  overall_score: z.number(),
});

export type AnalysisDocument = z.infer<typeof AnalysisDocumentSchema>;

const ApplicationRowSchema = z.object({
  id: z.string(),
  candidate_name: z.string(),
  candidate_email: z.string(),
  job_post_id: z.string(),
  original_filename: z.string(),
  s3_path: z.string().nullable(),
  status: z.enum(APPLICATION_STATUSES),
  seniority_level: z.enum(SENIORITY_LEVELS).nullable(),
  extracted_data: z.record(z.unknown()).nullable(),
  embedded_value: VectorColumnSchema,
  analysis: AnalysisDocumentSchema.nullable(),
  failed_reason: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type ApplicationRecord = z.infer<typeof ApplicationRowSchema>;

export interface NewApplication {
  candidate_name: string;
  candidate_email: string;
  job_post_id: string;
  original_filename: string;
  seniority_level: SeniorityLevel | null;
}

export interface CompletedApplication {
  extracted_data: Record<string, unknown>;
  embedded_value: number[];
  analysis: AnalysisDocument;
}

export interface ApplicationRepository {
  create(input: NewApplication): Promise<ApplicationRecord>;
  get(id: string): Promise<ApplicationRecord | null>;
  markQueued(id: string, s3Path: string): Promise<void>;
  setStatus(id: string, status: ApplicationStatus): Promise<void>;
  /**
   * Compare-and-swap to PROCESSING. Resolves to the claimed row, or null when
   * the application was not in one of `from`.
   */
  claim(id: string, from: readonly ApplicationStatus[]): Promise<ApplicationRecord | null>;
  /** Appends `entry` to the failure history and marks the application FAILED. */
  recordFailure(id: string, entry: string): Promise<void>;
  complete(id: string, result: CompletedApplication): Promise<void>;
  ping(): Promise<boolean>;
}

export const APPLICATION_COLUMNS =
  'id, candidate_name, candidate_email, job_post_id, original_filename, s3_path, status, seniority_level, '
  + 'extracted_data, embedded_value, analysis, failed_reason, created_at, updated_at';

export function parseApplicationRow(row: unknown): ApplicationRecord {
  const parsed = ApplicationRowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Malformed application row: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}

export class SupabaseApplicationRepository implements ApplicationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async create(input: NewApplication): Promise<ApplicationRecord> {
    const { data, error } = await this.db
      .from('applications')
      .insert({ ...input, status: 'PENDING' })
      .select(APPLICATION_COLUMNS)
      .single();
    if (error) throw new Error(`Failed to create application: ${error.message}`);
    return parseApplicationRow(data);
  }

  async get(id: string): Promise<ApplicationRecord | null> {
    const { data, error } = await this.db
      .from('applications')
      .select(APPLICATION_COLUMNS)
      .eq('id', id)
      .maybeSingle();
    if (error) throw new Error(`Failed to load application ${id}: ${error.message}`);
    return data ? parseApplicationRow(data) : null;
  }

  async markQueued(id: string, s3Path: string): Promise<void> {
    await this.update(id, { s3_path: s3Path, status: 'QUEUED' });
  }

  async setStatus(id: string, status: ApplicationStatus): Promise<void> {
    await this.update(id, { status });
  }

  async claim(id: string, from: readonly ApplicationStatus[]): Promise<ApplicationRecord | null> {
    const { data, error } = await this.db
      .from('applications')
      .update({ status: 'PROCESSING', updated_at: new Date().toISOString() })
      .eq('id', id)
      .in('status', [...from])
      .select(APPLICATION_COLUMNS)
      .maybeSingle();
    if (error) throw new Error(`Failed to claim application ${id}: ${error.message}`);
    return data ? parseApplicationRow(data) : null;
  }

  async recordFailure(id: string, entry: string): Promise<void> {
    // Appended in one statement so overlapping failures both land in the history.
    const { error } = await this.db.rpc('append_application_failure', { p_application_id: id, p_entry: entry });
    if (error) throw new Error(`Failed to record failure for ${id}: ${error.message}`);
  }

  async complete(id: string, result: CompletedApplication): Promise<void> {
    await this.update(id, {
      status: 'COMPLETED',
      extracted_data: result.extracted_data,
      embedded_value: result.embedded_value,
      analysis: result.analysis,
    });
  }

  async ping(): Promise<boolean> {
    const { error } = await this.db.from('applications').select('id').limit(1);
    return !error;
  }

  private async update(id: string, fields: Record<string, unknown>): Promise<void> {
    const { error } = await this.db
      .from('applications')
      .update({ ...fields, updated_at: new Date().toISOString() })
      .eq('id', id);
    if (error) throw new Error(`Failed to update application ${id}: ${error.message}`);
  }
}
