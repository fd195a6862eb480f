import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { VectorColumnSchema } from './vector.js';

const JobPostRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  requirements: z.string().nullable().default(null),
  responsibilities: z.string().nullable().default(null),
  description_embedding: VectorColumnSchema,
  requirements_embedding: VectorColumnSchema,
  responsibilities_embedding: VectorColumnSchema,
  applicant_count: z.number().int().default(0),
});

export type JobPostRecord = z.infer<typeof JobPostRowSchema>;

export interface JobPostRepository {
  get(id: string): Promise<JobPostRecord | null>;
  /** Resolves to false when no job post row was updated. */
  incrementApplicantCount(id: string): Promise<boolean>;
}

export function parseJobPostRow(row: unknown): JobPostRecord {
  const parsed = JobPostRowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Malformed job post row: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}

export class SupabaseJobPostRepository implements JobPostRepository {
  constructor(private readonly db: SupabaseClient) {}

  async get(id: string): Promise<JobPostRecord | null> {
    const { data, error } = await this.db
      .from('job_posts')
      .select('id, title, description, requirements, responsibilities, description_embedding, requirements_embedding, responsibilities_embedding, applicant_count')
      .eq('id', id)
      .maybeSingle();
    if (error) throw new Error(`Failed to load job post ${id}: ${error.message}`);
    return data ? parseJobPostRow(data) : null;
  }

  async incrementApplicantCount(id: string): Promise<boolean> {
    const { data, error } = await this.db.rpc('increment_job_post_applicant_count', { p_job_post_id: id });
    if (error) throw new Error(`Failed to increment applicant count for ${id}: ${error.message}`);
    return data === true;
  }
}
