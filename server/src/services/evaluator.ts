import { z } from 'zod';
import { parseModelJson } from '../lib/json-repair.js';
import type { LLMProvider } from '../lib/llm-provider.js';

export const JobFitEvaluationSchema = z.object({
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  score: z.number().min(1).max(10),
});

export type JobFitEvaluation = z.infer<typeof JobFitEvaluationSchema>;

export interface JobPostSummary {
  title?: string | null;
  description?: string | null;
  requirements?: string | null;
  responsibilities?: string | null;
}

const SYSTEM_PROMPT = 'You are an applicant tracking system reviewer. Return only JSON.';

export function buildEvaluationPrompt(resumeText: string, jobPost: JobPostSummary): string {
  return `Evaluate how well the candidate fits the job below.

Return ONE JSON object:
{ "strengths": ["reason the candidate fits"], "weaknesses": ["reason the candidate may not fit"], "score": 7 }

score is a number from 1 (poor fit) to 10 (excellent fit). Base every point on the resume text; do not assume
experience that is not written there.

JOB TITLE: ${jobPost.title ?? ''}
JOB DESCRIPTION:
${jobPost.description ?? ''}
REQUIREMENTS:
${jobPost.requirements ?? ''}
RESPONSIBILITIES:
${jobPost.responsibilities ?? ''}

RESUME_TEXT:
---
${resumeText}
---`;
}

export class JobFitEvaluator {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: { model: string; maxTokens: number },
  ) {}

  async evaluate(resumeText: string, jobPost: JobPostSummary): Promise<JobFitEvaluation> {
    const response = await this.llm.chat({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildEvaluationPrompt(resumeText, jobPost) }],
      temperature: 0,
      json: true,
    });

    const parsed = parseModelJson(response.text);
    if (parsed === null) {
      throw new Error('Job fit evaluation was not valid JSON');
    }
    const result = JobFitEvaluationSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Job fit evaluation rejected: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
