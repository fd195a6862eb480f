import { z } from 'zod';
import type { SectionMap } from '../layout/types.js';
import { parseModelJson } from '../lib/json-repair.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import logger from '../lib/logger.js';
import { SectionKeyError } from '../pipeline/errors.js';

const months = z.number().int().nonnegative();

export const CandidateProfileSchema = z.object({
  name: z.string(),
  email: z.string(),
  socialMediaLinks: z.object({
    linkedin: z.string().optional(),
    github: z.string().optional(),
    portfolio: z.string().optional(),
    otherSocialMediaLinks: z.array(z.string()).optional(),
  }),
  workExperience: z.array(z.object({
    title: z.string(),
    company: z.string(),
    durationMonths: months,
    description: z.string(),
  })),
  projects: z.array(z.object({
    name: z.string(),
    durationMonths: months,
    description: z.string(),
    link: z.string(),
  })),
  education: z.array(z.object({
    degree: z.string().optional(),
    institution: z.string().optional(),
    startDate: z.string().optional(),
    endDate: z.string().optional(),
    description: z.string().optional(),
  })),
  skillsAndTechnologies: z.array(z.string()),
  monthsOfWorkExperienceByDomain: z.array(z.object({
    domain: z.string(),
    months,
  })),
  otherInfo: z.string(),
});

export type CandidateProfile = z.infer<typeof CandidateProfileSchema>;

export type NormalizationResult =
  | { ok: true; profile: CandidateProfile }
  | { ok: false; error: string; details: string; raw_response: string };

const INTEGER_KEY_RE = /^-?\d+$/;

/**
 * Joins every section's lines in numeric key order ("2" before "10").
 */
export function combineSections(sections: SectionMap): string {
  const keys = Object.keys(sections);
  for (const key of keys) {
    if (!INTEGER_KEY_RE.test(key)) throw new SectionKeyError(key);
  }
  return keys
    .sort((a, b) => Number(a) - Number(b))
    .flatMap((key) => sections[key])
    .join('\n');
}

const SYSTEM_PROMPT = 'You are a meticulous resume parser with the judgement of a senior recruiter. Return only JSON.';

export function buildNormalizationPrompt(resumeText: string, today: Date): string {
  const isoDate = today.toISOString().slice(0, 10);
  return `Analyze the resume text below and return ONE JSON object with exactly this shape:

{
  "name": "Full Name",
  "email": "email@example.com",
  "socialMediaLinks": { "linkedin": "", "github": "", "portfolio": "", "otherSocialMediaLinks": [] },
  "workExperience": [{ "title": "", "company": "", "durationMonths": 0, "description": "" }],
  "projects": [{ "name": "", "durationMonths": 0, "description": "", "link": "" }],
  "education": [{ "degree": "", "institution": "", "startDate": "", "endDate": "", "description": "" }],
  "skillsAndTechnologies": [],
  "monthsOfWorkExperienceByDomain": [{ "domain": "", "months": 0 }],
  "otherInfo": ""
}

Rules:
- Output the JSON object only. No markdown fences, no commentary.
- durationMonths is a whole number of months between the start and end date of each role or project, rounded up.
  Do not copy the date strings into the output.
- Treat "Present", "Current" or "Now" as today's date (${isoDate}).
  "Jan 2022 - Dec 2023" is 24 months.
- Expand common acronyms in every text field (AWS → Amazon Web Services, ERP → Enterprise Resource Planning,
  CRM, SQL, CI/CD, API, HTML, CSS, GCP).
- monthsOfWorkExperienceByDomain: identify the domains from work experience only (not projects) and total
  the months spent in each. Do not use a fixed list of domains.
- Never invent information. Use "" or [] when something is missing.
- education must always be present; include degree and institution when the resume states them.

RESUME_TEXT:
---
${resumeText}
---`;
}

export interface ProfileNormalizerOptions {
  model: string;
  maxTokens: number;
  now?: () => Date;
}

export class ProfileNormalizer {
  private readonly now: () => Date;

  constructor(
    private readonly llm: LLMProvider,
    private readonly options: ProfileNormalizerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Structures grouped resume text into a CandidateProfile. Malformed section
   * keys throw; every LLM-side problem comes back as the error variant.
   */
  async normalize(sections: SectionMap): Promise<NormalizationResult> {
    const resumeText = combineSections(sections);

    let raw = '';
    try {
      const response = await this.llm.chat({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildNormalizationPrompt(resumeText, this.now()) }],
        temperature: 0.1,
        json: true,
      });
      raw = response.text;
    } catch (err) {
      const details = err instanceof Error ? err.message : String(err);
      logger.warn({ provider: this.llm.name, details }, 'Profile normalization call failed');
      return { ok: false, error: 'Failed to process resume with LLM', details, raw_response: 'N/A' };
    }

    const parsed = parseModelJson(raw);
    if (parsed === null) {
      return { ok: false, error: 'Failed to process resume with LLM', details: 'Response was not valid JSON', raw_response: raw };
    }

    const result = CandidateProfileSchema.safeParse(parsed);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return { ok: false, error: 'Resume did not match the profile schema', details, raw_response: raw };
    }

    return { ok: true, profile: result.data };
  }
}
