import { z } from 'zod';
import logger from '../lib/logger.js';
import { EmbeddingContractError } from '../pipeline/errors.js';

export const EMBEDDING_DIMENSION = 3072;

export const RESUME_EMBEDDING_TITLE = "This is an applicant's resume to be embedded";

export type EmbeddingTaskType = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY' | 'SEMANTIC_SIMILARITY';

export interface EmbeddingProvider {
  /** Returns the vector, or null when the provider produced none. */
  embed(content: string, taskType: EmbeddingTaskType, title?: string): Promise<number[] | null>;
}

const EmbedContentResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()),
  }).optional(),
});

const EMBED_TIMEOUT_MS = 60_000;

export interface GeminiEmbeddingConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  dimension?: number;
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly dimension: number;

  constructor(config: GeminiEmbeddingConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta').replace(/\/$/, '');
    this.dimension = config.dimension ?? EMBEDDING_DIMENSION;
  }

  async embed(content: string, taskType: EmbeddingTaskType, title?: string): Promise<number[] | null> {
    if (!content.trim()) {
      logger.warn('Embedding requested for empty content');
      return null;
    }

    const response = await fetch(`${this.baseUrl}/models/${this.model}:embedContent`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.apiKey,
      },
      body: JSON.stringify({
        content: { parts: [{ text: content }] },
        taskType,
        // The API only accepts a title for document retrieval.
        ...(title && taskType === 'RETRIEVAL_DOCUMENT' && { title }),
        outputDimensionality: this.dimension,
      }),
      signal: AbortSignal.timeout(EMBED_TIMEOUT_MS),
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new Error(`Embedding API error ${response.status}: ${errText}`);
    }

    const parsed = EmbedContentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Embedding API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const values = parsed.data.embedding?.values ?? null;
    logger.debug({ dimension: values?.length ?? 0, taskType }, 'Created embedding');
    return values;
  }
}

/**
 * Flattens a structured profile into embedding text: one line per non-empty
 * top-level string and one line per array item (objects JSON-encoded).
 * Nested objects such as the social links are left out.
 */
export function buildEmbeddingContent(profile: Record<string, unknown>): string {
  const lines: string[] = [];
  const push = (value: unknown) => {
    if (value === null || value === undefined || value === '') return;
    lines.push(typeof value === 'string' ? value : JSON.stringify(value));
  };

  for (const value of Object.values(profile)) {
    if (Array.isArray(value)) {
      value.forEach(push);
    } else if (typeof value === 'string') {
      push(value);
    }
  }

  return lines.length > 0 ? lines.join('\n') : 'No content available';
}

export function assertEmbeddingDimension(
  vector: readonly number[] | null,
  expected: number = EMBEDDING_DIMENSION,
): number[] {
  if (vector === null) throw new EmbeddingContractError(expected, null);
  if (vector.length !== expected) throw new EmbeddingContractError(expected, vector.length);
  return [...vector];
}
