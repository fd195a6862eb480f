import { type LLMProvider, AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import { ANTHROPIC_MODEL, getAnthropicClient } from './anthropic.js';
import { parsePositiveInt } from './http-body-guard.js';

/** Structured extraction (resume → profile) and the job-fit evaluation both run on this model. */
export const ZAI_STRUCTURING_MODEL = process.env.STRUCTURING_MODEL ?? 'glm-4.5-air';

export const MAX_TOKENS = parsePositiveInt(process.env.MAX_TOKENS, 8192);

type Env = Record<string, string | undefined>;

export function resolveProviderName(env: Env = process.env): 'zai' | 'anthropic' {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'zai' || configured === 'anthropic') return configured;
  return env.ZAI_API_KEY ? 'zai' : 'anthropic';
}

export function createLLMProvider(env: Env = process.env): LLMProvider {
  if (resolveProviderName(env) === 'zai') {
    const apiKey = env.ZAI_API_KEY;
    if (!apiKey) {
      throw new Error('ZAI_API_KEY environment variable is required when LLM_PROVIDER=zai');
    }
    const baseUrl = env.ZAI_BASE_URL ?? 'https://api.z.ai/api/paas/v4';
    return new OpenAICompatibleProvider({ apiKey, baseUrl });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider(getAnthropicClient);
}

export function getStructuringModel(provider: LLMProvider): string {
  if (provider.name === 'zai') return ZAI_STRUCTURING_MODEL;
  return process.env.STRUCTURING_MODEL ?? ANTHROPIC_MODEL;
}
