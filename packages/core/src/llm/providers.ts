import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
  };
}

/** Per-provider default model for extraction and judging. */
export const DEFAULT_MODELS: Record<ProviderId, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash',
};

const PROVIDER_PRIORITY: ProviderId[] = ['anthropic', 'openai', 'google'];

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3') ||
    modelId.startsWith('o4')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/**
 * Keep the model if its provider has a key; otherwise fall back to the
 * default model of the first provider that does. Unknown ids pass through.
 */
export function remapModelForProvider(modelId: string, config: ProviderConfig): string {
  let provider: ProviderId;
  try {
    provider = detectProvider(modelId);
  } catch {
    return modelId;
  }

  if (config.providers[provider]?.apiKey) return modelId;

  const available = PROVIDER_PRIORITY.find(p => config.providers[p]?.apiKey);
  return available ? DEFAULT_MODELS[available] : modelId;
}

/** True when at least one LLM provider has a key. */
export function hasAnyProvider(config: ProviderConfig): boolean {
  return PROVIDER_PRIORITY.some(p => Boolean(config.providers[p]?.apiKey));
}

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * LanguageModel instances by model-id string.
 */
export class ProviderRegistry {
  private readonly config: ProviderConfig;
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  remapModel(modelId: string): string {
    return remapModelForProvider(modelId, this.config);
  }

  /** Return a LanguageModel for the given model-id, creating the provider lazily. */
  getModel(modelId: string): LanguageModel {
    const providerId = detectProvider(modelId);

    switch (providerId) {
      case 'anthropic': {
        if (!this.anthropicProvider) {
          this.anthropicProvider = createAnthropic({ apiKey: this.requireKey('anthropic') });
        }
        return this.anthropicProvider(modelId);
      }
      case 'openai': {
        if (!this.openaiProvider) {
          this.openaiProvider = createOpenAI({ apiKey: this.requireKey('openai') });
        }
        return this.openaiProvider(modelId);
      }
      case 'google': {
        if (!this.googleProvider) {
          this.googleProvider = createGoogleGenerativeAI({ apiKey: this.requireKey('google') });
        }
        return this.googleProvider(modelId);
      }
    }
  }

  private requireKey(provider: ProviderId): string {
    const apiKey = this.config.providers[provider]?.apiKey;
    if (!apiKey) {
      throw new Error(
        `${provider} API key not configured. Set providers.${provider}.api_key in ~/.claimcheck/config.yaml`,
      );
    }
    return apiKey;
  }
}
