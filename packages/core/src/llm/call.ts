import { generateText, type LanguageModel, type ModelMessage } from 'ai';
import { withRetry, LLM_RETRY, type RetryConfig } from './retry.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  system: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Retry configuration (LLM_RETRY when omitted). */
  retry?: RetryConfig;
  abortSignal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts: number;
}

/**
 * Single-shot LLM call with retry support.
 * Retries on 429, 5xx and timeouts; never on auth errors or cancellation.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const retryConfig = { ...LLM_RETRY, ...options.retry, abortSignal: options.abortSignal };

  const { result, attempts } = await withRetry(
    async () => {
      const response = await generateText({
        model: options.model,
        system: options.system,
        messages: options.messages,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: options.abortSignal,
      });

      return {
        content: response.text,
        usage: {
          inputTokens: response.usage.inputTokens ?? 0,
          outputTokens: response.usage.outputTokens ?? 0,
        },
      };
    },
    retryConfig,
  );

  return { ...result, attempts };
}

/** Strip a surrounding markdown code fence, if any. */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed.replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```\s*$/, '').trim();
}
