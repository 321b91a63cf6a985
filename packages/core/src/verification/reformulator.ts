import type { LanguageModel } from 'ai';
import { callLLM } from '../llm/call.js';
import type { Claim, QueryReformulator } from './types.js';

const REFORMULATE_SYSTEM_PROMPT = `Rewrite the user's factual claim as a short web search query (at most 12 words) that would find sources confirming or refuting it.
Keep names, numbers and dates. Respond with the query only.`;

export interface LlmQueryReformulatorOptions {
  model: LanguageModel;
}

/** Second-chance query for claims whose verbatim text found nothing. */
export class LlmQueryReformulator implements QueryReformulator {
  private readonly model: LanguageModel;

  constructor(options: LlmQueryReformulatorOptions) {
    this.model = options.model;
  }

  async reformulate(claim: Claim, signal?: AbortSignal): Promise<string | null> {
    const context = claim.context ? `\nContext: ${claim.context}` : '';
    const response = await callLLM({
      model: this.model,
      system: REFORMULATE_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: `Claim: ${claim.text}${context}` }],
      maxOutputTokens: 60,
      temperature: 0,
      retry: { maxRetries: 1 },
      abortSignal: signal,
    });

    return cleanQuery(response.content, claim.text);
  }
}

/** First non-empty line without quotes or a "Query:" label; null if it only repeats the claim. */
export function cleanQuery(content: string, claimText: string): string | null {
  const line = content.split('\n').map(l => l.trim()).find(l => l.length > 0);
  if (!line) return null;

  const query = line
    .replace(/^(search\s+)?query:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();

  if (!query || query.toLowerCase() === claimText.trim().toLowerCase()) return null;
  return query;
}
