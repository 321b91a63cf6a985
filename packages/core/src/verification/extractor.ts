/**
 * Claim extractor: asks an LLM to split text into discrete, typed factual
 * claims. The response is a JSON array parsed leniently and validated item
 * by item, so one malformed entry does not discard the rest.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';
import { callLLM, stripCodeFence } from '../llm/call.js';
import type { RetryConfig } from '../llm/retry.js';
import { CLAIM_CATEGORIES, type Claim, type ClaimCategory, type ClaimExtractor } from './types.js';

export interface LlmClaimExtractorOptions {
  model: LanguageModel;
  /** Max tokens for the extraction response (default: 2048). */
  maxTokens?: number;
  retry?: RetryConfig;
}

const EXTRACTION_SYSTEM_PROMPT = `You are a fact-checking assistant. Extract the specific factual claims from the user's text.

For each claim, identify:
1. The claim text, as close to the original wording as possible and understandable on its own
2. The category: "historical" (past events, dates), "scientific" (natural facts, measurements), "statistical" (numbers, percentages, rankings), "quotation" (attributed statements) or "other"
3. Optionally, a short context: the surrounding sentence if the claim depends on it

Respond with a JSON array of objects with the keys "text", "category" and optionally "context".
Skip opinions, predictions and hedged statements. If there are no factual claims, respond with [].
Respond ONLY with the JSON array, no other text.`;

const RawClaim = z.object({
  text: z.string().trim().min(1),
  category: z.string().optional(),
  context: z.string().trim().min(1).optional().catch(undefined),
});

export class LlmClaimExtractor implements ClaimExtractor {
  private readonly options: LlmClaimExtractorOptions;

  constructor(options: LlmClaimExtractorOptions) {
    this.options = options;
  }

  async extract(text: string, signal?: AbortSignal): Promise<Claim[]> {
    const response = await callLLM({
      model: this.options.model,
      system: EXTRACTION_SYSTEM_PROMPT,
      messages: [
        { role: 'user', content: `Extract all factual claims from the following text:\n\n${text}` },
      ],
      maxOutputTokens: this.options.maxTokens ?? 2048,
      temperature: 0,
      retry: this.options.retry,
      abortSignal: signal,
    });

    return parseExtractionResponse(response.content);
  }
}

/**
 * Parse the model's JSON response into frozen claims numbered `claim-1..N`.
 * Tolerates code fences and prose around the array; returns [] when no
 * array can be found.
 */
export function parseExtractionResponse(content: string): Claim[] {
  const rawClaims = parseJsonArray(stripCodeFence(content));
  if (!rawClaims) return [];

  const claims: Claim[] = [];
  for (const raw of rawClaims) {
    const parsed = RawClaim.safeParse(raw);
    if (!parsed.success) continue;

    const { text, category, context } = parsed.data;
    claims.push(Object.freeze({
      id: `claim-${claims.length + 1}`,
      text,
      category: toCategory(category),
      ...(context ? { context } : {}),
    }));
  }

  return claims;
}

function parseJsonArray(jsonStr: string): unknown[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    const match = jsonStr.match(/\[[\s\S]*\]/);
    if (!match) return null;
    try {
      parsed = JSON.parse(match[0]);
    } catch {
      return null;
    }
  }
  return Array.isArray(parsed) ? parsed : null;
}

function toCategory(value: string | undefined): ClaimCategory {
  const normalized = value?.trim().toLowerCase();
  return CLAIM_CATEGORIES.find(c => c === normalized) ?? 'other';
}
