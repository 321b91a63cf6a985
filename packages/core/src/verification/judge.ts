/**
 * Evidence judge: asks an LLM whether search snippets corroborate or
 * contradict a claim. Makes one attempt per call; the verifier owns retries.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';
import type { SearchHit } from '@claimcheck/search';
import { callLLM, stripCodeFence } from '../llm/call.js';
import type { EvidenceJudge, JudgeVerdict } from './types.js';

export interface LlmEvidenceJudgeOptions {
  model: LanguageModel;
  /** Max snippet characters per hit in the prompt (default: 400). */
  maxSnippetChars?: number;
}

const JUDGE_SYSTEM_PROMPT = `You are a careful fact-checker. You are given a claim and numbered web search results.
Decide, using ONLY the search results, whether they:
- "corroborates": the results support the claim
- "contradicts": the results show the claim is false
- "inconclusive": the results are unrelated, mixed, or insufficient

Respond with a JSON object: {"verdict": "corroborates" | "contradicts" | "inconclusive", "reason": "<one sentence>"}
Respond ONLY with the JSON object.`;

const JudgeResponse = z.object({
  verdict: z.string(),
  reason: z.string().optional(),
});

export class LlmEvidenceJudge implements EvidenceJudge {
  private readonly model: LanguageModel;
  private readonly maxSnippetChars: number;

  constructor(options: LlmEvidenceJudgeOptions) {
    this.model = options.model;
    this.maxSnippetChars = options.maxSnippetChars ?? 400;
  }

  async judge(claimText: string, evidence: readonly SearchHit[], signal?: AbortSignal): Promise<JudgeVerdict> {
    const response = await callLLM({
      model: this.model,
      system: JUDGE_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: formatJudgePrompt(claimText, evidence, this.maxSnippetChars) }],
      maxOutputTokens: 300,
      temperature: 0,
      retry: { maxRetries: 0 },
      abortSignal: signal,
    });

    return parseJudgeResponse(response.content);
  }
}

export function formatJudgePrompt(claimText: string, evidence: readonly SearchHit[], maxSnippetChars: number): string {
  const lines = evidence.map((hit, i) => {
    const snippet = hit.snippet.length > maxSnippetChars
      ? `${hit.snippet.slice(0, maxSnippetChars)}...`
      : hit.snippet;
    return `[${i + 1}] ${hit.title}\n${hit.url}\n${snippet}`;
  });
  return `Claim: ${claimText}\n\nSearch results:\n\n${lines.join('\n\n')}`;
}

/**
 * Read the verdict from a JSON object's `verdict` field or a bare one-word
 * reply. Anything else is `inconclusive`.
 */
export function parseJudgeResponse(content: string): JudgeVerdict {
  const text = stripCodeFence(content);

  const objectMatch = text.match(/\{[\s\S]*\}/);
  const parsed = objectMatch ? JudgeResponse.safeParse(parseJson(objectMatch[0])) : null;

  return toJudgeVerdict(parsed?.success ? parsed.data.verdict : text);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

const JUDGE_VERDICTS: readonly JudgeVerdict[] = ['corroborates', 'contradicts', 'inconclusive'];

/** Only an exact keyword counts; prose such as "not supported" is inconclusive. */
function toJudgeVerdict(value: string): JudgeVerdict {
  const word = value.trim().toLowerCase().replace(/^["'`]+|["'`.!]+$/g, '');
  return JUDGE_VERDICTS.find(v => v === word) ?? 'inconclusive';
}
