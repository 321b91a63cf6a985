/**
 * Per-claim verification state machine.
 *
 *   pending → searching → scoring → resolved
 *
 * Searching issues the claim text as the primary query and, only when that
 * finds nothing, one reformulated query. Scoring asks the evidence judge
 * (retried here on transient failures) and turns its answer into a frozen
 * Verdict. A per-claim deadline aborts in-flight work and resolves the claim
 * as unverifiable straight from `searching` or `scoring`.
 */

import type { SearchHit, SearchOutcome, RouterSearchOptions, ProviderAttempt } from '@claimcheck/search';
import { withRetry, withTimeout, TimeoutError, AbortError, JUDGE_RETRY, type RetryConfig } from '../llm/retry.js';
import { collectSources, countDomains, hostOf, scoreConfidence, DEFAULT_SCORING, type ScoringConfig } from './scoring.js';
import type { Claim, EvidenceJudge, JudgeVerdict, QueryReformulator, Verdict, VerdictStatus } from './types.js';

export type VerifierState = 'pending' | 'searching' | 'scoring' | 'resolved';

const TRANSITIONS: Record<VerifierState, readonly VerifierState[]> = {
  pending: ['searching'],
  searching: ['scoring', 'resolved'],
  scoring: ['resolved'],
  resolved: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: VerifierState, readonly to: VerifierState) {
    super(`Illegal verifier transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** The slice of SearchRouter the verifier needs. */
export interface EvidenceSearch {
  search(query: string, options?: RouterSearchOptions): Promise<SearchOutcome>;
}

export interface VerifierOptions {
  search: EvidenceSearch;
  judge: EvidenceJudge;
  reformulator?: QueryReformulator;
  scoring?: ScoringConfig;
  judgeRetry?: RetryConfig;
  /** Passed to every router search (fast mode, per-run misconfigured set, hit count). */
  searchOptions?: Omit<RouterSearchOptions, 'signal'>;
  onStateChange?: (claim: Claim, state: VerifierState) => void;
}

export interface VerifyOptions {
  /** Per-claim deadline in ms (0 or Infinity for none). */
  timeoutMs?: number;
  /** Caller cancellation; rejects with AbortError instead of resolving. */
  signal?: AbortSignal;
}

export class ClaimVerifier {
  readonly claim: Claim;
  private readonly options: VerifierOptions;
  private current: VerifierState = 'pending';
  private readonly queries: string[] = [];
  /** Recovered failures, appended to the verdict explanation. */
  private readonly notes: string[] = [];

  constructor(claim: Claim, options: VerifierOptions) {
    this.claim = claim;
    this.options = options;
  }

  get state(): VerifierState {
    return this.current;
  }

  /**
   * Run the claim to a verdict. Always resolves unless the caller's signal
   * fires; search and judge failures become `unverifiable` verdicts.
   */
  async verify(options: VerifyOptions = {}): Promise<Verdict> {
    this.transition('searching');

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const timeoutMs = options.timeoutMs ?? 0;
    try {
      return await withTimeout(this.execute(controller.signal), timeoutMs, options.signal);
    } catch (err) {
      controller.abort();
      if (err instanceof TimeoutError) {
        return this.resolve({
          status: 'unverifiable',
          explanation: `Verification timed out after ${timeoutMs}ms`,
          sources: [],
          evidenceConsidered: 0,
        });
      }
      throw err;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async execute(signal: AbortSignal): Promise<Verdict> {
    const outcome = await this.gatherEvidence(signal);
    checkpoint(signal);

    this.transition('scoring');

    if (outcome.kind !== 'results') {
      return this.resolve({
        status: 'unverifiable',
        explanation: describeNoEvidence(outcome),
        sources: [],
        evidenceConsidered: 0,
      });
    }

    const { hits, providerId } = outcome;
    let judgement: JudgeVerdict;
    try {
      const { result } = await withRetry(
        () => this.options.judge.judge(this.claim.text, hits, signal),
        { ...JUDGE_RETRY, ...this.options.judgeRetry, abortSignal: signal },
      );
      judgement = result;
    } catch (err) {
      checkpoint(signal);
      const message = err instanceof Error ? err.message : String(err);
      return this.resolve({
        status: 'unverifiable',
        explanation: `Evidence judge failed: ${message}`,
        sources: [],
        evidenceConsidered: hits.length,
        provider: providerId,
      });
    }
    checkpoint(signal);

    return this.resolve(this.score(judgement, hits, providerId));
  }

  /** Primary query, then one reformulated query if the first found nothing. */
  private async gatherEvidence(signal: AbortSignal): Promise<SearchOutcome> {
    const primary = await this.runQuery(this.claim.text, signal);
    if (primary.kind === 'results' || primary.kind === 'exhausted' || !this.options.reformulator) {
      return primary;
    }

    checkpoint(signal);
    let alternative: string | null;
    try {
      alternative = await this.options.reformulator.reformulate(this.claim, signal);
    } catch (err) {
      checkpoint(signal);
      this.notes.push(`query reformulation failed: ${err instanceof Error ? err.message : String(err)}`);
      return primary;
    }
    if (!alternative || this.queries.includes(alternative)) return primary;

    checkpoint(signal);
    const second = await this.runQuery(alternative, signal);
    if (second.kind === 'results') return second;

    return {
      kind: 'empty',
      query: primary.query,
      answeredBy: [...new Set([...primary.answeredBy, ...(second.kind === 'empty' ? second.answeredBy : [])])],
      attempts: [...primary.attempts, ...second.attempts],
    };
  }

  private runQuery(query: string, signal: AbortSignal): Promise<SearchOutcome> {
    this.queries.push(query);
    return this.options.search.search(query, { ...this.options.searchOptions, signal });
  }

  private score(judgement: JudgeVerdict, hits: readonly SearchHit[], providerId: string): VerdictDraft {
    const scoring = this.options.scoring ?? DEFAULT_SCORING;

    if (judgement === 'inconclusive') {
      const hosts = [...new Set(hits.map(h => hostOf(h.url)))];
      return {
        status: 'unverifiable',
        explanation: `Evidence inconclusive: ${hits.length} result(s) from ${providerId} considered (${hosts.join(', ')})`,
        sources: [],
        evidenceConsidered: hits.length,
        provider: providerId,
      };
    }

    const sources = collectSources(hits, scoring.maxSources);
    const domains = countDomains(sources);
    const verb = judgement === 'corroborates' ? 'Corroborated' : 'Contradicted';
    return {
      status: judgement === 'corroborates' ? 'verified' : 'false',
      confidence: scoreConfidence(sources, scoring),
      explanation: `${verb} by ${sources.length} source(s) across ${domains} domain(s) via ${providerId}`,
      sources,
      evidenceConsidered: hits.length,
      provider: providerId,
    };
  }

  private resolve(draft: VerdictDraft): Verdict {
    this.transition('resolved');
    const confidence = draft.status === 'unverifiable' ? 0 : (draft.confidence ?? 0);
    return Object.freeze({
      claimId: this.claim.id,
      status: draft.status,
      confidence,
      explanation: [draft.explanation, ...this.notes].join('; '),
      sources: Object.freeze([...draft.sources]),
      evidenceConsidered: draft.evidenceConsidered,
      ...(draft.provider ? { provider: draft.provider } : {}),
      queries: Object.freeze([...this.queries]),
    });
  }

  private transition(to: VerifierState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.options.onStateChange?.(this.claim, to);
  }
}

interface VerdictDraft {
  status: VerdictStatus;
  confidence?: number;
  explanation: string;
  sources: readonly string[];
  evidenceConsidered: number;
  provider?: string;
}

/** Work continuing past a deadline must not touch the state machine. */
function checkpoint(signal: AbortSignal): void {
  if (signal.aborted) throw new AbortError('Verification aborted');
}

function describeNoEvidence(outcome: Exclude<SearchOutcome, { kind: 'results' }>): string {
  if (outcome.kind === 'empty') {
    return `Searched with ${outcome.answeredBy.join(', ')} and found no evidence for this claim`;
  }
  if (outcome.attempts.length === 0) {
    return 'Could not search: no search providers are available';
  }
  return `Could not search: every provider failed or was out of quota (${formatAttempts(outcome.attempts)})`;
}

function formatAttempts(attempts: readonly ProviderAttempt[]): string {
  return attempts.map(a => `${a.providerId}: ${a.result}`).join(', ');
}
