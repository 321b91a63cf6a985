/**
 * Fact-check domain types.
 *
 * Claims are extracted from input text, each claim is verified against web
 * evidence into a Verdict, and verdicts are aggregated into a Report. All
 * three are frozen once built.
 */

import type { SearchHit } from '@claimcheck/search';

// ---------------------------------------------------------------------------
// Claims
// ---------------------------------------------------------------------------

export const CLAIM_CATEGORIES = ['historical', 'scientific', 'statistical', 'quotation', 'other'] as const;

export type ClaimCategory = typeof CLAIM_CATEGORIES[number];

/** One independently verifiable assertion. */
export interface Claim {
  /** Unique within a report (`claim-N`). */
  readonly id: string;
  /** Verbatim claim text. */
  readonly text: string;
  /** Assigned at extraction, never revised. */
  readonly category: ClaimCategory;
  /** Surrounding text or caller-supplied context. */
  readonly context?: string;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export type VerdictStatus = 'verified' | 'false' | 'unverifiable';

export interface Verdict {
  readonly claimId: string;
  readonly status: VerdictStatus;
  /** 0 iff `unverifiable`. */
  readonly confidence: number;
  readonly explanation: string;
  /** Distinct source URLs in search order; may be empty. */
  readonly sources: readonly string[];
  /** Search hits shown to the judge. */
  readonly evidenceConsidered: number;
  /** Provider whose results were judged. */
  readonly provider?: string;
  /** Queries issued, in order. */
  readonly queries: readonly string[];
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export type Reliability = 'high' | 'medium' | 'low';

export type CheckMode = 'full' | 'fast' | 'statistic';

export interface Report {
  /** `fc-` + first 16 hex chars of the fingerprint. */
  readonly id: string;
  /** ISO timestamp. */
  readonly generatedAt: string;
  readonly originalText: string;
  /** Extraction order. */
  readonly claims: readonly Claim[];
  /** 1:1 with `claims`, same order. */
  readonly verdicts: readonly Verdict[];
  readonly overallReliability: Reliability;
  readonly mode: CheckMode;
  /** SHA-256 of mode and normalised input. */
  readonly fingerprint: string;
  /** True only when extraction produced no claims. */
  readonly noClaimsExtracted: boolean;
}

export interface ReportCounts {
  verified: number;
  false: number;
  unverifiable: number;
  total: number;
}

/** Listing entry: everything but claims and verdicts. */
export interface ReportSummary {
  id: string;
  generatedAt: string;
  overallReliability: Reliability;
  counts: ReportCounts;
  mode: CheckMode;
  claimCount: number;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

/**
 * Splits text into typed claims. May return an empty list; throwing means
 * extraction itself is unavailable.
 */
export interface ClaimExtractor {
  extract(text: string, signal?: AbortSignal): Promise<Claim[]>;
}

export type JudgeVerdict = 'corroborates' | 'contradicts' | 'inconclusive';

/**
 * Compares a claim with evidence snippets. Pure from the caller's point of
 * view: it does not retry; the verifier does.
 */
export interface EvidenceJudge {
  judge(claimText: string, evidence: readonly SearchHit[], signal?: AbortSignal): Promise<JudgeVerdict>;
}

/** Produces an alternative search query for a claim, or null for none. */
export interface QueryReformulator {
  reformulate(claim: Claim, signal?: AbortSignal): Promise<string | null>;
}
