/**
 * Report aggregator: pairs claims with verdicts, grades overall reliability
 * and assigns the content-derived report id. Pure functions only; persistence
 * and caching live in the history store and the engine.
 */

import { createHash } from 'node:crypto';
import { ReportIntegrityError } from '../errors.js';
import type {
  CheckMode,
  Claim,
  Reliability,
  Report,
  ReportCounts,
  ReportSummary,
  Verdict,
} from './types.js';

export interface ReliabilityThresholds {
  /** `high` needs verified/total strictly above this and no false claims. */
  highVerifiedRatio: number;
  /** `low` when false/total is strictly above this (or false outnumbers verified). */
  lowFalseRatio: number;
}

export const DEFAULT_RELIABILITY: ReliabilityThresholds = {
  highVerifiedRatio: 0.7,
  lowFalseRatio: 0.3,
};

export function computeCounts(verdicts: readonly Verdict[]): ReportCounts {
  const counts: ReportCounts = { verified: 0, false: 0, unverifiable: 0, total: verdicts.length };
  for (const verdict of verdicts) {
    counts[verdict.status]++;
  }
  return counts;
}

export function reportCounts(report: Report): ReportCounts {
  return computeCounts(report.verdicts);
}

/** Deterministic grade from counts. A report without claims is `medium`. */
export function gradeReliability(
  counts: ReportCounts,
  thresholds: ReliabilityThresholds = DEFAULT_RELIABILITY,
): Reliability {
  if (counts.total === 0) return 'medium';

  const verifiedRatio = counts.verified / counts.total;
  const falseRatio = counts.false / counts.total;

  if (verifiedRatio > thresholds.highVerifiedRatio && counts.false === 0) return 'high';
  if (falseRatio > thresholds.lowFalseRatio || counts.false > counts.verified) return 'low';
  return 'medium';
}

/** SHA-256 (hex) of the mode and whitespace-normalised text. */
export function fingerprintInput(text: string, mode: CheckMode): string {
  const normalized = text.trim().replace(/\s+/g, ' ');
  return createHash('sha256').update(`${mode}\n${normalized}`).digest('hex');
}

export function reportIdFor(fingerprint: string): string {
  return `fc-${fingerprint.slice(0, 16)}`;
}

export interface BuildReportInput {
  originalText: string;
  claims: readonly Claim[];
  verdicts: readonly Verdict[];
  mode: CheckMode;
  fingerprint: string;
  generatedAt?: Date;
  thresholds?: ReliabilityThresholds;
}

/**
 * Build a frozen report. Throws ReportIntegrityError unless `verdicts[i]`
 * belongs to `claims[i]` for every index.
 */
export function buildReport(input: BuildReportInput): Report {
  const { claims, verdicts } = input;

  if (claims.length !== verdicts.length) {
    throw new ReportIntegrityError(
      `Report has ${claims.length} claim(s) but ${verdicts.length} verdict(s)`,
    );
  }
  const ids = new Set<string>();
  claims.forEach((claim, i) => {
    if (ids.has(claim.id)) {
      throw new ReportIntegrityError(`Duplicate claim id: ${claim.id}`);
    }
    ids.add(claim.id);
    if (verdicts[i].claimId !== claim.id) {
      throw new ReportIntegrityError(
        `Verdict ${i} belongs to ${verdicts[i].claimId}, expected ${claim.id}`,
      );
    }
  });

  const counts = computeCounts(verdicts);

  return Object.freeze({
    id: reportIdFor(input.fingerprint),
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    originalText: input.originalText,
    claims: Object.freeze([...claims]),
    verdicts: Object.freeze([...verdicts]),
    overallReliability: gradeReliability(counts, input.thresholds),
    mode: input.mode,
    fingerprint: input.fingerprint,
    noClaimsExtracted: claims.length === 0,
  });
}

/** Deep-freeze a report read back from storage. */
export function freezeReport(report: Report): Report {
  return Object.freeze({
    ...report,
    claims: Object.freeze(report.claims.map(c => Object.freeze({ ...c }))),
    verdicts: Object.freeze(report.verdicts.map(v => Object.freeze({
      ...v,
      sources: Object.freeze([...v.sources]),
      queries: Object.freeze([...v.queries]),
    }))),
  });
}

export function summarizeReport(report: Report): ReportSummary {
  return {
    id: report.id,
    generatedAt: report.generatedAt,
    overallReliability: report.overallReliability,
    counts: reportCounts(report),
    mode: report.mode,
    claimCount: report.claims.length,
  };
}
