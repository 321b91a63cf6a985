import type { SearchHit } from '@claimcheck/search';

/**
 * Confidence = base + perSource·(n−1) + perDomain·(d−1) for n distinct
 * source URLs across d distinct hosts, capped at 1.0, or at
 * `singleDomainCap` while every source shares one host.
 */
export interface ScoringConfig {
  base: number;
  perSource: number;
  perDomain: number;
  singleDomainCap: number;
  /** Sources kept on a verdict. */
  maxSources: number;
}

export const DEFAULT_SCORING: ScoringConfig = {
  base: 0.5,
  perSource: 0.1,
  perDomain: 0.1,
  singleDomainCap: 0.7,
  maxSources: 5,
};

/** Distinct hit URLs in search order, at most `maxSources`. */
export function collectSources(hits: readonly SearchHit[], maxSources: number): string[] {
  const sources: string[] = [];
  for (const hit of hits) {
    if (sources.length >= maxSources) break;
    if (!sources.includes(hit.url)) sources.push(hit.url);
  }
  return sources;
}

/** Lower-cased hostname without a leading `www.`; the URL itself when unparseable. */
export function hostOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return url;
  }
}

export function countDomains(sources: readonly string[]): number {
  return new Set(sources.map(hostOf)).size;
}

export function scoreConfidence(sources: readonly string[], config: ScoringConfig = DEFAULT_SCORING): number {
  const n = new Set(sources).size;
  if (n === 0) return 0;

  const d = countDomains(sources);
  const raw = config.base + config.perSource * (n - 1) + config.perDomain * (d - 1);
  const cap = d >= 2 ? 1 : Math.min(1, config.singleDomainCap);

  // Two decimals keeps 0.1 steps free of float noise in stored reports
  return Math.round(Math.min(raw, cap) * 100) / 100;
}
