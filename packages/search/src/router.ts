/**
 * Search router: first-success fallback across providers in priority order.
 *
 * For each provider the router reserves quota, calls the adapter once and
 * decides what the outcome means:
 * - quota denied: skip, not a failure
 * - rate_limited / unreachable: record a failure, fall back
 * - unauthorized / malformed: the provider is misconfigured; skip it for the
 *   rest of the run
 * - hits: return immediately
 * - zero hits: remember that a search succeeded, fall back for hits
 *
 * The outcome tells apart "could not search" (`exhausted`) from "searched and
 * found nothing" (`empty`). Neither is an error.
 */

import { EventEmitter } from 'eventemitter3';
import type { RegisteredProvider, SearchHit, SearchProvider } from './types.js';
import { ProviderError, toProviderError, type ProviderErrorKind } from './errors.js';
import { UsageTracker } from './usage/tracker.js';

export type AttemptResult = 'hits' | 'no_hits' | 'quota_exhausted' | 'misconfigured' | ProviderErrorKind;

export interface ProviderAttempt {
  providerId: string;
  result: AttemptResult;
  hitCount?: number;
  error?: string;
}

export type SearchOutcome =
  | { kind: 'results'; query: string; providerId: string; hits: SearchHit[]; attempts: ProviderAttempt[] }
  | { kind: 'empty'; query: string; answeredBy: string[]; attempts: ProviderAttempt[] }
  | { kind: 'exhausted'; query: string; attempts: ProviderAttempt[] };

export interface RouterSearchOptions {
  /** Max hits requested from each provider (default: router's maxResults). */
  maxResults?: number;
  /** Only consult the first N providers by priority (fast mode). */
  maxProviders?: number;
  /**
   * Providers found misconfigured during the current run. The router adds to
   * it; pass the same set for every search of one run.
   */
  misconfigured?: Set<string>;
  signal?: AbortSignal;
}

export interface ProviderSkippedEvent { providerId: string; query: string; reason: 'quota_exhausted' | 'misconfigured' }
export interface ProviderFailedEvent { providerId: string; query: string; error: ProviderError }
export interface ProviderSucceededEvent { providerId: string; query: string; hitCount: number }

export interface SearchRouterEvents {
  'provider:skipped': (event: ProviderSkippedEvent) => void;
  'provider:failed': (event: ProviderFailedEvent) => void;
  'provider:disabled': (event: ProviderFailedEvent) => void;
  'provider:succeeded': (event: ProviderSucceededEvent) => void;
}

export interface SearchRouterOptions {
  /** Providers in priority order (first = preferred). */
  providers: RegisteredProvider[];
  tracker?: UsageTracker;
  /** Default hits per search (default: 8). */
  maxResults?: number;
}

const DEFAULT_MAX_RESULTS = 8;

export class SearchRouter extends EventEmitter<SearchRouterEvents> {
  readonly tracker: UsageTracker;
  private readonly providers: SearchProvider[] = [];
  private readonly maxResults: number;

  constructor(options: SearchRouterOptions) {
    super();
    this.tracker = options.tracker ?? new UsageTracker();
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;

    const seen = new Set<string>();
    for (const { provider, quota } of options.providers) {
      if (seen.has(provider.id)) {
        throw new Error(`Duplicate search provider id: ${provider.id}`);
      }
      seen.add(provider.id);
      this.providers.push(provider);
      if (quota) this.tracker.register(provider.id, quota);
    }
  }

  /** Provider ids in priority order. */
  get providerIds(): string[] {
    return this.providers.map(p => p.id);
  }

  async search(query: string, options: RouterSearchOptions = {}): Promise<SearchOutcome> {
    const maxResults = options.maxResults ?? this.maxResults;
    const misconfigured = options.misconfigured ?? new Set<string>();
    const candidates = options.maxProviders !== undefined
      ? this.providers.slice(0, Math.max(0, options.maxProviders))
      : this.providers;

    const attempts: ProviderAttempt[] = [];
    const answeredBy: string[] = [];

    for (const provider of candidates) {
      const providerId = provider.id;

      if (options.signal?.aborted) break;

      if (misconfigured.has(providerId)) {
        attempts.push({ providerId, result: 'misconfigured' });
        this.emit('provider:skipped', { providerId, query, reason: 'misconfigured' });
        continue;
      }

      if (!this.tracker.tryReserve(providerId)) {
        attempts.push({ providerId, result: 'quota_exhausted' });
        this.emit('provider:skipped', { providerId, query, reason: 'quota_exhausted' });
        continue;
      }

      let hits: SearchHit[];
      try {
        hits = await provider.search({ query, maxResults, signal: options.signal });
      } catch (err) {
        const error = toProviderError(providerId, err);
        attempts.push({ providerId, result: error.kind, error: error.message });

        if (error.transient) {
          this.tracker.recordFailure(providerId);
          this.emit('provider:failed', { providerId, query, error });
        } else {
          misconfigured.add(providerId);
          this.emit('provider:disabled', { providerId, query, error });
        }
        continue;
      }

      const normalized = normalizeHits(hits, maxResults);
      answeredBy.push(providerId);
      this.emit('provider:succeeded', { providerId, query, hitCount: normalized.length });

      if (normalized.length > 0) {
        attempts.push({ providerId, result: 'hits', hitCount: normalized.length });
        return { kind: 'results', query, providerId, hits: normalized, attempts };
      }
      attempts.push({ providerId, result: 'no_hits', hitCount: 0 });
    }

    if (answeredBy.length > 0) {
      return { kind: 'empty', query, answeredBy, attempts };
    }
    return { kind: 'exhausted', query, attempts };
  }
}

/** Trim fields, drop hits without a usable URL and duplicate URLs, cap the count. */
export function normalizeHits(hits: SearchHit[], maxResults: number): SearchHit[] {
  const seen = new Set<string>();
  const result: SearchHit[] = [];

  for (const hit of hits) {
    const url = hit.url.trim();
    if (!/^https?:\/\//i.test(url) || seen.has(url)) continue;
    seen.add(url);
    result.push({
      title: hit.title.trim() || url,
      url,
      snippet: hit.snippet.replace(/\s+/g, ' ').trim(),
    });
    if (result.length >= maxResults) break;
  }

  return result;
}
