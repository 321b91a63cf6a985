/** A single normalized search result. */
export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchRequest {
  query: string;
  /** Upper bound on hits returned. Adapters clamp it to what their backend allows. */
  maxResults: number;
  /** Abort signal for per-claim deadlines and shutdown. */
  signal?: AbortSignal;
}

/**
 * Uniform interface over one search backend.
 *
 * Adapters make exactly one network call per `search` and never retry;
 * failures are thrown as `ProviderError` so the router can account for them.
 */
export interface SearchProvider {
  /** Stable identifier used for quota tracking (e.g. 'serper', 'searxng'). */
  readonly id: string;
  /** Human-readable name for logs. */
  readonly label: string;
  search(request: SearchRequest): Promise<SearchHit[]>;
}

export type QuotaWindow = 'day' | 'month' | { durationMs: number };

export interface QuotaRule {
  /** Maximum reservations per window. `Infinity` for unmetered providers. */
  limit: number;
  window: QuotaWindow;
}

/** A provider together with its quota, in router priority order. */
export interface RegisteredProvider {
  provider: SearchProvider;
  quota?: QuotaRule;
}

export interface SearchProvidersConfig {
  serper?: { apiKey?: string; monthlyLimit?: number };
  searxng?: { instances?: string[]; dailyLimit?: number };
  brave?: { apiKey?: string; dailyLimit?: number };
  scraper?: { enabled?: boolean };
  /** Per-call network timeout in ms (default: 10000). */
  timeoutMs?: number;
}
