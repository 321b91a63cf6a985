export {
  type SearchHit,
  type SearchRequest,
  type SearchProvider,
  type QuotaRule,
  type QuotaWindow,
  type RegisteredProvider,
  type SearchProvidersConfig,
} from './types.js';

export {
  ProviderError,
  classifyStatus,
  toProviderError,
  type ProviderErrorKind,
} from './errors.js';

export { fetchProvider, readJson, readText, DEFAULT_TIMEOUT_MS, type ProviderFetchOptions } from './http.js';

export {
  UsageTracker,
  windowStartFor,
  type QuotaState,
  type UsageStatus,
  type UsageTrackerOptions,
  type UsageTrackerEvents,
} from './usage/tracker.js';

export {
  SearchRouter,
  normalizeHits,
  type SearchOutcome,
  type ProviderAttempt,
  type AttemptResult,
  type RouterSearchOptions,
  type SearchRouterOptions,
  type SearchRouterEvents,
  type ProviderSkippedEvent,
  type ProviderFailedEvent,
  type ProviderSucceededEvent,
} from './router.js';

export { SerperProvider, type SerperOptions } from './serper/client.js';
export { SearxngProvider, type SearxngOptions } from './searxng/client.js';
export { BraveProvider, type BraveOptions } from './brave/client.js';
export { ScraperProvider, parseResultsPage, resolveResultUrl, type ScraperOptions } from './scraper/client.js';

export { createSearchProviders, DEFAULT_QUOTAS } from './providers.js';
