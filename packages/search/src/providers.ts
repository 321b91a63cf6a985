import type { RegisteredProvider, SearchProvidersConfig } from './types.js';
import { SerperProvider } from './serper/client.js';
import { SearxngProvider } from './searxng/client.js';
import { BraveProvider } from './brave/client.js';
import { ScraperProvider } from './scraper/client.js';

/** Free-tier defaults: Serper 2,500/month, SearXNG 100/day, Brave ~2,000/month spread per day. */
export const DEFAULT_QUOTAS = {
  serperMonthly: 2500,
  searxngDaily: 100,
  braveDaily: 66,
} as const;

/**
 * Build the provider chain in priority order: dedicated API (Serper),
 * self-hosted metasearch (SearXNG), generic web search (Brave), scraping.
 * Providers without credentials or instances are left out.
 */
export function createSearchProviders(config: SearchProvidersConfig): RegisteredProvider[] {
  const { timeoutMs } = config;
  const chain: RegisteredProvider[] = [];

  if (config.serper?.apiKey) {
    chain.push({
      provider: new SerperProvider({ apiKey: config.serper.apiKey, timeoutMs }),
      quota: { limit: config.serper.monthlyLimit ?? DEFAULT_QUOTAS.serperMonthly, window: 'month' },
    });
  }

  const instances = config.searxng?.instances ?? [];
  if (instances.length > 0) {
    chain.push({
      provider: new SearxngProvider({ instances, timeoutMs }),
      quota: { limit: config.searxng?.dailyLimit ?? DEFAULT_QUOTAS.searxngDaily, window: 'day' },
    });
  }

  if (config.brave?.apiKey) {
    chain.push({
      provider: new BraveProvider({ apiKey: config.brave.apiKey, timeoutMs }),
      quota: { limit: config.brave.dailyLimit ?? DEFAULT_QUOTAS.braveDaily, window: 'day' },
    });
  }

  if (config.scraper?.enabled ?? true) {
    chain.push({
      provider: new ScraperProvider({ timeoutMs }),
      quota: { limit: Number.POSITIVE_INFINITY, window: 'day' },
    });
  }

  return chain;
}
