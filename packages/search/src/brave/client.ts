import { z } from 'zod';
import type { SearchHit, SearchProvider, SearchRequest } from '../types.js';
import { fetchProvider, readJson } from '../http.js';

const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';

const BraveResponse = z.object({
  web: z.object({
    results: z.array(z.object({
      title: z.string().optional(),
      url: z.string().optional(),
      description: z.string().optional(),
    })).optional(),
  }).optional(),
});

export interface BraveOptions {
  apiKey: string;
  timeoutMs?: number;
}

/** Brave Search web API (free tier, metered daily). */
export class BraveProvider implements SearchProvider {
  readonly id = 'brave';
  readonly label = 'Brave Search';
  private readonly apiKey: string;
  private readonly timeoutMs?: number;

  constructor(options: BraveOptions) {
    if (!options.apiKey) {
      throw new Error('BraveProvider requires an apiKey');
    }
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    // Brave caps `count` at 20
    const count = Math.max(1, Math.min(request.maxResults, 20));
    const params = new URLSearchParams({
      q: request.query,
      count: String(count),
    });

    const response = await fetchProvider(
      this.id,
      `${BRAVE_SEARCH_URL}?${params.toString()}`,
      {
        headers: {
          'Accept': 'application/json',
          'Accept-Encoding': 'gzip',
          'X-Subscription-Token': this.apiKey,
        },
      },
      { timeoutMs: this.timeoutMs, signal: request.signal },
    );

    const data = await readJson(this.id, response, BraveResponse);

    // A query with no web results omits the `web` section entirely
    return (data.web?.results ?? [])
      .filter((r): r is typeof r & { url: string } => typeof r.url === 'string' && r.url.length > 0)
      .map(r => ({
        title: r.title?.trim() || r.url,
        url: r.url,
        snippet: stripTags(r.description ?? ''),
      }))
      .slice(0, count);
  }
}

/** Brave wraps matched terms in <strong>; snippets are plain text elsewhere. */
function stripTags(text: string): string {
  return text.replace(/<\/?[a-z][^>]*>/gi, '');
}
