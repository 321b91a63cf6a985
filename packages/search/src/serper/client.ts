import { z } from 'zod';
import type { SearchHit, SearchProvider, SearchRequest } from '../types.js';
import { ProviderError } from '../errors.js';
import { fetchProvider, readJson } from '../http.js';

const SERPER_SEARCH_URL = 'https://google.serper.dev/search';

const SerperResponse = z.object({
  organic: z.array(z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
  })).optional(),
});

export interface SerperOptions {
  apiKey: string;
  timeoutMs?: number;
}

/** Serper.dev Google search API. Highest precision, metered monthly. */
export class SerperProvider implements SearchProvider {
  readonly id = 'serper';
  readonly label = 'Serper';
  private readonly apiKey: string;
  private readonly timeoutMs?: number;

  constructor(options: SerperOptions) {
    if (!options.apiKey) {
      throw new Error('SerperProvider requires an apiKey');
    }
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const num = Math.max(1, Math.min(request.maxResults, 100));

    const response = await fetchProvider(
      this.id,
      SERPER_SEARCH_URL,
      {
        method: 'POST',
        headers: {
          'X-API-KEY': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ q: request.query, num }),
      },
      { timeoutMs: this.timeoutMs, signal: request.signal },
    );

    const data = await readJson(this.id, response, SerperResponse);
    if (data.organic === undefined) {
      throw new ProviderError(this.id, 'malformed', 'serper: response has no organic results field');
    }

    const hits: SearchHit[] = [];
    for (const item of data.organic) {
      if (!item.link) continue;
      hits.push({
        title: item.title?.trim() || item.link,
        url: item.link,
        snippet: item.snippet ?? '',
      });
    }
    return hits.slice(0, num);
  }
}
