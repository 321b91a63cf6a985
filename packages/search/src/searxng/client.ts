import { z } from 'zod';
import type { SearchHit, SearchProvider, SearchRequest } from '../types.js';
import { toProviderError } from '../errors.js';
import { fetchProvider, readJson } from '../http.js';

const SearxngResponse = z.object({
  results: z.array(z.object({
    title: z.string().optional(),
    url: z.string().optional(),
    content: z.string().optional(),
  })),
});

export interface SearxngOptions {
  /** Base URLs of SearXNG instances (e.g. 'http://localhost:8888'). At least one. */
  instances: string[];
  /** Search language passed through to SearXNG (default: 'all'). */
  language?: string;
  /** Comma-separated engine list; the instance default when omitted. */
  engines?: string;
  timeoutMs?: number;
}

/**
 * Self-hosted SearXNG metasearch.
 *
 * Several instances may be configured. A failed call moves the cursor to the
 * next instance so the following search goes elsewhere; the failing call
 * itself is not retried.
 */
export class SearxngProvider implements SearchProvider {
  readonly id = 'searxng';
  readonly label = 'SearXNG';
  private readonly instances: string[];
  private readonly language: string;
  private readonly engines?: string;
  private readonly timeoutMs?: number;
  private cursor = 0;

  constructor(options: SearxngOptions) {
    const instances = options.instances.map(u => u.replace(/\/+$/, '')).filter(u => u.length > 0);
    if (instances.length === 0) {
      throw new Error('SearxngProvider requires at least one instance URL');
    }
    this.instances = instances;
    this.language = options.language ?? 'all';
    this.engines = options.engines;
    this.timeoutMs = options.timeoutMs;
  }

  /** The instance the next search will use. */
  get currentInstance(): string {
    return this.instances[this.cursor];
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const instance = this.currentInstance;
    const params = new URLSearchParams({
      q: request.query,
      format: 'json',
      language: this.language,
    });
    if (this.engines) params.set('engines', this.engines);

    try {
      const response = await fetchProvider(
        this.id,
        `${instance}/search?${params.toString()}`,
        { headers: { 'Accept': 'application/json' } },
        { timeoutMs: this.timeoutMs, signal: request.signal },
      );
      const data = await readJson(this.id, response, SearxngResponse);

      const hits: SearchHit[] = [];
      for (const item of data.results) {
        if (!item.url) continue;
        hits.push({
          title: item.title?.trim() || item.url,
          url: item.url,
          snippet: item.content ?? '',
        });
        if (hits.length >= request.maxResults) break;
      }
      return hits;
    } catch (err) {
      this.rotate();
      throw toProviderError(this.id, err);
    }
  }

  private rotate(): void {
    this.cursor = (this.cursor + 1) % this.instances.length;
  }
}
