/**
 * Last-resort provider: scrape the DuckDuckGo HTML results page.
 *
 * No key and no quota, but the markup can change under us and the endpoint
 * throttles aggressively, so it sits at the bottom of the priority list.
 * Parsing is regex-based over the small, stable set of classes the
 * HTML-only endpoint uses (`result__a`, `result__snippet`).
 */

import type { SearchHit, SearchProvider, SearchRequest } from '../types.js';
import { ProviderError } from '../errors.js';
import { fetchProvider, readText } from '../http.js';

const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';
const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)';

export interface ScraperOptions {
  timeoutMs?: number;
  /** Hard cap on scraped hits regardless of the request (default: 5). */
  maxHits?: number;
}

export class ScraperProvider implements SearchProvider {
  readonly id = 'scraper';
  readonly label = 'DuckDuckGo (scraped)';
  private readonly timeoutMs?: number;
  private readonly maxHits: number;

  constructor(options: ScraperOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.maxHits = options.maxHits ?? 5;
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const params = new URLSearchParams({ q: request.query });
    const response = await fetchProvider(
      this.id,
      `${DUCKDUCKGO_HTML_URL}?${params.toString()}`,
      { headers: { 'User-Agent': USER_AGENT, 'Accept': 'text/html' } },
      { timeoutMs: this.timeoutMs, signal: request.signal },
    );

    // DuckDuckGo answers throttled clients with 202 and a challenge page
    if (response.status === 202) {
      throw new ProviderError(this.id, 'rate_limited', 'scraper: throttled by DuckDuckGo (HTTP 202)', 202);
    }

    const html = await readText(this.id, response);
    if (html.includes('anomaly-modal')) {
      throw new ProviderError(this.id, 'rate_limited', 'scraper: DuckDuckGo served a bot challenge');
    }

    const hits = parseResultsPage(html);
    if (hits.length === 0 && !/No\s+results/i.test(html)) {
      throw new ProviderError(this.id, 'malformed', 'scraper: results page layout not recognised');
    }
    return hits.slice(0, Math.min(request.maxResults, this.maxHits));
  }
}

/**
 * Extract hits from a DuckDuckGo HTML results page.
 * Each `result__a` anchor opens a hit; the next `result__snippet` fills its snippet.
 */
export function parseResultsPage(html: string): SearchHit[] {
  const hits: SearchHit[] = [];
  const seen = new Set<string>();
  const anchorPattern = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
  let current: SearchHit | null = null;
  let match: RegExpExecArray | null;

  while ((match = anchorPattern.exec(html)) !== null) {
    const attrs = match[1];
    const inner = match[2];
    const className = /\bclass="([^"]*)"/i.exec(attrs)?.[1] ?? '';
    const classes = className.split(/\s+/);

    if (classes.includes('result__a')) {
      current = null;
      const href = /\bhref="([^"]*)"/i.exec(attrs)?.[1];
      const url = href ? resolveResultUrl(decodeEntities(href)) : null;
      if (!url || seen.has(url)) continue;
      seen.add(url);
      current = { title: cleanText(inner) || url, url, snippet: '' };
      hits.push(current);
    } else if (classes.includes('result__snippet') && current && !current.snippet) {
      current.snippet = cleanText(inner);
    }
  }

  return hits;
}

/**
 * Result links go through a redirect (`//duckduckgo.com/l/?uddg=<target>`).
 * Returns the target URL, or null for ads and non-http links.
 */
export function resolveResultUrl(href: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href.startsWith('//') ? `https:${href}` : href, 'https://duckduckgo.com');
  } catch {
    return null;
  }

  if (parsed.hostname.endsWith('duckduckgo.com')) {
    const target = parsed.searchParams.get('uddg');
    if (!target) return null;
    return resolveResultUrl(target);
  }

  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
}

function cleanText(fragment: string): string {
  return decodeEntities(fragment.replace(/<[^>]+>/g, '')).replace(/\s+/g, ' ').trim();
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X'
        ? parseInt(entity.slice(2), 16)
        : parseInt(entity.slice(1), 10);
      // Out-of-range code points stay as written
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}
