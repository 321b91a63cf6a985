import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SearxngProvider } from './client.js';
import { ProviderError } from '../errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

describe('SearxngProvider', () => {
  it('requires at least one instance', () => {
    expect(() => new SearxngProvider({ instances: [] })).toThrow('at least one instance');
    expect(() => new SearxngProvider({ instances: [''] })).toThrow('at least one instance');
  });

  it('queries the instance JSON endpoint and maps content to snippet', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => ({
        query: 'eiffel tower',
        results: [
          { title: 'Eiffel Tower', url: 'https://example.org/eiffel', content: 'Wrought-iron lattice tower.', engine: 'bing' },
          { title: 'Missing url' },
          { title: '  ', url: 'https://example.net/tower', content: 'Height 330 m' },
        ],
      }),
    });

    const provider = new SearxngProvider({ instances: ['http://localhost:8888/'] });
    const hits = await provider.search({ query: 'eiffel tower', maxResults: 10 });

    const calledUrl = new URL(mockFetch.mock.calls[0][0] as string);
    expect(calledUrl.origin + calledUrl.pathname).toBe('http://localhost:8888/search');
    expect(calledUrl.searchParams.get('q')).toBe('eiffel tower');
    expect(calledUrl.searchParams.get('format')).toBe('json');
    expect(calledUrl.searchParams.get('language')).toBe('all');

    expect(hits).toEqual([
      { title: 'Eiffel Tower', url: 'https://example.org/eiffel', snippet: 'Wrought-iron lattice tower.' },
      { title: 'https://example.net/tower', url: 'https://example.net/tower', snippet: 'Height 330 m' },
    ]);
  });

  it('passes the engines option through', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ results: [] }) });

    const provider = new SearxngProvider({ instances: ['http://localhost:8888'], engines: 'bing,duckduckgo' });
    await provider.search({ query: 'q', maxResults: 3 });

    const calledUrl = new URL(mockFetch.mock.calls[0][0] as string);
    expect(calledUrl.searchParams.get('engines')).toBe('bing,duckduckgo');
  });

  it('moves to the next instance after a failed call without retrying', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 502, statusText: 'Bad Gateway' });

    const provider = new SearxngProvider({ instances: ['http://a.local', 'http://b.local'] });
    expect(provider.currentInstance).toBe('http://a.local');

    const err = await provider.search({ query: 'q', maxResults: 3 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect((err as ProviderError).kind).toBe('unreachable');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(provider.currentInstance).toBe('http://b.local');

    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ results: [] }) });
    await provider.search({ query: 'q', maxResults: 3 });
    expect((mockFetch.mock.calls[1][0] as string).startsWith('http://b.local/search?')).toBe(true);
  });

  it('treats a body without results as malformed', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ error: 'format disabled' }) });

    const provider = new SearxngProvider({ instances: ['http://localhost:8888'] });
    const err = await provider.search({ query: 'q', maxResults: 3 }).catch((e: unknown) => e);
    expect((err as ProviderError).kind).toBe('malformed');
  });
});
