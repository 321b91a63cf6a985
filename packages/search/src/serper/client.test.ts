import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SerperProvider } from './client.js';
import { ProviderError } from '../errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

const serperResponse = {
  searchParameters: { q: 'eiffel tower height' },
  organic: [
    {
      title: 'Eiffel Tower - Facts',
      link: 'https://example.org/eiffel',
      snippet: 'The tower is 330 metres tall.',
      position: 1,
    },
    {
      title: 'Paris landmarks',
      link: 'https://travel.example.com/paris',
      snippet: 'Height including antennas: 330 m.',
      position: 2,
    },
    { title: 'No link here' },
  ],
};

async function expectProviderError(promise: Promise<unknown>, kind: string): Promise<void> {
  const err = await promise.catch((e: unknown) => e);
  expect(err).toBeInstanceOf(ProviderError);
  expect((err as ProviderError).kind).toBe(kind);
  expect((err as ProviderError).providerId).toBe('serper');
}

describe('SerperProvider', () => {
  it('requires an api key', () => {
    expect(() => new SerperProvider({ apiKey: '' })).toThrow('requires an apiKey');
  });

  it('maps organic results to hits and skips entries without a link', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => serperResponse });

    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    const hits = await provider.search({ query: 'eiffel tower height', maxResults: 10 });

    expect(hits).toEqual([
      { title: 'Eiffel Tower - Facts', url: 'https://example.org/eiffel', snippet: 'The tower is 330 metres tall.' },
      { title: 'Paris landmarks', url: 'https://travel.example.com/paris', snippet: 'Height including antennas: 330 m.' },
    ]);
  });

  it('posts the query with the api key header', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ organic: [] }) });

    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await provider.search({ query: 'moon cheese', maxResults: 5 });

    expect(mockFetch.mock.calls[0][0]).toBe('https://google.serper.dev/search');
    const init = mockFetch.mock.calls[0][1] as { method: string; headers: Record<string, string>; body: string };
    expect(init.method).toBe('POST');
    expect(init.headers['X-API-KEY']).toBe('test-serper-key');
    expect(JSON.parse(init.body)).toEqual({ q: 'moon cheese', num: 5 });
  });

  it('caps results at maxResults', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => serperResponse });

    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    const hits = await provider.search({ query: 'q', maxResults: 1 });
    expect(hits).toHaveLength(1);
  });

  it('reports 403 as unauthorized', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 403, statusText: 'Forbidden' });
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'unauthorized');
  });

  it('reports 429 as rate_limited', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 429, statusText: 'Too Many Requests' });
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'rate_limited');
  });

  it('reports network failures as unreachable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'unreachable');
  });

  it('reports a body without organic results as malformed', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ message: 'Unexpected' }) });
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'malformed');
  });

  it('reports a non-JSON body as malformed', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => { throw new SyntaxError('Unexpected token < in JSON'); },
    });
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'malformed');
  });

  it('does not retry on failure', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 503, statusText: 'Service Unavailable' });
    const provider = new SerperProvider({ apiKey: 'test-serper-key' });
    await expectProviderError(provider.search({ query: 'q', maxResults: 5 }), 'unreachable');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
