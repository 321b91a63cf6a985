import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BraveProvider } from './client.js';
import { ProviderError } from '../errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

describe('BraveProvider', () => {
  it('requires an api key', () => {
    expect(() => new BraveProvider({ apiKey: '' })).toThrow('requires an apiKey');
  });

  it('maps web results and strips highlight markup', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => ({
        type: 'search',
        web: {
          results: [
            {
              title: 'Eiffel Tower height',
              url: 'https://example.org/eiffel',
              description: 'The <strong>Eiffel Tower</strong> is 330 m tall.',
            },
            { title: 'No url' },
          ],
        },
      }),
    });

    const provider = new BraveProvider({ apiKey: 'test-brave-key' });
    const hits = await provider.search({ query: 'eiffel tower height', maxResults: 5 });

    expect(hits).toEqual([
      { title: 'Eiffel Tower height', url: 'https://example.org/eiffel', snippet: 'The Eiffel Tower is 330 m tall.' },
    ]);

    const calledUrl = new URL(mockFetch.mock.calls[0][0] as string);
    expect(calledUrl.searchParams.get('q')).toBe('eiffel tower height');
    expect(calledUrl.searchParams.get('count')).toBe('5');
    const init = mockFetch.mock.calls[0][1] as { headers: Record<string, string> };
    expect(init.headers['X-Subscription-Token']).toBe('test-brave-key');
  });

  it('clamps count to 20', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({}) });

    const provider = new BraveProvider({ apiKey: 'test-brave-key' });
    await provider.search({ query: 'q', maxResults: 50 });

    const calledUrl = new URL(mockFetch.mock.calls[0][0] as string);
    expect(calledUrl.searchParams.get('count')).toBe('20');
  });

  it('returns no hits when the web section is missing', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ type: 'search' }) });

    const provider = new BraveProvider({ apiKey: 'test-brave-key' });
    expect(await provider.search({ query: 'q', maxResults: 5 })).toEqual([]);
  });

  it('reports 401 as unauthorized', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 401, statusText: 'Unauthorized' });

    const provider = new BraveProvider({ apiKey: 'test-brave-key' });
    const err = await provider.search({ query: 'q', maxResults: 5 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect((err as ProviderError).kind).toBe('unauthorized');
    expect((err as ProviderError).message).toBe('brave: HTTP 401 Unauthorized');
  });
});
