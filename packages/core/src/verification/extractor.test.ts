import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseExtractionResponse, LlmClaimExtractor } from './extractor.js';

vi.mock('../llm/call.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../llm/call.js')>()),
  callLLM: vi.fn(),
}));

import { callLLM } from '../llm/call.js';

const mockCallLLM = vi.mocked(callLLM);

beforeEach(() => {
  vi.clearAllMocks();
});

describe('parseExtractionResponse', () => {
  it('parses a valid JSON array of claims', () => {
    const json = JSON.stringify([
      { text: 'The Eiffel Tower is 330 meters tall.', category: 'scientific' },
      { text: 'It was completed in 1889.', category: 'historical', context: 'The Eiffel Tower was completed in 1889.' },
      { text: 'About 7 million people visit each year.', category: 'statistical' },
    ]);

    const claims = parseExtractionResponse(json);
    expect(claims).toEqual([
      { id: 'claim-1', text: 'The Eiffel Tower is 330 meters tall.', category: 'scientific' },
      {
        id: 'claim-2',
        text: 'It was completed in 1889.',
        category: 'historical',
        context: 'The Eiffel Tower was completed in 1889.',
      },
      { id: 'claim-3', text: 'About 7 million people visit each year.', category: 'statistical' },
    ]);
    expect(Object.isFrozen(claims[0])).toBe(true);
  });

  it('handles markdown code fences around JSON', () => {
    const json = '```json\n[\n  {"text": "Water boils at 100 C at sea level", "category": "scientific"}\n]\n```';
    const claims = parseExtractionResponse(json);
    expect(claims).toHaveLength(1);
    expect(claims[0].text).toBe('Water boils at 100 C at sea level');
  });

  it('extracts the JSON array from surrounding text', () => {
    const content = 'Here are the claims:\n[{"text": "Einstein said imagination matters", "category": "quotation"}]\nDone.';
    const claims = parseExtractionResponse(content);
    expect(claims).toHaveLength(1);
    expect(claims[0].category).toBe('quotation');
  });

  it('returns an empty array for invalid or non-array JSON', () => {
    expect(parseExtractionResponse('this is not json')).toEqual([]);
    expect(parseExtractionResponse('{"text": "not an array"}')).toEqual([]);
    expect(parseExtractionResponse('[]')).toEqual([]);
  });

  it('skips entries without text and numbers the rest consecutively', () => {
    const json = JSON.stringify([
      { text: 'Valid claim', category: 'other' },
      { category: 'historical' },
      { text: '   ', category: 'other' },
      'a bare string',
      { text: 'Another valid', category: 'statistical' },
    ]);
    const claims = parseExtractionResponse(json);
    expect(claims.map(c => [c.id, c.text])).toEqual([
      ['claim-1', 'Valid claim'],
      ['claim-2', 'Another valid'],
    ]);
  });

  it('maps unknown or missing categories to other', () => {
    const json = JSON.stringify([
      { text: 'Some claim', category: 'invented-category' },
      { text: 'No category' },
      { text: 'Upper case', category: 'Statistical' },
    ]);
    expect(parseExtractionResponse(json).map(c => c.category)).toEqual(['other', 'other', 'statistical']);
  });

  it('drops empty context', () => {
    const claims = parseExtractionResponse(JSON.stringify([{ text: 'Claim', category: 'other', context: '' }]));
    expect(claims[0]).toEqual({ id: 'claim-1', text: 'Claim', category: 'other' });
  });
});

describe('LlmClaimExtractor', () => {
  it('sends the text to the model and parses the answer', async () => {
    mockCallLLM.mockResolvedValueOnce({
      content: '[{"text": "The moon is made of cheese.", "category": "scientific"}]',
      usage: { inputTokens: 10, outputTokens: 20 },
      attempts: 1,
    });

    const extractor = new LlmClaimExtractor({ model: 'mock-model' });
    const claims = await extractor.extract('The moon is made of cheese.');

    expect(claims).toEqual([{ id: 'claim-1', text: 'The moon is made of cheese.', category: 'scientific' }]);
    const call = mockCallLLM.mock.calls[0][0];
    expect(call.messages[0].content).toContain('The moon is made of cheese.');
    expect(call.temperature).toBe(0);
  });

  it('propagates model failures', async () => {
    mockCallLLM.mockRejectedValueOnce(new Error('401 Unauthorized'));
    const extractor = new LlmClaimExtractor({ model: 'mock-model' });
    await expect(extractor.extract('text')).rejects.toThrow('401 Unauthorized');
  });
});
