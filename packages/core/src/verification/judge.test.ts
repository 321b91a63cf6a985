import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseJudgeResponse, formatJudgePrompt, LlmEvidenceJudge } from './judge.js';

vi.mock('../llm/call.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../llm/call.js')>()),
  callLLM: vi.fn(),
}));

import { callLLM } from '../llm/call.js';

const mockCallLLM = vi.mocked(callLLM);

beforeEach(() => {
  vi.clearAllMocks();
});

const evidence = [
  { title: 'Eiffel Tower', url: 'https://example.org/eiffel', snippet: 'The tower is 330 m tall.' },
  { title: 'Paris', url: 'https://travel.example.com/paris', snippet: 'x'.repeat(20) },
];

describe('parseJudgeResponse', () => {
  it('reads the verdict from a JSON object', () => {
    expect(parseJudgeResponse('{"verdict": "corroborates", "reason": "Matches"}')).toBe('corroborates');
    expect(parseJudgeResponse('```json\n{"verdict": "contradicts"}\n```')).toBe('contradicts');
    expect(parseJudgeResponse('Answer: {"verdict": "inconclusive"}')).toBe('inconclusive');
  });

  it('accepts bare keywords', () => {
    expect(parseJudgeResponse('CORROBORATES')).toBe('corroborates');
    expect(parseJudgeResponse('contradicts')).toBe('contradicts');
    expect(parseJudgeResponse(' Inconclusive.\n')).toBe('inconclusive');
  });

  it('never reads negated or mixed prose as a verdict', () => {
    expect(parseJudgeResponse('The results do not support the claim.')).toBe('inconclusive');
    expect(parseJudgeResponse('The sources do not confirm this.')).toBe('inconclusive');
    expect(parseJudgeResponse('{"verdict": "not supported"}')).toBe('inconclusive');
    expect(parseJudgeResponse('{"verdict": "does not confirm"}')).toBe('inconclusive');
    expect(parseJudgeResponse('corroborates: sources show the rumour it is false was wrong')).toBe('inconclusive');
    expect(parseJudgeResponse('The sources refute it.')).toBe('inconclusive');
  });

  it('trims and lower-cases the JSON verdict', () => {
    expect(parseJudgeResponse('{"verdict": " Contradicts ", "reason": "The claim is false"}')).toBe('contradicts');
  });

  it('falls back to inconclusive', () => {
    expect(parseJudgeResponse('')).toBe('inconclusive');
    expect(parseJudgeResponse('I cannot tell')).toBe('inconclusive');
    expect(parseJudgeResponse('{"verdict": 3}')).toBe('inconclusive');
  });
});

describe('formatJudgePrompt', () => {
  it('numbers results and truncates long snippets', () => {
    expect(formatJudgePrompt('Claim text', evidence, 10)).toBe([
      'Claim: Claim text',
      '',
      'Search results:',
      '',
      '[1] Eiffel Tower',
      'https://example.org/eiffel',
      'The tower ...',
      '',
      '[2] Paris',
      'https://travel.example.com/paris',
      'xxxxxxxxxx...',
    ].join('\n'));
  });
});

describe('LlmEvidenceJudge', () => {
  it('makes a single attempt and parses the verdict', async () => {
    mockCallLLM.mockResolvedValueOnce({
      content: '{"verdict": "corroborates"}',
      usage: { inputTokens: 1, outputTokens: 1 },
      attempts: 1,
    });

    const judge = new LlmEvidenceJudge({ model: 'mock-model' });
    expect(await judge.judge('The Eiffel Tower is 330 meters tall.', evidence)).toBe('corroborates');
    expect(mockCallLLM.mock.calls[0][0].retry).toEqual({ maxRetries: 0 });
  });
});
