import { describe, it, expect, vi } from 'vitest';
import { APICallError } from 'ai';
import {
  classifyError,
  withRetry,
  withTimeout,
  sleep,
  TimeoutError,
  AbortError,
} from './retry.js';

function apiError(statusCode: number): APICallError {
  return new APICallError({
    message: 'request failed',
    url: 'https://api.example.com/v1/messages',
    requestBodyValues: {},
    statusCode,
  });
}

describe('classifyError', () => {
  it('uses the status code of API call errors', () => {
    expect(classifyError(apiError(429))).toBe('rate_limit');
    expect(classifyError(apiError(529))).toBe('server_error');
    expect(classifyError(apiError(401))).toBe('auth_error');
    expect(classifyError(apiError(404))).toBe('not_found');
  });

  it('classifies by message for plain errors', () => {
    expect(classifyError(new Error('HTTP 429 Too Many Requests'))).toBe('rate_limit');
    expect(classifyError(new Error('502 Bad Gateway'))).toBe('server_error');
    expect(classifyError(new Error('Overloaded'))).toBe('server_error');
    expect(classifyError(new Error('Invalid API key'))).toBe('auth_error');
    expect(classifyError(new Error('request timed out'))).toBe('timeout');
    expect(classifyError(new Error('JSON parse error: unexpected token'))).toBe('json_parse');
    expect(classifyError(new Error('something odd'))).toBe('unknown');
  });

  it('never treats cancellation as retryable', () => {
    expect(classifyError(new AbortError('Operation aborted'))).toBe('aborted');
    const domAbort = new Error('This operation was aborted');
    domAbort.name = 'AbortError';
    expect(classifyError(domAbort)).toBe('aborted');
  });

  it('classifies TimeoutError', () => {
    expect(classifyError(new TimeoutError('Operation timed out after 5ms'))).toBe('timeout');
  });
});

describe('withRetry', () => {
  it('returns on first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const result = await withRetry(fn);
    expect(result).toEqual({ result: 'ok', attempts: 1, totalDelayMs: 0 });
  });

  it('retries retryable errors with backoff', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('429 rate limit'))
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { initialDelayMs: 1, maxDelayMs: 5, onRetry });

    expect(result.result).toBe('done');
    expect(result.attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][2]).toBe('rate_limit');
    expect(onRetry.mock.calls[1][2]).toBe('server_error');
  });

  it('does not retry non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('401 Unauthorized'));
    await expect(withRetry(fn, { initialDelayMs: 1 })).rejects.toThrow('401 Unauthorized');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('500 Internal Server Error'));
    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1 })).rejects.toThrow('500');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('times out slow attempts and retries them', async () => {
    const fn = vi.fn()
      .mockImplementationOnce(() => new Promise(resolve => setTimeout(() => resolve('late'), 200)))
      .mockResolvedValueOnce('fast');

    const result = await withRetry(fn, { timeoutMs: 10, initialDelayMs: 1 });
    expect(result.result).toBe('fast');
    expect(result.attempts).toBe(2);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('never');
    await expect(withRetry(fn, { abortSignal: controller.signal })).rejects.toBeInstanceOf(AbortError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('withTimeout', () => {
  it('resolves before the deadline', async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
  });

  it('rejects with TimeoutError after the deadline', async () => {
    const slow = new Promise(resolve => setTimeout(resolve, 200));
    await expect(withTimeout(slow, 10)).rejects.toThrow('Operation timed out after 10ms');
  });

  it('rejects with AbortError when the signal fires', async () => {
    const controller = new AbortController();
    const pending = withTimeout(new Promise(() => undefined), 1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(withTimeout(Promise.resolve(1), 1000, controller.signal)).rejects.toBeInstanceOf(AbortError);
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('Operation aborted during retry delay');
  });
});
