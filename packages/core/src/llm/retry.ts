/**
 * Retry utility with exponential backoff.
 *
 * Used for LLM calls and for the verifier's judge loop. Search providers are
 * never retried here: the search router falls back instead.
 */

import { APICallError } from 'ai';

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/** Classifies an error for retry decision-making. */
export type ErrorCategory =
  | 'rate_limit'       // 429: backoff and retry
  | 'server_error'     // 5xx: backoff and retry
  | 'timeout'          // attempt timed out
  | 'aborted'          // caller cancelled, never retried
  | 'auth_error'       // 401/403
  | 'not_found'        // 404
  | 'json_parse'       // invalid JSON response
  | 'unknown';

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AbortError) return 'aborted';
  if (error instanceof TimeoutError) return 'timeout';

  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    const status = error.statusCode;
    if (status === 429) return 'rate_limit';
    if (status >= 500) return 'server_error';
    if (status === 401 || status === 403) return 'auth_error';
    if (status === 404) return 'not_found';
  }

  const message = error instanceof Error ? error.message : String(error);
  const lowerMsg = message.toLowerCase();

  if (error instanceof Error && error.name === 'AbortError') return 'aborted';

  if (/\b429\b/.test(message) || lowerMsg.includes('rate limit') || lowerMsg.includes('too many requests')) {
    return 'rate_limit';
  }
  if (/\b(500|502|503|529)\b/.test(message) || lowerMsg.includes('internal server error') || lowerMsg.includes('bad gateway') || lowerMsg.includes('service unavailable') || lowerMsg.includes('overloaded')) {
    return 'server_error';
  }
  if (/\b(401|403)\b/.test(message) || lowerMsg.includes('unauthorized') || lowerMsg.includes('forbidden') || lowerMsg.includes('api key')) {
    return 'auth_error';
  }
  if (/\b404\b/.test(message) || lowerMsg.includes('not found')) {
    return 'not_found';
  }
  if (lowerMsg.includes('timeout') || lowerMsg.includes('timed out')) {
    return 'timeout';
  }
  if (lowerMsg.includes('json') && (lowerMsg.includes('parse') || lowerMsg.includes('unexpected token'))) {
    return 'json_parse';
  }

  return 'unknown';
}

// ---------------------------------------------------------------------------
// Retry configuration
// ---------------------------------------------------------------------------

export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3). */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in milliseconds (default: 30000). */
  maxDelayMs?: number;
  /** Timeout per attempt in milliseconds (default: 30000). */
  timeoutMs?: number;
  /** Error categories that should be retried. */
  retryOn?: ErrorCategory[];
  abortSignal?: AbortSignal;
  /** Called before each retry with attempt info. */
  onRetry?: (attempt: number, error: Error, category: ErrorCategory, delayMs: number) => void;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'abortSignal' | 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelayMs: number;
}

/**
 * Execute a function with retry logic and exponential backoff.
 * Throws the last error once retries are exhausted or the error is not retryable.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelayMs = DEFAULT_RETRY_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_RETRY_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    timeoutMs = DEFAULT_RETRY_CONFIG.timeoutMs,
    retryOn = DEFAULT_RETRY_CONFIG.retryOn,
    abortSignal,
    onRetry,
  } = config;

  let lastError: Error | undefined;
  let totalDelayMs = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (abortSignal?.aborted) {
      throw new AbortError('Operation aborted');
    }

    try {
      const result = await withTimeout(fn(attempt), timeoutMs, abortSignal);
      return { result, attempts: attempt + 1, totalDelayMs };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const category = classifyError(err);

      if (!retryOn.includes(category)) {
        throw lastError;
      }
      if (attempt >= maxRetries) {
        break;
      }

      const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
      const jitter = baseDelay * 0.1 * Math.random();
      const delay = Math.min(baseDelay + jitter, maxDelayMs);

      const retryAfter = extractRetryAfter(lastError.message);
      const actualDelay = retryAfter ? Math.max(delay, retryAfter * 1000) : delay;

      onRetry?.(attempt + 1, lastError, category, actualDelay);

      await sleep(actualDelay, abortSignal);
      totalDelayMs += actualDelay;
    }
  }

  throw lastError ?? new Error('Retry failed with no error captured');
}

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

/** LLM calls: rate limits, 5xx and timeouts. */
export const LLM_RETRY: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 60000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

/** The verifier's loop around the evidence judge. */
export const JUDGE_RETRY: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
  timeoutMs: 20000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Wrap a promise with a timeout. Rejects with TimeoutError, or AbortError when the signal fires. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<T> {
  const noTimer = timeoutMs <= 0 || timeoutMs === Infinity;
  if (noTimer && !abortSignal) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = noTimer
      ? undefined
      : setTimeout(() => {
        abortSignal?.removeEventListener('abort', onAbort);
        reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
      }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted'));
    };
    if (abortSignal?.aborted) {
      onAbort();
    } else {
      abortSignal?.addEventListener('abort', onAbort, { once: true });
    }

    // Settling after a timeout or abort is a no-op, but keeps late rejections handled
    promise.then(
      (value) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Sleep for the given milliseconds, respecting abort signal. */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new AbortError('Operation aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted during retry delay'));
    };
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Retry-After hint (seconds) embedded in an error message. */
function extractRetryAfter(message: string): number | undefined {
  const match = message.match(/retry.?after[:\s]+(\d+)/i);
  if (match) return parseInt(match[1], 10);
  return undefined;
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}
