/**
 * Single-shot HTTP helper for search adapters.
 *
 * Unlike a retrying fetch, this makes exactly one request: fallback and
 * failure accounting belong to the router. Every failure is normalised into
 * a ProviderError so adapters only deal with the happy path.
 */

import type { z } from 'zod';
import { ProviderError, classifyStatus, toProviderError } from './errors.js';

/** Default per-call timeout in ms. */
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface ProviderFetchOptions {
  /** Per-call timeout in ms (default: 10000). */
  timeoutMs?: number;
  /** Caller's abort signal (claim deadline, shutdown). */
  signal?: AbortSignal;
}

/**
 * Fetch a provider URL once. Resolves with the response only for 2xx statuses.
 */
export async function fetchProvider(
  providerId: string,
  url: string,
  init: RequestInit,
  options: ProviderFetchOptions = {},
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const outer = options.signal;

  if (outer?.aborted) {
    throw new ProviderError(providerId, 'unreachable', `${providerId}: request aborted before dispatch`);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  outer?.addEventListener('abort', onAbort, { once: true });

  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    if (timedOut) {
      throw new ProviderError(providerId, 'unreachable', `${providerId}: timed out after ${timeoutMs}ms`);
    }
    throw toProviderError(providerId, err);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onAbort);
  }

  if (!response.ok) {
    const status = response.status;
    throw new ProviderError(
      providerId,
      classifyStatus(status),
      `${providerId}: HTTP ${status} ${response.statusText ?? ''}`.trim(),
      status,
    );
  }

  return response;
}

/**
 * Read a JSON body and validate it against a zod schema.
 * Unparseable or unexpected bodies are `malformed`.
 */
export async function readJson<S extends z.ZodTypeAny>(
  providerId: string,
  response: Response,
  schema: S,
): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new ProviderError(providerId, 'malformed', `${providerId}: response body is not valid JSON`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i: z.ZodIssue) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join(', ');
    throw new ProviderError(providerId, 'malformed', `${providerId}: unexpected response shape (${issues})`);
  }
  return parsed.data;
}

/** Read a text body, mapping read failures to `unreachable`. */
export async function readText(providerId: string, response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw toProviderError(providerId, err);
  }
}
