/**
 * Provider failure taxonomy.
 *
 * Every adapter failure is reported as one of four kinds. The router treats
 * `rate_limited` and `unreachable` as transient (fall back, count a failure)
 * and `unauthorized` and `malformed` as misconfiguration (skip the provider
 * for the rest of the run).
 */

export type ProviderErrorKind =
  | 'rate_limited'   // 429, or the backend says so in its body
  | 'unauthorized'   // 401/403, missing or rejected key
  | 'unreachable'    // network failure, timeout, 5xx
  | 'malformed';     // unexpected status or a body we cannot parse

export class ProviderError extends Error {
  readonly providerId: string;
  readonly kind: ProviderErrorKind;
  readonly status?: number;

  constructor(providerId: string, kind: ProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.providerId = providerId;
    this.kind = kind;
    this.status = status;
  }

  /** True for failures worth trying again later (rate limits, outages). */
  get transient(): boolean {
    return this.kind === 'rate_limited' || this.kind === 'unreachable';
  }
}

/** Map an HTTP status to a provider error kind. Only called for non-2xx responses. */
export function classifyStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'unauthorized';
  if (status === 429) return 'rate_limited';
  if (status >= 500 && status <= 599) return 'unreachable';
  return 'malformed';
}

/**
 * Convert anything thrown during a provider call into a ProviderError.
 * Network-level failures (DNS, reset, timeout, abort) become `unreachable`.
 */
export function toProviderError(providerId: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(providerId, 'unreachable', `${providerId}: ${message}`);
}
