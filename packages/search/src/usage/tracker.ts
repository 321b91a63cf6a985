/**
 * Per-provider quota accounting.
 *
 * Quota is reserved before a provider is called, never after it answers, so
 * a burst of concurrent searches cannot overshoot a limit while requests are
 * in flight. `tryReserve` is synchronous: the check and the increment happen
 * in one turn of the event loop, which makes each provider's reservation an
 * indivisible critical section without a global lock. Windows reset lazily by
 * comparing wall-clock time on every reservation, so an idle process picks up
 * a new day or month correctly.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import type { QuotaRule, QuotaWindow } from '../types.js';

export interface QuotaState {
  windowStart: number;
  callsMade: number;
  failures: number;
  limit: number;
  window: QuotaWindow;
}

export interface UsageStatus {
  providerId: string;
  used: number;
  /** Null for unmetered providers. */
  remaining: number | null;
  limit: number | null;
  failures: number;
  windowStart: string;
  /** Null for unmetered providers. */
  windowEnd: string | null;
}

export interface UsageTrackerOptions {
  /** JSON file to persist counters to. In-memory only when omitted. */
  statePath?: string;
  /** Clock override for tests. */
  now?: () => number;
}

export interface UsageTrackerEvents {
  'quota:exhausted': (providerId: string) => void;
  'persist:error': (error: Error) => void;
}

const PersistedFile = z.record(z.string(), z.object({
  windowStart: z.number(),
  callsMade: z.number().int().min(0),
  failures: z.number().int().min(0).default(0),
}));

type PersistedEntry = z.infer<typeof PersistedFile>[string];

const UNMETERED: QuotaRule = { limit: Number.POSITIVE_INFINITY, window: 'day' };

export class UsageTracker extends EventEmitter<UsageTrackerEvents> {
  private readonly states = new Map<string, QuotaState>();
  private readonly persisted: Record<string, PersistedEntry>;
  private readonly statePath?: string;
  private readonly now: () => number;

  constructor(options: UsageTrackerOptions = {}) {
    super();
    this.statePath = options.statePath;
    this.now = options.now ?? Date.now;
    this.persisted = this.statePath ? loadPersisted(this.statePath) : {};
  }

  /** Register (or re-register) a provider's quota rule, keeping persisted counts. */
  register(providerId: string, rule: QuotaRule): void {
    const now = this.now();
    const saved = this.persisted[providerId];
    this.states.set(providerId, {
      windowStart: saved?.windowStart ?? windowStartFor(rule.window, now),
      callsMade: saved?.callsMade ?? 0,
      failures: saved?.failures ?? 0,
      limit: rule.limit,
      window: rule.window,
    });
    this.resetIfExpired(providerId);
  }

  /**
   * Check the provider's quota and, if there is room, count one call.
   * Returns false without side effects when the window's limit is reached.
   */
  tryReserve(providerId: string): boolean {
    const state = this.stateFor(providerId);
    this.resetIfExpired(providerId);

    if (state.callsMade >= state.limit) {
      this.emit('quota:exhausted', providerId);
      return false;
    }

    state.callsMade++;
    this.persist();
    return true;
  }

  /** Record a failed call. Failures do not count against quota. */
  recordFailure(providerId: string): void {
    const state = this.stateFor(providerId);
    state.failures++;
    this.persist();
  }

  /** Start a fresh window if the current one has ended. Returns true on reset. */
  resetIfExpired(providerId: string): boolean {
    const state = this.stateFor(providerId);
    const now = this.now();
    if (!windowExpired(state, now)) return false;

    state.windowStart = windowStartFor(state.window, now);
    state.callsMade = 0;
    state.failures = 0;
    return true;
  }

  /** Snapshot of a provider's quota state (a copy). */
  getState(providerId: string): QuotaState {
    this.resetIfExpired(providerId);
    return { ...this.stateFor(providerId) };
  }

  getStatus(): UsageStatus[] {
    return [...this.states.keys()].map(id => {
      const state = this.getState(id);
      const metered = Number.isFinite(state.limit);
      return {
        providerId: id,
        used: state.callsMade,
        remaining: metered ? Math.max(0, state.limit - state.callsMade) : null,
        limit: metered ? state.limit : null,
        failures: state.failures,
        windowStart: new Date(state.windowStart).toISOString(),
        windowEnd: metered ? new Date(windowEndFor(state)).toISOString() : null,
      };
    });
  }

  private stateFor(providerId: string): QuotaState {
    let state = this.states.get(providerId);
    if (!state) {
      this.register(providerId, UNMETERED);
      state = this.states.get(providerId);
    }
    if (!state) {
      throw new Error(`Usage state missing for provider: ${providerId}`);
    }
    return state;
  }

  private persist(): void {
    if (!this.statePath) return;

    const snapshot: Record<string, PersistedEntry> = { ...this.persisted };
    for (const [id, state] of this.states) {
      snapshot[id] = { windowStart: state.windowStart, callsMade: state.callsMade, failures: state.failures };
    }

    try {
      const dir = dirname(this.statePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      const tmpPath = `${this.statePath}.tmp`;
      writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
      renameSync(tmpPath, this.statePath);
    } catch (err) {
      this.emit('persist:error', err instanceof Error ? err : new Error(String(err)));
    }
  }
}

// ---------------------------------------------------------------------------
// Window arithmetic (UTC calendar for 'day' and 'month')
// ---------------------------------------------------------------------------

export function windowStartFor(window: QuotaWindow, now: number): number {
  const date = new Date(now);
  if (window === 'day') {
    return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  }
  if (window === 'month') {
    return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1);
  }
  return now;
}

function windowEndFor(state: QuotaState): number {
  const start = new Date(state.windowStart);
  if (state.window === 'day') {
    return Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate() + 1);
  }
  if (state.window === 'month') {
    return Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1);
  }
  return state.windowStart + state.window.durationMs;
}

function windowExpired(state: QuotaState, now: number): boolean {
  return now >= windowEndFor(state);
}

function loadPersisted(path: string): Record<string, PersistedEntry> {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    // Corrupt file: start with fresh counters
    return {};
  }

  const parsed = PersistedFile.safeParse(raw);
  return parsed.success ? parsed.data : {};
}
