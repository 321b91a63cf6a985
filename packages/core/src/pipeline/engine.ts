import { EventEmitter } from 'eventemitter3';
import type { SearchRouter, UsageStatus } from '@claimcheck/search';
import { ExtractionUnavailableError, InputError } from '../errors.js';
import type { HistoryStore, LookupResult } from '../history/store.js';
import { AbortError, type RetryConfig } from '../llm/retry.js';
import {
  buildReport,
  computeCounts,
  fingerprintInput,
  reportIdFor,
  DEFAULT_RELIABILITY,
  type ReliabilityThresholds,
} from '../verification/reporter.js';
import { DEFAULT_SCORING, type ScoringConfig } from '../verification/scoring.js';
import type {
  CheckMode,
  Claim,
  ClaimExtractor,
  EvidenceJudge,
  QueryReformulator,
  Report,
  ReportCounts,
  ReportSummary,
  Verdict,
} from '../verification/types.js';
import { ClaimVerifier, type VerifierState } from '../verification/verifier.js';
import { Semaphore } from './semaphore.js';
import { selectClaimsForFastMode } from './selection.js';

// ---------------------------------------------------------------------------
// Engine event types
// ---------------------------------------------------------------------------

export interface CheckStartEvent {
  reportId: string;
  mode: CheckMode;
  textLength: number;
}

export interface CheckCachedEvent {
  report: Report;
  ageMs: number;
}

export interface ClaimsExtractedEvent {
  reportId: string;
  /** Claims the extractor returned. */
  extracted: number;
  /** Claims that will be verified (fewer in fast mode). */
  selected: Claim[];
}

export interface ClaimStateEvent {
  reportId: string;
  claimId: string;
  state: VerifierState;
}

export interface ClaimResolvedEvent {
  reportId: string;
  claim: Claim;
  verdict: Verdict;
}

export interface CheckCompleteEvent {
  report: Report;
  counts: ReportCounts;
  durationMs: number;
}

export interface EngineEvents {
  'check:start': (event: CheckStartEvent) => void;
  'check:cached': (event: CheckCachedEvent) => void;
  'claims:extracted': (event: ClaimsExtractedEvent) => void;
  'claim:state': (event: ClaimStateEvent) => void;
  'claim:resolved': (event: ClaimResolvedEvent) => void;
  'check:complete': (event: CheckCompleteEvent) => void;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface FastModeSettings {
  maxClaims: number;
  maxProviders: number;
  /** Longer input is rejected in fast mode. */
  maxTextLength: number;
}

export interface EngineSettings {
  maxConcurrentClaims: number;
  /** Per-claim deadline in ms. */
  claimTimeoutMs: number;
  /** Stored reports younger than this are returned as-is (0 disables the cache). */
  cacheTtlHours: number;
  /** Hits requested per search. */
  maxResults: number;
  fastMode: FastModeSettings;
  scoring: ScoringConfig;
  reliability: ReliabilityThresholds;
  judgeRetry?: RetryConfig;
}

export type EngineSettingsInput = Partial<Omit<EngineSettings, 'fastMode'>> & {
  fastMode?: Partial<FastModeSettings>;
};

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  maxConcurrentClaims: 4,
  claimTimeoutMs: 45_000,
  cacheTtlHours: 24,
  maxResults: 8,
  fastMode: { maxClaims: 3, maxProviders: 2, maxTextLength: 500 },
  scoring: DEFAULT_SCORING,
  reliability: DEFAULT_RELIABILITY,
};

export function resolveEngineSettings(input: EngineSettingsInput = {}): EngineSettings {
  return {
    ...DEFAULT_ENGINE_SETTINGS,
    ...input,
    fastMode: { ...DEFAULT_ENGINE_SETTINGS.fastMode, ...input.fastMode },
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export interface FactCheckEngineOptions {
  extractor: ClaimExtractor;
  judge: EvidenceJudge;
  reformulator?: QueryReformulator;
  router: SearchRouter;
  store: HistoryStore;
  settings?: EngineSettingsInput;
  /** Clock for report timestamps and cache age. */
  now?: () => Date;
}

export interface CheckOptions {
  fast?: boolean;
  signal?: AbortSignal;
}

export interface StatisticInput {
  statistic: string;
  context?: string;
  year?: number;
}

/** One in-flight run and the callers waiting on it. */
interface SharedRun {
  promise: Promise<Report>;
  controller: AbortController;
  callers: number;
  aborted: number;
}

interface RunInput {
  text: string;
  mode: CheckMode;
  fingerprint: string;
  /** Claims known up front; otherwise the extractor supplies them. */
  claims?: Claim[];
}

/**
 * Drives a fact-check: cache lookup, extraction, bounded concurrent
 * verification, aggregation and persistence. Identical concurrent checks
 * share one run.
 */
export class FactCheckEngine extends EventEmitter<EngineEvents> {
  readonly router: SearchRouter;
  readonly settings: EngineSettings;
  private readonly options: FactCheckEngineOptions;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, SharedRun>();

  constructor(options: FactCheckEngineOptions) {
    super();
    this.options = options;
    this.router = options.router;
    this.settings = resolveEngineSettings(options.settings);
    this.now = options.now ?? (() => new Date());
  }

  async check(text: string, options: CheckOptions = {}): Promise<Report> {
    if (!text.trim()) {
      throw new InputError('Text to check is empty');
    }
    const mode: CheckMode = options.fast ? 'fast' : 'full';
    const { maxTextLength } = this.settings.fastMode;
    if (mode === 'fast' && text.length > maxTextLength) {
      throw new InputError(
        `Fast mode accepts at most ${maxTextLength} characters (got ${text.length}); run a full check instead`,
      );
    }

    return this.runOnce({ text, mode, fingerprint: fingerprintInput(text, mode) }, options.signal);
  }

  /** Verify one statistic without extraction. */
  async checkStatistic(input: StatisticInput, options: Omit<CheckOptions, 'fast'> = {}): Promise<Report> {
    const statistic = input.statistic.trim();
    if (!statistic) {
      throw new InputError('Statistic to check is empty');
    }

    const text = input.year !== undefined ? `${statistic} (in ${input.year})` : statistic;
    const context = input.context?.trim();
    const claim: Claim = Object.freeze({
      id: 'claim-1',
      text,
      category: 'statistical',
      ...(context ? { context } : {}),
    });
    const fingerprint = fingerprintInput(context ? `${text}\n${context}` : text, 'statistic');

    return this.runOnce({ text, mode: 'statistic', fingerprint, claims: [claim] }, options.signal);
  }

  lookup(id: string): LookupResult {
    return this.options.store.get(id);
  }

  list(): ReportSummary[] {
    return this.options.store.list();
  }

  usage(): UsageStatus[] {
    return this.router.tracker.getStatus();
  }

  /**
   * Join the in-flight run for this input or start one. A caller's abort
   * rejects only that caller; the run itself stops once every caller
   * waiting on it has aborted.
   */
  private runOnce(input: RunInput, signal?: AbortSignal): Promise<Report> {
    if (signal?.aborted) {
      return Promise.reject(new AbortError('Fact-check aborted'));
    }

    let shared = this.inFlight.get(input.fingerprint);
    if (!shared || shared.controller.signal.aborted) {
      const controller = new AbortController();
      const run: SharedRun = {
        controller,
        callers: 0,
        aborted: 0,
        promise: this.cachedOrRun(input, controller.signal).finally(() => {
          if (this.inFlight.get(input.fingerprint) === run) this.inFlight.delete(input.fingerprint);
        }),
      };
      this.inFlight.set(input.fingerprint, run);
      shared = run;
    }

    return join(shared, signal);
  }

  private async cachedOrRun(input: RunInput, signal?: AbortSignal): Promise<Report> {
    const cached = this.freshCached(input.fingerprint);
    if (cached) return cached;
    return this.execute(input, signal);
  }

  private freshCached(fingerprint: string): Report | null {
    const ttlMs = this.settings.cacheTtlHours * 3_600_000;
    if (ttlMs <= 0) return null;

    const lookup = this.options.store.get(reportIdFor(fingerprint));
    if (!lookup.found || lookup.report.fingerprint !== fingerprint) return null;

    const ageMs = this.now().getTime() - Date.parse(lookup.report.generatedAt);
    if (ageMs >= ttlMs) return null;

    this.emit('check:cached', { report: lookup.report, ageMs });
    return lookup.report;
  }

  private async execute(input: RunInput, signal?: AbortSignal): Promise<Report> {
    const started = Date.now();
    const reportId = reportIdFor(input.fingerprint);
    this.emit('check:start', { reportId, mode: input.mode, textLength: input.text.length });

    const extracted = input.claims ?? await this.extract(input.text, signal);
    const selected = input.mode === 'fast'
      ? selectClaimsForFastMode(extracted, this.settings.fastMode.maxClaims)
      : extracted;
    this.emit('claims:extracted', { reportId, extracted: extracted.length, selected });

    const verdicts = await this.verifyAll(reportId, selected, input.mode, signal);
    if (signal?.aborted) {
      throw new AbortError('Fact-check aborted');
    }

    const report = buildReport({
      originalText: input.text,
      claims: selected,
      verdicts,
      mode: input.mode,
      fingerprint: input.fingerprint,
      generatedAt: this.now(),
      thresholds: this.settings.reliability,
    });
    this.options.store.put(report);

    this.emit('check:complete', {
      report,
      counts: computeCounts(report.verdicts),
      durationMs: Date.now() - started,
    });
    return report;
  }

  private async extract(text: string, signal?: AbortSignal): Promise<Claim[]> {
    try {
      return await this.options.extractor.extract(text, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ExtractionUnavailableError(`Claim extraction failed: ${message}`, { cause: err });
    }
  }

  /** Verdicts in claim order, at most `maxConcurrentClaims` verifying at once. */
  private verifyAll(
    reportId: string,
    claims: readonly Claim[],
    mode: CheckMode,
    signal?: AbortSignal,
  ): Promise<Verdict[]> {
    const semaphore = new Semaphore(this.settings.maxConcurrentClaims);
    // Providers found misconfigured are skipped for the rest of this run
    const misconfigured = new Set<string>();
    const searchOptions = {
      maxResults: this.settings.maxResults,
      misconfigured,
      ...(mode === 'fast' ? { maxProviders: this.settings.fastMode.maxProviders } : {}),
    };

    return Promise.all(claims.map(claim => semaphore.run(async () => {
      const verifier = new ClaimVerifier(claim, {
        search: this.router,
        judge: this.options.judge,
        reformulator: this.options.reformulator,
        scoring: this.settings.scoring,
        judgeRetry: this.settings.judgeRetry,
        searchOptions,
        onStateChange: (c, state) => this.emit('claim:state', { reportId, claimId: c.id, state }),
      });
      const verdict = await verifier.verify({ timeoutMs: this.settings.claimTimeoutMs, signal });
      this.emit('claim:resolved', { reportId, claim, verdict });
      return verdict;
    }, signal)));
  }
}

/** Wait on a shared run, rejecting early if this caller's signal fires. */
function join(shared: SharedRun, signal?: AbortSignal): Promise<Report> {
  shared.callers += 1;
  if (!signal) return shared.promise;

  return new Promise<Report>((resolve, reject) => {
    const onAbort = () => {
      shared.aborted += 1;
      if (shared.aborted === shared.callers) shared.controller.abort();
      reject(new AbortError('Fact-check aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void shared.promise.then(
      report => {
        signal.removeEventListener('abort', onAbort);
        resolve(report);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
