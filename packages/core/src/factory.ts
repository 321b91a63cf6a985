import type { LanguageModel } from 'ai';
import {
  SearchRouter,
  UsageTracker,
  createSearchProviders,
  type RegisteredProvider,
} from '@claimcheck/search';
import { ConfigError, expandTilde } from './config/loader.js';
import type { Config } from './config/schema.js';
import { FileHistoryStore, type HistoryStore } from './history/store.js';
import { ProviderRegistry, hasAnyProvider, type ProviderConfig } from './llm/providers.js';
import { FactCheckEngine, type EngineSettingsInput } from './pipeline/engine.js';
import { LlmClaimExtractor } from './verification/extractor.js';
import { LlmEvidenceJudge } from './verification/judge.js';
import { LlmQueryReformulator } from './verification/reformulator.js';
import type { ClaimExtractor, EvidenceJudge, QueryReformulator } from './verification/types.js';

export interface FactCheckerOverrides {
  extractor?: ClaimExtractor;
  judge?: EvidenceJudge;
  reformulator?: QueryReformulator;
  /** Replaces the provider chain built from `config.search`. */
  providers?: RegisteredProvider[];
  store?: HistoryStore;
  /** Usage counter file; null keeps counters in memory. */
  usageStatePath?: string | null;
  now?: () => Date;
}

export function providerConfigFrom(config: Config): ProviderConfig {
  return {
    providers: {
      anthropic: { apiKey: config.providers.anthropic.api_key },
      openai: { apiKey: config.providers.openai.api_key },
      google: { apiKey: config.providers.google.api_key },
    },
  };
}

export function engineSettingsFrom(config: Config): EngineSettingsInput {
  return {
    maxConcurrentClaims: config.verification.max_concurrent_claims,
    claimTimeoutMs: config.verification.claim_timeout_ms,
    cacheTtlHours: config.history.cache_ttl_hours,
    maxResults: config.search.max_results,
    fastMode: {
      maxClaims: config.fast_mode.max_claims,
      maxProviders: config.fast_mode.max_providers,
      maxTextLength: config.fast_mode.max_text_length,
    },
    scoring: {
      base: config.scoring.base,
      perSource: config.scoring.per_source,
      perDomain: config.scoring.per_domain,
      singleDomainCap: config.scoring.single_domain_cap,
      maxSources: config.scoring.max_sources,
    },
    reliability: {
      highVerifiedRatio: config.reliability.high_verified_ratio,
      lowFalseRatio: config.reliability.low_false_ratio,
    },
  };
}

/** Search providers in priority order, from `config.search`. */
export function searchProvidersFrom(config: Config): RegisteredProvider[] {
  const { search } = config;
  return createSearchProviders({
    serper: { apiKey: search.serper.api_key, monthlyLimit: search.serper.monthly_limit },
    searxng: { instances: search.searxng.instances, dailyLimit: search.searxng.daily_limit },
    brave: { apiKey: search.brave.api_key, dailyLimit: search.brave.daily_limit },
    scraper: { enabled: search.scraper.enabled },
    timeoutMs: search.timeout_ms,
  });
}

/**
 * Wire a FactCheckEngine from configuration: LLM-backed collaborators,
 * the search provider chain with persisted usage counters, and the file
 * history store.
 */
export function createFactChecker(config: Config, overrides: FactCheckerOverrides = {}): FactCheckEngine {
  let model: LanguageModel | undefined;
  const getModel = (): LanguageModel => {
    if (model) return model;
    const providerConfig = providerConfigFrom(config);
    if (!hasAnyProvider(providerConfig)) {
      throw new ConfigError(
        'No LLM provider configured. Set ANTHROPIC_API_KEY, OPENAI_API_KEY or GEMINI_API_KEY, '
        + 'or add an api_key under providers in ~/.claimcheck/config.yaml',
      );
    }
    const registry = new ProviderRegistry(providerConfig);
    model = registry.getModel(registry.remapModel(config.verification.model ?? config.defaults.model));
    return model;
  };

  const extractor = overrides.extractor ?? new LlmClaimExtractor({ model: getModel() });
  const judge = overrides.judge ?? new LlmEvidenceJudge({ model: getModel() });
  const reformulator = config.verification.reformulate
    ? overrides.reformulator ?? new LlmQueryReformulator({ model: getModel() })
    : undefined;

  const usageStatePath = overrides.usageStatePath === undefined
    ? expandTilde(config.search.usage_file)
    : overrides.usageStatePath;
  const tracker = new UsageTracker(usageStatePath ? { statePath: usageStatePath } : {});
  const router = new SearchRouter({
    providers: overrides.providers ?? searchProvidersFrom(config),
    tracker,
    maxResults: config.search.max_results,
  });

  return new FactCheckEngine({
    extractor,
    judge,
    reformulator,
    router,
    store: overrides.store ?? new FileHistoryStore(expandTilde(config.history.dir)),
    settings: engineSettingsFrom(config),
    now: overrides.now,
  });
}
