import { z } from 'zod';
import type { ProviderId } from '../llm/providers.js';

const secretSchema = z.string().min(1);

const providerConfigSchema = z.object({
  api_key: secretSchema.optional(),
  default_model: z.string().optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const defaultsSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'google']).optional(),
  model: z.string().optional(),
}).strict();

const quotaLimit = z.number().int().positive();

const searchSchema = z.object({
  serper: z.object({
    api_key: secretSchema.optional(),
    monthly_limit: quotaLimit.optional(),
  }).strict().optional(),
  searxng: z.object({
    instances: z.array(z.string().url()).optional(),
    daily_limit: quotaLimit.optional(),
  }).strict().optional(),
  brave: z.object({
    api_key: secretSchema.optional(),
    daily_limit: quotaLimit.optional(),
  }).strict().optional(),
  scraper: z.object({
    enabled: z.boolean().optional(),
  }).strict().optional(),
  timeout_ms: z.number().int().positive().optional(),
  max_results: z.number().int().min(1).max(20).optional(),
  usage_file: z.string().optional(),
}).strict();

const verificationSchema = z.object({
  max_concurrent_claims: z.number().int().min(1).max(32).optional(),
  claim_timeout_ms: z.number().int().positive().optional(),
  reformulate: z.boolean().optional(),
  model: z.string().optional(),
}).strict();

const ratio = z.number().min(0).max(1);

const scoringSchema = z.object({
  base: ratio.optional(),
  per_source: ratio.optional(),
  per_domain: ratio.optional(),
  single_domain_cap: ratio.optional(),
  max_sources: z.number().int().min(1).optional(),
}).strict();

const reliabilitySchema = z.object({
  high_verified_ratio: ratio.optional(),
  low_false_ratio: ratio.optional(),
}).strict();

const fastModeSchema = z.object({
  max_claims: z.number().int().min(1).optional(),
  max_providers: z.number().int().min(1).optional(),
  max_text_length: z.number().int().positive().optional(),
}).strict();

const historySchema = z.object({
  dir: z.string().optional(),
  cache_ttl_hours: z.number().min(0).optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  defaults: defaultsSchema.optional(),
  search: searchSchema.optional(),
  verification: verificationSchema.optional(),
  scoring: scoringSchema.optional(),
  reliability: reliabilitySchema.optional(),
  fast_mode: fastModeSchema.optional(),
  history: historySchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface ResolvedProviderConfig {
  api_key?: string;
  default_model: string;
}

export interface SearchConfig {
  serper: { api_key?: string; monthly_limit: number };
  searxng: { instances: string[]; daily_limit: number };
  brave: { api_key?: string; daily_limit: number };
  scraper: { enabled: boolean };
  timeout_ms: number;
  max_results: number;
  /** Where usage counters persist between runs. */
  usage_file: string;
}

export interface Config {
  providers: Record<ProviderId, ResolvedProviderConfig>;
  defaults: {
    provider: ProviderId;
    model: string;
  };
  search: SearchConfig;
  verification: {
    max_concurrent_claims: number;
    claim_timeout_ms: number;
    reformulate: boolean;
    /** Model for extraction and judging; defaults.model when unset. */
    model?: string;
  };
  scoring: {
    base: number;
    per_source: number;
    per_domain: number;
    single_domain_cap: number;
    max_sources: number;
  };
  reliability: {
    high_verified_ratio: number;
    low_false_ratio: number;
  };
  fast_mode: {
    max_claims: number;
    max_providers: number;
    max_text_length: number;
  };
  history: {
    dir: string;
    cache_ttl_hours: number;
  };
}

export const ConfigDefaults: Config = {
  providers: {
    anthropic: { default_model: 'claude-sonnet-4-20250514' },
    openai: { default_model: 'gpt-4o-mini' },
    google: { default_model: 'gemini-2.5-flash' },
  },
  defaults: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
  },
  search: {
    serper: { monthly_limit: 2500 },
    searxng: { instances: [], daily_limit: 100 },
    brave: { daily_limit: 66 },
    scraper: { enabled: true },
    timeout_ms: 10000,
    max_results: 8,
    usage_file: '~/.claimcheck/usage.json',
  },
  verification: {
    max_concurrent_claims: 4,
    claim_timeout_ms: 45000,
    reformulate: true,
  },
  scoring: {
    base: 0.5,
    per_source: 0.1,
    per_domain: 0.1,
    single_domain_cap: 0.7,
    max_sources: 5,
  },
  reliability: {
    high_verified_ratio: 0.7,
    low_false_ratio: 0.3,
  },
  fast_mode: {
    max_claims: 3,
    max_providers: 2,
    max_text_length: 500,
  },
  history: {
    dir: '~/.claimcheck/history',
    cache_ttl_hours: 24,
  },
};

export { ConfigSchema };
