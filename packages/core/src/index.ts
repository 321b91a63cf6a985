export {
  CLAIM_CATEGORIES,
  type Claim,
  type ClaimCategory,
  type Verdict,
  type VerdictStatus,
  type Report,
  type ReportCounts,
  type ReportSummary,
  type Reliability,
  type CheckMode,
  type ClaimExtractor,
  type EvidenceJudge,
  type JudgeVerdict,
  type QueryReformulator,
} from './verification/types.js';

export { ExtractionUnavailableError, InputError, ReportIntegrityError } from './errors.js';

export { LlmClaimExtractor, parseExtractionResponse, type LlmClaimExtractorOptions } from './verification/extractor.js';
export { LlmEvidenceJudge, formatJudgePrompt, parseJudgeResponse, type LlmEvidenceJudgeOptions } from './verification/judge.js';
export { LlmQueryReformulator, cleanQuery, type LlmQueryReformulatorOptions } from './verification/reformulator.js';

export {
  scoreConfidence,
  collectSources,
  countDomains,
  hostOf,
  DEFAULT_SCORING,
  type ScoringConfig,
} from './verification/scoring.js';

export {
  ClaimVerifier,
  IllegalTransitionError,
  type VerifierState,
  type VerifierOptions,
  type VerifyOptions,
  type EvidenceSearch,
} from './verification/verifier.js';

export {
  buildReport,
  computeCounts,
  reportCounts,
  gradeReliability,
  fingerprintInput,
  reportIdFor,
  summarizeReport,
  freezeReport,
  DEFAULT_RELIABILITY,
  type ReliabilityThresholds,
  type BuildReportInput,
} from './verification/reporter.js';

export { FileHistoryStore, MemoryHistoryStore, type HistoryStore, type LookupResult } from './history/store.js';

export {
  FactCheckEngine,
  DEFAULT_ENGINE_SETTINGS,
  resolveEngineSettings,
  type EngineSettings,
  type EngineSettingsInput,
  type FastModeSettings,
  type FactCheckEngineOptions,
  type CheckOptions,
  type StatisticInput,
  type EngineEvents,
  type CheckStartEvent,
  type CheckCachedEvent,
  type ClaimsExtractedEvent,
  type ClaimStateEvent,
  type ClaimResolvedEvent,
  type CheckCompleteEvent,
} from './pipeline/engine.js';

export { Semaphore } from './pipeline/semaphore.js';
export { selectClaimsForFastMode, FAST_MODE_PRIORITY } from './pipeline/selection.js';

export {
  withRetry,
  withTimeout,
  classifyError,
  sleep,
  TimeoutError,
  AbortError,
  LLM_RETRY,
  JUDGE_RETRY,
  type RetryConfig,
  type RetryResult,
  type ErrorCategory,
} from './llm/retry.js';

export { callLLM, stripCodeFence, type LLMCallOptions, type LLMResponse } from './llm/call.js';

export {
  ProviderRegistry,
  DEFAULT_MODELS,
  detectProvider,
  remapModelForProvider,
  hasAnyProvider,
  type ProviderId,
  type ProviderConfig,
} from './llm/providers.js';

export {
  ConfigSchema,
  ConfigDefaults,
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  expandTilde,
  ConfigError,
  type Config,
  type RawConfig,
  type SearchConfig,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './config/index.js';

export { attachConsoleReporter, type ConsoleReporterOptions } from './output/console.js';

export {
  createFactChecker,
  engineSettingsFrom,
  providerConfigFrom,
  searchProvidersFrom,
  type FactCheckerOverrides,
} from './factory.js';
