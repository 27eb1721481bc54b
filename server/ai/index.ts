export { GenerationEngine, createEngine } from "./engine.js";
export type { SubmitOptions, EvaluateOptions, EngineDependencies, CreateEngineOptions } from "./engine.js";

export { CacheStore, entrySize } from "./cache-store.js";
export type { CacheStoreOptions, CacheWrite, ResultCache } from "./cache-store.js";

export { MediaPreprocessor, extractBase64 } from "./media.js";
export type { MediaOptions } from "./media.js";

export { RetryController, backoffDelay, configuredDelay, timerScheduler } from "./retry.js";
export type { BackoffPolicy, RetryControllerOptions, RetryOutcome, RetryState, Scheduler } from "./retry.js";

export { StructuredOutputValidator, assessQuality } from "./validator.js";
export type { GenerateOnce, ValidatedOutput, ValidationVerdict, ValidatorOptions } from "./validator.js";

export { ResponseJudge, JUDGE_OUTPUT_SCHEMA, lexicalOverlap } from "./judge.js";
export type { JudgeOptions } from "./judge.js";

export {
  ProviderRegistry,
  ProviderInvoker,
  createDefaultRegistry,
  OpenAITransport,
  GeminiTransport,
  AnthropicTransport,
  errorFromStatus,
  parseRetryAfterMs,
  parseRetryDelayMs,
} from "./providers/index.js";
export type { InvokerOptions, ProviderCall, ProviderTransport, ResolvedProvider, TransportReply } from "./providers/index.js";

export { CircuitBreaker, CircuitBreakerRegistry, CircuitOpenError } from "./circuit-breaker.js";
export type { CircuitConfig, CircuitSnapshot, CircuitState } from "./circuit-breaker.js";

export { fingerprint, canonicalRequest, canonicalJson, normalizeText } from "./fingerprint.js";
export { compileOutputSchema, renderSchemaInstructions } from "./output-schema.js";
export { extractJsonObject } from "./parsers.js";
export { withDeadline, retryingGenerator } from "./pipeline.js";
export type { CallOptions } from "./pipeline.js";
export { getGemini, getOpenAI, getAnthropic, getPerplexity, getOpenAICompatible, resetClients } from "./clients.js";

export {
  ProviderError,
  MediaRejectedError,
  OutputParseError,
  EngineFailureError,
  unwrapOutcome,
} from "./types.js";
export type {
  FailureKind,
  FailureStage,
  FailureRecord,
  FinishReason,
  RawResponse,
  ValidatedResult,
  CacheEntry,
  Outcome,
  SubmitOutcome,
  JudgeOutcome,
  PreparedMedia,
} from "./types.js";
