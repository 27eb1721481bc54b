/**
 * Generation Engine - Main Entry Point
 *
 * Re-exports the caller-facing surface. The implementation lives in
 * smaller modules under server/ai/
 *
 * Structure:
 * - server/ai/engine.ts - submit / evaluate facade, in-flight coalescing
 * - server/ai/cache-store.ts - SQLite result cache keyed by fingerprint
 * - server/ai/media.ts - Image preprocessing
 * - server/ai/providers/ - Backend registry, invoker and transports
 * - server/ai/retry.ts - Retry/backoff state machine
 * - server/ai/validator.ts - Structured output and quality checks
 * - server/ai/judge.ts - Response scoring against a reference
 */

export * from "./ai/index.js";

export { loadConfig, describeMissingCredentials, ConfigError } from "./config.js";
export type { EngineConfig } from "./config.js";

export { getMetrics, resetMetrics } from "./metrics.js";
export type { Metrics } from "./metrics.js";

export {
  engineRequestSchema,
  outputSchemaSchema,
  judgeInputSchema,
  judgeVerdictSchema,
} from "../shared/schema.js";
export type {
  EngineRequest,
  EngineRequestInput,
  FieldSpec,
  FieldType,
  GenerationParams,
  JudgeInput,
  JudgeVerdict,
  MediaReference,
  OutputSchema,
  PromptMessage,
  StructuredPayload,
} from "../shared/schema.js";
