import type { JudgeVerdict, StructuredPayload } from "../../shared/schema.js";

export type FailureKind = "transient" | "permanent" | "validation" | "quality";

export type FailureStage = "generation" | "media" | "judge";

export interface FailureRecord {
  kind: FailureKind;
  message: string;
  attempts: number;
  stage: FailureStage;
  /** Set when a caller signal or timeout ended the run. */
  cancelled?: boolean;
}

export type FinishReason = "stop" | "length" | "other";

export interface RawResponse {
  text: string;
  model: string;
  provider: string;
  finishReason: FinishReason;
  latencyMs: number;
}

export interface ValidatedResult {
  fingerprint: string;
  model: string;
  text: string;
  /** Present only when the request declared an output schema. */
  data?: StructuredPayload;
  /** Validation attempts used to produce this result (0 for a cache hit). */
  attempts: number;
  cached: boolean;
  createdAt: number;
}

export interface CacheEntry {
  fingerprint: string;
  model: string;
  rawResponse: string;
  payload: StructuredPayload | null;
  createdAt: number;
  size: number;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: FailureRecord };

export type SubmitOutcome = Outcome<ValidatedResult>;

export type JudgeOutcome = Outcome<JudgeVerdict>;

export interface PreparedMedia {
  mimeType: string;
  /** Base64 without the data: prefix. */
  data: string;
  bytes: number;
  source: string;
  width?: number;
  height?: number;
}

export class ProviderError extends Error {
  code = "PROVIDER_ERROR";
  constructor(
    message: string,
    public readonly kind: "transient" | "permanent",
    public readonly provider: string,
    public readonly status?: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

export class MediaRejectedError extends Error {
  code = "MEDIA_REJECTED";
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = "MediaRejectedError";
  }
}

export class OutputParseError extends Error {
  code = "OUTPUT_PARSE_FAILED";
  constructor(message: string) {
    super(message);
    this.name = "OutputParseError";
  }
}

export class EngineFailureError extends Error {
  code = "ENGINE_FAILURE";
  constructor(public readonly failure: FailureRecord) {
    super(`${failure.stage} failed (${failure.kind}) after ${failure.attempts} attempt(s): ${failure.message}`);
    this.name = "EngineFailureError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new EngineFailureError(outcome.failure);
  }
  return outcome.value;
}
