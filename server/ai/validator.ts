import logger from "../logger.js";
import { metrics } from "../metrics.js";
import type { EngineRequest, FieldSpec, JsonValue, OutputSchema, StructuredPayload } from "../../shared/schema.js";
import { DEFAULT_MIN_CONTENT_LENGTH, DEFAULT_VALIDATION_ATTEMPTS } from "./constants.js";
import { compileOutputSchema } from "./output-schema.js";
import { extractJsonObject, isPlainObject } from "./parsers.js";
import { buildCorrectionMessages } from "./prompts.js";
import { OutputParseError, type FailureStage, type Outcome, type RawResponse } from "./types.js";

const PLACEHOLDER_PATTERNS: Array<{ pattern: RegExp; label: string }> = [
  { pattern: /lorem ipsum/i, label: "lorem ipsum filler" },
  { pattern: /\[(?:insert|placeholder|your)[^\]]*\]/i, label: "bracketed placeholder" },
  { pattern: /<(?:insert|placeholder)[^>]*>/i, label: "bracketed placeholder" },
  { pattern: /\bTBD\b/, label: "TBD marker" },
  { pattern: /as an ai language model/i, label: "refusal boilerplate" },
];

const TRAILING_ELLIPSIS = /(?:\.\.\.|\u2026)$/;

export interface ValidatedOutput {
  text: string;
  data?: StructuredPayload;
  raw: RawResponse;
  /** Validation attempts used, including the accepted one. */
  attempts: number;
}

/** One retry-driven generation for the given (possibly amended) request. */
export type GenerateOnce = (request: EngineRequest) => Promise<Outcome<RawResponse>>;

export interface ValidatorOptions {
  maxAttempts?: number;
  minContentLength?: number;
  stage?: FailureStage;
  /** Reject filler and refusal markers. Off for outputs that may quote the text they assess. */
  rejectPlaceholders?: boolean;
}

export type ValidationVerdict =
  | { ok: true; text: string; data?: StructuredPayload }
  | { ok: false; kind: "validation" | "quality"; problem: string };

function collectStrings(value: JsonValue, out: string[]): void {
  if (typeof value === "string") {
    out.push(value);
  } else if (Array.isArray(value)) {
    value.forEach((item) => collectStrings(item, out));
  } else if (value !== null && typeof value === "object") {
    Object.values(value).forEach((item) => collectStrings(item, out));
  } else if (value !== null) {
    out.push(String(value));
  }
}

function findEmptyRequiredString(fields: FieldSpec[], payload: Record<string, unknown>, prefix = ""): string | undefined {
  for (const field of fields) {
    if (field.required === false) continue;
    const value = payload[field.name];
    const pathName = `${prefix}${field.name}`;
    if (field.type.kind === "string" && typeof value === "string" && value.trim() === "") {
      return pathName;
    }
    if (field.type.kind === "object" && isPlainObject(value)) {
      const nested = findEmptyRequiredString(field.type.fields, value, `${pathName}.`);
      if (nested) return nested;
    }
  }
  return undefined;
}

/**
 * Returns the reason a well-formed answer is still unusable, if any.
 */
export function assessQuality(
  raw: RawResponse,
  content: { text: string; data?: StructuredPayload },
  schema: OutputSchema | undefined,
  minContentLength: number,
  rejectPlaceholders = true
): string | undefined {
  if (raw.finishReason === "length") {
    return "Response was truncated (finish reason: length)";
  }

  const pieces: string[] = [];
  if (content.data) {
    collectStrings(content.data, pieces);
  } else {
    pieces.push(content.text);
  }
  const usable = pieces.join(" ").trim();

  if (usable.length < minContentLength) {
    return `Response has ${usable.length} characters of content, below the minimum of ${minContentLength}`;
  }

  if (rejectPlaceholders) {
    for (const { pattern, label } of PLACEHOLDER_PATTERNS) {
      if (pattern.test(usable)) {
        return `Response contains ${label}`;
      }
    }
  }

  if (schema && content.data) {
    const empty = findEmptyRequiredString(schema.fields, content.data);
    if (empty) {
      return `Required field "${empty}" is empty`;
    }
  } else if (TRAILING_ELLIPSIS.test(content.text)) {
    return "Response ends with an ellipsis and looks truncated";
  }

  return undefined;
}

/**
 * Turns raw backend text into an accepted result, re-prompting with the
 * parse or quality problem when the answer is rejected. The attempt bound
 * covers the first request and every correction.
 */
export class StructuredOutputValidator {
  readonly maxAttempts: number;
  private readonly minContentLength: number;
  private readonly stage: FailureStage;
  private readonly rejectPlaceholders: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_VALIDATION_ATTEMPTS);
    this.minContentLength = options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    this.stage = options.stage ?? "generation";
    this.rejectPlaceholders = options.rejectPlaceholders ?? true;
  }

  check(request: EngineRequest, raw: RawResponse): ValidationVerdict {
    const text = raw.text.trim();
    let data: StructuredPayload | undefined;

    if (request.schema) {
      let candidate: Record<string, unknown>;
      try {
        candidate = extractJsonObject(raw.text);
      } catch (error) {
        if (error instanceof OutputParseError) {
          return { ok: false, kind: "validation", problem: error.message };
        }
        throw error;
      }
      const parsed = compileOutputSchema(request.schema).parse(candidate);
      if (!parsed.success) {
        return { ok: false, kind: "validation", problem: parsed.error };
      }
      data = parsed.data;
    }

    const minLength = request.minContentLength ?? this.minContentLength;
    const problem = assessQuality(raw, { text, data }, request.schema, minLength, this.rejectPlaceholders);
    if (problem) {
      return { ok: false, kind: "quality", problem };
    }
    return data ? { ok: true, text, data } : { ok: true, text };
  }

  async validate(request: EngineRequest, generate: GenerateOnce): Promise<Outcome<ValidatedOutput>> {
    let current = request;
    let attempt = 0;

    while (true) {
      attempt++;
      const generated = await generate(current);
      if (!generated.ok) {
        return generated;
      }

      const raw = generated.value;
      const verdict = this.check(request, raw);
      if (verdict.ok) {
        metrics.recordValidationOutcome("accepted");
        return { ok: true, value: { text: verdict.text, data: verdict.data, raw, attempts: attempt } };
      }

      logger.warn("Response rejected by validator", {
        attempt,
        kind: verdict.kind,
        problem: verdict.problem,
        model: request.model,
        stage: this.stage,
      });

      if (attempt >= this.maxAttempts) {
        metrics.recordValidationOutcome(verdict.kind);
        return {
          ok: false,
          failure: { kind: verdict.kind, message: verdict.problem, attempts: attempt, stage: this.stage },
        };
      }

      metrics.recordValidationOutcome("reprompted");
      current = {
        ...request,
        messages: [...request.messages, ...buildCorrectionMessages(raw.text, verdict.problem, request.schema !== undefined)],
      };
    }
  }
}
