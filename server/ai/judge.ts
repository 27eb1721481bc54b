import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import logger from "../logger.js";
import { metrics } from "../metrics.js";
import {
  criteriaScoresSchema,
  engineRequestSchema,
  judgeInputSchema,
  type JudgeInput,
  type JudgeVerdict,
  type OutputSchema,
} from "../../shared/schema.js";
import { normalizeText } from "./fingerprint.js";
import { retryingGenerator, withDeadline, type CallOptions } from "./pipeline.js";
import { buildJudgeUserPrompt, JUDGE_SYSTEM_PROMPT } from "./prompts.js";
import type { ProviderInvoker } from "./providers/index.js";
import { RetryController, type RetryControllerOptions } from "./retry.js";
import type { FailureRecord, JudgeOutcome } from "./types.js";
import { StructuredOutputValidator } from "./validator.js";

const scoreField = { kind: "number", min: 0, max: 1 } as const;

export const JUDGE_OUTPUT_SCHEMA: OutputSchema = {
  name: "evaluation",
  description: "a graded assessment of the Model Response against the Ground Truth",
  fields: [
    { name: "score", type: scoreField, description: "overall score from 0.0 to 1.0" },
    { name: "is_correct", type: { kind: "boolean" }, description: "true when the response is essentially correct" },
    { name: "reasoning", type: { kind: "string", minLength: 1 }, description: "why this score was given" },
    { name: "feedback", type: { kind: "string" }, required: false, description: "how the response could improve" },
    {
      name: "criteria",
      required: false,
      type: {
        kind: "object",
        fields: [
          { name: "accuracy", type: scoreField },
          { name: "completeness", type: scoreField },
          { name: "relevance", type: scoreField },
          { name: "clarity", type: scoreField },
        ],
      },
    },
  ],
};

const judgePayloadSchema = z.object({
  score: z.number().min(0).max(1),
  is_correct: z.boolean(),
  reasoning: z.string(),
  feedback: z.string().optional(),
  criteria: criteriaScoresSchema.optional(),
});

function comparable(text: string): string {
  return normalizeText(text).toLowerCase().replace(/\s+/g, " ");
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Token-level F1 between two texts, rounded to four decimals. */
export function lexicalOverlap(response: string, reference: string): number {
  const responseTokens = tokenize(response);
  const referenceTokens = tokenize(reference);
  if (responseTokens.length === 0 || referenceTokens.length === 0) return 0;

  const remaining = new Map<string, number>();
  for (const token of referenceTokens) {
    remaining.set(token, (remaining.get(token) ?? 0) + 1);
  }
  let common = 0;
  for (const token of responseTokens) {
    const left = remaining.get(token) ?? 0;
    if (left > 0) {
      common++;
      remaining.set(token, left - 1);
    }
  }
  if (common === 0) return 0;

  const precision = common / responseTokens.length;
  const recall = common / referenceTokens.length;
  return Math.round(((2 * precision * recall) / (precision + recall)) * 10000) / 10000;
}

export interface JudgeOptions {
  invoker: ProviderInvoker;
  /** Judge model identifier, `<family>/<model>`. */
  model: string;
  retry?: RetryControllerOptions;
  validationAttempts?: number;
}

/**
 * Scores a response against a reference answer with a second backend
 * call. Failures come back with stage "judge" so callers can keep an
 * unscored result.
 */
export class ResponseJudge {
  readonly model: string;
  private readonly invoker: ProviderInvoker;
  private readonly retry: RetryController;
  private readonly validator: StructuredOutputValidator;

  constructor(options: JudgeOptions) {
    this.model = options.model;
    this.invoker = options.invoker;
    this.retry = new RetryController({ ...options.retry, stage: "judge" });
    this.validator = new StructuredOutputValidator({
      maxAttempts: options.validationAttempts,
      minContentLength: 1,
      stage: "judge",
      // A verdict routinely quotes the filler it is scoring.
      rejectPlaceholders: false,
    });
  }

  async evaluate(rawInput: JudgeInput, options: CallOptions = {}): Promise<JudgeOutcome> {
    const parsedInput = judgeInputSchema.safeParse(rawInput);
    if (!parsedInput.success) {
      return this.fail({ kind: "permanent", message: fromZodError(parsedInput.error).message, attempts: 0, stage: "judge" });
    }
    const input = parsedInput.data;

    if (input.response.trim() === "") {
      return this.fail({ kind: "permanent", message: "Response to evaluate is empty", attempts: 0, stage: "judge" });
    }

    const overlap = lexicalOverlap(input.response, input.reference);

    if (comparable(input.response) === comparable(input.reference)) {
      metrics.recordJudgeRun(true);
      logger.debug("Judge short-circuit on exact match");
      return {
        ok: true,
        value: {
          score: 1,
          rationale: "The response matches the reference answer.",
          reference: input.reference,
          isCorrect: true,
          lexicalOverlap: overlap,
          model: "exact-match",
        },
      };
    }

    const built = engineRequestSchema.safeParse({
      model: this.model,
      messages: [
        { role: "system", content: JUDGE_SYSTEM_PROMPT },
        { role: "user", content: buildJudgeUserPrompt(input) },
      ],
      params: { temperature: 0 },
      schema: JUDGE_OUTPUT_SCHEMA,
      minContentLength: 1,
    });
    if (!built.success) {
      return this.fail({ kind: "permanent", message: fromZodError(built.error).message, attempts: 0, stage: "judge" });
    }
    const request = built.data;

    const signal = withDeadline(options);
    const outcome = await this.validator.validate(request, retryingGenerator(this.invoker, this.retry, [], signal));
    if (!outcome.ok) {
      return this.fail({ ...outcome.failure, stage: "judge" });
    }

    const payload = judgePayloadSchema.safeParse(outcome.value.data);
    if (!payload.success) {
      return this.fail({
        kind: "validation",
        message: fromZodError(payload.error).message,
        attempts: outcome.value.attempts,
        stage: "judge",
      });
    }

    metrics.recordJudgeRun(false);
    const verdict: JudgeVerdict = {
      score: payload.data.score,
      rationale: payload.data.reasoning,
      reference: input.reference,
      isCorrect: payload.data.is_correct,
      feedback: payload.data.feedback,
      criteria: payload.data.criteria,
      lexicalOverlap: overlap,
      model: this.model,
    };
    logger.info("Judge verdict", { model: this.model, score: verdict.score, isCorrect: verdict.isCorrect, lexicalOverlap: overlap });
    return { ok: true, value: verdict };
  }

  private fail(failure: FailureRecord): JudgeOutcome {
    metrics.recordJudgeFailure();
    logger.warn("Judge failed", { kind: failure.kind, message: failure.message, attempts: failure.attempts });
    return { ok: false, failure };
  }
}
