import { setTimeout as sleep } from "timers/promises";
import { componentLogger } from "../logger.js";
import { metrics } from "../metrics.js";
import { DEFAULT_BACKOFF } from "./constants.js";
import { errorMessage, ProviderError, type FailureRecord, type FailureStage } from "./types.js";

const logger = componentLogger("retry");

export type RetryState = "idle" | "attempting" | "backoff" | "succeeded" | "exhausted" | "failed";

export interface BackoffPolicy {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Attempts including the first one. */
  maxAttempts: number;
  /** Jitter adds up to this fraction of the delay, never subtracts. */
  jitterRatio: number;
}

/** Waits between attempts; rejects with the signal's reason on abort. */
export interface Scheduler {
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const timerScheduler: Scheduler = {
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await sleep(ms, undefined, { signal });
  },
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number; totalDelayMs: number; transitions: RetryState[] }
  | { ok: false; failure: FailureRecord; totalDelayMs: number; transitions: RetryState[] };

/** Delay before the n-th retry (n starts at 1), without jitter. */
export function configuredDelay(policy: BackoffPolicy, retry: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.multiplier, retry - 1));
}

export function backoffDelay(policy: BackoffPolicy, retry: number, random: () => number = Math.random, retryAfterMs?: number): number {
  const base = configuredDelay(policy, retry);
  const jittered = base + Math.floor(base * policy.jitterRatio * random());
  return retryAfterMs !== undefined ? Math.max(jittered, retryAfterMs) : jittered;
}

function classify(error: unknown): { kind: "transient" | "permanent"; message: string; retryAfterMs?: number } {
  if (error instanceof ProviderError) {
    return { kind: error.kind, message: error.message, retryAfterMs: error.retryAfterMs };
  }
  return { kind: "transient", message: errorMessage(error) };
}

export interface RetryControllerOptions {
  policy?: Partial<BackoffPolicy>;
  scheduler?: Scheduler;
  random?: () => number;
  stage?: FailureStage;
}

/**
 * Drives one operation through Idle -> Attempting -> (Succeeded | Backoff ->
 * Attempting | Exhausted | Failed). Permanent errors end the run after the
 * attempt that produced them; transient errors are retried until the
 * attempt budget is spent.
 */
export class RetryController {
  readonly policy: BackoffPolicy;
  private readonly scheduler: Scheduler;
  private readonly random: () => number;
  private readonly stage: FailureStage;

  constructor(options: RetryControllerOptions = {}) {
    this.policy = { ...DEFAULT_BACKOFF, ...options.policy };
    this.scheduler = options.scheduler ?? timerScheduler;
    this.random = options.random ?? Math.random;
    this.stage = options.stage ?? "generation";
  }

  async run<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<RetryOutcome<T>> {
    const transitions: RetryState[] = ["idle"];
    let totalDelayMs = 0;
    let attempt = 0;

    const cancelled = (): RetryOutcome<T> => {
      metrics.recordCancelled();
      return {
        ok: false,
        failure: { kind: "transient", message: "Request aborted", attempts: attempt, stage: this.stage, cancelled: true },
        totalDelayMs,
        transitions,
      };
    };

    while (true) {
      if (signal?.aborted) return cancelled();

      attempt++;
      transitions.push("attempting");

      let error: unknown;
      try {
        const value = await operation(attempt);
        transitions.push("succeeded");
        return { ok: true, value, attempts: attempt, totalDelayMs, transitions };
      } catch (e) {
        error = e;
      }

      if (signal?.aborted) return cancelled();

      const failure = classify(error);

      if (failure.kind === "permanent") {
        transitions.push("failed");
        metrics.recordPermanentFailure();
        logger.warn("Permanent failure, not retrying", { attempt, error: failure.message, stage: this.stage });
        return {
          ok: false,
          failure: { kind: "permanent", message: failure.message, attempts: attempt, stage: this.stage },
          totalDelayMs,
          transitions,
        };
      }

      if (attempt >= this.policy.maxAttempts) {
        transitions.push("exhausted");
        metrics.recordRetryExhausted();
        logger.warn("Retries exhausted", { attempts: attempt, error: failure.message, stage: this.stage });
        return {
          ok: false,
          failure: { kind: "transient", message: failure.message, attempts: attempt, stage: this.stage },
          totalDelayMs,
          transitions,
        };
      }

      const delay = backoffDelay(this.policy, attempt, this.random, failure.retryAfterMs);
      transitions.push("backoff");
      metrics.recordRetry();
      logger.warn(`Call failed - attempt ${attempt}`, {
        retriesLeft: this.policy.maxAttempts - attempt,
        delayMs: delay,
        error: failure.message,
        stage: this.stage,
      });

      try {
        await this.scheduler.sleep(delay, signal);
      } catch (sleepError) {
        if (signal?.aborted) return cancelled();
        throw sleepError;
      }
      totalDelayMs += delay;
    }
  }
}
