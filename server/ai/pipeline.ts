import type { EngineRequest } from "../../shared/schema.js";
import type { ProviderInvoker } from "./providers/index.js";
import type { RetryController } from "./retry.js";
import type { Outcome, PreparedMedia, RawResponse } from "./types.js";
import type { GenerateOnce } from "./validator.js";

export interface CallOptions {
  signal?: AbortSignal;
  /** Caller deadline covering backend calls and backoff waits. */
  timeoutMs?: number;
}

export function withDeadline(options: CallOptions = {}): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
    signals.push(AbortSignal.timeout(options.timeoutMs));
  }
  if (signals.length === 0) return undefined;
  return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

/**
 * Binds the invoker to a retry controller: each call is one full
 * Idle -> ... -> Succeeded/Exhausted/Failed run. `onAttempt` fires before
 * every backend invocation.
 */
export function retryingGenerator(
  invoker: ProviderInvoker,
  retry: RetryController,
  media: PreparedMedia[],
  signal?: AbortSignal,
  onAttempt?: () => void
): GenerateOnce {
  return async (request: EngineRequest): Promise<Outcome<RawResponse>> => {
    const outcome = await retry.run(() => {
      onAttempt?.();
      return invoker.invoke(request, media, signal);
    }, signal);
    return outcome.ok ? { ok: true, value: outcome.value } : { ok: false, failure: outcome.failure };
  };
}
