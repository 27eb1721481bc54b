import { fromZodError } from "zod-validation-error";
import { loadConfig, describeMissingCredentials, type EngineConfig } from "../config.js";
import logger, { logEngine, logError } from "../logger.js";
import { metrics } from "../metrics.js";
import { engineRequestSchema, type EngineRequest, type EngineRequestInput } from "../../shared/schema.js";
import { CacheStore, type ResultCache } from "./cache-store.js";
import { fingerprint } from "./fingerprint.js";
import { ResponseJudge } from "./judge.js";
import { MediaPreprocessor } from "./media.js";
import { retryingGenerator, withDeadline, type CallOptions } from "./pipeline.js";
import { createDefaultRegistry, ProviderInvoker, type ProviderRegistry } from "./providers/index.js";
import { RetryController, type Scheduler } from "./retry.js";
import {
  errorMessage,
  MediaRejectedError,
  type CacheEntry,
  type FailureRecord,
  type FailureStage,
  type JudgeOutcome,
  type PreparedMedia,
  type SubmitOutcome,
  type ValidatedResult,
} from "./types.js";
import { StructuredOutputValidator } from "./validator.js";

export interface SubmitOptions extends CallOptions {
  /** Skip the cache lookup and replace any stored entry with the fresh result. */
  overwrite?: boolean;
}

export interface EvaluateOptions extends CallOptions {
  prompt?: string;
  context?: string;
}

export interface EngineDependencies {
  invoker: ProviderInvoker;
  cache?: ResultCache & { close?(): Promise<void> };
  media?: MediaPreprocessor;
  retry?: RetryController;
  validator?: StructuredOutputValidator;
  judge?: ResponseJudge;
  requestTimeoutMs?: number;
  now?: () => number;
}

interface RunProgress {
  /** Backend invocations so far, across retries and re-prompts. */
  attempts: number;
}

interface InflightCall {
  key: string;
  promise: Promise<SubmitOutcome>;
  controller: AbortController;
  waiters: number;
  progress: RunProgress;
}

function cancelledFailure(signal: AbortSignal, stage: FailureStage, attempts = 0): FailureRecord {
  const timedOut = signal.reason instanceof Error && signal.reason.name === "TimeoutError";
  return {
    kind: "transient",
    message: timedOut ? "Request timed out" : "Request cancelled by caller",
    attempts,
    stage,
    cancelled: true,
  };
}

const nullCache: ResultCache = {
  async lookup() {
    return undefined;
  },
  async store() {
    return false;
  },
  async evictIfOverCapacity() {
    return 0;
  },
};

/**
 * Caller-facing pipeline: fingerprint, cache, media, invoke under retry,
 * validate, persist. Identical requests in flight at the same time share
 * one backend run.
 */
export class GenerationEngine {
  private readonly invoker: ProviderInvoker;
  private readonly cache: ResultCache & { close?(): Promise<void> };
  private readonly media: MediaPreprocessor;
  private readonly retry: RetryController;
  private readonly validator: StructuredOutputValidator;
  private readonly judge: ResponseJudge | undefined;
  private readonly requestTimeoutMs: number | undefined;
  private readonly now: () => number;
  private readonly inflight = new Map<string, InflightCall>();

  constructor(deps: EngineDependencies) {
    this.invoker = deps.invoker;
    this.cache = deps.cache ?? nullCache;
    this.media = deps.media ?? new MediaPreprocessor();
    this.retry = deps.retry ?? new RetryController();
    this.validator = deps.validator ?? new StructuredOutputValidator();
    this.judge = deps.judge;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.now = deps.now ?? Date.now;
  }

  /** Number of distinct fingerprints currently being generated. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  async submit(input: EngineRequestInput, options: SubmitOptions = {}): Promise<SubmitOutcome> {
    const parsed = engineRequestSchema.safeParse(input);
    if (!parsed.success) {
      const message = fromZodError(parsed.error, { prefix: "Invalid request" }).message;
      logger.warn("Request rejected", { error: message });
      return { ok: false, failure: { kind: "permanent", message, attempts: 0, stage: "generation" } };
    }
    const request: EngineRequest = Object.freeze(parsed.data);
    const signal = withDeadline({ signal: options.signal, timeoutMs: options.timeoutMs ?? this.requestTimeoutMs });

    if (signal?.aborted) {
      return { ok: false, failure: cancelledFailure(signal, "generation") };
    }

    const key = fingerprint(request, await this.media.contentDigests(request.media));

    if (!options.overwrite) {
      const hit = await this.cache.lookup(key);
      if (hit) {
        return { ok: true, value: this.fromCache(hit) };
      }
    }

    // The deadline may have passed while hashing media or reading the cache.
    if (signal?.aborted) {
      return { ok: false, failure: cancelledFailure(signal, "generation") };
    }

    let call = this.inflight.get(key);
    if (call) {
      metrics.recordCoalesced();
      logEngine("coalesce", { fingerprint: key.substring(0, 12), waiters: call.waiters + 1 });
    } else {
      call = this.start(request, key, options.overwrite === true);
    }
    return this.join(call, signal);
  }

  async evaluate(response: string, reference: string, options: EvaluateOptions = {}): Promise<JudgeOutcome> {
    if (!this.judge) {
      return {
        ok: false,
        failure: { kind: "permanent", message: "No judge model configured", attempts: 0, stage: "judge" },
      };
    }
    return this.judge.evaluate(
      { response, reference, prompt: options.prompt, context: options.context },
      { signal: options.signal, timeoutMs: options.timeoutMs ?? this.requestTimeoutMs }
    );
  }

  async close(): Promise<void> {
    for (const call of this.inflight.values()) {
      call.controller.abort();
    }
    await this.cache.close?.();
  }

  private start(request: EngineRequest, key: string, overwrite: boolean): InflightCall {
    const controller = new AbortController();
    const progress: RunProgress = { attempts: 0 };
    const call: InflightCall = {
      key,
      controller,
      waiters: 0,
      progress,
      promise: this.run(request, key, overwrite, controller.signal, progress).finally(() => {
        if (this.inflight.get(key) === call) {
          this.inflight.delete(key);
        }
      }),
    };
    this.inflight.set(key, call);
    return call;
  }

  /**
   * Attaches one caller to a shared run. A caller whose signal fires gets a
   * cancelled outcome at once; the run itself is aborted only when its last
   * caller has left.
   */
  private join(call: InflightCall, signal: AbortSignal | undefined): Promise<SubmitOutcome> {
    call.waiters++;

    return new Promise<SubmitOutcome>((resolve) => {
      let settled = false;
      const leave = () => {
        settled = true;
        call.waiters--;
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        if (settled || !signal) return;
        leave();
        if (call.waiters === 0) {
          // Later callers with the same fingerprint must start a fresh run.
          if (this.inflight.get(call.key) === call) {
            this.inflight.delete(call.key);
          }
          call.controller.abort(signal.reason);
        }
        resolve({ ok: false, failure: cancelledFailure(signal, "generation", call.progress.attempts) });
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      void call.promise.then((outcome) => {
        if (settled) return;
        leave();
        resolve(outcome);
      }, (error: unknown) => {
        if (settled) return;
        leave();
        logError(error, { stage: "generation" });
        resolve({
          ok: false,
          failure: { kind: "permanent", message: errorMessage(error), attempts: 0, stage: "generation" },
        });
      });
      // A signal that fired before the listener was added never dispatches again.
      if (signal?.aborted) onAbort();
    });
  }

  private async run(
    request: EngineRequest,
    key: string,
    overwrite: boolean,
    signal: AbortSignal,
    progress: RunProgress
  ): Promise<SubmitOutcome> {
    const short = key.substring(0, 12);

    let media: PreparedMedia[];
    try {
      media = await this.media.prepareAll(request.media);
    } catch (error) {
      if (error instanceof MediaRejectedError) {
        return { ok: false, failure: { kind: "permanent", message: error.message, attempts: 0, stage: "media" } };
      }
      throw error;
    }

    if (signal.aborted) {
      return { ok: false, failure: cancelledFailure(signal, "generation", progress.attempts) };
    }

    logEngine("generate", { fingerprint: short, model: request.model, media: media.length, structured: request.schema !== undefined });
    const generate = retryingGenerator(this.invoker, this.retry, media, signal, () => {
      progress.attempts++;
    });
    const outcome = await this.validator.validate(request, generate);

    if (!outcome.ok) {
      logger.warn("Generation failed", { fingerprint: short, ...outcome.failure });
      return outcome;
    }
    if (signal.aborted) {
      // Late result after every caller left; never persisted.
      return { ok: false, failure: cancelledFailure(signal, "generation", progress.attempts) };
    }

    const createdAt = this.now();
    const { raw, data, text, attempts } = outcome.value;
    await this.cache.store(key, { model: request.model, rawResponse: raw.text, payload: data ?? null }, overwrite);
    await this.cache.evictIfOverCapacity();

    const result: ValidatedResult = { fingerprint: key, model: request.model, text, attempts, cached: false, createdAt };
    if (data) result.data = data;
    logEngine("complete", { fingerprint: short, attempts, latencyMs: raw.latencyMs, provider: raw.provider });
    return { ok: true, value: result };
  }

  private fromCache(entry: CacheEntry): ValidatedResult {
    const result: ValidatedResult = {
      fingerprint: entry.fingerprint,
      model: entry.model,
      text: entry.rawResponse.trim(),
      attempts: 0,
      cached: true,
      createdAt: entry.createdAt,
    };
    if (entry.payload) result.data = entry.payload;
    return result;
  }
}

export interface CreateEngineOptions {
  /** Replaces the default backend registry. */
  registry?: ProviderRegistry;
  scheduler?: Scheduler;
  random?: () => number;
}

/** Builds an engine from configuration, opening the cache store on disk. */
export async function createEngine(config: EngineConfig = loadConfig(), options: CreateEngineOptions = {}): Promise<GenerationEngine> {
  const registry = (options.registry ?? createDefaultRegistry(config)).seal();
  const invoker = new ProviderInvoker(registry, { maxConcurrency: config.providers.maxConcurrency });
  const retryOptions = { policy: config.retry, scheduler: options.scheduler, random: options.random };

  for (const warning of describeMissingCredentials(config)) {
    logger.debug(warning);
  }

  const cache = config.cache.enabled
    ? await CacheStore.open({ path: config.cache.path, capacityBytes: config.cache.capacityBytes })
    : CacheStore.disabled();

  return new GenerationEngine({
    invoker,
    cache,
    media: new MediaPreprocessor(config.media),
    retry: new RetryController(retryOptions),
    validator: new StructuredOutputValidator(config.validation),
    judge: new ResponseJudge({
      invoker,
      model: config.judgeModel,
      retry: retryOptions,
      validationAttempts: config.validation.maxAttempts,
    }),
    requestTimeoutMs: config.requestTimeoutMs,
  });
}
