import pLimit, { type LimitFunction } from "p-limit";
import logger from "../../logger.js";
import { metrics } from "../../metrics.js";
import type { EngineConfig } from "../../config.js";
import type { EngineRequest } from "../../../shared/schema.js";
import { CircuitBreakerRegistry, CircuitOpenError, type CircuitSnapshot } from "../circuit-breaker.js";
import { getAnthropic, getGemini, getOpenAI, getOpenAICompatible, getPerplexity } from "../clients.js";
import { DEFAULT_PROVIDER_CONCURRENCY } from "../constants.js";
import { composeMessages } from "../prompts.js";
import { ProviderError, type PreparedMedia, type RawResponse } from "../types.js";
import { AnthropicTransport } from "./anthropic.js";
import { GeminiTransport } from "./gemini.js";
import { OpenAITransport } from "./openai.js";
import type { ProviderTransport } from "./types.js";

export type { ProviderCall, ProviderTransport, TransportReply } from "./types.js";
export { OpenAITransport } from "./openai.js";
export { GeminiTransport } from "./gemini.js";
export { AnthropicTransport } from "./anthropic.js";
export { errorFromStatus, parseRetryAfterMs, parseRetryDelayMs } from "./errors.js";

interface RegistryEntry {
  pattern: string | RegExp;
  transport: ProviderTransport;
}

export interface ResolvedProvider {
  transport: ProviderTransport;
  /** Model name as the backend knows it. */
  model: string;
}

/**
 * Maps model identifiers to transports. String patterns match a prefix
 * (`"openai/"`) and are stripped from the model name; regular expressions
 * match the whole identifier, which is passed through unchanged.
 * Later registrations win over earlier ones.
 */
export class ProviderRegistry {
  private readonly entries: RegistryEntry[] = [];
  private sealed = false;

  register(pattern: string | RegExp, transport: ProviderTransport): this {
    if (this.sealed) {
      throw new Error(`Provider registry is sealed; cannot register ${String(pattern)}`);
    }
    this.entries.unshift({ pattern, transport });
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  resolve(modelId: string): ResolvedProvider {
    for (const entry of this.entries) {
      if (typeof entry.pattern === "string") {
        if (modelId.startsWith(entry.pattern)) {
          return { transport: entry.transport, model: modelId.slice(entry.pattern.length) };
        }
      } else if (entry.pattern.test(modelId)) {
        return { transport: entry.transport, model: modelId };
      }
    }
    throw new ProviderError(`Unknown model identifier: ${modelId}`, "permanent", "registry");
  }

  families(): string[] {
    return [...new Set(this.entries.map((e) => e.transport.family))];
  }
}

export function createDefaultRegistry(config: EngineConfig): ProviderRegistry {
  const { providers } = config;
  return new ProviderRegistry()
    .register("openai/", new OpenAITransport({ family: "openai", client: () => getOpenAI(providers.openaiApiKey) }))
    .register("gemini/", new GeminiTransport(() => getGemini(providers.geminiApiKey)))
    .register("anthropic/", new AnthropicTransport(() => getAnthropic(providers.anthropicApiKey)))
    .register(
      "ollama/",
      new OpenAITransport({ family: "ollama", client: () => getOpenAICompatible(providers.ollamaBaseUrl, "ollama") })
    )
    .register(
      "perplexity/",
      new OpenAITransport({
        family: "perplexity",
        supportsJsonMode: false,
        client: () => getPerplexity(providers.perplexityApiKey),
      })
    );
}

export interface InvokerOptions {
  maxConcurrency?: number;
  /** Pass false to call transports without a circuit breaker. */
  breakers?: CircuitBreakerRegistry | false;
  now?: () => number;
}

/**
 * Uniform call surface over the registered transports. Makes exactly one
 * backend call per invocation; retrying is the caller's job.
 */
export class ProviderInvoker {
  private readonly limit: LimitFunction;
  private readonly breakers: CircuitBreakerRegistry | undefined;
  private readonly now: () => number;

  constructor(
    private readonly registry: ProviderRegistry,
    options: InvokerOptions = {}
  ) {
    this.limit = pLimit(options.maxConcurrency ?? DEFAULT_PROVIDER_CONCURRENCY);
    this.now = options.now ?? Date.now;
    this.breakers = options.breakers === false ? undefined : options.breakers ?? new CircuitBreakerRegistry({}, this.now);
  }

  circuitStats(): Record<string, CircuitSnapshot> {
    return this.breakers?.snapshot() ?? {};
  }

  async invoke(request: EngineRequest, media: PreparedMedia[], signal?: AbortSignal): Promise<RawResponse> {
    const { transport, model } = this.registry.resolve(request.model);
    const call = {
      model,
      messages: composeMessages(request),
      params: request.params,
      media,
      json: request.schema !== undefined,
    };

    return this.limit(async () => {
      signal?.throwIfAborted();
      const started = this.now();
      const run = () => transport.generate(call, signal);

      try {
        const reply = this.breakers
          ? await this.breakers
              .get(transport.family)
              .execute(run, (error) => !(error instanceof ProviderError && error.kind === "permanent") && !signal?.aborted)
          : await run();
        const latencyMs = this.now() - started;
        metrics.recordProviderCall(transport.family, latencyMs, false);
        logger.debug("Provider call succeeded", { provider: transport.family, model, latencyMs, finishReason: reply.finishReason });
        return { text: reply.text, finishReason: reply.finishReason, model: request.model, provider: transport.family, latencyMs };
      } catch (error) {
        metrics.recordProviderCall(transport.family, this.now() - started, true);
        if (error instanceof CircuitOpenError) {
          throw new ProviderError(error.message, "transient", transport.family, undefined, error.retryAfterMs);
        }
        throw error;
      }
    });
  }
}
