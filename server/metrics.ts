interface Metrics {
  providers: {
    calls: number;
    failures: number;
    byFamily: Record<string, number>;
    totalLatencyMs: number;
    averageLatencyMs: number;
  };
  retry: {
    retries: number;
    exhausted: number;
    permanent: number;
    cancelled: number;
  };
  cache: {
    hits: number;
    misses: number;
    writes: number;
    evictions: number;
    errors: number;
    coalesced: number;
  };
  validation: {
    accepted: number;
    reprompted: number;
    validationFailed: number;
    qualityFailed: number;
  };
  judge: {
    runs: number;
    shortCircuited: number;
    failed: number;
  };
  media: {
    accepted: number;
    rejected: number;
  };
  circuitBreaker: {
    opened: Record<string, number>;
  };
}

type ValidationOutcome = 'accepted' | 'reprompted' | 'validation' | 'quality';

function emptyMetrics(): Metrics {
  return {
    providers: { calls: 0, failures: 0, byFamily: {}, totalLatencyMs: 0, averageLatencyMs: 0 },
    retry: { retries: 0, exhausted: 0, permanent: 0, cancelled: 0 },
    cache: { hits: 0, misses: 0, writes: 0, evictions: 0, errors: 0, coalesced: 0 },
    validation: { accepted: 0, reprompted: 0, validationFailed: 0, qualityFailed: 0 },
    judge: { runs: 0, shortCircuited: 0, failed: 0 },
    media: { accepted: 0, rejected: 0 },
    circuitBreaker: { opened: {} },
  };
}

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  recordProviderCall(family: string, latencyMs: number, failed: boolean) {
    this.metrics.providers.calls++;
    if (failed) this.metrics.providers.failures++;
    this.metrics.providers.byFamily[family] = (this.metrics.providers.byFamily[family] || 0) + 1;
    this.metrics.providers.totalLatencyMs += latencyMs;
    this.metrics.providers.averageLatencyMs = this.metrics.providers.totalLatencyMs / this.metrics.providers.calls;
  }

  recordRetry() {
    this.metrics.retry.retries++;
  }

  recordRetryExhausted() {
    this.metrics.retry.exhausted++;
  }

  recordPermanentFailure() {
    this.metrics.retry.permanent++;
  }

  recordCancelled() {
    this.metrics.retry.cancelled++;
  }

  recordCacheHit() {
    this.metrics.cache.hits++;
  }

  recordCacheMiss() {
    this.metrics.cache.misses++;
  }

  recordCacheWrite() {
    this.metrics.cache.writes++;
  }

  recordCacheEvictions(count: number) {
    this.metrics.cache.evictions += count;
  }

  recordCacheError() {
    this.metrics.cache.errors++;
  }

  recordCoalesced() {
    this.metrics.cache.coalesced++;
  }

  recordValidationOutcome(outcome: ValidationOutcome) {
    if (outcome === 'accepted') this.metrics.validation.accepted++;
    if (outcome === 'reprompted') this.metrics.validation.reprompted++;
    if (outcome === 'validation') this.metrics.validation.validationFailed++;
    if (outcome === 'quality') this.metrics.validation.qualityFailed++;
  }

  recordJudgeRun(shortCircuited: boolean) {
    this.metrics.judge.runs++;
    if (shortCircuited) this.metrics.judge.shortCircuited++;
  }

  recordJudgeFailure() {
    this.metrics.judge.failed++;
  }

  recordMedia(accepted: boolean) {
    if (accepted) {
      this.metrics.media.accepted++;
    } else {
      this.metrics.media.rejected++;
    }
  }

  recordCircuitOpen(provider: string) {
    this.metrics.circuitBreaker.opened[provider] = (this.metrics.circuitBreaker.opened[provider] || 0) + 1;
  }

  getMetrics(): Metrics {
    return structuredClone(this.metrics);
  }

  reset() {
    this.metrics = emptyMetrics();
  }
}

export const metrics = new MetricsCollector();

export function getMetrics(): Metrics {
  return metrics.getMetrics();
}

export function resetMetrics(): void {
  metrics.reset();
}

export type { Metrics, ValidationOutcome };
