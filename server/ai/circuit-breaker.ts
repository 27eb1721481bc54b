/**
 * Per-family circuit breaker in front of provider transports.
 *
 * CLOSED passes calls through and counts consecutive transient failures.
 * OPEN rejects at once with a CircuitOpenError until the cooldown elapses.
 * HALF_OPEN lets probe calls through; enough successes close the circuit,
 * a single failure reopens it.
 */

import { componentLogger } from "../logger.js";
import { metrics } from "../metrics.js";

const logger = componentLogger("circuit");

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitConfig {
  openAfterFailures: number;
  closeAfterSuccesses: number;
  cooldownMs: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  failures: number;
  successes: number;
  calls: number;
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitConfig = {
  openAfterFailures: 5,
  closeAfterSuccesses: 2,
  cooldownMs: 30000,
};

// Hosted backends recover slower than a local server.
const FAMILY_CIRCUIT_CONFIG: Record<string, CircuitConfig> = {
  openai: { openAfterFailures: 5, closeAfterSuccesses: 3, cooldownMs: 60000 },
  anthropic: { openAfterFailures: 5, closeAfterSuccesses: 3, cooldownMs: 60000 },
  perplexity: { openAfterFailures: 5, closeAfterSuccesses: 2, cooldownMs: 60000 },
  ollama: { openAfterFailures: 3, closeAfterSuccesses: 1, cooldownMs: 10000 },
};

export class CircuitOpenError extends Error {
  constructor(
    public readonly family: string,
    public readonly retryAfterMs: number
  ) {
    super(`Circuit breaker open for ${family}. Retry after ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private openedAt = 0;
  private failures = 0;
  private successes = 0;
  private calls = 0;
  private streak = 0;

  constructor(
    readonly family: string,
    private readonly config: CircuitConfig = DEFAULT_CIRCUIT_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Runs the call unless the circuit is open. Errors for which
   * `countsAsFailure` returns false pass through without moving the circuit.
   */
  async execute<T>(call: () => Promise<T>, countsAsFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.currentState() === 'OPEN') {
      throw new CircuitOpenError(this.family, this.remainingCooldown());
    }

    this.calls++;
    try {
      const result = await call();
      this.onSuccess();
      return result;
    } catch (error) {
      if (countsAsFailure(error)) this.onFailure();
      throw error;
    }
  }

  currentState(): CircuitState {
    if (this.state === 'OPEN' && this.remainingCooldown() === 0) {
      this.moveTo('HALF_OPEN');
    }
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return { state: this.currentState(), failures: this.failures, successes: this.successes, calls: this.calls };
  }

  trip(): void {
    this.moveTo('OPEN');
  }

  reset(): void {
    this.moveTo('CLOSED');
  }

  private onSuccess(): void {
    this.successes++;
    if (this.state === 'HALF_OPEN') {
      this.streak++;
      if (this.streak >= this.config.closeAfterSuccesses) this.moveTo('CLOSED');
      return;
    }
    // Only consecutive failures count toward opening.
    this.streak = 0;
  }

  private onFailure(): void {
    this.failures++;
    if (this.state === 'HALF_OPEN') {
      this.moveTo('OPEN');
      return;
    }
    this.streak++;
    if (this.streak >= this.config.openAfterFailures) this.moveTo('OPEN');
  }

  private remainingCooldown(): number {
    if (this.state !== 'OPEN') return 0;
    return Math.max(0, this.config.cooldownMs - (this.now() - this.openedAt));
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.streak = 0;

    if (next === 'OPEN') {
      this.openedAt = this.now();
      metrics.recordCircuitOpen(this.family);
    } else if (next === 'CLOSED') {
      this.failures = 0;
      this.successes = 0;
      this.calls = 0;
    }

    logger.warn(`Circuit breaker ${this.family}: ${previous} -> ${next}`, {
      provider: this.family,
      failures: this.failures,
      successes: this.successes,
    });
  }
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly overrides: Record<string, CircuitConfig> = {},
    private readonly now: () => number = Date.now
  ) {}

  get(family: string): CircuitBreaker {
    let breaker = this.breakers.get(family);
    if (!breaker) {
      const config = this.overrides[family] ?? FAMILY_CIRCUIT_CONFIG[family] ?? DEFAULT_CIRCUIT_CONFIG;
      breaker = new CircuitBreaker(family, config, this.now);
      this.breakers.set(family, breaker);
    }
    return breaker;
  }

  snapshot(): Record<string, CircuitSnapshot> {
    const result: Record<string, CircuitSnapshot> = {};
    for (const [family, breaker] of this.breakers) {
      result[family] = breaker.snapshot();
    }
    return result;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
    logger.info('All circuit breakers reset');
  }
}
