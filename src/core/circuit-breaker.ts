/**
 * Per-plugin circuit breaker.
 *
 * State per plugin id is `{failures, lastFailureAt, openUntil}`. Failures
 * further apart than the window restart the count; reaching the threshold
 * opens the breaker for the open duration. Once that passes, exactly one
 * trial call is let through: success closes the breaker, failure reopens
 * it for another full open duration.
 *
 * All methods are synchronous, so a check and its update can never be
 * interleaved with another request on the event loop.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface CircuitBreakerConfig {
  /** Rolling failure window. */
  windowMs: number;
  /** Failures within the window that open the breaker. */
  maxFailures: number;
  /** How long an open breaker skips the plugin. */
  openMs: number;
}

export type BreakerState = 'closed' | 'open' | 'half-open';

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

interface PluginBreaker {
  failures: number;
  lastFailureAt: number;
  openUntil: number | null;
  trialInFlight: boolean;
}

// ---------------------------------------------------------------------------
// CircuitBreaker
// ---------------------------------------------------------------------------

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;
  private readonly breakers = new Map<string, PluginBreaker>();

  constructor(config: CircuitBreakerConfig, now: () => number = () => Date.now()) {
    validateConfig(config);
    this.config = config;
    this.now = now;
  }

  /**
   * Whether `id` may be called now. Past the open duration the first
   * caller gets the single trial slot; others are refused until it
   * reports back.
   */
  tryAcquire(id: string): boolean {
    const breaker = this.breakers.get(id);
    if (!breaker || breaker.openUntil === null) return true;
    if (this.now() < breaker.openUntil || breaker.trialInFlight) return false;
    breaker.trialInFlight = true;
    return true;
  }

  recordSuccess(id: string): void {
    this.breakers.delete(id);
  }

  /** Count a failure; returns true when this failure opened the breaker. */
  recordFailure(id: string): boolean {
    const now = this.now();
    const breaker = this.getOrCreate(id);

    if (breaker.openUntil !== null) {
      breaker.lastFailureAt = now;
      breaker.openUntil = now + this.config.openMs;
      breaker.trialInFlight = false;
      return true;
    }

    if (now - breaker.lastFailureAt > this.config.windowMs) {
      breaker.failures = 0;
    }
    breaker.failures += 1;
    breaker.lastFailureAt = now;
    if (breaker.failures >= this.config.maxFailures) {
      breaker.openUntil = now + this.config.openMs;
      return true;
    }
    return false;
  }

  state(id: string): BreakerState {
    const breaker = this.breakers.get(id);
    if (!breaker || breaker.openUntil === null) return 'closed';
    return this.now() < breaker.openUntil ? 'open' : 'half-open';
  }

  /** Failures counted in the current window. */
  failures(id: string): number {
    return this.breakers.get(id)?.failures ?? 0;
  }

  /** Clear all breaker state. */
  reset(): void {
    this.breakers.clear();
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private getOrCreate(id: string): PluginBreaker {
    let breaker = this.breakers.get(id);
    if (!breaker) {
      breaker = { failures: 0, lastFailureAt: this.now(), openUntil: null, trialInFlight: false };
      this.breakers.set(id, breaker);
    }
    return breaker;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: CircuitBreakerConfig): void {
  if (config.windowMs <= 0) {
    throw new Error('windowMs must be positive');
  }
  if (!Number.isInteger(config.maxFailures) || config.maxFailures <= 0) {
    throw new Error('maxFailures must be a positive integer');
  }
  if (config.openMs <= 0) {
    throw new Error('openMs must be positive');
  }
}
