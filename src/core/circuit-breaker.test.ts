import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitBreakerConfig } from './circuit-breaker.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function defaultConfig(overrides?: Partial<CircuitBreakerConfig>): CircuitBreakerConfig {
  return {
    windowMs: 30_000,
    maxFailures: 5,
    openMs: 30_000,
    ...overrides,
  };
}

function fail(breaker: CircuitBreaker, id: string, times: number): void {
  for (let i = 0; i < times; i++) {
    expect(breaker.tryAcquire(id)).toBe(true);
    breaker.recordFailure(id);
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    breaker = new CircuitBreaker(defaultConfig());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('construction', () => {
    it('rejects a non-positive window', () => {
      expect(() => new CircuitBreaker(defaultConfig({ windowMs: 0 }))).toThrow(
        /windowMs must be positive/,
      );
    });

    it('rejects a fractional threshold', () => {
      expect(() => new CircuitBreaker(defaultConfig({ maxFailures: 1.5 }))).toThrow(
        /maxFailures must be a positive integer/,
      );
    });

    it('rejects a non-positive open duration', () => {
      expect(() => new CircuitBreaker(defaultConfig({ openMs: -1 }))).toThrow(
        /openMs must be positive/,
      );
    });
  });

  describe('tripping', () => {
    it('stays closed below the threshold', () => {
      fail(breaker, 'p', 4);

      expect(breaker.state('p')).toBe('closed');
      expect(breaker.failures('p')).toBe(4);
      expect(breaker.tryAcquire('p')).toBe(true);
    });

    it('opens on the fifth failure and skips the sixth call', () => {
      fail(breaker, 'p', 4);
      expect(breaker.recordFailure('p')).toBe(true);

      expect(breaker.state('p')).toBe('open');
      expect(breaker.tryAcquire('p')).toBe(false);
    });

    it('keeps plugins independent', () => {
      fail(breaker, 'p', 5);
      expect(breaker.tryAcquire('q')).toBe(true);
    });

    it('restarts the count when failures are further apart than the window', () => {
      fail(breaker, 'p', 4);
      vi.advanceTimersByTime(30_001);
      fail(breaker, 'p', 1);

      expect(breaker.failures('p')).toBe(1);
      expect(breaker.state('p')).toBe('closed');
    });

    it('counts failures exactly at the window edge', () => {
      fail(breaker, 'p', 4);
      vi.advanceTimersByTime(30_000);
      fail(breaker, 'p', 1);

      expect(breaker.state('p')).toBe('open');
    });

    it('resets all state on success', () => {
      fail(breaker, 'p', 4);
      breaker.recordSuccess('p');
      fail(breaker, 'p', 4);

      expect(breaker.state('p')).toBe('closed');
      expect(breaker.failures('p')).toBe(4);
    });
  });

  describe('recovery', () => {
    beforeEach(() => {
      fail(breaker, 'p', 5);
      vi.advanceTimersByTime(30_000);
    });

    it('lets exactly one trial through after the open duration', () => {
      expect(breaker.state('p')).toBe('half-open');
      expect(breaker.tryAcquire('p')).toBe(true);
      expect(breaker.tryAcquire('p')).toBe(false);
    });

    it('closes after a successful trial', () => {
      breaker.tryAcquire('p');
      breaker.recordSuccess('p');

      expect(breaker.state('p')).toBe('closed');
      expect(breaker.failures('p')).toBe(0);
    });

    it('reopens for a full open duration after a failed trial', () => {
      breaker.tryAcquire('p');
      expect(breaker.recordFailure('p')).toBe(true);

      expect(breaker.state('p')).toBe('open');
      vi.advanceTimersByTime(29_999);
      expect(breaker.tryAcquire('p')).toBe(false);
      vi.advanceTimersByTime(1);
      expect(breaker.tryAcquire('p')).toBe(true);
    });
  });

  it('reset() clears every plugin', () => {
    fail(breaker, 'p', 5);
    breaker.reset();
    expect(breaker.state('p')).toBe('closed');
  });

  it('accepts an injected clock', () => {
    let now = 0;
    const manual = new CircuitBreaker(defaultConfig({ maxFailures: 1, openMs: 10 }), () => now);

    manual.recordFailure('p');
    expect(manual.tryAcquire('p')).toBe(false);
    now = 10;
    expect(manual.tryAcquire('p')).toBe(true);
  });
});
