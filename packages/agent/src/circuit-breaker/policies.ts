/**
 * Circuit trip policies
 *
 * A policy counts outcomes while a breaker is closed and says when it should
 * open. Breakers own one policy instance each.
 *
 * @packageDocumentation
 */

import type { CircuitBreakerConfig } from '@clusterlink/shared-types';

/**
 * Counters exposed for monitoring.
 */
export interface PolicyCounts {
  successes: number;
  failures: number;
}

/**
 * Decides when a closed breaker trips.
 *
 * @public
 */
export interface CircuitPolicy {
  recordSuccess(now: number): void;
  recordFailure(now: number): void;
  /** Whether the outcomes recorded so far warrant opening */
  shouldTrip(now: number): boolean;
  /** Forget everything (called when the breaker closes or opens) */
  reset(now: number): void;
  counts(now: number): PolicyCounts;
}

/**
 * Trips after `threshold` failures in a row. Any success starts over.
 */
export class ConsecutiveFailuresPolicy implements CircuitPolicy {
  private consecutiveFailures = 0;
  private successes = 0;

  constructor(private readonly threshold: number) {}

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.successes++;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
  }

  shouldTrip(): boolean {
    return this.consecutiveFailures >= this.threshold;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.successes = 0;
  }

  counts(): PolicyCounts {
    return { successes: this.successes, failures: this.consecutiveFailures };
  }
}

/**
 * Trips when, within the current window, at least `volumeThreshold` outcomes
 * were recorded and the failure share reached `errorThresholdPercentage`.
 * The window restarts once it is `windowMs` old.
 */
export class RollingWindowPolicy implements CircuitPolicy {
  private windowStart: number;
  private successes = 0;
  private failures = 0;

  constructor(
    private readonly windowMs: number,
    private readonly volumeThreshold: number,
    private readonly errorThresholdPercentage: number,
    now: number = Date.now()
  ) {
    this.windowStart = now;
  }

  private roll(now: number): void {
    if (now - this.windowStart >= this.windowMs) {
      this.reset(now);
    }
  }

  recordSuccess(now: number): void {
    this.roll(now);
    this.successes++;
  }

  recordFailure(now: number): void {
    this.roll(now);
    this.failures++;
  }

  shouldTrip(now: number): boolean {
    this.roll(now);
    const total = this.successes + this.failures;
    if (total < this.volumeThreshold) {
      return false;
    }
    return (this.failures / total) * 100 >= this.errorThresholdPercentage;
  }

  reset(now: number): void {
    this.windowStart = now;
    this.successes = 0;
    this.failures = 0;
  }

  counts(now: number): PolicyCounts {
    this.roll(now);
    return { successes: this.successes, failures: this.failures };
  }
}

/**
 * Policy instance for a breaker, built from configuration.
 */
export function createCircuitPolicy(config: CircuitBreakerConfig, now: number): CircuitPolicy {
  switch (config.policy) {
    case 'consecutive-failures':
      return new ConsecutiveFailuresPolicy(config.failureThreshold);
    case 'rolling-window':
      return new RollingWindowPolicy(
        config.rollingWindowMs,
        config.volumeThreshold,
        config.errorThresholdPercentage,
        now
      );
  }
}
