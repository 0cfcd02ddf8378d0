/**
 * Circuit Breaker Tests
 *
 * State Transitions:
 * ```
 *   CLOSED --3 failures--> OPEN --cooldown--> HALF_OPEN --canary ok--> CLOSED
 *                           ^                     |
 *                           +----canary failed----+
 * ```
 */

import { describe, expect, it } from 'vitest';
import { CircuitBreaker, CircuitState, NodeCircuitBreaker, RollingWindowPolicy } from '../circuit-breaker/index.js';
import { MemorySink, createLogger } from '../logging/index.js';
import { createCircuitBreakerConfig, type CircuitBreakerConfig } from '@clusterlink/shared-types';

// =============================================================================
// Test Helpers
// =============================================================================

function manualClock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: ms => {
      current += ms;
    },
  };
}

const NODE = '10.0.0.1:11210';

// =============================================================================
// Consecutive failures
// =============================================================================

describe('CircuitBreaker (consecutive failures)', () => {
  function setup(overrides: Partial<CircuitBreakerConfig> = {}) {
    const clock = manualClock();
    const breaker = new CircuitBreaker(
      { policy: 'consecutive-failures', failureThreshold: 3, cooldownMs: 100, canaryTimeoutMs: 50, ...overrides },
      { now: clock.now }
    );
    return { clock, breaker };
  }

  it('should open after the failure threshold and reject without counting as attempts', () => {
    const { breaker } = setup();
    for (let i = 0; i < 3; i++) {
      expect(breaker.allow(NODE, 'kv')).toBe(true);
      breaker.report(NODE, 'kv', 'failure');
    }

    expect(breaker.stateOf(NODE, 'kv')).toBe(CircuitState.OPEN);
    expect(breaker.allow(NODE, 'kv')).toBe(false);
    expect(breaker.getCircuit(NODE, 'kv').getMetrics()).toMatchObject({ totalFailures: 3, rejections: 1 });
  });

  it('should start counting over after a success', () => {
    const { breaker } = setup();
    breaker.report(NODE, 'kv', 'failure');
    breaker.report(NODE, 'kv', 'failure');
    breaker.report(NODE, 'kv', 'success');
    breaker.report(NODE, 'kv', 'failure');
    breaker.report(NODE, 'kv', 'failure');

    expect(breaker.stateOf(NODE, 'kv')).toBe(CircuitState.CLOSED);
  });

  it('should admit a single canary after the cooldown and close when it succeeds', () => {
    const { clock, breaker } = setup();
    for (let i = 0; i < 3; i++) {
      breaker.report(NODE, 'kv', 'failure');
    }

    clock.advance(99);
    expect(breaker.allow(NODE, 'kv')).toBe(false);
    clock.advance(1);
    expect(breaker.stateOf(NODE, 'kv')).toBe(CircuitState.HALF_OPEN);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
    expect(breaker.allow(NODE, 'kv')).toBe(false);

    breaker.report(NODE, 'kv', 'success');
    expect(breaker.stateOf(NODE, 'kv')).toBe(CircuitState.CLOSED);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
  });

  it('should reopen when the canary fails, backing off the cooldown', () => {
    const { clock, breaker } = setup({ cooldownBackoffFactor: 2, maxCooldownMs: 150 });
    for (let i = 0; i < 3; i++) {
      breaker.report(NODE, 'kv', 'failure');
    }
    clock.advance(100);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
    breaker.report(NODE, 'kv', 'failure');

    expect(breaker.stateOf(NODE, 'kv')).toBe(CircuitState.OPEN);
    expect(breaker.getCircuit(NODE, 'kv').getMetrics().currentCooldownMs).toBe(150);
    clock.advance(100);
    expect(breaker.allow(NODE, 'kv')).toBe(false);
    clock.advance(50);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
  });

  it('should replace a canary that never reported after the canary timeout', () => {
    const { clock, breaker } = setup();
    for (let i = 0; i < 3; i++) {
      breaker.report(NODE, 'kv', 'failure');
    }
    clock.advance(100);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
    clock.advance(49);
    expect(breaker.allow(NODE, 'kv')).toBe(false);
    clock.advance(1);
    expect(breaker.allow(NODE, 'kv')).toBe(true);
  });

  it('should keep separate breakers per node and service', () => {
    const { breaker } = setup();
    for (let i = 0; i < 3; i++) {
      breaker.report(NODE, 'kv', 'failure');
    }
    expect(breaker.allow(NODE, 'query')).toBe(true);
    expect(breaker.allow('10.0.0.2:11210', 'kv')).toBe(true);
  });

  it('should admit everything when disabled', () => {
    const { breaker } = setup({ enabled: false });
    for (let i = 0; i < 5; i++) {
      breaker.report(NODE, 'kv', 'failure');
    }
    expect(breaker.allow(NODE, 'kv')).toBe(true);
    expect(breaker.getAllMetrics().size).toBe(0);
  });

  it('should drop breakers of nodes that left the topology', () => {
    const { breaker } = setup();
    breaker.report(NODE, 'kv', 'failure');
    breaker.report('10.0.0.2:11210', 'kv', 'failure');

    breaker.retainNodes(new Set(['10.0.0.2:11210']));
    expect([...breaker.getAllMetrics().keys()]).toEqual(['10.0.0.2:11210/kv']);
  });

  it('should log state transitions', () => {
    const sink = new MemorySink();
    const clock = manualClock();
    const circuit = new NodeCircuitBreaker(
      `${NODE}/kv`,
      createCircuitBreakerConfig({ policy: 'consecutive-failures', failureThreshold: 1 }),
      { now: clock.now, logger: createLogger({ sink, level: 'info' }) }
    );
    circuit.report('failure');

    expect(sink.entries.map(entry => entry.message)).toEqual([
      `circuit breaker ${NODE}/kv CLOSED -> OPEN (threshold_exceeded)`,
    ]);
  });
});

// =============================================================================
// Rolling window
// =============================================================================

describe('RollingWindowPolicy', () => {
  it('should trip only once the volume threshold is reached', () => {
    const policy = new RollingWindowPolicy(1000, 4, 50, 0);
    policy.recordFailure(10);
    policy.recordFailure(20);
    policy.recordFailure(30);
    expect(policy.shouldTrip(30)).toBe(false);

    policy.recordSuccess(40);
    expect(policy.shouldTrip(40)).toBe(true);
  });

  it('should forget outcomes once the window is over', () => {
    const policy = new RollingWindowPolicy(1000, 2, 50, 0);
    policy.recordFailure(10);
    policy.recordFailure(1010);
    expect(policy.counts(1010)).toEqual({ successes: 0, failures: 1 });
    expect(policy.shouldTrip(1010)).toBe(false);
  });
});
