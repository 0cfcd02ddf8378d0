/**
 * Node Circuit Breaker
 *
 * One breaker per (node, service) pair. Open breakers reject attempts before
 * any network resource is used, so the retry goes elsewhere.
 *
 * State Transitions:
 * ```
 *         policy trips
 *   CLOSED ─────────────────────> OPEN <────────┐
 *      ^                           │            │
 *      │                           │ cooldown   │ canary failed
 *      │                           v            │ (cooldown backs off)
 *      │    canary succeeded   HALF_OPEN ───────┘
 *      └───────────────────────────┘
 * ```
 *
 * @packageDocumentation
 */

import { DEFAULT_CIRCUIT_BREAKER_CONFIG, type CircuitBreakerConfig } from '@clusterlink/shared-types';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { createCircuitPolicy, type CircuitPolicy } from './policies.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Circuit breaker states
 */
export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export type CircuitOutcome = 'success' | 'failure';

/**
 * Circuit breaker metrics
 */
export interface CircuitMetrics {
  state: CircuitState;
  successes: number;
  failures: number;
  totalFailures: number;
  totalSuccesses: number;
  rejections: number;
  stateChangedAt: number;
  currentCooldownMs: number;
}

export interface CircuitBreakerOptions {
  logger?: StructuredLogger;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

// =============================================================================
// NodeCircuitBreaker
// =============================================================================

/**
 * Breaker for a single (node, service) pair.
 */
export class NodeCircuitBreaker {
  readonly key: string;
  private readonly config: CircuitBreakerConfig;
  private readonly policy: CircuitPolicy;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;

  private state: CircuitState = CircuitState.CLOSED;
  private openedAt = 0;
  private currentCooldownMs: number;
  private canaryStartedAt: number | null = null;
  private stateChangedAt: number;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private rejections = 0;

  constructor(key: string, config: CircuitBreakerConfig, options: CircuitBreakerOptions = {}) {
    this.key = key;
    this.config = config;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createNoopLogger();
    this.stateChangedAt = this.now();
    this.policy = createCircuitPolicy(config, this.stateChangedAt);
    this.currentCooldownMs = config.cooldownMs;
  }

  // ===========================================================================
  // Core API
  // ===========================================================================

  /**
   * Whether an attempt may be sent. In half-open state this admits exactly
   * one canary; a canary that has not reported within `canaryTimeoutMs` is
   * replaced by the next caller.
   */
  allow(): boolean {
    const now = this.now();
    this.checkCooldownTransition(now);

    switch (this.state) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.OPEN:
        this.rejections++;
        return false;
      case CircuitState.HALF_OPEN:
        if (this.canaryStartedAt === null || now - this.canaryStartedAt >= this.config.canaryTimeoutMs) {
          this.canaryStartedAt = now;
          return true;
        }
        this.rejections++;
        return false;
    }
  }

  report(outcome: CircuitOutcome): void {
    const now = this.now();
    if (outcome === 'success') {
      this.recordSuccess(now);
    } else {
      this.recordFailure(now);
    }
  }

  getState(): CircuitState {
    this.checkCooldownTransition(this.now());
    return this.state;
  }

  getMetrics(): CircuitMetrics {
    const now = this.now();
    const counts = this.policy.counts(now);
    return {
      state: this.getState(),
      successes: counts.successes,
      failures: counts.failures,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      rejections: this.rejections,
      stateChangedAt: this.stateChangedAt,
      currentCooldownMs: this.currentCooldownMs,
    };
  }

  /**
   * Reset circuit to closed state
   */
  reset(): void {
    const now = this.now();
    const previous = this.state;
    this.policy.reset(now);
    this.currentCooldownMs = this.config.cooldownMs;
    this.canaryStartedAt = null;
    this.transition(previous, CircuitState.CLOSED, 'reset', now);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private recordSuccess(now: number): void {
    this.totalSuccesses++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.policy.reset(now);
      this.currentCooldownMs = this.config.cooldownMs;
      this.canaryStartedAt = null;
      this.transition(CircuitState.HALF_OPEN, CircuitState.CLOSED, 'canary_succeeded', now);
    } else if (this.state === CircuitState.CLOSED) {
      this.policy.recordSuccess(now);
    }
  }

  private recordFailure(now: number): void {
    this.totalFailures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.currentCooldownMs = Math.min(
        this.currentCooldownMs * this.config.cooldownBackoffFactor,
        this.config.maxCooldownMs
      );
      this.open(CircuitState.HALF_OPEN, 'canary_failed', now);
    } else if (this.state === CircuitState.CLOSED) {
      this.policy.recordFailure(now);
      if (this.policy.shouldTrip(now)) {
        this.open(CircuitState.CLOSED, 'threshold_exceeded', now);
      }
    }
  }

  private open(from: CircuitState, reason: string, now: number): void {
    this.openedAt = now;
    this.canaryStartedAt = null;
    this.policy.reset(now);
    this.transition(from, CircuitState.OPEN, reason, now);
  }

  /**
   * OPEN -> HALF_OPEN once the cooldown has elapsed
   */
  private checkCooldownTransition(now: number): void {
    if (this.state === CircuitState.OPEN && now - this.openedAt >= this.currentCooldownMs) {
      this.canaryStartedAt = null;
      this.transition(CircuitState.OPEN, CircuitState.HALF_OPEN, 'cooldown_elapsed', now);
    }
  }

  private transition(from: CircuitState, to: CircuitState, reason: string, now: number): void {
    this.state = to;
    this.stateChangedAt = now;
    if (from !== to) {
      this.logger.info('circuit breaker {circuit} {from} -> {to} ({reason})', {
        circuit: this.key,
        from,
        to,
        reason,
        cooldownMs: this.currentCooldownMs,
      });
    }
  }
}

// =============================================================================
// CircuitBreaker
// =============================================================================

/**
 * Breakers for every (node, service) pair, created on first use.
 *
 * @example
 * ```typescript
 * const breakers = new CircuitBreaker({ policy: 'consecutive-failures', failureThreshold: 3 });
 * if (breakers.allow(node, 'kv')) {
 *   // send, then:
 *   breakers.report(node, 'kv', 'failure');
 * }
 * ```
 */
export class CircuitBreaker {
  private readonly circuits: Map<string, NodeCircuitBreaker> = new Map();
  private readonly config: CircuitBreakerConfig;
  private readonly options: CircuitBreakerOptions;

  constructor(config: Partial<CircuitBreakerConfig> = {}, options: CircuitBreakerOptions = {}) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.options = options;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  allow(node: string, service: string): boolean {
    if (!this.config.enabled) {
      return true;
    }
    return this.getCircuit(node, service).allow();
  }

  report(node: string, service: string, outcome: CircuitOutcome): void {
    if (!this.config.enabled) {
      return;
    }
    this.getCircuit(node, service).report(outcome);
  }

  /**
   * Current state without admitting a canary.
   */
  stateOf(node: string, service: string): CircuitState {
    return this.circuits.get(circuitKey(node, service))?.getState() ?? CircuitState.CLOSED;
  }

  getCircuit(node: string, service: string): NodeCircuitBreaker {
    const key = circuitKey(node, service);
    let circuit = this.circuits.get(key);

    if (!circuit) {
      circuit = new NodeCircuitBreaker(key, this.config, this.options);
      this.circuits.set(key, circuit);
    }

    return circuit;
  }

  /**
   * Drop breakers for nodes that left the topology.
   */
  retainNodes(nodes: ReadonlySet<string>): void {
    for (const [key, circuit] of this.circuits) {
      const node = key.slice(0, key.lastIndexOf('/'));
      if (!nodes.has(node)) {
        this.circuits.delete(key);
        this.options.logger?.debug('dropped circuit {circuit}', { circuit: circuit.key });
      }
    }
  }

  getAllMetrics(): Map<string, CircuitMetrics> {
    const metrics = new Map<string, CircuitMetrics>();
    for (const [key, circuit] of this.circuits) {
      metrics.set(key, circuit.getMetrics());
    }
    return metrics;
  }

  resetAll(): void {
    for (const circuit of this.circuits.values()) {
      circuit.reset();
    }
  }
}

export function circuitKey(node: string, service: string): string {
  return `${node}/${service}`;
}
