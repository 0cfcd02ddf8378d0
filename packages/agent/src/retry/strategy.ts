/**
 * Retry strategies
 *
 * A strategy decides how long to back off for a retryable failure. It is
 * consulted by the orchestrator only after idempotency has been checked, and
 * the orchestrator still applies the deadline to whatever it returns.
 *
 * @packageDocumentation
 */

import { createRetryConfig, type RetryConfig, type ServiceType } from '@clusterlink/shared-types';
import { RETRY_REASON_TRAITS, type RetryReason } from './reasons.js';
import { doNotRetry, retryAfter, type RetryAction } from './action.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * What a strategy (and the orchestrator) may know about the request.
 *
 * @public
 */
export interface RetryRequest {
  readonly operationId: string;
  readonly service: ServiceType;
  /** Declared by the operation; never inferred */
  readonly idempotent: boolean;
  /** Absolute deadline, epoch milliseconds */
  readonly deadline: number;
  /** Per-request override of the agent's default strategy */
  readonly retryStrategy?: RetryStrategy;
  /** Reasons of earlier failed attempts, in order */
  readonly retryReasons: readonly RetryReason[];
}

/**
 * Pluggable retry policy.
 *
 * @public
 * @since 0.1.0
 */
export interface RetryStrategy {
  /**
   * Decide what to do after the attempt numbered `attempt` (0-based) failed
   * with `reason`.
   */
  retryAfter(request: RetryRequest, attempt: number, reason: RetryReason): RetryAction;
}

// =============================================================================
// BACKOFF
// =============================================================================

/**
 * Exponential delay for an attempt, capped, with jitter applied.
 *
 * @param random - source of uniform values in [0, 1)
 */
export function computeBackoff(config: RetryConfig, attempt: number, random: () => number = Math.random): number {
  const exponential = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);
  const capped = Math.min(exponential, config.maxDelayMs);

  switch (config.jitter) {
    case 'none':
      return Math.round(capped);
    case 'full':
      return Math.round(random() * capped);
    case 'equal':
      return Math.round(capped / 2 + random() * (capped / 2));
  }
}

const CONTROLLED_BACKOFF_MS = [1, 10, 50, 100, 500] as const;

/**
 * Fixed schedule used for reasons that are retried regardless of strategy.
 */
export function controlledBackoff(attempt: number): number {
  return CONTROLLED_BACKOFF_MS[attempt] ?? 1000;
}

// =============================================================================
// STRATEGIES
// =============================================================================

/**
 * Options for {@link BestEffortRetryStrategy}.
 */
export interface BestEffortRetryStrategyOptions {
  /**
   * When the failure does not implicate the node that served the attempt,
   * ask for the retry to go back to that node instead of re-resolving
   * against the latest topology. Defaults to false.
   */
  preserveTargetWhenUnimplicated?: boolean;
  /** Uniform random source in [0, 1), for deterministic tests */
  random?: () => number;
}

/**
 * Retries every retryable failure with exponential backoff and jitter until
 * the deadline.
 *
 * @example
 * ```typescript
 * const strategy = new BestEffortRetryStrategy({ baseDelayMs: 5, maxDelayMs: 200 });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class BestEffortRetryStrategy implements RetryStrategy {
  readonly config: RetryConfig;
  private readonly preserveTargetWhenUnimplicated: boolean;
  private readonly random: () => number;

  constructor(config: Partial<RetryConfig> = {}, options: BestEffortRetryStrategyOptions = {}) {
    this.config = createRetryConfig(config);
    this.preserveTargetWhenUnimplicated = options.preserveTargetWhenUnimplicated ?? false;
    this.random = options.random ?? Math.random;
  }

  retryAfter(_request: RetryRequest, attempt: number, reason: RetryReason): RetryAction {
    const preserveTarget = this.preserveTargetWhenUnimplicated && !RETRY_REASON_TRAITS[reason].implicatesTarget;
    return retryAfter(computeBackoff(this.config, attempt, this.random), preserveTarget);
  }
}

/**
 * Never retries, except for reasons that are always retried.
 *
 * @public
 * @since 0.1.0
 */
export class FailFastRetryStrategy implements RetryStrategy {
  retryAfter(): RetryAction {
    return doNotRetry();
  }
}
