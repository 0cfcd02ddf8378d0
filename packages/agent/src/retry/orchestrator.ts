/**
 * Retry orchestrator
 *
 * Pure classification of a failed attempt into a {@link RetryAction}. Never
 * performs I/O and never reads the clock itself.
 *
 * @packageDocumentation
 */

import { AgentError } from '../errors/index.js';
import { RETRY_REASON_TRAITS } from './reasons.js';
import { doNotRetry, retryAfter, retryOnNewTopology, type RetryAction } from './action.js';
import { BestEffortRetryStrategy, controlledBackoff, type RetryRequest, type RetryStrategy } from './strategy.js';

export class RetryOrchestrator {
  readonly defaultStrategy: RetryStrategy;

  constructor(defaultStrategy: RetryStrategy = new BestEffortRetryStrategy()) {
    this.defaultStrategy = defaultStrategy;
  }

  /**
   * Decide what follows the failure of attempt `attempt` (0-based).
   *
   * - errors without a retry reason are terminal
   * - non-idempotent requests only retry on reasons that prove the request
   *   never took effect
   * - reasons that always retry bypass the strategy
   * - a retry whose earliest start is at or past the deadline becomes
   *   `do-not-retry` with `timedOut` set
   *
   * @param now - current time, epoch milliseconds
   */
  classify(request: RetryRequest, attempt: number, error: unknown, now: number): RetryAction {
    if (!(error instanceof AgentError) || error.retryReason === undefined) {
      return doNotRetry();
    }

    const reason = error.retryReason;
    const traits = RETRY_REASON_TRAITS[reason];

    if (!request.idempotent && !traits.allowsNonIdempotentRetry) {
      return doNotRetry();
    }

    let action: RetryAction;
    if (traits.alwaysRetry) {
      action = traits.waitsForTopology ? retryOnNewTopology() : retryAfter(controlledBackoff(attempt));
    } else {
      const strategy = request.retryStrategy ?? this.defaultStrategy;
      action = strategy.retryAfter(request, attempt, reason);
      if (action.kind !== 'do-not-retry' && traits.waitsForTopology) {
        action = retryOnNewTopology();
      }
    }

    switch (action.kind) {
      case 'do-not-retry':
        return action;
      case 'retry-after':
        return now + action.delayMs >= request.deadline ? doNotRetry(true) : action;
      case 'retry-now':
      case 'retry-on-new-topology':
        return now >= request.deadline ? doNotRetry(true) : action;
    }
  }
}
