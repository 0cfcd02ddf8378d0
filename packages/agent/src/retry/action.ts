/**
 * Retry actions
 *
 * The decision produced for one failed attempt. Actions are frozen when
 * created and consumed exactly once by the dispatcher.
 *
 * @packageDocumentation
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * Retry immediately.
 */
export interface RetryNowAction {
  readonly kind: 'retry-now';
  /** Re-send to the node of the failed attempt instead of re-resolving */
  readonly preserveTarget: boolean;
}

/**
 * Retry after a backoff delay.
 */
export interface RetryAfterAction {
  readonly kind: 'retry-after';
  readonly delayMs: number;
  readonly preserveTarget: boolean;
}

/**
 * Retry once a topology with a higher revision has been published.
 */
export interface RetryOnNewTopologyAction {
  readonly kind: 'retry-on-new-topology';
  readonly preserveTarget: false;
}

/**
 * Stop. `timedOut` is set when the retry was abandoned only because its
 * earliest start lay at or beyond the deadline.
 */
export interface DoNotRetryAction {
  readonly kind: 'do-not-retry';
  readonly timedOut: boolean;
}

/**
 * @public
 */
export type RetryAction = RetryNowAction | RetryAfterAction | RetryOnNewTopologyAction | DoNotRetryAction;

// =============================================================================
// FACTORIES
// =============================================================================

const DO_NOT_RETRY: DoNotRetryAction = Object.freeze({ kind: 'do-not-retry', timedOut: false });
const TIMED_OUT: DoNotRetryAction = Object.freeze({ kind: 'do-not-retry', timedOut: true });
const ON_NEW_TOPOLOGY: RetryOnNewTopologyAction = Object.freeze({
  kind: 'retry-on-new-topology',
  preserveTarget: false,
});

export function retryNow(preserveTarget = false): RetryNowAction {
  return Object.freeze({ kind: 'retry-now', preserveTarget });
}

export function retryAfter(delayMs: number, preserveTarget = false): RetryAfterAction | RetryNowAction {
  if (delayMs <= 0) {
    return retryNow(preserveTarget);
  }
  return Object.freeze({ kind: 'retry-after', delayMs, preserveTarget });
}

export function retryOnNewTopology(): RetryOnNewTopologyAction {
  return ON_NEW_TOPOLOGY;
}

export function doNotRetry(timedOut = false): DoNotRetryAction {
  return timedOut ? TIMED_OUT : DO_NOT_RETRY;
}

/**
 * Whether the action asks for another attempt.
 */
export function isRetry(action: RetryAction): action is Exclude<RetryAction, DoNotRetryAction> {
  return action.kind !== 'do-not-retry';
}
