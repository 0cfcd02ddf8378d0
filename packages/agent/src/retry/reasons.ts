/**
 * Retry reasons
 *
 * The closed set of failure classifications attached to a failed attempt.
 * Every reason carries the policy data the retry orchestrator needs, so the
 * decision never has to inspect error messages or infer idempotency.
 *
 * @packageDocumentation
 */

/**
 * Why an attempt failed in a way that might be retried.
 *
 * @public
 */
export enum RetryReason {
  /** The node could not be connected to */
  NODE_UNREACHABLE = 'NODE_UNREACHABLE',
  /** The connection's in-flight queue to the node is full */
  NODE_OVERLOADED = 'NODE_OVERLOADED',
  /** The node does not own the target; the topology moved on */
  TOPOLOGY_STALE = 'TOPOLOGY_STALE',
  /** The service reported a temporary inability to serve; the request was not executed */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  /** The circuit breaker for the target rejected the attempt */
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  /** No usable connection existed when the request was about to be written */
  SOCKET_NOT_AVAILABLE = 'SOCKET_NOT_AVAILABLE',
  /** The connection closed, or its response arrived garbled, after the request was written */
  SOCKET_CLOSED_IN_FLIGHT = 'SOCKET_CLOSED_IN_FLIGHT',
  /** The node answered with a temporary failure status */
  KV_TEMPORARY_FAILURE = 'KV_TEMPORARY_FAILURE',
  /** The document is locked */
  KV_LOCKED = 'KV_LOCKED',
  /** The query service lost or rejected a prepared statement */
  QUERY_PREPARED_STATEMENT_FAILURE = 'QUERY_PREPARED_STATEMENT_FAILURE',
  /** The current topology has no node able to take the request */
  NO_TARGET_AVAILABLE = 'NO_TARGET_AVAILABLE',
  /** A conflicting mutation on the same document was still in progress */
  NON_IDEMPOTENT_CONFLICT = 'NON_IDEMPOTENT_CONFLICT',
}

/**
 * Policy data attached to each retry reason.
 *
 * @public
 */
export interface RetryReasonTraits {
  /**
   * The request provably did not take effect on the server, so it may be
   * retried even when the operation is not idempotent.
   */
  readonly allowsNonIdempotentRetry: boolean;
  /** Retried regardless of the retry strategy (deadline still applies) */
  readonly alwaysRetry: boolean;
  /** Instead of backing off, the retry waits for the next topology */
  readonly waitsForTopology: boolean;
  /** The failure says something about the node that served the attempt */
  readonly implicatesTarget: boolean;
}

function traits(
  allowsNonIdempotentRetry: boolean,
  alwaysRetry: boolean,
  waitsForTopology: boolean,
  implicatesTarget: boolean
): RetryReasonTraits {
  return Object.freeze({ allowsNonIdempotentRetry, alwaysRetry, waitsForTopology, implicatesTarget });
}

/**
 * Traits of every retry reason.
 *
 * @public
 */
export const RETRY_REASON_TRAITS: Readonly<Record<RetryReason, RetryReasonTraits>> = Object.freeze({
  [RetryReason.NODE_UNREACHABLE]: traits(true, false, false, true),
  [RetryReason.NODE_OVERLOADED]: traits(true, false, false, true),
  [RetryReason.TOPOLOGY_STALE]: traits(true, true, true, true),
  [RetryReason.SERVICE_UNAVAILABLE]: traits(true, false, false, true),
  [RetryReason.CIRCUIT_OPEN]: traits(true, false, false, true),
  [RetryReason.SOCKET_NOT_AVAILABLE]: traits(true, false, false, true),
  [RetryReason.SOCKET_CLOSED_IN_FLIGHT]: traits(false, false, false, true),
  [RetryReason.KV_TEMPORARY_FAILURE]: traits(true, false, false, true),
  [RetryReason.KV_LOCKED]: traits(true, false, false, false),
  [RetryReason.QUERY_PREPARED_STATEMENT_FAILURE]: traits(true, false, false, false),
  [RetryReason.NO_TARGET_AVAILABLE]: traits(true, false, true, false),
  [RetryReason.NON_IDEMPOTENT_CONFLICT]: traits(true, false, false, false),
});
