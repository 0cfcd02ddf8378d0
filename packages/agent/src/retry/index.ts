export { RetryReason, RETRY_REASON_TRAITS } from './reasons.js';
export type { RetryReasonTraits } from './reasons.js';
export { retryNow, retryAfter, retryOnNewTopology, doNotRetry, isRetry } from './action.js';
export type {
  RetryAction,
  RetryNowAction,
  RetryAfterAction,
  RetryOnNewTopologyAction,
  DoNotRetryAction,
} from './action.js';
export {
  BestEffortRetryStrategy,
  FailFastRetryStrategy,
  computeBackoff,
  controlledBackoff,
} from './strategy.js';
export type { RetryRequest, RetryStrategy, BestEffortRetryStrategyOptions } from './strategy.js';
export { RetryOrchestrator } from './orchestrator.js';
