export { CircuitBreaker, NodeCircuitBreaker, CircuitState, circuitKey } from './breaker.js';
export type { CircuitOutcome, CircuitMetrics, CircuitBreakerOptions } from './breaker.js';
export {
  ConsecutiveFailuresPolicy,
  RollingWindowPolicy,
  createCircuitPolicy,
} from './policies.js';
export type { CircuitPolicy, PolicyCounts } from './policies.js';
