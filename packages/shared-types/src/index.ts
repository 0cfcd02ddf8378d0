/**
 * @clusterlink/shared-types - types shared by clusterlink packages
 *
 * @packageDocumentation
 */

export type { NodeId, OperationId } from './branded.js';
export { createNodeId, createOperationId, splitHostPort, joinHostPort } from './branded.js';

export { ServiceType, ALL_SERVICE_TYPES, isServiceType, isHttpService } from './services.js';

export type { RetryConfig, JitterMode } from './retry.js';
export { DEFAULT_RETRY_CONFIG, isRetryConfig, createRetryConfig } from './retry.js';

export type { CircuitBreakerConfig, CircuitPolicyKind } from './circuit-breaker.js';
export { DEFAULT_CIRCUIT_BREAKER_CONFIG, createCircuitBreakerConfig } from './circuit-breaker.js';

export { setDevMode, isDevMode, setStrictMode, isStrictMode } from './config.js';
