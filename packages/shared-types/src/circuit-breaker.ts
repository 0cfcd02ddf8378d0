// =============================================================================
// Circuit Breaker Configuration
// =============================================================================

/**
 * Which rule trips a closed breaker.
 *
 * - `consecutive-failures` - trip after `failureThreshold` failures in a row
 * - `rolling-window` - trip when, within `rollingWindowMs`, at least
 *   `volumeThreshold` outcomes were seen and the failure share reached
 *   `errorThresholdPercentage`
 *
 * @public
 */
export type CircuitPolicyKind = 'consecutive-failures' | 'rolling-window';

/**
 * Circuit breaker configuration, applied to every (node, service) pair.
 *
 * @public
 * @since 0.1.0
 */
export interface CircuitBreakerConfig {
  /** When false every request is admitted and nothing is counted */
  enabled: boolean;
  /** Trip rule */
  policy: CircuitPolicyKind;
  /** Consecutive failures before opening (consecutive-failures policy) */
  failureThreshold: number;
  /** Minimum outcomes in the window before the ratio is considered */
  volumeThreshold: number;
  /** Failure percentage (0-100) that trips the rolling-window policy */
  errorThresholdPercentage: number;
  /** Length of the rolling window in milliseconds */
  rollingWindowMs: number;
  /** Time an open breaker waits before admitting a canary */
  cooldownMs: number;
  /** A canary that never reports back is replaced after this long */
  canaryTimeoutMs: number;
  /** Multiplier applied to the cooldown each time a canary fails (1 = off) */
  cooldownBackoffFactor: number;
  /** Ceiling for the backed-off cooldown */
  maxCooldownMs: number;
}

/**
 * Default circuit breaker configuration.
 *
 * @public
 * @since 0.1.0
 */
export const DEFAULT_CIRCUIT_BREAKER_CONFIG: Readonly<CircuitBreakerConfig> = Object.freeze({
  enabled: true,
  policy: 'rolling-window',
  failureThreshold: 5,
  volumeThreshold: 20,
  errorThresholdPercentage: 50,
  rollingWindowMs: 60000,
  cooldownMs: 5000,
  canaryTimeoutMs: 5000,
  cooldownBackoffFactor: 1,
  maxCooldownMs: 60000,
});

/**
 * Creates a validated CircuitBreakerConfig from a partial one.
 *
 * @throws Error if a threshold or interval is out of range
 * @public
 */
export function createCircuitBreakerConfig(
  config: Partial<CircuitBreakerConfig> = {}
): CircuitBreakerConfig {
  const merged: CircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };

  if (merged.failureThreshold < 1) {
    throw new Error('failureThreshold must be at least 1');
  }
  if (merged.volumeThreshold < 1) {
    throw new Error('volumeThreshold must be at least 1');
  }
  if (merged.errorThresholdPercentage <= 0 || merged.errorThresholdPercentage > 100) {
    throw new Error('errorThresholdPercentage must be in (0, 100]');
  }
  if (merged.cooldownMs < 0 || merged.canaryTimeoutMs < 0 || merged.rollingWindowMs <= 0) {
    throw new Error('circuit breaker intervals cannot be negative');
  }
  if (merged.cooldownBackoffFactor < 1) {
    throw new Error('cooldownBackoffFactor must be at least 1');
  }
  if (merged.maxCooldownMs < merged.cooldownMs) {
    throw new Error('maxCooldownMs cannot be less than cooldownMs');
  }

  return merged;
}
