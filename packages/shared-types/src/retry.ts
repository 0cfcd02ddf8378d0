// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * How random jitter is applied to a computed backoff delay.
 *
 * - `none` - use the computed delay as-is
 * - `full` - uniform in `[0, delay]`
 * - `equal` - uniform in `[delay / 2, delay]`
 *
 * @public
 */
export type JitterMode = 'none' | 'full' | 'equal';

/**
 * Backoff parameters for retrying transient failures.
 *
 * There is deliberately no attempt limit here: an operation's deadline is the
 * only hard stop for its retries.
 *
 * @example
 * ```typescript
 * const retryConfig: RetryConfig = {
 *   baseDelayMs: 1,       // first retry after ~1ms
 *   maxDelayMs: 500,      // never wait longer than 500ms between attempts
 *   backoffFactor: 2,     // double the delay each attempt
 *   jitter: 'full',
 * };
 * ```
 *
 * @public
 * @since 0.1.0
 */
export interface RetryConfig {
  /**
   * Delay in milliseconds before the first retry.
   *
   * The un-jittered delay for attempt `n` (0-based) is
   * `baseDelayMs * backoffFactor^n`, capped at {@link maxDelayMs}.
   */
  baseDelayMs: number;

  /** Ceiling for any single backoff delay, in milliseconds. */
  maxDelayMs: number;

  /** Multiplier applied per attempt. */
  backoffFactor: number;

  /** Jitter applied on top of the exponential delay. */
  jitter: JitterMode;
}

/**
 * Default retry configuration: 1ms doubling up to 500ms, full jitter.
 *
 * @public
 * @since 0.1.0
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  baseDelayMs: 1,
  maxDelayMs: 500,
  backoffFactor: 2,
  jitter: 'full',
});

const JITTER_MODES: readonly string[] = ['none', 'full', 'equal'];

/**
 * Type guard to check if a value is a valid RetryConfig.
 *
 * @public
 * @since 0.1.0
 */
export function isRetryConfig(value: unknown): value is RetryConfig {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  return (
    'baseDelayMs' in value &&
    typeof value.baseDelayMs === 'number' &&
    'maxDelayMs' in value &&
    typeof value.maxDelayMs === 'number' &&
    'backoffFactor' in value &&
    typeof value.backoffFactor === 'number' &&
    'jitter' in value &&
    typeof value.jitter === 'string' &&
    JITTER_MODES.includes(value.jitter)
  );
}

/**
 * Creates a validated RetryConfig, filling unspecified fields from
 * {@link DEFAULT_RETRY_CONFIG}.
 *
 * @throws Error if the configuration values are invalid
 *
 * @example
 * ```typescript
 * const config = createRetryConfig({ baseDelayMs: 10, maxDelayMs: 1000 });
 * ```
 *
 * @public
 * @since 0.1.0
 */
export function createRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const merged: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };

  if (merged.baseDelayMs < 0) {
    throw new Error('baseDelayMs cannot be negative');
  }
  if (merged.maxDelayMs < 0) {
    throw new Error('maxDelayMs cannot be negative');
  }
  if (merged.maxDelayMs < merged.baseDelayMs) {
    throw new Error('maxDelayMs cannot be less than baseDelayMs');
  }
  if (merged.backoffFactor < 1) {
    throw new Error('backoffFactor must be at least 1');
  }
  if (!JITTER_MODES.includes(merged.jitter)) {
    throw new Error(`jitter must be one of ${JITTER_MODES.join(', ')}`);
  }

  return merged;
}
