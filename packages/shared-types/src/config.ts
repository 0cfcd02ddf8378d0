/**
 * Runtime Configuration for @clusterlink/shared-types
 *
 * This module holds the runtime switches that affect the factory functions in
 * the main module. It is kept apart from the type definitions so that the
 * type modules stay free of global state.
 *
 * - _devMode: Enables/disables input validation in factory functions
 * - _strictMode: Enables stricter format validation (e.g. port ranges)
 *
 * @module config
 */

// =============================================================================
// Runtime Mode Configuration
// =============================================================================

let _devMode = true; // Default to dev mode for safety
let _strictMode = false;

/**
 * Set development mode for enabling runtime validation
 */
export function setDevMode(enabled: boolean): void {
  _devMode = enabled;
}

/**
 * Check if development mode is enabled
 */
export function isDevMode(): boolean {
  return _devMode;
}

/**
 * Set strict mode for additional format validation
 */
export function setStrictMode(enabled: boolean): void {
  _strictMode = enabled;
}

/**
 * Check if strict mode is enabled
 */
export function isStrictMode(): boolean {
  return _strictMode;
}

/**
 * Whether factory functions should validate their input at all.
 * @internal
 */
export function _shouldValidate(): boolean {
  return _devMode || _strictMode;
}
