/**
 * Agent Error Hierarchy
 *
 * All errors surfaced by the agent extend AgentError, which provides:
 * - Required error codes and categories
 * - Timestamps
 * - The retry reason (if any) the failure was classified with
 * - Context preservation (operation id, node, service, attempt)
 * - Serialization for structured logging
 *
 * @packageDocumentation
 */

import type { ErrorCode } from './codes.js';
import type { RetryReason } from '../retry/reasons.js';

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Operation the error belongs to */
  operationId?: string;
  /** Node that served (or would have served) the attempt */
  node?: string;
  /** Service kind of the operation */
  service?: string;
  /** Attempt number (0-based) */
  attempt?: number;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format for logs
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  timestamp: number;
  retryReason?: string;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError | { name: string; message: string };
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for consistent handling by callers
 */
export enum ErrorCategory {
  /** Cancellation won the settlement race */
  CANCELLATION = 'CANCELLATION',
  /** Deadline elapsed */
  TIMEOUT = 'TIMEOUT',
  /** No admissible target (breaker, topology, service map) */
  ROUTING = 'ROUTING',
  /** Connection/networking errors */
  TRANSPORT = 'TRANSPORT',
  /** Malformed responses */
  PROTOCOL = 'PROTOCOL',
  /** Invalid input, rejected at submission */
  CONFIGURATION = 'CONFIGURATION',
  /** The server answered with an error */
  SERVICE = 'SERVICE',
}

/**
 * Options accepted by every AgentError constructor.
 */
export interface AgentErrorOptions {
  cause?: unknown;
  retryReason?: RetryReason;
  context?: ErrorContext;
}

// =============================================================================
// Base Agent Error
// =============================================================================

/**
 * Base error class for all agent errors
 *
 * @example
 * ```typescript
 * agent.get({ key: 'user::1', deadline: Date.now() + 2500 }, (err, res) => {
 *   if (err instanceof AgentError) {
 *     console.log(err.code);          // 'OP_TIMEOUT'
 *     console.log(err.isRetryable()); // false
 *     logger.error('get failed', err, { ...err.toJSON() });
 *   }
 * });
 * ```
 */
export abstract class AgentError extends Error {
  /** Machine-readable error code */
  abstract readonly code: ErrorCode;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Retry classification, present when the failure is transient */
  readonly retryReason?: RetryReason;

  /** Error context */
  context?: ErrorContext;

  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = Date.now();
    this.retryReason = options.retryReason;
    this.context = options.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Whether the failure is transient and may be retried by the orchestrator.
   */
  isRetryable(): boolean {
    return this.retryReason !== undefined;
  }

  /**
   * Attach (merge) context and return this error.
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  /**
   * Serialize error for structured logging
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.retryReason) {
      result.retryReason = this.retryReason;
    }

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof AgentError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }
}
