/**
 * Agent errors
 *
 * Concrete error kinds surfaced through settlement callbacks, row readers and
 * synchronous dispatch failures.
 *
 * @packageDocumentation
 */

import { AgentError, ErrorCategory, type AgentErrorOptions } from './base.js';
import { ErrorCode, KvStatus, kvStatusName } from './codes.js';
import { RetryReason } from '../retry/reasons.js';

export { AgentError, ErrorCategory } from './base.js';
export type { AgentErrorOptions, ErrorContext, SerializedError } from './base.js';
export { ErrorCode, KvStatus, kvStatusName } from './codes.js';

// =============================================================================
// Settlement Errors
// =============================================================================

/**
 * Cancellation (caller, AbortSignal or shutdown) won the settlement race.
 */
export class RequestCanceledError extends AgentError {
  readonly code = ErrorCode.REQUEST_CANCELED;
  readonly category = ErrorCategory.CANCELLATION;

  constructor(message = 'request canceled', options: AgentErrorOptions = {}) {
    super(message, options);
    this.name = 'RequestCanceledError';
  }
}

/**
 * The operation's deadline elapsed before it settled.
 *
 * When a retry was abandoned because its earliest start lay past the
 * deadline, `cause` holds the transient failure that triggered it.
 */
export class TimeoutError extends AgentError {
  readonly code = ErrorCode.TIMEOUT;
  readonly category = ErrorCategory.TIMEOUT;
  /** Attempts made before the deadline elapsed */
  readonly retryAttempts: number;
  /** Reasons of the failed attempts, in order */
  readonly retryReasons: readonly RetryReason[];

  constructor(
    message = 'operation timed out',
    options: AgentErrorOptions & { retryAttempts?: number; retryReasons?: readonly RetryReason[] } = {}
  ) {
    super(message, options);
    this.name = 'TimeoutError';
    this.retryAttempts = options.retryAttempts ?? 0;
    this.retryReasons = Object.freeze([...(options.retryReasons ?? [])]);
  }
}

// =============================================================================
// Routing Errors
// =============================================================================

/**
 * The circuit breaker for the target rejected the attempt.
 */
export class CircuitOpenError extends AgentError {
  readonly code = ErrorCode.CIRCUIT_OPEN;
  readonly category = ErrorCategory.ROUTING;
  readonly node: string;

  constructor(node: string, service: string) {
    super(`circuit open for ${node}/${service}`, {
      retryReason: RetryReason.CIRCUIT_OPEN,
      context: { node, service },
    });
    this.name = 'CircuitOpenError';
    this.node = node;
  }
}

/**
 * No topology has been obtained yet and the request did not opt into waiting.
 */
export class TopologyUnavailableError extends AgentError {
  readonly code = ErrorCode.TOPOLOGY_UNAVAILABLE;
  readonly category = ErrorCategory.ROUTING;

  constructor(message = 'no cluster configuration available yet', options: AgentErrorOptions = {}) {
    super(message, options);
    this.name = 'TopologyUnavailableError';
  }
}

/**
 * No node in the current topology advertises the service.
 */
export class ServiceNotAvailableError extends AgentError {
  readonly code = ErrorCode.SERVICE_NOT_AVAILABLE;
  readonly category = ErrorCategory.ROUTING;
  readonly service: string;

  constructor(service: string, options: AgentErrorOptions & { detail?: string } = {}) {
    super(`no node offers the ${service} service${options.detail ? `: ${options.detail}` : ''}`, options);
    this.name = 'ServiceNotAvailableError';
    this.service = service;
  }
}

// =============================================================================
// Network Errors
// =============================================================================

/**
 * Connection-level failure. Retryable when it carries a reason.
 */
export class TransportError extends AgentError {
  readonly code = ErrorCode.TRANSPORT_FAILURE;
  readonly category = ErrorCategory.TRANSPORT;

  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The peer sent bytes that could not be decoded.
 */
export class ProtocolError extends AgentError {
  readonly code = ErrorCode.PROTOCOL_FAILURE;
  readonly category = ErrorCategory.PROTOCOL;

  /** Defaults to SOCKET_CLOSED_IN_FLIGHT: the node's answer was lost after the request was sent */
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, retryReason: options.retryReason ?? RetryReason.SOCKET_CLOSED_IN_FLIGHT });
    this.name = 'ProtocolError';
  }
}

// =============================================================================
// Input Errors
// =============================================================================

/**
 * Invalid configuration or request. Thrown synchronously, never settled.
 */
export class ConfigurationError extends AgentError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly category = ErrorCategory.CONFIGURATION;
  /** Option or field that was rejected */
  readonly option?: string;

  constructor(message: string, option?: string, options: AgentErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.option = option;
  }
}

/**
 * The agent was closed before the operation could be issued.
 */
export class AgentClosedError extends AgentError {
  readonly code = ErrorCode.AGENT_CLOSED;
  readonly category = ErrorCategory.CONFIGURATION;

  constructor() {
    super('agent is closed');
    this.name = 'AgentClosedError';
  }
}

// =============================================================================
// Service Errors
// =============================================================================

/**
 * A key/value node answered with a non-success status.
 */
export class KeyValueError extends AgentError {
  readonly code = ErrorCode.KV_STATUS;
  readonly category = ErrorCategory.SERVICE;
  readonly status: number;

  constructor(status: number, options: AgentErrorOptions = {}) {
    super(`key/value status ${kvStatusName(status)}`, options);
    this.name = 'KeyValueError';
    this.status = status;
  }

  get isNotFound(): boolean {
    return this.status === KvStatus.KEY_NOT_FOUND;
  }

  get isExists(): boolean {
    return this.status === KvStatus.KEY_EXISTS;
  }
}

/**
 * One entry of a query service's `errors` attribute.
 */
export interface QueryErrorDescriptor {
  code: number;
  msg: string;
}

/**
 * An HTTP service answered with an error status or an `errors` attribute.
 */
export class HttpServiceError extends AgentError {
  readonly code = ErrorCode.HTTP_SERVICE;
  readonly category = ErrorCategory.SERVICE;
  readonly service: string;
  readonly statusCode: number;
  readonly errors: readonly QueryErrorDescriptor[];

  constructor(
    service: string,
    statusCode: number,
    errors: readonly QueryErrorDescriptor[],
    options: AgentErrorOptions = {}
  ) {
    const first = errors[0];
    super(
      first
        ? `${service} error ${first.code}: ${first.msg}`
        : `${service} responded with HTTP ${statusCode}`,
      options
    );
    this.name = 'HttpServiceError';
    this.service = service;
    this.statusCode = statusCode;
    this.errors = Object.freeze([...errors]);
  }
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Strip credentials from a URL so it can appear in messages and logs.
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      parsed.username = '***';
      parsed.password = '';
    }
    return parsed.toString();
  } catch {
    return url.replace(/\/\/[^@/]*@/, '//***@');
  }
}

/**
 * Wrap anything thrown by a collaborator into an AgentError.
 */
export function toAgentError(error: unknown, fallback: (message: string, cause: unknown) => AgentError): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return fallback(message, error);
}
