/**
 * Operation dispatcher
 *
 * Turns one logical request into attempts: picks a node (topology and
 * circuit breaker), runs the attempt's executor against it, reports the
 * outcome to the breaker and, on failure, asks the retry orchestrator what
 * happens next. The pending operation owns every timer, watcher and abort
 * hook created along the way, so settling it (success, failure, cancel or
 * deadline) tears all of them down before the callback runs.
 *
 * ```
 * dispatch ──> select node ──> execute ──ok──> succeed
 *                  ^              │
 *                  │            error
 *                  │              v
 *       backoff / new topology <── classify ──> fail | timeout
 * ```
 *
 * @packageDocumentation
 */

import { isServiceType, ServiceType, type NodeId, type OperationId } from '@clusterlink/shared-types';
import type { CircuitBreaker } from './circuit-breaker/index.js';
import {
  AgentClosedError,
  AgentError,
  CircuitOpenError,
  ConfigurationError,
  ErrorCategory,
  RequestCanceledError,
  ServiceNotAvailableError,
  TopologyUnavailableError,
  TransportError,
  toAgentError,
} from './errors/index.js';
import { createNoopLogger, type StructuredLogger } from './logging/index.js';
import type {
  OperationCallback,
  PendingOperation,
  PendingOperationRegistry,
  PendingOpHandle,
} from './registry/index.js';
import { RetryOrchestrator } from './retry/orchestrator.js';
import { RetryReason } from './retry/reasons.js';
import type { RetryStrategy } from './retry/strategy.js';
import type { TopologyManager } from './topology/manager.js';
import type { TopologyNode, TopologyRevision } from './topology/snapshot.js';
import { NoopTracer, type RequestSpan, type RequestTracer } from './tracing.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What an executor gets for one attempt.
 */
export interface AttemptContext {
  readonly operationId: OperationId;
  /** 0-based */
  readonly attempt: number;
  readonly node: TopologyNode;
  /** host:port of the node's endpoint for the request's service */
  readonly endpoint: string;
  /** Set for key/value requests routed by key */
  readonly vbucketId?: number;
  /** Absolute deadline of the operation */
  readonly deadline: number;
  /** Aborted when the operation settles while the attempt is running */
  readonly signal: AbortSignal;
  readonly span: RequestSpan;
}

/**
 * One logical request. Immutable once dispatched.
 */
export interface OperationRequest<T> {
  /** Span name */
  readonly name: string;
  readonly service: ServiceType;
  /** Absolute deadline, epoch milliseconds */
  readonly deadline: number;
  readonly idempotent: boolean;
  /** Key to route by (key/value) */
  readonly routingKey?: string | Uint8Array;
  readonly retryStrategy?: RetryStrategy;
  readonly signal?: AbortSignal;
  /** Wait (until the deadline) for a first topology instead of failing */
  readonly waitForConfig?: boolean;
  /** Perform one attempt against the selected node */
  execute(context: AttemptContext): Promise<T>;
  /** Release a result produced after the operation already settled */
  discard?(result: T): void;
}

export interface DispatcherOptions {
  topology: TopologyManager;
  breaker: CircuitBreaker;
  registry: PendingOperationRegistry;
  orchestrator?: RetryOrchestrator;
  tracer?: RequestTracer;
  logger?: StructuredLogger;
  now?: () => number;
}

interface DispatchState<T> {
  readonly op: PendingOperation<T>;
  readonly request: OperationRequest<T>;
  readonly span: RequestSpan;
}

/** Reasons that count against the node in the circuit breaker */
const NODE_FAILURE_REASONS: ReadonlySet<RetryReason> = new Set([
  RetryReason.NODE_UNREACHABLE,
  RetryReason.NODE_OVERLOADED,
  RetryReason.SERVICE_UNAVAILABLE,
  RetryReason.SOCKET_CLOSED_IN_FLIGHT,
]);

/** Reasons for which the request never reached the node */
const NOT_SENT_REASONS: ReadonlySet<RetryReason> = new Set([
  RetryReason.CIRCUIT_OPEN,
  RetryReason.SOCKET_NOT_AVAILABLE,
]);

// =============================================================================
// Dispatcher
// =============================================================================

export class Dispatcher {
  private readonly topology: TopologyManager;
  private readonly breaker: CircuitBreaker;
  private readonly registry: PendingOperationRegistry;
  private readonly orchestrator: RetryOrchestrator;
  private readonly tracer: RequestTracer;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private closed = false;

  constructor(options: DispatcherOptions) {
    this.topology = options.topology;
    this.breaker = options.breaker;
    this.registry = options.registry;
    this.orchestrator = options.orchestrator ?? new RetryOrchestrator();
    this.tracer = options.tracer ?? new NoopTracer();
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Accept a request. The callback is invoked exactly once, asynchronously.
   *
   * @throws ConfigurationError for a malformed request,
   * TopologyUnavailableError when there is no topology yet and the request
   * does not wait for one, ServiceNotAvailableError when no node offers the
   * service or a keyed request meets a configuration without a vbucket map,
   * AgentClosedError after `close()`
   */
  dispatch<T>(request: OperationRequest<T>, callback: OperationCallback<T>): PendingOpHandle {
    if (this.closed) {
      throw new AgentClosedError();
    }
    if (!isServiceType(request.service)) {
      throw new ConfigurationError(`unknown service ${String(request.service)}`, 'service');
    }
    if (!Number.isFinite(request.deadline)) {
      throw new ConfigurationError('deadline must be a finite epoch timestamp', 'deadline');
    }
    const snapshot = this.topology.current();
    if (snapshot === null) {
      if (!request.waitForConfig) {
        throw new TopologyUnavailableError();
      }
    } else if (!this.topology.offers(request.service)) {
      throw new ServiceNotAvailableError(request.service);
    } else if (request.service === ServiceType.KV && request.routingKey !== undefined && !snapshot.vbuckets) {
      throw new ServiceNotAvailableError(request.service, { detail: 'the configuration has no vbucket map' });
    }

    const span = this.tracer.startSpan(request.name, { attributes: { service: request.service } });
    const op: PendingOperation<T> = this.registry.track<T>({
      deadline: request.deadline,
      signal: request.signal,
      callback: (error, result) => {
        span.setAttribute('attempts', op.attempt + 1);
        if (error) {
          span.setAttribute('error.code', error.code);
          span.setStatus('ERROR', error.message);
        }
        span.end();
        callback(error, result);
      },
    });

    // past deadlines are left to the deadline timer: no attempt, no I/O
    if (op.isPending && request.deadline > this.now()) {
      const state: DispatchState<T> = { op, request, span };
      queueMicrotask(() => this.runAttempt(state));
    }
    return toHandle(op);
  }

  /**
   * Refuse further requests. Pending ones are settled by the registry.
   */
  close(): void {
    this.closed = true;
  }

  // ===========================================================================
  // Attempts
  // ===========================================================================

  private runAttempt<T>(state: DispatchState<T>, preferred?: NodeId): void {
    const { op, request } = state;
    if (!op.isPending) {
      return;
    }

    const snapshot = this.topology.current();
    if (!snapshot) {
      const release = op.own(
        this.topology.waitForUpdate(() => {
          release();
          this.runAttempt(state);
        })
      );
      return;
    }

    const selection = this.topology.select(request.service, {
      routingKey: request.routingKey,
      preferred,
      admit: node => this.breaker.allow(node, request.service),
    });
    if (selection.kind === 'rejected') {
      this.handleFailure(state, new CircuitOpenError(selection.node.id, request.service), snapshot.revision);
      return;
    }
    if (selection.kind === 'none') {
      this.handleFailure(
        state,
        new ServiceNotAvailableError(request.service, { retryReason: RetryReason.NO_TARGET_AVAILABLE }),
        snapshot.revision
      );
      return;
    }

    const { node, endpoint, vbucketId } = selection;
    const controller = new AbortController();
    const releaseAbort = op.own(() => {
      controller.abort(new RequestCanceledError('operation settled before the attempt completed'));
    });
    const attemptSpan = this.tracer.startSpan(`${request.name}.attempt`, {
      parent: state.span,
      attributes: { node: node.id, attempt: op.attempt },
    });

    let execution: Promise<T>;
    try {
      execution = request.execute({
        operationId: op.id,
        attempt: op.attempt,
        node,
        endpoint,
        vbucketId,
        deadline: request.deadline,
        signal: controller.signal,
        span: attemptSpan,
      });
    } catch (error) {
      execution = Promise.reject(error);
    }

    execution
      .then(
        result => {
          releaseAbort();
          attemptSpan.end();
          if (!op.isPending) {
            this.discard(request, result);
            return;
          }
          this.breaker.report(node.id, request.service, 'success');
          op.succeed(result);
        },
        (error: unknown) => {
          releaseAbort();
          const failure = toAgentError(error, (message, cause) => new TransportError(message, { cause }));
          attemptSpan.setStatus('ERROR', failure.message);
          attemptSpan.end();
          if (!op.isPending) {
            return;
          }
          this.reportOutcome(node.id, request.service, failure);
          this.handleFailure(state, failure, snapshot.revision, node.id);
        }
      )
      .catch((error: unknown) => {
        this.logger.error(
          'attempt of operation {operationId} could not be completed',
          error instanceof Error ? error : new Error(String(error)),
          { operationId: op.id }
        );
        op.fail(toAgentError(error, (message, cause) => new TransportError(message, { cause })));
      });
  }

  private handleFailure<T>(
    state: DispatchState<T>,
    failure: AgentError,
    revision: TopologyRevision,
    node?: NodeId
  ): void {
    const { op, request } = state;
    failure.withContext({ operationId: op.id, attempt: op.attempt, service: request.service });

    const action = this.orchestrator.classify(
      {
        operationId: op.id,
        service: request.service,
        idempotent: request.idempotent,
        deadline: request.deadline,
        retryStrategy: request.retryStrategy,
        retryReasons: op.retryReasons,
      },
      op.attempt,
      failure,
      this.now()
    );

    const reason = failure.retryReason;
    if (action.kind === 'do-not-retry' || reason === undefined) {
      if (action.kind === 'do-not-retry' && action.timedOut) {
        op.timeout(failure);
      } else {
        op.fail(failure);
      }
      return;
    }

    op.nextAttempt(reason, failure);
    state.span.addEvent('retry', { reason, attempt: op.attempt, action: action.kind });
    this.logger.debug('retrying operation {operationId} after {reason}', {
      operationId: op.id,
      reason,
      action: action.kind,
      attempt: op.attempt,
    });

    const preferred = action.preserveTarget ? node : undefined;
    switch (action.kind) {
      case 'retry-now':
        op.setTimer(() => this.runAttempt(state, preferred), 0);
        return;
      case 'retry-after':
        op.setTimer(() => this.runAttempt(state, preferred), action.delayMs);
        return;
      case 'retry-on-new-topology': {
        if (reason === RetryReason.TOPOLOGY_STALE) {
          this.topology.requestRefresh();
        }
        const release = op.own(
          this.topology.waitForUpdate(() => {
            release();
            this.runAttempt(state);
          }, revision)
        );
        return;
      }
    }
  }

  private reportOutcome(node: NodeId, service: ServiceType, failure: AgentError): void {
    const reason = failure.retryReason;
    if (reason !== undefined && NOT_SENT_REASONS.has(reason)) {
      return;
    }
    const failed =
      reason === undefined
        ? failure.category === ErrorCategory.TRANSPORT || failure.category === ErrorCategory.PROTOCOL
        : NODE_FAILURE_REASONS.has(reason);
    this.breaker.report(node, service, failed ? 'failure' : 'success');
  }

  private discard<T>(request: OperationRequest<T>, result: T): void {
    try {
      request.discard?.(result);
    } catch (error) {
      this.logger.warn('failed to discard a late result of {name}', {
        name: request.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function toHandle<T>(op: PendingOperation<T>): PendingOpHandle {
  return {
    id: op.id,
    cancel: () => {
      op.cancel();
    },
    get settled(): boolean {
      return op.settled;
    },
  };
}
