/**
 * Pending operations
 *
 * Tracking record for one accepted operation. Settlement is gated by a
 * tagged state machine:
 *
 * ```
 *   pending ──settle()──> settling ──disposers run──> settled ──> callback
 * ```
 *
 * Only the caller that moves the state out of `pending` performs the
 * settlement; every later attempt (cancel, timeout, a late response) is a
 * no-op. Everything the operation owns (deadline timer, backoff timers,
 * attempt abort hooks, topology watchers, the AbortSignal listener) is torn
 * down before the callback is invoked.
 *
 * @packageDocumentation
 */

import type { OperationId } from '@clusterlink/shared-types';
import { AgentError, RequestCanceledError, TimeoutError } from '../errors/index.js';
import type { RetryReason } from '../retry/reasons.js';
import type { StructuredLogger } from '../logging/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Exactly-once completion callback. `result` is null whenever `error` is set.
 *
 * @public
 */
export type OperationCallback<T> = (error: AgentError | null, result: T | null) => void;

/**
 * Handle returned for every accepted operation.
 *
 * @public
 * @since 0.1.0
 */
export interface PendingOpHandle {
  readonly id: OperationId;
  /**
   * Cancel the operation. Safe to call any number of times from anywhere;
   * a no-op once the operation has settled.
   */
  cancel(): void;
  readonly settled: boolean;
}

export type SettlementState =
  | { readonly kind: 'pending' }
  | { readonly kind: 'settling' }
  | { readonly kind: 'settled'; readonly outcome: 'success' | 'error' };

/**
 * Counters of resources owned by pending operations, shared by a registry.
 */
export interface ResourceCounters {
  timers: number;
  hooks: number;
}

/**
 * Non-generic view of an operation, as held by the registry.
 */
export interface TrackedOperation {
  readonly id: OperationId;
  readonly deadline: number;
  readonly attempt: number;
  readonly isPending: boolean;
  cancel(error?: AgentError): boolean;
}

export type Disposer = () => void;

const MAX_TIMER_DELAY_MS = 0x7fffffff;

const PENDING: SettlementState = Object.freeze({ kind: 'pending' });
const SETTLING: SettlementState = Object.freeze({ kind: 'settling' });

// =============================================================================
// PendingOperation
// =============================================================================

export interface PendingOperationInit<T> {
  id: OperationId;
  /** Absolute deadline, epoch milliseconds */
  deadline: number;
  callback: OperationCallback<T>;
  counters: ResourceCounters;
  logger: StructuredLogger;
  signal?: AbortSignal;
  /** Called once the operation has settled, before its callback */
  onSettled?: (operation: PendingOperation<T>) => void;
  now?: () => number;
}

export class PendingOperation<T> implements TrackedOperation, PendingOpHandle {
  readonly id: OperationId;
  readonly deadline: number;
  private _attempt = 0;
  private readonly _retryReasons: RetryReason[] = [];
  private _lastError: AgentError | undefined;
  private state: SettlementState = PENDING;
  private callback: OperationCallback<T> | null;
  private readonly disposers = new Set<Disposer>();
  private readonly counters: ResourceCounters;
  private readonly logger: StructuredLogger;
  private readonly onSettled?: (operation: PendingOperation<T>) => void;
  private readonly now: () => number;

  constructor(init: PendingOperationInit<T>) {
    this.id = init.id;
    this.deadline = init.deadline;
    this.callback = init.callback;
    this.counters = init.counters;
    this.logger = init.logger;
    this.onSettled = init.onSettled;
    this.now = init.now ?? Date.now;

    this.setTimer(() => this.timeout(), this.deadline - this.now());

    const signal = init.signal;
    if (signal) {
      if (signal.aborted) {
        this.cancel(new RequestCanceledError('request canceled by abort signal', { cause: signal.reason }));
      } else {
        const onAbort = (): void => {
          this.cancel(new RequestCanceledError('request canceled by abort signal', { cause: signal.reason }));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        this.own(() => signal.removeEventListener('abort', onAbort));
      }
    }
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  get attempt(): number {
    return this._attempt;
  }

  get retryReasons(): readonly RetryReason[] {
    return this._retryReasons;
  }

  /** Failure of the most recent attempt */
  get lastError(): AgentError | undefined {
    return this._lastError;
  }

  get isPending(): boolean {
    return this.state.kind === 'pending';
  }

  get settled(): boolean {
    return this.state.kind === 'settled';
  }

  get settlementState(): SettlementState {
    return this.state;
  }

  /** Resources currently owned */
  get ownedResources(): number {
    return this.disposers.size;
  }

  /** Milliseconds left until the deadline (never negative) */
  remainingMs(): number {
    return Math.max(0, this.deadline - this.now());
  }

  /**
   * Record a failed attempt and move on to the next one.
   */
  nextAttempt(reason: RetryReason, failure?: AgentError): number {
    this._lastError = failure;
    this._retryReasons.push(reason);
    this._attempt++;
    return this._attempt;
  }

  // ===========================================================================
  // Owned Resources
  // ===========================================================================

  /**
   * Register a disposer run at settlement. If the operation already left
   * `pending`, the disposer runs immediately.
   *
   * @returns a release function that unregisters (without running) it
   */
  own(disposer: Disposer): Disposer {
    if (!this.isPending) {
      this.runDisposer(disposer);
      return () => undefined;
    }
    this.disposers.add(disposer);
    this.counters.hooks++;
    return () => {
      if (this.disposers.delete(disposer)) {
        this.counters.hooks--;
      }
    };
  }

  /**
   * Arm a timer owned by the operation. It is cleared at settlement, or by
   * calling the returned function.
   */
  setTimer(fn: () => void, delayMs: number): Disposer {
    if (!this.isPending) {
      return () => undefined;
    }
    let release: Disposer = () => undefined;
    const timer = setTimeout(() => {
      release();
      this.counters.timers--;
      fn();
    }, Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS));
    this.counters.timers++;

    const clear = (): void => {
      clearTimeout(timer);
      this.counters.timers--;
    };
    release = this.own(clear);
    return () => {
      if (this.disposers.has(clear)) {
        release();
        clear();
      }
    };
  }

  // ===========================================================================
  // Settlement
  // ===========================================================================

  /**
   * Settle with a result. @returns false if the operation had already left
   * `pending`.
   */
  succeed(result: T): boolean {
    return this.settle(null, result);
  }

  /**
   * Settle with an error. @returns false if the operation had already left
   * `pending`.
   */
  fail(error: AgentError): boolean {
    return this.settle(error, null);
  }

  cancel(error: AgentError = new RequestCanceledError()): boolean {
    return this.settle(error, null);
  }

  /**
   * Settle as timed out. The cause defaults to the failure of the last
   * attempt, if one failed.
   */
  timeout(cause: AgentError | undefined = this._lastError): boolean {
    return this.settle(
      new TimeoutError(cause ? `operation timed out after ${cause.message}` : 'operation timed out', {
        cause,
        retryAttempts: this._attempt,
        retryReasons: this._retryReasons,
        context: { operationId: this.id, attempt: this._attempt },
      }),
      null
    );
  }

  private settle(error: AgentError | null, result: T | null): boolean {
    if (this.state.kind !== 'pending') {
      return false;
    }
    this.state = SETTLING;

    for (const disposer of this.disposers) {
      this.runDisposer(disposer);
    }
    this.counters.hooks -= this.disposers.size;
    this.disposers.clear();

    this.state = Object.freeze({ kind: 'settled', outcome: error ? 'error' : 'success' });
    this.onSettled?.(this);

    const callback = this.callback;
    this.callback = null;
    if (callback) {
      queueMicrotask(() => this.deliver(callback, error, result));
    }
    return true;
  }

  private deliver(callback: OperationCallback<T>, error: AgentError | null, result: T | null): void {
    try {
      callback(error, error ? null : result);
    } catch (callbackError) {
      this.logger.error(
        'completion callback for operation {operationId} threw',
        callbackError instanceof Error ? callbackError : new Error(String(callbackError)),
        { operationId: this.id }
      );
    }
  }

  private runDisposer(disposer: Disposer): void {
    try {
      disposer();
    } catch (disposeError) {
      this.logger.warn('failed to release resource of operation {operationId}', {
        operationId: this.id,
        error: disposeError instanceof Error ? disposeError.message : String(disposeError),
      });
    }
  }
}
