/**
 * Pending operation registry
 *
 * Allocates operation ids, arms deadline timers and keeps every accepted
 * operation until it settles. Counts the timers and hooks its operations own
 * so tests (and `close()`) can verify nothing is left running.
 *
 * @packageDocumentation
 */

import { createOperationId, type OperationId } from '@clusterlink/shared-types';
import { AgentError, RequestCanceledError } from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import {
  PendingOperation,
  type OperationCallback,
  type ResourceCounters,
  type TrackedOperation,
} from './pending-operation.js';

export interface TrackOptions<T> {
  /** Absolute deadline, epoch milliseconds */
  deadline: number;
  callback: OperationCallback<T>;
  signal?: AbortSignal;
}

export interface RegistryOptions {
  logger?: StructuredLogger;
  now?: () => number;
}

/**
 * Registry statistics
 */
export interface RegistryStats {
  pending: number;
  tracked: number;
  settled: number;
  activeTimers: number;
  activeHooks: number;
}

export class PendingOperationRegistry {
  private readonly operations = new Map<OperationId, TrackedOperation>();
  private readonly counters: ResourceCounters = { timers: 0, hooks: 0 };
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private sequence = 0;
  private totalTracked = 0;
  private totalSettled = 0;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Start tracking an operation. Its deadline timer is armed immediately; a
   * deadline already in the past settles it as timed out on the next timer
   * tick.
   */
  track<T>(options: TrackOptions<T>): PendingOperation<T> {
    const id = createOperationId(`op-${++this.sequence}`);
    this.totalTracked++;

    const operation = new PendingOperation<T>({
      id,
      deadline: options.deadline,
      callback: options.callback,
      counters: this.counters,
      logger: this.logger,
      signal: options.signal,
      now: this.now,
      onSettled: settled => {
        this.totalSettled++;
        this.operations.delete(settled.id);
      },
    });

    if (operation.isPending) {
      this.operations.set(id, operation);
    }
    return operation;
  }

  get(id: OperationId): TrackedOperation | undefined {
    return this.operations.get(id);
  }

  /** Operations that have not settled */
  get size(): number {
    return this.operations.size;
  }

  /** Timers currently armed by pending operations */
  get activeTimers(): number {
    return this.counters.timers;
  }

  getStats(): RegistryStats {
    return {
      pending: this.operations.size,
      tracked: this.totalTracked,
      settled: this.totalSettled,
      activeTimers: this.counters.timers,
      activeHooks: this.counters.hooks,
    };
  }

  /**
   * Cancel every pending operation.
   *
   * @returns the number of operations this call settled
   */
  cancelAll(makeError: () => AgentError = () => new RequestCanceledError('agent is shutting down')): number {
    let canceled = 0;
    for (const operation of [...this.operations.values()]) {
      if (operation.cancel(makeError())) {
        canceled++;
      }
    }
    if (canceled > 0) {
      this.logger.debug('canceled {count} pending operations', { count: canceled });
    }
    return canceled;
  }
}
