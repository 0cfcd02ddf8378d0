/**
 * Binary connection pool
 *
 * Keeps up to `poolSize` authenticated connections per node. Requests go to
 * the open connection with the fewest requests in flight; missing
 * connections are opened on demand and concurrent callers share the dial.
 * A connection that closes is dropped from the pool immediately.
 *
 * @packageDocumentation
 */

import type { NodeId } from '@clusterlink/shared-types';
import { AgentClosedError, RequestCanceledError } from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { MemdConnection, type MemdConnectionOptions } from './memd-connection.js';

export interface MemdPoolOptions extends Omit<MemdConnectionOptions, 'endpoint'> {
  /** Connections per node */
  poolSize: number;
}

/**
 * Pool statistics
 */
export interface MemdPoolStats {
  nodes: number;
  openConnections: number;
  connecting: number;
  inFlight: number;
  totalCreated: number;
  totalClosed: number;
  connectFailures: number;
}

interface NodeSlots {
  connections: MemdConnection[];
  connecting: Set<Promise<MemdConnection>>;
}

export class MemdPool {
  private readonly options: MemdPoolOptions;
  private readonly logger: StructuredLogger;
  private readonly nodes = new Map<NodeId, NodeSlots>();
  private closed = false;

  private totalCreated = 0;
  private totalClosed = 0;
  private connectFailures = 0;

  constructor(options: MemdPoolOptions) {
    this.options = options;
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * A ready connection to the node. Aborting `signal` stops this caller's
   * wait for a dial; the dial itself carries on for other callers.
   *
   * @throws TransportError if the node cannot be connected to,
   * RequestCanceledError once `signal` aborts, AgentClosedError once the
   * pool is closed
   */
  async acquire(node: NodeId, signal?: AbortSignal): Promise<MemdConnection> {
    if (this.closed) {
      throw new AgentClosedError();
    }
    if (signal?.aborted) {
      throw new RequestCanceledError('connect wait aborted', { cause: signal.reason });
    }
    const slots = this.slotsFor(node);
    const open = slots.connections.filter(connection => !connection.isClosed);

    if (open.length === 0) {
      const [inProgress] = slots.connecting;
      return waitForDial(inProgress ?? this.open(node, slots), signal);
    }

    if (open.length + slots.connecting.size < this.options.poolSize) {
      // top the pool up in the background; this caller uses what is open
      this.open(node, slots).catch((error: unknown) => {
        this.logger.debug('background connect to {node} failed', {
          node,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }

    let best = open[0];
    for (const connection of open) {
      if (connection.inFlight < best.inFlight) {
        best = connection;
      }
    }
    return best;
  }

  /**
   * Close connections to nodes that are no longer part of the topology.
   */
  retainNodes(nodes: ReadonlySet<string>): void {
    for (const [node, slots] of this.nodes) {
      if (!nodes.has(node)) {
        this.nodes.delete(node);
        for (const connection of slots.connections) {
          connection.close();
        }
        this.logger.debug('dropped connections to {node}', { node });
      }
    }
  }

  /**
   * Close every connection. Requests in flight fail.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const slots of this.nodes.values()) {
      for (const connection of slots.connections) {
        connection.close();
      }
    }
    this.nodes.clear();
  }

  getStats(): MemdPoolStats {
    let openConnections = 0;
    let connecting = 0;
    let inFlight = 0;
    for (const slots of this.nodes.values()) {
      connecting += slots.connecting.size;
      for (const connection of slots.connections) {
        if (!connection.isClosed) {
          openConnections++;
          inFlight += connection.inFlight;
        }
      }
    }
    return {
      nodes: this.nodes.size,
      openConnections,
      connecting,
      inFlight,
      totalCreated: this.totalCreated,
      totalClosed: this.totalClosed,
      connectFailures: this.connectFailures,
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private slotsFor(node: NodeId): NodeSlots {
    let slots = this.nodes.get(node);
    if (!slots) {
      slots = { connections: [], connecting: new Set() };
      this.nodes.set(node, slots);
    }
    return slots;
  }

  private open(node: NodeId, slots: NodeSlots): Promise<MemdConnection> {
    const attempt = MemdConnection.connect({ ...this.options, endpoint: node }).then(
      connection => {
        slots.connecting.delete(attempt);
        if (this.closed || this.nodes.get(node) !== slots) {
          connection.close();
          throw new AgentClosedError();
        }
        this.totalCreated++;
        slots.connections.push(connection);
        connection.events.once('close', error => {
          this.totalClosed++;
          const index = slots.connections.indexOf(connection);
          if (index >= 0) {
            slots.connections.splice(index, 1);
          }
          if (error) {
            this.logger.warn('connection to {node} closed: {reason}', { node, reason: error.message });
          }
        });
        return connection;
      },
      (error: unknown) => {
        slots.connecting.delete(attempt);
        this.connectFailures++;
        throw error;
      }
    );
    slots.connecting.add(attempt);
    return attempt;
  }
}

function waitForDial(dial: Promise<MemdConnection>, signal: AbortSignal | undefined): Promise<MemdConnection> {
  if (!signal) {
    return dial;
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      reject(new RequestCanceledError('connect wait aborted', { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    dial.then(
      connection => {
        signal.removeEventListener('abort', onAbort);
        resolve(connection);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
