/**
 * Topology manager
 *
 * Holds the current {@link TopologySnapshot} behind a single reference that
 * is replaced wholesale, never mutated. Readers call `current()` and keep
 * whatever snapshot they got for the rest of their attempt.
 *
 * Also owns node selection: candidates for a service are the nodes
 * advertising it, visited round-robin and filtered by an admission check
 * (the circuit breaker). Key/value requests with a key are routed through
 * the vbucket map instead.
 *
 * @packageDocumentation
 */

import { ServiceType, type NodeId } from '@clusterlink/shared-types';
import { TimeoutError, type AgentError } from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { TypedEventEmitter } from '../utils/event-emitter.js';
import {
  compareRevisions,
  findNode,
  formatRevision,
  nodeForKey,
  nodesForService,
  type TopologyNode,
  type TopologyRevision,
  type TopologySnapshot,
} from './snapshot.js';

// =============================================================================
// Types
// =============================================================================

export interface TopologyManagerEvents {
  update: TopologySnapshot;
}

export interface SelectOptions {
  /** Key to route by vbucket (key/value only) */
  routingKey?: string | Uint8Array;
  /** Node to try first, when it still offers the service */
  preferred?: NodeId;
  /** Admission check; rejected nodes are skipped */
  admit?: (node: NodeId) => boolean;
}

/**
 * Outcome of node selection.
 *
 * - `selected`: the node to send to
 * - `rejected`: candidates exist but admission refused all of them
 * - `none`: no node in the snapshot can take the request
 */
export type NodeSelection =
  | { readonly kind: 'selected'; readonly node: TopologyNode; readonly endpoint: string; readonly vbucketId?: number }
  | { readonly kind: 'rejected'; readonly node: TopologyNode }
  | { readonly kind: 'none' };

export interface TopologyManagerOptions {
  logger?: StructuredLogger;
}

// =============================================================================
// TopologyManager
// =============================================================================

export class TopologyManager {
  readonly events: TypedEventEmitter<TopologyManagerEvents>;
  private snapshot: TopologySnapshot | null = null;
  private readonly cursors = new Map<ServiceType, number>();
  private readonly logger: StructuredLogger;
  private refreshHandler: (() => void) | null = null;

  constructor(options: TopologyManagerOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.events = new TypedEventEmitter<TopologyManagerEvents>(this.logger);
  }

  /** Latest published snapshot, or null before the first one */
  current(): TopologySnapshot | null {
    return this.snapshot;
  }

  /**
   * Replace the current snapshot if `next` carries a newer revision.
   *
   * @returns whether the snapshot was published
   */
  publish(next: TopologySnapshot): boolean {
    const previous = this.snapshot;
    if (previous && compareRevisions(next.revision, previous.revision) <= 0) {
      return false;
    }
    this.snapshot = next;
    this.logger.info('topology updated to revision {revision}', {
      revision: formatRevision(next.revision),
      previous: previous ? formatRevision(previous.revision) : null,
      nodes: next.nodes.length,
    });
    this.events.emit('update', next);
    return true;
  }

  /**
   * Call `listener` once with the next snapshot newer than `since` (or the
   * next one published, without `since`). A snapshot already newer than
   * `since` is delivered on a microtask.
   *
   * @returns a function that stops waiting
   */
  waitForUpdate(listener: (snapshot: TopologySnapshot) => void, since?: TopologyRevision | null): () => void {
    let active = true;
    const current = this.snapshot;
    if (since !== undefined && current && (since === null || compareRevisions(current.revision, since) > 0)) {
      queueMicrotask(() => {
        if (active) {
          active = false;
          listener(current);
        }
      });
      return () => {
        active = false;
      };
    }
    const off = this.events.once('update', snapshot => {
      active = false;
      listener(snapshot);
    });
    return () => {
      if (active) {
        active = false;
        off();
      }
    };
  }

  /**
   * Invoke `callback` once a snapshot is available, or with a TimeoutError
   * at `deadline`.
   *
   * @returns a function that abandons the wait without invoking `callback`
   */
  waitUntilReady(deadline: number, callback: (error: AgentError | null) => void): () => void {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const stop = this.waitForUpdate(() => {
      clearTimeout(timer);
      callback(null);
    }, null);
    timer = setTimeout(() => {
      stop();
      callback(new TimeoutError('timed out waiting for the first cluster configuration'));
    }, Math.max(0, deadline - Date.now()));
    return () => {
      clearTimeout(timer);
      stop();
    };
  }

  /**
   * Ask for an immediate configuration poll.
   */
  requestRefresh(): void {
    this.refreshHandler?.();
  }

  /**
   * Install what `requestRefresh()` runs (the config poller).
   */
  setRefreshHandler(handler: (() => void) | null): void {
    this.refreshHandler = handler;
  }

  /**
   * Pick the node for a request against the current snapshot.
   */
  select(service: ServiceType, options: SelectOptions = {}): NodeSelection {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return { kind: 'none' };
    }
    const admit = options.admit ?? (() => true);

    if (options.preferred !== undefined) {
      const node = findNode(snapshot, options.preferred);
      const endpoint = node?.endpoints[service];
      if (node && endpoint !== undefined && admit(node.id)) {
        const vbucketId =
          service === ServiceType.KV && options.routingKey !== undefined
            ? nodeForKey(snapshot, options.routingKey)?.vbucketId
            : undefined;
        return { kind: 'selected', node, endpoint, vbucketId };
      }
    }

    if (service === ServiceType.KV && options.routingKey !== undefined) {
      const route = nodeForKey(snapshot, options.routingKey);
      const node = route ? findNode(snapshot, route.node) : undefined;
      const endpoint = node?.endpoints[ServiceType.KV];
      if (!route || !node || endpoint === undefined) {
        return { kind: 'none' };
      }
      return admit(node.id)
        ? { kind: 'selected', node, endpoint, vbucketId: route.vbucketId }
        : { kind: 'rejected', node };
    }

    const candidates = nodesForService(snapshot, service);
    if (candidates.length === 0) {
      return { kind: 'none' };
    }
    const start = this.cursors.get(service) ?? 0;
    this.cursors.set(service, (start + 1) % candidates.length);
    for (let i = 0; i < candidates.length; i++) {
      const node = candidates[(start + i) % candidates.length];
      const endpoint = node.endpoints[service];
      if (endpoint !== undefined && admit(node.id)) {
        return { kind: 'selected', node, endpoint };
      }
    }
    return { kind: 'rejected', node: candidates[start % candidates.length] };
  }

  /**
   * Whether any node in the current snapshot advertises the service.
   */
  offers(service: ServiceType): boolean {
    const snapshot = this.snapshot;
    return snapshot !== null && nodesForService(snapshot, service).length > 0;
  }

  close(): void {
    this.refreshHandler = null;
    this.events.clear();
  }
}
