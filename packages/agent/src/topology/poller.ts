/**
 * Configuration poller
 *
 * Keeps the topology fresh. Each round asks one node for the current
 * cluster configuration, trying nodes in turn until one answers, and
 * publishes the result (the manager drops it unless its revision is newer).
 *
 * Rounds use the binary protocol (`GET_CLUSTER_CONFIG`) first. If a node
 * reports the command as unknown or unsupported, or the agent bootstraps
 * over HTTP, the poller switches to the management REST endpoint for good.
 *
 * Rounds are chained with setTimeout; `stop()` aborts the round in progress.
 *
 * @packageDocumentation
 */

import { ServiceType, createNodeId, splitHostPort } from '@clusterlink/shared-types';
import type { AgentConfig } from '../config.js';
import { AgentError, KeyValueError, KvStatus, TransportError } from '../errors/index.js';
import { createNoopLogger, type StructuredLogger } from '../logging/index.js';
import { Opcode, createRequest } from '../transport/memd-codec.js';
import type { MemdPool } from '../transport/memd-pool.js';
import { errorFromBody, readBody, type HttpTransport } from '../transport/http-client.js';
import type { TopologyManager } from './manager.js';
import { parseClusterConfig, type TopologySnapshot } from './snapshot.js';

export type PollMode = 'cccp' | 'http';

export type PollerConfig = Pick<
  AgentConfig,
  | 'memdAddrs'
  | 'httpAddrs'
  | 'bucketName'
  | 'bootstrapOn'
  | 'useTls'
  | 'networkType'
  | 'configPollPeriodMs'
  | 'configPollTimeoutMs'
  | 'httpRetryDelayMs'
>;

export interface ConfigPollerOptions {
  config: PollerConfig;
  topology: TopologyManager;
  pool: MemdPool;
  http: HttpTransport;
  logger?: StructuredLogger;
}

/** Statuses meaning the node does not serve configs over the binary protocol */
const CCCP_UNSUPPORTED: ReadonlySet<number> = new Set([KvStatus.UNKNOWN_COMMAND, KvStatus.NOT_SUPPORTED]);

export class ConfigPoller {
  private readonly config: PollerConfig;
  private readonly topology: TopologyManager;
  private readonly pool: MemdPool;
  private readonly http: HttpTransport;
  private readonly logger: StructuredLogger;

  private pollMode: PollMode;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private round: AbortController | null = null;
  private refreshRequested = false;
  private nodeCursor = 0;

  constructor(options: ConfigPollerOptions) {
    this.config = options.config;
    this.topology = options.topology;
    this.pool = options.pool;
    this.http = options.http;
    this.logger = options.logger ?? createNoopLogger();
    this.pollMode =
      options.config.bootstrapOn === 'http' || options.config.memdAddrs.length === 0 ? 'http' : 'cccp';
  }

  get mode(): PollMode {
    return this.pollMode;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.topology.setRefreshHandler(() => this.pollNow());
    this.logger.debug('starting {mode} config polling', { mode: this.pollMode });
    this.schedule(0);
  }

  /**
   * Stop polling and abort the round in progress.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.topology.setRefreshHandler(null);
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.round?.abort();
    this.round = null;
  }

  /**
   * Poll as soon as possible. A round already in progress is followed by
   * another one right away.
   */
  pollNow(): void {
    if (!this.running) {
      return;
    }
    if (this.round) {
      this.refreshRequested = true;
      return;
    }
    this.schedule(0);
  }

  // ===========================================================================
  // Rounds
  // ===========================================================================

  private schedule(delayMs: number): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runRound().catch((error: unknown) => {
        this.logger.error('config poll round failed', error instanceof Error ? error : new Error(String(error)));
      });
    }, delayMs);
  }

  private async runRound(): Promise<void> {
    const controller = new AbortController();
    this.round = controller;
    this.refreshRequested = false;

    let published = false;
    let obtained = false;
    try {
      const snapshot = await this.pollOnce(controller.signal);
      if (snapshot) {
        obtained = true;
        published = this.topology.publish(snapshot);
      }
    } finally {
      if (this.round === controller) {
        this.round = null;
      }
    }

    if (!this.running || controller.signal.aborted) {
      return;
    }
    if (published) {
      this.retainConnectedNodes();
    }
    if (this.refreshRequested) {
      this.schedule(0);
    } else if (!obtained && this.pollMode === 'http') {
      this.schedule(this.config.httpRetryDelayMs);
    } else {
      this.schedule(this.config.configPollPeriodMs);
    }
  }

  /**
   * One round: try each candidate node until one returns a configuration.
   */
  private async pollOnce(signal: AbortSignal): Promise<TopologySnapshot | null> {
    const mode = this.pollMode;
    const targets = this.targets(mode);
    if (targets.length === 0) {
      this.logger.warn('no nodes to poll for configuration over {mode}', { mode });
      return null;
    }

    const start = this.nodeCursor++ % targets.length;
    for (let i = 0; i < targets.length && !signal.aborted; i++) {
      const target = targets[(start + i) % targets.length];
      try {
        return mode === 'cccp' ? await this.pollCccp(target, signal) : await this.pollHttp(target, signal);
      } catch (error) {
        if (signal.aborted) {
          return null;
        }
        if (
          mode === 'cccp' &&
          error instanceof KeyValueError &&
          CCCP_UNSUPPORTED.has(error.status) &&
          this.fallBackToHttp(target, error)
        ) {
          return this.pollOnce(signal);
        }
        this.logger.debug('config poll of {node} failed: {reason}', {
          node: target,
          mode,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return null;
  }

  private async pollCccp(node: string, signal: AbortSignal): Promise<TopologySnapshot> {
    const attempt = this.boundedSignal(signal);
    try {
      const connection = await this.pool.acquire(createNodeId(node), attempt.signal);
      const response = await connection.request(createRequest(Opcode.GET_CLUSTER_CONFIG), attempt.signal);
      if (response.status !== KvStatus.SUCCESS) {
        throw new KeyValueError(response.status, { context: { node } });
      }
      return parseClusterConfig(response.value, this.parseOptions(node));
    } finally {
      attempt.dispose();
    }
  }

  private async pollHttp(endpoint: string, signal: AbortSignal): Promise<TopologySnapshot> {
    const attempt = this.boundedSignal(signal);
    const bucket = this.config.bucketName;
    try {
      const response = await this.http.send(
        {
          service: ServiceType.MGMT,
          endpoint,
          method: 'GET',
          path: bucket ? `/pools/default/b/${encodeURIComponent(bucket)}` : '/pools/default/nodeServices',
        },
        attempt.signal
      );
      const body = await readBody(response);
      if (response.status !== 200) {
        throw errorFromBody(ServiceType.MGMT, response.status, body, endpoint);
      }
      return parseClusterConfig(body, this.parseOptions(endpoint));
    } finally {
      attempt.dispose();
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Nodes to poll: those of the current snapshot, else the seed addresses.
   */
  private targets(mode: PollMode): string[] {
    const service = mode === 'cccp' ? ServiceType.KV : ServiceType.MGMT;
    const snapshot = this.topology.current();
    const fromSnapshot: string[] = [];
    for (const node of snapshot?.nodes ?? []) {
      const endpoint = node.endpoints[service];
      if (endpoint !== undefined) {
        fromSnapshot.push(mode === 'cccp' ? node.id : endpoint);
      }
    }
    if (fromSnapshot.length > 0) {
      return fromSnapshot;
    }
    return [...(mode === 'cccp' ? this.config.memdAddrs : this.config.httpAddrs)];
  }

  /**
   * @returns whether polling switched to HTTP
   */
  private fallBackToHttp(node: string, error: AgentError): boolean {
    if (this.config.bootstrapOn === 'cccp') {
      this.logger.warn('{node} does not serve configurations over the binary protocol', { node });
      return false;
    }
    this.pollMode = 'http';
    this.logger.info('falling back to HTTP config polling after {node} answered {reason}', {
      node,
      reason: error.message,
    });
    return true;
  }

  private parseOptions(endpoint: string): { sourceHost: string; useTls: boolean; networkType: string } {
    return {
      sourceHost: splitHostPort(endpoint)?.host ?? endpoint,
      useTls: this.config.useTls,
      networkType: this.config.networkType,
    };
  }

  /**
   * Signal aborted by the round's signal or after the poll timeout.
   */
  private boundedSignal(parent: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timeoutMs = this.config.configPollTimeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new TransportError(`config poll timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        parent.removeEventListener('abort', onAbort);
      },
    };
  }

  private retainConnectedNodes(): void {
    const snapshot = this.topology.current();
    if (snapshot) {
      this.pool.retainNodes(new Set(snapshot.nodes.map(node => node.id)));
    }
  }
}
