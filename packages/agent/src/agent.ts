/**
 * Agent
 *
 * The client engine for one cluster (and optionally one bucket). It owns the
 * topology, the config poller, the binary connection pool, the HTTP
 * transport, the circuit breaker and the registry of pending operations,
 * and exposes key/value and query operations on top of the dispatcher.
 *
 * Operations take a callback that is invoked exactly once, asynchronously,
 * and return a handle that can cancel them. {@link toPromise} adapts them to
 * promises.
 *
 * @example
 * ```typescript
 * const agent = Agent.fromConnectionString('cluster://10.0.0.1/travel', {
 *   auth: new PasswordAuthProvider('app', 'test-secret'),
 * });
 * await agent.ready(Date.now() + 5000);
 *
 * const doc = await toPromise<GetResult>(cb =>
 *   agent.get({ key: 'airline_10', deadline: Date.now() + 2500 }, cb)
 * );
 * agent.close();
 * ```
 *
 * @packageDocumentation
 */

import type { AuthProvider } from './auth.js';
import { CircuitBreaker, type CircuitMetrics } from './circuit-breaker/index.js';
import {
  agentConfigFromConnStr,
  createAgentConfig,
  redactConfig,
  type AgentConfig,
  type AgentConfigInput,
} from './config.js';
import { Dispatcher } from './dispatcher.js';
import { AgentClosedError, AgentError, ProtocolError, RequestCanceledError } from './errors/index.js';
import { createLogger, type StructuredLogger } from './logging/index.js';
import {
  getRequest,
  removeRequest,
  upsertRequest,
  type GetOptions,
  type GetResult,
  type KvContext,
  type MutationResult,
  type RemoveOptions,
  type UpsertOptions,
} from './operations/kv.js';
import {
  analyticsQueryRequest,
  n1qlQueryRequest,
  searchQueryRequest,
  viewQueryRequest,
  type AnalyticsQueryOptions,
  type N1qlQueryOptions,
  type QueryContext,
  type SearchQueryOptions,
  type ViewQueryOptions,
} from './operations/query.js';
import { OrphanReporter } from './orphan-reporter.js';
import {
  PendingOperationRegistry,
  type OperationCallback,
  type PendingOpHandle,
  type RegistryStats,
} from './registry/index.js';
import { BestEffortRetryStrategy, RetryOrchestrator, type RetryStrategy } from './retry/index.js';
import type { RowReader } from './streaming/index.js';
import { ConfigPoller, TopologyManager, type PollMode, type TopologySnapshot } from './topology/index.js';
import {
  HttpTransport,
  MemdPool,
  type FetchFunction,
  type MemdDialer,
  type MemdPoolStats,
} from './transport/index.js';
import { NoopTracer, type RequestTracer } from './tracing.js';

// =============================================================================
// Types
// =============================================================================

export interface AgentOptions {
  auth: AuthProvider;
  logger?: StructuredLogger;
  tracer?: RequestTracer;
  /** Default strategy for operations that do not name one */
  retryStrategy?: RetryStrategy;
  /** HTTP client, defaults to the global fetch */
  fetch?: FetchFunction;
  /** Opens binary connections, defaults to TCP/TLS sockets */
  dialer?: MemdDialer;
  now?: () => number;
}

export interface AgentStats {
  operations: RegistryStats;
  pool: MemdPoolStats;
  circuits: Map<string, CircuitMetrics>;
  pollMode: PollMode;
  topologyRevision: TopologySnapshot['revision'] | null;
  orphanedResponses: number;
}

// =============================================================================
// Agent
// =============================================================================

export class Agent {
  readonly config: AgentConfig;

  private readonly logger: StructuredLogger;
  private readonly registry: PendingOperationRegistry;
  private readonly breaker: CircuitBreaker;
  private readonly topology: TopologyManager;
  private readonly pool: MemdPool;
  private readonly http: HttpTransport;
  private readonly poller: ConfigPoller;
  private readonly dispatcher: Dispatcher;
  private readonly orphans: OrphanReporter | null;
  private readonly kv: KvContext;
  private readonly query: QueryContext;
  private readonly stopRetainingCircuits: () => void;
  private closed = false;

  constructor(config: AgentConfig, options: AgentOptions) {
    this.config = config;
    const now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger()).child({ component: 'agent' });

    this.orphans = config.orphanLogging.enabled
      ? new OrphanReporter({
          intervalMs: config.orphanLogging.intervalMs,
          sampleSize: config.orphanLogging.sampleSize,
          logger: this.logger,
          now,
        })
      : null;

    this.registry = new PendingOperationRegistry({ logger: this.logger, now });
    this.breaker = new CircuitBreaker(config.circuitBreaker, { logger: this.logger, now });
    this.topology = new TopologyManager({ logger: this.logger });
    this.pool = new MemdPool({
      poolSize: config.kvPoolSize,
      auth: options.auth,
      userAgent: config.userAgent,
      bucketName: config.bucketName,
      useTls: config.useTls,
      tlsSkipVerify: config.tlsSkipVerify,
      connectTimeoutMs: config.kvConnectTimeoutMs,
      maxQueueSize: config.maxQueueSize,
      dialer: options.dialer,
      logger: this.logger,
      onOrphan: (packet, connection) => {
        this.orphans?.add({
          node: connection.endpoint,
          opcode: packet.opcode,
          opaque: packet.opaque,
          status: packet.status,
        });
      },
    });
    this.http = new HttpTransport({
      auth: options.auth,
      useTls: config.useTls,
      userAgent: config.userAgent,
      fetch: options.fetch,
      logger: this.logger,
    });
    this.poller = new ConfigPoller({
      config,
      topology: this.topology,
      pool: this.pool,
      http: this.http,
      logger: this.logger,
    });
    this.dispatcher = new Dispatcher({
      topology: this.topology,
      breaker: this.breaker,
      registry: this.registry,
      orchestrator: new RetryOrchestrator(options.retryStrategy ?? new BestEffortRetryStrategy(config.retry)),
      tracer: options.tracer ?? new NoopTracer(),
      logger: this.logger,
      now,
    });

    this.kv = {
      pool: this.pool,
      topology: this.topology,
      useTls: config.useTls,
      networkType: config.networkType,
      logger: this.logger,
    };
    this.query = { http: this.http, bucketName: config.bucketName, logger: this.logger, now, readers: new Set() };

    this.stopRetainingCircuits = this.topology.events.on('update', snapshot => {
      this.breaker.retainNodes(new Set(snapshot.nodes.map(node => node.id)));
    });

    this.logger.info('starting agent', { config: redactConfig(config) });
    this.poller.start();
    this.orphans?.start();
  }

  /**
   * Create an agent from a connection string such as
   * `clusters://node1,node2/bucket?kv_pool_size=2`.
   *
   * @throws ConfigurationError for a malformed string or option
   */
  static fromConnectionString(connStr: string, options: AgentOptions, overrides?: AgentConfigInput): Agent {
    return new Agent(agentConfigFromConnStr(connStr, overrides), options);
  }

  /**
   * Create an agent from a partial configuration.
   *
   * @throws ConfigurationError naming the first invalid option
   */
  static create(input: AgentConfigInput, options: AgentOptions): Agent {
    return new Agent(createAgentConfig(input), options);
  }

  // ===========================================================================
  // Key/value
  // ===========================================================================

  get(options: GetOptions, callback: OperationCallback<GetResult>): PendingOpHandle {
    return this.dispatcher.dispatch(getRequest(this.kv, options), callback);
  }

  upsert(options: UpsertOptions, callback: OperationCallback<MutationResult>): PendingOpHandle {
    return this.dispatcher.dispatch(upsertRequest(this.kv, options), callback);
  }

  remove(options: RemoveOptions, callback: OperationCallback<MutationResult>): PendingOpHandle {
    return this.dispatcher.dispatch(removeRequest(this.kv, options), callback);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  n1qlQuery(options: N1qlQueryOptions, callback: OperationCallback<RowReader>): PendingOpHandle {
    return this.dispatcher.dispatch(n1qlQueryRequest(this.query, options), callback);
  }

  analyticsQuery(options: AnalyticsQueryOptions, callback: OperationCallback<RowReader>): PendingOpHandle {
    return this.dispatcher.dispatch(analyticsQueryRequest(this.query, options), callback);
  }

  searchQuery(options: SearchQueryOptions, callback: OperationCallback<RowReader>): PendingOpHandle {
    return this.dispatcher.dispatch(searchQueryRequest(this.query, options), callback);
  }

  viewQuery(options: ViewQueryOptions, callback: OperationCallback<RowReader>): PendingOpHandle {
    return this.dispatcher.dispatch(viewQueryRequest(this.query, options), callback);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Invoke `callback` once the first cluster configuration is known, or
   * with a TimeoutError at `deadline`.
   *
   * @returns a function that abandons the wait without invoking `callback`
   */
  waitUntilReady(deadline: number, callback: (error: AgentError | null) => void): () => void {
    if (this.closed) {
      queueMicrotask(() => callback(new RequestCanceledError('agent is closed')));
      return () => {};
    }
    return this.topology.waitUntilReady(deadline, callback);
  }

  /**
   * Promise form of {@link waitUntilReady}. Without a deadline the wait is
   * bounded by `connectTimeoutMs` from now.
   */
  ready(deadline: number = this.query.now() + this.config.connectTimeoutMs): Promise<void> {
    return new Promise((resolve, reject) => {
      this.waitUntilReady(deadline, error => (error ? reject(error) : resolve()));
    });
  }

  /** Operations accepted and not yet settled */
  get pendingCount(): number {
    return this.registry.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** The topology operations are currently routed by */
  currentTopology(): TopologySnapshot | null {
    return this.topology.current();
  }

  getStats(): AgentStats {
    return {
      operations: this.registry.getStats(),
      pool: this.pool.getStats(),
      circuits: this.breaker.getAllMetrics(),
      pollMode: this.poller.mode,
      topologyRevision: this.topology.current()?.revision ?? null,
      orphanedResponses: this.orphans?.totalOrphans ?? 0,
    };
  }

  /**
   * Shut down. Outstanding operations are settled with a
   * RequestCanceledError, row readers still streaming end with an
   * AgentClosedError, polling stops and pooled connections are closed.
   * Further operations throw AgentClosedError.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.dispatcher.close();
    const canceled = this.registry.cancelAll(() => new RequestCanceledError('agent is shutting down'));
    for (const reader of [...this.query.readers]) {
      reader.abort(new AgentClosedError()).catch((error: unknown) => {
        this.logger.debug('aborting a row reader on close failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
    this.poller.stop();
    this.orphans?.stop();
    this.pool.close();
    this.stopRetainingCircuits();
    this.topology.close();
    this.logger.info('agent closed, {canceled} operations canceled', { canceled });
  }
}

// =============================================================================
// Promises
// =============================================================================

/**
 * Run a callback-style operation and settle a promise with its outcome.
 *
 * @example
 * ```typescript
 * const { cas } = await toPromise<MutationResult>(cb => agent.upsert(options, cb));
 * ```
 */
export function toPromise<T extends object>(start: (callback: OperationCallback<T>) => PendingOpHandle): Promise<T> {
  return new Promise((resolve, reject) => {
    start((error, result) => {
      if (error) {
        reject(error);
      } else if (result === null) {
        reject(new ProtocolError('operation succeeded without a result'));
      } else {
        resolve(result);
      }
    });
  });
}
