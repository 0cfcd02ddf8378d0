/**
 * @clusterlink/agent
 *
 * Client engine for clustered databases: routes key/value requests over the
 * binary protocol and queries over HTTP, retries them within their
 * deadlines, trips per-node circuit breakers, tracks the cluster topology
 * and streams query rows.
 *
 * @packageDocumentation
 */

// Agent
export { Agent, toPromise } from './agent.js';
export type { AgentOptions, AgentStats } from './agent.js';

// Configuration
export {
  AgentConfigSchema,
  DEFAULT_AGENT_CONFIG,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTP_TLS_PORT,
  DEFAULT_MEMD_PORT,
  DEFAULT_MEMD_TLS_PORT,
  agentConfigFromConnStr,
  createAgentConfig,
  redactConfig,
} from './config.js';
export type { AgentConfig, AgentConfigInput, BootstrapProtocol } from './config.js';

// Authentication
export { PasswordAuthProvider, basicAuthHeader } from './auth.js';
export type { AuthCredentialsRequest, AuthProvider, ClientCertificate, UserPassPair } from './auth.js';

// Operations
export type { GetOptions, GetResult, KvOptions, MutationResult, RemoveOptions, UpsertOptions } from './operations/kv.js';
export type {
  AnalyticsQueryOptions,
  N1qlQueryOptions,
  QueryOptionsBase,
  SearchQueryOptions,
  ViewQueryOptions,
} from './operations/query.js';
export { Dispatcher } from './dispatcher.js';
export type { AttemptContext, DispatcherOptions, OperationRequest } from './dispatcher.js';

// Registry
export { PendingOperation, PendingOperationRegistry } from './registry/index.js';
export type { OperationCallback, PendingOpHandle, RegistryStats, SettlementState } from './registry/index.js';

// Retries
export {
  BestEffortRetryStrategy,
  FailFastRetryStrategy,
  RETRY_REASON_TRAITS,
  RetryOrchestrator,
  RetryReason,
  computeBackoff,
  controlledBackoff,
  doNotRetry,
  retryAfter,
  retryNow,
  retryOnNewTopology,
} from './retry/index.js';
export type { RetryAction, RetryReasonTraits, RetryRequest, RetryStrategy } from './retry/index.js';

// Circuit breaker
export { CircuitBreaker, CircuitState } from './circuit-breaker/index.js';
export type { CircuitMetrics, CircuitOutcome } from './circuit-breaker/index.js';

// Topology
export { TopologyManager, parseClusterConfig, vbucketIdForKey } from './topology/index.js';
export type { PollMode, TopologyNode, TopologyRevision, TopologySnapshot, VbucketMap } from './topology/index.js';

// Transports
export { Datatype, defaultDialer } from './transport/index.js';
export type { DialTarget, FetchFunction, MemdDialer, MemdPoolStats } from './transport/index.js';

// Streaming
export { JsonRowDecoder, RowReader } from './streaming/index.js';
export type { ChunkSource, RowReaderOptions } from './streaming/index.js';

// Errors
export {
  AgentClosedError,
  AgentError,
  CircuitOpenError,
  ConfigurationError,
  ErrorCategory,
  ErrorCode,
  HttpServiceError,
  KeyValueError,
  KvStatus,
  ProtocolError,
  RequestCanceledError,
  ServiceNotAvailableError,
  TimeoutError,
  TopologyUnavailableError,
  TransportError,
  maskUrl,
} from './errors/index.js';
export type { QueryErrorDescriptor, SerializedError } from './errors/index.js';

// Logging & tracing
export {
  LOG_LEVEL_ENV,
  MemorySink,
  NoOpSink,
  StreamSink,
  createLogger,
  createNoopLogger,
  isLogLevel,
} from './logging/index.js';
export type {
  LogEntry,
  LogLevel,
  LogSink,
  LoggerConfig,
  StreamSinkOptions,
  StructuredLogger,
} from './logging/index.js';
export { NoopTracer, RecordingTracer } from './tracing.js';
export type { RequestSpan, RequestTracer, SpanOptions } from './tracing.js';

export { ServiceType } from '@clusterlink/shared-types';
export type { NodeId, OperationId } from '@clusterlink/shared-types';
