/**
 * Agent configuration
 *
 * A static, read-only snapshot of everything the agent needs at construction:
 * seed addresses, pool sizing, poll periods, retry and breaker tuning. It can
 * be built from a partial object or parsed from a connection string.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRY_CONFIG,
  createCircuitBreakerConfig,
  createRetryConfig,
  joinHostPort,
  splitHostPort,
  type CircuitBreakerConfig,
  type RetryConfig,
} from '@clusterlink/shared-types';
import { ConfigurationError } from './errors/index.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MEMD_PORT = 11210;
export const DEFAULT_MEMD_TLS_PORT = 11207;
export const DEFAULT_HTTP_PORT = 8091;
export const DEFAULT_HTTP_TLS_PORT = 18091;

/**
 * Which protocol the topology is bootstrapped (and polled) over.
 */
export type BootstrapProtocol = 'cccp' | 'http' | 'both';

// =============================================================================
// Schema
// =============================================================================

const addressSchema = z.string().refine(value => splitHostPort(value) !== null, {
  message: 'expected host:port',
});

const nonNegativeMs = z.number().int().nonnegative();

const orphanLoggingSchema = z.object({
  enabled: z.boolean(),
  intervalMs: z.number().int().positive(),
  sampleSize: z.number().int().positive(),
});

export const AgentConfigSchema = z.object({
  userAgent: z.string().min(1),
  memdAddrs: z.array(addressSchema),
  httpAddrs: z.array(addressSchema),
  useTls: z.boolean(),
  tlsSkipVerify: z.boolean(),
  bucketName: z.string().min(1).optional(),
  networkType: z.string(),
  bootstrapOn: z.enum(['cccp', 'http', 'both']),
  connectTimeoutMs: nonNegativeMs,
  kvConnectTimeoutMs: nonNegativeMs,
  configPollPeriodMs: z.number().int().positive(),
  configPollTimeoutMs: z.number().int().positive(),
  httpRetryDelayMs: nonNegativeMs,
  kvPoolSize: z.number().int().positive(),
  maxQueueSize: z.number().int().positive(),
  orphanLogging: orphanLoggingSchema,
});

/**
 * Static agent configuration. Frozen once created.
 *
 * @public
 * @since 0.1.0
 */
export interface AgentConfig {
  /** Sent with HTTP requests and the binary HELLO */
  readonly userAgent: string;
  /** Seed addresses for the binary protocol (host:port) */
  readonly memdAddrs: readonly string[];
  /** Seed addresses for the HTTP management service (host:port) */
  readonly httpAddrs: readonly string[];
  readonly useTls: boolean;
  readonly tlsSkipVerify: boolean;
  /** Bucket to select on binary connections and to poll configs for */
  readonly bucketName?: string;
  /** Alternate-address network to use ('' for the default network) */
  readonly networkType: string;
  readonly bootstrapOn: BootstrapProtocol;
  /** Overall time allowed to obtain the first configuration */
  readonly connectTimeoutMs: number;
  /** Time allowed to open and authenticate one binary connection */
  readonly kvConnectTimeoutMs: number;
  /** Period between topology polls */
  readonly configPollPeriodMs: number;
  /** Bound on a single topology poll */
  readonly configPollTimeoutMs: number;
  /** Wait before retrying a failed HTTP config poll */
  readonly httpRetryDelayMs: number;
  /** Binary connections per node */
  readonly kvPoolSize: number;
  /** In-flight requests allowed per binary connection */
  readonly maxQueueSize: number;
  readonly orphanLogging: Readonly<{ enabled: boolean; intervalMs: number; sampleSize: number }>;
  readonly retry: Readonly<RetryConfig>;
  readonly circuitBreaker: Readonly<CircuitBreakerConfig>;
}

/**
 * Default configuration values.
 *
 * @public
 */
export const DEFAULT_AGENT_CONFIG: AgentConfig = Object.freeze({
  userAgent: 'clusterlink/0.1.0',
  memdAddrs: Object.freeze([]),
  httpAddrs: Object.freeze([]),
  useTls: false,
  tlsSkipVerify: false,
  networkType: '',
  bootstrapOn: 'both',
  connectTimeoutMs: 7000,
  kvConnectTimeoutMs: 7000,
  configPollPeriodMs: 2500,
  configPollTimeoutMs: 3000,
  httpRetryDelayMs: 10000,
  kvPoolSize: 1,
  maxQueueSize: 2048,
  orphanLogging: Object.freeze({ enabled: false, intervalMs: 10000, sampleSize: 10 }),
  retry: DEFAULT_RETRY_CONFIG,
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
});

/**
 * Input accepted by {@link createAgentConfig}.
 */
export type AgentConfigInput = Partial<Omit<AgentConfig, 'retry' | 'circuitBreaker' | 'orphanLogging'>> & {
  retry?: Partial<RetryConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  orphanLogging?: Partial<AgentConfig['orphanLogging']>;
};

/**
 * Build a validated, frozen configuration.
 *
 * @throws ConfigurationError naming the first offending option
 */
export function createAgentConfig(input: AgentConfigInput = {}): AgentConfig {
  const { retry, circuitBreaker, orphanLogging, ...rest } = input;
  const merged = {
    ...DEFAULT_AGENT_CONFIG,
    ...rest,
    orphanLogging: { ...DEFAULT_AGENT_CONFIG.orphanLogging, ...orphanLogging },
  };

  const result = AgentConfigSchema.safeParse({
    ...merged,
    memdAddrs: [...merged.memdAddrs],
    httpAddrs: [...merged.httpAddrs],
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `invalid configuration${option ? ` for ${option}` : ''}: ${issue?.message ?? 'unknown error'}`,
      option,
      { cause: result.error }
    );
  }

  if (result.data.memdAddrs.length === 0 && result.data.httpAddrs.length === 0) {
    throw new ConfigurationError('at least one seed address is required', 'memdAddrs');
  }

  return Object.freeze({
    ...result.data,
    memdAddrs: Object.freeze(result.data.memdAddrs),
    httpAddrs: Object.freeze(result.data.httpAddrs),
    orphanLogging: Object.freeze(result.data.orphanLogging),
    retry: Object.freeze(buildSubConfig('retry', () => createRetryConfig(retry))),
    circuitBreaker: Object.freeze(buildSubConfig('circuitBreaker', () => createCircuitBreakerConfig(circuitBreaker))),
  });
}

function buildSubConfig<T>(option: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`invalid configuration for ${option}: ${message}`, option, { cause: error });
  }
}

// =============================================================================
// Connection Strings
// =============================================================================

interface ParsedConnStr {
  scheme: 'cluster' | 'clusters' | 'http';
  hosts: Array<{ host: string; port?: number }>;
  bucket?: string;
  options: Map<string, string[]>;
}

const CONN_STR_PATTERN = /^(cluster|clusters|http):\/\/([^/?]*)(?:\/([^?]*))?(?:\?(.*))?$/;

function parseConnStr(connStr: string): ParsedConnStr {
  const match = CONN_STR_PATTERN.exec(connStr);
  if (!match) {
    throw new ConfigurationError(`unsupported connection string: ${connStr}`, 'connStr');
  }
  const [, scheme, hostList = '', bucket, query] = match;
  if (scheme !== 'cluster' && scheme !== 'clusters' && scheme !== 'http') {
    throw new ConfigurationError(`unsupported scheme: ${String(scheme)}`, 'connStr');
  }

  const hosts = hostList
    .split(/[,;]/)
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const split = splitHostPort(part);
      if (split) {
        return { host: split.host, port: split.port };
      }
      if (part.includes(':') && !part.startsWith('[')) {
        if (part.split(':').length === 2) {
          throw new ConfigurationError(`invalid host in connection string: ${part}`, 'connStr');
        }
        // bare IPv6 address without port
        return { host: part };
      }
      return { host: part.replace(/^\[(.*)\]$/, '$1') };
    });

  const options = new Map<string, string[]>();
  if (query) {
    for (const [key, value] of new URLSearchParams(query)) {
      const values = options.get(key) ?? [];
      values.push(value);
      options.set(key, values);
    }
  }

  return {
    scheme,
    hosts,
    bucket: bucket ? decodeURIComponent(bucket) : undefined,
    options,
  };
}

function parseIntOption(name: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigurationError(`${name} option must be a number`, name);
  }
  return Number.parseInt(value, 10);
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

function parseBoolOption(name: string, value: string): boolean {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ConfigurationError(`${name} option must be a boolean`, name);
}

/**
 * Parse a connection string of the form
 * `cluster[s]://host[:port][,host[:port]...][/bucket][?option=value&...]`
 * into a configuration.
 *
 * Hosts without a port (or with the HTTP management port) seed both
 * protocols on their default ports; any other port seeds the binary
 * protocol only. `http://` seeds HTTP only. When an option is given more
 * than once the last value wins.
 *
 * Supported options: `bootstrap_on` (cccp, http, both), `network`,
 * `kv_connect_timeout`, `config_poll_interval`, `config_poll_timeout`,
 * `kv_pool_size`, `max_queue_size`, `orphaned_response_logging`,
 * `orphaned_response_logging_interval`,
 * `orphaned_response_logging_sample_size`, `http_retry_delay`. Others are
 * ignored.
 *
 * @throws ConfigurationError naming the offending option
 *
 * @example
 * ```typescript
 * const config = agentConfigFromConnStr(
 *   'cluster://10.0.0.1,10.0.0.2/travel?kv_pool_size=2&config_poll_interval=1000'
 * );
 * ```
 */
export function agentConfigFromConnStr(connStr: string, overrides: AgentConfigInput = {}): AgentConfig {
  const parsed = parseConnStr(connStr);
  const useTls = parsed.scheme === 'clusters';
  const memdDefault = useTls ? DEFAULT_MEMD_TLS_PORT : DEFAULT_MEMD_PORT;
  const httpDefault = useTls ? DEFAULT_HTTP_TLS_PORT : DEFAULT_HTTP_PORT;

  let memdAddrs: string[] = [];
  let httpAddrs: string[] = [];
  for (const { host, port } of parsed.hosts) {
    if (parsed.scheme === 'http') {
      httpAddrs.push(joinHostPort(host, port ?? DEFAULT_HTTP_PORT));
    } else if (port === undefined || port === DEFAULT_HTTP_PORT || port === DEFAULT_HTTP_TLS_PORT) {
      memdAddrs.push(joinHostPort(host, memdDefault));
      httpAddrs.push(joinHostPort(host, port ?? httpDefault));
    } else {
      memdAddrs.push(joinHostPort(host, port));
    }
  }

  const fetchOption = (name: string): string | undefined => {
    const values = parsed.options.get(name);
    return values && values.length > 0 ? values[values.length - 1] : undefined;
  };

  const input: { -readonly [K in keyof AgentConfigInput]: AgentConfigInput[K] } = { useTls, tlsSkipVerify: useTls };
  const orphanLogging: { -readonly [K in keyof AgentConfig['orphanLogging']]?: AgentConfig['orphanLogging'][K] } = {};

  const bootstrapOn = fetchOption('bootstrap_on');
  switch (bootstrapOn) {
    case 'http':
      memdAddrs = [];
      if (httpAddrs.length === 0) {
        throw new ConfigurationError('bootstrap_on=http but no HTTP hosts in connection string', 'bootstrap_on');
      }
      input.bootstrapOn = 'http';
      break;
    case 'cccp':
      httpAddrs = [];
      if (memdAddrs.length === 0) {
        throw new ConfigurationError(
          'bootstrap_on=cccp but no binary protocol hosts in connection string',
          'bootstrap_on'
        );
      }
      input.bootstrapOn = 'cccp';
      break;
    case 'both':
    case '':
    case undefined:
      break;
    default:
      throw new ConfigurationError('bootstrap_on must be one of http, cccp or both', 'bootstrap_on');
  }
  if (input.bootstrapOn === undefined && memdAddrs.length === 0) {
    input.bootstrapOn = 'http';
  }

  if (parsed.bucket) {
    input.bucketName = parsed.bucket;
  }

  const network = fetchOption('network');
  if (network !== undefined) {
    input.networkType = network === 'default' ? '' : network;
  }

  const intOptions: Array<[string, (value: number) => void]> = [
    ['connect_timeout', v => { input.connectTimeoutMs = v; }],
    ['kv_connect_timeout', v => { input.kvConnectTimeoutMs = v; }],
    ['config_poll_timeout', v => { input.configPollTimeoutMs = v; }],
    ['config_poll_interval', v => { input.configPollPeriodMs = v; }],
    ['http_retry_delay', v => { input.httpRetryDelayMs = v; }],
    ['kv_pool_size', v => { input.kvPoolSize = v; }],
    ['max_queue_size', v => { input.maxQueueSize = v; }],
    ['orphaned_response_logging_interval', v => { orphanLogging.intervalMs = v; }],
    ['orphaned_response_logging_sample_size', v => { orphanLogging.sampleSize = v; }],
  ];
  for (const [name, apply] of intOptions) {
    const value = fetchOption(name);
    if (value !== undefined) {
      apply(parseIntOption(name, value));
    }
  }

  const orphanEnabled = fetchOption('orphaned_response_logging');
  if (orphanEnabled !== undefined) {
    orphanLogging.enabled = parseBoolOption('orphaned_response_logging', orphanEnabled);
  }

  return createAgentConfig({
    ...input,
    memdAddrs,
    httpAddrs,
    ...overrides,
    orphanLogging: { ...orphanLogging, ...overrides.orphanLogging },
  });
}

// =============================================================================
// Redaction
// =============================================================================

function redactValue(value: string): string {
  return `<redacted>${value}</redacted>`;
}

/**
 * A copy of the configuration safe to log: addresses and bucket name are
 * wrapped in redaction markers.
 */
export function redactConfig(config: AgentConfig): Record<string, unknown> {
  return {
    ...config,
    memdAddrs: config.memdAddrs.map(redactValue),
    httpAddrs: config.httpAddrs.map(redactValue),
    bucketName: config.bucketName === undefined ? undefined : redactValue(config.bucketName),
  };
}
