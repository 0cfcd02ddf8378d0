/**
 * Key/value operations
 *
 * Builds dispatcher requests for `get`, `upsert` and `remove`. Each attempt
 * borrows a pooled connection to the vbucket's active node and maps the
 * response status to a result, a retry reason or a terminal error. A "not
 * my vbucket" response may carry the node's newer configuration, which is
 * published before the attempt fails.
 *
 * @packageDocumentation
 */

import { ServiceType, splitHostPort } from '@clusterlink/shared-types';
import type { AttemptContext, OperationRequest } from '../dispatcher.js';
import { ConfigurationError, KeyValueError, KvStatus, ProtocolError } from '../errors/index.js';
import type { StructuredLogger } from '../logging/index.js';
import { RetryReason } from '../retry/reasons.js';
import type { RetryStrategy } from '../retry/strategy.js';
import type { TopologyManager } from '../topology/manager.js';
import { parseClusterConfig } from '../topology/snapshot.js';
import { Datatype, Opcode, createRequest, type MemdPacket } from '../transport/memd-codec.js';
import type { MemdPool } from '../transport/memd-pool.js';

// =============================================================================
// Options & Results
// =============================================================================

export interface KvOptions {
  key: string | Buffer;
  /** Absolute deadline, epoch milliseconds */
  deadline: number;
  retryStrategy?: RetryStrategy;
  signal?: AbortSignal;
  waitForConfig?: boolean;
}

export type GetOptions = KvOptions;

export interface UpsertOptions extends KvOptions {
  value: string | Buffer;
  /** Opaque flags stored with the document */
  flags?: number;
  /** Seconds, or an absolute unix time; 0 = never */
  expiry?: number;
  datatype?: Datatype;
}

export interface RemoveOptions extends KvOptions {
  /** Only remove if the document still has this CAS */
  cas?: bigint;
}

export interface GetResult {
  value: Buffer;
  flags: number;
  datatype: number;
  cas: bigint;
}

export interface MutationResult {
  cas: bigint;
}

export interface KvContext {
  pool: MemdPool;
  topology: TopologyManager;
  useTls: boolean;
  networkType: string;
  logger: StructuredLogger;
}

// =============================================================================
// Status mapping
// =============================================================================

const STATUS_RETRY_REASONS: ReadonlyMap<number, RetryReason> = new Map([
  [KvStatus.NOT_MY_VBUCKET, RetryReason.TOPOLOGY_STALE],
  [KvStatus.TMP_FAIL, RetryReason.KV_TEMPORARY_FAILURE],
  [KvStatus.BUSY, RetryReason.KV_TEMPORARY_FAILURE],
  [KvStatus.LOCKED, RetryReason.KV_LOCKED],
  [KvStatus.SYNC_WRITE_IN_PROGRESS, RetryReason.NON_IDEMPOTENT_CONFLICT],
  [KvStatus.SYNC_WRITE_RECOMMIT_IN_PROGRESS, RetryReason.NON_IDEMPOTENT_CONFLICT],
]);

/**
 * Retry reason for a response status, if the status is transient.
 */
export function retryReasonForStatus(status: number): RetryReason | undefined {
  return STATUS_RETRY_REASONS.get(status);
}

// =============================================================================
// Requests
// =============================================================================

function toKeyBuffer(key: string | Buffer): Buffer {
  return typeof key === 'string' ? Buffer.from(key, 'utf8') : key;
}

/**
 * Send one packet for an attempt and return the successful response.
 *
 * @throws KeyValueError for any non-success status
 */
async function exchange(kv: KvContext, ctx: AttemptContext, packet: MemdPacket): Promise<MemdPacket> {
  const connection = await kv.pool.acquire(ctx.node.id, ctx.signal);
  const response = await connection.request({ ...packet, vbucket: ctx.vbucketId ?? 0 }, ctx.signal);
  if (response.status === KvStatus.SUCCESS) {
    return response;
  }
  if (response.status === KvStatus.NOT_MY_VBUCKET) {
    publishCarriedConfig(kv, ctx, response.value);
  }
  throw new KeyValueError(response.status, {
    retryReason: retryReasonForStatus(response.status),
    context: { node: ctx.node.id, service: ServiceType.KV },
  });
}

function publishCarriedConfig(kv: KvContext, ctx: AttemptContext, body: Buffer): void {
  if (body.length === 0) {
    return;
  }
  try {
    const snapshot = parseClusterConfig(body, {
      sourceHost: splitHostPort(ctx.node.id)?.host ?? ctx.node.hostname,
      useTls: kv.useTls,
      networkType: kv.networkType,
    });
    kv.topology.publish(snapshot);
  } catch (error) {
    kv.logger.debug('ignoring unreadable configuration in not-my-vbucket response from {node}', {
      node: ctx.node.id,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function baseRequest(
  name: string,
  options: KvOptions,
  idempotent: boolean
): Omit<OperationRequest<unknown>, 'execute' | 'discard'> {
  return {
    name,
    service: ServiceType.KV,
    deadline: options.deadline,
    idempotent,
    routingKey: toKeyBuffer(options.key),
    retryStrategy: options.retryStrategy,
    signal: options.signal,
    waitForConfig: options.waitForConfig,
  };
}

function uint32Option(name: string, value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new ConfigurationError(`${name} must be an unsigned 32-bit integer`, name);
  }
  return value;
}

export function getRequest(kv: KvContext, options: GetOptions): OperationRequest<GetResult> {
  const key = toKeyBuffer(options.key);
  return {
    ...baseRequest('get', options, true),
    async execute(ctx) {
      const response = await exchange(kv, ctx, createRequest(Opcode.GET, { key }));
      if (response.extras.length < 4) {
        throw new ProtocolError(`get response carries ${response.extras.length} bytes of extras, expected 4`);
      }
      return {
        value: response.value,
        flags: response.extras.readUInt32BE(0),
        datatype: response.datatype,
        cas: response.cas,
      };
    },
  };
}

export function upsertRequest(kv: KvContext, options: UpsertOptions): OperationRequest<MutationResult> {
  const key = toKeyBuffer(options.key);
  const value = typeof options.value === 'string' ? Buffer.from(options.value, 'utf8') : options.value;
  const extras = Buffer.alloc(8);
  extras.writeUInt32BE(uint32Option('flags', options.flags), 0);
  extras.writeUInt32BE(uint32Option('expiry', options.expiry), 4);
  return {
    ...baseRequest('upsert', options, false),
    async execute(ctx) {
      const response = await exchange(
        kv,
        ctx,
        createRequest(Opcode.SET, { key, value, extras, datatype: options.datatype ?? Datatype.RAW })
      );
      return { cas: response.cas };
    },
  };
}

export function removeRequest(kv: KvContext, options: RemoveOptions): OperationRequest<MutationResult> {
  const key = toKeyBuffer(options.key);
  return {
    ...baseRequest('remove', options, false),
    async execute(ctx) {
      const response = await exchange(kv, ctx, createRequest(Opcode.DELETE, { key, cas: options.cas ?? 0n }));
      return { cas: response.cas };
    },
  };
}
